import { promises as fs } from 'fs';

import { Utterance } from './transcript.types.js';

const HEADER_LINE_RE = /^\[(\d{1,2}:\d{2}:\d{2})\]\s+(Speaker\s+\w+):\s*$/;

const TITLE_RULE = '='.repeat(60);

const isBlank = (line: string) => line.trim() === '';

/**
 * Serializes utterances in the transcript text format:
 *
 * ```
 * TRANSCRIPT: call1.m4a
 * ============================================================
 *
 * [0:00:05] Speaker A:
 * Hello there.
 *
 * [0:00:09] Speaker B:
 * Hi, how are you?
 * ```
 *
 * Every utterance gets its own header. A blank line is written before a
 * header only when the speaker changes.
 */
export const formatTranscriptText = (
  sourceName: string,
  utterances: readonly Utterance[]
): string => {
  const lines: string[] = [`TRANSCRIPT: ${sourceName}`, TITLE_RULE, ''];

  let currentSpeaker: string | null = null;
  for (const utterance of utterances) {
    if (currentSpeaker !== null && utterance.speaker !== currentSpeaker) {
      lines.push('');
    }
    lines.push(`[${utterance.timestamp}] ${utterance.speaker}:`);
    currentSpeaker = utterance.speaker;

    // A blank line inside the text would read back as a turn separator,
    // and a header-shaped line as a new turn; headers only match at column 0.
    for (const line of utterance.text.split(/\r?\n/)) {
      if (isBlank(line)) continue;
      const trimmed = line.trim();
      lines.push(HEADER_LINE_RE.test(trimmed) ? ` ${trimmed}` : trimmed);
    }
  }

  return `${lines.join('\n')}\n`;
};

/**
 * Rebuilds the utterance list from the lines of a transcript text file.
 * Returns an empty array when no header line is found.
 */
export const parseTranscriptLines = (lines: readonly string[]): Utterance[] => {
  const entries: Utterance[] = [];
  let i = 0;

  while (i < lines.length && !HEADER_LINE_RE.test(lines[i])) {
    i += 1;
  }

  while (i < lines.length) {
    const match = HEADER_LINE_RE.exec(lines[i]);
    if (!match) {
      i += 1;
      continue;
    }

    const [, timestamp, speaker] = match;
    i += 1;

    const textLines: string[] = [];
    while (
      i < lines.length &&
      !isBlank(lines[i]) &&
      !HEADER_LINE_RE.test(lines[i])
    ) {
      textLines.push(lines[i].trim());
      i += 1;
    }

    entries.push({ timestamp, speaker, text: textLines.join(' ') });

    while (i < lines.length && isBlank(lines[i])) {
      i += 1;
    }
  }

  return entries;
};

export const parseTranscriptText = (content: string): Utterance[] =>
  parseTranscriptLines(content.split(/\r?\n/));

export const readTranscriptFile = async (path: string): Promise<Utterance[]> =>
  parseTranscriptText(await fs.readFile(path, 'utf-8'));
