import { promises as fs } from 'fs';
import path from 'path';

import { ITranscriptionService, TranscriptSegment } from './services/transcription.service.js';
import { formatTimestamp } from './transcript/timestamp.js';
import { formatTranscriptText } from './transcript/transcript-text.js';
import { Utterance } from './transcript/transcript.types.js';

export const toUtterance = (segment: TranscriptSegment): Utterance => ({
  timestamp: formatTimestamp(segment.start),
  speaker: `Speaker ${segment.speaker}`,
  text: segment.text,
});

/** `<dir>/<name>_transcript.txt` next to the recording. */
export const transcriptPathFor = (audioPath: string): string => {
  const { dir, name } = path.parse(audioPath);
  return path.join(dir, `${name}_transcript.txt`);
};

/**
 * Transcribes a recording and writes the transcript text file beside it.
 * The service is resolved only once the recording is known to exist.
 *
 * @returns Path of the written transcript.
 */
export const transcribeAudioFile = async (
  audioPath: string,
  resolveService: () => Promise<ITranscriptionService>
): Promise<string> => {
  try {
    await fs.access(audioPath);
  } catch {
    throw new Error(`File not found: ${audioPath}`);
  }

  const transcriptionService = await resolveService();

  console.log(`Uploading ${audioPath}...`);
  const segments = await transcriptionService.transcribe(audioPath);
  console.log('Transcription complete. Saving output...');

  const outputPath = transcriptPathFor(audioPath);
  const content = formatTranscriptText(path.basename(audioPath), segments.map(toUtterance));
  await fs.writeFile(outputPath, content, 'utf-8');

  return outputPath;
};
