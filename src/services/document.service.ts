import { promises as fs } from 'fs';
import { format } from 'date-fns';
import {
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  TextRun,
  convertInchesToTwip,
} from 'docx';

import { Utterance } from '../transcript/transcript.types.js';
import { SPEAKER_COLORS, SpeakerPalette } from './speaker-palette.js';

export const NO_ENTRIES_MESSAGE = 'No transcript entries were parsed from the .txt file.';

export interface DocumentSource {
  /** Shown in the subtitle, usually the transcript file's base name. */
  displayName: string;
  modifiedAt?: Date;
}

export interface DocumentOptions {
  title: string;
  note: string;
  palette: readonly string[];
  font: string;
  fontSizePt: number;
  marginInches: number;
}

export const DEFAULT_DOCUMENT_OPTIONS: DocumentOptions = {
  title: 'Therapy Session Transcript',
  note:
    'Note: This transcript is anonymized and intended for clinical/educational use. ' +
    'Speakers are labeled generically (e.g., Speaker A, Speaker B).',
  palette: SPEAKER_COLORS,
  font: 'Calibri',
  fontSizePt: 11,
  marginInches: 1,
};

export type DocumentBlock =
  | { kind: 'title'; text: string }
  | { kind: 'subtitle'; text: string }
  | { kind: 'metadata'; label: string; value: string }
  | { kind: 'note'; text: string }
  | { kind: 'heading'; text: string; color: string }
  | { kind: 'text'; text: string; color: string }
  | { kind: 'spacer' };

/**
 * Lays out the transcript as an ordered list of blocks: title, source,
 * optional file date, note, then a colored heading and text per utterance.
 */
export const layoutTranscript = (
  utterances: readonly Utterance[],
  source: DocumentSource,
  options: DocumentOptions = DEFAULT_DOCUMENT_OPTIONS
): DocumentBlock[] => {
  if (utterances.length === 0) {
    throw new Error(NO_ENTRIES_MESSAGE);
  }

  const blocks: DocumentBlock[] = [
    { kind: 'title', text: options.title },
    { kind: 'subtitle', text: `Source file: ${source.displayName}` },
  ];

  if (source.modifiedAt) {
    blocks.push({
      kind: 'metadata',
      label: 'Session date (file timestamp): ',
      value: format(source.modifiedAt, 'yyyy-MM-dd HH:mm'),
    });
  }

  blocks.push({ kind: 'spacer' }, { kind: 'note', text: options.note }, { kind: 'spacer' });

  const palette = new SpeakerPalette(options.palette);
  for (const { timestamp, speaker, text } of utterances) {
    const color = palette.colorFor(speaker);
    blocks.push({ kind: 'heading', text: `[${timestamp}] ${speaker}`, color });
    if (text) {
      blocks.push({ kind: 'text', text, color });
    }
    blocks.push({ kind: 'spacer' });
  }

  return blocks;
};

const toParagraph = (block: DocumentBlock): Paragraph => {
  switch (block.kind) {
    case 'title':
      return new Paragraph({ text: block.text, heading: HeadingLevel.TITLE });
    case 'subtitle':
      return new Paragraph({ text: block.text, style: 'Subtitle' });
    case 'metadata':
      return new Paragraph({
        children: [new TextRun({ text: block.label, bold: true }), new TextRun(block.value)],
      });
    case 'note':
      return new Paragraph({ children: [new TextRun({ text: block.text, italics: true })] });
    case 'heading':
      return new Paragraph({
        children: [new TextRun({ text: block.text, bold: true, color: block.color })],
      });
    case 'text':
      return new Paragraph({ children: [new TextRun({ text: block.text, color: block.color })] });
    case 'spacer':
      return new Paragraph({});
  }
};

export interface IDocumentService {
  render(
    utterances: readonly Utterance[],
    source: DocumentSource,
    outputPath: string
  ): Promise<void>;
}

export class DocxDocumentService implements IDocumentService {
  private options: DocumentOptions;

  constructor(options: Partial<DocumentOptions> = {}) {
    this.options = { ...DEFAULT_DOCUMENT_OPTIONS, ...options };
  }

  build(utterances: readonly Utterance[], source: DocumentSource): Document {
    const margin = convertInchesToTwip(this.options.marginInches);

    return new Document({
      styles: {
        default: {
          document: {
            // docx sizes are in half-points
            run: { font: this.options.font, size: this.options.fontSizePt * 2 },
          },
        },
        paragraphStyles: [
          {
            id: 'Subtitle',
            name: 'Subtitle',
            basedOn: 'Normal',
            next: 'Normal',
            quickFormat: true,
            run: { italics: true, color: '595959', size: 30 },
          },
        ],
      },
      sections: [
        {
          properties: {
            page: { margin: { top: margin, right: margin, bottom: margin, left: margin } },
          },
          children: layoutTranscript(utterances, source, this.options).map(toParagraph),
        },
      ],
    });
  }

  async render(
    utterances: readonly Utterance[],
    source: DocumentSource,
    outputPath: string
  ): Promise<void> {
    const buffer = await Packer.toBuffer(this.build(utterances, source));

    try {
      await fs.writeFile(outputPath, buffer);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to save document to ${outputPath}: ${reason}`);
    }
    console.log(`[DocxDocumentService] Wrote ${utterances.length} utterances to ${outputPath}`);
  }
}
