import { promises as fs } from 'fs';
import path from 'path';

import { IDocumentService, NO_ENTRIES_MESSAGE } from './services/document.service.js';
import { readTranscriptFile } from './transcript/transcript-text.js';

/** `<dir>/<name>.docx` next to the transcript. */
export const documentPathFor = (txtPath: string): string => {
  const { dir, name } = path.parse(txtPath);
  return path.join(dir, `${name}.docx`);
};

const readModifiedAt = async (filePath: string): Promise<Date | undefined> => {
  try {
    return (await fs.stat(filePath)).mtime;
  } catch (err) {
    console.warn(`Could not read modification time of ${filePath}:`, err);
    return undefined;
  }
};

/**
 * Parses a transcript text file and renders it to a Word document.
 */
export const convertTranscriptToDocx = async (
  txtPath: string,
  docxPath: string,
  documentService: IDocumentService
): Promise<void> => {
  try {
    await fs.access(txtPath);
  } catch {
    throw new Error(`File not found: ${txtPath}`);
  }

  const utterances = await readTranscriptFile(txtPath);
  if (utterances.length === 0) {
    throw new Error(NO_ENTRIES_MESSAGE);
  }

  const modifiedAt = await readModifiedAt(txtPath);
  await documentService.render(
    utterances,
    { displayName: path.basename(txtPath), modifiedAt },
    docxPath
  );
};
