#!/usr/bin/env node
import { DocxDocumentService } from '../services/document.service.js';
import { convertTranscriptToDocx, documentPathFor } from '../txt-to-docx.js';

const main = async () => {
  const [txtPath, outputArg] = process.argv.slice(2);
  if (!txtPath) {
    console.error('Usage: txt-to-docx <path/to/transcript.txt> [output.docx]');
    process.exitCode = 1;
    return;
  }

  const docxPath = outputArg || documentPathFor(txtPath);

  try {
    await convertTranscriptToDocx(txtPath, docxPath, new DocxDocumentService());
  } catch (err) {
    console.error(`Failed to create .docx: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Created Word document: ${docxPath}`);
};

void main();
