#!/usr/bin/env node
import { loadRunSettings } from '../config.js';
import { getTranscriptionService } from '../services/transcription.factory.js';
import { transcribeAudioFile } from '../transcribe.js';

const main = async () => {
  const audioPath = process.argv[2];
  if (!audioPath) {
    console.error('Usage: transcribe <path/to/recording.m4a>');
    console.error('Example: transcribe ./meetings/call1.m4a');
    process.exitCode = 1;
    return;
  }

  try {
    const settings = loadRunSettings();
    const outputPath = await transcribeAudioFile(audioPath, () =>
      getTranscriptionService(settings)
    );
    console.log(`\nDone! Transcript saved to: ${outputPath}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
};

void main();
