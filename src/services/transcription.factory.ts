import { AssemblyAI } from 'assemblyai';

import { RunSettings, loadApiKey, loadTranscriptionOptions } from '../config.js';
import { ITranscriptionService } from './transcription.service.js';
import { AssemblyAiService } from './assemblyai.service.js';
import { MockService } from './mock.service.js';

/**
 * Instantiates the transcription service selected by the run settings.
 * Credentials and options are only read for the real provider.
 */
export const getTranscriptionService = async (
  settings: RunSettings
): Promise<ITranscriptionService> => {
  switch (settings.provider) {
    case 'assemblyai': {
      const apiKey = await loadApiKey(settings.apiKeyFile);
      const options = await loadTranscriptionOptions(settings.configFile);
      console.log('Using AssemblyAI for transcription.');
      const client = new AssemblyAI({ apiKey });
      return new AssemblyAiService(client.transcripts, options, settings.pollIntervalMs);
    }

    case 'mock':
      console.log('Using MOCK service for transcription.');
      return new MockService();
  }
};
