import type { TranscribeParams } from 'assemblyai';

import { TranscriptionOptions } from '../config.js';
import { ITranscriptionService, TranscriptSegment } from './transcription.service.js';

const delay = (ms: number) => new Promise((res) => setTimeout(res, ms));

/** The parts of an AssemblyAI transcript this service reads. */
export interface ProviderTranscript {
  id: string;
  status: string;
  error?: string | null;
  text?: string | null;
  utterances?: { speaker: string; start: number; text: string }[] | null;
}

/** The slice of `AssemblyAI#transcripts` used here. */
export interface TranscriptsClient {
  submit(params: TranscribeParams): Promise<ProviderTranscript>;
  get(id: string): Promise<ProviderTranscript>;
}

export class AssemblyAiService implements ITranscriptionService {
  private transcripts: TranscriptsClient;
  private options: TranscriptionOptions;
  private pollIntervalMs: number;

  constructor(
    transcripts: TranscriptsClient,
    options: TranscriptionOptions,
    pollIntervalMs: number
  ) {
    this.transcripts = transcripts;
    this.options = options;
    this.pollIntervalMs = pollIntervalMs;
  }

  async transcribe(audioPath: string): Promise<TranscriptSegment[]> {
    console.log(`[AssemblyAiService] Starting transcription for ${audioPath}`);

    let transcript = await this.transcripts.submit({
      audio: audioPath,
      language_code: this.options.language_code,
      speaker_labels: this.options.speaker_labels,
      speech_models: this.options.speech_models,
    });

    while (transcript.status !== 'completed' && transcript.status !== 'error') {
      await delay(this.pollIntervalMs);
      transcript = await this.transcripts.get(transcript.id);
      console.log(`[AssemblyAiService] Job ${transcript.id} status: ${transcript.status}`);
    }

    if (transcript.status === 'error') {
      throw new Error(`Transcription failed: ${transcript.error}`);
    }

    if (transcript.utterances) {
      return transcript.utterances.map((u) => ({
        speaker: u.speaker,
        start: u.start,
        text: u.text,
      }));
    }

    if (!transcript.text) {
      console.warn('[AssemblyAiService] No text in transcript, returning empty array.');
      return [];
    }

    console.warn('[AssemblyAiService] No speaker labels in transcript, using a single speaker.');
    return [{ speaker: 'A', start: 0, text: transcript.text }];
  }
}
