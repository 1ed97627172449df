import { ITranscriptionService, TranscriptSegment } from './transcription.service.js';

export class MockService implements ITranscriptionService {
  async transcribe(audioPath: string): Promise<TranscriptSegment[]> {
    console.log(`[MockService] Returning a canned transcript for ${audioPath}`);

    return [
      { speaker: 'A', start: 1000, text: 'Hello, this is a MOCK transcript.' },
      { speaker: 'B', start: 3000, text: 'The real service has been swapped out.' },
      { speaker: 'B', start: 6500, text: 'Testing complete.' },
    ];
  }
}
