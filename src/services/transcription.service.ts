export interface TranscriptSegment {
  /** Diarization label as reported by the provider, e.g. `A`. */
  speaker: string;

  /** Start offset in milliseconds. */
  start: number;

  text: string;
}

export interface ITranscriptionService {
  /**
   * @param audioPath Local path of the recording to transcribe.
   * @returns The speaker turns in the order they were spoken.
   */
  transcribe(audioPath: string): Promise<TranscriptSegment[]>;
}
