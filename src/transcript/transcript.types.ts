/**
 * One contiguous turn of speech as it appears in a transcript text file.
 */
export interface Utterance {
  /** Elapsed time from the start of the recording, `H:MM:SS` or `HH:MM:SS`. */
  readonly timestamp: string;

  /** Display label, e.g. `Speaker A`. */
  readonly speaker: string;

  readonly text: string;
}
