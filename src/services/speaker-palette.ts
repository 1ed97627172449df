export const SPEAKER_COLORS = [
  '1F497D', // dark blue
  '4F81BD', // blue
  '7030A0', // purple
  '008000', // green
  'C0504D', // red
  '806000', // brown/gold
] as const;

/**
 * Hands out palette colors to speakers in first-seen order, cycling
 * when there are more speakers than colors.
 */
export class SpeakerPalette {
  private readonly colors: readonly string[];
  private readonly assigned = new Map<string, string>();

  constructor(colors: readonly string[] = SPEAKER_COLORS) {
    if (colors.length === 0) {
      throw new Error('Speaker palette needs at least one color.');
    }
    this.colors = colors;
  }

  colorFor(speaker: string): string {
    let color = this.assigned.get(speaker);
    if (color === undefined) {
      color = this.colors[this.assigned.size % this.colors.length];
      this.assigned.set(speaker, color);
    }
    return color;
  }
}
