export const NOTE_COLOR_PALETTE = [
  '#4ECDC4',
  '#556270',
  '#C7F464',
  '#FF6B6B',
  '#C44D58',
  '#45B7AA',
  '#96CEB4',
  '#FFEEAD',
  '#D4A5A5',
] as const;

export type NoteColor = (typeof NOTE_COLOR_PALETTE)[number];

/**
 * Pick a palette entry from a random source returning values in [0, 1).
 */
export function pickNoteColor(random: () => number = Math.random): NoteColor {
  const index = Math.floor(random() * NOTE_COLOR_PALETTE.length);
  // Custom sources may return 1 or negatives
  const bounded = Math.min(Math.max(index, 0), NOTE_COLOR_PALETTE.length - 1);
  return NOTE_COLOR_PALETTE[bounded] ?? NOTE_COLOR_PALETTE[0];
}
