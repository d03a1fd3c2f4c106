export type MessageCategory =
  | 'error'
  | 'success'
  | 'warning'
  | 'info'
  | 'permission-denied'
  | 'usage'
  | 'no-data';

/** Palette slot a category draws its container accent from. */
export type AccentTone = 'error' | 'success' | 'warning' | 'primary';

export interface CategoryStyle {
  tone: AccentTone;
  symbol: string;
  /** Default heading text when the caller gives none */
  title: string;
}
