/** Herald terminal palette; message accents come from the loaded config instead. */
export const THEME = {
  /** Blurple: titles, highlights */
  primary: '#5865F2',
  /** Borders, decorations */
  accent: '#4752C4',
  /** Gray: secondary labels */
  dim: '#6B7280',
  /** Green: clean result */
  success: '#57F287',
  /** Red: error severity */
  error: '#ED4245',
  /** Yellow: warn severity */
  warning: '#FEE75C',
  /** White: primary text */
  text: 'white',
  /** Light gray: file paths, messages */
  textDim: '#9CA3AF',
} as const;
