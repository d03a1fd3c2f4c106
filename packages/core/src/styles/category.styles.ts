import type { AccentTone, CategoryStyle, HeraldConfig, MessageCategory } from '@herald/shared';

export const CATEGORY_STYLES: Record<MessageCategory, CategoryStyle> = {
  error: { tone: 'error', symbol: '❌', title: 'Error' },
  success: { tone: 'success', symbol: '✅', title: 'Success' },
  warning: { tone: 'warning', symbol: '⚠️', title: 'Warning' },
  info: { tone: 'primary', symbol: '📋', title: 'Information' },
  'permission-denied': { tone: 'error', symbol: '❌', title: 'Permission Denied' },
  usage: { tone: 'error', symbol: '❌', title: 'Usage' },
  'no-data': { tone: 'primary', symbol: '📊', title: 'No Data' },
};

export const MESSAGE_CATEGORIES = Object.keys(CATEGORY_STYLES).filter(isMessageCategory);

export function isMessageCategory(value: unknown): value is MessageCategory {
  return typeof value === 'string' && Object.hasOwn(CATEGORY_STYLES, value);
}

function buildSymbolTones(): Map<string, AccentTone> {
  const tones = new Map<string, AccentTone>();
  for (const [category, style] of Object.entries(CATEGORY_STYLES)) {
    const existing = tones.get(style.symbol);
    if (existing !== undefined && existing !== style.tone) {
      throw new Error(
        `Symbol ${style.symbol} of category "${category}" is already bound to tone "${existing}"`,
      );
    }
    tones.set(style.symbol, style.tone);
  }
  return tones;
}

const SYMBOL_TONES = buildSymbolTones();

/** Known symbols, longest first so multi-codepoint emoji win over their prefixes. */
const SYMBOLS = [...SYMBOL_TONES.keys()].sort((a, b) => b.length - a.length);

export function toneForSymbol(symbol: string): AccentTone | undefined {
  return SYMBOL_TONES.get(symbol);
}

export function resolveAccent(category: MessageCategory, palette: HeraldConfig['palette']): number {
  return palette[CATEGORY_STYLES[category].tone];
}

export function formatHeading(category: MessageCategory, title?: string, level = 3): string {
  const style = CATEGORY_STYLES[category];
  return `${'#'.repeat(level)} ${style.symbol} ${title ?? style.title}`;
}

export interface ParsedHeading {
  /** 0 when the line starts with a symbol but carries no heading marker */
  level: number;
  symbol: string;
  title: string;
}

/**
 * Reads the first line of a text block as a category heading.
 * Returns null when the line does not start with a known symbol.
 */
export function parseHeading(text: string): ParsedHeading | null {
  const firstLine = text.split('\n', 1)[0] ?? '';
  const marker = /^(#{1,3})\s+/.exec(firstLine);
  const rest = marker ? firstLine.slice(marker[0].length) : firstLine.trimStart();

  const symbol = SYMBOLS.find((s) => rest.startsWith(s));
  if (symbol === undefined) return null;

  return {
    level: marker?.[1]?.length ?? 0,
    symbol,
    title: rest.slice(symbol.length).trim(),
  };
}

export function formatColor(color: number): string {
  return `#${color.toString(16).toUpperCase().padStart(6, '0')}`;
}
