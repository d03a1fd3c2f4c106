import { describe, it, expect } from 'vitest';
import {
  CATEGORY_STYLES,
  MESSAGE_CATEGORIES,
  formatHeading,
  parseHeading,
  resolveAccent,
  toneForSymbol,
} from './category.styles.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';

describe('CATEGORY_STYLES', () => {
  it('covers every category', () => {
    expect(MESSAGE_CATEGORIES).toEqual([
      'error',
      'success',
      'warning',
      'info',
      'permission-denied',
      'usage',
      'no-data',
    ]);
  });

  it('binds each symbol to a single tone', () => {
    for (const style of Object.values(CATEGORY_STYLES)) {
      expect(toneForSymbol(style.symbol)).toBe(style.tone);
    }
  });

  it('shares the error tone and symbol across failure categories', () => {
    for (const category of ['error', 'permission-denied', 'usage'] as const) {
      expect(CATEGORY_STYLES[category].tone).toBe('error');
      expect(CATEGORY_STYLES[category].symbol).toBe('❌');
    }
  });
});

describe('resolveAccent', () => {
  it('maps categories to palette colors through their tone', () => {
    expect(resolveAccent('error', DEFAULT_CONFIG.palette)).toBe(0xed4245);
    expect(resolveAccent('success', DEFAULT_CONFIG.palette)).toBe(0x57f287);
    expect(resolveAccent('warning', DEFAULT_CONFIG.palette)).toBe(0xfee75c);
    expect(resolveAccent('info', DEFAULT_CONFIG.palette)).toBe(0x5865f2);
    expect(resolveAccent('no-data', DEFAULT_CONFIG.palette)).toBe(0x5865f2);
  });
});

describe('formatHeading', () => {
  it('uses the default title at level 3', () => {
    expect(formatHeading('error')).toBe('### ❌ Error');
    expect(formatHeading('no-data')).toBe('### 📊 No Data');
  });

  it('accepts a custom title and level', () => {
    expect(formatHeading('warning', 'Rate limited', 2)).toBe('## ⚠️ Rate limited');
  });
});

describe('parseHeading', () => {
  it('reads a formatted heading back', () => {
    expect(parseHeading('### ✅ Saved\nbody')).toEqual({ level: 3, symbol: '✅', title: 'Saved' });
  });

  it('prefers the full warning emoji over its bare prefix', () => {
    expect(parseHeading('# ⚠️ Careful')?.symbol).toBe('⚠️');
  });

  it('reports level 0 for a symbol line without a heading marker', () => {
    expect(parseHeading('📋 Info')).toEqual({ level: 0, symbol: '📋', title: 'Info' });
  });

  it('returns null for text without a known symbol', () => {
    expect(parseHeading('### Settings')).toBeNull();
    expect(parseHeading('hello')).toBeNull();
  });
});
