const REGEX_PREFIX_CHARS = new Set('(,=:[!&|?{};+-*%<>~^'.split(''));
const REGEX_PREFIX_WORDS = new Set([
  'return',
  'typeof',
  'case',
  'do',
  'else',
  'in',
  'of',
  'new',
  'delete',
  'void',
  'throw',
  'yield',
  'await',
]);

type Mode = 'code' | 'template';

/**
 * Returns a copy of `source` with comments, string contents, template text
 * and regex bodies replaced by spaces. Quotes, template `${}` expressions
 * and newlines are kept, so offsets and line numbers match the original.
 */
export function maskSource(source: string): string {
  const out = source.split('');
  const n = source.length;

  const blank = (from: number, to: number): void => {
    for (let k = from; k < to && k < n; k++) {
      if (out[k] !== '\n') out[k] = ' ';
    }
  };

  const wordBefore = (index: number): string => {
    let start = index;
    while (start > 0 && /[\w$]/.test(source.charAt(start - 1))) start--;
    return source.slice(start, index);
  };

  const modes: Mode[] = ['code'];
  // Brace depth at which each open `${` expression returns to its template
  const templateBraces: number[] = [];
  let braceDepth = 0;
  let lastSignificant = '';
  let lastSignificantEnd = 0;
  let i = 0;

  while (i < n) {
    const ch = source.charAt(i);
    const next = source.charAt(i + 1);
    const mode = modes[modes.length - 1] ?? 'code';

    if (mode === 'template') {
      if (ch === '\\') {
        blank(i, i + 2);
        i += 2;
      } else if (ch === '`') {
        modes.pop();
        lastSignificant = '`';
        lastSignificantEnd = i + 1;
        i++;
      } else if (ch === '$' && next === '{') {
        templateBraces.push(braceDepth);
        braceDepth++;
        modes.push('code');
        lastSignificant = '{';
        lastSignificantEnd = i + 2;
        i += 2;
      } else {
        blank(i, i + 1);
        i++;
      }
      continue;
    }

    if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i);
      const stop = end === -1 ? n : end;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      const stop = end === -1 ? n : end + 2;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < n && source.charAt(j) !== ch && source.charAt(j) !== '\n') {
        j += source.charAt(j) === '\\' ? 2 : 1;
      }
      blank(i + 1, j);
      lastSignificant = ch;
      lastSignificantEnd = j + 1;
      i = j + 1;
      continue;
    }

    if (ch === '`') {
      modes.push('template');
      i++;
      continue;
    }

    if (ch === '/') {
      const prefixWord = /[\w$]/.test(lastSignificant) ? wordBefore(lastSignificantEnd) : '';
      const regexAllowed =
        lastSignificant === '' ||
        REGEX_PREFIX_CHARS.has(lastSignificant) ||
        REGEX_PREFIX_WORDS.has(prefixWord);
      if (regexAllowed) {
        let j = i + 1;
        let inClass = false;
        while (j < n && source.charAt(j) !== '\n') {
          const c = source.charAt(j);
          if (c === '\\') {
            j += 2;
            continue;
          }
          if (c === '[') inClass = true;
          else if (c === ']') inClass = false;
          else if (c === '/' && !inClass) break;
          j++;
        }
        blank(i + 1, j);
        lastSignificant = '/';
        lastSignificantEnd = j + 1;
        i = j + 1;
        continue;
      }
    }

    if (ch === '{') {
      braceDepth++;
    } else if (ch === '}') {
      braceDepth--;
      if (templateBraces.length > 0 && templateBraces[templateBraces.length - 1] === braceDepth) {
        templateBraces.pop();
        modes.pop();
        i++;
        continue;
      }
    }

    if (!/\s/.test(ch)) {
      lastSignificant = ch;
      lastSignificantEnd = i + 1;
    }
    i++;
  }

  return out.join('');
}

const OPENERS: Record<string, string> = { '{': '}', '[': ']', '(': ')' };
const CLOSERS = new Set(['}', ']', ')']);

/**
 * Index just past the bracket that closes the one at `start`, or -1 when the
 * source ends first. Expects masked source.
 */
export function findClosing(masked: string, start: number): number {
  let depth = 0;
  for (let i = start; i < masked.length; i++) {
    const ch = masked.charAt(i);
    if (ch in OPENERS) depth++;
    else if (CLOSERS.has(ch)) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

export interface PropertySlice {
  /** Property name, or null for a spread element */
  key: string | null;
  /** Value offsets into the source; null for shorthand and spreads */
  valueStart: number | null;
  valueEnd: number | null;
}

/**
 * Splits the top level of an object literal spanning [start, end) into its
 * properties. Quoted and computed keys are skipped.
 */
export function objectProperties(masked: string, start: number, end: number): PropertySlice[] {
  const segments: Array<[number, number]> = [];
  let depth = 0;
  let segmentStart = start + 1;
  for (let i = start + 1; i < end - 1; i++) {
    const ch = masked.charAt(i);
    if (ch in OPENERS) depth++;
    else if (CLOSERS.has(ch)) depth--;
    else if (ch === ',' && depth === 0) {
      segments.push([segmentStart, i]);
      segmentStart = i + 1;
    }
  }
  segments.push([segmentStart, end - 1]);

  const properties: PropertySlice[] = [];
  for (const [from, to] of segments) {
    const text = masked.slice(from, to);
    const leading = text.length - text.trimStart().length;
    const trimmed = text.trim();
    if (trimmed.length === 0) continue;

    if (trimmed.startsWith('...')) {
      properties.push({ key: null, valueStart: null, valueEnd: null });
      continue;
    }

    const keyed = /^([A-Za-z_$][\w$]*)\s*:\s*/.exec(trimmed);
    if (keyed?.[1]) {
      properties.push({
        key: keyed[1],
        valueStart: from + leading + keyed[0].length,
        valueEnd: from + leading + trimmed.length,
      });
      continue;
    }

    const shorthand = /^([A-Za-z_$][\w$]*)$/.exec(trimmed);
    if (shorthand?.[1]) {
      properties.push({ key: shorthand[1], valueStart: null, valueEnd: null });
    }
  }
  return properties;
}

export function lineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source.charAt(i) === '\n') starts.push(i + 1);
  }
  return starts;
}

/** 1-based line and column of `offset`. */
export function position(starts: number[], offset: number): { line: number; column: number } {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if ((starts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - (starts[lo] ?? 0) + 1 };
}
