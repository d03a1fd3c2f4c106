import { MessageFlags } from 'discord.js';
import type { HeraldConfig, LintIssue, RuleId } from '@herald/shared';
import {
  findClosing,
  lineStarts,
  maskSource,
  objectProperties,
  position,
  type PropertySlice,
} from './source.lexer.js';

export type ScanConfig = Pick<HeraldConfig, 'lint'>;

type FlagVerdict = 'present' | 'absent' | 'unknown';

const FLAG_TOKEN = /MessageFlags\.(\w+)|(\d+)|['"`](\w+)['"`]|([A-Za-z_$][\w$.]*)/g;

/**
 * Decides whether a `flags` value expression sets IsComponentsV2. Expressions
 * built only from MessageFlags members, flag names and numbers can be decided;
 * anything referencing other identifiers is left to the caller's trust.
 */
function componentsV2Flag(expression: string): FlagVerdict {
  let present = false;
  for (const match of expression.matchAll(FLAG_TOKEN)) {
    const [, member, digits, quoted, other] = match;
    if (other !== undefined) return 'unknown';
    const name = member ?? quoted;
    if (name === 'IsComponentsV2') present = true;
    if (digits !== undefined && (Number(digits) & MessageFlags.IsComponentsV2) !== 0) present = true;
  }
  return present ? 'present' : 'absent';
}

interface CallSite {
  method: string;
  offset: number;
}

class SourceIssues {
  readonly issues: LintIssue[] = [];
  private readonly starts: number[];

  constructor(
    source: string,
    private readonly file: string,
    private readonly rules: HeraldConfig['lint']['rules'],
  ) {
    this.starts = lineStarts(source);
  }

  add(rule: RuleId, call: CallSite, message: string): void {
    const severity = this.rules[rule];
    if (severity === 'off') return;
    const { line, column } = position(this.starts, call.offset);
    this.issues.push({ rule, severity, message: `${call.method}() ${message}`, file: this.file, line, column });
  }
}

function checkObjectArgument(
  source: string,
  properties: PropertySlice[],
  call: CallSite,
  out: SourceIssues,
): void {
  // A spread hands the payload to code we cannot see here
  if (properties.some((p) => p.key === null)) return;

  const byKey = new Map(properties.map((p) => [p.key, p]));
  const valueOf = (key: string): string | null => {
    const prop = byKey.get(key);
    if (!prop || prop.valueStart === null || prop.valueEnd === null) return null;
    return source.slice(prop.valueStart, prop.valueEnd).trim();
  };

  const flags = byKey.get('flags');
  const flagsValue = valueOf('flags');
  let v2: FlagVerdict = 'absent';
  if (flags) v2 = flagsValue === null ? 'unknown' : componentsV2Flag(flagsValue);
  if (v2 === 'absent') {
    out.add('components-v2-flag', call, 'does not set MessageFlags.IsComponentsV2');
  }

  if (!byKey.has('components')) {
    out.add('structured-container', call, 'sends no components; compose a container');
  }
  if (byKey.has('content')) {
    out.add('structured-container', call, 'sets content; put the text in a container instead');
  }

  if (!byKey.has('allowedMentions')) {
    out.add('suppress-mentions', call, 'does not set allowedMentions: { parse: [] }');
  } else {
    const mentions = valueOf('allowedMentions');
    if (mentions !== null && /\bparse\s*:\s*\[\s*[^\]\s]/.test(mentions)) {
      out.add('suppress-mentions', call, 'sets a non-empty allowedMentions.parse');
    }
  }

  const embeds = valueOf('embeds');
  if (byKey.has('embeds') && (embeds === null || !/^\[\s*\]$/.test(embeds))) {
    out.add('no-legacy-embeds', call, 'sets embeds; Components V2 messages cannot carry them');
  }

  if (valueOf('ephemeral') === 'true') {
    out.add('legacy-ephemeral', call, 'uses ephemeral: true; add MessageFlags.Ephemeral to flags');
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds message-sending calls in one source file and checks the payload
 * literals passed to them. Calls whose argument is a variable or a call
 * expression are not checked.
 */
export function scanSource(source: string, file: string, config: ScanConfig): LintIssue[] {
  const masked = maskSource(source);
  const out = new SourceIssues(source, file, config.lint.rules);
  const methods = config.lint.methods.map(escapeRegExp).join('|');
  const callPattern = new RegExp(`\\.(${methods})\\s*\\(\\s*`, 'g');

  for (const match of masked.matchAll(callPattern)) {
    const method = match[1];
    if (method === undefined || match.index === undefined) continue;
    const call: CallSite = { method, offset: match.index + 1 };
    const argStart = match.index + match[0].length;
    const first = masked.charAt(argStart);

    if (first === "'" || first === '"' || first === '`') {
      out.add('structured-container', call, 'sends plain text; compose a container');
      out.add('components-v2-flag', call, 'does not set MessageFlags.IsComponentsV2');
      out.add('suppress-mentions', call, 'does not set allowedMentions: { parse: [] }');
      continue;
    }

    if (first === '{') {
      const end = findClosing(masked, argStart);
      if (end === -1) continue;
      checkObjectArgument(source, objectProperties(masked, argStart, end), call, out);
    }
  }

  return out.issues;
}
