import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import type { AccentTone, EnforceMode, HeraldConfig, LogLevel } from '@herald/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { formatColor } from '../styles/category.styles.js';
import { RULE_IDS, isRuleId, isRuleSeverity } from '../conformance/rules.js';

const CONFIG_FILENAME = 'herald.config.yaml';

const TONES: readonly AccentTone[] = ['error', 'success', 'warning', 'primary'];
const ENFORCE_MODES: readonly EnforceMode[] = ['throw', 'warn', 'off'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function configPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_FILENAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: object, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, overrideVal] of Object.entries(override)) {
    const baseVal = result[key];
    if (isRecord(overrideVal) && isRecord(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined && overrideVal !== null) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function fail(message: string): never {
  throw new Error(`Config validation failed: ${message}`);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isRecord(value)) fail(`${key} must be a mapping`);
  return value;
}

function oneOf<T extends string>(values: readonly T[], value: unknown, key: string): T {
  const match = values.find((v) => v === value);
  if (match === undefined) fail(`${key} must be one of ${values.join(', ')}`);
  return match;
}

function stringList(value: unknown, key: string): string[] {
  if (!Array.isArray(value)) fail(`${key} must be a list of strings`);
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || item.length === 0) fail(`${key} must be a list of strings`);
    result.push(item);
  }
  return result;
}

/**
 * Accepts an integer in the 24-bit RGB range or a `#RRGGBB` string.
 */
export function parseColor(value: unknown, key: string): number {
  if (typeof value === 'string') {
    const match = /^#?([0-9a-f]{6})$/i.exec(value.trim());
    if (!match?.[1]) fail(`${key} must be a color like "#5865F2"`);
    return parseInt(match[1], 16);
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 0xffffff) {
    fail(`${key} must be a color between 0x000000 and 0xFFFFFF`);
  }
  return value;
}

export function validateConfig(raw: Record<string, unknown>): HeraldConfig {
  const paletteRaw = section(raw, 'palette');
  const headingRaw = section(raw, 'heading');
  const deliveryRaw = section(raw, 'delivery');
  const lintRaw = section(raw, 'lint');
  const logsRaw = section(raw, 'logs');

  const palette = { ...DEFAULT_CONFIG.palette };
  for (const tone of TONES) {
    palette[tone] = parseColor(paletteRaw[tone], `palette.${tone}`);
  }
  for (const key of Object.keys(paletteRaw)) {
    oneOf(TONES, key, `palette key "${key}"`);
  }

  const level = headingRaw['level'];
  if (typeof level !== 'number' || !Number.isInteger(level) || level < 1 || level > 3) {
    fail('heading.level must be 1, 2 or 3');
  }

  const extensions = stringList(lintRaw['extensions'], 'lint.extensions');
  if (extensions.some((ext) => !ext.startsWith('.'))) {
    fail('lint.extensions entries must start with "."');
  }
  const methods = stringList(lintRaw['methods'], 'lint.methods');
  if (methods.length === 0 || methods.some((m) => !IDENTIFIER.test(m))) {
    fail('lint.methods must be a non-empty list of method names');
  }

  const rulesRaw = section(lintRaw, 'rules');
  const rules = { ...DEFAULT_CONFIG.lint.rules };
  for (const [id, severity] of Object.entries(rulesRaw)) {
    if (!isRuleId(id)) fail(`unknown rule "${id}" in lint.rules`);
    if (!isRuleSeverity(severity)) fail(`lint.rules.${id} must be one of error, warn, off`);
    rules[id] = severity;
  }

  return {
    palette,
    heading: { level },
    delivery: { enforce: oneOf(ENFORCE_MODES, deliveryRaw['enforce'], 'delivery.enforce') },
    lint: {
      extensions,
      ignoreDirs: stringList(lintRaw['ignoreDirs'], 'lint.ignoreDirs'),
      methods,
      rules,
    },
    logs: { level: oneOf(LOG_LEVELS, logsRaw['level'], 'logs.level') },
  };
}

export function writeConfig(projectRoot: string, config: HeraldConfig): void {
  validateConfig({ ...config });
  const document = {
    ...config,
    palette: Object.fromEntries(TONES.map((tone) => [tone, formatColor(config.palette[tone])])),
    lint: { ...config.lint, rules: Object.fromEntries(RULE_IDS.map((id) => [id, config.lint.rules[id]])) },
  };
  fs.writeFileSync(configPath(projectRoot), yaml.dump(document), 'utf8');
}

// An unquoted `#RRGGBB` starts a YAML comment and leaves the key null
function rejectEmptyColors(userConfig: Record<string, unknown>): void {
  const palette = userConfig['palette'];
  if (!isRecord(palette)) return;
  for (const [key, value] of Object.entries(palette)) {
    if (value === null) fail(`palette.${key} is empty; quote hex colors, e.g. "#5865F2"`);
  }
}

export async function loadConfig(projectRoot: string): Promise<HeraldConfig> {
  let userConfig: Record<string, unknown> = {};

  const file = configPath(projectRoot);
  if (fs.existsSync(file)) {
    const parsed = yaml.load(fs.readFileSync(file, 'utf8'));
    if (isRecord(parsed)) {
      userConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      fail(`${CONFIG_FILENAME} must contain a mapping`);
    }
  }

  rejectEmptyColors(userConfig);
  return validateConfig(deepMerge(DEFAULT_CONFIG, userConfig));
}

export { CONFIG_FILENAME };
