import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, writeConfig, configPath, parseColor } from './config.loader.js';
import { DEFAULT_CONFIG } from './config.defaults.js';

let tmpDir: string;

describe('config.loader', () => {
  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'herald-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults when config file is missing', async () => {
    const config = await loadConfig(tmpDir);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('does not create a config file on load', async () => {
    await loadConfig(tmpDir);
    expect(fs.existsSync(configPath(tmpDir))).toBe(false);
  });

  it('loads user overrides and merges with defaults', async () => {
    fs.writeFileSync(
      configPath(tmpDir),
      `
palette:
  error: "#FF0000"
  primary: 0x123456
heading:
  level: 2
lint:
  rules:
    category-style: error
    legacy-ephemeral: off
`,
    );

    const config = await loadConfig(tmpDir);
    expect(config.palette.error).toBe(0xff0000);
    expect(config.palette.primary).toBe(0x123456);
    expect(config.palette.success).toBe(DEFAULT_CONFIG.palette.success);
    expect(config.heading.level).toBe(2);
    expect(config.lint.rules['category-style']).toBe('error');
    expect(config.lint.rules['legacy-ephemeral']).toBe('off');
    expect(config.lint.rules['suppress-mentions']).toBe('error');
    expect(config.lint.extensions).toEqual(DEFAULT_CONFIG.lint.extensions);
  });

  it('replaces lists instead of merging them', async () => {
    fs.writeFileSync(configPath(tmpDir), `lint:\n  methods: [reply]\n`);
    const config = await loadConfig(tmpDir);
    expect(config.lint.methods).toEqual(['reply']);
  });

  it('handles an empty config file by using defaults', async () => {
    fs.writeFileSync(configPath(tmpDir), '');
    const config = await loadConfig(tmpDir);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('throws when the file is not a mapping', async () => {
    fs.writeFileSync(configPath(tmpDir), '- a\n- b\n');
    await expect(loadConfig(tmpDir)).rejects.toThrow('must contain a mapping');
  });

  it('throws on an out-of-range heading level', async () => {
    fs.writeFileSync(configPath(tmpDir), `heading:\n  level: 4\n`);
    await expect(loadConfig(tmpDir)).rejects.toThrow('heading.level');
  });

  it('throws on an unknown rule', async () => {
    fs.writeFileSync(configPath(tmpDir), `lint:\n  rules:\n    no-such-rule: warn\n`);
    await expect(loadConfig(tmpDir)).rejects.toThrow('unknown rule "no-such-rule"');
  });

  it('throws on an unknown palette tone', async () => {
    fs.writeFileSync(configPath(tmpDir), `palette:\n  danger: "#FF0000"\n`);
    await expect(loadConfig(tmpDir)).rejects.toThrow('palette key "danger"');
  });

  it('rejects an unquoted hex color that YAML reads as a comment', async () => {
    fs.writeFileSync(configPath(tmpDir), `palette:\n  primary: #5865F2\n`);
    await expect(loadConfig(tmpDir)).rejects.toThrow(
      'Config validation failed: palette.primary is empty; quote hex colors, e.g. "#5865F2"',
    );
  });

  it('throws on an invalid enforce mode', async () => {
    fs.writeFileSync(configPath(tmpDir), `delivery:\n  enforce: maybe\n`);
    await expect(loadConfig(tmpDir)).rejects.toThrow('delivery.enforce must be one of throw, warn, off');
  });

  it('round-trips through writeConfig with hex palette values', async () => {
    writeConfig(tmpDir, { ...DEFAULT_CONFIG, heading: { level: 1 } });
    const raw = fs.readFileSync(configPath(tmpDir), 'utf8');
    expect(raw).toContain("error: '#ED4245'");

    const config = await loadConfig(tmpDir);
    expect(config).toEqual({ ...DEFAULT_CONFIG, heading: { level: 1 } });
  });
});

describe('parseColor', () => {
  it('accepts hex strings with or without the hash', () => {
    expect(parseColor('#5865F2', 'c')).toBe(0x5865f2);
    expect(parseColor('57f287', 'c')).toBe(0x57f287);
  });

  it('rejects values outside the RGB range', () => {
    expect(() => parseColor(0x1000000, 'palette.error')).toThrow('palette.error');
    expect(() => parseColor('#12345', 'palette.error')).toThrow('palette.error');
    expect(() => parseColor(1.5, 'palette.error')).toThrow('palette.error');
  });
});
