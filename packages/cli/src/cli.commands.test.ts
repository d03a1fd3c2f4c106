import { describe, it, expect } from 'vitest';
import { formatHelp, parseArgs } from './cli.commands.js';

describe('parseArgs', () => {
  it('defaults to help', () => {
    expect(parseArgs([])).toEqual({ name: 'help' });
    expect(parseArgs(['--help'])).toEqual({ name: 'help' });
  });

  it('lints the current directory unless one is given', () => {
    expect(parseArgs(['lint'])).toEqual({ name: 'lint', dir: '.' });
    expect(parseArgs(['lint', 'src'])).toEqual({ name: 'lint', dir: 'src' });
  });

  it('requires a file for check', () => {
    expect(parseArgs(['check', 'payloads.json'])).toEqual({ name: 'check', file: 'payloads.json' });
    expect(parseArgs(['check'])).toEqual({ name: 'unknown', input: 'check' });
  });

  it('is case-insensitive on the command name', () => {
    expect(parseArgs(['PALETTE'])).toEqual({ name: 'palette' });
  });

  it('reports unknown commands with their input', () => {
    expect(parseArgs(['deploy', 'now'])).toEqual({ name: 'unknown', input: 'deploy now' });
  });
});

describe('formatHelp', () => {
  it('lists every command with padded names', () => {
    const lines = formatHelp().split('\n');
    expect(lines[0]).toBe('Usage: herald <command>');
    expect(lines).toContain('  palette            Show message categories with their accent colors and symbols');
    expect(lines).toHaveLength(3 + 5);
  });
});
