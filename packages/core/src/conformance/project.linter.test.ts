import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { MAX_FILE_SIZE, issueLocation, lintProject, summarize } from './project.linter.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'herald-lint-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeFile(relativePath: string, content: string): Promise<void> {
  const full = path.join(tmpDir, relativePath);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, content, 'utf-8');
}

describe('lintProject', () => {
  it('returns an empty report for a clean project', async () => {
    await writeFile('src/index.ts', 'export const x = 1;\n');
    const report = await lintProject(tmpDir, DEFAULT_CONFIG);
    expect(report).toEqual({ files: 1, issues: [], errorCount: 0, warningCount: 0 });
  });

  it('collects issues across files, sorted by path', async () => {
    await writeFile('src/b.ts', "i.reply('b');\n");
    await writeFile('src/a.js', "\n\nchannel.send('a');\n");
    const report = await lintProject(tmpDir, DEFAULT_CONFIG);

    expect(report.files).toBe(2);
    expect(report.errorCount).toBe(6);
    expect(report.issues.map((i) => `${i.file}:${i.line}`)).toEqual([
      'src/a.js:3',
      'src/a.js:3',
      'src/a.js:3',
      'src/b.ts:1',
      'src/b.ts:1',
      'src/b.ts:1',
    ]);
  });

  it('skips ignored directories, declaration files and other extensions', async () => {
    await writeFile('node_modules/pkg/index.js', "i.reply('x');\n");
    await writeFile('dist/index.js', "i.reply('x');\n");
    await writeFile('src/types.d.ts', "declare const x: string;\n");
    await writeFile('README.md', "i.reply('x');\n");
    const report = await lintProject(tmpDir, DEFAULT_CONFIG);
    expect(report.files).toBe(0);
    expect(report.issues).toEqual([]);
  });

  it('skips files larger than the size limit', async () => {
    await writeFile('src/ok.ts', 'export const x = 1;\n');
    await writeFile('src/bundle.js', "i.reply('x');\n" + '// padding\n'.repeat(MAX_FILE_SIZE / 10));
    const report = await lintProject(tmpDir, DEFAULT_CONFIG);
    expect(report).toEqual({ files: 1, issues: [], errorCount: 0, warningCount: 0 });
  });

  it('throws when the root is not a directory', async () => {
    await expect(lintProject(path.join(tmpDir, 'missing'), DEFAULT_CONFIG)).rejects.toThrow(
      'is not a directory',
    );
  });
});

describe('issueLocation', () => {
  it('locates source issues by file, line and column', () => {
    expect(
      issueLocation({
        rule: 'legacy-ephemeral',
        severity: 'error',
        message: 'reply() uses ephemeral: true; add MessageFlags.Ephemeral to flags',
        file: 'src/a.ts',
        line: 4,
        column: 9,
      }),
    ).toBe('src/a.ts:4:9');
  });

  it('locates payload issues by index', () => {
    expect(issueLocation({ rule: 'category-style', severity: 'warn', message: 'm', index: 2 })).toBe('#2');
  });
});

describe('summarize', () => {
  it('counts errors and warnings', () => {
    const report = summarize(3, [
      { rule: 'category-style', severity: 'warn', message: 'a' },
      { rule: 'components-v2-flag', severity: 'error', message: 'b' },
    ]);
    expect(report.errorCount).toBe(1);
    expect(report.warningCount).toBe(1);
    expect(report.files).toBe(3);
  });
});
