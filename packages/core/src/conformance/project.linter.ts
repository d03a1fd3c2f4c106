import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { HeraldConfig, LintIssue, LintReport } from '@herald/shared';
import { scanSource } from './source.scanner.js';

export const MAX_FILE_SIZE = 500_000; // 500 KB

async function collectFiles(
  dir: string,
  config: HeraldConfig['lint'],
  results: string[],
): Promise<void> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (config.ignoreDirs.includes(entry.name)) continue;
      await collectFiles(fullPath, config, results);
    } else if (entry.isFile()) {
      if (entry.name.endsWith('.d.ts')) continue;
      if (!config.extensions.includes(path.extname(entry.name))) continue;
      results.push(fullPath);
    }
  }
}

function compareIssues(a: LintIssue, b: LintIssue): number {
  return (
    (a.file ?? '').localeCompare(b.file ?? '') ||
    (a.line ?? 0) - (b.line ?? 0) ||
    (a.column ?? 0) - (b.column ?? 0)
  );
}

export function summarize(files: number, issues: LintIssue[]): LintReport {
  return {
    files,
    issues,
    errorCount: issues.filter((i) => i.severity === 'error').length,
    warningCount: issues.filter((i) => i.severity === 'warn').length,
  };
}

/**
 * Scans every matching source file under `root` for message-sending calls
 * that break the Components V2 message convention.
 */
export async function lintProject(root: string, config: Pick<HeraldConfig, 'lint'>): Promise<LintReport> {
  const stat = await fs.stat(root).catch(() => null);
  if (!stat?.isDirectory()) {
    throw new Error(`"${root}" is not a directory`);
  }

  const files: string[] = [];
  await collectFiles(root, config.lint, files);
  files.sort();

  const issues: LintIssue[] = [];
  let scanned = 0;
  for (const file of files) {
    const fileStat = await fs.stat(file);
    if (fileStat.size > MAX_FILE_SIZE) continue;
    const source = await fs.readFile(file, 'utf-8');
    const relPath = path.relative(root, file).split(path.sep).join('/');
    issues.push(...scanSource(source, relPath, config));
    scanned++;
  }

  issues.sort(compareIssues);
  return summarize(scanned, issues);
}

/** `file:line:col` for source issues, `#index` for recorded payloads. */
export function issueLocation(issue: LintIssue): string {
  if (issue.file !== undefined) return `${issue.file}:${issue.line ?? 0}:${issue.column ?? 0}`;
  if (issue.index !== undefined) return `#${issue.index}`;
  return '-';
}
