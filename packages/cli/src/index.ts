#!/usr/bin/env node
/**
 * herald: checks Discord bot messages against the Components V2 message
 * convention.
 *
 *   herald lint [dir]         scan source files
 *   herald check <file.json>  check recorded payloads
 *   herald palette            show the category table
 *   herald init               write herald.config.yaml
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import React from 'react';
import { render } from 'ink';
import {
  DEFAULT_CONFIG,
  checkPayloads,
  configPath,
  loadConfig,
  lintProject,
  summarize,
  writeConfig,
} from '@herald/core';
import { formatHelp, parseArgs } from './cli.commands.js';
import { LintReport } from './components/LintReport.js';
import { PaletteTable } from './components/PaletteTable.js';

/** Render one frame and let ink flush it to stdout. */
async function renderOnce(element: React.ReactElement): Promise<void> {
  const instance = render(element);
  instance.unmount();
  await instance.waitUntilExit();
}

async function readPayloads(file: string): Promise<unknown[]> {
  const raw = await fs.readFile(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2));
  const projectRoot = process.cwd();

  switch (command.name) {
    case 'help':
      process.stdout.write(formatHelp() + '\n');
      return 0;

    case 'unknown':
      process.stderr.write(`Unknown command: ${command.input}\n\n${formatHelp()}\n`);
      return 2;

    case 'init': {
      const file = configPath(projectRoot);
      try {
        await fs.access(file);
        process.stderr.write(`${file} already exists\n`);
        return 1;
      } catch {
        writeConfig(projectRoot, DEFAULT_CONFIG);
        process.stdout.write(`Created ${file}\n`);
        return 0;
      }
    }

    case 'palette': {
      const config = await loadConfig(projectRoot);
      await renderOnce(React.createElement(PaletteTable, { config }));
      return 0;
    }

    case 'lint': {
      const config = await loadConfig(projectRoot);
      const report = await lintProject(path.resolve(projectRoot, command.dir), config);
      await renderOnce(React.createElement(LintReport, { title: 'lint', report, unit: 'files' }));
      return report.errorCount > 0 ? 1 : 0;
    }

    case 'check': {
      const config = await loadConfig(projectRoot);
      const payloads = await readPayloads(path.resolve(projectRoot, command.file));
      const report = summarize(payloads.length, checkPayloads(payloads, config));
      await renderOnce(React.createElement(LintReport, { title: 'check', report, unit: 'payloads' }));
      return report.errorCount > 0 ? 1 : 0;
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
    process.exit(1);
  });
