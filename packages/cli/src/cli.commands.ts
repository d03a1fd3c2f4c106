// ---------------------------------------------------------------------------
// Command registry
// ---------------------------------------------------------------------------

export const CLI_COMMANDS: Record<string, string> = {
  'lint [dir]': 'Scan source files for messages that break the convention',
  'check <file.json>': 'Check recorded message payloads (one object or an array)',
  palette: 'Show message categories with their accent colors and symbols',
  init: 'Write a default herald.config.yaml into the current directory',
  help: 'Show this help',
};

export type CliCommand =
  | { name: 'lint'; dir: string }
  | { name: 'check'; file: string }
  | { name: 'palette' }
  | { name: 'init' }
  | { name: 'help' }
  | { name: 'unknown'; input: string };

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/**
 * Parse `process.argv.slice(2)`. A missing command means `help`; a missing
 * required argument is reported as `unknown` so the caller prints usage.
 */
export function parseArgs(args: string[]): CliCommand {
  const [command = 'help', first] = args;

  switch (command.toLowerCase()) {
    case 'lint':
      return { name: 'lint', dir: first ?? '.' };

    case 'check':
      return first ? { name: 'check', file: first } : { name: 'unknown', input: 'check' };

    case 'palette':
      return { name: 'palette' };

    case 'init':
      return { name: 'init' };

    case 'help':
    case '--help':
    case '-h':
      return { name: 'help' };

    default:
      return { name: 'unknown', input: args.join(' ') };
  }
}

export function formatHelp(): string {
  const lines = ['Usage: herald <command>', '', 'Commands:'];
  for (const [cmd, desc] of Object.entries(CLI_COMMANDS)) {
    lines.push(`  ${cmd.padEnd(18)} ${desc}`);
  }
  return lines.join('\n');
}
