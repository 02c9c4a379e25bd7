/**
 * CLI argument parsing and command routing
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { syncCommand, type SyncOptions } from './commands/sync.js';

export const VERSION = '0.1.0';

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'sync'; options: SyncOptions }
  | { kind: 'error'; message: string };

/**
 * Turn argv into a command. Pure, so it can be tested without running anything.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const options: SyncOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--no-clone':
        options.clone = false;
        break;
      case '-p':
      case '--pull':
        options.pull = true;
        break;
      case '-f':
      case '--force':
        options.overwrite = true;
        break;
      case '-d':
      case '--discard':
      case '-fp':
      case '--force-pull':
        options.pull = true;
        options.discardChanges = true;
        break;
      case '-n':
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      case '-t':
      case '--tab-width': {
        const value = args[++i];
        const width = Number(value);
        if (value === undefined || !Number.isInteger(width) || width < 1) {
          return { kind: 'error', message: `Invalid tab width: ${value ?? '(missing)'}` };
        }
        options.tabWidth = width;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          return { kind: 'error', message: `Unknown option: ${arg}` };
        }
        if (options.settingsFile) {
          return { kind: 'error', message: `Unexpected argument: ${arg}` };
        }
        options.settingsFile = arg;
    }
  }

  return { kind: 'sync', options };
}

export async function runCLI(args: string[]): Promise<void> {
  const parsed = parseArgs(args);

  switch (parsed.kind) {
    case 'help':
      showHelp();
      return;

    case 'version':
      showVersion();
      return;

    case 'error':
      clack.log.error(parsed.message);
      showHelp();
      process.exit(1);

    case 'sync':
      try {
        await syncCommand(parsed.options);
      } catch (error) {
        clack.log.error(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
  }
}

function showVersion(): void {
  console.log(`repotree v${VERSION}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('repotree')} - Create a directory tree of git repositories from a settings file

${pc.bold('Usage:')}
  repotree [settings-file] [options]

${pc.bold('Arguments:')}
  settings-file          Indented list of directories and git URLs (default: settings.txt)

${pc.bold('Options:')}
  --no-clone             Skip cloning missing repositories
  -p, --pull             Pull the latest changes after cloning
  -f, --force            Replace directories that are not a clone of the listed URL
  -d, --discard          Discard local changes before pulling (implies --pull)
  -fp, --force-pull      Same as --discard
  -n, --dry-run          Show the parsed tree and planned actions without changing anything
  -t, --tab-width <n>    Columns a tab counts for when measuring indentation (default: 4)
  --strict               Reject dedents that do not line up with an enclosing level
  -h, --help             Show help
  -v, --version          Show version

${pc.bold('Settings file:')}
  ~/src
      tools
          git@github.com:acme/build-scripts.git
      https://git.example.com/acme/website.git

${pc.bold('Examples:')}
  repotree                          # Clone everything listed in settings.txt
  repotree workspace.txt --pull     # Clone, then pull every repository
  repotree --dry-run                # Preview the tree
  repotree -fp                      # Drop local changes and pull

${pc.dim('Defaults can be set in')} ${pc.cyan('.repotree.json')} ${pc.dim('(settingsFile, tabWidth, indentMode).')}
`);
}
