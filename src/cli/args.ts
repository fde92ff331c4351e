import { Command, CommanderError } from 'commander';
import { matchAlias } from '../download/core/SourceRouter';
import { ALL_SOURCES, SourceId } from '../download/core/types';

export const USAGE = `Usage:
  multisource-downloader batch <manifest> [--format json|csv] [--out-dir DIR]
                               [--limit N] [--per-source-limit N] [--dry-run] [--verbose]
  multisource-downloader auth <source> [--verbose]

Sources: ${ALL_SOURCES.join(', ')}`;

export interface BatchCommand {
  command: 'batch';
  manifest: string;
  format?: string;
  outDir?: string;
  limit?: number;
  perSourceLimit?: number;
  dryRun: boolean;
  verbose: boolean;
}

export interface AuthCommand {
  command: 'auth';
  source: SourceId;
  verbose: boolean;
}

export interface HelpCommand {
  command: 'help';
}

export type CliCommand = BatchCommand | AuthCommand | HelpCommand;

interface BatchOptions {
  format?: string;
  outDir?: string;
  limit?: number;
  perSourceLimit?: number;
  dryRun?: boolean;
  verbose?: boolean;
}

interface AuthOptions {
  verbose?: boolean;
}

const HELP_CODES = new Set(['commander.help', 'commander.helpDisplayed']);

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function limitParser(name: string): (raw: string) => number {
  return (raw) => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
      throw new CliUsageError(`--${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
  };
}

function parseFormat(raw: string): string {
  const format = raw.toLowerCase();
  if (format !== 'json' && format !== 'csv') {
    throw new CliUsageError(`--format must be json or csv, got "${raw}"`);
  }
  return format;
}

/**
 * Source named on the command line: a canonical name in any case, or
 * anything the alias table recognizes (a host, "x.com", ...)
 */
export function resolveSourceArgument(value: string): SourceId {
  const lowered = value.toLowerCase();
  const exact = ALL_SOURCES.find((sourceId) => sourceId.toLowerCase() === lowered);
  const sourceId = exact ?? matchAlias(value);
  if (!sourceId) {
    throw new CliUsageError(`Unknown source "${value}". Expected one of: ${ALL_SOURCES.join(', ')}`);
  }
  return sourceId;
}

/**
 * Commander program whose actions hand the parsed command to `onCommand`.
 * Nothing is printed and nothing exits: failures surface as CommanderError.
 */
function buildProgram(onCommand: (command: CliCommand) => void): Command {
  const program = new Command();

  program
    .name('multisource-downloader')
    .description('Download media from several platforms in one batch')
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
      outputError: () => undefined,
    });

  program
    .command('batch')
    .description('Download every item listed in a manifest')
    .argument('[manifest]', 'JSON or CSV manifest of links')
    .option('--format <format>', 'manifest format (json or csv)', parseFormat)
    .option('--out-dir <dir>', 'directory downloads are written to')
    .option('--limit <n>', 'most items admitted in total', limitParser('limit'))
    .option('--per-source-limit <n>', 'most items admitted per source', limitParser('per-source-limit'))
    .option('--dry-run', 'route and admit items without downloading', false)
    .option('-v, --verbose', 'debug logging and backend output', false)
    .allowExcessArguments(false)
    .action((manifest: string | undefined, options: BatchOptions) => {
      if (!manifest) {
        throw new CliUsageError('batch requires a manifest path');
      }
      onCommand({
        command: 'batch',
        manifest,
        format: options.format,
        outDir: options.outDir,
        limit: options.limit,
        perSourceLimit: options.perSourceLimit,
        dryRun: options.dryRun === true,
        verbose: options.verbose === true,
      });
    });

  program
    .command('auth')
    .description('Log in to a source and keep the session')
    .argument('[source]', 'source name or alias')
    .option('-v, --verbose', 'debug logging', false)
    .allowExcessArguments(false)
    .action((source: string | undefined, options: AuthOptions) => {
      if (!source) {
        throw new CliUsageError('auth requires a source name');
      }
      onCommand({ command: 'auth', source: resolveSourceArgument(source), verbose: options.verbose === true });
    });

  return program;
}

export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: CliCommand = { command: 'help' };
  const program = buildProgram((command) => {
    parsed = command;
  });

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (HELP_CODES.has(error.code)) {
        return { command: 'help' };
      }
      throw new CliUsageError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }
  return parsed;
}
