#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { logger, logError, toError } from './utils/logger';
import { SessionStore, seedCookiesFromEnv } from './utils/SessionStore';
import { ALL_SOURCES, HandlerRegistry, createDefaultHandlers } from './download';
import { CliCommand, CliUsageError, USAGE, parseCliArgs } from './cli/args';
import { runAuthCommand, runBatchCommand } from './cli/commands';
import { TerminalAuthInteraction } from './cli/TerminalAuthInteraction';
import { AppConfig } from './types';

export * from './download';
export { loadManifest, parseManifest } from './manifest/ManifestLoader';
export type { ManifestFormat } from './manifest/ManifestLoader';
export { SessionStore } from './utils/SessionStore';

function initializeSentry(dsn: string): void {
  Sentry.init({
    dsn,
    tracesSampleRate: 1.0,
  });
}

function createRegistry(config: AppConfig, store: SessionStore): HandlerRegistry {
  return new HandlerRegistry(
    createDefaultHandlers({
      store,
      retry: config.retry,
      timeoutMs: config.downloadTimeout,
      ytDlpPath: config.tools.ytDlp,
      instaloaderPath: config.tools.instaloader,
      gdownPath: config.tools.gdown,
      youtubePotServer: config.youtubePotServer,
    }),
  );
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (command.command === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = loadConfig();
  if (config.sentryDsn) {
    initializeSentry(config.sentryDsn);
  }
  logger.level = command.verbose ? 'debug' : config.logLevel;

  const store = new SessionStore(config.sessionRoot);
  await seedCookiesFromEnv(store, ALL_SOURCES);
  const registry = createRegistry(config, store);

  logger.info('Configuration loaded', {
    sessionRoot: store.getRoot(),
    retryAttempts: config.retry.attempts,
    downloadTimeout: config.downloadTimeout,
  });

  if (command.command === 'batch') {
    return runBatchCommand(command, registry, config.outputDir);
  }

  return runAuthCommand(command, registry, new TerminalAuthInteraction(command.source));
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logError(toError(error), { phase: 'startup' });
      process.exitCode = 1;
    },
  );
}
