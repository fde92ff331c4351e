import path from 'path';
import { logOperation, logger } from '../utils/logger';
import { loadManifest } from '../manifest/ManifestLoader';
import { BatchDispatcher, isBatchSuccessful } from '../download/core/BatchDispatcher';
import { HandlerRegistry } from '../download/core/HandlerRegistry';
import { AuthInteraction, BatchEvent, BatchResult, SourceId } from '../download/core/types';
import { AuthCommand, BatchCommand } from './args';

export function formatSummary(result: BatchResult): string {
  return `Attempted: ${result.attempted}, completed: ${result.completed.length}, skipped: ${result.skipped.length}, errors: ${result.errors.length}`;
}

/**
 * Sources whose failures asked for a login, in order of first appearance
 */
export function sourcesNeedingAuth(result: BatchResult): SourceId[] {
  const sources: SourceId[] = [];
  for (const entry of result.errors) {
    if (entry.kind === 'auth_required' && !sources.includes(entry.sourceId)) {
      sources.push(entry.sourceId);
    }
  }
  return sources;
}

export async function runBatchCommand(
  command: BatchCommand,
  registry: HandlerRegistry,
  defaultOutDir: string,
): Promise<number> {
  const items = await loadManifest(command.manifest, command.format);
  const destination = path.resolve(command.outDir ?? defaultOutDir);

  const dispatcher = new BatchDispatcher(registry);
  dispatcher.on('item:skipped', (event: BatchEvent) => {
    logger.info(`Skipped ${event.url}`, { reason: event.data?.reason });
  });

  const result = await dispatcher.execute(items, destination, {
    globalLimit: command.limit,
    perSourceLimit: command.perSourceLimit,
    dryRun: command.dryRun,
  });

  logOperation(formatSummary(result), { destination, dryRun: command.dryRun });

  if (isBatchSuccessful(result)) {
    return 0;
  }

  logger.error('Some downloads failed. See log for details.');
  for (const sourceId of sourcesNeedingAuth(result)) {
    logger.error(`${sourceId} needs a login: run "multisource-downloader auth ${sourceId}" and retry`);
  }
  return 1;
}

export async function runAuthCommand(
  command: AuthCommand,
  registry: HandlerRegistry,
  interaction: AuthInteraction,
): Promise<number> {
  const handle = await registry.authenticate(command.source, interaction);
  if (handle) {
    logOperation(`${command.source} authenticated`, { username: handle.username });
    return 0;
  }

  // A source without a login flow is not a failure
  if (!registry.canAuthenticate(command.source)) {
    return 0;
  }

  logger.warn(`${command.source} authentication was not completed`);
  return 1;
}
