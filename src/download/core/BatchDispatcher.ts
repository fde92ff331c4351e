/**
 * BatchDispatcher - Runs a manifest through routing, admission control and
 * the per-source handlers, one item at a time
 *
 * Items are never run concurrently: backends and session files are not
 * safe under parallel use. A failing item is recorded and the batch goes on.
 */

import { EventEmitter } from 'events';
import fs from 'fs/promises';
import { logger, logError, toError } from '../../utils/logger';
import { AdmissionControl } from './AdmissionControl';
import { isDownloadError } from './errors';
import { HandlerRegistry } from './HandlerRegistry';
import { resolveSource } from './SourceRouter';
import {
    BatchEvent,
    BatchEventType,
    BatchOptions,
    BatchResult,
    CompletedEntry,
    DownloadOptions,
    ErrorEntry,
    ManifestItem,
    SkippedEntry,
    SourceId,
} from './types';

/**
 * Options every admitted item starts with, by source
 */
export function buildDownloadOptions(
    sourceId: SourceId,
    credentials: BatchOptions['credentials'] = {},
): DownloadOptions {
    const options: DownloadOptions = {};

    if (sourceId === SourceId.INSTAGRAM) {
        options.auth = 'auto';
    } else if (sourceId !== SourceId.GOOGLE_DRIVE) {
        // Cookie-based backends reuse the stored jar
        options.useSession = true;
    }

    const handle = credentials[sourceId];
    if (handle) {
        options.credentialHandle = handle;
    }
    return options;
}

export function isBatchSuccessful(result: BatchResult): boolean {
    return result.errors.length === 0;
}

export class BatchDispatcher extends EventEmitter {
    private readonly registry: HandlerRegistry;
    private readonly resolve: typeof resolveSource;

    constructor(registry: HandlerRegistry, resolver: typeof resolveSource = resolveSource) {
        super();
        this.registry = registry;
        this.resolve = resolver;
    }

    /**
     * Process every item in order and return the aggregated result
     */
    async execute(
        items: Iterable<ManifestItem>,
        destination: string,
        options: BatchOptions = {},
    ): Promise<BatchResult> {
        const admission = new AdmissionControl({
            globalLimit: options.globalLimit,
            perSourceLimit: options.perSourceLimit,
        });
        const completed: CompletedEntry[] = [];
        const skipped: SkippedEntry[] = [];
        const errors: ErrorEntry[] = [];

        await fs.mkdir(destination, { recursive: true });

        let position = 0;
        for (const item of items) {
            const index = position++;
            const { sourceHint, url } = item;
            const sourceId = this.resolve(sourceHint, url);

            // Unsupported items are skipped before they can charge either limit
            if (!sourceId || !this.registry.supports(sourceId)) {
                skipped.push({ sourceHint, url, reason: 'unsupported' });
                this.emitEvent('item:skipped', index, url, undefined, { reason: 'unsupported' });
                continue;
            }

            const decision = admission.consume(sourceId);
            if (!decision.admitted) {
                skipped.push({ sourceHint, url, reason: decision.reason });
                this.emitEvent('item:skipped', index, url, sourceId, { reason: decision.reason });
                continue;
            }

            logger.info('Processing item', { url, sourceId });
            this.emitEvent('item:admitted', index, url, sourceId);

            if (options.dryRun) {
                completed.push({ sourceId, url });
                this.emitEvent('item:completed', index, url, sourceId, { dryRun: true });
                continue;
            }

            const downloadOptions = buildDownloadOptions(sourceId, options.credentials);
            try {
                const outcome = await this.registry.download(sourceId, url, destination, downloadOptions);
                completed.push({ sourceId, url });
                this.emitEvent('item:completed', index, url, sourceId, { location: outcome.location });
            } catch (error) {
                const err = toError(error);
                const kind = isDownloadError(err) ? err.kind : 'unknown';
                errors.push({ sourceId, url, message: err.message, kind });

                if (kind === 'unknown') {
                    logError(err, { url, sourceId });
                } else {
                    logger.error(`Download failed for ${url} (${sourceId}): ${err.message}`, { kind });
                }
                this.emitEvent('item:failed', index, url, sourceId, { kind, message: err.message });
            }
        }

        const result: BatchResult = Object.freeze({
            attempted: admission.getStats().attempted,
            completed: Object.freeze(completed),
            skipped: Object.freeze(skipped),
            errors: Object.freeze(errors),
        });

        this.emitEvent('batch:finished', position, '', undefined, {
            attempted: result.attempted,
            completed: completed.length,
            skipped: skipped.length,
            errors: errors.length,
        });
        return result;
    }

    private emitEvent(
        type: BatchEventType,
        index: number,
        url: string,
        sourceId?: SourceId,
        data?: Record<string, unknown>,
    ): void {
        const event: BatchEvent = {
            type,
            index,
            url,
            sourceId,
            timestamp: new Date(),
            data,
        };
        this.emit(type, event);
    }
}
