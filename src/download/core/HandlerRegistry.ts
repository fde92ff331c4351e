/**
 * HandlerRegistry - Maps each source to the handler that downloads it
 * Whether a source can authenticate is decided here, once, at registration
 */

import { logger } from '../../utils/logger';
import { DownloadError } from './errors';
import {
    AuthInteraction,
    AuthenticatableHandler,
    CredentialHandle,
    DownloadOptions,
    DownloadOutcome,
    HandlerTable,
    SourceHandler,
    SourceId,
    ALL_SOURCES,
} from './types';

export class HandlerRegistry {
    private readonly handlers = new Map<SourceId, SourceHandler>();
    private readonly authenticators = new Map<SourceId, AuthenticatableHandler>();

    /**
     * A full HandlerTable covers every source; a partial one leaves the
     * missing sources unsupported
     */
    constructor(table: HandlerTable | Partial<HandlerTable>) {
        for (const sourceId of ALL_SOURCES) {
            const handler = table[sourceId];
            if (handler) {
                this.register(sourceId, handler);
            }
        }
    }

    private register(sourceId: SourceId, handler: SourceHandler): void {
        if (handler.sourceId !== sourceId) {
            throw new Error(`Handler for ${handler.sourceId} registered under ${sourceId}`);
        }

        this.handlers.set(sourceId, handler);
        if (handler.authenticatable) {
            this.authenticators.set(sourceId, handler);
        }

        logger.debug('Handler registered', {
            sourceId,
            authenticatable: handler.authenticatable,
        });
    }

    supports(sourceId: SourceId): boolean {
        return this.handlers.has(sourceId);
    }

    supportedSources(): SourceId[] {
        return Array.from(this.handlers.keys());
    }

    canAuthenticate(sourceId: SourceId): boolean {
        return this.authenticators.has(sourceId);
    }

    get(sourceId: SourceId): SourceHandler | undefined {
        return this.handlers.get(sourceId);
    }

    async download(
        sourceId: SourceId,
        url: string,
        destination: string,
        options: DownloadOptions,
    ): Promise<DownloadOutcome> {
        const handler = this.handlers.get(sourceId);
        if (!handler) {
            throw new DownloadError('unsupported', `Unknown source: ${sourceId}`, { source: sourceId });
        }
        return handler.download(url, destination, options);
    }

    /**
     * Run a source's login flow. Sources without one resolve to null.
     */
    async authenticate(
        sourceId: SourceId,
        interaction?: AuthInteraction,
    ): Promise<CredentialHandle | null> {
        if (!this.handlers.has(sourceId)) {
            throw new DownloadError('unsupported', `Unknown source: ${sourceId}`, { source: sourceId });
        }

        const authenticator = this.authenticators.get(sourceId);
        if (!authenticator) {
            logger.info(`Interactive authentication is not available for ${sourceId}`);
            return null;
        }
        return authenticator.authenticate(interaction);
    }
}
