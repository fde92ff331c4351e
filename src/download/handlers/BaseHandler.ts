/**
 * BaseHandler - Abstract base class for all source handlers
 * Implements identifier extraction, retry with failure classification and
 * conversion of backend failures into DownloadError kinds
 */

import { z } from 'zod';
import { logger, toError } from '../../utils/logger';
import { DEFAULT_RETRY_POLICY, FailureVerdict, retryWithClassifier } from '../../utils/retryHelper';
import { SessionStore } from '../../utils/SessionStore';
import { CommandRunner, runCommand } from '../../utils/processRunner';
import { DownloadError, authRequired, invalidInput, isDownloadError } from '../core/errors';
import { DownloadOptions, DownloadOutcome, RetryPolicy, SourceId } from '../core/types';

// URL validation schema for anything handed to an external tool
const UrlSchema = z
    .string()
    .url()
    .refine(
        (url) => !url.includes(';') && !url.includes('|') && !url.includes('&&'),
        { message: 'Invalid URL format' },
    );

const AUTH_REQUIRED_RE = /(login|log in|sign in|authenticat)/i;

export interface HandlerContext {
    store: SessionStore;
    retry?: RetryPolicy;
    runner?: CommandRunner;
    /** Per-process timeout for external tools, 0 for none */
    timeoutMs?: number;
}

export abstract class BaseHandler {
    abstract readonly sourceId: SourceId;

    /**
     * Patterns that pull the platform's content id out of a URL.
     * The first capture group of the first matching pattern is the id.
     */
    protected abstract readonly identifierPatterns: readonly RegExp[];

    protected readonly store: SessionStore;
    protected readonly retry: RetryPolicy;
    protected readonly runner: CommandRunner;
    protected readonly timeoutMs: number;

    constructor(context: HandlerContext) {
        this.store = context.store;
        this.retry = context.retry ?? DEFAULT_RETRY_POLICY;
        this.runner = context.runner ?? runCommand;
        this.timeoutMs = context.timeoutMs ?? 0;
    }

    abstract download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome>;

    /**
     * Validate the URL and extract the content id, failing with invalid_input
     */
    protected extractIdentifier(url: string): string {
        if (!UrlSchema.safeParse(url).success) {
            throw invalidInput(this.sourceId, `Invalid ${this.sourceId} URL: ${url}`);
        }

        for (const pattern of this.identifierPatterns) {
            const match = url.match(pattern);
            if (match?.[1]) {
                return match[1];
            }
        }
        throw invalidInput(this.sourceId, `Invalid ${this.sourceId} link: no content id in ${url}`);
    }

    /**
     * Messages mentioning a login requirement are final; everything else
     * is worth another attempt
     */
    protected classifyFailure(error: Error): FailureVerdict {
        if (isDownloadError(error)) {
            return error.retryable ? 'retry' : 'fail';
        }
        return this.isAuthFailure(error) ? 'fail' : 'retry';
    }

    protected isAuthFailure(error: Error): boolean {
        return AUTH_REQUIRED_RE.test(error.message);
    }

    protected authRequiredMessage(error: Error): string {
        return `${this.sourceId} requires authentication: ${error.message}`;
    }

    /**
     * Run a backend call under the retry policy and translate its failure
     */
    protected async executeWithRetry<T>(
        operation: (attempt: number) => Promise<T>,
        operationName: string,
    ): Promise<T> {
        const label = `[${this.sourceId}] ${operationName}`;
        try {
            return await retryWithClassifier(
                operation,
                this.retry,
                (error) => this.classifyFailure(error),
                label,
            );
        } catch (error) {
            throw this.toDownloadError(toError(error));
        }
    }

    protected toDownloadError(error: Error): DownloadError {
        if (isDownloadError(error)) {
            return error;
        }
        if (this.isAuthFailure(error)) {
            logger.warn(`[${this.sourceId}] Authentication required`, { error: error.message });
            return authRequired(this.sourceId, this.authRequiredMessage(error), error);
        }
        return new DownloadError(
            'transient_io',
            `${this.sourceId} download failed after ${this.retry.attempts} attempts: ${error.message}`,
            { source: this.sourceId, cause: error },
        );
    }
}
