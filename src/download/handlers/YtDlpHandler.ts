/**
 * YtDlpHandler - Shared handler for every source yt-dlp downloads
 * Reuses the source's cookie jar from the session store unless told otherwise
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger';
import { SessionStore, logPersistenceWarning } from '../../utils/SessionStore';
import { BaseHandler, HandlerContext } from './BaseHandler';
import { DownloadHandler, DownloadOptions, DownloadOutcome, YtDlpParams } from '../core/types';

const PROGRESS_RE = /\[download\]\s+(\d+\.?\d*)%/;

export interface YtDlpHandlerContext extends HandlerContext {
    ytDlpPath?: string;
}

/**
 * Turn named parameters into yt-dlp flags: true is a bare flag, false and
 * undefined are left out, anything else is a flag followed by its value
 */
export function toYtDlpArgs(params: YtDlpParams): string[] {
    const args: string[] = [];
    for (const [name, value] of Object.entries(params)) {
        if (value === undefined || value === false) continue;
        if (value === true) {
            args.push(`--${name}`);
        } else {
            args.push(`--${name}`, String(value));
        }
    }
    return args;
}

export abstract class YtDlpHandler extends BaseHandler implements DownloadHandler {
    readonly authenticatable = false;

    /** Output template relative to the batch destination */
    protected abstract readonly outputTemplate: string;

    protected readonly binary: string;

    constructor(context: YtDlpHandlerContext) {
        super(context);
        this.binary = context.ytDlpPath ?? 'yt-dlp';
    }

    /**
     * Source-specific parameters layered over the shared defaults
     */
    protected extraParams(_options: DownloadOptions): YtDlpParams {
        return {};
    }

    async download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome> {
        this.extractIdentifier(url);
        await fs.mkdir(destination, { recursive: true });

        const cookiePath = await this.resolveCookiePath(options);
        const args = [...toYtDlpArgs(this.buildParams(destination, options, cookiePath)), '--', url];

        logger.info(`[${this.sourceId}] yt-dlp download start`, { url });

        await this.executeWithRetry(
            () =>
                this.runner(this.binary, args, {
                    timeoutMs: this.timeoutMs,
                    onStdoutLine: (line) => this.reportProgress(url, line),
                }),
            'yt-dlp download',
        );

        logger.info(`[${this.sourceId}] yt-dlp download complete`, { url });

        if (cookiePath && !options.cookieFile) {
            await this.rememberCookieJar();
        }

        return { sourceId: this.sourceId, url, location: destination };
    }

    /**
     * Defaults, then source extras, then verbosity, then the caller's
     * overrides, which always win
     */
    buildParams(destination: string, options: DownloadOptions, cookiePath?: string): YtDlpParams {
        const params: YtDlpParams = {
            output: path.join(destination, this.outputTemplate),
            'no-playlist': true,
            quiet: true,
            'no-warnings': true,
            retries: 2,
            'concurrent-fragments': 2,
            cookies: cookiePath,
            ...this.extraParams(options),
        };

        if (options.verbose) {
            params.quiet = false;
            params['no-warnings'] = false;
        }

        return { ...params, ...options.ytdlpParams };
    }

    /**
     * Cookie jar for this download: an explicit file, the stored jar, or none
     */
    protected async resolveCookiePath(options: DownloadOptions): Promise<string | undefined> {
        if (options.cookieFile) {
            await fs.mkdir(path.dirname(options.cookieFile), { recursive: true });
            return options.cookieFile;
        }
        if (options.useSession === false) {
            return undefined;
        }
        return this.store.resolveCookieJar(this.sourceId);
    }

    private async rememberCookieJar(): Promise<void> {
        try {
            if (await this.store.hasFile(this.sourceId, SessionStore.COOKIE_FILENAME)) {
                await this.store.writeMetadata(this.sourceId, { filename: SessionStore.COOKIE_FILENAME });
                logger.debug(`[${this.sourceId}] Cookie jar recorded`);
            }
        } catch (error) {
            logPersistenceWarning('cookie metadata write', this.sourceId, error);
        }
    }

    private reportProgress(url: string, line: string): void {
        const match = line.match(PROGRESS_RE);
        if (match?.[1]) {
            logger.debug(`[${this.sourceId}] Download progress`, { url, percentage: parseFloat(match[1]) });
        }
    }
}
