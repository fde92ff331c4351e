/**
 * Handlers Index - Exports all source handlers and the default handler table
 */

import { SessionStore } from '../../utils/SessionStore';
import { CommandRunner } from '../../utils/processRunner';
import { HandlerTable, RetryPolicy, SourceId } from '../core/types';
import { FacebookHandler } from './FacebookHandler';
import { GoogleDriveHandler } from './GoogleDriveHandler';
import { InstagramClient } from './InstagramClient';
import { InstagramHandler } from './InstagramHandler';
import { RedditHandler } from './RedditHandler';
import { ThreadsHandler } from './ThreadsHandler';
import { TikTokHandler } from './TikTokHandler';
import { TwitterHandler } from './TwitterHandler';
import { YouTubeHandler } from './YouTubeHandler';

export { BaseHandler } from './BaseHandler';
export type { HandlerContext } from './BaseHandler';
export { YtDlpHandler, toYtDlpArgs } from './YtDlpHandler';
export type { YtDlpHandlerContext } from './YtDlpHandler';
export { TwitterHandler } from './TwitterHandler';
export { YouTubeHandler } from './YouTubeHandler';
export { TikTokHandler } from './TikTokHandler';
export { ThreadsHandler } from './ThreadsHandler';
export { RedditHandler } from './RedditHandler';
export { FacebookHandler } from './FacebookHandler';
export { InstagramHandler } from './InstagramHandler';
export { InstaloaderCli, TwoFactorRequiredError } from './InstagramClient';
export type { InstagramClient, InstagramSession } from './InstagramClient';
export { GoogleDriveHandler, parseDriveId } from './GoogleDriveHandler';
export { GoogleDriveApi } from './GoogleDriveApi';

export interface DefaultHandlerOptions {
    store: SessionStore;
    retry?: RetryPolicy;
    runner?: CommandRunner;
    timeoutMs?: number;
    ytDlpPath?: string;
    instaloaderPath?: string;
    gdownPath?: string;
    youtubePotServer?: string;
    instagramClient?: InstagramClient;
}

/**
 * One handler per source
 */
export function createDefaultHandlers(options: DefaultHandlerOptions): HandlerTable {
    const context = {
        store: options.store,
        retry: options.retry,
        runner: options.runner,
        timeoutMs: options.timeoutMs,
    };
    const ytDlp = { ...context, ytDlpPath: options.ytDlpPath };

    return {
        [SourceId.GOOGLE_DRIVE]: new GoogleDriveHandler({ ...context, gdownPath: options.gdownPath }),
        [SourceId.INSTAGRAM]: new InstagramHandler({
            ...context,
            client: options.instagramClient,
            instaloaderPath: options.instaloaderPath,
        }),
        [SourceId.TIKTOK]: new TikTokHandler(ytDlp),
        [SourceId.THREADS]: new ThreadsHandler(ytDlp),
        [SourceId.TWITTER]: new TwitterHandler(ytDlp),
        [SourceId.REDDIT]: new RedditHandler(ytDlp),
        [SourceId.FACEBOOK]: new FacebookHandler(ytDlp),
        [SourceId.YOUTUBE]: new YouTubeHandler({ ...ytDlp, potServerUrl: options.youtubePotServer }),
    };
}
