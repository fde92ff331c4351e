/**
 * InstagramHandler - Posts, reels and IGTV through instaloader, with the login
 * session cached in the session store
 */

import fs from 'fs/promises';
import path from 'path';
import { logger, toError } from '../../utils/logger';
import { logPersistenceWarning, valueOf } from '../../utils/SessionStore';
import { BaseHandler, HandlerContext } from './BaseHandler';
import { InstagramClient, InstaloaderCli, TwoFactorRequiredError } from './InstagramClient';
import { authRequired } from '../core/errors';
import {
    AuthInteraction,
    AuthenticatableHandler,
    DownloadOptions,
    DownloadOutcome,
    InstagramCredential,
    SourceId,
} from '../core/types';

export interface InstagramHandlerContext extends HandlerContext {
    client?: InstagramClient;
    instaloaderPath?: string;
}

export class InstagramHandler extends BaseHandler implements AuthenticatableHandler {
    readonly sourceId = SourceId.INSTAGRAM;
    readonly authenticatable = true;

    protected readonly identifierPatterns = [
        /instagr(?:am\.com|\.am)\/(?:p|reels?|tv)\/([\w-]+)/,
    ];

    private readonly client: InstagramClient;

    constructor(context: InstagramHandlerContext) {
        super(context);
        this.client = context.client ?? new InstaloaderCli({
            binary: context.instaloaderPath,
            runner: this.runner,
            timeoutMs: this.timeoutMs,
        });
    }

    async download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome> {
        const shortcode = this.extractIdentifier(url.split('?')[0]);
        const session = await this.resolveSession(options);
        const target = path.join(destination, shortcode);
        await fs.mkdir(target, { recursive: true });

        logger.info(`[${this.sourceId}] Downloading post ${shortcode}`, { authenticated: Boolean(session) });

        await this.executeWithRetry(
            () => this.client.downloadPost(shortcode, target, session),
            `post ${shortcode}`,
        );

        logger.info(`[${this.sourceId}] Downloaded post ${shortcode}`);
        return { sourceId: this.sourceId, url, location: target };
    }

    async authenticate(interaction?: AuthInteraction): Promise<InstagramCredential | null> {
        const cached = await this.loadCachedCredential();
        if (cached) {
            logger.info(`[${this.sourceId}] Reusing cached session for ${cached.username}`);
            return cached;
        }

        if (!interaction) {
            logger.warn(`[${this.sourceId}] No cached session and no way to prompt for a login`);
            return null;
        }

        const request = await interaction.requestCredentials(await this.cachedPrefill());
        if (!request) {
            return null;
        }

        const username = request.username.trim();
        if (!username) {
            interaction.reportError('A username is required to log in or to use a session file.');
            logger.error(`[${this.sourceId}] Username missing for authentication`);
            return null;
        }

        try {
            if (request.sessionFile) {
                return await this.importSession(username, request.sessionFile);
            }
            if (request.password) {
                return await this.login(username, request.password, interaction);
            }
            interaction.reportError('A password or a session file is required.');
            return null;
        } catch (error) {
            const err = toError(error);
            interaction.reportError(err.message);
            logger.error(`[${this.sourceId}] Authentication error: ${err.message}`);
            return null;
        }
    }

    protected authRequiredMessage(): string {
        return 'Instagram requires authentication for this post. Run Instagram authentication first.';
    }

    /**
     * Session for a download: the caller's handle, else the cached one
     * unless running anonymously
     */
    private async resolveSession(options: DownloadOptions): Promise<InstagramCredential | undefined> {
        const handle = options.credentialHandle;
        if (handle?.source === SourceId.INSTAGRAM) {
            return handle;
        }

        const mode = options.auth ?? 'auto';
        if (mode === 'unauthenticated') {
            return undefined;
        }

        const cached = await this.loadCachedCredential();
        if (cached) {
            return cached;
        }
        if (mode === 'authenticated') {
            throw authRequired(this.sourceId, 'No saved Instagram session found. Run Instagram authentication first.');
        }
        return undefined;
    }

    /**
     * Cached credential from meta.json, only when the session file it names
     * exists and is not empty
     */
    private async loadCachedCredential(): Promise<InstagramCredential | null> {
        const metadata = valueOf(await this.store.readMetadata(this.sourceId));
        if (!metadata?.username || !metadata.filename) {
            return null;
        }

        const session = valueOf(await this.store.readBinary(this.sourceId, metadata.filename));
        if (!session || session.length === 0) {
            return null;
        }

        return {
            source: SourceId.INSTAGRAM,
            username: metadata.username,
            sessionFile: this.store.locate(this.sourceId, metadata.filename),
        };
    }

    private async cachedPrefill(): Promise<{ username?: string; sessionFile?: string }> {
        const metadata = valueOf(await this.store.readMetadata(this.sourceId));
        return {
            username: metadata?.username,
            sessionFile: metadata?.filename
                ? this.store.locate(this.sourceId, metadata.filename)
                : undefined,
        };
    }

    private async importSession(username: string, externalPath: string): Promise<InstagramCredential> {
        await fs.access(externalPath);
        logger.info(`[${this.sourceId}] Loading session for ${username} from ${externalPath}`);

        try {
            const imported = await this.store.importFile(this.sourceId, externalPath);
            await this.store.writeMetadata(this.sourceId, { username, filename: path.basename(imported) });
            logger.info(`[${this.sourceId}] Imported session for ${username}`);
            return { source: SourceId.INSTAGRAM, username, sessionFile: imported };
        } catch (error) {
            logPersistenceWarning('session import', this.sourceId, error);
            return { source: SourceId.INSTAGRAM, username, sessionFile: externalPath };
        }
    }

    private async login(
        username: string,
        password: string,
        interaction: AuthInteraction,
    ): Promise<InstagramCredential | null> {
        const sessionFile = await this.store.pathFor(this.sourceId, `${username}.session`);
        logger.info(`[${this.sourceId}] Attempting login for ${username}`);

        try {
            await this.client.login(username, password, sessionFile);
        } catch (error) {
            if (!(error instanceof TwoFactorRequiredError)) {
                throw error;
            }

            logger.warn(`[${this.sourceId}] Login for ${username} requires a verification code`);
            let code: string | null = null;
            try {
                code = await interaction.requestTwoFactorCode(username);
            } finally {
                if (!code) {
                    this.client.abortLogin();
                }
            }
            if (!code) {
                logger.warn(`[${this.sourceId}] Verification code not provided; aborting login`);
                return null;
            }

            await this.client.completeTwoFactor(code);
            logger.info(`[${this.sourceId}] Verification accepted for ${username}`);
        }

        logger.info(`[${this.sourceId}] Login successful for ${username}`);
        try {
            await this.store.writeMetadata(this.sourceId, { username, filename: path.basename(sessionFile) });
        } catch (error) {
            logPersistenceWarning('session metadata write', this.sourceId, error);
        }

        const credential: InstagramCredential = { source: SourceId.INSTAGRAM, username, sessionFile };
        await this.offerExport(credential, interaction);
        return credential;
    }

    private async offerExport(credential: InstagramCredential, interaction: AuthInteraction): Promise<void> {
        const exportPath = await interaction.requestExportPath();
        if (!exportPath) return;

        try {
            await fs.copyFile(credential.sessionFile, exportPath);
            logger.info(`[${this.sourceId}] Session exported to ${exportPath}`);
        } catch (error) {
            logger.error(`[${this.sourceId}] Failed to export session: ${toError(error).message}`);
        }
    }
}
