/**
 * GoogleDriveApi - Authenticated file downloads through the Drive v3 REST API
 *
 * Uses OAuth credentials saved in the session store (credentials.json) and the
 * app's client_secrets.json. The interactive consent flow is not run here:
 * without usable credentials the download fails with auth_required.
 */

import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { logger, toError } from '../../utils/logger';
import { SessionStore, logPersistenceWarning } from '../../utils/SessionStore';
import { DownloadError, authRequired } from '../core/errors';
import { SourceId } from '../core/types';

export const CREDENTIALS_FILENAME = 'credentials.json';
export const CLIENT_SECRETS_FILENAME = 'client_secrets.json';

const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const DRIVE_FILES_URL = 'https://www.googleapis.com/drive/v3/files';
// Refresh slightly before the recorded expiry
const EXPIRY_MARGIN_MS = 60_000;

export const DriveCredentialsSchema = z
    .object({
        access_token: z.string().min(1).optional(),
        refresh_token: z.string().min(1),
        token_expiry: z.string().optional(),
        client_id: z.string().optional(),
        client_secret: z.string().optional(),
        token_uri: z.string().url().optional(),
    })
    .passthrough();

export type DriveCredentials = z.infer<typeof DriveCredentialsSchema>;

const ClientConfigSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    token_uri: z.string().url().optional(),
});

export const ClientSecretsSchema = z
    .object({
        installed: ClientConfigSchema.optional(),
        web: ClientConfigSchema.optional(),
    })
    .refine((secrets) => Boolean(secrets.installed ?? secrets.web), {
        message: 'client_secrets.json has neither an "installed" nor a "web" section',
    });

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive().optional(),
});

const FileMetadataSchema = z.object({
    name: z.string().optional(),
    originalFilename: z.string().optional(),
});

export function isTokenExpired(credentials: DriveCredentials, now: number = Date.now()): boolean {
    if (!credentials.access_token || !credentials.token_expiry) {
        return true;
    }
    const expiry = Date.parse(credentials.token_expiry);
    return Number.isNaN(expiry) || expiry - EXPIRY_MARGIN_MS <= now;
}

export class GoogleDriveApi {
    private readonly store: SessionStore;
    private readonly fallbackSecretsPath: string;
    private readonly source = SourceId.GOOGLE_DRIVE;

    constructor(store: SessionStore, fallbackSecretsPath: string = path.resolve(CLIENT_SECRETS_FILENAME)) {
        this.store = store;
        this.fallbackSecretsPath = fallbackSecretsPath;
    }

    /**
     * Download one file into the directory, named after its Drive title
     */
    async downloadFile(fileId: string, directory: string): Promise<string> {
        const accessToken = await this.getAccessToken();

        const metadataResponse = await this.request(
            `${DRIVE_FILES_URL}/${encodeURIComponent(fileId)}?fields=name,originalFilename&supportsAllDrives=true`,
            accessToken,
            fileId,
        );
        const metadata = FileMetadataSchema.parse(await metadataResponse.json());
        const name = path.basename(metadata.name || metadata.originalFilename || fileId) || fileId;
        const target = path.join(directory, name);

        const response = await this.request(
            `${DRIVE_FILES_URL}/${encodeURIComponent(fileId)}?alt=media&supportsAllDrives=true`,
            accessToken,
            fileId,
        );
        if (!response.body) {
            throw new Error(`Google Drive returned no content for ${fileId}`);
        }

        try {
            await pipeline(Readable.fromWeb(response.body), createWriteStream(target));
        } catch (error) {
            await fs.rm(target, { force: true });
            throw error;
        }

        const { size } = await fs.stat(target);
        logger.info(`[${this.source}] Downloaded (authenticated) ${target}`, { bytes: size });
        return target;
    }

    /**
     * Stored access token, refreshed when expired
     */
    async getAccessToken(): Promise<string> {
        const secrets = await this.loadClientConfig();
        const read = await this.store.readJson(this.source, CREDENTIALS_FILENAME, DriveCredentialsSchema);
        if (read.status !== 'present') {
            throw authRequired(
                this.source,
                `No saved Google Drive credentials. Place an authorized ${CREDENTIALS_FILENAME} in ${this.store.namespaceDir(this.source)}`,
            );
        }

        const credentials = read.value;
        if (credentials.access_token && !isTokenExpired(credentials)) {
            return credentials.access_token;
        }
        return this.refresh(credentials, secrets);
    }

    private async refresh(credentials: DriveCredentials, secrets: ClientConfig): Promise<string> {
        const tokenUri = credentials.token_uri ?? secrets.token_uri ?? DEFAULT_TOKEN_URI;
        const response = await fetch(tokenUri, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
                client_id: credentials.client_id ?? secrets.client_id,
                client_secret: credentials.client_secret ?? secrets.client_secret,
                refresh_token: credentials.refresh_token,
                grant_type: 'refresh_token',
            }).toString(),
        });

        if (response.status === 400 || response.status === 401) {
            throw authRequired(this.source, `Stored Google Drive credentials are invalid (HTTP ${response.status})`);
        }
        if (!response.ok) {
            throw new Error(`Google Drive token refresh failed: HTTP ${response.status}`);
        }

        const token = TokenResponseSchema.parse(await response.json());
        const expiresIn = token.expires_in ?? 3600;
        const refreshed: DriveCredentials = {
            ...credentials,
            access_token: token.access_token,
            token_expiry: new Date(Date.now() + expiresIn * 1000).toISOString(),
        };

        try {
            await this.store.writeJson(this.source, CREDENTIALS_FILENAME, refreshed);
        } catch (error) {
            logPersistenceWarning('credentials write', this.source, error);
        }

        logger.info(`[${this.source}] Refreshed Google Drive token`);
        return token.access_token;
    }

    /**
     * client_secrets.json from the session namespace, then the working directory
     */
    private async loadClientConfig(): Promise<ClientConfig> {
        const stored = await this.store.readJson(this.source, CLIENT_SECRETS_FILENAME, ClientSecretsSchema);
        if (stored.status === 'present') {
            return this.clientConfigOf(stored.value);
        }

        let raw: string;
        try {
            raw = await fs.readFile(this.fallbackSecretsPath, 'utf-8');
        } catch {
            const namespaced = this.store.locate(this.source, CLIENT_SECRETS_FILENAME);
            throw authRequired(
                this.source,
                `Google Drive ${CLIENT_SECRETS_FILENAME} not found. Place it at one of: ${namespaced} or ${this.fallbackSecretsPath}`,
            );
        }

        try {
            return this.clientConfigOf(ClientSecretsSchema.parse(JSON.parse(raw)));
        } catch (error) {
            throw authRequired(
                this.source,
                `Failed to load Google Drive ${CLIENT_SECRETS_FILENAME}: ${toError(error).message}`,
                error,
            );
        }
    }

    private clientConfigOf(secrets: z.infer<typeof ClientSecretsSchema>): ClientConfig {
        const config = secrets.installed ?? secrets.web;
        if (!config) {
            throw authRequired(this.source, `${CLIENT_SECRETS_FILENAME} has no client configuration`);
        }
        return config;
    }

    private async request(url: string, accessToken: string, fileId: string): Promise<Response> {
        const response = await fetch(url, {
            headers: { Authorization: `Bearer ${accessToken}` },
        });

        if (response.status === 401) {
            throw authRequired(this.source, 'Google Drive rejected the stored credentials (HTTP 401)');
        }
        if (response.status === 404) {
            throw new DownloadError(
                'invalid_input',
                `Google Drive file ${fileId} not found or not shared with this account`,
                { source: this.source },
            );
        }
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }
        return response;
    }
}
