/**
 * GoogleDriveHandler - Shared files and folders
 * Public files and folders go through gdown; files with method 'authenticated'
 * use the Drive API and the stored OAuth credentials.
 */

import fs from 'fs/promises';
import { logger } from '../../utils/logger';
import { BaseHandler, HandlerContext } from './BaseHandler';
import { GoogleDriveApi } from './GoogleDriveApi';
import { invalidInput } from '../core/errors';
import { DownloadHandler, DownloadOptions, DownloadOutcome, SourceId } from '../core/types';

export type DriveTarget = { id: string; kind: 'file' | 'folder' };

/**
 * Drive id and whether it names a file or a folder.
 * Folder links are checked first so folderview?id= is not taken for a file.
 */
export function parseDriveId(url: string): DriveTarget | null {
    const folder = url.match(/(?:folders\/|folderview\?id=)([\w-]+)/);
    if (folder?.[1]) {
        return { id: folder[1], kind: 'folder' };
    }
    const file = url.match(/(?:\/d\/|[?&]id=)([\w-]+)/);
    if (file?.[1]) {
        return { id: file[1], kind: 'file' };
    }
    return null;
}

export interface GoogleDriveHandlerContext extends HandlerContext {
    gdownPath?: string;
    api?: GoogleDriveApi;
}

export class GoogleDriveHandler extends BaseHandler implements DownloadHandler {
    readonly sourceId = SourceId.GOOGLE_DRIVE;
    readonly authenticatable = false;

    protected readonly identifierPatterns = [
        /(?:folders\/|folderview\?id=)([\w-]+)/,
        /(?:\/d\/|[?&]id=)([\w-]+)/,
    ];

    private readonly binary: string;
    private readonly api: GoogleDriveApi;

    constructor(context: GoogleDriveHandlerContext) {
        super(context);
        this.binary = context.gdownPath ?? 'gdown';
        this.api = context.api ?? new GoogleDriveApi(this.store);
    }

    async download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome> {
        this.extractIdentifier(url);
        const target = parseDriveId(url);
        if (!target) {
            throw invalidInput(this.sourceId, `Invalid Google Drive URL: ${url}`);
        }

        await fs.mkdir(destination, { recursive: true });

        if (target.kind === 'folder') {
            return this.downloadFolder(url, target.id, destination);
        }

        const method = options.method ?? 'public';
        if (method.startsWith('public')) {
            return this.downloadPublicFile(url, destination);
        }
        return this.downloadAuthenticatedFile(url, target.id, destination);
    }

    private async downloadPublicFile(url: string, destination: string): Promise<DownloadOutcome> {
        logger.info(`[${this.sourceId}] Downloading public file`, { url, destination });
        // gdown treats an output ending in a separator as a directory
        const output = destination.endsWith('/') ? destination : `${destination}/`;
        await this.executeWithRetry(
            () => this.runner(this.binary, ['--fuzzy', url, '-O', output], { timeoutMs: this.timeoutMs }),
            'gdown file',
        );
        return { sourceId: this.sourceId, url, location: destination };
    }

    private async downloadFolder(url: string, folderId: string, destination: string): Promise<DownloadOutcome> {
        const folderUrl = `https://drive.google.com/drive/folders/${folderId}`;
        logger.info(`[${this.sourceId}] Downloading folder ${folderId}`, { destination });
        await this.executeWithRetry(
            () => this.runner(this.binary, ['--folder', folderUrl, '-O', destination], { timeoutMs: this.timeoutMs }),
            'gdown folder',
        );
        return { sourceId: this.sourceId, url, location: destination };
    }

    private async downloadAuthenticatedFile(url: string, fileId: string, destination: string): Promise<DownloadOutcome> {
        logger.info(`[${this.sourceId}] Downloading file ${fileId} with stored credentials`);
        const location = await this.executeWithRetry(
            () => this.api.downloadFile(fileId, destination),
            'authenticated download',
        );
        return { sourceId: this.sourceId, url, location };
    }
}
