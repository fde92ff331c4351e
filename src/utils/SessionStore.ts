import { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger, toError } from './logger';

/**
 * SessionStore - Namespaced on-disk storage for reusable login material
 *
 * Layout: <root>/<namespace>/<file>, one namespace per source. Holds cookie
 * jars (Netscape cookies.txt), exported login sessions, OAuth credentials and
 * a small meta.json describing them.
 *
 * Reads never throw: a missing file is 'absent', an unreadable or invalid one
 * is 'corrupt' and gets logged. Writes are plain overwrites with no journaling.
 */

export type StoreRead<T> =
    | { status: 'present'; value: T }
    | { status: 'absent' }
    | { status: 'corrupt'; reason: string };

export const SessionMetadataSchema = z
    .object({
        username: z.string().min(1).optional(),
        filename: z.string().min(1).optional(),
        updatedAt: z.string().optional(),
    })
    .passthrough();

export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

const NETSCAPE_FIELD_COUNT = 7;

export function valueOf<T>(read: StoreRead<T>): T | undefined {
    return read.status === 'present' ? read.value : undefined;
}

/**
 * Directory name for a source: lower-cased, non-alphanumerics replaced,
 * 'default' when nothing is left
 */
export function sanitizeNamespace(name: string): string {
    const cleaned = Array.from(name)
        .map((ch) => (/^[\p{L}\p{N}]$/u.test(ch) ? ch.toLowerCase() : '_'))
        .join('')
        .replace(/^_+|_+$/g, '');
    return cleaned || 'default';
}

/**
 * Failed reads or writes of session artifacts are never fatal to a download
 */
export function logPersistenceWarning(
    operation: string,
    source: string,
    error: unknown,
): void {
    logger.warn(`Session store ${operation} failed`, {
        source,
        error: toError(error).message,
    });
}

/**
 * Check a cookie jar is in Netscape format: comments, blank lines and
 * seven tab-separated fields per cookie
 */
export function isNetscapeCookieJar(content: string): boolean {
    return content.split(/\r?\n/).every((line) => {
        const trimmed = line.trim();
        if (trimmed.length === 0) return true;
        if (trimmed.startsWith('#') && !trimmed.startsWith('#HttpOnly_')) return true;
        return line.split('\t').length === NETSCAPE_FIELD_COUNT;
    });
}

/**
 * Cookies may be handed over as plaintext or base64
 */
export function decodeCookies(content: string): string {
    if (content.includes('\t') || content.trimStart().startsWith('#')) {
        return content;
    }
    return Buffer.from(content, 'base64').toString('utf-8');
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SessionStore {
    static readonly METADATA_FILENAME = 'meta.json';
    static readonly COOKIE_FILENAME = 'cookies.txt';
    static readonly SESSION_FILENAME = 'session.bin';

    private readonly rootDir: string;

    constructor(rootDir: string) {
        this.rootDir = path.resolve(rootDir);
    }

    getRoot(): string {
        return this.rootDir;
    }

    namespaceFor(source: string): string {
        return sanitizeNamespace(source);
    }

    namespaceDir(source: string): string {
        return path.join(this.rootDir, this.namespaceFor(source));
    }

    /**
     * Where a file lives in its namespace. Nothing is created on disk.
     */
    locate(source: string, filename: string): string {
        if (!filename || path.basename(filename) !== filename || filename === '..') {
            throw new Error(`Invalid session file name: ${filename}`);
        }
        return path.join(this.namespaceDir(source), filename);
    }

    async ensureNamespace(source: string): Promise<string> {
        const directory = this.namespaceDir(source);
        await fs.mkdir(directory, { recursive: true });
        return directory;
    }

    /**
     * Path for a file about to be written; creates the namespace
     */
    async pathFor(source: string, filename: string): Promise<string> {
        const filePath = this.locate(source, filename);
        await this.ensureNamespace(source);
        return filePath;
    }

    async readText(source: string, filename: string): Promise<StoreRead<string>> {
        return this.read(source, filename, (filePath) => fs.readFile(filePath, 'utf-8'));
    }

    async writeText(source: string, filename: string, text: string): Promise<string> {
        const filePath = await this.pathFor(source, filename);
        await fs.writeFile(filePath, text, 'utf-8');
        return filePath;
    }

    async readBinary(source: string, filename: string): Promise<StoreRead<Buffer>> {
        return this.read(source, filename, (filePath) => fs.readFile(filePath));
    }

    async writeBinary(source: string, filename: string, data: Buffer): Promise<string> {
        const filePath = await this.pathFor(source, filename);
        await fs.writeFile(filePath, data);
        return filePath;
    }

    async readJson<T>(
        source: string,
        filename: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ): Promise<StoreRead<T>> {
        const raw = await this.readText(source, filename);
        if (raw.status !== 'present') {
            return raw;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw.value);
        } catch (error) {
            return this.corrupt<T>(source, filename, `invalid JSON: ${toError(error).message}`);
        }

        const result = schema.safeParse(parsed);
        if (!result.success) {
            return this.corrupt<T>(source, filename, result.error.issues[0]?.message ?? 'schema mismatch');
        }
        return { status: 'present', value: result.data };
    }

    async writeJson(source: string, filename: string, data: object): Promise<string> {
        return this.writeText(source, filename, `${JSON.stringify(data, null, 2)}\n`);
    }

    async hasFile(source: string, filename: string): Promise<boolean> {
        try {
            const stats = await fs.stat(this.locate(source, filename));
            return stats.isFile();
        } catch {
            return false;
        }
    }

    /**
     * Files in a namespace, keyed by name
     */
    async listFiles(source: string, suffix?: string): Promise<Map<string, string>> {
        const directory = this.namespaceDir(source);
        const files = new Map<string, string>();
        let entries: Dirent[];
        try {
            entries = await fs.readdir(directory, { withFileTypes: true });
        } catch (error) {
            if (!isMissing(error)) {
                logPersistenceWarning('listing', source, error);
            }
            return files;
        }
        for (const entry of entries) {
            if (!entry.isFile()) continue;
            if (suffix && !entry.name.endsWith(suffix)) continue;
            files.set(entry.name, path.join(directory, entry.name));
        }
        return files;
    }

    async defaultCookiePath(source: string): Promise<string> {
        return this.pathFor(source, SessionStore.COOKIE_FILENAME);
    }

    defaultMetadataPath(source: string): string {
        return this.locate(source, SessionStore.METADATA_FILENAME);
    }

    /**
     * Metadata is only trusted when the file it points at lives in the
     * same namespace
     */
    async readMetadata(source: string): Promise<StoreRead<SessionMetadata>> {
        const read = await this.readJson(source, SessionStore.METADATA_FILENAME, SessionMetadataSchema);
        if (read.status !== 'present' || !read.value.filename) {
            return read;
        }

        const { filename } = read.value;
        if (path.basename(filename) !== filename || !(await this.hasFile(source, filename))) {
            return this.corrupt<SessionMetadata>(source, SessionStore.METADATA_FILENAME, `references missing file ${filename}`);
        }
        return read;
    }

    async writeMetadata(source: string, metadata: SessionMetadata): Promise<string> {
        return this.writeJson(source, SessionStore.METADATA_FILENAME, {
            ...metadata,
            updatedAt: metadata.updatedAt ?? new Date().toISOString(),
        });
    }

    async loadDefaultSession(
        source: string,
        filename: string = SessionStore.SESSION_FILENAME,
    ): Promise<StoreRead<Buffer>> {
        return this.readBinary(source, filename);
    }

    async writeDefaultSession(
        source: string,
        data: Buffer,
        filename: string = SessionStore.SESSION_FILENAME,
    ): Promise<string> {
        return this.writeBinary(source, filename, data);
    }

    /**
     * Copy an external file into the namespace, keeping its base name
     */
    async importFile(source: string, externalPath: string, filename?: string): Promise<string> {
        const destination = await this.pathFor(source, filename ?? path.basename(externalPath));
        if (path.resolve(externalPath) !== destination) {
            await fs.copyFile(externalPath, destination);
        }
        return destination;
    }

    /**
     * Write a cookie jar handed over as plaintext or base64
     */
    async importCookies(source: string, content: string): Promise<string> {
        const decoded = decodeCookies(content);
        if (!isNetscapeCookieJar(decoded)) {
            throw new Error(`Cookies for ${source} are not in Netscape format`);
        }
        return this.writeText(source, SessionStore.COOKIE_FILENAME, decoded);
    }

    /**
     * Default cookie jar path for a source. A jar that is no longer in
     * Netscape format is removed so the backend starts from a clean slate.
     * Undefined when the namespace cannot be prepared: the download then
     * runs without a jar.
     */
    async resolveCookieJar(source: string): Promise<string | undefined> {
        const read = await this.readText(source, SessionStore.COOKIE_FILENAME);

        try {
            const cookiePath = await this.defaultCookiePath(source);
            if (read.status === 'present' && !isNetscapeCookieJar(read.value)) {
                logPersistenceWarning('cookie jar read', source, new Error('not in Netscape format, discarding'));
                await fs.rm(cookiePath, { force: true });
            } else if (read.status === 'corrupt') {
                await fs.rm(cookiePath, { force: true, recursive: true });
            }
            return cookiePath;
        } catch (error) {
            logPersistenceWarning('cookie jar preparation', source, error);
            return undefined;
        }
    }

    private async read<T>(
        source: string,
        filename: string,
        reader: (filePath: string) => Promise<T>,
    ): Promise<StoreRead<T>> {
        try {
            return { status: 'present', value: await reader(this.locate(source, filename)) };
        } catch (error) {
            if (isMissing(error)) {
                return { status: 'absent' };
            }
            return this.corrupt<T>(source, filename, toError(error).message);
        }
    }

    private corrupt<T>(source: string, filename: string, reason: string): StoreRead<T> {
        logPersistenceWarning(`read of ${filename}`, source, new Error(reason));
        return { status: 'corrupt', reason };
    }
}

/**
 * Seed cookie jars from <NAMESPACE>_COOKIES environment variables
 * (TWITTER_COOKIES, YOUTUBE_COOKIES, ...). Returns the sources seeded.
 */
export async function seedCookiesFromEnv(
    store: SessionStore,
    sources: readonly string[],
    env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> {
    const seeded: string[] = [];

    for (const source of sources) {
        const variable = `${store.namespaceFor(source).toUpperCase()}_COOKIES`;
        const content = env[variable];
        if (!content) continue;

        try {
            await store.importCookies(source, content);
            seeded.push(source);
        } catch (error) {
            logPersistenceWarning(`cookie seed from ${variable}`, source, error);
        }
    }

    if (seeded.length > 0) {
        logger.info('Cookies seeded from environment', { sources: seeded });
    }
    return seeded;
}
