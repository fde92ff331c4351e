/**
 * Core Types for the Dispatch System
 * Defines the sources, manifest items, options and results shared by the
 * router, the dispatcher and the per-source handlers
 */

// ============================================================================
// Enums
// ============================================================================

export enum SourceId {
    GOOGLE_DRIVE = 'GoogleDrive',
    INSTAGRAM = 'Instagram',
    TIKTOK = 'TikTok',
    THREADS = 'Threads',
    TWITTER = 'Twitter',
    REDDIT = 'Reddit',
    FACEBOOK = 'Facebook',
    YOUTUBE = 'YouTube',
}

export const ALL_SOURCES: readonly SourceId[] = Object.freeze(Object.values(SourceId));

// ============================================================================
// Manifest & Routing Types
// ============================================================================

export interface ManifestItem {
    readonly sourceHint: string;
    readonly url: string;
}

export interface AliasRule {
    readonly alias: string;
    readonly sourceId: SourceId;
}

// ============================================================================
// Download Types
// ============================================================================

export type InstagramAuthMode = 'auto' | 'authenticated' | 'unauthenticated';

export type DriveMethod = 'public' | 'authenticated';

export interface InstagramCredential {
    readonly source: SourceId.INSTAGRAM;
    readonly username: string;
    readonly sessionFile: string;
}

/**
 * Pre-authenticated material a handler can use instead of its stored session.
 * Opaque to the dispatcher; each handler only accepts its own variant.
 */
export type CredentialHandle = InstagramCredential;

/** Flag values handed to yt-dlp, keyed by long option name without dashes */
export type YtDlpParams = Record<string, string | number | boolean | undefined>;

export interface DownloadOptions {
    auth?: InstagramAuthMode;
    useSession?: boolean;
    method?: DriveMethod;
    credentialHandle?: CredentialHandle;
    cookieFile?: string;
    ytdlpParams?: YtDlpParams;
    verbose?: boolean;
}

export interface DownloadOutcome {
    sourceId: SourceId;
    url: string;
    location: string;
}

// ============================================================================
// Handler Types
// ============================================================================

/**
 * UI collaborator driving an interactive login
 */
export interface AuthInteraction {
    requestCredentials(prefill: { username?: string; sessionFile?: string }): Promise<LoginRequest | null>;
    requestTwoFactorCode(username: string): Promise<string | null>;
    requestExportPath(): Promise<string | null>;
    reportError(message: string): void;
}

export interface LoginRequest {
    username: string;
    password?: string;
    sessionFile?: string;
}

export interface DownloadHandler {
    readonly sourceId: SourceId;
    readonly authenticatable: false;

    download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome>;
}

export interface AuthenticatableHandler {
    readonly sourceId: SourceId;
    readonly authenticatable: true;

    download(url: string, destination: string, options: DownloadOptions): Promise<DownloadOutcome>;

    /**
     * Return a cached credential or run the interactive login.
     * Resolves to null when the user aborts or no interaction is possible.
     */
    authenticate(interaction?: AuthInteraction): Promise<CredentialHandle | null>;
}

export type SourceHandler = DownloadHandler | AuthenticatableHandler;

export type HandlerTable = Record<SourceId, SourceHandler>;

// ============================================================================
// Batch Types
// ============================================================================

export type SkipReason = 'unsupported' | 'global-limit' | 'per-source-limit';

export interface CompletedEntry {
    readonly sourceId: SourceId;
    readonly url: string;
}

export interface SkippedEntry {
    readonly sourceHint: string;
    readonly url: string;
    readonly reason: SkipReason;
}

export interface ErrorEntry {
    readonly sourceId: SourceId;
    readonly url: string;
    readonly message: string;
    readonly kind: DownloadErrorKind | 'unknown';
}

export interface BatchResult {
    readonly attempted: number;
    readonly completed: readonly CompletedEntry[];
    readonly skipped: readonly SkippedEntry[];
    readonly errors: readonly ErrorEntry[];
}

export interface BatchOptions {
    globalLimit?: number;
    perSourceLimit?: number;
    dryRun?: boolean;
    credentials?: Partial<Record<SourceId, CredentialHandle>>;
}

// ============================================================================
// Event Types
// ============================================================================

export type BatchEventType =
    | 'item:skipped'
    | 'item:admitted'
    | 'item:completed'
    | 'item:failed'
    | 'batch:finished';

export interface BatchEvent {
    type: BatchEventType;
    index: number;
    url: string;
    sourceId?: SourceId;
    timestamp: Date;
    data?: Record<string, unknown>;
}

// ============================================================================
// Error Types
// ============================================================================

export type DownloadErrorKind =
    | 'unsupported'
    | 'invalid_input'
    | 'auth_required'
    | 'transient_io';

// ============================================================================
// Configuration Types
// ============================================================================

export interface RetryPolicy {
    attempts: number;
    delayMs: number;
}
