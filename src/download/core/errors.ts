import { DownloadErrorKind, SourceId } from './types';

const RETRYABLE_KINDS: ReadonlySet<DownloadErrorKind> = new Set(['transient_io']);

export class DownloadError extends Error {
    readonly kind: DownloadErrorKind;
    readonly source?: SourceId;
    readonly retryable: boolean;

    constructor(
        kind: DownloadErrorKind,
        message: string,
        options: { source?: SourceId; cause?: unknown } = {},
    ) {
        super(message, { cause: options.cause });
        this.name = 'DownloadError';
        this.kind = kind;
        this.source = options.source;
        this.retryable = RETRYABLE_KINDS.has(kind);
    }
}

export function isDownloadError(value: unknown): value is DownloadError {
    return value instanceof DownloadError;
}

export function invalidInput(source: SourceId, message: string): DownloadError {
    return new DownloadError('invalid_input', message, { source });
}

export function authRequired(source: SourceId, message: string, cause?: unknown): DownloadError {
    return new DownloadError('auth_required', message, { source, cause });
}
