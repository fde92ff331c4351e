/**
 * SourceRouter - Maps a (hint, URL) pair to a source
 * Pure substring matching, so mirror and shortener hosts (fxtwitter, vxtwitter,
 * ddinstagram, ...) resolve to the platform they contain
 */

import { AliasRule, SourceId } from './types';

const rule = (alias: string, sourceId: SourceId): AliasRule => Object.freeze({ alias, sourceId });

// Order matters: the first rule whose alias occurs in the candidate wins
export const ALIAS_RULES: readonly AliasRule[] = Object.freeze([
    rule('drive.google.com', SourceId.GOOGLE_DRIVE),
    rule('docs.google.com', SourceId.GOOGLE_DRIVE),
    rule('googledrive', SourceId.GOOGLE_DRIVE),
    rule('googleusercontent', SourceId.GOOGLE_DRIVE),
    rule('instagram', SourceId.INSTAGRAM),
    // Also catches instagr.am and other instagr* mirrors
    rule('instagr', SourceId.INSTAGRAM),
    rule('ddinstagram', SourceId.INSTAGRAM),
    rule('threads', SourceId.THREADS),
    rule('tiktok', SourceId.TIKTOK),
    rule('douyin', SourceId.TIKTOK),
    rule('twitter', SourceId.TWITTER),
    rule('x.com', SourceId.TWITTER),
    rule('fxtwitter', SourceId.TWITTER),
    rule('vxtwitter', SourceId.TWITTER),
    rule('reddit', SourceId.REDDIT),
    rule('redd.it', SourceId.REDDIT),
    rule('facebook', SourceId.FACEBOOK),
    rule('fb.watch', SourceId.FACEBOOK),
    rule('fbcdn', SourceId.FACEBOOK),
    rule('youtube', SourceId.YOUTUBE),
    rule('youtu.be', SourceId.YOUTUBE),
    rule('youtubekids', SourceId.YOUTUBE),
]);

/**
 * Host part of a URL (with port, without scheme and path), or '' when the
 * URL does not parse
 */
export function hostOf(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return '';
    }
}

/**
 * First alias rule contained in the value, case-insensitive
 */
export function matchAlias(value: string, rules: readonly AliasRule[] = ALIAS_RULES): SourceId | null {
    const candidate = (value || '').toLowerCase();
    for (const { alias, sourceId } of rules) {
        if (candidate.includes(alias)) {
            return sourceId;
        }
    }
    return null;
}

/**
 * Resolve the source for a manifest entry. The hint is tried before the host.
 */
export function resolveSource(
    sourceHint: string,
    url: string,
    rules: readonly AliasRule[] = ALIAS_RULES,
): SourceId | null {
    for (const candidate of [sourceHint, hostOf(url)]) {
        const sourceId = matchAlias(candidate, rules);
        if (sourceId) {
            return sourceId;
        }
    }
    return null;
}
