/**
 * TikTokHandler - Videos and photo posts; short links are resolved by yt-dlp
 */

import { YtDlpHandler } from './YtDlpHandler';
import { SourceId } from '../core/types';

export class TikTokHandler extends YtDlpHandler {
    readonly sourceId = SourceId.TIKTOK;

    protected readonly outputTemplate = '%(uploader)s/%(title)s [%(id)s].%(ext)s';

    protected readonly identifierPatterns = [
        /\/(?:video|photo)\/(\d+)/,
        /(?:vm|vt)\.tiktok\.com\/([\w-]+)/,
        /tiktok\.com\/t\/([\w-]+)/,
    ];
}
