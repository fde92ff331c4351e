/**
 * TwitterHandler - Tweets with video or images, including x.com and the
 * fxtwitter/vxtwitter mirrors
 */

import { YtDlpHandler } from './YtDlpHandler';
import { SourceId } from '../core/types';

export class TwitterHandler extends YtDlpHandler {
    readonly sourceId = SourceId.TWITTER;

    protected readonly outputTemplate = 'twitter/%(uploader_id)s/%(upload_date)s_%(id)s.%(ext)s';

    protected readonly identifierPatterns = [
        /\/status(?:es)?\/(\d+)/,
    ];
}
