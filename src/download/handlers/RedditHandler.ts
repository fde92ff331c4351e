import { YtDlpHandler } from './YtDlpHandler';
import { SourceId } from '../core/types';

export class RedditHandler extends YtDlpHandler {
    readonly sourceId = SourceId.REDDIT;

    protected readonly outputTemplate = 'reddit/%(uploader)s/%(title)s [%(id)s].%(ext)s';

    protected readonly identifierPatterns = [
        /\/comments\/([a-z0-9]+)/i,
        /redd\.it\/([a-z0-9]+)/i,
        // Share links: /r/<sub>/s/<token>
        /\/r\/\w+\/s\/(\w+)/,
    ];
}
