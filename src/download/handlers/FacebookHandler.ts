import { YtDlpHandler } from './YtDlpHandler';
import { SourceId } from '../core/types';

export class FacebookHandler extends YtDlpHandler {
    readonly sourceId = SourceId.FACEBOOK;

    protected readonly outputTemplate = 'facebook/%(uploader)s/%(title)s [%(id)s].%(ext)s';

    protected readonly identifierPatterns = [
        /\/videos\/(?:[\w.-]+\/)?(\d+)/,
        /[?&]v=(\d+)/,
        /\/reel\/(\d+)/,
        /fb\.watch\/([\w-]+)/,
        /\/share\/(?:[vr]\/)?([\w-]+)/,
    ];
}
