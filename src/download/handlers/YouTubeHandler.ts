import { YtDlpHandler, YtDlpHandlerContext } from './YtDlpHandler';
import { DownloadOptions, SourceId, YtDlpParams } from '../core/types';

export interface YouTubeHandlerContext extends YtDlpHandlerContext {
    /** Base URL of a bgutil PO token server, when one is running */
    potServerUrl?: string;
}

export class YouTubeHandler extends YtDlpHandler {
    readonly sourceId = SourceId.YOUTUBE;

    protected readonly outputTemplate = 'youtube/%(channel)s/%(title)s [%(id)s].%(ext)s';

    protected readonly identifierPatterns = [
        /[?&]v=([\w-]+)/,
        /youtu\.be\/([\w-]+)/,
        /\/(?:shorts|embed|live)\/([\w-]+)/,
    ];

    private readonly potServerUrl?: string;

    constructor(context: YouTubeHandlerContext) {
        super(context);
        this.potServerUrl = context.potServerUrl;
    }

    /**
     * Get YouTube extractor arguments for PO Token
     */
    protected extraParams(_options: DownloadOptions): YtDlpParams {
        if (!this.potServerUrl) {
            return {};
        }
        return { 'extractor-args': `youtubepot-bgutilhttp:base_url=${this.potServerUrl}` };
    }
}
