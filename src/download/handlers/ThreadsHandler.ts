import { YtDlpHandler } from './YtDlpHandler';
import { SourceId } from '../core/types';

export class ThreadsHandler extends YtDlpHandler {
    readonly sourceId = SourceId.THREADS;

    protected readonly outputTemplate = '%(title)s [%(id)s].%(ext)s';

    protected readonly identifierPatterns = [
        /\/post\/([\w-]+)/,
    ];
}
