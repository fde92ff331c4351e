import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { BatchDispatcher, buildDownloadOptions, isBatchSuccessful } from '../src/download/core/BatchDispatcher';
import { DownloadError } from '../src/download/core/errors';
import { HandlerRegistry } from '../src/download/core/HandlerRegistry';
import {
  BatchEvent,
  DownloadHandler,
  DownloadOptions,
  DownloadOutcome,
  HandlerTable,
  InstagramCredential,
  ManifestItem,
  SourceId,
} from '../src/download/core/types';

type DownloadMock = jest.Mock<Promise<DownloadOutcome>, [string, string, DownloadOptions]>;

function fakeHandler(sourceId: SourceId, failWhen: (url: string) => Error | null = () => null) {
  const download: DownloadMock = jest.fn(async (url: string, destination: string, _options: DownloadOptions) => {
    const failure = failWhen(url);
    if (failure) {
      throw failure;
    }
    return { sourceId, url, location: destination };
  });
  const handler: DownloadHandler = { sourceId, authenticatable: false, download };
  return { handler, download };
}

const item = (sourceHint: string, url: string): ManifestItem => ({ sourceHint, url });

describe('BatchDispatcher', () => {
  let destination: string;

  beforeEach(async () => {
    destination = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'dispatch-')), 'out');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(destination), { recursive: true, force: true });
  });

  function createDispatcher(
    failWhen?: (url: string) => Error | null,
    sources: SourceId[] = [SourceId.INSTAGRAM, SourceId.FACEBOOK, SourceId.REDDIT, SourceId.TWITTER],
  ) {
    const calls = new Map<SourceId, DownloadMock>();
    const table: Partial<HandlerTable> = {};
    for (const sourceId of sources) {
      const { handler, download } = fakeHandler(sourceId, failWhen);
      table[sourceId] = handler;
      calls.set(sourceId, download);
    }
    return { dispatcher: new BatchDispatcher(new HandlerRegistry(table)), calls };
  }

  const mixedItems = [
    item('instagram', 'https://www.instagram.com/p/abc/'),
    item('facebook', 'https://www.facebook.com/watch?v=123'),
    item('reddit', 'https://www.reddit.com/r/test/comments/xyz'),
    item('other', 'https://example.com/unsupported'),
    item('twitter', 'https://twitter.com/example/status/1'),
    item('twitter', 'https://twitter.com/example/status/2'),
  ];

  it('should respect the per-source limit and skip unsupported items', async () => {
    const { dispatcher, calls } = createDispatcher();

    const result = await dispatcher.execute(mixedItems, destination, { perSourceLimit: 1 });

    expect(result.attempted).toBe(4);
    expect(result.completed).toEqual([
      { sourceId: SourceId.INSTAGRAM, url: 'https://www.instagram.com/p/abc/' },
      { sourceId: SourceId.FACEBOOK, url: 'https://www.facebook.com/watch?v=123' },
      { sourceId: SourceId.REDDIT, url: 'https://www.reddit.com/r/test/comments/xyz' },
      { sourceId: SourceId.TWITTER, url: 'https://twitter.com/example/status/1' },
    ]);
    expect(result.skipped).toEqual([
      { sourceHint: 'other', url: 'https://example.com/unsupported', reason: 'unsupported' },
      { sourceHint: 'twitter', url: 'https://twitter.com/example/status/2', reason: 'per-source-limit' },
    ]);
    expect(result.errors).toEqual([]);
    expect(calls.get(SourceId.TWITTER)).toHaveBeenCalledTimes(1);
  });

  it('should pass auth=auto to Instagram and useSession to Facebook', async () => {
    const { dispatcher, calls } = createDispatcher();

    await dispatcher.execute(mixedItems, destination, { perSourceLimit: 1 });

    expect(calls.get(SourceId.INSTAGRAM)).toHaveBeenCalledWith(
      'https://www.instagram.com/p/abc/',
      destination,
      { auth: 'auto' },
    );
    expect(calls.get(SourceId.FACEBOOK)).toHaveBeenCalledWith(
      'https://www.facebook.com/watch?v=123',
      destination,
      { useSession: true },
    );
  });

  it('should give every item its own options object', async () => {
    const { dispatcher, calls } = createDispatcher();

    await dispatcher.execute(
      [item('twitter', 'https://twitter.com/a/status/1'), item('twitter', 'https://twitter.com/a/status/2')],
      destination,
    );

    const twitterCalls = calls.get(SourceId.TWITTER)?.mock.calls ?? [];
    expect(twitterCalls).toHaveLength(2);
    expect(twitterCalls[0][2]).not.toBe(twitterCalls[1][2]);
  });

  it('should record a failing item and keep going', async () => {
    const { dispatcher, calls } = createDispatcher((url) =>
      url.includes('fail') ? new Error('simulated failure') : null,
    );

    const result = await dispatcher.execute(
      [
        item('twitter', 'https://twitter.com/fail/status/99'),
        item('reddit', 'https://www.reddit.com/r/test/comments/ok'),
      ],
      destination,
    );

    expect(result.errors).toEqual([
      {
        sourceId: SourceId.TWITTER,
        url: 'https://twitter.com/fail/status/99',
        message: 'simulated failure',
        kind: 'unknown',
      },
    ]);
    expect(result.skipped).toEqual([]);
    expect(result.completed).toEqual([
      { sourceId: SourceId.REDDIT, url: 'https://www.reddit.com/r/test/comments/ok' },
    ]);
    expect(result.attempted).toBe(2);
    expect(calls.get(SourceId.REDDIT)).toHaveBeenCalledTimes(1);
    expect(isBatchSuccessful(result)).toBe(false);
  });

  it('should keep the kind of a DownloadError', async () => {
    const { dispatcher } = createDispatcher(() =>
      new DownloadError('auth_required', 'Instagram requires authentication for this post.', {
        source: SourceId.INSTAGRAM,
      }),
    );

    const result = await dispatcher.execute([item('', 'https://www.instagram.com/p/abc/')], destination);

    expect(result.errors[0].kind).toBe('auth_required');
    expect(result.errors[0].message).toBe('Instagram requires authentication for this post.');
  });

  it('should report unsupported before global-limit', async () => {
    const { dispatcher, calls } = createDispatcher();

    const result = await dispatcher.execute(
      [item('other', 'https://example.com/1'), item('twitter', 'https://twitter.com/a/status/1')],
      destination,
      { globalLimit: 0 },
    );

    expect(result.attempted).toBe(0);
    expect(result.skipped.map((entry) => entry.reason)).toEqual(['unsupported', 'global-limit']);
    expect(calls.get(SourceId.TWITTER)).not.toHaveBeenCalled();
  });

  it('should treat sources missing from the registry as unsupported', async () => {
    const { dispatcher } = createDispatcher(undefined, [SourceId.TWITTER]);

    const result = await dispatcher.execute([item('youtube', 'https://youtu.be/abc')], destination);

    expect(result.skipped).toEqual([
      { sourceHint: 'youtube', url: 'https://youtu.be/abc', reason: 'unsupported' },
    ]);
    expect(result.attempted).toBe(0);
  });

  it('should not call handlers on a dry run', async () => {
    const { dispatcher, calls } = createDispatcher();

    const result = await dispatcher.execute(mixedItems, destination, { dryRun: true, globalLimit: 2 });

    expect(result.attempted).toBe(2);
    expect(result.completed).toEqual([
      { sourceId: SourceId.INSTAGRAM, url: 'https://www.instagram.com/p/abc/' },
      { sourceId: SourceId.FACEBOOK, url: 'https://www.facebook.com/watch?v=123' },
    ]);
    for (const download of calls.values()) {
      expect(download).not.toHaveBeenCalled();
    }
  });

  it('should create the destination directory', async () => {
    const { dispatcher } = createDispatcher();

    await dispatcher.execute([], destination);

    const stats = await fs.stat(destination);
    expect(stats.isDirectory()).toBe(true);
  });

  it('should return a frozen result', async () => {
    const { dispatcher } = createDispatcher();

    const result = await dispatcher.execute(mixedItems, destination);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.completed)).toBe(true);
  });

  it('should emit events in processing order', async () => {
    const { dispatcher } = createDispatcher();
    const events: BatchEvent[] = [];
    for (const type of ['item:skipped', 'item:admitted', 'item:completed', 'batch:finished'] as const) {
      dispatcher.on(type, (event: BatchEvent) => events.push(event));
    }

    await dispatcher.execute(
      [item('other', 'https://example.com/1'), item('reddit', 'https://www.reddit.com/r/a/comments/b')],
      destination,
    );

    expect(events.map((event) => [event.type, event.index])).toEqual([
      ['item:skipped', 0],
      ['item:admitted', 1],
      ['item:completed', 1],
      ['batch:finished', 2],
    ]);
    expect(events[3].data).toEqual({ attempted: 1, completed: 1, skipped: 1, errors: 0 });
  });
});

describe('buildDownloadOptions', () => {
  it('should build per-source defaults', () => {
    expect(buildDownloadOptions(SourceId.INSTAGRAM)).toEqual({ auth: 'auto' });
    expect(buildDownloadOptions(SourceId.GOOGLE_DRIVE)).toEqual({});
    expect(buildDownloadOptions(SourceId.YOUTUBE)).toEqual({ useSession: true });
  });

  it('should pass a credential handle through for its source only', () => {
    const handle: InstagramCredential = {
      source: SourceId.INSTAGRAM,
      username: 'test-user',
      sessionFile: '/tmp/test-user.session',
    };

    expect(buildDownloadOptions(SourceId.INSTAGRAM, { [SourceId.INSTAGRAM]: handle })).toEqual({
      auth: 'auto',
      credentialHandle: handle,
    });
    expect(buildDownloadOptions(SourceId.TWITTER, { [SourceId.INSTAGRAM]: handle })).toEqual({
      useSession: true,
    });
  });
});
