import { loadConfig } from '../src/utils/config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      sessionRoot: './.sessions',
      outputDir: 'downloads',
      retry: { attempts: 2, delayMs: 1000 },
      downloadTimeout: 0,
      tools: { ytDlp: 'yt-dlp', instaloader: 'instaloader', gdown: 'gdown' },
      youtubePotServer: undefined,
      logLevel: 'info',
      sentryDsn: undefined,
    });
  });

  it('should read every setting from the environment', () => {
    const config = loadConfig({
      SESSION_ROOT: '/var/lib/sessions',
      OUTPUT_DIR: '/data/media',
      RETRY_ATTEMPTS: '4',
      RETRY_DELAY_MS: '250',
      DOWNLOAD_TIMEOUT: '600000',
      YTDLP_PATH: '/opt/yt-dlp',
      INSTALOADER_PATH: '/opt/instaloader',
      GDOWN_PATH: '/opt/gdown',
      YOUTUBE_POT_SERVER: 'http://127.0.0.1:4416',
      LOG_LEVEL: 'debug',
      SENTRY_DSN: 'https://public@sentry.example.com/1',
    });

    expect(config).toEqual({
      sessionRoot: '/var/lib/sessions',
      outputDir: '/data/media',
      retry: { attempts: 4, delayMs: 250 },
      downloadTimeout: 600000,
      tools: { ytDlp: '/opt/yt-dlp', instaloader: '/opt/instaloader', gdown: '/opt/gdown' },
      youtubePotServer: 'http://127.0.0.1:4416',
      logLevel: 'debug',
      sentryDsn: 'https://public@sentry.example.com/1',
    });
  });

  it('should treat blank numbers as unset', () => {
    expect(loadConfig({ RETRY_DELAY_MS: '  ' }).retry.delayMs).toBe(1000);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ RETRY_DELAY_MS: 'soon' })).toThrow(
      'Invalid value for RETRY_DELAY_MS: expected a non-negative integer, got "soon"',
    );
    expect(() => loadConfig({ DOWNLOAD_TIMEOUT: '-5' })).toThrow(
      'Invalid value for DOWNLOAD_TIMEOUT: expected a non-negative integer, got "-5"',
    );
  });

  it('should require at least one attempt', () => {
    expect(() => loadConfig({ RETRY_ATTEMPTS: '0' })).toThrow(
      'Invalid value for RETRY_ATTEMPTS: at least one attempt is required',
    );
  });
});
