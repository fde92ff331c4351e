import { AppConfig } from '../types';

/**
 * Parse a non-negative integer setting, falling back when unset
 */
function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid value for ${name}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const attempts = readInteger(env, 'RETRY_ATTEMPTS', 2);
  if (attempts < 1) {
    throw new Error('Invalid value for RETRY_ATTEMPTS: at least one attempt is required');
  }

  return {
    sessionRoot: env.SESSION_ROOT || './.sessions',
    outputDir: env.OUTPUT_DIR || 'downloads',
    retry: {
      attempts,
      delayMs: readInteger(env, 'RETRY_DELAY_MS', 1000),
    },
    downloadTimeout: readInteger(env, 'DOWNLOAD_TIMEOUT', 0),
    tools: {
      ytDlp: env.YTDLP_PATH || 'yt-dlp',
      instaloader: env.INSTALOADER_PATH || 'instaloader',
      gdown: env.GDOWN_PATH || 'gdown',
    },
    youtubePotServer: env.YOUTUBE_POT_SERVER || undefined,
    logLevel: env.LOG_LEVEL || 'info',
    sentryDsn: env.SENTRY_DSN || undefined,
  };
}
