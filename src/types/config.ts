import { RetryPolicy } from '../download/core/types';

export interface ToolPaths {
  ytDlp: string;
  instaloader: string;
  gdown: string;
}

export interface AppConfig {
  sessionRoot: string;
  outputDir: string;
  retry: RetryPolicy;
  /** Per-process timeout for external tools in ms, 0 for none */
  downloadTimeout: number;
  tools: ToolPaths;
  youtubePotServer?: string;
  logLevel: string;
  sentryDsn?: string;
}
