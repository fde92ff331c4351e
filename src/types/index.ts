/**
 * Type definitions for the multisource downloader
 */

export type { AppConfig, ToolPaths } from './config';
