// src/config/environment.ts
import { DownloaderEnvironment } from '../types/config.types';
import { ConfigurationError } from '../types/errors';

export const DEFAULT_SOURCE_URL = 'https://cloud.tipo.gov.tw/S220/opdata/detail/PatentPubXML';
const DEFAULT_PAGE_SETTLE_MS = 3000;

/**
 * Downloader settings from the environment (.env is loaded by the CLI)
 */
export function loadDownloaderEnvironment(env: NodeJS.ProcessEnv = process.env): DownloaderEnvironment {
  const settle = env.PAGE_SETTLE_MS ? parseInt(env.PAGE_SETTLE_MS, 10) : DEFAULT_PAGE_SETTLE_MS;
  if (isNaN(settle) || settle < 0) {
    throw new ConfigurationError(`PAGE_SETTLE_MS must be a non-negative integer, got "${env.PAGE_SETTLE_MS}"`);
  }

  return {
    sourceUrl: env.TIPO_SOURCE_URL || DEFAULT_SOURCE_URL,
    chromePath: env.CHROME_PATH || undefined,
    lftpPath: env.LFTP_PATH || 'lftp',
    pageSettleMs: settle,
  };
}
