// src/services/DownloadOrchestrator.ts
import { ConfigurationError, ExternalToolError } from '../types/errors';
import { FileHelpers } from '../utils/file-helpers';
import { Logger, LogSink } from '../utils/logger';
import { LinkSource } from './LinkDiscoveryService';
import { MirrorResult, MirrorService, UNKNOWN_COUNT } from './MirrorService';

export interface DownloadSummary {
  year: string;
  downloadRoot: string;
  totalLinks: number;
  successful: number;
  failed: number;
  timedOut: number;
  skipped: string[];
  results: MirrorResult[];
}

/**
 * Accepts 114 or "114"; anything that is not all digits is rejected
 */
export function normalizeYear(year: string | number): string {
  const value = String(year).trim();
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Year must be a number such as 114, got "${year}"`);
  }
  return value;
}

export class DownloadOrchestrator {
  private links: LinkSource;
  private mirrors: MirrorService;
  private logger: LogSink;

  constructor(links: LinkSource, mirrors: MirrorService, logger: LogSink = new Logger('Download')) {
    this.links = links;
    this.mirrors = mirrors;
    this.logger = logger;
  }

  /**
   * Discover the year's links and mirror each one under downloadRoot.
   * Throws when discovery fails, lftp is missing, or no link mirrored.
   */
  async run(year: string | number, downloadRoot: string): Promise<DownloadSummary> {
    const selectedYear = normalizeYear(year);
    FileHelpers.ensureDirectory(downloadRoot);

    const links = await this.links.discover(selectedYear);

    this.logger.info('Starting Phase 1: Fetching all remote directory counts...');
    const remoteCounts = new Map<string, number>();
    for (const link of links) {
      remoteCounts.set(link, await this.mirrors.getRemoteDirectoryCount(link));
    }

    const summary: DownloadSummary = {
      year: selectedYear,
      downloadRoot,
      totalLinks: links.length,
      successful: 0,
      failed: 0,
      timedOut: 0,
      skipped: [],
      results: [],
    };

    this.logger.info('Starting Phase 2: Mirroring links and verifying directory counts...');
    for (const link of links) {
      const expected = remoteCounts.get(link) ?? UNKNOWN_COUNT;
      if (expected === UNKNOWN_COUNT) {
        this.logger.warn(`Phase 2: Skipping ${link}; remote count was not obtained`);
        summary.skipped.push(link);
        summary.failed++;
        continue;
      }

      const result = await this.mirrors.mirror(link, downloadRoot, expected);
      summary.results.push(result);

      if (result.status === 'Success') {
        summary.successful++;
      } else {
        summary.failed++;
        if (result.status === 'Timeout') {
          summary.timedOut++;
        }
      }
    }

    this.logSummary(summary);

    if (summary.successful === 0) {
      throw new ExternalToolError('lftp', `All ${summary.totalLinks} link(s) failed to mirror for year ${selectedYear}`);
    }
    return summary;
  }

  private logSummary(summary: DownloadSummary): void {
    this.logger.info('Download process complete.');
    this.logger.info(`Total links processed: ${summary.totalLinks}`);
    this.logger.info(`Successful mirrors: ${summary.successful}`);
    this.logger.info(`Failed mirrors: ${summary.failed}`);
    if (summary.timedOut > 0) {
      this.logger.info(`Mirrors that timed out: ${summary.timedOut}`);
    }
  }
}
