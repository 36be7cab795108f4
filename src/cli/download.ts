#!/usr/bin/env node
// src/cli/download.ts
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { loadDownloaderEnvironment } from '../config/environment';
import { DownloadOrchestrator, normalizeYear } from '../services/DownloadOrchestrator';
import { LinkDiscoveryService } from '../services/LinkDiscoveryService';
import { MirrorService } from '../services/MirrorService';
import { HarvesterError } from '../types/errors';
import { DownloaderEnvironment } from '../types/config.types';
import { Logger, LogSink } from '../utils/logger';
import { initializeLogger, loadLoggingConfig } from '../utils/log-config-loader';

export interface DownloadCliOptions {
  year: string;
  output?: string;
  sourceUrl?: string;
}

const NAVIGATION_TIMEOUT_MS = 60000;

function parseYear(value: string): string {
  try {
    return normalizeYear(value);
  } catch {
    throw new InvalidArgumentError('Year must be a number such as 114.');
  }
}

export function buildProgram(): Command {
  return new Command()
    .name('download')
    .description('Mirror one year of patent publication XML from the open-data FTPS server')
    .version('1.0.0')
    .requiredOption('-y, --year <year>', 'Year to select on the source page (e.g. 114)', parseYear)
    .option('-o, --output <dir>', 'Download root (default: ./<year>)')
    .option('--source-url <url>', 'Page listing the FTPS links (default: TIPO_SOURCE_URL or the PatentPubXML page)');
}

export type OrchestratorFactory = (env: DownloaderEnvironment, cli: DownloadCliOptions) => DownloadOrchestrator;

/**
 * Browser discovery plus lftp mirroring, configured from the environment
 */
export const createDownloadOrchestrator: OrchestratorFactory = (env, cli) => {
  const discovery = new LinkDiscoveryService({
    sourceUrl: cli.sourceUrl ?? env.sourceUrl,
    chromePath: env.chromePath,
    settleMs: env.pageSettleMs,
    navigationTimeoutMs: NAVIGATION_TIMEOUT_MS,
  });
  return new DownloadOrchestrator(discovery, new MirrorService({ lftpPath: env.lftpPath }));
};

/**
 * Run one year's download and map the outcome to a process exit code
 */
export async function runDownload(
  cli: DownloadCliOptions,
  createOrchestrator: OrchestratorFactory = createDownloadOrchestrator,
  logger: LogSink = new Logger('Download'),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const downloadRoot = path.resolve(cli.output ?? cli.year);
    const orchestrator = createOrchestrator(loadDownloaderEnvironment(env), cli);

    const summary = await orchestrator.run(cli.year, downloadRoot);
    if (summary.failed > 0) {
      logger.warn(`${summary.failed} of ${summary.totalLinks} link(s) failed; partial data kept in ${downloadRoot}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof HarvesterError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

/**
 * logs/<year>-download.log under the configured log directory
 */
export function downloadLogPath(year: string): string {
  const logDirectory = loadLoggingConfig()?.logDirectory || 'logs';
  return path.join(process.cwd(), logDirectory, `${year}-download.log`);
}

export async function main(argv: string[]): Promise<number> {
  dotenv.config();
  const program = buildProgram().exitOverride();

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  initializeLogger();
  const cli = program.opts<DownloadCliOptions>();
  const logFile = downloadLogPath(cli.year);
  Logger.addFileTransport(logFile);
  new Logger('Download').info(`Logging to ${logFile}`);

  return runDownload(cli);
}

if (require.main === module) {
  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      new Logger('Download').error('Unexpected failure', error);
      process.exitCode = 1;
    });
}
