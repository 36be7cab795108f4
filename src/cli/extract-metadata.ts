#!/usr/bin/env node
// src/cli/extract-metadata.ts
import { Command, CommanderError } from 'commander';
import * as dotenv from 'dotenv';
import { ExtractorConfig, loadExtractorConfig, parseList } from '../config/extractor-config';
import { ExtractOptions, MetadataExtractor } from '../services/MetadataExtractor';
import { HarvesterError } from '../types/errors';
import { getLogFilePaths, Logger, LogSink } from '../utils/logger';
import { initializeLogger } from '../utils/log-config-loader';

export interface ExtractCliOptions {
  root: string;
  output?: string;
  datasets?: string[];
  separator?: string;
  config?: string;
}

/**
 * Command-line flags win over the config file
 */
export function resolveExtractOptions(cli: ExtractCliOptions, fileConfig: ExtractorConfig): ExtractOptions {
  return {
    outputDir: cli.output ?? fileConfig.outputDir,
    datasets: cli.datasets ?? fileConfig.datasets,
    separator: cli.separator ?? fileConfig.separator,
  };
}

/**
 * Run one extraction and map the outcome to a process exit code
 */
export function runExtraction(cli: ExtractCliOptions, logger: LogSink = new Logger('ExtractMetadata')): number {
  try {
    const fileConfig = cli.config ? loadExtractorConfig(cli.config) : {};
    const summary = new MetadataExtractor(logger).extract(cli.root, resolveExtractOptions(cli, fileConfig));

    for (const dataset of summary.datasets) {
      logger.info(
        `${dataset.name}: ${dataset.rowCount}/${dataset.fileCount} file(s) -> ${dataset.outputPath}` +
          (dataset.skipped.length > 0 ? ` (${dataset.skipped.length} skipped)` : '')
      );
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

export function buildProgram(): Command {
  return new Command()
    .name('extract-metadata')
    .description('Convert patent XML datasets into one metadata CSV per dataset folder')
    .version('1.0.0')
    .requiredOption('-r, --root <dir>', 'Directory whose subfolders are the datasets')
    .option('-o, --output <dir>', 'Output directory (default: alongside the root directory)')
    .option('-d, --datasets <names>', 'Comma-separated dataset subfolders to include', parseList)
    .option('-s, --separator <sep>', 'Separator for multi-valued fields (default: ";")')
    .option('-c, --config <path>', 'JSON config file (outputDir, datasets, separator)');
}

export function main(argv: string[]): number {
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
  const logger = new Logger('ExtractMetadata');
  const logFiles = getLogFilePaths();
  if (logFiles) {
    logger.info(`Logging to ${logFiles.combined}`);
  }
  return runExtraction(program.opts<ExtractCliOptions>(), logger);
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
