/**
 * Metadata Extractor
 *
 * Walks a root directory whose immediate subdirectories are datasets, parses
 * every XML file of each dataset into a PatentRecord and writes one
 * `<dataset>_metadata.csv` per dataset.
 *
 * A file that fails to parse is logged and skipped; the rest of its dataset is
 * still written. An unusable root, or no dataset to process, is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { columnsFor, DEFAULT_FIELD_MAP, DEFAULT_SEPARATOR, FieldMap } from '../config/field-map';
import { parsePatentXmlFile } from '../parsers/PatentXmlParser';
import { ConfigurationError, NotFoundError, ParseError } from '../types/errors';
import { DatasetResult, ExtractionSummary, MetadataRow, SkippedFile } from '../types/patent.types';
import { FileHelpers } from '../utils/file-helpers';
import { Logger, LogSink } from '../utils/logger';
import { toMetadataRow, writeCsv } from './CsvWriter';

export interface ExtractOptions {
  /** Where the CSV files go. Defaults to the parent of the root directory */
  outputDir?: string;
  /** Dataset subfolder names to include. Defaults to all */
  datasets?: string[];
  /** Joins multi-valued fields. Defaults to ';' */
  separator?: string;
  fieldMap?: FieldMap;
}

interface DatasetJob {
  name: string;
  directory: string;
  outputPath: string;
  fieldMap: FieldMap;
  separator: string;
}

export function metadataFileName(datasetName: string): string {
  return `${datasetName}_metadata.csv`;
}

export class MetadataExtractor {
  private logger: LogSink;

  constructor(logger: LogSink = new Logger('MetadataExtractor')) {
    this.logger = logger;
  }

  extract(rootPath: string, options: ExtractOptions = {}): ExtractionSummary {
    const root = this.resolveRoot(rootPath);
    const outputDir = path.resolve(options.outputDir ?? path.dirname(root));
    const fieldMap = options.fieldMap ?? DEFAULT_FIELD_MAP;
    const separator = options.separator ?? DEFAULT_SEPARATOR;

    const datasetNames = this.selectDatasets(root, outputDir, options.datasets);
    this.logger.info(`Extracting ${datasetNames.length} dataset(s) from ${root} into ${outputDir}`);

    FileHelpers.ensureDirectory(outputDir);

    const datasets = datasetNames.map(name =>
      this.extractDataset({
        name,
        directory: path.join(root, name),
        outputPath: path.join(outputDir, metadataFileName(name)),
        fieldMap,
        separator,
      })
    );

    const summary: ExtractionSummary = {
      rootPath: root,
      outputDir,
      datasets,
      totalRows: datasets.reduce((sum, d) => sum + d.rowCount, 0),
      totalSkipped: datasets.reduce((sum, d) => sum + d.skipped.length, 0),
    };

    this.logger.info(
      `Done: ${summary.datasets.length} dataset(s), ${summary.totalRows} row(s), ${summary.totalSkipped} file(s) skipped`
    );
    return summary;
  }

  private resolveRoot(rootPath: string): string {
    const root = path.resolve(rootPath);

    if (!fs.existsSync(root)) {
      throw new NotFoundError(`Root path does not exist: ${root}`);
    }
    if (!fs.statSync(root).isDirectory()) {
      throw new NotFoundError(`Root path is not a directory: ${root}`);
    }
    try {
      fs.accessSync(root, fs.constants.R_OK);
    } catch {
      throw new NotFoundError(`Root path is not readable: ${root}`);
    }

    return root;
  }

  private selectDatasets(root: string, outputDir: string, requested?: string[]): string[] {
    // An output directory inside the root is never a dataset
    const available = FileHelpers.listSubdirectories(root)
      .filter(name => path.join(root, name) !== outputDir);
    let selected = available;

    if (requested && requested.length > 0) {
      for (const name of requested) {
        if (!available.includes(name)) {
          this.logger.warn(`Dataset not found under ${root}: ${name}`);
        }
      }
      const wanted = new Set(requested);
      selected = available.filter(name => wanted.has(name));
    }

    if (selected.length === 0) {
      throw new ConfigurationError(`No dataset subdirectories to process under ${root}`);
    }
    return selected;
  }

  private extractDataset(job: DatasetJob): DatasetResult {
    const files = FileHelpers.listXmlFiles(job.directory);
    const rows: MetadataRow[] = [];
    const skipped: SkippedFile[] = [];

    this.logger.info(`Dataset ${job.name}: ${files.length} XML file(s)`);
    if (files.length === 0) {
      this.logger.warn(`Dataset ${job.name} has no XML files; writing header only`);
    }

    for (const file of files) {
      try {
        const record = parsePatentXmlFile(path.join(job.directory, file), job.directory, job.fieldMap);
        rows.push(toMetadataRow(record, job.fieldMap, job.separator));
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        this.logger.warn(`Skipping ${job.name}/${error.filePath}: ${error.reason}`);
        skipped.push({ file: error.filePath, reason: error.reason });
      }
    }

    writeCsv(job.outputPath, columnsFor(job.fieldMap), rows);
    this.logger.info(`Wrote ${rows.length} row(s) to ${job.outputPath} (${skipped.length} skipped)`);

    return {
      name: job.name,
      directory: job.directory,
      outputPath: job.outputPath,
      fileCount: files.length,
      rowCount: rows.length,
      skipped,
    };
  }
}

/**
 * Extract every dataset under rootPath with the default logger
 */
export function extract(rootPath: string, options: ExtractOptions = {}): ExtractionSummary {
  return new MetadataExtractor().extract(rootPath, options);
}
