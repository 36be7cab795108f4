// src/types/patent.types.ts

export interface PatentFields {
  id: string;
  title: string;
  classifications: string[];
  images: string[];
  kind: string;
  applicationNumber: string;
  applicationDate: string;
  publicationDate: string;
  applicants: string[];
  inventors: string[];
  abstract: string;
}

export interface PatentRecord extends PatentFields {
  sourceFile: string;  // relative to the dataset directory, '/'-separated
}

// One cell per column, in header order
export type MetadataRow = string[];

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface DatasetResult {
  name: string;
  directory: string;
  outputPath: string;
  fileCount: number;
  rowCount: number;
  skipped: SkippedFile[];
}

export interface ExtractionSummary {
  rootPath: string;
  outputDir: string;
  datasets: DatasetResult[];
  totalRows: number;
  totalSkipped: number;
}
