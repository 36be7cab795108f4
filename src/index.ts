// src/index.ts - library entry point
export { extract, ExtractOptions, MetadataExtractor, metadataFileName } from './services/MetadataExtractor';
export { applyFieldMap, parsePatentXml, parsePatentXmlFile } from './parsers/PatentXmlParser';
export { selectValues } from './parsers/XmlPathSelector';
export {
  columnsFor,
  DEFAULT_FIELD_MAP,
  DEFAULT_SEPARATOR,
  FieldMap,
  FieldRule,
  MultiFieldRule,
  SingleFieldRule,
} from './config/field-map';
export { escapeCsv, renderCsv, toMetadataRow, writeCsv } from './services/CsvWriter';
export { DownloadOrchestrator, DownloadSummary, normalizeYear } from './services/DownloadOrchestrator';
export { extractFtpsLinks, LinkDiscoveryService, LinkSource } from './services/LinkDiscoveryService';
export { MirrorResult, MirrorService, MirrorStatus } from './services/MirrorService';
export {
  ConfigurationError,
  ExternalToolError,
  HarvesterError,
  NotFoundError,
  ParseError,
} from './types/errors';
export * from './types/patent.types';
