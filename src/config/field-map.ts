// src/config/field-map.ts
import { PatentFields } from '../types/patent.types';

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? K : never }[keyof T];

export type SingleFieldKey = KeysOfType<PatentFields, string>;
export type MultiFieldKey = KeysOfType<PatentFields, string[]>;

/**
 * One output column whose value is the first non-empty match across `paths`,
 * tried in order.
 */
export interface SingleFieldRule {
  kind: 'single';
  key: SingleFieldKey;
  column: string;
  paths: string[];
  fallbackToFileName?: boolean;
}

/**
 * One output column holding every match of a repeated element. The first path
 * that yields anything wins unless `mergePaths` is set.
 */
export interface MultiFieldRule {
  kind: 'multiple';
  key: MultiFieldKey;
  column: string;
  paths: string[];
  mergePaths?: boolean;
}

export type FieldRule = SingleFieldRule | MultiFieldRule;

export interface FieldMap {
  // Root element names accepted as a patent record
  rootElements: string[];
  rules: FieldRule[];
}

export const SOURCE_FILE_COLUMN = 'source_file';
export const DEFAULT_SEPARATOR = ';';

/*
 * Paths are relative to the root element:
 *   a/b/c   child elements
 *   @name   attribute of the current element
 *   a|b     either child, per element, in that order
 *   **      any depth, including none
 */
export const DEFAULT_FIELD_MAP: FieldMap = {
  rootElements: ['tw-patent-pub', 'tw-patent-grant', 'patent-document', 'patent-publication'],
  rules: [
    {
      kind: 'single',
      key: 'id',
      column: 'patent_id',
      paths: [
        'bibliographic-data/publication-reference/document-id/doc-number',
        '@doc-number',
        'bibliographic-data/application-reference/document-id/doc-number',
      ],
      fallbackToFileName: true,
    },
    {
      kind: 'single',
      key: 'title',
      column: 'title',
      paths: ['bibliographic-data/invention-title', 'bibliographic-data/english-title', '**/invention-title'],
    },
    {
      kind: 'multiple',
      key: 'classifications',
      column: 'classifications',
      paths: [
        'bibliographic-data/classifications-ipcr/classification-ipcr/text',
        '**/classification-ipcr/text',
        '**/classification-cpc/text',
      ],
    },
    {
      kind: 'multiple',
      key: 'images',
      column: 'images',
      paths: ['drawings/figure/img/@file', '**/img/@file'],
    },
    {
      kind: 'single',
      key: 'kind',
      column: 'kind',
      paths: ['bibliographic-data/publication-reference/document-id/kind', '@kind'],
    },
    {
      kind: 'single',
      key: 'applicationNumber',
      column: 'application_number',
      paths: ['bibliographic-data/application-reference/document-id/doc-number'],
    },
    {
      kind: 'single',
      key: 'applicationDate',
      column: 'application_date',
      paths: ['bibliographic-data/application-reference/document-id/date', '@date-filed'],
    },
    {
      kind: 'single',
      key: 'publicationDate',
      column: 'publication_date',
      paths: ['bibliographic-data/publication-reference/document-id/date', '@date-publ'],
    },
    {
      kind: 'multiple',
      key: 'applicants',
      column: 'applicants',
      paths: [
        'bibliographic-data/parties/applicants/applicant/addressbook/name|orgname',
        '**/applicant/**/name|orgname',
      ],
    },
    {
      kind: 'multiple',
      key: 'inventors',
      column: 'inventors',
      paths: [
        'bibliographic-data/parties/inventors/inventor/addressbook/name',
        '**/inventor/**/name',
      ],
    },
    {
      kind: 'single',
      key: 'abstract',
      column: 'abstract',
      paths: ['abstract'],
    },
  ],
};

/**
 * CSV header for a field map: one column per rule, then the source file
 */
export function columnsFor(fieldMap: FieldMap): string[] {
  return [...fieldMap.rules.map(rule => rule.column), SOURCE_FILE_COLUMN];
}
