/**
 * Patent XML Parser
 *
 * Turns one patent publication XML document into a PatentRecord using a
 * declarative field map. Each output column has an ordered list of candidate
 * tag paths; repeated elements (classifications, images, parties) are
 * collected in full.
 *
 * A file fails with ParseError when it is unreadable, not well-formed, or its
 * root element is not one the field map accepts.
 */

import * as fs from 'fs';
import * as path from 'path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { DEFAULT_FIELD_MAP, FieldMap, MultiFieldRule, SingleFieldRule } from '../config/field-map';
import { PatentFields, PatentRecord } from '../types/patent.types';
import { describeError, ParseError } from '../types/errors';
import { ATTRIBUTE_PREFIX, isXmlElement, selectValues, TEXT_NODE_NAME, XmlElement } from './XmlPathSelector';

// ============================================================================
// XML Parser Configuration
// ============================================================================

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE_NAME,
  // Keep document numbers and dates as written ("0123", "20240105")
  parseTagValue: false,
  parseAttributeValue: false,
  // Entities are decoded once by the text cleaner
  processEntities: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
  // Text that may carry inline markup (<sub>, <i>); kept raw and flattened
  // in document order by the text cleaner
  stopNodes: ['*.abstract', '*.invention-title', '*.english-title', '*.name', '*.orgname'],
});

// ============================================================================
// Field Extraction
// ============================================================================

export function emptyPatentFields(): PatentFields {
  return {
    id: '',
    title: '',
    classifications: [],
    images: [],
    kind: '',
    applicationNumber: '',
    applicationDate: '',
    publicationDate: '',
    applicants: [],
    inventors: [],
    abstract: '',
  };
}

function resolveSingle(root: XmlElement, rule: SingleFieldRule, fileStem: string): string {
  for (const selector of rule.paths) {
    const value = selectValues(root, selector).find(text => text.length > 0);
    if (value) return value;
  }
  return rule.fallbackToFileName ? fileStem : '';
}

function resolveMultiple(root: XmlElement, rule: MultiFieldRule): string[] {
  const collected: string[] = [];
  for (const selector of rule.paths) {
    const values = selectValues(root, selector).filter(text => text.length > 0);
    if (values.length === 0) continue;
    collected.push(...values);
    if (!rule.mergePaths) break;
  }
  return collected;
}

/**
 * Apply every rule of the field map to a parsed root element
 */
export function applyFieldMap(root: XmlElement, fieldMap: FieldMap, fileStem: string): PatentFields {
  const fields = emptyPatentFields();

  for (const rule of fieldMap.rules) {
    if (rule.kind === 'single') {
      fields[rule.key] = resolveSingle(root, rule, fileStem);
    } else {
      fields[rule.key] = resolveMultiple(root, rule);
    }
  }

  return fields;
}

// ============================================================================
// Core Functions
// ============================================================================

function fileStemOf(sourceFile: string): string {
  return path.posix.basename(sourceFile).replace(/\.xml$/i, '');
}

function parseDocument(content: string, sourceFile: string): XmlElement {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(sourceFile, `Malformed XML (line ${line}): ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = xmlParser.parse(content);
  } catch (error) {
    throw new ParseError(sourceFile, `Malformed XML: ${describeError(error)}`);
  }

  if (!isXmlElement(parsed)) {
    throw new ParseError(sourceFile, 'Document has no root element');
  }
  return parsed;
}

/**
 * Parse XML text into a PatentRecord
 *
 * @param sourceFile - reported in the record and in any ParseError
 */
export function parsePatentXml(
  xml: string,
  sourceFile: string,
  fieldMap: FieldMap = DEFAULT_FIELD_MAP
): PatentRecord {
  const parsedDocument = parseDocument(xml.replace(/^\uFEFF/, ''), sourceFile);

  const rootName = fieldMap.rootElements.find(name => name in parsedDocument);
  if (!rootName) {
    const found = Object.keys(parsedDocument).join(', ') || 'none';
    throw new ParseError(
      sourceFile,
      `Missing expected root element (expected one of ${fieldMap.rootElements.join(', ')}; found ${found})`
    );
  }

  // <tw-patent-pub/> parses to an empty string
  const rootValue = parsedDocument[rootName];
  const root: XmlElement = isXmlElement(rootValue) ? rootValue : {};

  return {
    ...applyFieldMap(root, fieldMap, fileStemOf(sourceFile)),
    sourceFile,
  };
}

/**
 * Read and parse one XML file of a dataset
 *
 * @param filePath - absolute or cwd-relative path of the XML file
 * @param datasetDir - the dataset directory; sourceFile is relative to it
 */
export function parsePatentXmlFile(
  filePath: string,
  datasetDir: string,
  fieldMap: FieldMap = DEFAULT_FIELD_MAP
): PatentRecord {
  const sourceFile = path.relative(datasetDir, filePath).split(path.sep).join('/');

  let xml: string;
  try {
    xml = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ParseError(sourceFile, `Unreadable file: ${describeError(error)}`);
  }

  return parsePatentXml(xml, sourceFile, fieldMap);
}
