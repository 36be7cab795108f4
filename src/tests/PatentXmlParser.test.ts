// src/tests/PatentXmlParser.test.ts
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_FIELD_MAP, FieldMap } from '../config/field-map';
import { applyFieldMap, parsePatentXml, parsePatentXmlFile } from '../parsers/PatentXmlParser';
import { ParseError } from '../types/errors';
import { makeTempDir, readFixture } from './helpers';

describe('parsePatentXml', () => {
  it('should extract every mapped field from a full record', () => {
    const record = parsePatentXml(readFixture('full-record.xml'), 'full-record.xml');

    expect(record).toEqual({
      id: '202401234',
      title: '散熱模組',
      classifications: ['H01L 21/02', 'H01L 23/00', 'G06F 1/16'],
      images: ['202401234-D0001.png', '202401234-D0002.png'],
      kind: 'A',
      applicationNumber: '112100042',
      applicationDate: '20230105',
      publicationDate: '20240301',
      applicants: ['範例科技股份有限公司', 'Example Tech & Co.'],
      inventors: ['王小明'],
      abstract: '一種散熱模組，包含熱管與鰭片。',
      sourceFile: 'full-record.xml',
    });
  });

  it('should default missing fields to empty values', () => {
    const record = parsePatentXml(readFixture('minimal-record.xml'), 'A/minimal-record.xml');

    expect(record.id).toBe('P001');
    expect(record.title).toBe('Widget');
    expect(record.classifications).toEqual(['C1', 'C2']);
    expect(record.images).toEqual([]);
    expect(record.applicants).toEqual([]);
    expect(record.kind).toBe('');
    expect(record.abstract).toBe('');
  });

  it('should keep leading zeros in numbers and dates', () => {
    const xml = '<tw-patent-grant><bibliographic-data><publication-reference><document-id>' +
      '<doc-number>00123</doc-number><date>20240105</date></document-id></publication-reference>' +
      '</bibliographic-data></tw-patent-grant>';

    const record = parsePatentXml(xml, 'x.xml');

    expect(record.id).toBe('00123');
    expect(record.publicationDate).toBe('20240105');
  });

  it('should fall back to the root attribute, then the file name, for the id', () => {
    const withAttribute = parsePatentXml('<tw-patent-pub doc-number="TW555"><abstract>x</abstract></tw-patent-pub>', 'a.xml');
    const withNothing = parsePatentXml('<tw-patent-pub><abstract>x</abstract></tw-patent-pub>', 'sub/I123456.XML');

    expect(withAttribute.id).toBe('TW555');
    expect(withNothing.id).toBe('I123456');
  });

  it('should find elements nested at an unexpected depth', () => {
    const xml = '<patent-document><front><meta><invention-title>Deep title</invention-title></meta>' +
      '<classification-ipcr><text>F16H 1/00</text></classification-ipcr></front></patent-document>';

    const record = parsePatentXml(xml, 'deep.xml');

    expect(record.title).toBe('Deep title');
    expect(record.classifications).toEqual(['F16H 1/00']);
  });

  it('should keep inline markup in titles and names in document order', () => {
    const xml = '<tw-patent-pub><bibliographic-data>' +
      '<invention-title lang="en">Method for H<sub>2</sub>O splitting</invention-title>' +
      '<parties><inventors><inventor><addressbook><name>Jos<i>é</i> Ruiz</name></addressbook></inventor></inventors></parties>' +
      '</bibliographic-data></tw-patent-pub>';

    const record = parsePatentXml(xml, 'sub.xml');

    expect(record.title).toBe('Method for H2O splitting');
    expect(record.inventors).toEqual(['José Ruiz']);
  });

  it('should collect applicants given by name or by organisation in source order', () => {
    const xml = '<tw-patent-pub><bibliographic-data><parties><applicants>' +
      '<applicant sequence="1"><addressbook><name>Alice</name></addressbook></applicant>' +
      '<applicant sequence="2"><addressbook><orgname>Acme Corp</orgname></addressbook></applicant>' +
      '<applicant sequence="3"><addressbook><name>Bob</name></addressbook></applicant>' +
      '</applicants></parties></bibliographic-data></tw-patent-pub>';

    const record = parsePatentXml(xml, 'mixed.xml');

    expect(record.applicants).toEqual(['Alice', 'Acme Corp', 'Bob']);
  });

  it('should accept an empty root element', () => {
    const record = parsePatentXml('<tw-patent-pub/>', 'EMPTY.xml');

    expect(record.id).toBe('EMPTY');
    expect(record.title).toBe('');
  });

  it('should ignore a byte order mark', () => {
    const record = parsePatentXml('\uFEFF' + readFixture('minimal-record.xml'), 'bom.xml');
    expect(record.id).toBe('P001');
  });

  it('should reject malformed XML with a ParseError', () => {
    expect(() => parsePatentXml(readFixture('malformed.xml'), 'malformed.xml')).toThrow(ParseError);
    expect(() => parsePatentXml(readFixture('malformed.xml'), 'malformed.xml')).toThrow(/^malformed\.xml: Malformed XML \(line \d+\)/);
  });

  it('should reject a document with an unknown root element', () => {
    expect(() => parsePatentXml(readFixture('wrong-root.xml'), 'wrong-root.xml')).toThrow(
      'wrong-root.xml: Missing expected root element (expected one of tw-patent-pub, tw-patent-grant, ' +
        'patent-document, patent-publication; found us-patent-grant)'
    );
  });
});

describe('applyFieldMap', () => {
  const root = {
    cpc: { text: ['Y02E 10/50'] },
    ipc: { text: ['H02S 40/00', 'H01L 31/04'] },
  };

  it('should stop at the first path that yields values', () => {
    const fieldMap: FieldMap = {
      rootElements: ['doc'],
      rules: [{ kind: 'multiple', key: 'classifications', column: 'classifications', paths: ['ipc/text', 'cpc/text'] }],
    };

    expect(applyFieldMap(root, fieldMap, 'doc').classifications).toEqual(['H02S 40/00', 'H01L 31/04']);
  });

  it('should concatenate every path when mergePaths is set', () => {
    const fieldMap: FieldMap = {
      rootElements: ['doc'],
      rules: [
        {
          kind: 'multiple',
          key: 'classifications',
          column: 'classifications',
          paths: ['ipc/text', 'cpc/text'],
          mergePaths: true,
        },
      ],
    };

    expect(applyFieldMap(root, fieldMap, 'doc').classifications).toEqual(['H02S 40/00', 'H01L 31/04', 'Y02E 10/50']);
  });

  it('should keep duplicate values', () => {
    const fields = applyFieldMap({ drawings: { figure: [{ img: { '@_file': 'a.png' } }, { img: { '@_file': 'a.png' } }] } }, DEFAULT_FIELD_MAP, 'x');
    expect(fields.images).toEqual(['a.png', 'a.png']);
  });
});

describe('parsePatentXmlFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('patent-parser-');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report the source file relative to the dataset directory', () => {
    fs.mkdirSync(path.join(tempDir, 'batch1'));
    const filePath = path.join(tempDir, 'batch1', 'record.xml');
    fs.writeFileSync(filePath, readFixture('minimal-record.xml'));

    const record = parsePatentXmlFile(filePath, tempDir);

    expect(record.sourceFile).toBe('batch1/record.xml');
  });

  it('should turn a read failure into a ParseError', () => {
    expect(() => parsePatentXmlFile(path.join(tempDir, 'missing.xml'), tempDir)).toThrow(/^missing\.xml: Unreadable file: /);
  });
});
