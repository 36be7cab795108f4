// src/tests/xml-text-cleaner.test.ts
import { cleanXmlText, decodeXmlEntities } from '../utils/xml-text-cleaner';

describe('decodeXmlEntities', () => {
  it('should decode named entities', () => {
    expect(decodeXmlEntities('A &amp; B &lt;C&gt; &quot;d&quot; &apos;e&apos;')).toBe('A & B <C> "d" \'e\'');
  });

  it('should decode decimal and hex numeric entities', () => {
    expect(decodeXmlEntities('&#25955;&#x71B1;')).toBe('散熱');
  });

  it('should decode in a single pass', () => {
    expect(decodeXmlEntities('&amp;lt;')).toBe('&lt;');
  });

  it('should leave unknown entities and invalid code points alone', () => {
    expect(decodeXmlEntities('&bogus; &#x110000;')).toBe('&bogus; &#x110000;');
  });
});

describe('cleanXmlText', () => {
  it('should strip inline markup and normalize whitespace', () => {
    expect(cleanXmlText('\n  <p>A heat <b>pipe</b>\n and   fins.</p>  ')).toBe('A heat pipe and fins.');
  });

  it('should decode entities after stripping markup', () => {
    expect(cleanXmlText('x &lt;b&gt; y')).toBe('x <b> y');
  });

  it('should unwrap CDATA sections', () => {
    expect(cleanXmlText('<![CDATA[raw <text>]]>')).toBe('raw <text>');
  });

  it('should return an empty string for empty input', () => {
    expect(cleanXmlText('')).toBe('');
  });
});
