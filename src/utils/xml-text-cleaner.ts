/**
 * XML Text Cleaner Utility
 *
 * Decodes XML entities and cleans text extracted from patent XML files.
 * The parser runs with entity processing off, so every value passes through
 * here exactly once.
 */

/**
 * Named entities seen in patent publications
 */
const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Decode a numeric entity body ("#160" or "#xA0")
 */
function decodeNumericEntity(body: string, original: string): string {
  const isHex = body[1] === 'x' || body[1] === 'X';
  const codePoint = parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10);

  try {
    return String.fromCodePoint(codePoint);
  } catch {
    // Invalid code point, keep original
    return original;
  }
}

/**
 * Decode all XML entities in a string in a single pass, so "&amp;lt;"
 * becomes "&lt;" and not "<".
 */
export function decodeXmlEntities(text: string): string {
  if (!text) return '';

  return text.replace(/&(#[xX][0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, body: string) => {
    if (body.startsWith('#')) {
      return decodeNumericEntity(body, match);
    }
    return XML_ENTITIES[body] ?? match;
  });
}

/**
 * Clean text extracted from XML:
 * - Remove markup (inline tags inside mixed content)
 * - Decode XML entities
 * - Keep CDATA content verbatim
 * - Normalize whitespace and trim
 */
export function cleanXmlText(text: string): string {
  if (!text) return '';

  return text
    .split(/(<!\[CDATA\[[\s\S]*?\]\]>)/)
    .map(part => {
      if (part.startsWith('<![CDATA[')) {
        return part.slice('<![CDATA['.length, -']]>'.length);
      }
      return decodeXmlEntities(part.replace(/<[^>]+>/g, ''));
    })
    .join('')
    .replace(/\s+/g, ' ')
    .trim();
}
