/**
 * HTML to line-oriented text
 *
 * Transcript pages put one speaker label or paragraph per block element.
 * Converting block boundaries to newlines keeps that layout for the
 * attributor, which works line by line.
 */

const UNICODE_PUNCTUATION: Record<string, string> = {
  '\u2018': "'", // left single
  '\u2019': "'", // right single
  '\u201C': '"', // left double
  '\u201D': '"', // right double
  '\u2013': '-', // en dash
  '\u2014': '-', // em dash
  '\u00A0': ' ', // no-break space
};

const PUNCTUATION_REGEX = new RegExp(Object.keys(UNICODE_PUNCTUATION).join('|'), 'g');

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const BLOCK_TAGS = 'p|div|li|h[1-6]|tr|pre|blockquote|section|article|header|footer|ul|ol|table';

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code =
        entity[1] === 'x' || entity[1] === 'X'
          ? parseInt(entity.slice(2), 16)
          : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Replace curly quotes, long dashes and no-break spaces with ASCII
 */
export function normalizePunctuation(text: string): string {
  return text.replace(PUNCTUATION_REGEX, (ch) => UNICODE_PUNCTUATION[ch] ?? ch);
}

/**
 * Convert HTML markup to plain text with one block per line
 */
export function htmlToText(html: string): string {
  const text = html
    .replace(/<(head|script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(new RegExp(`</(?:${BLOCK_TAGS})\\s*>`, 'gi'), '\n')
    .replace(new RegExp(`<(?:${BLOCK_TAGS})\\b[^>]*>`, 'gi'), '\n')
    .replace(/<[^>]+>/g, '');

  return normalizePunctuation(decodeEntities(text))
    .split(/\r\n|\n|\r/)
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
