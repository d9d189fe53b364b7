/**
 * Text Normalizer Service - prepares raw mention text for scoring
 *
 * This service handles:
 * - Stripping HTML tags and decoding entities
 * - Stripping markdown (links keep their label, images are dropped)
 * - Collapsing whitespace and lowercasing
 *
 * Every function here is pure and total.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '...',
  mdash: '-',
  ndash: '-',
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"'
};

/**
 * Text Normalizer Service
 */
export const TextNormalizer = {
  /**
   * Normalize raw text: strip markup, collapse whitespace, lowercase
   *
   * @param raw - Raw text as returned by a source
   * @returns Normalized text, '' for empty input
   */
  normalize(raw: string): string {
    if (typeof raw !== 'string' || raw.length === 0) {
      return '';
    }

    let text = this.stripHtml(raw);
    text = this.decodeEntities(text);
    text = this.stripMarkdown(text);
    // typographic apostrophes, as in "don\u2019t"
    text = text.replace(/[\u2018\u2019]/g, "'");

    return text.replace(/\s+/g, ' ').trim().toLowerCase();
  },

  /**
   * Remove script/style blocks and HTML tags
   */
  stripHtml(text: string): string {
    return text
      .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<!--[\s\S]*?-->/g, ' ')
      .replace(/<\/?[a-z][^>]*>/gi, ' ');
  },

  /**
   * Decode named and numeric HTML entities; unknown entities are left as-is
   */
  decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity[0] === '#') {
        const codePoint = entity[1] === 'x' || entity[1] === 'X'
          ? parseInt(entity.slice(2), 16)
          : parseInt(entity.slice(1), 10);
        if (!Number.isFinite(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
          return match;
        }
        return String.fromCodePoint(codePoint);
      }
      return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    });
  },

  /**
   * Strip markdown markers while keeping readable content
   */
  stripMarkdown(text: string): string {
    return text
      // images first so the link rule does not keep their alt text
      .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')
      .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
      .replace(/```/g, ' ')
      .replace(/`/g, '')
      .replace(/^[ \t]{0,3}#{1,6}[ \t]+/gm, '')
      .replace(/^[ \t]*(?:>[ \t]?)+/gm, '')
      .replace(/^[ \t]*[-+*][ \t]+/gm, '')
      .replace(/\*{1,3}|~~/g, '')
      .replace(/(^|\s)_{1,2}(?=\S)/g, '$1')
      .replace(/(\S)_{1,2}(?=\s|$)/g, '$1');
  }
};
