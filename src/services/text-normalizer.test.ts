/**
 * Text Normalizer Tests
 */

import * as fc from 'fast-check';
import { TextNormalizer } from './text-normalizer';

describe('TextNormalizer', () => {
  describe('normalize', () => {
    it('should strip HTML tags and lowercase', () => {
      expect(TextNormalizer.normalize('<p>Hello <b>World</b></p>')).toBe('hello world');
    });

    it('should drop script and style blocks entirely', () => {
      expect(TextNormalizer.normalize('Buy <script>alert(1)</script>now')).toBe('buy now');
      expect(TextNormalizer.normalize('<style>p { color: red }</style>Calls')).toBe('calls');
    });

    it('should decode named and numeric entities', () => {
      expect(TextNormalizer.normalize('AT&amp;T &lt;3 &#36;AAPL &#x1F680;')).toBe('at&t <3 $aapl 🚀');
    });

    it('should leave unknown entities untouched', () => {
      expect(TextNormalizer.normalize('a &foo; b')).toBe('a &foo; b');
    });

    it('should keep link labels and drop images', () => {
      expect(
        TextNormalizer.normalize('## Earnings **beat** [read more](https://example.com) ![chart](img.png)')
      ).toBe('earnings beat read more');
    });

    it('should strip quote and list markers', () => {
      expect(TextNormalizer.normalize('> quoted\n- item one\n* item two')).toBe('quoted item one item two');
    });

    it('should strip underscore emphasis but keep inner underscores', () => {
      expect(TextNormalizer.normalize('__really__ _good_')).toBe('really good');
      expect(TextNormalizer.normalize('snake_case')).toBe('snake_case');
    });

    it('should remove inline code markers', () => {
      expect(TextNormalizer.normalize('run `npm test` now')).toBe('run npm test now');
    });

    it('should replace typographic apostrophes with plain ones', () => {
      expect(TextNormalizer.normalize('Don\u2019t sell \u2018em')).toBe("don't sell 'em");
    });

    it('should return empty string for empty or whitespace-only input', () => {
      expect(TextNormalizer.normalize('')).toBe('');
      expect(TextNormalizer.normalize('   \n\t ')).toBe('');
    });

    it('should never throw and always yield trimmed, single-spaced, lowercase text', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 200 }), (raw) => {
          const result = TextNormalizer.normalize(raw);
          expect(result).toBe(result.trim());
          expect(/\s\s/.test(result)).toBe(false);
          expect(result).toBe(result.toLowerCase());
        }),
        { numRuns: 100 }
      );
    });
  });
});
