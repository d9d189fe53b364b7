/**
 * Sentiment Scorer Tests
 *
 * Covers the score range, empty input, trading-term boosting and negation.
 */

import * as fc from 'fast-check';
import { SentimentScorer, TradingLexicon, tokenize, clampScore } from './sentiment-scorer';
import { RawItem } from '../types/sentiment';

describe('SentimentScorer', () => {
  const scorer = new SentimentScorer();

  describe('tokenize', () => {
    it('should split emoji into standalone tokens and strip edge punctuation', () => {
      expect(tokenize('bullish af, to the moon🚀!')).toEqual(['bullish', 'af', 'to', 'the', 'moon', '🚀']);
    });

    it('should keep cashtags and inner apostrophes', () => {
      expect(tokenize("$aapl don't (sell)")).toEqual(['$aapl', "don't", 'sell']);
    });
  });

  describe('clampScore', () => {
    it('should clamp to [-1, 1]', () => {
      expect(clampScore(3)).toBe(1);
      expect(clampScore(-3)).toBe(-1);
      expect(clampScore(0.4)).toBe(0.4);
    });
  });

  describe('score', () => {
    it('should score empty and whitespace-only text as exactly 0', () => {
      expect(scorer.score('')).toBe(0);
      expect(scorer.score('   \t ')).toBe(0);
    });

    it('should keep every score within [-1, 1]', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 120 }), (text) => {
          const score = scorer.score(text);
          expect(score).toBeGreaterThanOrEqual(-1);
          expect(score).toBeLessThanOrEqual(1);
        }),
        { numRuns: 100 }
      );
    });

    it('should be deterministic', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 120 }), (text) => {
          expect(scorer.score(text)).toBe(scorer.score(text));
        }),
        { numRuns: 100 }
      );
    });

    it('should score trading slang higher than the bare term', () => {
      expect(scorer.score('bullish af, to the moon 🚀')).toBeGreaterThan(scorer.score('bullish'));
    });

    it('should flip the sign of a negated boost term', () => {
      expect(scorer.score('bullish')).toBeGreaterThan(0);
      expect(scorer.score('not bullish')).toBeLessThan(0);
    });

    it('should score bearish vocabulary below zero', () => {
      expect(scorer.score('bearish, bagholder city 📉')).toBeLessThan(0);
    });
  });

  describe('explain', () => {
    it('should match the longest phrase first', () => {
      const result = scorer.explain('to the moon');
      expect(result.matches).toEqual([
        { term: 'to the moon', weight: 2.5, negated: false, contribution: 2.5 }
      ]);
      expect(result.boost).toBe(2.5);
    });

    it('should apply negation at half magnitude with the opposite sign', () => {
      const result = scorer.explain("don't buy the dip");
      expect(result.matches).toEqual([
        { term: 'buy the dip', weight: 1.5, negated: true, contribution: -0.75 }
      ]);
    });

    it('should recognize negators written with a typographic apostrophe', () => {
      const result = scorer.explain('don\u2019t be bearish');

      expect(result.matches).toEqual([
        { term: 'bearish', weight: -2, negated: true, contribution: 1 }
      ]);
    });

    it("should treat any token ending in n't as a negator", () => {
      const result = scorer.explain("shan't go bearish");
      expect(result.matches).toEqual([
        { term: 'bearish', weight: -2, negated: true, contribution: 1 }
      ]);
    });

    it('should only look three tokens back for a negator', () => {
      const result = scorer.explain('not a b c bullish');
      expect(result.matches).toEqual([
        { term: 'bullish', weight: 2, negated: false, contribution: 2 }
      ]);
    });

    it('should return the base score unchanged when no trading term matches', () => {
      const result = scorer.explain('the weather is fine today');
      expect(result.matches).toEqual([]);
      expect(result.boost).toBe(0);
      expect(result.score).toBe(result.baseScore);
    });

    it('should use a custom lexicon when given one', () => {
      const lexicon: TradingLexicon = {
        terms: { 'green candle': 3 },
        negators: ['no'],
        negationWindow: 1,
        negatedMultiplier: 0.5
      };
      const custom = new SentimentScorer(lexicon);

      expect(custom.explain('one green candle').boost).toBe(3);
      expect(custom.explain('no green candle').boost).toBe(-1.5);
      expect(custom.explain('bullish').matches).toEqual([]);
    });
  });

  describe('scoreItem', () => {
    it('should normalize text before scoring', () => {
      const raw: RawItem = {
        itemId: 'REDDIT:abc',
        source: 'REDDIT',
        ticker: 'AAPL',
        timestamp: '2024-03-01T12:00:00.000Z',
        text: '<b>BULLISH</b> &amp; 🚀'
      };

      const scored = scorer.scoreItem(raw);

      expect(scored.normalizedText).toBe('bullish & 🚀');
      expect(scored.sentiment).toBeGreaterThan(0);
      expect(scored.itemId).toBe('REDDIT:abc');
    });

    it('should score every item in order', () => {
      const items: RawItem[] = ['bullish', 'bearish'].map((text, i) => ({
        itemId: `NEWS:${i}`,
        source: 'NEWS',
        ticker: 'AAPL',
        timestamp: '2024-03-01T12:00:00.000Z',
        text
      }));

      const scored = scorer.scoreItems(items);

      expect(scored.map(s => s.itemId)).toEqual(['NEWS:0', 'NEWS:1']);
      expect(scored[0].sentiment).toBeGreaterThan(scored[1].sentiment);
    });
  });
});
