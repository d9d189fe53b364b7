/**
 * Sentiment Scorer Service
 *
 * Scores normalized text on a -1 to +1 scale. The base score is the VADER
 * compound score; a trading-term table then biases it toward the vocabulary
 * of retail and institutional market commentary.
 *
 * Combination happens in VADER's raw valence space: the compound score is
 * mapped back through the inverse of x / sqrt(x^2 + alpha), the term weights
 * are added, and the sum is renormalized. The mapping is strictly monotonic,
 * so extra positive terms always raise the score and never saturate it.
 */

import { SentimentIntensityAnalyzer } from 'vader-sentiment';
import tradingTerms from '../data/trading-terms.json';
import { RawItem, ScoredItem } from '../types/sentiment';
import { TextNormalizer } from './text-normalizer';

/**
 * Trading-term lexicon configuration
 */
export interface TradingLexicon {
  /** Signed weights in VADER valence units; keys may span several words */
  terms: Record<string, number>;
  negators: string[];
  /** Number of preceding tokens searched for a negator */
  negationWindow: number;
  /** Applied with flipped sign to a negated term's weight */
  negatedMultiplier: number;
}

export interface TermMatch {
  term: string;
  weight: number;
  negated: boolean;
  contribution: number;
}

export interface ScoreBreakdown {
  baseScore: number;
  boost: number;
  score: number;
  matches: TermMatch[];
}

/** VADER normalization constant */
const VADER_ALPHA = 15;

/** Keeps the inverse mapping finite */
const MAX_BASE_MAGNITUDE = 0.9999;

export const DEFAULT_TRADING_LEXICON: TradingLexicon = {
  terms: tradingTerms.terms,
  negators: tradingTerms.negators,
  negationWindow: tradingTerms.negationWindow,
  negatedMultiplier: tradingTerms.negatedMultiplier
};

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}\p{Extended_Pictographic}$]+|[^\p{L}\p{N}\p{Extended_Pictographic}]+$/gu;
const PICTOGRAPH = /(\p{Extended_Pictographic})/gu;

const CURLY_APOSTROPHE = /[\u2018\u2019]/g;

/**
 * Split normalized text into tokens; emoji become standalone tokens
 */
export function tokenize(text: string): string[] {
  return text
    .replace(PICTOGRAPH, ' $1 ')
    .split(/\s+/)
    .map(token => token.replace(EDGE_PUNCTUATION, ''))
    .filter(token => token.length > 0);
}

/**
 * Clamp a value to the [-1, 1] range
 */
export function clampScore(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

/**
 * Sentiment Scorer
 */
export class SentimentScorer {
  private readonly lexicon: TradingLexicon;
  private readonly negators: Set<string>;
  private readonly maxPhraseLength: number;

  constructor(lexicon: TradingLexicon = DEFAULT_TRADING_LEXICON) {
    this.lexicon = lexicon;
    this.negators = new Set(lexicon.negators.map(n => n.toLowerCase()));
    this.maxPhraseLength = Object.keys(lexicon.terms)
      .reduce((max, term) => Math.max(max, tokenize(term).length), 1);
  }

  /**
   * Score normalized text
   *
   * @param text - Text already passed through TextNormalizer
   * @returns Score in [-1, 1]; exactly 0 for empty or whitespace-only text
   */
  score(text: string): number {
    return this.explain(text).score;
  }

  /**
   * Score text and report how each trading term contributed
   */
  explain(text: string): ScoreBreakdown {
    if (typeof text !== 'string' || text.trim().length === 0) {
      return { baseScore: 0, boost: 0, score: 0, matches: [] };
    }

    const baseScore = this.baseScore(text);
    const matches = this.matchTerms(tokenize(text));
    const boost = matches.reduce((sum, m) => sum + m.contribution, 0);

    if (matches.length === 0) {
      return { baseScore, boost: 0, score: clampScore(baseScore), matches };
    }

    const raw = toValence(baseScore) + boost;
    const score = clampScore(raw / Math.sqrt(raw * raw + VADER_ALPHA));

    return { baseScore, boost, score, matches };
  }

  /**
   * Normalize and score a raw item
   */
  scoreItem(item: RawItem): ScoredItem {
    const normalizedText = TextNormalizer.normalize(item.text);
    return {
      ...item,
      normalizedText,
      sentiment: this.score(normalizedText)
    };
  }

  scoreItems(items: RawItem[]): ScoredItem[] {
    return items.map(item => this.scoreItem(item));
  }

  private baseScore(text: string): number {
    const { compound } = SentimentIntensityAnalyzer.polarity_scores(text);
    return Number.isFinite(compound) ? clampScore(compound) : 0;
  }

  /**
   * Find trading terms, longest phrase first, and apply negation
   *
   * A negated term contributes the opposite sign at reduced magnitude.
   */
  private matchTerms(tokens: string[]): TermMatch[] {
    const matches: TermMatch[] = [];
    let i = 0;

    while (i < tokens.length) {
      let matchedLength = 0;

      for (let n = Math.min(this.maxPhraseLength, tokens.length - i); n >= 1; n--) {
        const phrase = tokens.slice(i, i + n).join(' ');
        const weight = this.lexicon.terms[phrase];
        if (weight !== undefined) {
          const negated = this.isNegated(tokens, i);
          matches.push({
            term: phrase,
            weight,
            negated,
            contribution: negated ? -weight * this.lexicon.negatedMultiplier : weight
          });
          matchedLength = n;
          break;
        }
      }

      i += matchedLength > 0 ? matchedLength : 1;
    }

    return matches;
  }

  private isNegated(tokens: string[], index: number): boolean {
    const from = Math.max(0, index - this.lexicon.negationWindow);
    for (let j = from; j < index; j++) {
      const token = tokens[j].replace(CURLY_APOSTROPHE, "'");
      if (this.negators.has(token) || token.endsWith("n't")) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Inverse of VADER's normalization x / sqrt(x^2 + alpha)
 */
function toValence(compound: number): number {
  const c = Math.max(-MAX_BASE_MAGNITUDE, Math.min(MAX_BASE_MAGNITUDE, compound));
  return (c * Math.sqrt(VADER_ALPHA)) / Math.sqrt(1 - c * c);
}
