import Sentiment from 'sentiment';
import { INVESTOR_LEXICON } from '../constants/lexicon.js';
import type { SentimentLabel, SentimentScore } from '../types.js';
import { clamp, normalizeText, round4 } from '../utils/normalize.js';

const sentimentAnalyzer = new Sentiment();

const AFINN_WEIGHT = 0.7;
const LEXICON_WEIGHT = 0.3;
const LABEL_THRESHOLD = 0.1;

export const SENTIMENT_METHOD = 'afinn+investor-lexicon';

export interface SentimentScorer {
  score(text: string): SentimentScore;
}

/**
 * General sentiment from the "sentiment" comparative score, clamped to -1..1.
 */
export function scoreGeneral(text: string): number {
  const { comparative } = sentimentAnalyzer.analyze(text);
  return clamp(comparative || 0, -1, 1);
}

/**
 * Investor lexicon score: mean weight of matched terms scaled from -2..2 to -1..1.
 * Returns 0 when nothing matches, plus the matched terms.
 */
export function scoreLexicon(text: string): { score: number; matchedTerms: string[] } {
  const normalized = normalizeText(text);
  let sum = 0;
  const matchedTerms: string[] = [];
  for (const [term, weight] of Object.entries(INVESTOR_LEXICON)) {
    if (normalized.includes(term)) {
      sum += weight;
      matchedTerms.push(term);
    }
  }
  if (!matchedTerms.length) return { score: 0, matchedTerms };
  return { score: clamp(sum / (matchedTerms.length * 2), -1, 1), matchedTerms };
}

export function labelFor(score: number): SentimentLabel {
  if (score > LABEL_THRESHOLD) return 'positive';
  if (score < -LABEL_THRESHOLD) return 'negative';
  return 'neutral';
}

export class LexiconSentimentScorer implements SentimentScorer {
  constructor(private readonly now: () => Date = () => new Date()) {}

  score(text: string): SentimentScore {
    const general = scoreGeneral(text);
    const { score: lexicon } = scoreLexicon(text);
    const combined = round4(general * AFINN_WEIGHT + lexicon * LEXICON_WEIGHT);
    return {
      score: combined,
      label: labelFor(combined),
      method: SENTIMENT_METHOD,
      scoredAt: this.now().toISOString(),
    };
  }
}
