import type { Company, RawArticle } from '../types.js';
import { normalizeText } from '../utils/normalize.js';

export interface RelevanceAssessment {
  relevant: boolean;
  matchedTerms: string[];
  excludedTerm?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Evaluate an article for relevance to a ticker by checking company exclusions
 * first, then looking for the company name, its aliases, or the bare symbol.
 * The symbol must appear in upper case as a whole word so that "V" does not
 * match every "v".
 */
export function evaluateTickerRelevance(
  article: Pick<RawArticle, 'title' | 'summary'>,
  ticker: string,
  company: Company | null,
): RelevanceAssessment {
  const text = `${article.title} ${article.summary}`;
  const normalized = normalizeText(text);

  for (const exclusion of company?.exclude ?? []) {
    if (normalized.includes(exclusion)) {
      return { relevant: false, matchedTerms: [], excludedTerm: exclusion };
    }
  }

  const matchedTerms: string[] = [];
  for (const name of company ? [company.name, ...company.aliases] : []) {
    if (normalized.includes(name.toLowerCase())) matchedTerms.push(name);
  }
  if (new RegExp(`(^|[^A-Za-z0-9])\\$?${escapeRegExp(ticker)}(?![A-Za-z0-9])`).test(text)) {
    matchedTerms.push(ticker);
  }

  return { relevant: matchedTerms.length > 0, matchedTerms };
}
