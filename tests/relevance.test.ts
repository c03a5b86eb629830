import { describe, expect, it } from 'vitest';
import { findCompany } from '../src/constants/companies.js';
import { evaluateTickerRelevance } from '../src/services/relevance.js';

describe('evaluateTickerRelevance', () => {
  it('flags exclusion terms', () => {
    const result = evaluateTickerRelevance(
      { title: 'Five apple pie recipes for the holidays', summary: '' },
      'AAPL',
      findCompany('AAPL'),
    );
    expect(result.relevant).toBe(false);
    expect(result.excludedTerm).toBe('apple pie');
  });

  it('matches company names and aliases', () => {
    const result = evaluateTickerRelevance(
      { title: 'Google cloud revenue jumps', summary: 'Alphabet beat estimates.' },
      'GOOGL',
      findCompany('GOOGL'),
    );
    expect(result.relevant).toBe(true);
    expect(result.matchedTerms).toEqual(['Alphabet', 'Google']);
  });

  it('matches the symbol only as an upper-case word', () => {
    const visa = findCompany('V');
    expect(evaluateTickerRelevance({ title: 'Shares of $V rise', summary: '' }, 'V', visa).matchedTerms).toEqual(['V']);
    expect(evaluateTickerRelevance({ title: 'Vote v. verdict', summary: '' }, 'V', visa).relevant).toBe(false);
  });

  it('falls back to the symbol for untracked tickers', () => {
    expect(evaluateTickerRelevance({ title: 'IBM to buy a startup', summary: '' }, 'IBM', null).relevant).toBe(true);
  });
});
