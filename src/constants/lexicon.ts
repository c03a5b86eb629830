/**
 * Investor lexicon for weighted term scoring.
 * Positive terms push sentiment up, negative terms push it down.
 */
export const INVESTOR_LEXICON: Readonly<Record<string, number>> = {
  // Strong positive (+2)
  'bull market': 2,
  bullish: 2,
  'record high': 2,
  outperform: 2,
  'beat expectations': 2,
  'record profit': 2,
  rally: 2,
  surge: 2,
  upgrade: 2,

  // Moderate positive (+1)
  dividend: 1,
  buyback: 1,
  growth: 1,
  partnership: 1,
  recovery: 1,
  momentum: 1,
  'raises guidance': 1,

  // Strong negative (-2)
  'bear market': -2,
  bearish: -2,
  crash: -2,
  recession: -2,
  bankruptcy: -2,
  fraud: -2,
  lawsuit: -2,
  downgrade: -2,
  'miss expectations': -2,
  'weak demand': -2,

  // Moderate negative (-1)
  volatility: -1,
  uncertainty: -1,
  slowdown: -1,
  decline: -1,
  layoffs: -1,
  investigation: -1,
  inflation: -1,
  'cuts guidance': -1,
};
