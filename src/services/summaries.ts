import type { NewsResolution, PriceResolution, Provenance } from '../types.js';

function pct(part: number, total: number): string {
  if (!total) return '0';
  return ((part / total) * 100).toFixed(0);
}

function fmt(value: number | null | undefined, digits = 2): string {
  return value == null ? 'n/a' : value.toFixed(digits);
}

const PROVENANCE_NOTES: Record<Provenance, string> = {
  cached: 'served from the database',
  live: 'fetched live from the provider',
  'cached-stale': 'provider unavailable, showing stored data that may be out of date',
  unavailable: 'no data available from the database or the provider',
};

export function summarizePriceHistory(result: PriceResolution): string {
  const first = result.points[0];
  const last = result.points[result.points.length - 1];
  const title = result.company ? `${result.ticker} (${result.company.name})` : result.ticker;
  const lines = [`${title}: ${result.points.length} sessions, ${PROVENANCE_NOTES[result.provenance]}`];

  if (first && last) {
    const change = first.close ? ((last.close - first.close) / first.close) * 100 : null;
    lines.push(`Range: ${first.date} to ${last.date}`);
    lines.push(`Latest close: ${fmt(result.latestClose)} (${fmt(change)}% over the period)`);
    const indicators = Object.entries(last.indicators).map(([key, value]) => `${key} ${fmt(value)}`);
    if (indicators.length) lines.push(`Indicators on ${last.date}: ${indicators.join(', ')}`);
  }
  lines.push(`Annualized volatility: ${fmt(result.volatility)}%`);
  if (result.persisted === false) lines.push('Note: live rows could not be stored and will be fetched again.');
  return lines.join('\n');
}

export function summarizeNews(result: NewsResolution): string {
  const subject = result.ticker ?? 'General market';
  const total = result.documents.length;
  if (!total) {
    return `${subject}: no news articles (${PROVENANCE_NOTES[result.provenance]}).`;
  }

  const { positive, negative, neutral, averageScore } = result.sentimentSummary;
  const score = averageScore ?? 0;
  const narrative =
    score >= 0.3
      ? 'Coverage is clearly bullish.'
      : score >= 0.1
        ? 'Coverage leans positive.'
        : score > -0.1
          ? 'Coverage is balanced without a strong directional bias.'
          : score > -0.3
            ? 'Coverage leans cautious.'
            : 'Coverage is clearly bearish.';

  const series = [
    `${positive} articles (${pct(positive, total)}%) positive`,
    `${neutral} articles (${pct(neutral, total)}%) neutral`,
    `${negative} articles (${pct(negative, total)}%) negative`,
  ];
  const headlines = result.documents.slice(0, 5).map((d) => `${d.publishedAt.slice(0, 10)} ${d.source}: ${d.title}`);

  return [
    `${subject}: ${total} articles, ${PROVENANCE_NOTES[result.provenance]}`,
    `${narrative} Average sentiment ${fmt(averageScore, 3)}.`,
    `Sentiment distribution:\n- ${series.join('\n- ')}`,
    `Latest headlines:\n- ${headlines.join('\n- ')}`,
  ].join('\n\n');
}
