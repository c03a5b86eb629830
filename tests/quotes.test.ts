import { describe, expect, it } from 'vitest';
import { mapChartResponse, rangeForSessions, type ChartResponse } from '../src/services/quotes.js';

// 2025-03-06 .. 2025-03-10, 14:30 UTC session opens
const MAR_6 = 1741271400;
const DAY = 86_400;

describe('rangeForSessions', () => {
  it('picks the smallest chart range covering the sessions', () => {
    expect(rangeForSessions(20)).toBe('1mo');
    expect(rangeForSessions(60)).toBe('3mo');
    expect(rangeForSessions(200)).toBe('1y');
    expect(rangeForSessions(3000)).toBe('max');
  });
});

describe('mapChartResponse', () => {
  it('maps sessions to ascending rows and skips sessions without a close', () => {
    const payload: ChartResponse = {
      chart: {
        result: [
          {
            meta: { symbol: 'AAPL' },
            timestamp: [MAR_6, MAR_6 + DAY, MAR_6 + 4 * DAY],
            indicators: {
              quote: [
                {
                  open: [10, 11, null],
                  high: [12, 13, null],
                  low: [9, 10, null],
                  close: [11, null, 14],
                  volume: [1000, 2000, null],
                },
              ],
              adjclose: [{ adjclose: [10.5, null, 13.5] }],
            },
          },
        ],
        error: null,
      },
    };

    expect(mapChartResponse('AAPL', payload)).toEqual([
      { ticker: 'AAPL', date: '2025-03-06', open: 10, high: 12, low: 9, close: 11, adjClose: 10.5, volume: 1000 },
      { ticker: 'AAPL', date: '2025-03-10', open: 14, high: 14, low: 14, close: 14, adjClose: 13.5, volume: 0 },
    ]);
  });

  it('keeps the last print when a date repeats', () => {
    const payload: ChartResponse = {
      chart: {
        result: [
          {
            meta: { symbol: 'AAPL' },
            timestamp: [MAR_6, MAR_6 + 3600],
            indicators: { quote: [{ close: [11, 12] }] },
          },
        ],
      },
    };

    const rows = mapChartResponse('AAPL', payload);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ date: '2025-03-06', close: 12, adjClose: null, volume: 0 });
  });

  it('returns no rows for an empty result', () => {
    expect(mapChartResponse('AAPL', { chart: { result: null } })).toEqual([]);
  });
});
