import { describe, it, expect } from 'vitest';
import {
  analysisFingerprint,
  canonicalJson,
  canonicalSubject,
  subjectSymbols,
} from '../analysis.fingerprint.js';
import type { AnalysisParams, AnalysisSubject, WeightedAllocation } from '../risk.types.js';

const params: AnalysisParams = {
  range: { start: '2024-01-01', end: '2024-03-01' },
  riskFreeRate: 0.02,
  minCorrelationSamples: 20,
};

const portfolio = (order: 'ab' | 'ba'): AnalysisSubject => {
  const a = { symbol: 'AAPL', weight: 0.6 };
  const b = { symbol: 'MSFT', weight: 0.4 };
  return { kind: 'PORTFOLIO', allocations: order === 'ab' ? [a, b] : [b, a] };
};

describe('analysis.fingerprint', () => {
  it('should serialize objects with sorted keys', () => {
    expect(canonicalJson({ b: 1, a: [true, null, { d: 'x', c: 2 }] })).toBe(
      '{"a":[true,null,{"c":2,"d":"x"}],"b":1}'
    );
  });

  it('should ignore allocation order', () => {
    expect(analysisFingerprint(portfolio('ab'), params)).toBe(analysisFingerprint(portfolio('ba'), params));
    expect(subjectSymbols(portfolio('ba'))).toEqual(['MSFT', 'AAPL']);
  });

  it('should change with anything that changes the result', () => {
    const base = analysisFingerprint(portfolio('ab'), params);

    expect(analysisFingerprint(portfolio('ab'), { ...params, riskFreeRate: 0.03 })).not.toBe(base);
    expect(
      analysisFingerprint(portfolio('ab'), { ...params, range: { start: '2024-01-02', end: '2024-03-01' } })
    ).not.toBe(base);
    expect(analysisFingerprint(portfolio('ab'), { ...params, benchmark: 'SPY' })).not.toBe(base);
    expect(
      analysisFingerprint(
        {
          kind: 'PORTFOLIO',
          allocations: [
            { symbol: 'AAPL', weight: 0.5 },
            { symbol: 'MSFT', weight: 0.5 },
          ],
        },
        params
      )
    ).not.toBe(base);
  });

  it('should reduce a portfolio to weights sorted by symbol', () => {
    const held: WeightedAllocation[] = [
      { symbol: 'MSFT', amount: 400, weight: 0.4 },
      { symbol: 'AAPL', amount: 600, weight: 0.6 },
    ];

    expect(canonicalSubject({ kind: 'PORTFOLIO', allocations: held })).toEqual({
      kind: 'PORTFOLIO',
      allocations: [
        { symbol: 'AAPL', weight: 0.6 },
        { symbol: 'MSFT', weight: 0.4 },
      ],
    });
  });

  it('should ignore dollar amounts', () => {
    const scaled: WeightedAllocation[] = [
      { symbol: 'AAPL', amount: 6, weight: 0.6 },
      { symbol: 'MSFT', amount: 4, weight: 0.4 },
    ];
    expect(analysisFingerprint({ kind: 'PORTFOLIO', allocations: scaled }, params)).toBe(
      analysisFingerprint(portfolio('ab'), params)
    );
  });

  it('should produce a sha256 hex digest', () => {
    expect(analysisFingerprint({ kind: 'SYMBOL', symbol: 'AAPL' }, params)).toMatch(/^[0-9a-f]{64}$/);
  });
});
