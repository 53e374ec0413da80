/**
 * Analysis fingerprint: sha256 over canonical JSON of everything that
 * changes the result. Allocation order does not matter.
 */

import crypto from 'crypto';
import type { AnalysisParams, AnalysisSubject } from './risk.types.js';

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

export function canonicalJson(value: Json): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function subjectSymbols(subject: AnalysisSubject): string[] {
  return subject.kind === 'SYMBOL'
    ? [subject.symbol]
    : subject.allocations.map(a => a.symbol);
}

/**
 * The form results are computed and cached under: portfolio weights
 * stripped of anything else and sorted by symbol, so every caller that
 * shares a fingerprint also gets the same subject, symbol order and
 * correlation matrix layout.
 */
export function canonicalSubject(subject: AnalysisSubject): AnalysisSubject {
  if (subject.kind === 'SYMBOL') {
    return { kind: 'SYMBOL', symbol: subject.symbol };
  }
  return {
    kind: 'PORTFOLIO',
    allocations: subject.allocations
      .map(a => ({ symbol: a.symbol, weight: a.weight }))
      .sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0)),
  };
}

export function analysisFingerprint(subject: AnalysisSubject, params: AnalysisParams): string {
  const canonical = canonicalSubject(subject);
  const payload: Json = {
    subject: canonical.kind === 'SYMBOL'
      ? { kind: 'SYMBOL', symbol: canonical.symbol }
      : {
          kind: 'PORTFOLIO',
          weights: canonical.allocations.map(a => [a.symbol, a.weight]),
        },
    range: { start: params.range.start, end: params.range.end },
    riskFreeRate: params.riskFreeRate,
    minCorrelationSamples: params.minCorrelationSamples,
    benchmark: params.benchmark ?? null,
  };
  return crypto.createHash('sha256').update(canonicalJson(payload)).digest('hex');
}
