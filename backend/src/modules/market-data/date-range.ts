/**
 * Date Range Arithmetic
 * =====================
 *
 * Day-granular interval math used by the store (coverage bookkeeping) and the
 * orchestrator (gap and staleness detection). Ranges are inclusive on both
 * ends; internally days are converted to integer day numbers.
 */

import { ValidationError } from '../../common/errors.js';
import type { CoverageSegment, DateRange, IsoDay } from './market-data.types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoDay(value: string): boolean {
  const m = ISO_DAY.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return d.toISOString().slice(0, 10) === value;
}

export function toDayNumber(day: IsoDay): number {
  return Math.floor(Date.parse(`${day}T00:00:00Z`) / DAY_MS);
}

export function fromDayNumber(n: number): IsoDay {
  return new Date(n * DAY_MS).toISOString().slice(0, 10);
}

export function dayOf(ts: number): IsoDay {
  return new Date(ts).toISOString().slice(0, 10);
}

export function addDays(day: IsoDay, delta: number): IsoDay {
  return fromDayNumber(toDayNumber(day) + delta);
}

export function validateRange(range: DateRange): DateRange {
  if (!isIsoDay(range.start) || !isIsoDay(range.end)) {
    throw new ValidationError(`Invalid date range ${range.start}..${range.end}: expected YYYY-MM-DD`);
  }
  if (range.start > range.end) {
    throw new ValidationError(`Invalid date range: start ${range.start} is after end ${range.end}`);
  }
  return range;
}

export function contains(outer: DateRange, inner: DateRange): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

export function intersect(a: DateRange, b: DateRange): DateRange | null {
  const start = a.start > b.start ? a.start : b.start;
  const end = a.end < b.end ? a.end : b.end;
  return start <= end ? { start, end } : null;
}

export function inRange(day: IsoDay, range: DateRange): boolean {
  return range.start <= day && day <= range.end;
}

/**
 * Sort and merge overlapping or adjacent ranges.
 */
export function mergeRanges(ranges: DateRange[]): DateRange[] {
  const sorted = [...ranges].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
  const out: DateRange[] = [];
  for (const r of sorted) {
    const last = out[out.length - 1];
    if (last && toDayNumber(r.start) <= toDayNumber(last.end) + 1) {
      if (r.end > last.end) last.end = r.end;
    } else {
      out.push({ start: r.start, end: r.end });
    }
  }
  return out;
}

/**
 * Parts of `range` not covered by any of `covered`.
 */
export function subtractRanges(range: DateRange, covered: DateRange[]): DateRange[] {
  const gaps: DateRange[] = [];
  let cursor = toDayNumber(range.start);
  const end = toDayNumber(range.end);

  for (const c of mergeRanges(covered)) {
    const cs = toDayNumber(c.start);
    const ce = toDayNumber(c.end);
    if (ce < cursor) continue;
    if (cs > end) break;
    if (cs > cursor) {
      gaps.push({ start: fromDayNumber(cursor), end: fromDayNumber(Math.min(cs - 1, end)) });
    }
    cursor = Math.max(cursor, ce + 1);
    if (cursor > end) break;
  }

  if (cursor <= end) {
    gaps.push({ start: fromDayNumber(cursor), end: fromDayNumber(end) });
  }
  return gaps;
}

// ═══════════════════════════════════════════════════════════════
// COVERAGE SEGMENTS
// ═══════════════════════════════════════════════════════════════

/**
 * Record a new fetch. The new segment replaces whatever older segments it
 * overlaps; untouched remainders of older segments keep their fetchedAt.
 * Adjacent segments with the same fetchedAt are coalesced.
 */
export function applyCoverage(
  segments: CoverageSegment[],
  next: CoverageSegment
): CoverageSegment[] {
  const kept: CoverageSegment[] = [];
  for (const seg of segments) {
    for (const rest of subtractRanges(seg, [next])) {
      kept.push({ ...rest, fetchedAt: seg.fetchedAt });
    }
  }
  kept.push({ start: next.start, end: next.end, fetchedAt: next.fetchedAt });
  kept.sort((a, b) => (a.start < b.start ? -1 : 1));

  const out: CoverageSegment[] = [];
  for (const seg of kept) {
    const last = out[out.length - 1];
    if (
      last &&
      last.fetchedAt === seg.fetchedAt &&
      toDayNumber(seg.start) === toDayNumber(last.end) + 1
    ) {
      last.end = seg.end;
    } else {
      out.push({ ...seg });
    }
  }
  return out;
}

export function clipSegments(segments: CoverageSegment[], range: DateRange): CoverageSegment[] {
  const out: CoverageSegment[] = [];
  for (const seg of segments) {
    const part = intersect(seg, range);
    if (part) out.push({ ...part, fetchedAt: seg.fetchedAt });
  }
  return out;
}

/**
 * The part of a segment that is still fresh at `now`.
 *
 * Bars dated before the day the segment was fetched were already closed at
 * fetch time and never go stale. The fetch day itself (and anything after it)
 * is only fresh for `historicalTtlMs`.
 */
export function freshPart(
  seg: CoverageSegment,
  now: number,
  historicalTtlMs: number
): DateRange | null {
  if (now - seg.fetchedAt <= historicalTtlMs) {
    return { start: seg.start, end: seg.end };
  }
  const lastClosed = addDays(dayOf(seg.fetchedAt), -1);
  const end = seg.end < lastClosed ? seg.end : lastClosed;
  return seg.start <= end ? { start: seg.start, end } : null;
}
