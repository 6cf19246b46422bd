/**
 * Adapters for collaborator payloads: trend timelines and related-query
 * signals.
 */

import type {
  RawTimePoint,
  ResolvedAuxiliarySignals,
  RisingQuery,
} from '@/types/trends';
import { EngineInputError } from './errors';
import { parseSampleValue } from './series';

export interface TimelineValue {
  query?: string;
  value?: unknown;
  extracted_value?: unknown;
}

export interface TimelinePoint {
  date?: string;
  timestamp?: string | number;
  values?: TimelineValue[];
}

/**
 * Converts an interest-over-time timeline into raw samples. Only the first
 * query's value is used; points without any date are skipped.
 */
export function timelineToSeries(timeline: readonly TimelinePoint[]): RawTimePoint[] {
  const series: RawTimePoint[] = [];
  for (const point of timeline) {
    const timestamp = point.timestamp ?? point.date;
    if (timestamp === undefined) continue;
    const first = point.values?.[0];
    series.push({
      timestamp,
      value: first ? (first.extracted_value ?? first.value) : undefined,
    });
  }
  return series;
}

/**
 * Counts rising related queries. "Breakout" entries count as the saturating
 * maximum; entries whose growth cannot be read are ignored.
 */
export function countRisingQueries(queries: readonly RisingQuery[], minGrowthPct: number = 0): number {
  let count = 0;
  for (const query of queries) {
    const parsed = parseSampleValue(query.value, Number.POSITIVE_INFINITY);
    if (!parsed) continue;
    if (parsed.breakout || parsed.value > minGrowthPct) {
      count++;
    }
  }
  return count;
}

function nonNegative(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

function isRisingQuery(value: unknown): value is RisingQuery {
  return (
    value !== null &&
    typeof value === 'object' &&
    'value' in value &&
    (typeof value.value === 'number' || typeof value.value === 'string')
  );
}

/**
 * Fills in defaults for auxiliary signals. Missing or unreadable fields fall
 * back to 0 (the collaborator that supplies them may have failed).
 */
export function resolveAuxiliarySignals(auxiliary: unknown): ResolvedAuxiliarySignals {
  if (auxiliary === undefined || auxiliary === null) {
    return { rising_queries: 0, related_growth_pct: 0, news_volume: 0 };
  }
  if (typeof auxiliary !== 'object' || Array.isArray(auxiliary)) {
    throw new EngineInputError('auxiliary signals must be an object', 'auxiliary_not_object');
  }

  const rising = 'rising_queries' in auxiliary ? auxiliary.rising_queries : undefined;
  const risingCount = Array.isArray(rising)
    ? countRisingQueries(rising.filter(isRisingQuery))
    : Math.floor(nonNegative(rising));

  const relatedGrowth = 'related_growth_pct' in auxiliary ? auxiliary.related_growth_pct : undefined;
  const newsVolume = 'news_volume' in auxiliary ? auxiliary.news_volume : undefined;

  return {
    rising_queries: risingCount,
    related_growth_pct:
      typeof relatedGrowth === 'number' && Number.isFinite(relatedGrowth) ? relatedGrowth : 0,
    news_volume: Math.floor(nonNegative(newsVolume)),
  };
}
