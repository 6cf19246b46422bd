/**
 * Seasonality Analyzer
 *
 * Samples are averaged per year-month first (so weekly and daily series
 * weigh each month once), then per calendar month across years.
 */

import type { EngineConfig } from '@/core/config';
import { utcMonth, yearMonthKey } from '@/core/time';
import type { NextPeak, SeasonalityProfile } from '@/types/trends';
import { mean, roundScore } from './normalize';
import type { NormalizedSeries } from './series';

export interface SeasonalityOptions {
  /** Month the prediction is made from; defaults to the month of the latest sample. */
  currentMonth?: number;
}

function emptyProfile(): SeasonalityProfile {
  return {
    is_seasonal: false,
    peak_months: [],
    trough_month: null,
    amplitude: 0,
    monthly_pattern: {},
    next_peak: null,
  };
}

/** Months from `currentMonth` to `peakMonth`, always within 1-12. */
export function monthsUntil(peakMonth: number, currentMonth: number): number {
  return ((((peakMonth - currentMonth - 1) % 12) + 12) % 12) + 1;
}

export function predictNextPeak(peakMonths: readonly number[], currentMonth: number): NextPeak | null {
  let best: NextPeak | null = null;
  for (const month of peakMonths) {
    const until = monthsUntil(month, currentMonth);
    if (!best || until < best.months_until) {
      best = { month, months_until: until };
    }
  }
  return best;
}

export function analyzeSeasonality(
  series: NormalizedSeries,
  config: EngineConfig,
  options: SeasonalityOptions = {}
): SeasonalityProfile {
  const { minPeriods, peakThreshold, minAmplitude, maxAmplitude } = config.seasonality;

  const buckets = new Map<string, { month: number; values: number[] }>();
  for (const point of series.points) {
    const key = yearMonthKey(point.timestamp);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.values.push(point.value);
    } else {
      buckets.set(key, { month: utcMonth(point.timestamp), values: [point.value] });
    }
  }

  if (buckets.size < minPeriods) {
    return emptyProfile();
  }

  const byMonth = new Map<number, number[]>();
  for (const { month, values } of buckets.values()) {
    const monthValues = byMonth.get(month) ?? [];
    monthValues.push(mean(values));
    byMonth.set(month, monthValues);
  }

  const months = [...byMonth.keys()].sort((a, b) => a - b);
  const monthlyMeans = new Map<number, number>();
  for (const month of months) {
    monthlyMeans.set(month, mean(byMonth.get(month) ?? []));
  }

  const overall = mean([...monthlyMeans.values()]);

  const monthlyPattern: Record<string, number> = {};
  let peakMean = 0;
  let troughMonth: number | null = null;
  let troughMean = Number.POSITIVE_INFINITY;
  for (const month of months) {
    const value = monthlyMeans.get(month) ?? 0;
    monthlyPattern[String(month)] = overall > 0 ? roundScore(((value - overall) / overall) * 100) : 0;
    peakMean = Math.max(peakMean, value);
    if (value < troughMean) {
      troughMean = value;
      troughMonth = month;
    }
  }

  const peakMonths =
    overall > 0 ? months.filter((month) => (monthlyMeans.get(month) ?? 0) > overall * peakThreshold) : [];

  let ratio = 0;
  if (troughMean > 0) {
    ratio = peakMean / troughMean;
  } else if (peakMean > 0) {
    ratio = maxAmplitude;
  }
  ratio = Math.min(ratio, maxAmplitude);

  const isSeasonal = peakMonths.length > 0 && ratio > minAmplitude;
  if (!isSeasonal) {
    return {
      ...emptyProfile(),
      trough_month: troughMonth,
      monthly_pattern: monthlyPattern,
    };
  }

  const lastPoint = series.points[series.points.length - 1];
  const currentMonth = options.currentMonth ?? utcMonth(lastPoint.timestamp);

  return {
    is_seasonal: true,
    peak_months: peakMonths,
    trough_month: troughMonth,
    amplitude: roundScore(ratio, 2),
    monthly_pattern: monthlyPattern,
    next_peak: predictNextPeak(peakMonths, currentMonth),
  };
}
