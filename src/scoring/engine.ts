/**
 * Keyword Scoring Engine
 * Orchestrates normalization, growth, seasonality, both scores and the
 * opportunity classification for a single keyword series.
 *
 * Pure and synchronous: the result depends only on the arguments, so two
 * calls with identical input serialize to identical JSON.
 */

import { createChildLogger } from '@/utils/logger';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '@/core/config';
import { formatUtcDate } from '@/core/time';
import type { EngineResult, TrendMetricsSummary } from '@/types/trends';
import { classifyOpportunity, determineLifecycle, opportunityLevel, scoreTier } from './classifier';
import { EngineInputError } from './errors';
import { calculateGrowthMetrics, type GrowthMetrics } from './growth';
import { roundScore } from './normalize';
import { computePotentialScore } from './potential_score';
import { analyzeSeasonality } from './seasonality';
import { normalizeSeries } from './series';
import { resolveAuxiliarySignals } from './signals';
import { computeTrendScore } from './trend_score';

const logger = createChildLogger('scoring_engine');

export interface ComputeScoresOptions {
  config?: EngineConfig;
  /** Month (1-12) the next-peak prediction counts from. */
  currentMonth?: number;
}

function summarizeMetrics(growth: GrowthMetrics): TrendMetricsSummary {
  return {
    current_value: roundScore(growth.current, 2),
    avg_value: roundScore(growth.average, 2),
    peak_value: roundScore(growth.peak, 2),
    growth_rate_pct: roundScore(growth.growthPct, 2),
    momentum_pct: roundScore(growth.momentumPct, 2),
    acceleration_pct: roundScore(growth.accelerationPct, 2),
    coefficient_of_variation: roundScore(growth.coefficientOfVariation, 4),
  };
}

function assertCurrentMonth(month: number | undefined): void {
  if (month === undefined) return;
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new EngineInputError(
      `current_month_out_of_range: ${String(month)}`,
      'current_month_out_of_range'
    );
  }
}

export function computeScores(
  series: unknown,
  auxiliary?: unknown,
  options: ComputeScoresOptions = {}
): EngineResult {
  if (!Array.isArray(series)) {
    throw new EngineInputError('series must be an array of samples', 'series_not_array');
  }
  assertCurrentMonth(options.currentMonth);

  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const signals = resolveAuxiliarySignals(auxiliary);

  const normalized = normalizeSeries(series, config);
  if (normalized.degenerate) {
    logger.debug(
      { degenerate: normalized.degenerate, samples: normalized.values.length },
      'Degenerate series'
    );
  }

  const growth = calculateGrowthMetrics(normalized, config);
  const seasonality = analyzeSeasonality(normalized, config, {
    currentMonth: options.currentMonth,
  });

  const trend = computeTrendScore(growth, normalized.insufficientData, config);
  const lifecycle = determineLifecycle(normalized, growth, config);
  const potential = computePotentialScore(
    {
      growth,
      lifecycle,
      risingQueries: signals.rising_queries,
      insufficientData: normalized.insufficientData,
    },
    config
  );

  const lastPoint = normalized.points[normalized.points.length - 1];

  const result: EngineResult = {
    as_of: lastPoint ? formatUtcDate(lastPoint.timestamp) : null,
    trend,
    potential,
    seasonality,
    opportunity: classifyOpportunity(trend.score, potential.score, config),
    lifecycle,
    tiers: {
      trend: scoreTier(trend.score, config),
      potential: scoreTier(potential.score, config),
    },
    opportunity_level: opportunityLevel(trend.score, potential.score, config),
    metrics: summarizeMetrics(growth),
    auxiliary: signals,
    data_quality: {
      samples: normalized.values.length,
      dropped: normalized.dropped,
      insufficient_data: normalized.insufficientData,
      warnings: normalized.warnings,
    },
  };

  logger.debug(
    {
      samples: normalized.values.length,
      trend: trend.score,
      potential: potential.score,
      opportunity: result.opportunity,
      lifecycle,
    },
    'Scored series'
  );

  return result;
}
