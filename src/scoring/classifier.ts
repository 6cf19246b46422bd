/**
 * Opportunity Classifier
 *
 * Pure classification of scores into tiers, the 2x2 opportunity matrix and a
 * lifecycle stage. Nothing here is cached or time-evolving.
 */

import type { EngineConfig } from '@/core/config';
import type {
  LifecycleStage,
  OpportunityLabel,
  OpportunityLevel,
  ScoreGrade,
  ScoreTier,
} from '@/types/trends';
import type { GrowthMetrics } from './growth';
import { median } from './normalize';
import type { NormalizedSeries } from './series';

export type TrendDirection = 'rising' | 'flat' | 'falling';

const TIER_ACTIONS: Record<ScoreTier, string> = {
  High: 'Act now: hot opportunity',
  Medium: 'Monitor closely',
  Low: 'Watch how it evolves',
  'Very Low': 'Not a priority',
};

/**
 * Tier thresholds (defaults):
 * - High: >= 75
 * - Medium: 55-74
 * - Low: 35-54
 * - Very Low: < 35
 */
export function scoreTier(score: number, config: EngineConfig): ScoreTier {
  const { high, medium, low } = config.tiers;
  if (score >= high) return 'High';
  if (score >= medium) return 'Medium';
  if (score >= low) return 'Low';
  return 'Very Low';
}

export function classifyOpportunity(
  trendScore: number,
  potentialScore: number,
  config: EngineConfig
): OpportunityLabel {
  const highTrend = trendScore >= config.matrix.trendThreshold;
  const highPotential = potentialScore >= config.matrix.potentialThreshold;

  if (highTrend && highPotential) return 'Star';
  if (highPotential) return 'Emerging';
  if (highTrend) return 'Established';
  return 'Niche';
}

export function trendDirection(growth: GrowthMetrics, config: EngineConfig): TrendDirection {
  const band = config.lifecycle.flatBandPct;
  if (growth.momentumPct > band) return 'rising';
  if (growth.momentumPct < -band) return 'falling';
  return 'flat';
}

/**
 * Lifecycle from the recent-window direction:
 * - rising, current below the introduction level -> Introduction
 * - rising otherwise -> Growth
 * - falling -> Decline
 * - flat -> Maturity above the historical median, else Introduction
 *
 * The introduction level is a percentage of max(100, peak), so 0-100
 * interest indices are read on their own scale and raw counts relative to
 * their peak.
 */
export function determineLifecycle(
  series: NormalizedSeries,
  growth: GrowthMetrics,
  config: EngineConfig
): LifecycleStage {
  // Too short for a momentum window, so there is no direction to read
  if (growth.samples < config.momentum.minWindow) return 'Introduction';

  const direction = trendDirection(growth, config);
  if (direction === 'falling') return 'Decline';

  if (direction === 'rising') {
    const absoluteLevel = (growth.current / Math.max(100, growth.peak)) * 100;
    return absoluteLevel < config.lifecycle.introductionLevelPct ? 'Introduction' : 'Growth';
  }

  return growth.current > median(series.values) ? 'Maturity' : 'Introduction';
}

export function earlyStageScore(stage: LifecycleStage, config: EngineConfig): number {
  return config.lifecycle.earlyStageScores[stage];
}

export function scoreToGrade(score: number): ScoreGrade {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B+';
  if (score >= 60) return 'B';
  if (score >= 50) return 'C+';
  if (score >= 40) return 'C';
  if (score >= 30) return 'D';
  return 'F';
}

/** Combined opportunity level, potential weighted above trend. */
export function opportunityLevel(
  trendScore: number,
  potentialScore: number,
  config: EngineConfig
): OpportunityLevel {
  const { trendWeight, potentialWeight } = config.opportunityLevel;
  const combined = Math.round(trendScore * trendWeight + potentialScore * potentialWeight);
  const tier = scoreTier(combined, config);
  return {
    tier,
    combined_score: combined,
    action: TIER_ACTIONS[tier],
  };
}
