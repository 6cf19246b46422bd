/**
 * Trend Score (0-100): how hot the keyword is right now.
 * Weighted: level 25%, growth 30%, momentum 25%, consistency 20%.
 */

import type { EngineConfig } from '@/core/config';
import type { TrendComponent, TrendScoreResult } from '@/types/trends';
import { scoreToGrade } from './classifier';
import { explainTrend, INSUFFICIENT_DATA_EXPLANATION } from './explain';
import type { GrowthMetrics } from './growth';
import { clamp, composeScore, contribution, roundScore } from './normalize';

function zeroes(): Record<TrendComponent, number> {
  return { level: 0, growth: 0, momentum: 0, consistency: 0 };
}

export function insufficientTrendScore(): TrendScoreResult {
  return {
    score: 0,
    grade: 'F',
    breakdown: zeroes(),
    components: zeroes(),
    insufficient_data: true,
    explanation: INSUFFICIENT_DATA_EXPLANATION,
  };
}

export function computeTrendScore(
  growth: GrowthMetrics,
  insufficientData: boolean,
  config: EngineConfig
): TrendScoreResult {
  if (insufficientData) {
    return insufficientTrendScore();
  }

  const weights = config.trendWeights;
  const { level, growth: growthScore, momentum, consistency } = growth.subscores;

  const breakdown: Record<TrendComponent, number> = {
    level: contribution(weights.level, level),
    growth: contribution(weights.growth, growthScore),
    momentum: contribution(weights.momentum, momentum),
    consistency: contribution(weights.consistency, consistency),
  };
  const score = composeScore(Object.values(breakdown));

  return {
    score,
    grade: scoreToGrade(score),
    breakdown,
    components: {
      level: roundScore(clamp(level), 2),
      growth: roundScore(clamp(growthScore), 2),
      momentum: roundScore(clamp(momentum), 2),
      consistency: roundScore(clamp(consistency), 2),
    },
    insufficient_data: false,
    explanation: explainTrend(score, growth),
  };
}
