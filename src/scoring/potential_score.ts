/**
 * Potential Score (0-100): likelihood of future growth.
 * Weighted: acceleration 30%, early stage 25%, rising queries 25%, headroom 20%.
 *
 * Consumes the lifecycle stage, which is derived from the trend direction, so
 * it must run after the trend side of the pipeline.
 */

import type { EngineConfig } from '@/core/config';
import type { LifecycleStage, PotentialComponent, PotentialScoreResult } from '@/types/trends';
import { earlyStageScore, scoreToGrade } from './classifier';
import { explainPotential, INSUFFICIENT_DATA_EXPLANATION } from './explain';
import type { GrowthMetrics } from './growth';
import { clamp, composeScore, contribution, linearScale, roundScore } from './normalize';

export interface PotentialInputs {
  growth: GrowthMetrics;
  lifecycle: LifecycleStage;
  risingQueries: number;
  insufficientData: boolean;
}

function zeroes(): Record<PotentialComponent, number> {
  return { acceleration: 0, early_stage: 0, rising_queries: 0, headroom: 0 };
}

export function insufficientPotentialScore(): PotentialScoreResult {
  return {
    score: 0,
    grade: 'F',
    breakdown: zeroes(),
    components: zeroes(),
    insufficient_data: true,
    explanation: INSUFFICIENT_DATA_EXPLANATION,
  };
}

export function risingQueriesScore(count: number, config: EngineConfig): number {
  return linearScale(count, 0, config.risingQueries.saturationCount);
}

export function computePotentialScore(inputs: PotentialInputs, config: EngineConfig): PotentialScoreResult {
  if (inputs.insufficientData) {
    return insufficientPotentialScore();
  }

  const weights = config.potentialWeights;
  // An all-zero series has no stage and no headroom to speak of
  const hasInterest = inputs.growth.peak > 0;
  const components: Record<PotentialComponent, number> = {
    acceleration: clamp(inputs.growth.subscores.acceleration),
    early_stage: hasInterest ? clamp(earlyStageScore(inputs.lifecycle, config)) : 0,
    rising_queries: risingQueriesScore(inputs.risingQueries, config),
    // Room to grow: the lower the current level vs its own history, the more headroom
    headroom: hasInterest ? clamp(100 - inputs.growth.subscores.level) : 0,
  };

  const breakdown: Record<PotentialComponent, number> = {
    acceleration: contribution(weights.acceleration, components.acceleration),
    early_stage: contribution(weights.earlyStage, components.early_stage),
    rising_queries: contribution(weights.risingQueries, components.rising_queries),
    headroom: contribution(weights.headroom, components.headroom),
  };
  const score = composeScore(Object.values(breakdown));

  return {
    score,
    grade: scoreToGrade(score),
    breakdown,
    components: {
      acceleration: roundScore(components.acceleration, 2),
      early_stage: roundScore(components.early_stage, 2),
      rising_queries: roundScore(components.rising_queries, 2),
      headroom: roundScore(components.headroom, 2),
    },
    insufficient_data: false,
    explanation: explainPotential(score, inputs.risingQueries),
  };
}
