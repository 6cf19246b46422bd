/**
 * Keyword trend scoring engine
 */

export { computeScores, type ComputeScoresOptions } from './scoring/engine';
export { EngineInputError, type EngineInputErrorCode } from './scoring/errors';
export { normalizeSeries, parseSampleValue, type NormalizedSeries } from './scoring/series';
export { calculateGrowthMetrics, type GrowthMetrics } from './scoring/growth';
export { analyzeSeasonality, predictNextPeak, monthsUntil } from './scoring/seasonality';
export { computeTrendScore } from './scoring/trend_score';
export { computePotentialScore, type PotentialInputs } from './scoring/potential_score';
export {
  classifyOpportunity,
  determineLifecycle,
  opportunityLevel,
  scoreTier,
  scoreToGrade,
} from './scoring/classifier';
export {
  countRisingQueries,
  resolveAuxiliarySignals,
  timelineToSeries,
  type TimelinePoint,
  type TimelineValue,
} from './scoring/signals';
export {
  DEFAULT_ENGINE_CONFIG,
  buildEngineConfig,
  loadEngineConfig,
  type EngineConfig,
  type EnginePreset,
} from './core/config';
export { scoreCacheKey, contentHash, stableStringify } from './utils/hash';
export {
  parseCachedResult,
  validateEngineResult,
  type ValidationResult,
} from './validation/ajv_instance';
export type * from './types/trends';
