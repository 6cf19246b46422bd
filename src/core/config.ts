/**
 * Engine configuration: weights and thresholds with optional file overrides.
 *
 * Built once, deep-frozen, then shared read-only by every scoring call.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { getEnvConfig } from './env';
import { createChildLogger } from '@/utils/logger';
import type { LifecycleStage } from '@/types/trends';

const logger = createChildLogger('config');

export interface TrendWeights {
  readonly level: number;
  readonly growth: number;
  readonly momentum: number;
  readonly consistency: number;
}

export interface PotentialWeights {
  readonly acceleration: number;
  readonly earlyStage: number;
  readonly risingQueries: number;
  readonly headroom: number;
}

export interface EngineConfig {
  readonly trendWeights: TrendWeights;
  readonly potentialWeights: PotentialWeights;
  readonly series: {
    readonly breakoutValue: number;
    readonly minSamples: number;
  };
  readonly level: {
    readonly lowRatio: number;
    readonly highRatio: number;
  };
  readonly growth: {
    readonly ceilingPct: number;
    readonly minSamples: number;
  };
  readonly momentum: {
    readonly windowFraction: number;
    readonly minWindow: number;
    readonly scale: number;
  };
  readonly acceleration: {
    readonly minSamples: number;
    readonly scale: number;
  };
  readonly seasonality: {
    readonly minPeriods: number;
    readonly peakThreshold: number;
    readonly minAmplitude: number;
    readonly maxAmplitude: number;
  };
  readonly lifecycle: {
    readonly flatBandPct: number;
    readonly introductionLevelPct: number;
    readonly earlyStageScores: Readonly<Record<LifecycleStage, number>>;
  };
  readonly risingQueries: {
    readonly saturationCount: number;
  };
  readonly tiers: {
    readonly high: number;
    readonly medium: number;
    readonly low: number;
  };
  readonly matrix: {
    readonly trendThreshold: number;
    readonly potentialThreshold: number;
  };
  readonly opportunityLevel: {
    readonly trendWeight: number;
    readonly potentialWeight: number;
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = deepFreeze({
  trendWeights: {
    level: 0.25,
    growth: 0.3,
    momentum: 0.25,
    consistency: 0.2,
  },
  potentialWeights: {
    acceleration: 0.3,
    earlyStage: 0.25,
    risingQueries: 0.25,
    headroom: 0.2,
  },
  series: {
    breakoutValue: 100,
    minSamples: 3,
  },
  level: {
    lowRatio: 0.5,
    highRatio: 2,
  },
  growth: {
    ceilingPct: 100,
    minSamples: 3,
  },
  momentum: {
    windowFraction: 0.25,
    minWindow: 3,
    scale: 2.5,
  },
  acceleration: {
    minSamples: 4,
    scale: 2.5,
  },
  seasonality: {
    minPeriods: 12,
    peakThreshold: 1.3,
    minAmplitude: 1.5,
    maxAmplitude: 10,
  },
  lifecycle: {
    flatBandPct: 2,
    introductionLevelPct: 30,
    earlyStageScores: {
      Introduction: 100,
      Growth: 80,
      Maturity: 30,
      Decline: 0,
    },
  },
  risingQueries: {
    saturationCount: 10,
  },
  tiers: {
    high: 75,
    medium: 55,
    low: 35,
  },
  matrix: {
    trendThreshold: 50,
    potentialThreshold: 50,
  },
  opportunityLevel: {
    trendWeight: 0.4,
    potentialWeight: 0.6,
  },
});

type RawSection = Record<string, unknown>;

const WEIGHT_SUM_TOLERANCE = 1e-9;

function isRecord(value: unknown): value is RawSection {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: RawSection | undefined, key: string): RawSection | undefined {
  const value = raw?.[key];
  return isRecord(value) ? value : undefined;
}

function num(raw: RawSection | undefined, key: string, fallback: number): number {
  const value = raw?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function normalizeTrendWeights(weights: TrendWeights): TrendWeights {
  const total = weights.level + weights.growth + weights.momentum + weights.consistency;
  if (total <= 0) {
    return DEFAULT_ENGINE_CONFIG.trendWeights;
  }
  if (Math.abs(total - 1) < WEIGHT_SUM_TOLERANCE) {
    return { ...weights };
  }
  return {
    level: weights.level / total,
    growth: weights.growth / total,
    momentum: weights.momentum / total,
    consistency: weights.consistency / total,
  };
}

function normalizePotentialWeights(weights: PotentialWeights): PotentialWeights {
  const total =
    weights.acceleration + weights.earlyStage + weights.risingQueries + weights.headroom;
  if (total <= 0) {
    return DEFAULT_ENGINE_CONFIG.potentialWeights;
  }
  if (Math.abs(total - 1) < WEIGHT_SUM_TOLERANCE) {
    return { ...weights };
  }
  return {
    acceleration: weights.acceleration / total,
    earlyStage: weights.earlyStage / total,
    risingQueries: weights.risingQueries / total,
    headroom: weights.headroom / total,
  };
}

function mergeTrendWeights(base: TrendWeights, raw?: RawSection): TrendWeights {
  if (!raw) return base;
  return {
    level: num(raw, 'level', base.level),
    growth: num(raw, 'growth', base.growth),
    momentum: num(raw, 'momentum', base.momentum),
    consistency: num(raw, 'consistency', base.consistency),
  };
}

function mergePotentialWeights(base: PotentialWeights, raw?: RawSection): PotentialWeights {
  if (!raw) return base;
  return {
    acceleration: num(raw, 'acceleration', base.acceleration),
    earlyStage: num(raw, 'early_stage', base.earlyStage),
    risingQueries: num(raw, 'rising_queries', base.risingQueries),
    headroom: num(raw, 'headroom', base.headroom),
  };
}

function mergeEarlyStageScores(
  base: EngineConfig['lifecycle']['earlyStageScores'],
  raw?: RawSection
): Record<LifecycleStage, number> {
  return {
    Introduction: num(raw, 'introduction', base.Introduction),
    Growth: num(raw, 'growth', base.Growth),
    Maturity: num(raw, 'maturity', base.Maturity),
    Decline: num(raw, 'decline', base.Decline),
  };
}

function mergeThresholds(base: EngineConfig, raw: RawSection): Omit<EngineConfig, 'trendWeights' | 'potentialWeights'> {
  const series = section(raw, 'series');
  const level = section(raw, 'level');
  const growth = section(raw, 'growth');
  const momentum = section(raw, 'momentum');
  const acceleration = section(raw, 'acceleration');
  const seasonality = section(raw, 'seasonality');
  const lifecycle = section(raw, 'lifecycle');
  const risingQueries = section(raw, 'rising_queries');
  const tiers = section(raw, 'tiers');
  const matrix = section(raw, 'matrix');
  const opportunityLevel = section(raw, 'opportunity_level');

  return {
    series: {
      breakoutValue: num(series, 'breakout_value', base.series.breakoutValue),
      minSamples: num(series, 'min_samples', base.series.minSamples),
    },
    level: {
      lowRatio: num(level, 'low_ratio', base.level.lowRatio),
      highRatio: num(level, 'high_ratio', base.level.highRatio),
    },
    growth: {
      ceilingPct: num(growth, 'ceiling_pct', base.growth.ceilingPct),
      minSamples: num(growth, 'min_samples', base.growth.minSamples),
    },
    momentum: {
      windowFraction: num(momentum, 'window_fraction', base.momentum.windowFraction),
      minWindow: num(momentum, 'min_window', base.momentum.minWindow),
      scale: num(momentum, 'scale', base.momentum.scale),
    },
    acceleration: {
      minSamples: num(acceleration, 'min_samples', base.acceleration.minSamples),
      scale: num(acceleration, 'scale', base.acceleration.scale),
    },
    seasonality: {
      minPeriods: num(seasonality, 'min_periods', base.seasonality.minPeriods),
      peakThreshold: num(seasonality, 'peak_threshold', base.seasonality.peakThreshold),
      minAmplitude: num(seasonality, 'min_amplitude', base.seasonality.minAmplitude),
      maxAmplitude: num(seasonality, 'max_amplitude', base.seasonality.maxAmplitude),
    },
    lifecycle: {
      flatBandPct: num(lifecycle, 'flat_band_pct', base.lifecycle.flatBandPct),
      introductionLevelPct: num(lifecycle, 'introduction_level_pct', base.lifecycle.introductionLevelPct),
      earlyStageScores: mergeEarlyStageScores(
        base.lifecycle.earlyStageScores,
        section(lifecycle, 'early_stage_scores')
      ),
    },
    risingQueries: {
      saturationCount: num(risingQueries, 'saturation_count', base.risingQueries.saturationCount),
    },
    tiers: {
      high: num(tiers, 'high', base.tiers.high),
      medium: num(tiers, 'medium', base.tiers.medium),
      low: num(tiers, 'low', base.tiers.low),
    },
    matrix: {
      trendThreshold: num(matrix, 'trend_threshold', base.matrix.trendThreshold),
      potentialThreshold: num(matrix, 'potential_threshold', base.matrix.potentialThreshold),
    },
    opportunityLevel: {
      trendWeight: num(opportunityLevel, 'trend_weight', base.opportunityLevel.trendWeight),
      potentialWeight: num(opportunityLevel, 'potential_weight', base.opportunityLevel.potentialWeight),
    },
  };
}

export interface EnginePreset {
  name: string;
  description: string;
  trendWeights?: RawSection;
  potentialWeights?: RawSection;
}

/**
 * Merges a raw `config/engine.json` document and an optional preset over the
 * defaults. Both weight groups are re-normalized so they sum to 1.
 */
export function buildEngineConfig(raw: unknown, preset?: EnginePreset | null): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  const doc = isRecord(raw) ? raw : {};

  let trendWeights = mergeTrendWeights(base.trendWeights, section(doc, 'trend_weights'));
  let potentialWeights = mergePotentialWeights(base.potentialWeights, section(doc, 'potential_weights'));

  if (preset) {
    trendWeights = mergeTrendWeights(trendWeights, preset.trendWeights);
    potentialWeights = mergePotentialWeights(potentialWeights, preset.potentialWeights);
  }

  return deepFreeze({
    trendWeights: normalizeTrendWeights(trendWeights),
    potentialWeights: normalizePotentialWeights(potentialWeights),
    ...mergeThresholds(base, doc),
  });
}

function loadRawConfig(projectRoot: string): unknown {
  const path = join(projectRoot, 'config', 'engine.json');
  if (!existsSync(path)) {
    return null;
  }

  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn({ path, err: error }, 'engine_config_invalid_json: falling back to defaults');
    return null;
  }
}

function validatePreset(raw: unknown, presetPath: string): EnginePreset {
  if (!isRecord(raw)) {
    throw new Error(`engine_preset_invalid_schema: expected an object in ${presetPath}`);
  }
  const trendWeights = section(raw, 'trend_weights');
  const potentialWeights = section(raw, 'potential_weights');
  if (!trendWeights && !potentialWeights) {
    throw new Error(
      `engine_preset_invalid_schema: missing trend_weights/potential_weights in ${presetPath}`
    );
  }
  for (const [group, weights] of [
    ['trend_weights', trendWeights],
    ['potential_weights', potentialWeights],
  ] as const) {
    if (!weights) continue;
    for (const [key, value] of Object.entries(weights)) {
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new Error(
          `engine_preset_invalid_schema: ${group}.${key} must be a non-negative number in ${presetPath}`
        );
      }
    }
  }

  return {
    name: typeof raw.name === 'string' ? raw.name : '',
    description: typeof raw.description === 'string' ? raw.description : '',
    trendWeights,
    potentialWeights,
  };
}

export function loadEnginePreset(
  projectRoot: string,
  { failFast = false, presetName }: { failFast?: boolean; presetName?: string } = {}
): EnginePreset | null {
  const name = (presetName ?? getEnvConfig().enginePreset ?? '').trim();
  if (!name) return null;

  const presetPath = join(projectRoot, 'config', 'presets', `${name}.json`);
  if (!existsSync(presetPath)) {
    const message = `engine_preset_not_found: ${presetPath}`;
    if (failFast) throw new Error(message);
    logger.warn({ preset: name }, message);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(presetPath, 'utf-8'));
  } catch {
    const message = `engine_preset_invalid_json: ${presetPath}`;
    if (failFast) throw new Error(message);
    logger.warn({ preset: name }, message);
    return null;
  }

  try {
    const preset = validatePreset(parsed, presetPath);
    return { ...preset, name: preset.name || name };
  } catch (error) {
    if (failFast) throw error;
    logger.warn({ preset: name, err: error }, 'engine preset rejected');
    return null;
  }
}

export function loadEngineConfig(
  projectRoot: string = process.cwd(),
  options: { failFast?: boolean; presetName?: string } = {}
): EngineConfig {
  const raw = loadRawConfig(projectRoot);
  const preset = loadEnginePreset(projectRoot, options);
  return buildEngineConfig(raw, preset);
}
