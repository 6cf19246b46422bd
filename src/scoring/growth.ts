/**
 * Growth/Momentum Calculator
 * Level, growth rate, momentum, acceleration and consistency of a normalized
 * series. Each sub-score is clamped to 0-100 independently.
 */

import type { EngineConfig } from '@/core/config';
import { clamp, linearRegressionSlope, linearScale, mean, stddev } from './normalize';
import type { NormalizedSeries } from './series';

export interface GrowthSubscores {
  level: number;
  growth: number;
  momentum: number;
  acceleration: number;
  consistency: number;
}

export interface GrowthMetrics {
  samples: number;
  current: number;
  average: number;
  peak: number;
  levelRatio: number;
  /** Last third vs first third, percent. */
  growthPct: number;
  /** Recent-window slope, percent of the series mean per sampling step. */
  momentumPct: number;
  /** Recent-half slope minus prior-half slope, percent of the series mean. */
  accelerationPct: number;
  coefficientOfVariation: number;
  windowSize: number;
  subscores: GrowthSubscores;
}

function relativeSlope(offsets: readonly number[], values: readonly number[], average: number): number {
  if (average === 0) return 0;
  return (linearRegressionSlope(offsets, values) / average) * 100;
}

export function momentumWindowSize(samples: number, config: EngineConfig): number {
  const { windowFraction, minWindow } = config.momentum;
  return Math.min(samples, Math.max(minWindow, Math.ceil(samples * windowFraction)));
}

function growthRate(values: readonly number[], config: EngineConfig): number {
  const n = values.length;
  if (n < config.growth.minSamples) return 0;

  const third = Math.floor(n / 3);
  if (third === 0) return 0;
  const firstMean = mean(values.slice(0, third));
  const lastMean = mean(values.slice(n - third));

  if (firstMean === 0) {
    return lastMean > 0 ? config.growth.ceilingPct : 0;
  }
  return ((lastMean - firstMean) / firstMean) * 100;
}

export function calculateGrowthMetrics(series: NormalizedSeries, config: EngineConfig): GrowthMetrics {
  const { values, offsets } = series;
  const n = values.length;

  if (n === 0) {
    return {
      samples: 0,
      current: 0,
      average: 0,
      peak: 0,
      levelRatio: 0,
      growthPct: 0,
      momentumPct: 0,
      accelerationPct: 0,
      coefficientOfVariation: 0,
      windowSize: 0,
      subscores: { level: 0, growth: 0, momentum: 0, acceleration: 0, consistency: 0 },
    };
  }

  const current = values[n - 1];
  const average = mean(values);
  const peak = values.reduce((max, v) => Math.max(max, v), 0);

  // Level: current vs own history
  const levelRatio = average > 0 ? current / average : 0;
  const level = linearScale(levelRatio, config.level.lowRatio, config.level.highRatio);

  const growthPct = growthRate(values, config);
  const growth = linearScale(growthPct, 0, config.growth.ceilingPct);

  // Momentum and consistency share the recent window
  const windowSize = momentumWindowSize(n, config);
  const hasWindow = n >= config.momentum.minWindow;
  const windowValues = values.slice(n - windowSize);
  const windowOffsets = offsets.slice(n - windowSize);

  let momentumPct = 0;
  let momentum = 0;
  let coefficientOfVariation = 0;
  let consistency = 0;
  if (hasWindow && average > 0) {
    momentumPct = relativeSlope(windowOffsets, windowValues, average);
    momentum = clamp(50 + momentumPct * config.momentum.scale);
  }
  if (hasWindow) {
    const windowMean = mean(windowValues);
    if (windowMean > 0) {
      coefficientOfVariation = stddev(windowValues, windowMean) / windowMean;
      consistency = clamp(1 - coefficientOfVariation, 0, 1) * 100;
    }
  }

  let accelerationPct = 0;
  let acceleration = 0;
  if (n >= config.acceleration.minSamples && average > 0) {
    const mid = Math.floor(n / 2);
    const prior = relativeSlope(offsets.slice(0, mid), values.slice(0, mid), average);
    const recent = relativeSlope(offsets.slice(mid), values.slice(mid), average);
    accelerationPct = recent - prior;
    acceleration = clamp(50 + accelerationPct * config.acceleration.scale);
  }

  return {
    samples: n,
    current,
    average,
    peak,
    levelRatio,
    growthPct,
    momentumPct,
    accelerationPct,
    coefficientOfVariation,
    windowSize,
    subscores: { level, growth, momentum, acceleration, consistency },
  };
}
