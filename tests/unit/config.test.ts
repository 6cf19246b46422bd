import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_ENGINE_CONFIG,
  buildEngineConfig,
  loadEngineConfig,
  loadEnginePreset,
} from '@/core/config';
import { loadEnvConfig, resetEnvConfig } from '@/core/env';

let tempDir: string;
const ENV_KEYS = ['ENGINE_PRESET', 'LOG_LEVEL'];
const originalEnv: Record<string, string | undefined> = {};

function writeJson(relativePath: string, content: unknown) {
  const path = join(tempDir, relativePath);
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
}

function trendSum(weights: typeof DEFAULT_ENGINE_CONFIG.trendWeights): number {
  return weights.level + weights.growth + weights.momentum + weights.consistency;
}

describe('engine config', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'engine-config-test-'));
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
    resetEnvConfig();
  });

  afterEach(() => {
    resetEnvConfig();
    rmSync(tempDir, { recursive: true, force: true });
    ENV_KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('ships frozen defaults whose weights sum to 1', () => {
    expect(Object.isFrozen(DEFAULT_ENGINE_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_ENGINE_CONFIG.trendWeights)).toBe(true);
    expect(trendSum(DEFAULT_ENGINE_CONFIG.trendWeights)).toBeCloseTo(1, 10);
    const p = DEFAULT_ENGINE_CONFIG.potentialWeights;
    expect(p.acceleration + p.earlyStage + p.risingQueries + p.headroom).toBeCloseTo(1, 10);
  });

  it('falls back to defaults without a config file', () => {
    expect(loadEngineConfig(tempDir)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('reads snake_case overrides and renormalizes weights', () => {
    writeJson('config/engine.json', {
      trend_weights: { level: 1, growth: 1, momentum: 1, consistency: 1 },
      tiers: { high: 80 },
      lifecycle: { early_stage_scores: { maturity: 40 } },
    });

    const config = loadEngineConfig(tempDir);
    expect(config.trendWeights).toEqual({
      level: 0.25,
      growth: 0.25,
      momentum: 0.25,
      consistency: 0.25,
    });
    expect(config.tiers).toEqual({ high: 80, medium: 55, low: 35 });
    expect(config.lifecycle.earlyStageScores.Maturity).toBe(40);
    expect(config.lifecycle.earlyStageScores.Growth).toBe(80);
    expect(Object.isFrozen(config.tiers)).toBe(true);
  });

  it('ignores values that are not finite numbers', () => {
    const config = buildEngineConfig({ momentum: { scale: 'fast', min_window: 4 } });
    expect(config.momentum).toEqual({ windowFraction: 0.25, minWindow: 4, scale: 2.5 });
  });

  it('falls back to defaults on invalid JSON', () => {
    writeJson('config/engine.json', '{ not json');
    expect(loadEngineConfig(tempDir)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('merges a preset over the config file', () => {
    writeJson('config/presets/growth_hunter.json', {
      name: 'growth_hunter',
      description: 'test',
      trend_weights: { growth: 0.6, level: 0.2, momentum: 0.2, consistency: 0 },
    });

    const config = loadEngineConfig(tempDir, { presetName: 'growth_hunter' });
    expect(config.trendWeights.growth).toBeCloseTo(0.6, 10);
    expect(config.trendWeights.consistency).toBe(0);
    expect(trendSum(config.trendWeights)).toBeCloseTo(1, 10);
    expect(config.potentialWeights).toEqual(DEFAULT_ENGINE_CONFIG.potentialWeights);
  });

  it('picks the preset from ENGINE_PRESET', () => {
    writeJson('config/presets/steady.json', {
      name: 'steady',
      description: 'test',
      potential_weights: { acceleration: 0, early_stage: 0, rising_queries: 1, headroom: 1 },
    });
    process.env.ENGINE_PRESET = 'steady';
    resetEnvConfig();

    const preset = loadEnginePreset(tempDir);
    expect(preset?.name).toBe('steady');
    const config = loadEngineConfig(tempDir);
    expect(config.potentialWeights).toEqual({
      acceleration: 0,
      earlyStage: 0,
      risingQueries: 0.5,
      headroom: 0.5,
    });
  });

  it('skips a missing preset unless failing fast', () => {
    expect(loadEnginePreset(tempDir, { presetName: 'nope' })).toBeNull();
    expect(() => loadEnginePreset(tempDir, { presetName: 'nope', failFast: true })).toThrow(
      /^engine_preset_not_found: /
    );
  });

  it('rejects presets with invalid weights', () => {
    writeJson('config/presets/broken.json', { trend_weights: { level: -1 } });
    expect(loadEnginePreset(tempDir, { presetName: 'broken' })).toBeNull();
    expect(() => loadEnginePreset(tempDir, { presetName: 'broken', failFast: true })).toThrow(
      'engine_preset_invalid_schema: trend_weights.level must be a non-negative number'
    );
  });

  it('rejects presets that are not JSON', () => {
    writeJson('config/presets/garbled.json', '{');
    expect(() => loadEnginePreset(tempDir, { presetName: 'garbled', failFast: true })).toThrow(
      /^engine_preset_invalid_json: /
    );
  });

  it('ships a minimum sample count equal to the momentum window', () => {
    const config = loadEngineConfig(process.cwd());
    expect(DEFAULT_ENGINE_CONFIG.series.minSamples).toBe(3);
    expect(config.series.minSamples).toBe(config.momentum.minWindow);
  });

  it('loads the shipped presets', () => {
    const config = loadEngineConfig(process.cwd(), { presetName: 'early_stage', failFast: true });
    expect(config.trendWeights.momentum).toBeCloseTo(0.35, 10);
    expect(trendSum(config.trendWeights)).toBeCloseTo(1, 10);
  });
});

describe('env config', () => {
  afterEach(() => {
    delete process.env.LOG_LEVEL;
    resetEnvConfig();
  });

  it('accepts known log levels only', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(loadEnvConfig().logLevel).toBe('warn');
    process.env.LOG_LEVEL = 'chatty';
    expect(loadEnvConfig().logLevel).toBe('info');
  });
});
