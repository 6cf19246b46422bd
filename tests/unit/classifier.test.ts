import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '@/core/config';
import {
  classifyOpportunity,
  determineLifecycle,
  earlyStageScore,
  opportunityLevel,
  scoreTier,
  scoreToGrade,
  trendDirection,
} from '@/scoring/classifier';
import { calculateGrowthMetrics } from '@/scoring/growth';
import { normalizeSeries } from '@/scoring/series';

const config = DEFAULT_ENGINE_CONFIG;

function lifecycleFor(values: number[]) {
  const series = normalizeSeries(
    values.map((value, i) => ({ timestamp: new Date(Date.UTC(2024, 0, 1 + 7 * i)), value })),
    config
  );
  const growth = calculateGrowthMetrics(series, config);
  return { stage: determineLifecycle(series, growth, config), direction: trendDirection(growth, config) };
}

describe('scoreTier', () => {
  it('maps scores at the tier boundaries', () => {
    expect(scoreTier(100, config)).toBe('High');
    expect(scoreTier(75, config)).toBe('High');
    expect(scoreTier(74, config)).toBe('Medium');
    expect(scoreTier(55, config)).toBe('Medium');
    expect(scoreTier(54, config)).toBe('Low');
    expect(scoreTier(35, config)).toBe('Low');
    expect(scoreTier(34, config)).toBe('Very Low');
    expect(scoreTier(0, config)).toBe('Very Low');
  });
});

describe('classifyOpportunity', () => {
  it('places scores in the 2x2 matrix', () => {
    expect(classifyOpportunity(75, 75, config)).toBe('Star');
    expect(classifyOpportunity(50, 50, config)).toBe('Star');
    expect(classifyOpportunity(49, 50, config)).toBe('Emerging');
    expect(classifyOpportunity(50, 49, config)).toBe('Established');
    expect(classifyOpportunity(49, 49, config)).toBe('Niche');
  });
});

describe('determineLifecycle', () => {
  it('marks a rising series at a high level as Growth', () => {
    expect(lifecycleFor([10, 20, 30, 40, 50, 60, 70, 80, 90, 100])).toEqual({
      stage: 'Growth',
      direction: 'rising',
    });
  });

  it('marks a rising series at a low absolute level as Introduction', () => {
    expect(lifecycleFor([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toEqual({
      stage: 'Introduction',
      direction: 'rising',
    });
  });

  it('marks a falling series as Decline', () => {
    expect(lifecycleFor([100, 90, 80, 70, 60, 50, 40, 30, 20, 10]).stage).toBe('Decline');
  });

  it('marks a flat series above its median as Maturity', () => {
    expect(lifecycleFor([50, 50, 50, 50, 50, 50, 50, 50, 50, 51])).toEqual({
      stage: 'Maturity',
      direction: 'flat',
    });
  });

  it('marks a flat series at its median as Introduction', () => {
    expect(lifecycleFor([50, 50, 50, 50, 50, 50, 50, 50, 50, 50]).stage).toBe('Introduction');
  });

  it('defaults an empty series to Introduction', () => {
    expect(lifecycleFor([]).stage).toBe('Introduction');
  });

  it('does not infer a stage from fewer samples than the momentum window', () => {
    expect(lifecycleFor([50]).stage).toBe('Introduction');
    expect(lifecycleFor([50, 5]).stage).toBe('Introduction');
  });
});

describe('earlyStageScore', () => {
  it('favors earlier stages', () => {
    expect(earlyStageScore('Introduction', config)).toBe(100);
    expect(earlyStageScore('Growth', config)).toBe(80);
    expect(earlyStageScore('Maturity', config)).toBe(30);
    expect(earlyStageScore('Decline', config)).toBe(0);
  });
});

describe('scoreToGrade', () => {
  it('maps scores to letter grades', () => {
    expect(scoreToGrade(94)).toBe('A+');
    expect(scoreToGrade(80)).toBe('A');
    expect(scoreToGrade(77)).toBe('B+');
    expect(scoreToGrade(60)).toBe('B');
    expect(scoreToGrade(50)).toBe('C+');
    expect(scoreToGrade(41)).toBe('C');
    expect(scoreToGrade(37)).toBe('D');
    expect(scoreToGrade(0)).toBe('F');
  });
});

describe('opportunityLevel', () => {
  it('weights potential above trend', () => {
    expect(opportunityLevel(75, 75, config)).toEqual({
      tier: 'High',
      combined_score: 75,
      action: 'Act now: hot opportunity',
    });
    expect(opportunityLevel(94, 37, config)).toEqual({
      tier: 'Medium',
      combined_score: 60,
      action: 'Monitor closely',
    });
    expect(opportunityLevel(0, 0, config).action).toBe('Not a priority');
  });
});
