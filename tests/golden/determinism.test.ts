import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { computeScores } from '@/scoring/engine';
import { timelineToSeries, type TimelinePoint } from '@/scoring/signals';
import { scoreCacheKey } from '@/utils/hash';

interface GoldenFixture {
  timeline: TimelinePoint[];
  auxiliary: unknown;
}

const fixture: GoldenFixture = JSON.parse(
  readFileSync(join(__dirname, '..', 'fixtures', 'timeline_weekly.json'), 'utf-8')
);

function seasonalSeries() {
  return Array.from({ length: 36 }, (_, i) => ({
    timestamp: `${2021 + Math.floor(i / 12)}-${String((i % 12) + 1).padStart(2, '0')}-15`,
    value: [11, 12].includes((i % 12) + 1) ? 80 + i : 20 + (i % 5),
  }));
}

describe('determinism', () => {
  describe('computeScores', () => {
    it('returns byte-identical JSON for identical input', () => {
      const series = seasonalSeries();
      const first = JSON.stringify(computeScores(series, { rising_queries: 6 }));
      const second = JSON.stringify(computeScores(series, { rising_queries: 6 }));

      expect(first).toBe(second);
    });

    it('does not depend on input order', () => {
      const series = seasonalSeries();
      const shuffled = [...series].reverse();

      expect(JSON.stringify(computeScores(shuffled))).toBe(JSON.stringify(computeScores(series)));
    });

    it('does not mutate its input', () => {
      const series = seasonalSeries();
      const before = JSON.stringify(series);
      computeScores(series);

      expect(JSON.stringify(series)).toBe(before);
    });

    it('scores a collaborator timeline reproducibly', () => {
      const series = timelineToSeries(fixture.timeline);
      const first = computeScores(series, fixture.auxiliary);
      const second = computeScores(timelineToSeries(fixture.timeline), fixture.auxiliary);

      expect(second).toEqual(first);
      expect(first.as_of).toBe('2024-01-14');
      expect(first.auxiliary.rising_queries).toBe(3);
    });
  });

  describe('scoreCacheKey', () => {
    it('produces the same key for the same input', () => {
      const series = seasonalSeries();
      expect(scoreCacheKey(series, { rising_queries: 6 })).toBe(
        scoreCacheKey(seasonalSeries(), { rising_queries: 6 })
      );
    });

    it('returns a 64-character hex string', () => {
      expect(scoreCacheKey([])).toMatch(/^[a-f0-9]{64}$/);
    });
  });
});
