/**
 * Series Normalizer
 * Turns raw collaborator samples into an ordered numeric series.
 *
 * Non-numeric samples are dropped (not zero-filled) so gaps never drag the
 * averages down; negative values are clamped to 0.
 */

import type { EngineConfig } from '@/core/config';
import { DAY_MS, parseTimestamp } from '@/core/time';
import type { DataWarning, RawTimestamp, TimePoint } from '@/types/trends';
import { median } from './normalize';

export interface NormalizedSeries {
  points: TimePoint[];
  values: number[];
  /** Elapsed time since the first sample, in median sampling steps. */
  offsets: number[];
  stepMs: number;
  dropped: number;
  warnings: DataWarning[];
  insufficientData: boolean;
  degenerate: 'all_zero' | 'constant' | null;
}

export interface ParsedSampleValue {
  value: number;
  breakout: boolean;
  negative: boolean;
}

const WARNING_ORDER: DataWarning[] = [
  'insufficient_data',
  'dropped_samples',
  'clamped_negative',
  'breakout_saturated',
  'duplicate_period',
  'degenerate_all_zero',
  'degenerate_constant',
];

function isRawTimestamp(value: unknown): value is RawTimestamp {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Date;
}

export function parseSampleValue(raw: unknown, breakoutValue: number): ParsedSampleValue | null {
  let numeric: number;

  if (typeof raw === 'number') {
    numeric = raw;
  } else if (typeof raw === 'string') {
    const text = raw.trim().toLowerCase();
    if (!text) return null;
    if (text === 'breakout') {
      return { value: breakoutValue, breakout: true, negative: false };
    }
    if (text === '<1') {
      return { value: 0, breakout: false, negative: false };
    }
    numeric = Number(text.replace(/[,%+]/g, ''));
  } else {
    return null;
  }

  if (numeric === Number.POSITIVE_INFINITY) {
    return { value: breakoutValue, breakout: true, negative: false };
  }
  if (!Number.isFinite(numeric)) {
    return null;
  }
  if (numeric < 0) {
    return { value: 0, breakout: false, negative: true };
  }
  return { value: numeric, breakout: false, negative: false };
}

interface Candidate {
  timestamp: Date;
  value: number;
  index: number;
}

export function normalizeSeries(raw: readonly unknown[], config: EngineConfig): NormalizedSeries {
  const flags = new Set<DataWarning>();
  const candidates: Candidate[] = [];
  let dropped = 0;

  raw.forEach((entry, index) => {
    if (entry === null || typeof entry !== 'object') {
      dropped++;
      return;
    }
    const rawTimestamp = 'timestamp' in entry ? entry.timestamp : undefined;
    const rawValue = 'value' in entry ? entry.value : undefined;
    const timestamp = isRawTimestamp(rawTimestamp) ? parseTimestamp(rawTimestamp) : null;
    const parsed = parseSampleValue(rawValue, config.series.breakoutValue);
    if (!timestamp || !parsed) {
      dropped++;
      return;
    }
    if (parsed.negative) flags.add('clamped_negative');
    if (parsed.breakout) flags.add('breakout_saturated');
    candidates.push({ timestamp, value: parsed.value, index });
  });

  if (dropped > 0) flags.add('dropped_samples');

  candidates.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.index - b.index);

  // One sample per timestamp; the latest one in input order wins
  const kept: Candidate[] = [];
  let lastKey: number | null = null;
  for (const candidate of candidates) {
    const key = candidate.timestamp.getTime();
    if (key === lastKey) {
      flags.add('duplicate_period');
      const previous = kept[kept.length - 1];
      if (candidate.index > previous.index) {
        kept[kept.length - 1] = candidate;
      }
      continue;
    }
    kept.push(candidate);
    lastKey = key;
  }

  const points: TimePoint[] = kept.map(({ timestamp, value }) => ({ timestamp, value }));
  const values = points.map((p) => p.value);
  const times = points.map((p) => p.timestamp.getTime());

  const deltas: number[] = [];
  for (let i = 1; i < times.length; i++) {
    deltas.push(times[i] - times[i - 1]);
  }
  const stepMs = deltas.length > 0 ? median(deltas) : DAY_MS;
  const offsets = times.map((t) => (t - times[0]) / stepMs);

  const insufficientData = points.length < Math.max(1, config.series.minSamples);
  if (insufficientData) flags.add('insufficient_data');

  let degenerate: NormalizedSeries['degenerate'] = null;
  if (values.length > 0) {
    if (values.every((v) => v === 0)) {
      degenerate = 'all_zero';
      flags.add('degenerate_all_zero');
    } else if (values.every((v) => v === values[0])) {
      degenerate = 'constant';
      flags.add('degenerate_constant');
    }
  }

  return {
    points,
    values,
    offsets,
    stepMs,
    dropped,
    warnings: WARNING_ORDER.filter((w) => flags.has(w)),
    insufficientData,
    degenerate,
  };
}
