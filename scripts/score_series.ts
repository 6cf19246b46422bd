/**
 * Score Series Script
 * Scores one keyword series from a JSON file and prints the result.
 *
 * Usage: npm run score -- <input.json> [--preset name] [--current-month m]
 *
 * Input: { keyword?, series?, timeline?, auxiliary? }. `timeline` accepts the
 * interest-over-time payload of a trends collaborator and is used when no
 * `series` is given.
 */

import './load_env';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { loadEngineConfig } from '../src/core/config';
import { computeScores } from '../src/scoring/engine';
import { timelineToSeries, type TimelinePoint } from '../src/scoring/signals';
import { scoreCacheKey } from '../src/utils/hash';
import { validateEngineResult } from '../src/validation/ajv_instance';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('score_series');

interface ScoreCliArgs {
  inputPath: string;
  presetName?: string;
  currentMonth?: number;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function parseCliArgs(): ScoreCliArgs {
  const args = process.argv.slice(2);
  const inputPath = args.find(
    (arg, i) => !arg.startsWith('--') && !['--preset', '--current-month'].includes(args[i - 1] ?? '')
  );
  if (!inputPath) {
    throw new Error('usage: score_series <input.json> [--preset name] [--current-month m]');
  }

  const monthRaw = readFlag('--current-month');
  const currentMonth = monthRaw === undefined ? undefined : Number(monthRaw);

  return {
    inputPath,
    presetName: readFlag('--preset'),
    currentMonth,
  };
}

function isTimelinePoint(value: unknown): value is TimelinePoint {
  return (
    value !== null &&
    typeof value === 'object' &&
    (!('values' in value) || value.values === undefined || Array.isArray(value.values))
  );
}

function readInput(path: string): { keyword: string | null; series: unknown; auxiliary: unknown } {
  const raw: unknown = JSON.parse(readFileSync(resolve(process.cwd(), path), 'utf-8'));
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`input_invalid: expected an object in ${path}`);
  }

  const keyword = 'keyword' in raw && typeof raw.keyword === 'string' ? raw.keyword : null;
  const auxiliary = 'auxiliary' in raw ? raw.auxiliary : undefined;

  if ('series' in raw) {
    return { keyword, series: raw.series, auxiliary };
  }
  if ('timeline' in raw && Array.isArray(raw.timeline)) {
    return { keyword, series: timelineToSeries(raw.timeline.filter(isTimelinePoint)), auxiliary };
  }
  throw new Error(`input_invalid: missing series or timeline in ${path}`);
}

function main(): void {
  try {
    const args = parseCliArgs();
    const config = loadEngineConfig(process.cwd(), {
      failFast: true,
      presetName: args.presetName,
    });
    const input = readInput(args.inputPath);

    const result = computeScores(input.series, input.auxiliary, {
      config,
      currentMonth: args.currentMonth,
    });

    const validation = validateEngineResult(result);
    if (!validation.valid) {
      logger.error({ errors: validation.errors }, 'Result failed schema validation');
      process.exit(1);
    }

    logger.info(
      {
        keyword: input.keyword,
        trend: result.trend.score,
        potential: result.potential.score,
        opportunity: result.opportunity,
      },
      'Scored keyword'
    );

    const output = {
      keyword: input.keyword,
      cache_key: scoreCacheKey(input.series, input.auxiliary),
      result,
    };
    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    logger.error({ error }, 'Scoring failed');
    console.error('Scoring failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main();
