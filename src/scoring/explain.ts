/**
 * Human-readable explanations for trend and potential scores
 */

import type { GrowthMetrics } from './growth';

export const INSUFFICIENT_DATA_EXPLANATION = 'Not enough data to score this keyword.';

export function explainTrend(score: number, growth: GrowthMetrics): string {
  let base: string;
  if (score >= 75) base = 'Very strong trend.';
  else if (score >= 50) base = 'Moderate trend.';
  else base = 'Weak trend.';

  const details: string[] = [];
  if (growth.growthPct > 20) {
    details.push(`High growth (${Math.round(growth.growthPct)}%)`);
  } else if (growth.growthPct < -10) {
    details.push(`Declining (${Math.round(growth.growthPct)}%)`);
  }

  if (growth.accelerationPct > 5) {
    details.push('accelerating');
  } else if (growth.accelerationPct < -5) {
    details.push('decelerating');
  }

  return details.length > 0 ? `${base} ${details.join(', ')}` : base;
}

export function explainPotential(score: number, risingQueries: number): string {
  let base: string;
  if (score >= 75) base = 'High breakout potential.';
  else if (score >= 50) base = 'Moderate potential.';
  else base = 'Limited potential.';

  if (risingQueries > 0) {
    const noun = risingQueries === 1 ? 'query' : 'queries';
    base += ` ${risingQueries} rising related ${noun}.`;
  }
  return base;
}
