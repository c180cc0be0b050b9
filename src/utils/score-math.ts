import { type BoundaryPolicy, type WeightedScore } from '../types';

export const WEIGHT_TOLERANCE = 1e-9;

const SCORE_PRECISION = 1e9;

/** Linear saturation of a hit count into [0,1]. */
export function saturate(count: number, cap: number): number {
  if (cap <= 0 || count <= 0) return 0;
  return Math.min(1, count / cap);
}

/**
 * Clamps to [0,1] and rounds away float noise so that totals such as
 * 0.8499999999999999 compare as 0.85 against bucket boundaries.
 */
export function normalizeScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const rounded = Math.round(value * SCORE_PRECISION) / SCORE_PRECISION;
  return Math.min(1, Math.max(0, rounded));
}

export function weightSum(scores: Record<string, WeightedScore>): number {
  return Object.values(scores).reduce((sum, s) => sum + s.weight, 0);
}

export function assertWeightsSumToOne(weights: Record<string, number>, label: string): void {
  const sum = Object.values(weights).reduce((acc, w) => acc + w, 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`${label} weights must sum to 1.0, got ${sum}`);
  }
}

export function weightedTotal(scores: Record<string, WeightedScore>): number {
  const raw = Object.values(scores).reduce((sum, s) => sum + s.value * s.weight, 0);
  return normalizeScore(raw);
}

export function meetsThreshold(value: number, threshold: number, policy: BoundaryPolicy): boolean {
  return policy === 'inclusive' ? value >= threshold : value > threshold;
}

export function isOnBoundary(value: number, boundaries: number[]): boolean {
  return boundaries.some((b) => Math.abs(value - b) <= WEIGHT_TOLERANCE);
}
