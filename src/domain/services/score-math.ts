import { InvalidScoreError } from '@domain/errors/scoring.errors';

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** Arithmetic mean; 0 for an empty list. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}

export function assertUnitScore(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidScoreError(field, value);
  }
}

export function assertFiniteScore(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidScoreError(field, value, 'a finite number');
  }
}

/** Order-preserving union of keyword lists. */
export function unionKeywords(lists: Iterable<readonly string[]>): string[] {
  const seen = new Set<string>();
  for (const list of lists) {
    for (const keyword of list) seen.add(keyword);
  }
  return [...seen];
}

export function secondsSince(startedAt: number): number {
  return Math.max(0, (Date.now() - startedAt) / 1000);
}
