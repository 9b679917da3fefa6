/** Fields shared by every level of the scoring tree. */
export interface ScoredNode {
  readonly score: number;
  readonly confidence: number;
  readonly matchedKeywords: readonly string[];
  readonly relevanceExplanation?: string;
}

export type ScoringMetadata = Record<string, unknown>;

/** How bullets are matched across components when results are combined. */
export type BulletMergeKey = 'content' | 'position';

export function isBulletMergeKey(value: unknown): value is BulletMergeKey {
  return value === 'content' || value === 'position';
}
