import { BulletMergeKey } from '@domain/types/scoring.types';

export const DEFAULT_NEUTRAL_BASELINE =
  'A professional resume describing work experience, education, projects and skills.';

export const DEFAULT_MAX_CHARS_PER_SECTION = 500;

/** Settings shared by the scorers and the combiner. */
export interface ScoringOptions {
  /** component name -> weight; empty means equal weights */
  weights: Record<string, number>;
  normalizeScores: boolean;
  bulletKey: BulletMergeKey;
  maxCharsPerSection: number;
  /** reference text for embedding scoring when no job description is given */
  neutralBaseline: string;
}

export const SCORING_OPTIONS = Symbol('SCORING_OPTIONS');

export const defaultScoringOptions = (): ScoringOptions => ({
  weights: {},
  normalizeScores: false,
  bulletKey: 'content',
  maxCharsPerSection: DEFAULT_MAX_CHARS_PER_SECTION,
  neutralBaseline: DEFAULT_NEUTRAL_BASELINE,
});
