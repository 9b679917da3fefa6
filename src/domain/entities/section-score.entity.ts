import { ScoredNode } from '@domain/types/scoring.types';
import { assertFiniteScore, assertUnitScore } from '@domain/services/score-math';
import { ScoredEntry } from './scored-entry.entity';

export interface SectionScoreProps {
  sectionId: string;
  score: number;
  confidence: number;
  matchedKeywords?: readonly string[];
  relevanceExplanation?: string;
  entries?: readonly ScoredEntry[];
}

/**
 * Score for one résumé section. Flat sections such as skills carry no
 * entries.
 */
export class SectionScore implements ScoredNode {
  readonly sectionId: string;
  readonly score: number;
  readonly confidence: number;
  readonly matchedKeywords: readonly string[];
  readonly relevanceExplanation?: string;
  readonly entries: readonly ScoredEntry[];

  constructor(props: SectionScoreProps) {
    assertUnitScore(`section ${props.sectionId} score`, props.score);
    assertFiniteScore(`section ${props.sectionId} confidence`, props.confidence);

    this.sectionId = props.sectionId;
    this.score = props.score;
    this.confidence = props.confidence;
    this.matchedKeywords = Object.freeze([...(props.matchedKeywords ?? [])]);
    if (props.relevanceExplanation) {
      this.relevanceExplanation = props.relevanceExplanation;
    }
    this.entries = Object.freeze([...(props.entries ?? [])]);
    Object.freeze(this);
  }

  /** Copy with a different score; used by score normalization. */
  withScore(score: number): SectionScore {
    return new SectionScore({ ...this, score });
  }
}
