import { ScoredNode } from '@domain/types/scoring.types';
import { assertFiniteScore, assertUnitScore } from '@domain/services/score-math';
import { ScoredBullet } from './scored-bullet.entity';

export interface ScoredEntryProps {
  entryId: string;
  entryType: string;
  score: number;
  confidence: number;
  matchedKeywords?: readonly string[];
  relevanceExplanation?: string;
  bullets?: readonly ScoredBullet[];
}

/** An experience, education or project item within a section. */
export class ScoredEntry implements ScoredNode {
  readonly entryId: string;
  readonly entryType: string;
  readonly score: number;
  readonly confidence: number;
  readonly matchedKeywords: readonly string[];
  readonly relevanceExplanation?: string;
  readonly bullets: readonly ScoredBullet[];

  constructor(props: ScoredEntryProps) {
    assertUnitScore(`entry ${props.entryId} score`, props.score);
    assertFiniteScore(`entry ${props.entryId} confidence`, props.confidence);

    this.entryId = props.entryId;
    this.entryType = props.entryType;
    this.score = props.score;
    this.confidence = props.confidence;
    this.matchedKeywords = Object.freeze([...(props.matchedKeywords ?? [])]);
    if (props.relevanceExplanation) {
      this.relevanceExplanation = props.relevanceExplanation;
    }
    this.bullets = Object.freeze([...(props.bullets ?? [])]);
    Object.freeze(this);
  }
}
