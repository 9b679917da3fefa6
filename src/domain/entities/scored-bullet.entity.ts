import { ScoredNode } from '@domain/types/scoring.types';
import { assertFiniteScore, assertUnitScore } from '@domain/services/score-math';

export interface ScoredBulletProps {
  content: string;
  score: number;
  confidence: number;
  matchedKeywords?: readonly string[];
  relevanceExplanation?: string;
}

/** One highlight line of an entry, scored. */
export class ScoredBullet implements ScoredNode {
  readonly content: string;
  readonly score: number;
  readonly confidence: number;
  readonly matchedKeywords: readonly string[];
  readonly relevanceExplanation?: string;

  constructor(props: ScoredBulletProps) {
    assertUnitScore('bullet score', props.score);
    assertFiniteScore('bullet confidence', props.confidence);

    this.content = props.content;
    this.score = props.score;
    this.confidence = props.confidence;
    this.matchedKeywords = Object.freeze([...(props.matchedKeywords ?? [])]);
    if (props.relevanceExplanation) {
      this.relevanceExplanation = props.relevanceExplanation;
    }
    Object.freeze(this);
  }
}
