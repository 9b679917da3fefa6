import { ScoringMetadata } from '@domain/types/scoring.types';
import { assertUnitScore } from '@domain/services/score-math';
import { SectionScore } from './section-score.entity';

export interface CombinedScoreProps {
  sectionScores: Readonly<Record<string, SectionScore>>;
  overallScore: number;
  componentWeights: Readonly<Record<string, number>>;
  processingTime: number;
  metadata?: ScoringMetadata;
}

export class CombinedScore {
  readonly sectionScores: Readonly<Record<string, SectionScore>>;
  readonly overallScore: number;
  /** Normalized; values sum to 1 unless every configured weight was 0. */
  readonly componentWeights: Readonly<Record<string, number>>;
  readonly processingTime: number;
  readonly metadata: Readonly<ScoringMetadata>;

  constructor(props: CombinedScoreProps) {
    assertUnitScore('combined overall score', props.overallScore);

    this.sectionScores = Object.freeze({ ...props.sectionScores });
    this.overallScore = props.overallScore;
    this.componentWeights = Object.freeze({ ...props.componentWeights });
    this.processingTime = Math.max(0, props.processingTime);
    this.metadata = Object.freeze({ ...(props.metadata ?? {}) });
    Object.freeze(this);
  }
}
