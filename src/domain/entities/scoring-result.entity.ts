import { ScoringMetadata } from '@domain/types/scoring.types';
import { assertUnitScore, mean } from '@domain/services/score-math';
import { SectionScore } from './section-score.entity';

export interface ScoringResultProps {
  componentName: string;
  sectionScores: Readonly<Record<string, SectionScore>>;
  overallScore: number;
  /** Seconds. */
  processingTime: number;
  metadata?: ScoringMetadata;
}

/**
 * Output of exactly one scoring component for one call. Created once,
 * never mutated.
 */
export class ScoringResult {
  readonly componentName: string;
  readonly sectionScores: Readonly<Record<string, SectionScore>>;
  readonly overallScore: number;
  readonly processingTime: number;
  readonly metadata: Readonly<ScoringMetadata>;

  constructor(props: ScoringResultProps) {
    assertUnitScore(`${props.componentName} overall score`, props.overallScore);

    this.componentName = props.componentName;
    this.sectionScores = Object.freeze({ ...props.sectionScores });
    this.overallScore = props.overallScore;
    this.processingTime = Math.max(0, props.processingTime);
    this.metadata = Object.freeze({ ...(props.metadata ?? {}) });
    Object.freeze(this);
  }

  /** Builds a result whose overall score is the mean of its section scores. */
  static fromSections(
    componentName: string,
    sectionScores: Readonly<Record<string, SectionScore>>,
    processingTime: number,
    metadata: ScoringMetadata = {},
  ): ScoringResult {
    return new ScoringResult({
      componentName,
      sectionScores,
      overallScore: mean(Object.values(sectionScores).map((s) => s.score)),
      processingTime,
      metadata,
    });
  }

  static empty(
    componentName: string,
    processingTime: number,
    metadata: ScoringMetadata = {},
  ): ScoringResult {
    return new ScoringResult({
      componentName,
      sectionScores: {},
      overallScore: 0,
      processingTime,
      metadata,
    });
  }

  get error(): string | undefined {
    const error = this.metadata.error;
    return typeof error === 'string' ? error : undefined;
  }
}
