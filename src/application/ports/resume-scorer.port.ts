import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { ResumeContent } from '@domain/types/resume-content.types';

export interface ScoreContentRequest {
  resumeContent: ResumeContent;
  /** Reference text; scorers decide how to handle its absence. */
  jobDescription?: string;
  /** Allow-list of section ids; empty or absent means every section. */
  sections?: readonly string[];
  maxCharsPerSection?: number;
}

/**
 * Resume Scorer Port
 *
 * Implemented by every scoring strategy. The combiner only ever sees the
 * returned ScoringResult.
 */
export interface IResumeScorer {
  readonly componentName: string;
  scoreContent(request: ScoreContentRequest): Promise<ScoringResult>;
}

export const RESUME_SCORERS = Symbol('RESUME_SCORERS');
