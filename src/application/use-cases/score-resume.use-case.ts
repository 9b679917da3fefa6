import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { CombinedScore } from '@domain/entities/combined-score.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { ScoreCombiner } from '@domain/services/score-combiner.service';
import { ResumeContent } from '@domain/types/resume-content.types';
import { getErrorInfo } from '@common/error-assertions';
import { ILoggerPort } from '../ports/logger.port';
import { IResumeScorer, RESUME_SCORERS } from '../ports/resume-scorer.port';

export interface ScoreResumeCommand {
  resumeContent: ResumeContent;
  jobDescription?: string;
  sections?: readonly string[];
  /** overrides the configured component weights for this run */
  weights?: Record<string, number>;
  maxCharsPerSection?: number;
}

export interface ScoreResumeOutcome {
  runId: string;
  combined: CombinedScore;
  results: ScoringResult[];
}

/**
 * Runs every registered scorer on the same résumé, then combines their
 * results. Rejects only when a scorer rejects (embedding backend failure).
 */
@Injectable()
export class ScoreResumeUseCase {
  constructor(
    @Inject(RESUME_SCORERS) private readonly scorers: readonly IResumeScorer[],
    private readonly combiner: ScoreCombiner,
    @Inject('ILoggerPort') private readonly logger: ILoggerPort,
  ) {}

  async execute(command: ScoreResumeCommand): Promise<ScoreResumeOutcome> {
    const runId = uuidv4();
    const context = { runId, serviceName: 'ScoreResumeUseCase' };

    this.logger.info(`Scoring resume with ${this.scorers.length} components`, context, {
      components: this.scorers.map((scorer) => scorer.componentName),
      sections: command.sections ?? 'all',
    });

    let results: ScoringResult[];
    try {
      results = await Promise.all(
        this.scorers.map((scorer) =>
          scorer.scoreContent({
            resumeContent: command.resumeContent,
            jobDescription: command.jobDescription,
            sections: command.sections,
            maxCharsPerSection: command.maxCharsPerSection,
          }),
        ),
      );
    } catch (error) {
      this.logger.error(`Scoring failed: ${getErrorInfo(error).message}`, error, context);
      throw error;
    }

    for (const result of results) {
      if (result.error) {
        this.logger.warn(`${result.componentName} returned no scores: ${result.error}`, {
          ...context,
          componentName: result.componentName,
        });
      }
    }

    const combined = this.combiner.combineResults(results, command.weights);
    const unweighted = combined.metadata.unweighted_components;
    if (Array.isArray(unweighted) && unweighted.length > 0) {
      this.logger.warn(
        `No weight configured for ${unweighted.join(', ')}; excluded from section scores`,
        context,
      );
    }

    this.logger.info(`Combined overall score ${combined.overallScore.toFixed(3)}`, context, {
      sectionCount: Object.keys(combined.sectionScores).length,
      processingTime: combined.processingTime,
    });

    return { runId, combined, results };
  }
}
