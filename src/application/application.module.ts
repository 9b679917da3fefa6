import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ContentSelector } from '@domain/services/content-selector.service';
import { ScoreCombiner } from '@domain/services/score-combiner.service';
import { IResumeScorer, RESUME_SCORERS } from './ports/resume-scorer.port';
import { defaultScoringOptions, SCORING_OPTIONS, ScoringOptions } from './scoring-options';
import { EmbeddingScorerService } from './services/embedding-scorer.service';
import { LlmScorerService } from './services/llm-scorer.service';
import { ScoreResumeUseCase } from './use-cases/score-resume.use-case';

@Module({
  providers: [
    {
      provide: SCORING_OPTIONS,
      useFactory: (config: ConfigService): ScoringOptions =>
        config.get<ScoringOptions>('scoring') ?? defaultScoringOptions(),
      inject: [ConfigService],
    },
    // Scorers
    EmbeddingScorerService,
    LlmScorerService,
    {
      provide: RESUME_SCORERS,
      useFactory: (embedding: EmbeddingScorerService, llm: LlmScorerService): IResumeScorer[] => [
        embedding,
        llm,
      ],
      inject: [EmbeddingScorerService, LlmScorerService],
    },
    // Domain services (framework-agnostic classes can be provided without decorators)
    {
      provide: ScoreCombiner,
      useFactory: (options: ScoringOptions) =>
        new ScoreCombiner({
          weights: options.weights,
          normalizeScores: options.normalizeScores,
          bulletKey: options.bulletKey,
        }),
      inject: [SCORING_OPTIONS],
    },
    ContentSelector,
    // Use cases
    ScoreResumeUseCase,
  ],
  exports: [ScoreResumeUseCase, ContentSelector, SCORING_OPTIONS],
})
export class ApplicationModule {}
