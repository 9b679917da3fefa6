import { Test, TestingModule } from '@nestjs/testing';
import { ScoreResumeUseCase } from '@application/use-cases/score-resume.use-case';
import { CombinedScore } from '@domain/entities/combined-score.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { SectionScore } from '@domain/entities/section-score.entity';
import { ContentSelector } from '@domain/services/content-selector.service';
import { ScoringController } from './scoring.controller';

describe('ScoringController', () => {
  let controller: ScoringController;
  let scoreResumeUseCase: { execute: jest.Mock };

  const combined = new CombinedScore({
    sectionScores: {
      skills: new SectionScore({ sectionId: 'skills', score: 0.7, confidence: 0.8 }),
      hobbies: new SectionScore({ sectionId: 'hobbies', score: 0.1, confidence: 0.2 }),
    },
    overallScore: 0.4,
    componentWeights: { 'embedding_test-model': 0.4, llm_scorer: 0.6 },
    processingTime: 0.01,
  });
  const results = [
    ScoringResult.fromSections('embedding_test-model', {}, 0.5),
    ScoringResult.empty('llm_scorer', 1.5, { error: 'No sections to process' }),
  ];

  beforeEach(async () => {
    scoreResumeUseCase = {
      execute: jest.fn().mockResolvedValue({ runId: 'run-1', combined, results }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ScoringController],
      providers: [
        {
          provide: ScoreResumeUseCase,
          useValue: scoreResumeUseCase,
        },
        ContentSelector,
      ],
    }).compile();

    controller = module.get<ScoringController>(ScoringController);
  });

  describe('score', () => {
    it('should run the pipeline and summarize each component', async () => {
      const response = await controller.score({
        resumeContent: { skills: 'TypeScript' },
        jobDescription: 'Needs TypeScript',
        sections: ['skills'],
        weights: { llm_scorer: 1 },
        maxCharsPerSection: 300,
      });

      expect(scoreResumeUseCase.execute).toHaveBeenCalledWith({
        resumeContent: { skills: 'TypeScript' },
        jobDescription: 'Needs TypeScript',
        sections: ['skills'],
        weights: { llm_scorer: 1 },
        maxCharsPerSection: 300,
      });
      expect(response.runId).toBe('run-1');
      expect(response.combined).toBe(combined);
      expect(response.components).toEqual([
        { componentName: 'embedding_test-model', overallScore: 0, processingTime: 0.5, error: undefined },
        {
          componentName: 'llm_scorer',
          overallScore: 0,
          processingTime: 1.5,
          error: 'No sections to process',
        },
      ]);
      expect(response.selection).toBeUndefined();
    });

    it('should build the reference text from structured job data', async () => {
      await controller.score({
        resumeContent: { skills: 'TypeScript' },
        job: { title: 'Engineer', company: 'Example Ltd' },
      });

      const [command] = scoreResumeUseCase.execute.mock.calls[0];
      expect(command.jobDescription).toMatch(/^Title: Engineer\nCompany: Example Ltd\n\nSummary:\nN\/A/);
    });

    it('should add a content selection when asked', async () => {
      const response = await controller.score({
        resumeContent: { skills: 'TypeScript' },
        select: true,
        selectionOptions: { minSectionScore: 0.5 },
      });

      expect(response.selection?.sectionOrder).toEqual(['skills']);
      expect(response.selection?.relevanceScores).toEqual({ skills: 0.7, hobbies: 0.1 });
    });
  });
});
