import { InvalidScoreError } from '@domain/errors/scoring.errors';
import { ScoringResult } from './scoring-result.entity';
import { SectionScore } from './section-score.entity';

describe('ScoringResult', () => {
  const skills = new SectionScore({ sectionId: 'skills', score: 0.8, confidence: 0.9 });
  const summary = new SectionScore({ sectionId: 'summary', score: 0.4, confidence: 0.5 });

  it('should compute the overall score as the mean of its sections', () => {
    const result = ScoringResult.fromSections('llm_scorer', { skills, summary }, 1.5, {
      section_count: 2,
    });

    expect(result.overallScore).toBeCloseTo(0.6);
    expect(result.metadata).toEqual({ section_count: 2 });
    expect(result.error).toBeUndefined();
  });

  it('should score an empty result zero and expose its error', () => {
    const result = ScoringResult.empty('llm_scorer', 0.1, { error: 'No sections to process' });

    expect(result.sectionScores).toEqual({});
    expect(result.overallScore).toBe(0);
    expect(result.error).toBe('No sections to process');
  });

  it('should not be mutable after construction', () => {
    const sections: Record<string, SectionScore> = { skills };
    const result = ScoringResult.fromSections('embedding_test', sections, 0);
    sections.summary = summary;

    expect(Object.keys(result.sectionScores)).toEqual(['skills']);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.sectionScores)).toBe(true);
  });

  it('should clamp a negative processing time to zero', () => {
    expect(ScoringResult.empty('llm_scorer', -3).processingTime).toBe(0);
  });

  it('should reject an overall score outside [0, 1]', () => {
    expect(
      () =>
        new ScoringResult({
          componentName: 'llm_scorer',
          sectionScores: {},
          overallScore: 1.5,
          processingTime: 0,
        }),
    ).toThrow(InvalidScoreError);
  });
});
