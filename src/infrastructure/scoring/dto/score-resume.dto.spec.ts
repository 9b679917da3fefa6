import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ScoreResumeDto } from './score-resume.dto';

function errorsFor(body: Record<string, unknown>): string[] {
  return validateSync(plainToInstance(ScoreResumeDto, body)).map((error) => error.property);
}

describe('ScoreResumeDto', () => {
  it('should accept a minimal body', () => {
    expect(errorsFor({ resumeContent: { skills: 'TypeScript' } })).toEqual([]);
  });

  it('should require resume content', () => {
    expect(errorsFor({ jobDescription: 'x' })).toEqual(['resumeContent']);
  });

  it('should reject negative or non-numeric weights', () => {
    expect(errorsFor({ resumeContent: {}, weights: { llm_scorer: -1 } })).toEqual(['weights']);
    expect(errorsFor({ resumeContent: {}, weights: { llm_scorer: 'high' } })).toEqual(['weights']);
    expect(errorsFor({ resumeContent: {}, weights: { llm_scorer: 0, other: 2.5 } })).toEqual([]);
  });

  it('should require a positive integer truncation limit', () => {
    expect(errorsFor({ resumeContent: {}, maxCharsPerSection: 0 })).toEqual(['maxCharsPerSection']);
    expect(errorsFor({ resumeContent: {}, maxCharsPerSection: 2.5 })).toEqual(['maxCharsPerSection']);
  });

  it('should validate nested job data and selection options', () => {
    expect(errorsFor({ resumeContent: {}, job: { requirements: 'TypeScript' } })).toEqual(['job']);
    expect(
      errorsFor({ resumeContent: {}, selectionOptions: { minSectionScore: 2 } }),
    ).toEqual(['selectionOptions']);
  });
});
