import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ScoreResumeUseCase } from '@application/use-cases/score-resume.use-case';
import { CombinedScore } from '@domain/entities/combined-score.entity';
import { ContentSelection } from '@domain/entities/content-selection.entity';
import { ContentSelector } from '@domain/services/content-selector.service';
import { formatJobDescription } from '@domain/services/job-description.formatter';
import { ScoreResumeDto } from './dto/score-resume.dto';

export interface ComponentSummary {
  componentName: string;
  overallScore: number;
  processingTime: number;
  error?: string;
}

export interface ScoreResumeResponse {
  runId: string;
  combined: CombinedScore;
  components: ComponentSummary[];
  selection?: ContentSelection;
}

@Controller('scoring')
export class ScoringController {
  constructor(
    private readonly scoreResumeUseCase: ScoreResumeUseCase,
    private readonly contentSelector: ContentSelector,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async score(@Body() body: ScoreResumeDto): Promise<ScoreResumeResponse> {
    const jobDescription =
      body.jobDescription ?? (body.job ? formatJobDescription(body.job) : undefined);

    const { runId, combined, results } = await this.scoreResumeUseCase.execute({
      resumeContent: body.resumeContent,
      jobDescription,
      sections: body.sections,
      weights: body.weights,
      maxCharsPerSection: body.maxCharsPerSection,
    });

    const response: ScoreResumeResponse = {
      runId,
      combined,
      components: results.map((result) => ({
        componentName: result.componentName,
        overallScore: result.overallScore,
        processingTime: result.processingTime,
        error: result.error,
      })),
    };
    if (body.select) {
      response.selection = this.contentSelector.select(combined, body.selectionOptions);
    }
    return response;
  }
}
