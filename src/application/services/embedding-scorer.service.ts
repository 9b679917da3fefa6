import { Inject, Injectable } from '@nestjs/common';
import { ScoredBullet } from '@domain/entities/scored-bullet.entity';
import { ScoredEntry } from '@domain/entities/scored-entry.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { SectionScore } from '@domain/entities/section-score.entity';
import { EmbeddingBackendError } from '@domain/errors/scoring.errors';
import {
  ExtractedEntry,
  ExtractedSection,
  extractSection,
  selectSections,
} from '@domain/services/resume-text.extractor';
import { clampUnit, secondsSince } from '@domain/services/score-math';
import { getErrorInfo } from '@common/error-assertions';
import { EMBEDDING_BACKEND, IEmbeddingBackend } from '../ports/embedding-backend.port';
import { ILoggerPort } from '../ports/logger.port';
import { IResumeScorer, ScoreContentRequest } from '../ports/resume-scorer.port';
import { SCORING_OPTIONS, ScoringOptions } from '../scoring-options';

interface Similarity {
  score: number;
  confidence: number;
}

/**
 * Scores résumé content by cosine similarity between its embedding and the
 * embedding of a reference text. Content without text is left out of the
 * result rather than scored 0. Backend failures are fatal for the call.
 */
@Injectable()
export class EmbeddingScorerService implements IResumeScorer {
  constructor(
    @Inject(EMBEDDING_BACKEND) private readonly backend: IEmbeddingBackend,
    @Inject(SCORING_OPTIONS) private readonly options: ScoringOptions,
    @Inject('ILoggerPort') private readonly logger: ILoggerPort,
  ) {}

  get componentName(): string {
    return `embedding_${this.backend.modelName}`;
  }

  /** 0 when either vector has zero length. */
  static cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      throw new EmbeddingBackendError(
        `Embedding dimensions differ: ${a.length} vs ${b.length}`,
      );
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
      dot += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;
    const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
    return Number.isFinite(similarity) ? similarity : 0;
  }

  async scoreContent(request: ScoreContentRequest): Promise<ScoringResult> {
    const startedAt = Date.now();
    const jobDescription = request.jobDescription?.trim();
    const reference = jobDescription ? 'job_description' : 'neutral_baseline';

    this.logger.debug(`Scoring with ${this.componentName}`, 'EmbeddingScorerService', {
      reference,
    });

    const referenceVector = await this.embed(jobDescription || this.options.neutralBaseline);

    const sectionScores: Record<string, SectionScore> = {};
    for (const [sectionId, data] of selectSections(request.resumeContent, request.sections)) {
      const section = extractSection(sectionId, data);
      if (!section.text) continue;
      sectionScores[sectionId] = await this.scoreSection(section, referenceVector);
    }

    const result = ScoringResult.fromSections(
      this.componentName,
      sectionScores,
      secondsSince(startedAt),
      {
        model_name: this.backend.modelName,
        section_count: Object.keys(sectionScores).length,
        reference,
      },
    );

    this.logger.debug(
      `Scored ${Object.keys(sectionScores).length} sections, overall ${result.overallScore.toFixed(3)}`,
      'EmbeddingScorerService',
    );
    return result;
  }

  private async scoreSection(
    section: ExtractedSection,
    referenceVector: readonly number[],
  ): Promise<SectionScore> {
    const similarity = await this.similarity(section.text, referenceVector);

    const entries: ScoredEntry[] = [];
    for (const entry of section.entries) {
      if (!entry.text) continue;
      entries.push(await this.scoreEntry(entry, referenceVector));
    }

    return new SectionScore({ sectionId: section.sectionId, ...similarity, entries });
  }

  private async scoreEntry(
    entry: ExtractedEntry,
    referenceVector: readonly number[],
  ): Promise<ScoredEntry> {
    const similarity = await this.similarity(entry.text, referenceVector);

    const bullets: ScoredBullet[] = [];
    for (const content of entry.bullets) {
      bullets.push(new ScoredBullet({ content, ...(await this.similarity(content, referenceVector)) }));
    }

    return new ScoredEntry({
      entryId: entry.entryId,
      entryType: entry.entryType,
      ...similarity,
      bullets,
    });
  }

  private async similarity(text: string, referenceVector: readonly number[]): Promise<Similarity> {
    const raw = EmbeddingScorerService.cosineSimilarity(await this.embed(text), referenceVector);
    return { score: clampUnit(raw), confidence: raw };
  }

  private async embed(text: string): Promise<number[]> {
    try {
      return await this.backend.embed(text.trim().toLowerCase());
    } catch (error) {
      const info = getErrorInfo(error);
      this.logger.error(`Embedding request failed: ${info.message}`, error, 'EmbeddingScorerService');
      if (error instanceof EmbeddingBackendError) throw error;
      throw new EmbeddingBackendError(info.message, { cause: error });
    }
  }
}
