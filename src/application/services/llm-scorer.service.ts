import { Inject, Injectable } from '@nestjs/common';
import { ScoredBullet } from '@domain/entities/scored-bullet.entity';
import { ScoredEntry } from '@domain/entities/scored-entry.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { SectionScore } from '@domain/entities/section-score.entity';
import {
  InvalidLlmReplyError,
  LlmClientError,
  ScoringError,
} from '@domain/errors/scoring.errors';
import { extractSection, selectSections } from '@domain/services/resume-text.extractor';
import { secondsSince } from '@domain/services/score-math';
import { getErrorInfo } from '@common/error-assertions';
import {
  LlmEntryReplyDto,
  LlmScoringReplyDto,
  LlmSectionReplyDto,
  parseLlmScoringReply,
} from '../dto/llm-scoring-reply.dto';
import { ILlmClient, LLM_CLIENT } from '../ports/llm-client.port';
import { ILoggerPort } from '../ports/logger.port';
import { IResumeScorer, ScoreContentRequest } from '../ports/resume-scorer.port';
import { SCORING_OPTIONS, ScoringOptions } from '../scoring-options';
import { buildScoringPrompt } from './llm-scoring.prompt';

export const NO_SECTIONS_ERROR = 'No sections to process';

type LlmScoringOutcome =
  | { ok: true; sectionScores: Record<string, SectionScore> }
  | { ok: false; error: ScoringError };

function toEntry(entry: LlmEntryReplyDto): ScoredEntry {
  return new ScoredEntry({
    entryId: entry.entry_id,
    entryType: entry.entry_type,
    score: entry.score,
    confidence: entry.confidence,
    matchedKeywords: entry.matched_keywords,
    relevanceExplanation: entry.explanation,
    bullets: entry.bullets.map(
      (bullet) =>
        new ScoredBullet({
          content: bullet.content,
          score: bullet.score,
          confidence: bullet.confidence,
          matchedKeywords: bullet.matched_keywords,
          relevanceExplanation: bullet.explanation,
        }),
    ),
  });
}

function toSection(section: LlmSectionReplyDto): SectionScore {
  return new SectionScore({
    sectionId: section.section_id,
    score: section.score,
    confidence: section.confidence,
    matchedKeywords: section.matched_keywords,
    relevanceExplanation: section.explanation,
    entries: section.entries.map(toEntry),
  });
}

function toSectionScores(reply: LlmScoringReplyDto): Record<string, SectionScore> {
  const sectionScores: Record<string, SectionScore> = {};
  for (const section of reply.sections) {
    sectionScores[section.section_id] = toSection(section);
  }
  return sectionScores;
}

/**
 * Asks an LLM to judge every selected section, entry and bullet in one
 * prompt. Never rejects: transport and validation failures come back as an
 * empty result with `metadata.error` set.
 */
@Injectable()
export class LlmScorerService implements IResumeScorer {
  readonly componentName = 'llm_scorer';

  constructor(
    @Inject(LLM_CLIENT) private readonly llmClient: ILlmClient,
    @Inject(SCORING_OPTIONS) private readonly options: ScoringOptions,
    @Inject('ILoggerPort') private readonly logger: ILoggerPort,
  ) {}

  async scoreContent(request: ScoreContentRequest): Promise<ScoringResult> {
    const startedAt = Date.now();
    const maxCharsPerSection = request.maxCharsPerSection ?? this.options.maxCharsPerSection;

    const selected = selectSections(request.resumeContent, request.sections);
    if (selected.length === 0) {
      return ScoringResult.empty(this.componentName, secondsSince(startedAt), {
        error: NO_SECTIONS_ERROR,
      });
    }

    const outcome = await this.judge(() =>
      buildScoringPrompt(
        request.jobDescription ?? '',
        selected.map(([sectionId, data]) => extractSection(sectionId, data)),
        maxCharsPerSection,
      ),
    );
    if (!outcome.ok) {
      this.logger.warn(`LLM scoring degraded: ${outcome.error.message}`, 'LlmScorerService', {
        code: outcome.error.code,
      });
      return ScoringResult.empty(this.componentName, secondsSince(startedAt), {
        error: outcome.error.message,
        error_code: outcome.error.code,
        max_chars_per_section: maxCharsPerSection,
      });
    }

    return ScoringResult.fromSections(
      this.componentName,
      outcome.sectionScores,
      secondsSince(startedAt),
      {
        section_count: Object.keys(outcome.sectionScores).length,
        max_chars_per_section: maxCharsPerSection,
      },
    );
  }

  private async judge(renderPrompt: () => string): Promise<LlmScoringOutcome> {
    let prompt: string;
    try {
      prompt = renderPrompt();
    } catch (error) {
      return {
        ok: false,
        error: new LlmClientError(
          `Could not build the scoring prompt: ${getErrorInfo(error).message}`,
          { cause: error },
        ),
      };
    }
    this.logger.debug('Requesting LLM judgement', 'LlmScorerService', {
      promptLength: prompt.length,
    });

    let raw: unknown;
    try {
      raw = await this.llmClient.generate(prompt);
    } catch (error) {
      if (error instanceof ScoringError) return { ok: false, error };
      return {
        ok: false,
        error: new LlmClientError(`LLM request failed: ${getErrorInfo(error).message}`, {
          cause: error,
        }),
      };
    }

    const parsed = parseLlmScoringReply(raw);
    if (!parsed.ok) {
      return { ok: false, error: new InvalidLlmReplyError(parsed.error) };
    }

    try {
      return { ok: true, sectionScores: toSectionScores(parsed.reply) };
    } catch (error) {
      return { ok: false, error: new InvalidLlmReplyError(getErrorInfo(error).message) };
    }
  }
}
