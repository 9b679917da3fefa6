import { registerAs } from '@nestjs/config';
import {
  DEFAULT_MAX_CHARS_PER_SECTION,
  DEFAULT_NEUTRAL_BASELINE,
  ScoringOptions,
} from '@application/scoring-options';
import { isBulletMergeKey } from '@domain/types/scoring.types';
import { DEFAULT_EMBEDDING_MODEL } from './llm.config';

/**
 * Parses `name=weight` pairs separated by commas. Pairs without a numeric
 * weight are skipped.
 */
export function parseWeights(raw: string): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const pair of raw.split(',')) {
    const separator = pair.lastIndexOf('=');
    if (separator <= 0) continue;
    const name = pair.slice(0, separator).trim();
    const weight = Number(pair.slice(separator + 1).trim());
    if (name && pair.slice(separator + 1).trim() !== '' && Number.isFinite(weight)) {
      weights[name] = weight;
    }
  }
  return weights;
}

export function loadScoringConfig(env: NodeJS.ProcessEnv = process.env): ScoringOptions {
  const embeddingModel = env.LLM_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL;
  const weights = env.SCORING_WEIGHTS
    ? parseWeights(env.SCORING_WEIGHTS)
    : { [`embedding_${embeddingModel}`]: 0.4, llm_scorer: 0.6 };
  const bulletKey = env.SCORING_BULLET_KEY ?? 'content';
  const maxChars = parseInt(env.SCORING_MAX_CHARS_PER_SECTION || '', 10);

  return {
    weights,
    normalizeScores: env.SCORING_NORMALIZE === 'true',
    bulletKey: isBulletMergeKey(bulletKey) ? bulletKey : 'content',
    maxCharsPerSection: maxChars > 0 ? maxChars : DEFAULT_MAX_CHARS_PER_SECTION,
    neutralBaseline: env.SCORING_NEUTRAL_BASELINE?.trim() || DEFAULT_NEUTRAL_BASELINE,
  };
}

export default registerAs('scoring', (): ScoringOptions => loadScoringConfig());
