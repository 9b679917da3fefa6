import { CombinedScore } from '@domain/entities/combined-score.entity';
import { ScoredBullet } from '@domain/entities/scored-bullet.entity';
import { ScoredEntry } from '@domain/entities/scored-entry.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { SectionScore } from '@domain/entities/section-score.entity';
import { BulletMergeKey, ScoringMetadata } from '@domain/types/scoring.types';
import { childContributions, mergeLevel, MergeLevel } from './score-merge';
import { mean, secondsSince } from './score-math';

export type ComponentWeights = Readonly<Record<string, number>>;

export interface ScoreCombinerOptions {
  /** component name -> weight, used when a call passes no custom weights */
  weights?: ComponentWeights;
  /** min-max normalize each component's section scores before weighting */
  normalizeScores?: boolean;
  bulletKey?: BulletMergeKey;
}

export interface ResolvedWeights {
  weights: Record<string, number>;
  /** components present in the results that the weight map does not name */
  unweighted: string[];
}

/**
 * Negative and non-finite weights count as 0. Weights are divided by their
 * sum; a zero sum leaves every weight at 0.
 */
export function normalizeWeights(raw: ComponentWeights): Record<string, number> {
  const clamped = Object.entries(raw).map(
    ([name, weight]) => [name, Number.isFinite(weight) && weight > 0 ? weight : 0] as const,
  );
  const total = clamped.reduce((sum, [, weight]) => sum + weight, 0);
  return Object.fromEntries(clamped.map(([name, weight]) => [name, total > 0 ? weight / total : 0]));
}

/**
 * Custom weights, then configured weights, then 1.0 per component present.
 * A component missing from a non-empty weight map gets 0, not 1.0, and is
 * reported in `unweighted`.
 */
export function resolveComponentWeights(
  componentNames: readonly string[],
  customWeights: ComponentWeights | undefined,
  configuredWeights: ComponentWeights,
): ResolvedWeights {
  let source: ComponentWeights;
  if (customWeights && Object.keys(customWeights).length > 0) {
    source = customWeights;
  } else if (Object.keys(configuredWeights).length > 0) {
    source = configuredWeights;
  } else {
    source = Object.fromEntries(componentNames.map((name) => [name, 1]));
  }

  const unweighted = [...new Set(componentNames)].filter(
    (name) => !Object.prototype.hasOwnProperty.call(source, name),
  );
  return { weights: normalizeWeights(source), unweighted };
}

/** Min-max scaling; equal scores all map to 0.5. */
export function normalizeSectionScores(
  sectionScores: Readonly<Record<string, SectionScore>>,
): Record<string, SectionScore> {
  const sections = Object.values(sectionScores);
  if (sections.length === 0) return {};

  const scores = sections.map((section) => section.score);
  const min = Math.min(...scores);
  const range = Math.max(...scores) - min;

  const normalized: Record<string, SectionScore> = {};
  for (const [sectionId, section] of Object.entries(sectionScores)) {
    normalized[sectionId] = section.withScore(range === 0 ? 0.5 : (section.score - min) / range);
  }
  return normalized;
}

/**
 * Merges independently produced scoring results into one combined score.
 * Sections are matched by id across components and weighted per component;
 * entries (by id) and bullets (by content or position) are averaged without
 * weights. Never throws for empty input or zero weights.
 */
export class ScoreCombiner {
  readonly weights: ComponentWeights;
  readonly normalizeScores: boolean;
  readonly bulletKey: BulletMergeKey;

  private readonly bulletLevel: MergeLevel<ScoredBullet, ScoredBullet>;
  private readonly entryLevel: MergeLevel<ScoredEntry, ScoredEntry>;
  private readonly sectionLevel: MergeLevel<SectionScore, SectionScore>;

  constructor(options: ScoreCombinerOptions = {}) {
    this.weights = Object.freeze({ ...(options.weights ?? {}) });
    this.normalizeScores = options.normalizeScores ?? false;
    this.bulletKey = options.bulletKey ?? 'content';

    this.bulletLevel = {
      keyOf: (bullet, index) => (this.bulletKey === 'position' ? `#${index}` : bullet.content),
      build: (_key, merged, members) =>
        new ScoredBullet({ content: members[0].node.content, ...merged }),
    };

    this.entryLevel = {
      keyOf: (entry) => entry.entryId,
      build: (entryId, merged, members) =>
        new ScoredEntry({
          entryId,
          entryType: members[0].node.entryType,
          ...merged,
          bullets: mergeLevel(
            childContributions(members, (entry) => entry.bullets),
            this.bulletLevel,
          ),
        }),
    };

    this.sectionLevel = {
      keyOf: (section) => section.sectionId,
      build: (sectionId, merged, members) =>
        new SectionScore({
          sectionId,
          ...merged,
          entries: mergeLevel(
            childContributions(members, (section) => section.entries),
            this.entryLevel,
          ),
        }),
    };
  }

  combineResults(
    results: readonly ScoringResult[],
    customWeights?: ComponentWeights,
  ): CombinedScore {
    const startedAt = Date.now();
    const { weights, unweighted } = resolveComponentWeights(
      results.map((result) => result.componentName),
      customWeights,
      this.weights,
    );

    const contributions = results.map((result) => {
      const sectionScores = this.normalizeScores
        ? normalizeSectionScores(result.sectionScores)
        : result.sectionScores;
      return {
        nodes: Object.values(sectionScores),
        weight: weights[result.componentName] ?? 0,
      };
    });

    const sectionScores: Record<string, SectionScore> = {};
    for (const section of mergeLevel(contributions, this.sectionLevel)) {
      sectionScores[section.sectionId] = section;
    }

    const metadata: ScoringMetadata = {
      component_weights: { ...weights },
      component_processing_times: Object.fromEntries(
        results.map((result) => [result.componentName, result.processingTime]),
      ),
      component_count: results.length,
    };
    if (unweighted.length > 0) {
      metadata.unweighted_components = unweighted;
    }

    return new CombinedScore({
      sectionScores,
      overallScore: mean(Object.values(sectionScores).map((section) => section.score)),
      componentWeights: weights,
      processingTime: secondsSince(startedAt),
      metadata,
    });
  }
}
