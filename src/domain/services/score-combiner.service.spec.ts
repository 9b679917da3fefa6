import { ScoredBullet } from '@domain/entities/scored-bullet.entity';
import { ScoredEntry } from '@domain/entities/scored-entry.entity';
import { ScoringResult } from '@domain/entities/scoring-result.entity';
import { SectionScore, SectionScoreProps } from '@domain/entities/section-score.entity';
import {
  normalizeSectionScores,
  normalizeWeights,
  resolveComponentWeights,
  ScoreCombiner,
} from './score-combiner.service';

function section(
  sectionId: string,
  score: number,
  extra: Partial<Omit<SectionScoreProps, 'sectionId' | 'score'>> = {},
): SectionScore {
  return new SectionScore({ sectionId, score, confidence: score, ...extra });
}

function result(componentName: string, sections: SectionScore[], processingTime = 0.5): ScoringResult {
  return ScoringResult.fromSections(
    componentName,
    Object.fromEntries(sections.map((s) => [s.sectionId, s])),
    processingTime,
  );
}

describe('normalizeWeights', () => {
  it('should divide weights by their sum', () => {
    const weights = normalizeWeights({ a: 7, b: 3 });

    expect(weights.a).toBeCloseTo(0.7);
    expect(weights.b).toBeCloseTo(0.3);
  });

  it('should clamp negative and non-finite weights to zero', () => {
    expect(normalizeWeights({ a: -2, b: 1, c: Number.NaN })).toEqual({ a: 0, b: 1, c: 0 });
  });

  it('should leave every weight at zero when the total is zero', () => {
    expect(normalizeWeights({ a: 0, b: -1 })).toEqual({ a: 0, b: 0 });
  });
});

describe('resolveComponentWeights', () => {
  it('should prefer custom weights over configured ones', () => {
    const resolved = resolveComponentWeights(['a', 'b'], { a: 1, b: 1 }, { a: 9, b: 1 });

    expect(resolved.weights).toEqual({ a: 0.5, b: 0.5 });
    expect(resolved.unweighted).toEqual([]);
  });

  it('should fall back to configured weights when custom weights are empty', () => {
    const resolved = resolveComponentWeights(['a', 'b'], {}, { a: 3, b: 1 });

    expect(resolved.weights).toEqual({ a: 0.75, b: 0.25 });
  });

  it('should give every present component equal weight when nothing is configured', () => {
    const resolved = resolveComponentWeights(['a', 'b', 'c', 'd'], undefined, {});

    expect(resolved.weights).toEqual({ a: 0.25, b: 0.25, c: 0.25, d: 0.25 });
  });

  it('should report components the weight map does not name', () => {
    const resolved = resolveComponentWeights(['a', 'b'], { a: 1 }, {});

    expect(resolved.weights).toEqual({ a: 1 });
    expect(resolved.unweighted).toEqual(['b']);
  });
});

describe('normalizeSectionScores', () => {
  it('should min-max scale section scores', () => {
    const normalized = normalizeSectionScores({
      skills: section('skills', 0.2),
      experience: section('experience', 0.6),
      education: section('education', 0.4),
    });

    expect(normalized.skills.score).toBe(0);
    expect(normalized.experience.score).toBe(1);
    expect(normalized.education.score).toBeCloseTo(0.5);
    expect(normalized.education.confidence).toBe(0.4);
  });

  it('should map equal scores to 0.5', () => {
    const normalized = normalizeSectionScores({
      skills: section('skills', 0.3),
      experience: section('experience', 0.3),
    });

    expect(normalized.skills.score).toBe(0.5);
    expect(normalized.experience.score).toBe(0.5);
  });

  it('should keep an empty map empty', () => {
    expect(normalizeSectionScores({})).toEqual({});
  });
});

describe('ScoreCombiner', () => {
  let combiner: ScoreCombiner;

  beforeEach(() => {
    combiner = new ScoreCombiner();
  });

  describe('combineResults', () => {
    it('should return an empty combined score for no results', () => {
      const combined = combiner.combineResults([]);

      expect(combined.sectionScores).toEqual({});
      expect(combined.overallScore).toBe(0);
      expect(combined.componentWeights).toEqual({});
      expect(combined.metadata.component_weights).toEqual({});
      expect(combined.metadata.component_processing_times).toEqual({});
      expect(combined.metadata.component_count).toBe(0);
    });

    it('should normalize custom weights to sum to one', () => {
      const combined = combiner.combineResults(
        [result('a', [section('skills', 0.5)]), result('b', [section('skills', 0.5)])],
        { a: 7, b: 3 },
      );

      expect(combined.componentWeights.a).toBeCloseTo(0.7);
      expect(combined.componentWeights.b).toBeCloseTo(0.3);
      expect(combined.componentWeights.a + combined.componentWeights.b).toBeCloseTo(1);
    });

    it('should average a shared section with equal weights', () => {
      const combined = combiner.combineResults([
        result('embedding', [section('skills', 0.8)]),
        result('llm_scorer', [section('skills', 0.6)]),
      ]);

      expect(combined.sectionScores.skills.score).toBeCloseTo(0.7);
      expect(combined.sectionScores.skills.confidence).toBeCloseTo(0.7);
      expect(combined.overallScore).toBeCloseTo(0.7);
    });

    it('should apply component weights to a shared section', () => {
      const combined = combiner.combineResults(
        [
          result('embedding', [section('skills', 1)]),
          result('llm_scorer', [section('skills', 0)]),
        ],
        { embedding: 1, llm_scorer: 3 },
      );

      expect(combined.sectionScores.skills.score).toBeCloseTo(0.25);
      // confidence stays an unweighted mean
      expect(combined.sectionScores.skills.confidence).toBeCloseTo(0.5);
    });

    it('should keep a section scored by only one component at that score', () => {
      const combined = combiner.combineResults(
        [
          result('embedding', [section('skills', 0.8), section('education', 0.35)]),
          result('llm_scorer', [section('skills', 0.6)]),
        ],
        { embedding: 0.4, llm_scorer: 0.6 },
      );

      expect(Object.keys(combined.sectionScores)).toEqual(['skills', 'education']);
      expect(combined.sectionScores.education.score).toBe(0.35);
    });

    it('should leave a single result unchanged', () => {
      const bullet = new ScoredBullet({
        content: 'Built a TypeScript compiler plugin',
        score: 0.9,
        confidence: 0.8,
        matchedKeywords: ['typescript'],
        relevanceExplanation: 'direct match',
      });
      const entry = new ScoredEntry({
        entryId: 'job-1',
        entryType: 'experience',
        score: 0.65,
        confidence: 0.7,
        matchedKeywords: ['typescript', 'node'],
        bullets: [bullet],
      });
      const original = result('llm_scorer', [
        section('experience', 0.65, {
          matchedKeywords: ['typescript'],
          relevanceExplanation: 'strong backend history',
          entries: [entry],
        }),
        section('skills', 0.33),
      ]);

      const combined = combiner.combineResults([original]);

      expect(combined.componentWeights).toEqual({ llm_scorer: 1 });
      expect(combined.sectionScores).toEqual(original.sectionScores);
      expect(combined.overallScore).toBe(original.overallScore);
    });

    it('should merge entries by id with an unweighted mean', () => {
      const first = result('embedding', [
        section('experience', 0.5, {
          entries: [
            new ScoredEntry({ entryId: 'job-1', entryType: 'experience', score: 0.9, confidence: 0.9 }),
            new ScoredEntry({ entryId: 'job-2', entryType: 'experience', score: 0.2, confidence: 0.2 }),
          ],
        }),
      ]);
      const second = result('llm_scorer', [
        section('experience', 0.5, {
          entries: [
            new ScoredEntry({ entryId: 'job-1', entryType: 'work', score: 0.5, confidence: 0.3 }),
          ],
        }),
      ]);

      const combined = combiner.combineResults([first, second], { embedding: 1, llm_scorer: 9 });
      const entries = combined.sectionScores.experience.entries;

      expect(entries.map((e) => e.entryId)).toEqual(['job-1', 'job-2']);
      expect(entries[0].score).toBeCloseTo(0.7);
      expect(entries[0].confidence).toBeCloseTo(0.6);
      expect(entries[0].entryType).toBe('experience');
      expect(entries[1].score).toBe(0.2);
    });

    it('should merge bullets by content', () => {
      const bullets = (scores: [string, number][]) =>
        scores.map(([content, score]) => new ScoredBullet({ content, score, confidence: score }));
      const withBullets = (name: string, list: ScoredBullet[]) =>
        result(name, [
          section('experience', 0.5, {
            entries: [
              new ScoredEntry({
                entryId: 'job-1',
                entryType: 'experience',
                score: 0.5,
                confidence: 0.5,
                bullets: list,
              }),
            ],
          }),
        ]);

      const combined = combiner.combineResults([
        withBullets('a', bullets([['Led migration', 0.4], ['Wrote docs', 0.1]])),
        withBullets('b', bullets([['Wrote docs', 0.3], ['Led migration', 0.8]])),
      ]);
      const merged = combined.sectionScores.experience.entries[0].bullets;

      expect(merged.map((b) => b.content)).toEqual(['Led migration', 'Wrote docs']);
      expect(merged[0].score).toBeCloseTo(0.6);
      expect(merged[1].score).toBeCloseTo(0.2);
    });

    it('should merge bullets by position when configured', () => {
      const positional = new ScoreCombiner({ bulletKey: 'position' });
      const withBullet = (name: string, content: string, score: number) =>
        result(name, [
          section('experience', 0.5, {
            entries: [
              new ScoredEntry({
                entryId: 'job-1',
                entryType: 'experience',
                score: 0.5,
                confidence: 0.5,
                bullets: [new ScoredBullet({ content, score, confidence: score })],
              }),
            ],
          }),
        ]);

      const combined = positional.combineResults([
        withBullet('a', 'Led the migration', 0.4),
        withBullet('b', 'Led migration', 0.8),
      ]);
      const merged = combined.sectionScores.experience.entries[0].bullets;

      expect(merged).toHaveLength(1);
      expect(merged[0].content).toBe('Led the migration');
      expect(merged[0].score).toBeCloseTo(0.6);
    });

    it('should union keywords and join explanations in result order', () => {
      const combined = combiner.combineResults([
        result('a', [
          section('skills', 0.5, { matchedKeywords: ['go', 'sql'], relevanceExplanation: 'backend' }),
        ]),
        result('b', [section('skills', 0.5, { matchedKeywords: ['sql', 'react'] })]),
        result('c', [section('skills', 0.5, { relevanceExplanation: 'frontend' })]),
      ]);

      expect(combined.sectionScores.skills.matchedKeywords).toEqual(['go', 'sql', 'react']);
      expect(combined.sectionScores.skills.relevanceExplanation).toBe('backend | frontend');
    });

    it('should omit the explanation when no component supplied one', () => {
      const combined = combiner.combineResults([
        result('a', [section('skills', 0.5)]),
        result('b', [section('skills', 0.7)]),
      ]);

      expect(combined.sectionScores.skills.relevanceExplanation).toBeUndefined();
      expect('relevanceExplanation' in combined.sectionScores.skills).toBe(false);
    });

    it('should score sections zero when every weight is zero', () => {
      const combined = combiner.combineResults(
        [result('a', [section('skills', 0.8)]), result('b', [section('skills', 0.6)])],
        { a: 0, b: 0 },
      );

      expect(combined.componentWeights).toEqual({ a: 0, b: 0 });
      expect(combined.sectionScores.skills.score).toBe(0);
      expect(combined.overallScore).toBe(0);
    });

    it('should give unnamed components zero weight and list them in metadata', () => {
      const combined = combiner.combineResults(
        [result('a', [section('skills', 0.8)]), result('b', [section('skills', 0.2)])],
        { a: 1 },
      );

      expect(combined.sectionScores.skills.score).toBe(0.8);
      expect(combined.metadata.unweighted_components).toEqual(['b']);
    });

    it('should use configured weights when no custom weights are passed', () => {
      const weighted = new ScoreCombiner({ weights: { a: 1, b: 0 } });

      const combined = weighted.combineResults([
        result('a', [section('skills', 0.9)]),
        result('b', [section('skills', 0.1)]),
      ]);

      expect(combined.sectionScores.skills.score).toBe(0.9);
      expect(combined.metadata.unweighted_components).toBeUndefined();
    });

    it('should normalize component scores before weighting when enabled', () => {
      const normalizing = new ScoreCombiner({ normalizeScores: true });

      const combined = normalizing.combineResults([
        result('a', [section('skills', 0.2), section('experience', 0.4)]),
      ]);

      expect(combined.sectionScores.skills.score).toBe(0);
      expect(combined.sectionScores.experience.score).toBe(1);
      expect(combined.overallScore).toBe(0.5);
    });

    it('should record per-component processing times', () => {
      const combined = combiner.combineResults([
        result('a', [section('skills', 0.5)], 1.25),
        result('b', [section('skills', 0.5)], 0.75),
      ]);

      expect(combined.metadata.component_processing_times).toEqual({ a: 1.25, b: 0.75 });
      expect(combined.metadata.component_count).toBe(2);
      expect(combined.processingTime).toBeGreaterThanOrEqual(0);
    });
  });
});
