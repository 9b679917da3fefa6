import { ScoringMetadata } from '@domain/types/scoring.types';

/** Which sections and entries to keep in a tailored résumé, and in what order. */
export class ContentSelection {
  constructor(
    /** section id -> selected entry ids, best first */
    readonly selectedSections: Readonly<Record<string, readonly string[]>>,
    readonly sectionOrder: readonly string[],
    readonly relevanceScores: Readonly<Record<string, number>>,
    readonly metadata: Readonly<ScoringMetadata> = {},
  ) {
    Object.freeze(this);
  }
}
