import { CombinedScore } from '@domain/entities/combined-score.entity';
import { ContentSelection } from '@domain/entities/content-selection.entity';

export interface ContentSelectionOptions {
  /** sections scoring below this are left out of `sectionOrder` */
  minSectionScore?: number;
  minEntryScore?: number;
  maxEntriesPerSection?: number;
}

function byScoreDescending<T extends { score: number }>(items: readonly T[]): T[] {
  // Array.prototype.sort is stable, so ties keep input order
  return [...items].sort((a, b) => b.score - a.score);
}

/** Picks and orders the sections and entries of a résumé from a combined score. */
export class ContentSelector {
  select(combined: CombinedScore, options: ContentSelectionOptions = {}): ContentSelection {
    const minSectionScore = options.minSectionScore ?? 0;
    const minEntryScore = options.minEntryScore ?? 0;
    const maxEntriesPerSection = options.maxEntriesPerSection ?? Number.POSITIVE_INFINITY;
    const sections = Object.values(combined.sectionScores);

    const relevanceScores: Record<string, number> = {};
    for (const section of sections) relevanceScores[section.sectionId] = section.score;

    const kept = byScoreDescending(sections).filter((section) => section.score >= minSectionScore);

    let droppedEntries = 0;
    const selectedSections: Record<string, string[]> = {};
    for (const section of kept) {
      const eligible = byScoreDescending(section.entries).filter((e) => e.score >= minEntryScore);
      const chosen = eligible.slice(0, Math.max(0, maxEntriesPerSection));
      droppedEntries += section.entries.length - chosen.length;
      selectedSections[section.sectionId] = chosen.map((entry) => entry.entryId);
    }

    return new ContentSelection(selectedSections, kept.map((s) => s.sectionId), relevanceScores, {
      min_section_score: minSectionScore,
      min_entry_score: minEntryScore,
      max_entries_per_section: Number.isFinite(maxEntriesPerSection) ? maxEntriesPerSection : null,
      dropped_sections: sections.length - kept.length,
      dropped_entries: droppedEntries,
    });
  }
}
