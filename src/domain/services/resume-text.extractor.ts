import {
  BulletData,
  ResumeContent,
  ResumeEntryData,
  ResumeSectionData,
} from '@domain/types/resume-content.types';

export interface ExtractedEntry {
  entryId: string;
  entryType: string;
  /** description and content only */
  ownText: string;
  /** ownText followed by every bullet */
  text: string;
  bullets: string[];
}

export interface ExtractedSection {
  sectionId: string;
  /** description, content and highlights of the section itself */
  ownText: string;
  /** ownText followed by the text of every entry */
  text: string;
  entries: ExtractedEntry[];
}

const ENTRY_TYPE_BY_SECTION: Record<string, string> = {
  experience: 'experience',
  experiences: 'experience',
  work: 'experience',
  education: 'education',
  project: 'project',
  projects: 'project',
  publication: 'publication',
  publications: 'publication',
};

function cleanText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function joinText(parts: readonly string[]): string {
  return parts.filter((part) => part.length > 0).join(' ');
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(cleanText).filter((item) => item.length > 0);
}

function bulletText(bullet: BulletData): string {
  if (typeof bullet === 'string') return bullet.trim();
  if (typeof bullet === 'object' && bullet !== null) {
    return cleanText(bullet.content) || cleanText(bullet.text);
  }
  return '';
}

function isSectionList(
  section: ResumeSectionData,
): section is readonly (ResumeEntryData | string)[] {
  return Array.isArray(section);
}

function isEntry(value: unknown): value is ResumeEntryData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function entryTypeForSection(sectionId: string): string {
  return ENTRY_TYPE_BY_SECTION[sectionId.toLowerCase()] ?? 'entry';
}

/**
 * Bullets come from `bullets` when the entry has them, otherwise from
 * `highlights`. Blank bullets are dropped.
 */
export function extractBullets(entry: ResumeEntryData): string[] {
  const source: unknown = Array.isArray(entry.bullets) ? entry.bullets : entry.highlights;
  if (!Array.isArray(source)) return [];
  const bullets: string[] = [];
  for (const item of source) {
    const text = bulletText(item);
    if (text) bullets.push(text);
  }
  return bullets;
}

export function extractEntry(
  sectionId: string,
  entry: ResumeEntryData,
  index: number,
): ExtractedEntry {
  const entryId =
    typeof entry.id === 'string' || typeof entry.id === 'number'
      ? String(entry.id)
      : `${sectionId}-${index}`;
  const entryType = cleanText(entry.type) || entryTypeForSection(sectionId);
  const ownText = joinText([cleanText(entry.description), cleanText(entry.content)]);
  const bullets = extractBullets(entry);

  return {
    entryId,
    entryType,
    ownText,
    text: joinText([ownText, ...bullets]),
    bullets,
  };
}

export function extractSection(
  sectionId: string,
  section: ResumeSectionData | undefined,
): ExtractedSection {
  if (typeof section === 'string') {
    const text = section.trim();
    return { sectionId, ownText: text, text, entries: [] };
  }
  if (typeof section !== 'object' || section === null) {
    return { sectionId, ownText: '', text: '', entries: [] };
  }

  const listed = isSectionList(section);
  const rawEntries: readonly unknown[] = listed
    ? section
    : Array.isArray(section.entries)
      ? section.entries
      : [];

  const entries = rawEntries
    .filter(isEntry)
    .map((entry, index) => extractEntry(sectionId, entry, index));

  // string items of a list section read like highlights
  const ownText = listed
    ? joinText(stringList(section))
    : joinText([
        cleanText(section.description),
        cleanText(section.content),
        ...stringList(section.highlights),
      ]);

  return {
    sectionId,
    ownText,
    text: joinText([ownText, ...entries.map((entry) => entry.text)]),
    entries,
  };
}

/**
 * Sections to score, in document order. An absent or empty allow-list
 * selects every section.
 */
export function selectSections(
  content: ResumeContent,
  allowList?: readonly string[],
): [string, ResumeSectionData][] {
  const selected = Object.entries(content);
  if (!allowList || allowList.length === 0) return selected;
  const allowed = new Set(allowList);
  return selected.filter(([sectionId]) => allowed.has(sectionId));
}
