/**
 * Résumé content as supplied by the upstream parser (parsed JSON or YAML).
 * Every field is optional and checked at read time.
 */

export type BulletData = string | { content?: string; text?: string };

export interface ResumeEntryData {
  id?: string | number;
  type?: string;
  description?: string;
  content?: string;
  highlights?: readonly string[];
  bullets?: readonly BulletData[];
  [field: string]: unknown;
}

export interface ResumeSectionObject {
  description?: string;
  content?: string;
  highlights?: readonly string[];
  entries?: readonly ResumeEntryData[];
  [field: string]: unknown;
}

/**
 * A section is an object, a bare list of entries or strings, plain text, or
 * null for an empty key.
 */
export type ResumeSectionData =
  | string
  | readonly (ResumeEntryData | string)[]
  | ResumeSectionObject
  | null;

/** section id -> section data */
export type ResumeContent = Readonly<Record<string, ResumeSectionData>>;

export interface JobPosting {
  title?: string;
  company?: string;
  summary?: string;
  requirements?: readonly string[];
  responsibilities?: readonly string[];
  technicalSkills?: readonly string[];
  nonTechnicalSkills?: readonly string[];
}
