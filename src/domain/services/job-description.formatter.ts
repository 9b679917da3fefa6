import { JobPosting } from '@domain/types/resume-content.types';

const MISSING = 'N/A';

function valueOrMissing(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : MISSING;
}

function listBlock(heading: string, items: readonly string[] | undefined): string {
  const lines = (items ?? [])
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => `- ${item}`);
  return [`${heading}:`, ...lines].join('\n');
}

/** Renders structured job data as the reference text the scorers compare against. */
export function formatJobDescription(job: JobPosting): string {
  return [
    `Title: ${valueOrMissing(job.title)}\nCompany: ${valueOrMissing(job.company)}`,
    `Summary:\n${valueOrMissing(job.summary)}`,
    listBlock('Requirements', job.requirements),
    listBlock('Responsibilities', job.responsibilities),
    listBlock('Technical Skills', job.technicalSkills),
    listBlock('Non-Technical Skills', job.nonTechnicalSkills),
  ].join('\n\n');
}
