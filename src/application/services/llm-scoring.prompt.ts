import { ExtractedSection } from '@domain/services/resume-text.extractor';

const SCORING_PROMPT = `You are an expert resume analyzer. Score each resume section below against the job description.

Job Description:
{job_description}

Resume Sections:
{section_texts}

Reply with JSON only, in this format:
{
  "sections": [
    {
      "section_id": "<id from the section heading>",
      "score": <0..1>,
      "confidence": <0..1>,
      "matched_keywords": ["<keyword>"],
      "explanation": "<one sentence>",
      "entries": [
        {
          "entry_id": "<id from the entry line>",
          "entry_type": "<type from the entry line>",
          "score": <0..1>,
          "confidence": <0..1>,
          "matched_keywords": ["<keyword>"],
          "explanation": "<one sentence>",
          "bullets": [
            { "content": "<bullet text, verbatim>", "score": <0..1>, "confidence": <0..1> }
          ]
        }
      ]
    }
  ]
}

Return every section listed above. Use an empty "entries" list for sections without entries and an empty "bullets" list for entries without bullets.

Focus on:
- Technical skills match
- Experience relevance
- Achievement alignment
- Industry context`;

/**
 * One section as plain text: its own text, then one line per entry and one
 * indented line per bullet. The body is cut at `maxChars` and marked "...".
 */
export function renderSectionBlock(section: ExtractedSection, maxChars: number): string {
  const lines: string[] = [];
  if (section.ownText) lines.push(section.ownText);
  for (const entry of section.entries) {
    lines.push(`Entry ${entry.entryId} (${entry.entryType}): ${entry.ownText}`.trimEnd());
    for (const bullet of entry.bullets) lines.push(`  - ${bullet}`);
  }

  let body = lines.join('\n');
  // counted in code points so a surrogate pair is never split
  const codePoints = Array.from(body);
  if (codePoints.length > maxChars) {
    body = `${codePoints.slice(0, maxChars).join('')}...`;
  }
  return `Section ${section.sectionId}:\n${body}`;
}

export function buildScoringPrompt(
  jobDescription: string,
  sections: readonly ExtractedSection[],
  maxCharsPerSection: number,
): string {
  const sectionTexts = sections
    .map((section) => renderSectionBlock(section, maxCharsPerSection))
    .join('\n\n');
  return SCORING_PROMPT.replace(/\{(job_description|section_texts)\}/g, (_match, key: string) =>
    key === 'job_description' ? jobDescription : sectionTexts,
  );
}
