import type { EntryStatus, SectionNames, StatusKeywords } from './model.js';

/**
 * Map a heading keyword to its status, or `undefined` when the word is not a
 * configured status keyword.
 */
export function keywordToStatus(
  keyword: string,
  keywords: StatusKeywords
): EntryStatus | undefined {
  if (keywords.open.includes(keyword)) return 'open';
  if (keywords.closed.includes(keyword)) return 'closed';
  return undefined;
}

export function sectionForStatus(status: EntryStatus, sections: SectionNames): string {
  return status === 'open' ? sections.open : sections.closed;
}

export function statusSections(sections: SectionNames): string[] {
  return [sections.open, sections.closed];
}
