import { blankLines, trimTrailingBlankLines } from '../text.js';
import { describeEntry } from './entry.js';
import { listEntries } from './locate.js';
import type { Checklist, ChecklistItem, OrgDocument, Section, SectionNames } from './model.js';
import { statusSections } from './status.js';

/**
 * Summary checklist: one checkbox per entry of the open and closed sections,
 * open entries first, each checked iff the entry is closed.
 *
 * This is a projection of the entry list. It is rebuilt after every mutation
 * and never edited line by line.
 */
export function buildSummaryChecklist(
  document: OrgDocument,
  sections: SectionNames,
  existing: Checklist | undefined
): Checklist {
  const entries = listEntries(document, statusSections(sections)).map((located) => located.entry);
  const ordered = [
    ...entries.filter((entry) => entry.status === 'open'),
    ...entries.filter((entry) => entry.status === 'closed'),
  ];

  const template = existing?.items[0];
  const items: ChecklistItem[] = ordered.map((entry) => ({
    done: entry.status === 'closed',
    description: describeEntry(entry),
    indent: template?.indent ?? '',
    bullet: template?.bullet ?? '-',
    extra: [],
  }));

  let leading = existing?.leading ?? [];
  let trailing = existing?.trailing ?? [];
  if (existing && existing.items.length === 0) {
    // Blank lines after an empty list separate it from the next section.
    const { content, blankCount } = trimTrailingBlankLines(leading);
    leading = content;
    trailing = [...blankLines(blankCount), ...trailing];
  }

  return { leading, items, trailing };
}

/**
 * Rebuild the summary section's checklist. A missing summary section is a no-op.
 */
export function synchronizeSummary(document: OrgDocument, sections: SectionNames): OrgDocument {
  const index = document.sections.findIndex((section) => section.name === sections.summary);
  const section = document.sections[index];
  if (!section) return document;

  const existing = section.checklist ?? { leading: section.body, items: [], trailing: [] };
  const checklist = buildSummaryChecklist(document, sections, existing);
  const updated: Section = { ...section, cookie: section.cookie ?? 'fraction', checklist };
  delete updated.source;
  return {
    ...document,
    sections: document.sections.map((s, i) => (i === index ? updated : s)),
  };
}
