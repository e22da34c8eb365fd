import { blankLines, joinLines } from '../text.js';
import { checklistProgress, renderChecklist } from './checklist.js';
import { DRAWER_END, DRAWER_START, ENTRY_LEVEL, SECTION_LEVEL, SUBSECTION_LEVEL } from './constants.js';
import { orderProperties } from './entry.js';
import { renderCookie, renderHeading } from './heading.js';
import type { Checklist, CookieKind, Entry, OrgDocument, Property, Section, Subsection } from './model.js';

/**
 * Serializer for the org task outline.
 *
 * Nodes that still carry `source` are emitted verbatim; everything else is
 * rendered canonically, with progress cookies recomputed from the items.
 */
const EMPTY_CHECKLIST: Checklist = { leading: [], items: [], trailing: [] };

function headingText(name: string, cookie: CookieKind | undefined, checklist: Checklist | undefined): string {
  if (!cookie) return name;
  const rendered = renderCookie(cookie, checklistProgress(checklist ?? EMPTY_CHECKLIST));
  return name ? `${name} ${rendered}` : rendered;
}

function renderProperty(property: Property): string {
  const key = `:${property.key}:`;
  return property.value ? `${key.padEnd(12)}${property.value}` : key;
}

export function renderSubsection(subsection: Subsection): string[] {
  const heading = renderHeading(
    SUBSECTION_LEVEL,
    headingText(subsection.name, subsection.cookie, subsection.checklist),
    subsection.tags
  );
  const body = subsection.checklist ? renderChecklist(subsection.checklist) : subsection.lines;
  return [heading, ...body];
}

/**
 * Canonical lines of an entry, without trailing blank lines.
 */
export function renderEntry(entry: Entry): string[] {
  const text = entry.title ? `${entry.keyword} ${entry.title}` : entry.keyword;
  const out = [renderHeading(ENTRY_LEVEL, text, entry.tags), ...entry.planning];
  if (entry.properties.length > 0) {
    out.push(DRAWER_START, ...orderProperties(entry.properties).map(renderProperty), DRAWER_END);
  }
  out.push(...entry.body);
  for (const subsection of entry.subsections) out.push(...renderSubsection(subsection));
  return out;
}

/**
 * Lines of an entry as it appears in the document (verbatim when untouched).
 */
export function entryLines(entry: Entry): string[] {
  return [...(entry.source ?? renderEntry(entry)), ...blankLines(entry.trailingBlankLines)];
}

/**
 * Text of a single entry, used for previews and tool output.
 */
export function entryText(entry: Entry): string {
  return (entry.source ?? renderEntry(entry)).join('\n');
}

function sectionHeaderLines(section: Section): string[] {
  if (section.source) return section.source;
  const heading = renderHeading(
    SECTION_LEVEL,
    headingText(section.name, section.cookie, section.checklist),
    section.tags
  );
  const body = section.checklist ? renderChecklist(section.checklist) : section.body;
  return [heading, ...body];
}

export function sectionLines(section: Section): string[] {
  const out = sectionHeaderLines(section);
  for (const item of section.items) {
    if (item.kind === 'entry') out.push(...entryLines(item.entry));
    else out.push(...item.lines);
  }
  return out;
}

export function serializeOutline(document: OrgDocument): string {
  const lines = [...document.preamble];
  for (const section of document.sections) lines.push(...sectionLines(section));
  return joinLines(lines, document.eol, document.endsWithNewline);
}
