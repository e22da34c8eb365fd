import { errorDiagnostic } from '../diagnostics.js';
import { AmbiguousMatchError, NotFoundError, ParseError } from '../errors.js';
import { isBlankLine, textToLines } from '../text.js';
import type {
  JournalDay,
  JournalEntry,
  JournalEntryInput,
  JournalEntryPatch,
  JournalLink,
  JournalLocator,
} from './model.js';
import { normalizeTags, normalizeTime, parseJournalHeading, renderJournalHeading, requireTime } from './parse.js';

/**
 * Journal edits. Entries stay in non-decreasing time order; an entry whose
 * time did not change keeps its position and every other entry keeps its text.
 */
export interface JournalMutationResult {
  day: JournalDay;
  entry: JournalEntry;
  /** Position of `entry` in `day.entries`. */
  index: number;
  previous?: JournalEntry;
}

/** Detail lines that would start a new day or entry. */
const HEADING_DETAIL_RE = /^\*{1,2}[ \t]/;

function requireSingleLine(field: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new ParseError([errorDiagnostic('INVALID_FIELD', `${field} must be a single line`)]);
  }
  return value.trim();
}

function normalizeLink(link: JournalLink): JournalLink {
  const url = requireSingleLine('link url', link.url);
  if (!url || /[[\]]/.test(url)) {
    throw new ParseError([errorDiagnostic('INVALID_FIELD', `Invalid link url: ${JSON.stringify(link.url)}`)]);
  }
  const label = link.label === undefined ? undefined : requireSingleLine('link label', link.label);
  return { url, label: label || undefined };
}

function normalizeTicket(ticket: string): string | undefined {
  return requireSingleLine('ticket', ticket) || undefined;
}

function normalizeDetails(text: string): string[] {
  const lines = textToLines(text);
  const heading = lines.find((line) => HEADING_DETAIL_RE.test(line));
  if (heading !== undefined) {
    throw new ParseError([
      errorDiagnostic('INVALID_FIELD', `Detail line would start a heading: ${JSON.stringify(heading)}`),
    ]);
  }
  return lines;
}

function sameLink(a: JournalLink | undefined, b: JournalLink | undefined): boolean {
  return a?.url === b?.url && a?.label === b?.label;
}

/**
 * The heading line must read back as the same ticket, link, headline and tags;
 * a headline ending in `:tag:` or starting with a ticket or link would not.
 */
function checkHeading(entry: JournalEntry): JournalEntry {
  const heading = renderJournalHeading(entry);
  const parsed = parseJournalHeading(heading);
  if (
    parsed.ticket !== entry.ticket ||
    !sameLink(parsed.link, entry.link) ||
    parsed.headline !== entry.headline ||
    parsed.tags.join(':') !== entry.tags.join(':')
  ) {
    throw new ParseError([
      errorDiagnostic('INVALID_FIELD', `Entry heading would not read back as written: ${JSON.stringify(heading)}`),
    ]);
  }
  return entry;
}

/** Index of the first entry strictly later than `time` (ties go after). */
function insertionIndex(entries: readonly JournalEntry[], time: string): number {
  const index = entries.findIndex((entry) => entry.time > time);
  return index === -1 ? entries.length : index;
}

function withTrailing(entry: JournalEntry, count: number): JournalEntry {
  return entry.trailingBlankLines === count ? entry : { ...entry, trailingBlankLines: count };
}

function insertEntry(day: JournalDay, entry: JournalEntry): { day: JournalDay; index: number } {
  const entries = [...day.entries];
  const index = insertionIndex(entries, entry.time);
  let intro = day.intro;

  if (entries.length === 0) {
    // A blank line separates the date heading (and any intro text) from the first entry.
    if (intro.length === 0 || !isBlankLine(intro[intro.length - 1] ?? '')) intro = [...intro, ''];
    entries.push(withTrailing(entry, 0));
  } else if (index === entries.length) {
    const last = entries[entries.length - 1];
    const trailing = last?.trailingBlankLines ?? 0;
    if (last) entries[entries.length - 1] = withTrailing(last, Math.max(1, trailing));
    entries.push(withTrailing(entry, trailing));
  } else {
    const before = entries[index - 1];
    entries.splice(index, 0, withTrailing(entry, Math.max(1, before?.trailingBlankLines ?? 1)));
  }
  return { day: { ...day, intro, entries }, index };
}

function removeEntry(day: JournalDay, index: number): JournalDay {
  const removed = day.entries[index];
  if (!removed) return day;
  const entries = day.entries.filter((_, i) => i !== index);
  const previous = entries[index - 1];
  if (index === day.entries.length - 1 && previous) {
    entries[index - 1] = withTrailing(previous, removed.trailingBlankLines);
  }
  return { ...day, entries };
}

export function createJournalEntry(day: JournalDay, input: JournalEntryInput): JournalMutationResult {
  const entry: JournalEntry = checkHeading({
    time: requireTime(input.time),
    ticket: input.ticket === undefined ? undefined : normalizeTicket(input.ticket),
    link: input.link === undefined ? undefined : normalizeLink(input.link),
    headline: requireSingleLine('headline', input.headline),
    tags: normalizeTags(input.tags ?? []),
    details: normalizeDetails(input.details ?? ''),
    trailingBlankLines: 0,
  });
  const inserted = insertEntry(day, entry);
  return { day: inserted.day, entry: inserted.day.entries[inserted.index] ?? entry, index: inserted.index };
}

function locatorKind(locator: JournalLocator): { time: string } | { headline: string } | { line: number } {
  if (typeof locator !== 'string') return locator;
  const time = normalizeTime(locator);
  return time ? { time } : { headline: locator };
}

function describeLocator(locator: JournalLocator): string {
  if (typeof locator === 'string') return locator;
  if ('time' in locator) return locator.time;
  if ('headline' in locator) return locator.headline;
  return `line ${locator.line}`;
}

/**
 * Find an entry by exact time, headline substring (case-insensitive) or
 * 1-based heading line. Several hits are ambiguous.
 */
export function findJournalEntry(day: JournalDay, locator: JournalLocator): { entry: JournalEntry; index: number } {
  const kind = locatorKind(locator);
  let strategy: string;
  let hits: number[];
  if ('time' in kind) {
    strategy = 'time';
    const time = normalizeTime(kind.time) ?? kind.time;
    hits = day.entries.flatMap((entry, index) => (entry.time === time ? [index] : []));
  } else if ('headline' in kind) {
    strategy = 'headline';
    const wanted = kind.headline.trim().toLowerCase();
    hits = wanted
      ? day.entries.flatMap((entry, index) => (entry.headline.toLowerCase().includes(wanted) ? [index] : []))
      : [];
  } else {
    strategy = 'line';
    hits = day.entries.flatMap((entry, index) => (entry.line !== undefined && entry.line + 1 === kind.line ? [index] : []));
  }

  const label = describeLocator(locator);
  if (hits.length > 1) {
    throw new AmbiguousMatchError(
      label,
      strategy,
      hits.flatMap((index) => {
        const entry = day.entries[index];
        return entry ? [{ key: entry.time, title: entry.headline, section: day.date }] : [];
      })
    );
  }
  const index = hits[0];
  const entry = index === undefined ? undefined : day.entries[index];
  if (index === undefined || !entry) throw new NotFoundError(`Journal entry not found: "${label}" on ${day.date}`);
  return { entry, index };
}

export function updateJournalEntry(day: JournalDay, locator: JournalLocator, patch: JournalEntryPatch): JournalMutationResult {
  const { entry: previous, index } = findJournalEntry(day, locator);

  const updated: JournalEntry = checkHeading({
    time: patch.time === undefined ? previous.time : requireTime(patch.time),
    ticket: patch.ticket === undefined ? previous.ticket : patch.ticket === null ? undefined : normalizeTicket(patch.ticket),
    link: patch.link === undefined ? previous.link : patch.link === null ? undefined : normalizeLink(patch.link),
    headline: patch.headline === undefined ? previous.headline : requireSingleLine('headline', patch.headline),
    tags: patch.tags === undefined ? previous.tags : normalizeTags(patch.tags),
    details: patch.details === undefined ? previous.details : normalizeDetails(patch.details),
    trailingBlankLines: previous.trailingBlankLines,
  });

  if (updated.time === previous.time) {
    const entries = day.entries.map((entry, i) => (i === index ? updated : entry));
    return { day: { ...day, entries }, entry: updated, index, previous };
  }

  const inserted = insertEntry(removeEntry(day, index), updated);
  return { day: inserted.day, entry: inserted.day.entries[inserted.index] ?? updated, index: inserted.index, previous };
}
