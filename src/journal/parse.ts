import { errorDiagnostic } from '../diagnostics.js';
import { ParseError } from '../errors.js';
import { parseHeadingLine, renderTags } from '../outline/heading.js';
import { TICKET_TOKEN_RE } from '../outline/constants.js';
import { blankLines, isBlankLine, joinLines, splitLines, trimTrailingBlankLines } from '../text.js';
import type { JournalDay, JournalEntry, JournalLink } from './model.js';

const DATE_HEADING_RE = /^\*[ \t]+(\d{4}-\d{2}-\d{2})(?:[ \t].*)?$/;
const ENTRY_HEADING_RE = /^\*\*[ \t]/;
const DAY_HEADING_RE = /^\*[ \t]/;
const TIME_RE = /^(\d{1,2}):(\d{2})$/;
const LEADING_TICKET_RE = new RegExp(`^${TICKET_TOKEN_RE.source}(?:[ \\t]+|$)`);
const LEADING_LINK_RE = /^\[\[([^\]]+)\](?:\[([^\]]*)\])?\](?:[ \t]+|$)/;
const TAG_RE = /^[\w@#%]+$/;

export interface ParseJournalOptions {
  /** Date used for a blank file, `YYYY-MM-DD`. */
  date?: string;
}

export function isValidDate(date: string): boolean {
  const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const candidate = new Date(year, month - 1, day);
  return candidate.getFullYear() === year && candidate.getMonth() === month - 1 && candidate.getDate() === day;
}

/**
 * Normalize `9:05` to `09:05`. Returns `undefined` for anything that is not a
 * valid time of day.
 */
export function normalizeTime(value: string): string | undefined {
  const match = value.trim().match(TIME_RE);
  if (!match) return undefined;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return undefined;
  return `${String(hours).padStart(2, '0')}:${match[2] ?? '00'}`;
}

export function requireTime(value: string, line?: number): string {
  const time = normalizeTime(value);
  if (!time) {
    throw new ParseError([
      errorDiagnostic('INVALID_TIME', `Invalid time ${JSON.stringify(value)} (expected HH:MM)`, line),
    ]);
  }
  return time;
}

/** Unique tags in first-seen order; throws on a tag org cannot represent. */
export function normalizeTags(tags: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim().replace(/^:+|:+$/g, '');
    if (!TAG_RE.test(tag)) {
      throw new ParseError([errorDiagnostic('INVALID_TAG', `Invalid tag: ${JSON.stringify(raw)}`)]);
    }
    if (!out.includes(tag)) out.push(tag);
  }
  return out;
}

/**
 * Split `GH-28 [[url][label]] Review auth flow` into its parts.
 */
function splitEntryTitle(text: string): { ticket?: string; link?: JournalLink; headline: string } {
  let rest = text;
  let ticket: string | undefined;
  let link: JournalLink | undefined;

  const ticketMatch = rest.match(LEADING_TICKET_RE);
  if (ticketMatch) {
    ticket = ticketMatch[1];
    rest = rest.slice(ticketMatch[0].length);
  }
  const linkMatch = rest.match(LEADING_LINK_RE);
  if (linkMatch) {
    link = { url: linkMatch[1] ?? '', label: linkMatch[2] || undefined };
    rest = rest.slice(linkMatch[0].length);
  }
  return { ticket, link, headline: rest.trim() };
}

/** Parse a `** HH:MM [TICKET] [[link]] headline :tags:` line. */
export function parseJournalHeading(line: string, lineIndex?: number): Omit<JournalEntry, 'details' | 'trailingBlankLines'> {
  const heading = parseHeadingLine(line);
  const words = (heading?.text ?? '').match(/^(\S+)(?:[ \t]+(.*))?$/);
  const time = normalizeTime(words?.[1] ?? '');
  if (!heading || !words || !time) {
    throw new ParseError([
      errorDiagnostic(
        'MALFORMED_ENTRY',
        `Journal entry must start with a time (** HH:MM headline): ${JSON.stringify(line.trim())}`,
        lineIndex
      ),
    ]);
  }
  return { time, ...splitEntryTitle(words[2] ?? ''), tags: heading.tags, line: lineIndex };
}

/**
 * Parse one day file. An entry runs from its `** HH:MM` heading up to the next
 * level-1 or level-2 heading; deeper headings are detail lines.
 */
export function parseJournalDay(text: string, options: ParseJournalOptions = {}): JournalDay {
  const { lines, eol, endsWithNewline } = splitLines(text);

  const headingIndexes: number[] = [];
  lines.forEach((line, index) => {
    if (DAY_HEADING_RE.test(line)) headingIndexes.push(index);
  });

  if (headingIndexes.length === 0) {
    const firstEntry = lines.findIndex((line) => ENTRY_HEADING_RE.test(line));
    if (firstEntry !== -1 || !lines.every(isBlankLine) || !options.date) {
      throw new ParseError([
        errorDiagnostic('MISSING_DATE_HEADING', 'Journal file has no date heading (* YYYY-MM-DD)', firstEntry === -1 ? undefined : firstEntry),
      ]);
    }
    return { date: options.date, preamble: lines, intro: [], entries: [], eol, endsWithNewline };
  }

  if (headingIndexes.length > 1) {
    throw new ParseError([
      errorDiagnostic('MULTIPLE_DATE_HEADINGS', 'Journal file has more than one level-1 heading', headingIndexes[1]),
    ]);
  }

  const headingIndex = headingIndexes[0] ?? 0;
  const headingLine = lines[headingIndex] ?? '';
  const date = headingLine.match(DATE_HEADING_RE)?.[1];
  if (!date || !isValidDate(date)) {
    throw new ParseError([
      errorDiagnostic('MALFORMED_DATE_HEADING', `Invalid date heading: ${JSON.stringify(headingLine.trim())}`, headingIndex),
    ]);
  }

  const preamble = lines.slice(0, headingIndex);
  const strayEntry = preamble.findIndex((line) => ENTRY_HEADING_RE.test(line));
  if (strayEntry !== -1) {
    throw new ParseError([errorDiagnostic('MALFORMED_ENTRY', 'Journal entry before the date heading', strayEntry)]);
  }

  let index = headingIndex + 1;
  const intro: string[] = [];
  while (index < lines.length && !ENTRY_HEADING_RE.test(lines[index] ?? '')) {
    intro.push(lines[index] ?? '');
    index += 1;
  }

  const entries: JournalEntry[] = [];
  while (index < lines.length) {
    const start = index;
    index += 1;
    while (index < lines.length && !ENTRY_HEADING_RE.test(lines[index] ?? '')) index += 1;
    const block = lines.slice(start, index);
    const { content, blankCount } = trimTrailingBlankLines(block);
    entries.push({
      ...parseJournalHeading(block[0] ?? '', start),
      details: content.slice(1),
      trailingBlankLines: blankCount,
      source: content,
    });
  }

  return { date, preamble, heading: headingLine, intro, entries, eol, endsWithNewline };
}

export function emptyJournalDay(date: string): JournalDay {
  return { date, preamble: [], intro: [], entries: [], eol: '\n', endsWithNewline: true };
}

export function renderLink(link: JournalLink): string {
  return link.label ? `[[${link.url}][${link.label}]]` : `[[${link.url}]]`;
}

/** Canonical heading line of an entry. */
export function renderJournalHeading(entry: Pick<JournalEntry, 'time' | 'ticket' | 'link' | 'headline' | 'tags'>): string {
  const parts = [entry.time];
  if (entry.ticket) parts.push(entry.ticket);
  if (entry.link) parts.push(renderLink(entry.link));
  if (entry.headline) parts.push(entry.headline);
  return `** ${parts.join(' ')}${renderTags(entry.tags)}`;
}

export function renderJournalEntry(entry: JournalEntry): string[] {
  return entry.source ?? [renderJournalHeading(entry), ...entry.details];
}

export function journalEntryText(entry: JournalEntry): string {
  return renderJournalEntry(entry).join('\n');
}

export function serializeJournalDay(day: JournalDay): string {
  const lines = [...day.preamble, day.heading ?? `* ${day.date}`, ...day.intro];
  for (const entry of day.entries) {
    lines.push(...renderJournalEntry(entry), ...blankLines(entry.trailingBlankLines));
  }
  return joinLines(lines, day.eol, day.endsWithNewline);
}
