import { errorDiagnostic } from '../diagnostics.js';
import { InvalidTransitionError, ParseError } from '../errors.js';
import { isBlankLine, splitLines, trimTrailingBlankLines } from '../text.js';
import { parseChecklist } from './checklist.js';
import {
  DRAWER_END,
  DRAWER_START,
  ENTRY_LEVEL,
  SECTION_LEVEL,
  SUBSECTION_LEVEL,
} from './constants.js';
import { findTicketToken } from './entry.js';
import { headingLevel, parseHeadingLine, splitCookie } from './heading.js';
import type {
  Entry,
  OrgDocument,
  Property,
  Section,
  SectionItem,
  StatusKeywords,
  Subsection,
} from './model.js';
import { keywordToStatus } from './status.js';

/**
 * Parser for the org task outline.
 *
 * The parser is format-aware rather than a general org parser. It recognizes:
 * - level-1 headings as sections
 * - level-2 headings starting with a status keyword as entries
 * - the `:PROPERTIES:` drawer, level-3 subsections and checkbox lists
 *
 * Everything else is kept verbatim.
 */
export interface ParseOutlineOptions {
  keywords: StatusKeywords;
  /** Section whose body is a checklist even when its heading has no cookie. */
  summarySection?: string;
}

const PLANNING_RE = /^[ \t]*(?:SCHEDULED|DEADLINE|CLOSED):/;
const PROPERTY_RE = /^[ \t]*:([^\s:]+):(?:[ \t]+(.*?))?[ \t]*$/;

function nestingError(level: number, context: string, line: number): ParseError {
  return new ParseError([
    errorDiagnostic('HEADING_NESTING', `Level-${level} heading ${context}`, line),
  ]);
}

/**
 * Index of the first line in `[start, end)` whose heading level is at most
 * `maxLevel`, or `end` when there is none.
 */
function nextHeadingAtMost(lines: readonly string[], start: number, end: number, maxLevel: number): number {
  for (let index = start; index < end; index += 1) {
    const level = headingLevel(lines[index] ?? '');
    if (level !== undefined && level <= maxLevel) return index;
  }
  return end;
}

function splitKeyword(
  text: string,
  keywords: StatusKeywords
): { keyword: string; title: string } | undefined {
  const match = text.match(/^(\S+)(?:\s+(.*))?$/);
  if (!match) return undefined;
  const keyword = match[1] ?? '';
  if (!keywordToStatus(keyword, keywords)) return undefined;
  return { keyword, title: (match[2] ?? '').trim() };
}

function parseSubsection(lines: readonly string[], firstLine: number): Subsection {
  const heading = parseHeadingLine(lines[0] ?? '');
  const { name, cookie } = splitCookie(heading?.text ?? '');
  const body = lines.slice(1);
  if (cookie) {
    return {
      name,
      tags: heading?.tags ?? [],
      cookie,
      lines: [],
      checklist: parseChecklist(body, firstLine + 1),
    };
  }
  return { name, tags: heading?.tags ?? [], lines: body };
}

/**
 * Parse one entry block (heading up to, not including, the next level-2 heading).
 */
function parseEntryBlock(
  block: readonly string[],
  firstLine: number,
  keywords: StatusKeywords
): Entry | undefined {
  const heading = parseHeadingLine(block[0] ?? '');
  if (!heading) return undefined;
  const split = splitKeyword(heading.text, keywords);
  if (!split) return undefined;
  const status = keywordToStatus(split.keyword, keywords);
  if (!status) return undefined;

  const { content, blankCount } = trimTrailingBlankLines(block);

  let index = 1;
  const planning: string[] = [];
  while (index < content.length && PLANNING_RE.test(content[index] ?? '')) {
    planning.push(content[index] ?? '');
    index += 1;
  }

  const properties: Property[] = [];
  if ((content[index] ?? '').trim() === DRAWER_START) {
    const drawerLine = firstLine + index;
    index += 1;
    for (;;) {
      const line = content[index];
      if (line === undefined || headingLevel(line) !== undefined) {
        throw new ParseError([
          errorDiagnostic('UNTERMINATED_DRAWER', 'Properties drawer is missing :END:', drawerLine),
        ]);
      }
      index += 1;
      if (line.trim() === DRAWER_END) break;
      if (isBlankLine(line)) continue;
      const match = line.match(PROPERTY_RE);
      if (!match) {
        throw new ParseError([
          errorDiagnostic(
            'MALFORMED_PROPERTY',
            `Malformed property line: ${JSON.stringify(line.trim())}`,
            firstLine + index - 1
          ),
        ]);
      }
      properties.push({ key: match[1] ?? '', value: match[2] ?? '' });
    }
  }

  const bodyEnd = nextHeadingAtMost(content, index, content.length, SUBSECTION_LEVEL);
  for (let i = index; i < bodyEnd; i += 1) {
    const level = headingLevel(content[i] ?? '');
    if (level !== undefined) throw nestingError(level, 'before the first subsection of an entry', firstLine + i);
  }
  const body = content.slice(index, bodyEnd);

  const subsections: Subsection[] = [];
  let start = bodyEnd;
  while (start < content.length) {
    const end = nextHeadingAtMost(content, start + 1, content.length, SUBSECTION_LEVEL);
    subsections.push(parseSubsection(content.slice(start, end), firstLine + start));
    start = end;
  }

  return {
    keyword: split.keyword,
    status,
    title: split.title,
    ticket: findTicketToken(split.title),
    tags: heading.tags,
    planning,
    properties,
    body,
    subsections,
    trailingBlankLines: blankCount,
    source: content,
    line: firstLine,
  };
}

function parseSection(
  lines: readonly string[],
  start: number,
  end: number,
  options: ParseOutlineOptions
): Section {
  const heading = parseHeadingLine(lines[start] ?? '');
  const { name, cookie } = splitCookie(heading?.text ?? '');

  const bodyEnd = nextHeadingAtMost(lines, start + 1, end, ENTRY_LEVEL);
  for (let i = start + 1; i < bodyEnd; i += 1) {
    const level = headingLevel(lines[i] ?? '');
    if (level !== undefined) throw nestingError(level, `directly under section "${name}"`, i);
  }
  const body = lines.slice(start + 1, bodyEnd);

  const items: SectionItem[] = [];
  let blockStart = bodyEnd;
  while (blockStart < end) {
    const blockEnd = nextHeadingAtMost(lines, blockStart + 1, end, ENTRY_LEVEL);
    const block = lines.slice(blockStart, blockEnd);
    const entry = parseEntryBlock(block, blockStart, options.keywords);
    items.push(entry ? { kind: 'entry', entry } : { kind: 'note', lines: block });
    blockStart = blockEnd;
  }

  return {
    name,
    tags: heading?.tags ?? [],
    cookie,
    body,
    checklist:
      cookie || name === options.summarySection ? parseChecklist(body, start + 1) : undefined,
    items,
    source: lines.slice(start, bodyEnd),
  };
}

/**
 * Parse an outline document into sections and entries.
 *
 * Throws `ParseError` on malformed heading nesting, an unterminated
 * properties drawer, or a checklist line that is not a checkbox.
 */
export function parseOutline(text: string, options: ParseOutlineOptions): OrgDocument {
  const { lines, eol, endsWithNewline } = splitLines(text);

  const firstSection = nextHeadingAtMost(lines, 0, lines.length, SECTION_LEVEL);
  for (let i = 0; i < firstSection; i += 1) {
    const level = headingLevel(lines[i] ?? '');
    if (level !== undefined) throw nestingError(level, 'before the first section', i);
  }

  const sections: Section[] = [];
  let start = firstSection;
  while (start < lines.length) {
    const end = nextHeadingAtMost(lines, start + 1, lines.length, SECTION_LEVEL);
    sections.push(parseSection(lines, start, end, options));
    start = end;
  }

  return { preamble: lines.slice(0, firstSection), sections, eol, endsWithNewline };
}

/**
 * Parse a standalone entry fragment (`** TODO headline` plus its body).
 *
 * The result carries no `source`, so it always renders canonically.
 */
export function parseEntryFragment(text: string, options: ParseOutlineOptions): Entry {
  const { lines } = splitLines(text);
  let first = 0;
  while (first < lines.length && isBlankLine(lines[first] ?? '')) first += 1;

  const heading = parseHeadingLine(lines[first] ?? '');
  if (!heading || heading.level !== ENTRY_LEVEL) {
    throw new ParseError([
      errorDiagnostic(
        'FRAGMENT_SHAPE',
        'Entry must start with a level-2 heading (** TODO headline)',
        first < lines.length ? first : undefined
      ),
    ]);
  }
  const next = nextHeadingAtMost(lines, first + 1, lines.length, ENTRY_LEVEL);
  if (next < lines.length) {
    throw new ParseError([
      errorDiagnostic('FRAGMENT_SHAPE', 'Entry fragment must contain exactly one entry', next),
    ]);
  }

  const entry = parseEntryBlock(lines.slice(first), first, options.keywords);
  if (!entry) {
    const word = heading.text.split(/\s+/)[0] ?? '';
    throw new InvalidTransitionError(`Unrecognized status token: ${JSON.stringify(word)}`);
  }
  const fragment: Entry = { ...entry, trailingBlankLines: 0 };
  delete fragment.source;
  delete fragment.line;
  return fragment;
}
