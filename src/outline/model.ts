import type { Eol } from '../text.js';

/**
 * Parsed representation of an org task outline (`tasks.org`).
 *
 * Notes:
 * - Parsed nodes keep their `source` lines so untouched regions serialize
 *   byte-identically. Nodes built or changed by the mutator drop `source` and
 *   render canonically.
 * - Trailing blank lines are tracked separately from `source` so spacing can be
 *   adjusted around inserted entries without re-rendering a neighbour.
 */
export type EntryStatus = 'open' | 'closed';

/** Status → section name mapping plus the summary checklist section. */
export interface SectionNames {
  open: string;
  closed: string;
  summary: string;
}

export interface StatusKeywords {
  open: string[];
  closed: string[];
}

export interface OutlineOptions {
  sections: SectionNames;
  keywords: StatusKeywords;
  /** Prefix used for generated slugs and for `gh-28` → `task-gh-28` lookups. */
  slugPrefix: string;
}

export type CookieKind = 'fraction' | 'percent';

export interface ChecklistItem {
  done: boolean;
  description: string;
  /** Leading whitespace of the item line. */
  indent: string;
  bullet: '-' | '+';
  /** Continuation lines (deeper-indented or blank) that belong to this item. */
  extra: string[];
}

export interface Checklist {
  /** Text lines before the first item. */
  leading: string[];
  items: ChecklistItem[];
  /** Lines after the last item: blank lines, then any closing paragraph. */
  trailing: string[];
}

export interface Progress {
  done: number;
  total: number;
}

export interface Subsection {
  name: string;
  tags: string[];
  /** Present when the heading carries a progress cookie. */
  cookie?: CookieKind;
  /** Verbatim body (used when there is no checklist). */
  lines: string[];
  checklist?: Checklist;
}

export interface Property {
  key: string;
  value: string;
}

export interface Entry {
  keyword: string;
  status: EntryStatus;
  /** Headline text after the keyword, without tags. Includes the ticket token. */
  title: string;
  ticket?: string;
  tags: string[];
  /** Verbatim planning lines (SCHEDULED/DEADLINE) between heading and drawer. */
  planning: string[];
  properties: Property[];
  /** Verbatim lines between the drawer and the first subsection. */
  body: string[];
  subsections: Subsection[];
  trailingBlankLines: number;
  /** Original lines (without trailing blanks) for untouched entries. */
  source?: string[];
  /** 0-based line of the heading in the parsed text. */
  line?: number;
}

export interface NoteItem {
  kind: 'note';
  /** A level-2 block without a status keyword, kept verbatim. */
  lines: string[];
}

export interface EntryItem {
  kind: 'entry';
  entry: Entry;
}

export type SectionItem = EntryItem | NoteItem;

export interface Section {
  name: string;
  tags: string[];
  cookie?: CookieKind;
  /** Verbatim lines between the heading and the first item. */
  body: string[];
  /** Parsed body when the heading carries a progress cookie. */
  checklist?: Checklist;
  items: SectionItem[];
  /** Original heading + body lines for untouched sections. */
  source?: string[];
}

export interface OrgDocument {
  preamble: string[];
  sections: Section[];
  eol: Eol;
  endsWithNewline: boolean;
}
