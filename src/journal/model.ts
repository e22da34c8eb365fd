import type { Eol } from '../text.js';

/**
 * One journal file per calendar day:
 *
 * ```org
 * * 2025-01-15
 *
 * ** 09:00 GH-28 [[https://example.test/pr/28][PR 28]] Review auth flow :review:
 * - notes
 * ```
 */
export interface JournalLink {
  url: string;
  label?: string;
}

export interface JournalEntry {
  /** `HH:MM`. */
  time: string;
  ticket?: string;
  link?: JournalLink;
  headline: string;
  tags: string[];
  details: string[];
  trailingBlankLines: number;
  /** Original lines (without trailing blanks) for untouched entries. */
  source?: string[];
  /** 0-based line of the heading in the parsed text. */
  line?: number;
}

export interface JournalDay {
  /** `YYYY-MM-DD`. */
  date: string;
  /** Lines before the date heading. */
  preamble: string[];
  /** Verbatim date heading; rendered as `* <date>` when absent. */
  heading?: string;
  /** Lines between the date heading and the first entry. */
  intro: string[];
  entries: JournalEntry[];
  eol: Eol;
  endsWithNewline: boolean;
}

export interface JournalEntryInput {
  time: string;
  headline: string;
  details?: string;
  tags?: string[];
  ticket?: string;
  link?: JournalLink;
}

/** Fields to replace; `null` clears the optional ones. */
export interface JournalEntryPatch {
  time?: string;
  headline?: string;
  details?: string;
  tags?: string[];
  ticket?: string | null;
  link?: JournalLink | null;
}

export type JournalLocator = string | { time: string } | { headline: string } | { line: number };
