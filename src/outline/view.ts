import { entryId, entrySlug, entryTimestamps } from './entry.js';
import type { Entry, EntryStatus } from './model.js';
import { entryText } from './serialize.js';

/**
 * Stable JSON shapes for tool/CLI output.
 *
 * The parsed `Entry` carries source lines and offsets needed for exact
 * serialization; callers should not see those.
 */
export type EntryView = {
  slug?: string;
  id?: string;
  keyword: string;
  status: EntryStatus;
  title: string;
  ticket?: string;
  tags: string[];
  section: string;
  created?: string;
  modified?: string;
  closed?: string;
  /** 1-based line of the heading, when the entry came from a parsed file. */
  line?: number;
  text?: string;
};

export function toEntryView(entry: Entry, section: string, options: { includeText: boolean }): EntryView {
  const view: EntryView = {
    slug: entrySlug(entry),
    id: entryId(entry),
    keyword: entry.keyword,
    status: entry.status,
    title: entry.title,
    ticket: entry.ticket,
    tags: entry.tags,
    section,
    ...entryTimestamps(entry),
  };
  if (entry.line !== undefined) view.line = entry.line + 1;
  if (options.includeText) view.text = entryText(entry);
  return view;
}
