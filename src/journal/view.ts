import type { JournalEntry, JournalLink } from './model.js';
import { journalEntryText } from './parse.js';

export type JournalEntryView = {
  date: string;
  time: string;
  ticket?: string;
  link?: JournalLink;
  headline: string;
  tags: string[];
  details: string;
  /** 1-based heading line; pass it back as `{ line }` to address this entry. */
  line?: number;
  text?: string;
};

export function toJournalEntryView(
  date: string,
  entry: JournalEntry,
  options: { includeText: boolean }
): JournalEntryView {
  const view: JournalEntryView = {
    date,
    time: entry.time,
    ticket: entry.ticket,
    link: entry.link,
    headline: entry.headline,
    tags: entry.tags,
    details: entry.details.join('\n'),
  };
  if (entry.line !== undefined) view.line = entry.line + 1;
  if (options.includeText) view.text = journalEntryText(entry);
  return view;
}
