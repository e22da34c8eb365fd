import type { JournalDay, JournalEntry } from './model.js';
import { renderLink } from './parse.js';

export type JournalMatchField = 'headline' | 'details' | 'tags';

export interface JournalMatch {
  date: string;
  entry: JournalEntry;
  field: JournalMatchField;
}

function headlineText(entry: JournalEntry): string {
  return [entry.ticket, entry.link ? renderLink(entry.link) : undefined, entry.headline]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

function matchField(entry: JournalEntry, needle: string): JournalMatchField | undefined {
  if (headlineText(entry).toLowerCase().includes(needle)) return 'headline';
  if (entry.details.some((line) => line.toLowerCase().includes(needle))) return 'details';
  if (entry.tags.some((tag) => tag.toLowerCase().includes(needle))) return 'tags';
  return undefined;
}

/**
 * Case-insensitive substring search over the `dayWindow` most recent days.
 *
 * Yields one match per entry (the first matching field), newest day first and
 * file order within a day. The result is lazy and can be iterated again.
 */
export function searchJournal(
  days: Iterable<JournalDay>,
  query: string,
  dayWindow: number
): Iterable<JournalMatch> {
  const needle = query.trim().toLowerCase();
  const snapshot = [...days];
  return {
    *[Symbol.iterator]() {
      if (!needle || dayWindow <= 0) return;
      const recent = [...snapshot].sort((a, b) => b.date.localeCompare(a.date)).slice(0, dayWindow);
      for (const day of recent) {
        for (const entry of day.entries) {
          const field = matchField(entry, needle);
          if (field) yield { date: day.date, entry, field };
        }
      }
    },
  };
}
