import { AmbiguousMatchError, NotFoundError } from '../errors.js';
import { entrySlug } from './entry.js';
import type { Entry, OrgDocument, SectionNames } from './model.js';
import { statusSections } from './status.js';

/**
 * Entry lookup by slug, ticket token, or headline substring.
 *
 * Matchers run in a fixed priority order and the first one with a non-empty
 * result decides. Several hits from that matcher are ambiguous; the locator
 * never picks one.
 */
export interface LocatedEntry {
  entry: Entry;
  section: string;
  sectionIndex: number;
  itemIndex: number;
}

export interface EntryMatcher {
  readonly name: string;
  tryMatch(candidates: readonly LocatedEntry[], identifier: string): LocatedEntry[];
}

export const slugMatcher: EntryMatcher = {
  name: 'slug',
  tryMatch: (candidates, identifier) =>
    candidates.filter((c) => entrySlug(c.entry) === identifier),
};

/** `gh-28` finds the entry whose slug is `task-gh-28`. */
export function prefixedSlugMatcher(prefix: string): EntryMatcher {
  return {
    name: 'prefixed slug',
    tryMatch: (candidates, identifier) => {
      const wanted = `${prefix}${identifier.trim().toLowerCase()}`;
      return candidates.filter((c) => entrySlug(c.entry) === wanted);
    },
  };
}

export const ticketMatcher: EntryMatcher = {
  name: 'ticket',
  tryMatch: (candidates, identifier) => {
    const wanted = identifier.trim().toUpperCase();
    return candidates.filter((c) => c.entry.ticket?.toUpperCase() === wanted);
  },
};

export const headlineMatcher: EntryMatcher = {
  name: 'headline',
  tryMatch: (candidates, identifier) => {
    const wanted = identifier.trim().toLowerCase();
    if (!wanted) return [];
    return candidates.filter((c) => c.entry.title.toLowerCase().includes(wanted));
  },
};

export function defaultMatchers(slugPrefix: string): EntryMatcher[] {
  return [slugMatcher, prefixedSlugMatcher(slugPrefix), ticketMatcher, headlineMatcher];
}

/**
 * All entries of the named sections (or of every section), in document order.
 */
export function listEntries(document: OrgDocument, scope?: readonly string[]): LocatedEntry[] {
  const out: LocatedEntry[] = [];
  document.sections.forEach((section, sectionIndex) => {
    if (scope && !scope.includes(section.name)) return;
    section.items.forEach((item, itemIndex) => {
      if (item.kind !== 'entry') return;
      out.push({ entry: item.entry, section: section.name, sectionIndex, itemIndex });
    });
  });
  return out;
}

export interface FindEntryOptions {
  sections: SectionNames;
  slugPrefix: string;
  /** Section names to search; defaults to the open and closed sections. */
  scope?: readonly string[];
  matchers?: readonly EntryMatcher[];
}

export function findEntry(
  document: OrgDocument,
  identifier: string,
  options: FindEntryOptions
): LocatedEntry {
  const scope = options.scope ?? statusSections(options.sections);
  const candidates = listEntries(document, scope);
  const matchers = options.matchers ?? defaultMatchers(options.slugPrefix);

  if (identifier.trim()) {
    for (const matcher of matchers) {
      const hits = matcher.tryMatch(candidates, identifier);
      if (hits.length === 1 && hits[0]) return hits[0];
      if (hits.length > 1) {
        throw new AmbiguousMatchError(
          identifier,
          matcher.name,
          hits.map((hit) => ({
            key: entrySlug(hit.entry) ?? '',
            title: hit.entry.title,
            section: hit.section,
          }))
        );
      }
    }
  }

  throw new NotFoundError(`Task not found: "${identifier}" in ${scope.join(', ')}`);
}
