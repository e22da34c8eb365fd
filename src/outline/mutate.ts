import { randomUUID } from 'node:crypto';
import { DuplicateSlugError, InvalidTransitionError, NotFoundError } from '../errors.js';
import { blankLines, trimTrailingBlankLines } from '../text.js';
import { formatOrgTimestamp } from '../timestamp.js';
import {
  PROPERTY_CLOSED,
  PROPERTY_CREATED,
  PROPERTY_ID,
  PROPERTY_MODIFIED,
  PROPERTY_SLUG,
} from './constants.js';
import { entrySlug, getProperty, withProperty } from './entry.js';
import { findEntry, listEntries, type LocatedEntry } from './locate.js';
import type { Entry, OrgDocument, OutlineOptions, Section, SectionItem } from './model.js';
import { parseEntryFragment } from './parse.js';
import { sectionForStatus } from './status.js';
import { synchronizeSummary } from './summary.js';

/**
 * Structural edits of the task outline: create, update and move.
 *
 * All methods are pure: they return a new document and never modify the one
 * passed in. Entries that are not edited keep their `source`, so the rest of
 * the file serializes exactly as it was read.
 */
export interface MutationResult {
  document: OrgDocument;
  /** The entry as stored after the mutation. */
  entry: Entry;
  /** The entry before the mutation (update and move). */
  previous?: Entry;
  fromSection?: string;
  toSection: string;
  /** True when the entry changed section. */
  moved: boolean;
}

export interface OutlineMutatorDeps {
  now?: () => Date;
  generateId?: () => string;
}

const MAX_SLUG_LENGTH = 60;

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/g, '');
}

export function collectSlugs(document: OrgDocument, exclude?: Entry): Set<string> {
  const slugs = new Set<string>();
  for (const located of listEntries(document)) {
    if (located.entry === exclude) continue;
    const slug = entrySlug(located.entry);
    if (slug) slugs.add(slug);
  }
  return slugs;
}

/**
 * `task-gh-28` for a ticketed headline, `task-fix-login-flow` otherwise;
 * `-2`, `-3`, … until the slug is unused.
 */
export function generateSlug(entry: Pick<Entry, 'title' | 'ticket'>, prefix: string, taken: ReadonlySet<string>): string {
  const stem = slugify(entry.ticket ?? entry.title) || 'entry';
  const base = `${prefix}${stem}`;
  if (!taken.has(base)) return base;
  for (let n = 2; ; n += 1) {
    const candidate = `${base}-${n}`;
    if (!taken.has(candidate)) return candidate;
  }
}

function itemTrailing(item: SectionItem): number {
  if (item.kind === 'entry') return item.entry.trailingBlankLines;
  return trimTrailingBlankLines(item.lines).blankCount;
}

function withItemTrailing(item: SectionItem, count: number): SectionItem {
  if (itemTrailing(item) === count) return item;
  if (item.kind === 'entry') {
    return { kind: 'entry', entry: { ...item.entry, trailingBlankLines: count } };
  }
  return { kind: 'note', lines: [...trimTrailingBlankLines(item.lines).content, ...blankLines(count)] };
}

function replaceSection(document: OrgDocument, index: number, section: Section): OrgDocument {
  return { ...document, sections: document.sections.map((s, i) => (i === index ? section : s)) };
}

/**
 * Append `entry` to the section at `index`. The new entry inherits the blank
 * lines that separated the previous last item from what follows; that item is
 * then separated from the new entry by at least one blank line.
 */
function appendEntry(document: OrgDocument, index: number, entry: Entry): OrgDocument {
  const section = document.sections[index];
  if (!section) throw new NotFoundError(`Section not found at index ${index}`);
  const items = [...section.items];
  const last = items[items.length - 1];
  let trailing: number;
  if (last) {
    trailing = itemTrailing(last);
    items[items.length - 1] = withItemTrailing(last, Math.max(1, trailing));
  } else {
    trailing = index < document.sections.length - 1 ? 1 : 0;
  }
  items.push({ kind: 'entry', entry: { ...entry, trailingBlankLines: trailing } });
  return replaceSection(document, index, { ...section, items });
}

/** Append blank lines to a section's heading block. */
function withBodyBlankLines(section: Section, count: number): Section {
  if (count === 0) return section;
  const blanks = blankLines(count);
  return {
    ...section,
    body: [...section.body, ...blanks],
    source: section.source ? [...section.source, ...blanks] : undefined,
    checklist: section.checklist
      ? { ...section.checklist, trailing: [...section.checklist.trailing, ...blanks] }
      : undefined,
  };
}

/**
 * Remove an item. The blank lines that followed it stay in place: they move to
 * the previous item, or to the section heading when the section empties.
 */
function removeItem(document: OrgDocument, sectionIndex: number, itemIndex: number): OrgDocument {
  const section = document.sections[sectionIndex];
  const removed = section?.items[itemIndex];
  if (!section || !removed) return document;
  const items = section.items.filter((_, i) => i !== itemIndex);
  if (items.length === 0) {
    return replaceSection(document, sectionIndex, withBodyBlankLines({ ...section, items }, itemTrailing(removed)));
  }
  const previous = items[itemIndex - 1];
  if (itemIndex === section.items.length - 1 && previous) {
    items[itemIndex - 1] = withItemTrailing(previous, itemTrailing(removed));
  }
  return replaceSection(document, sectionIndex, { ...section, items });
}

function replaceEntry(document: OrgDocument, sectionIndex: number, itemIndex: number, entry: Entry): OrgDocument {
  const section = document.sections[sectionIndex];
  if (!section) return document;
  const items = section.items.map((item, i): SectionItem => (i === itemIndex ? { kind: 'entry', entry } : item));
  return replaceSection(document, sectionIndex, { ...section, items });
}

function sectionIndexOf(document: OrgDocument, name: string): number {
  const index = document.sections.findIndex((section) => section.name === name);
  if (index === -1) throw new NotFoundError(`Section not found: ${name}`);
  return index;
}

export class OutlineMutator {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly options: OutlineOptions,
    deps: OutlineMutatorDeps = {}
  ) {
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? (() => randomUUID().toUpperCase());
  }

  parseFragment(text: string): Entry {
    return parseEntryFragment(text, { keywords: this.options.keywords });
  }

  locate(document: OrgDocument, identifier: string, scope?: readonly string[]): LocatedEntry {
    return findEntry(document, identifier, {
      sections: this.options.sections,
      slugPrefix: this.options.slugPrefix,
      scope,
    });
  }

  /**
   * Append a new entry to `sectionName`.
   *
   * The section must be the one mapped from the fragment's status.
   */
  create(document: OrgDocument, sectionName: string, fragmentText: string): MutationResult {
    const fragment = this.parseFragment(fragmentText);
    const sectionIndex = sectionIndexOf(document, sectionName);
    const expected = sectionForStatus(fragment.status, this.options.sections);
    if (expected !== sectionName) {
      throw new InvalidTransitionError(
        `A ${fragment.keyword} entry belongs in "${expected}", not "${sectionName}"`
      );
    }

    const taken = collectSlugs(document);
    const ownSlug = entrySlug(fragment);
    if (ownSlug && taken.has(ownSlug)) throw new DuplicateSlugError(ownSlug);
    const slug = ownSlug ?? generateSlug(fragment, this.options.slugPrefix, taken);

    const now = this.now();
    let properties = withProperty(fragment.properties, PROPERTY_ID, getProperty(fragment, PROPERTY_ID) ?? this.generateId());
    properties = withProperty(properties, PROPERTY_SLUG, slug);
    properties = withProperty(properties, PROPERTY_CREATED, formatOrgTimestamp(now, true));
    properties = withProperty(properties, PROPERTY_MODIFIED, formatOrgTimestamp(now, false));
    properties = withProperty(
      properties,
      PROPERTY_CLOSED,
      fragment.status === 'closed' ? getProperty(fragment, PROPERTY_CLOSED) ?? formatOrgTimestamp(now, true) : undefined
    );

    const entry: Entry = { ...fragment, properties };
    let next = appendEntry(document, sectionIndex, entry);
    next = synchronizeSummary(next, this.options.sections);
    return {
      document: next,
      entry: this.storedEntry(next, sectionIndex),
      toSection: sectionName,
      moved: false,
    };
  }

  /**
   * Replace an entry's content. A status change relocates the entry to the end
   * of the section mapped from the new status; otherwise it stays in place.
   */
  update(document: OrgDocument, identifier: string, fragmentText: string): MutationResult {
    const located = this.locate(document, identifier);
    const fragment = this.parseFragment(fragmentText);
    const previous = located.entry;
    const now = this.now();

    const previousSlug = entrySlug(previous);
    const fragmentSlug = entrySlug(fragment);
    const taken = collectSlugs(document, previous);
    if (fragmentSlug && fragmentSlug !== previousSlug && taken.has(fragmentSlug)) {
      throw new DuplicateSlugError(fragmentSlug);
    }
    const slug = fragmentSlug ?? previousSlug ?? generateSlug(fragment, this.options.slugPrefix, taken);

    let closed: string | undefined;
    if (fragment.status === 'closed') {
      closed =
        previous.status === 'open'
          ? formatOrgTimestamp(now, true)
          : getProperty(fragment, PROPERTY_CLOSED) ??
            getProperty(previous, PROPERTY_CLOSED) ??
            formatOrgTimestamp(now, true);
    }

    let properties = withProperty(
      fragment.properties,
      PROPERTY_ID,
      getProperty(fragment, PROPERTY_ID) ?? getProperty(previous, PROPERTY_ID) ?? this.generateId()
    );
    properties = withProperty(properties, PROPERTY_SLUG, slug);
    properties = withProperty(
      properties,
      PROPERTY_CREATED,
      getProperty(fragment, PROPERTY_CREATED) ??
        getProperty(previous, PROPERTY_CREATED) ??
        formatOrgTimestamp(now, true)
    );
    properties = withProperty(properties, PROPERTY_MODIFIED, formatOrgTimestamp(now, false));
    properties = withProperty(properties, PROPERTY_CLOSED, closed);

    const updated: Entry = { ...fragment, properties, trailingBlankLines: previous.trailingBlankLines };

    if (fragment.status === previous.status) {
      let next = replaceEntry(document, located.sectionIndex, located.itemIndex, updated);
      next = synchronizeSummary(next, this.options.sections);
      return {
        document: next,
        entry: updated,
        previous,
        fromSection: located.section,
        toSection: located.section,
        moved: false,
      };
    }

    const target = sectionForStatus(fragment.status, this.options.sections);
    const targetIndex = sectionIndexOf(document, target);
    let next = removeItem(document, located.sectionIndex, located.itemIndex);
    next = appendEntry(next, targetIndex, updated);
    next = synchronizeSummary(next, this.options.sections);
    return {
      document: next,
      entry: this.storedEntry(next, targetIndex),
      previous,
      fromSection: located.section,
      toSection: target,
      moved: target !== located.section,
    };
  }

  /**
   * Relocate an entry to the end of `toSection`. Content, status and
   * timestamps are left exactly as they are.
   */
  move(document: OrgDocument, identifier: string, fromSection: string, toSection: string): MutationResult {
    const fromIndex = document.sections.findIndex((section) => section.name === fromSection);
    if (fromIndex === -1) throw new InvalidTransitionError(`Section not found: ${fromSection}`);

    let located: LocatedEntry;
    try {
      located = this.locate(document, identifier, [fromSection]);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InvalidTransitionError(`"${identifier}" is not in section "${fromSection}"`);
      }
      throw error;
    }

    const toIndex = sectionIndexOf(document, toSection);
    if (fromIndex === toIndex) {
      return {
        document,
        entry: located.entry,
        previous: located.entry,
        fromSection,
        toSection,
        moved: false,
      };
    }

    let next = removeItem(document, located.sectionIndex, located.itemIndex);
    next = appendEntry(next, toIndex, located.entry);
    next = synchronizeSummary(next, this.options.sections);
    return {
      document: next,
      entry: this.storedEntry(next, toIndex),
      previous: located.entry,
      fromSection,
      toSection,
      moved: true,
    };
  }

  private storedEntry(document: OrgDocument, sectionIndex: number): Entry {
    const items = document.sections[sectionIndex]?.items ?? [];
    const last = items[items.length - 1];
    if (!last || last.kind !== 'entry') throw new NotFoundError('Appended entry is missing');
    return last.entry;
  }
}
