import {
  MANAGED_PROPERTIES,
  PROPERTY_CLOSED,
  PROPERTY_CREATED,
  PROPERTY_ID,
  PROPERTY_MODIFIED,
  PROPERTY_SLUG,
  TICKET_TOKEN_RE,
} from './constants.js';
import type { Entry, Property } from './model.js';

/**
 * Property-drawer accessors. Keys compare case-insensitively, as in org.
 */
function sameKey(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

export function getProperty(entry: Pick<Entry, 'properties'>, key: string): string | undefined {
  const value = entry.properties.find((property) => sameKey(property.key, key))?.value;
  return value === undefined || value === '' ? undefined : value;
}

export function hasProperty(entry: Pick<Entry, 'properties'>, key: string): boolean {
  return getProperty(entry, key) !== undefined;
}

/**
 * Return a new property list with `key` set (or removed when `value` is undefined).
 * Existing keys keep their position; new keys are appended.
 */
export function withProperty(
  properties: readonly Property[],
  key: string,
  value: string | undefined
): Property[] {
  if (value === undefined) return properties.filter((property) => !sameKey(property.key, key));
  const index = properties.findIndex((property) => sameKey(property.key, key));
  if (index === -1) return [...properties, { key, value }];
  return properties.map((property, i) => (i === index ? { key: property.key, value } : property));
}

/**
 * Managed keys first, in canonical order; any other property keeps its relative order.
 */
export function orderProperties(properties: readonly Property[]): Property[] {
  const managed: Property[] = [];
  for (const key of MANAGED_PROPERTIES) {
    const property = properties.find((p) => sameKey(p.key, key));
    if (property) managed.push({ key, value: property.value });
  }
  const others = properties.filter(
    (p) => !MANAGED_PROPERTIES.some((key) => sameKey(p.key, key))
  );
  return [...managed, ...others];
}

export function entrySlug(entry: Pick<Entry, 'properties'>): string | undefined {
  return getProperty(entry, PROPERTY_SLUG);
}

export function entryId(entry: Pick<Entry, 'properties'>): string | undefined {
  return getProperty(entry, PROPERTY_ID);
}

export interface EntryTimestamps {
  created?: string;
  modified?: string;
  closed?: string;
}

export function entryTimestamps(entry: Pick<Entry, 'properties'>): EntryTimestamps {
  return {
    created: getProperty(entry, PROPERTY_CREATED),
    modified: getProperty(entry, PROPERTY_MODIFIED),
    closed: getProperty(entry, PROPERTY_CLOSED),
  };
}

export function findTicketToken(title: string): string | undefined {
  return title.match(TICKET_TOKEN_RE)?.[1];
}

/**
 * Headline without a leading ticket token: `GH-178 Add support` → `Add support`.
 */
export function describeEntry(entry: Pick<Entry, 'title'>): string {
  return entry.title.replace(/^[A-Z][A-Z0-9]*-\d+\s+/, '').trim();
}
