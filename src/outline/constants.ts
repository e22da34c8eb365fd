/**
 * Org outline format constants.
 *
 * These values define the on-disk shape of `tasks.org` entries.
 */
export const PROPERTY_ID = 'ID';
export const PROPERTY_SLUG = 'CUSTOM_ID';
export const PROPERTY_CREATED = 'CREATED';
export const PROPERTY_MODIFIED = 'MODIFIED';
export const PROPERTY_CLOSED = 'CLOSED';

/** Canonical drawer order for the properties the mutator manages. */
export const MANAGED_PROPERTIES = [
  PROPERTY_ID,
  PROPERTY_SLUG,
  PROPERTY_CREATED,
  PROPERTY_MODIFIED,
  PROPERTY_CLOSED,
] as const;

export const DRAWER_START = ':PROPERTIES:';
export const DRAWER_END = ':END:';

/** Level of section, entry and subsection headings. */
export const SECTION_LEVEL = 1;
export const ENTRY_LEVEL = 2;
export const SUBSECTION_LEVEL = 3;

export const DEFAULT_OPEN_KEYWORDS = ['TODO'];
export const DEFAULT_CLOSED_KEYWORDS = ['DONE'];
export const DEFAULT_SLUG_PREFIX = 'task-';

/** Ticket tokens such as `GH-28` or `JIRA-1234`. */
export const TICKET_TOKEN_RE = /\b([A-Z][A-Z0-9]*-\d+)\b/;
