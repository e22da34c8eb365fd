import type { Diagnostic } from '../diagnostics.js';
import { errorDiagnostic, warningDiagnostic } from '../diagnostics.js';
import { ParseError } from '../errors.js';
import { PROPERTY_CLOSED } from './constants.js';
import { entrySlug, hasProperty } from './entry.js';
import { listEntries } from './locate.js';
import type { OrgDocument, OutlineOptions } from './model.js';
import { parseOutline } from './parse.js';
import { sectionForStatus, statusSections } from './status.js';

/**
 * Validator for the task outline.
 *
 * Parsing rejects structural problems; validation reports the invariants a
 * parseable document can still break (duplicate slugs, status/section and
 * closed-timestamp mismatches, missing sections). It never throws on them.
 */
export interface ValidateOutlineResult {
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export function validateOutline(document: OrgDocument, options: OutlineOptions): ValidateOutlineResult {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  for (const name of [...statusSections(options.sections), options.sections.summary]) {
    if (!document.sections.some((section) => section.name === name)) {
      const push = name === options.sections.summary ? warnings : errors;
      const make = name === options.sections.summary ? warningDiagnostic : errorDiagnostic;
      push.push(make('MISSING_SECTION', `Missing section: ${name}`));
    }
  }

  const seen = new Map<string, number | undefined>();
  for (const { entry, section } of listEntries(document, statusSections(options.sections))) {
    const label = `"${entry.title}"`;
    const slug = entrySlug(entry);
    if (!slug) {
      warnings.push(warningDiagnostic('MISSING_SLUG', `Entry ${label} has no slug`, entry.line));
    } else if (seen.has(slug)) {
      const first = seen.get(slug);
      errors.push(
        errorDiagnostic(
          'DUPLICATE_SLUG',
          `Duplicate slug: ${slug}${first !== undefined ? ` (first at line ${first + 1})` : ''}`,
          entry.line
        )
      );
    } else {
      seen.set(slug, entry.line);
    }

    const expected = sectionForStatus(entry.status, options.sections);
    if (expected !== section) {
      warnings.push(
        warningDiagnostic(
          'SECTION_STATUS_MISMATCH',
          `Entry ${label} is ${entry.keyword} but sits in "${section}" (expected "${expected}")`,
          entry.line
        )
      );
    }

    const closed = hasProperty(entry, PROPERTY_CLOSED);
    if (entry.status === 'closed' && !closed) {
      errors.push(
        errorDiagnostic('CLOSED_TIMESTAMP_MISMATCH', `Closed entry ${label} has no CLOSED timestamp`, entry.line)
      );
    } else if (entry.status === 'open' && closed) {
      errors.push(
        errorDiagnostic('CLOSED_TIMESTAMP_MISMATCH', `Open entry ${label} carries a CLOSED timestamp`, entry.line)
      );
    }
  }

  return { errors, warnings };
}

/**
 * Parse and validate raw text. Parse failures come back as errors.
 */
export function validateOutlineText(text: string, options: OutlineOptions): ValidateOutlineResult {
  try {
    const document = parseOutline(text, {
      keywords: options.keywords,
      summarySection: options.sections.summary,
    });
    return validateOutline(document, options);
  } catch (error) {
    if (error instanceof ParseError) return { errors: error.diagnostics, warnings: [] };
    throw error;
  }
}
