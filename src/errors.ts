import type { Diagnostic } from './diagnostics.js';
import { formatDiagnostics } from './diagnostics.js';

export type OrgLedgerErrorCode =
  | 'PARSE_ERROR'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'DUPLICATE_SLUG'
  | 'INVALID_TRANSITION'
  | 'APPROVAL_REJECTED';

/**
 * Base class for every error the core raises.
 *
 * `code` is stable; tool and CLI layers render it in front of the message.
 */
export class OrgLedgerError extends Error {
  readonly code: OrgLedgerErrorCode;

  constructor(code: OrgLedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OrgLedgerError';
    this.code = code;
  }
}

export class ParseError extends OrgLedgerError {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super('PARSE_ERROR', formatDiagnostics(diagnostics) || 'Failed to parse document');
    this.name = 'ParseError';
    this.diagnostics = diagnostics;
  }
}

export class NotFoundError extends OrgLedgerError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** A candidate reported by `AmbiguousMatchError`. */
export interface MatchCandidate {
  /** Slug, or the time for journal entries. */
  key: string;
  title: string;
  section: string;
}

export class AmbiguousMatchError extends OrgLedgerError {
  readonly identifier: string;
  readonly strategy: string;
  readonly candidates: MatchCandidate[];

  constructor(identifier: string, strategy: string, candidates: MatchCandidate[]) {
    const listed = candidates.map((c) => `${c.key} (${c.title})`).join(', ');
    super(
      'AMBIGUOUS_MATCH',
      `"${identifier}" matches ${candidates.length} entries by ${strategy}: ${listed}`
    );
    this.name = 'AmbiguousMatchError';
    this.identifier = identifier;
    this.strategy = strategy;
    this.candidates = candidates;
  }
}

export class DuplicateSlugError extends OrgLedgerError {
  readonly slug: string;

  constructor(slug: string) {
    super('DUPLICATE_SLUG', `Slug already in use: ${slug}`);
    this.name = 'DuplicateSlugError';
    this.slug = slug;
  }
}

export class InvalidTransitionError extends OrgLedgerError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
    this.name = 'InvalidTransitionError';
  }
}

/** The approver declined a write; the file was left untouched. */
export class ApprovalRejectedError extends OrgLedgerError {
  readonly path: string;

  constructor(path: string, reason?: string) {
    super('APPROVAL_REJECTED', `Change to ${path} was rejected${reason ? `: ${reason}` : ''}`);
    this.name = 'ApprovalRejectedError';
    this.path = path;
  }
}

export function isOrgLedgerError(error: unknown): error is OrgLedgerError {
  return error instanceof OrgLedgerError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof OrgLedgerError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
