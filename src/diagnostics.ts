/**
 * Diagnostics (errors/warnings) produced by parsing/validation.
 *
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 0-based line index (when applicable).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  line?: number; // 0-based
}

export function errorDiagnostic(
  code: string,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(
  code: string,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}

/**
 * Render diagnostics as `CODE@line: message`, one per line (1-based lines).
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  return diagnostics
    .map((d) => `${d.code}${d.line !== undefined ? `@${d.line + 1}` : ''}: ${d.message}`)
    .join('\n');
}
