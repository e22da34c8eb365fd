/**
 * Line splitting shared by the outline and journal codecs.
 *
 * A trailing newline is recorded separately so serialization can restore the
 * exact ending (including CRLF files and files without a final newline).
 */
export type Eol = '\n' | '\r\n';

export interface SplitText {
  lines: string[];
  eol: Eol;
  endsWithNewline: boolean;
}

function detectEol(text: string): Eol {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

export function splitLines(text: string): SplitText {
  const eol = detectEol(text);
  const endsWithNewline = text.endsWith('\n');
  if (text === '') return { lines: [], eol, endsWithNewline: true };
  let lines = text.split(/\r?\n/);
  if (endsWithNewline && lines.length > 0 && lines[lines.length - 1] === '') {
    lines = lines.slice(0, -1);
  }
  return { lines, eol, endsWithNewline };
}

export function joinLines(lines: readonly string[], eol: Eol, endsWithNewline: boolean): string {
  if (lines.length === 0) return '';
  const text = lines.join(eol);
  return endsWithNewline ? `${text}${eol}` : text;
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Split off trailing blank lines. Returns the content lines and the count.
 */
export function trimTrailingBlankLines(lines: readonly string[]): {
  content: string[];
  blankCount: number;
} {
  let end = lines.length;
  while (end > 0 && isBlankLine(lines[end - 1] ?? '')) end -= 1;
  return { content: lines.slice(0, end), blankCount: lines.length - end };
}

export function blankLines(count: number): string[] {
  return Array.from({ length: count }, () => '');
}

/**
 * Split free-form multi-line input (tool arguments) into lines.
 * An empty or whitespace-only string yields no lines.
 */
export function textToLines(text: string): string[] {
  if (text.trim() === '') return [];
  return trimTrailingBlankLines(text.replace(/\r\n/g, '\n').split('\n')).content;
}
