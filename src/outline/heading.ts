import type { CookieKind, Progress } from './model.js';

/**
 * Heading-line helpers: `*** Title [1/3] :tag1:tag2:`.
 */
const HEADING_RE = /^(\*+)[ \t]+(.*)$/;
const TAGS_RE = /^(.*?)(?:[ \t]+:([\w@#%]+(?::[\w@#%]+)*):)?[ \t]*$/;
const COOKIE_RE = /[ \t]*\[(\d*%|\d*\/\d*)\]/;

export interface HeadingLine {
  level: number;
  /** Text after the stars, tags removed, trimmed. */
  text: string;
  tags: string[];
}

export function parseHeadingLine(line: string): HeadingLine | undefined {
  const match = line.match(HEADING_RE);
  if (!match) return undefined;
  const level = match[1]?.length ?? 0;
  const rest = match[2] ?? '';
  const tagMatch = rest.match(TAGS_RE);
  const text = (tagMatch?.[1] ?? rest).trim();
  const tagText = tagMatch?.[2];
  return { level, text, tags: tagText ? tagText.split(':') : [] };
}

export function headingLevel(line: string): number | undefined {
  const match = line.match(HEADING_RE);
  return match ? match[1]?.length : undefined;
}

/**
 * Remove the first progress cookie from a heading text.
 */
export function splitCookie(text: string): { name: string; cookie?: CookieKind } {
  const match = text.match(COOKIE_RE);
  if (!match || match.index === undefined) return { name: text };
  const name = `${text.slice(0, match.index)}${text.slice(match.index + match[0].length)}`.trim();
  const cookie: CookieKind = (match[1] ?? '').endsWith('%') ? 'percent' : 'fraction';
  return { name, cookie };
}

export function renderCookie(kind: CookieKind, progress: Progress): string {
  if (kind === 'fraction') return `[${progress.done}/${progress.total}]`;
  const percent = Math.floor((progress.done * 100) / Math.max(1, progress.total));
  return `[${percent}%]`;
}

export function renderTags(tags: readonly string[]): string {
  return tags.length > 0 ? ` :${tags.join(':')}:` : '';
}

export function renderHeading(level: number, text: string, tags: readonly string[]): string {
  return `${'*'.repeat(level)} ${text}${renderTags(tags)}`;
}
