import { errorDiagnostic } from '../diagnostics.js';
import { ParseError } from '../errors.js';
import { isBlankLine, trimTrailingBlankLines } from '../text.js';
import type { Checklist, ChecklistItem, Progress } from './model.js';

/**
 * Checkbox lists (`- [ ] item`, `- [X] item`) under cookie-bearing headings.
 *
 * Only items at the list's own indentation count towards progress; deeper
 * lines (nested items, wrapped text) are continuation lines of the item above.
 */
const CHECKBOX_RE = /^([ \t]*)([-+])[ \t]+\[([ xX])\](?:[ \t]+(.*))?$/;
const LIST_ITEM_RE = /^[ \t]*(?:[-+]|\d+[.)])(?:[ \t]|$)/;

function indentWidth(line: string): number {
  return line.length - line.trimStart().length;
}

function checklistSyntaxError(line: string, lineIndex: number): ParseError {
  return new ParseError([
    errorDiagnostic(
      'CHECKLIST_SYNTAX',
      `Checklist line does not match checkbox syntax (expected "- [ ] text" or "- [X] text"): ${JSON.stringify(
        line.trim()
      )}`,
      lineIndex
    ),
  ]);
}

function parseCheckbox(line: string): ChecklistItem | undefined {
  const match = line.match(CHECKBOX_RE);
  if (!match) return undefined;
  return {
    indent: match[1] ?? '',
    bullet: match[2] === '+' ? '+' : '-',
    done: (match[3] ?? ' ').toUpperCase() === 'X',
    description: (match[4] ?? '').trimEnd(),
    extra: [],
  };
}

/**
 * Parse the body lines of a cookie-bearing heading.
 *
 * `firstLine` is the 0-based line index of `lines[0]` in the whole document,
 * used for diagnostics.
 */
export function parseChecklist(lines: readonly string[], firstLine: number): Checklist {
  const leading: string[] = [];
  const items: ChecklistItem[] = [];
  let itemIndent = 0;
  let after: string[] = [];

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? '';
    const lineIndex = firstLine + index;
    const current = items[items.length - 1];

    if (!current) {
      const item = parseCheckbox(line);
      if (item) {
        itemIndent = item.indent.length;
        items.push(item);
      } else if (LIST_ITEM_RE.test(line)) {
        throw checklistSyntaxError(line, lineIndex);
      } else {
        leading.push(line);
      }
      continue;
    }

    if (isBlankLine(line) || indentWidth(line) > itemIndent) {
      current.extra.push(line);
      continue;
    }

    const item = parseCheckbox(line);
    if (item && item.indent.length === itemIndent) {
      items.push(item);
    } else if (item || LIST_ITEM_RE.test(line)) {
      throw checklistSyntaxError(line, lineIndex);
    } else {
      // A paragraph ends the list; it and everything after it stay verbatim.
      after = lines.slice(index);
      break;
    }
  }

  const last = items[items.length - 1];
  let trailing: string[] = after;
  if (last) {
    const { content, blankCount } = trimTrailingBlankLines(last.extra);
    trailing = [...last.extra.slice(content.length, content.length + blankCount), ...after];
    last.extra = content;
  }

  return { leading, items, trailing };
}

export function checklistProgress(checklist: Checklist): Progress {
  const done = checklist.items.filter((item) => item.done).length;
  return { done, total: checklist.items.length };
}

export function renderChecklistItem(item: ChecklistItem): string {
  const text = item.description ? ` ${item.description}` : '';
  return `${item.indent}${item.bullet} [${item.done ? 'X' : ' '}]${text}`;
}

export function renderChecklist(checklist: Checklist): string[] {
  const out = [...checklist.leading];
  for (const item of checklist.items) {
    out.push(renderChecklistItem(item), ...item.extra);
  }
  out.push(...checklist.trailing);
  return out;
}
