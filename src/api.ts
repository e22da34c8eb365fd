import { autoApprover, withApprovalTimeout, type Approver } from './approval.js';
import type { OrgLedgerConfig } from './config.js';
import type { Diagnostic } from './diagnostics.js';
import { errorDiagnostic } from './diagnostics.js';
import { formatDiff, previewDiff } from './diff/preview.js';
import { ApprovalRejectedError, NotFoundError, ParseError, errorMessage } from './errors.js';
import type { JournalDay, JournalEntryInput, JournalEntryPatch, JournalLocator } from './journal/model.js';
import {
  createJournalEntry as createEntryInDay,
  findJournalEntry,
  updateJournalEntry as updateEntryInDay,
  type JournalMutationResult,
} from './journal/mutate.js';
import { emptyJournalDay, isValidDate, journalEntryText, parseJournalDay, serializeJournalDay } from './journal/parse.js';
import { searchJournal, type JournalMatchField } from './journal/search.js';
import { toJournalEntryView, type JournalEntryView } from './journal/view.js';
import type { Logger } from './logger.js';
import { createSilentLogger } from './logger.js';
import { entrySlug } from './outline/entry.js';
import { listEntries } from './outline/locate.js';
import type { Entry, EntryStatus, OrgDocument } from './outline/model.js';
import { OutlineMutator, type MutationResult } from './outline/mutate.js';
import { parseOutline } from './outline/parse.js';
import { entryText, serializeOutline } from './outline/serialize.js';
import { sectionForStatus, statusSections } from './outline/status.js';
import { validateOutline } from './outline/validate.js';
import { toEntryView, type EntryView } from './outline/view.js';
import {
  backupFile,
  listJournalFiles,
  readTextIfExists,
  resolveJournalPath,
  sha256Hex,
  withFileQueue,
  writeFileAtomic,
} from './storage.js';
import { formatClockTime, formatIsoDate } from './timestamp.js';

/**
 * Public API for task and journal operations.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - the outline and journal codecs and mutators (`outline/`, `journal/`)
 * - the approval gate (`approval.ts`)
 *
 * Write model:
 * - Each read-modify-write of one file runs inside `withFileQueue`.
 * - The new text is diffed against the old, shown to the approver, backed up
 *   and written atomically.
 */
export interface LedgerContext {
  config: OrgLedgerConfig;
  logger: Logger;
  approver: Approver;
  now: () => Date;
  generateId?: () => string;
}

export interface LedgerContextOptions {
  logger?: Logger;
  approver?: Approver;
  now?: () => Date;
  generateId?: () => string;
}

export function createLedgerContext(config: OrgLedgerConfig, options: LedgerContextOptions = {}): LedgerContext {
  const logger = options.logger ?? createSilentLogger();
  return {
    config,
    logger,
    approver: withApprovalTimeout(options.approver ?? autoApprover, {
      timeoutMs: config.approvalTimeoutMs,
      fallback: config.approvalFallback,
      logger,
    }),
    now: options.now ?? (() => new Date()),
    generateId: options.generateId,
  };
}

export const DEFAULT_SEARCH_DAYS = 30;

interface CommitResult {
  text: string;
  written: boolean;
  backup?: string;
}

/**
 * Ask for approval and write `newText`. An approver edit is re-parsed by
 * `check` before it is written.
 */
async function commitText(
  ctx: LedgerContext,
  path: string,
  oldText: string | undefined,
  newText: string,
  check: (text: string) => void
): Promise<CommitResult> {
  if (oldText === newText) return { text: newText, written: false };

  const decision = await ctx.approver.approve({ path, oldText: oldText ?? '', newText });
  if (decision.kind === 'reject') {
    ctx.logger.info({ path, reason: decision.reason }, 'change rejected');
    throw new ApprovalRejectedError(path, decision.reason);
  }
  let finalText = newText;
  if (decision.kind === 'edit') {
    check(decision.text);
    finalText = decision.text;
  }

  const backup = oldText !== undefined && ctx.config.backups ? await backupFile(path, ctx.now()) : undefined;
  await writeFileAtomic(path, finalText);
  return { text: finalText, written: true, backup };
}

// ---------------------------------------------------------------------------
// Tasks

function mutator(ctx: LedgerContext): OutlineMutator {
  return new OutlineMutator(ctx.config.outline, { now: ctx.now, generateId: ctx.generateId });
}

function parseTasks(ctx: LedgerContext, text: string): OrgDocument {
  return parseOutline(text, {
    keywords: ctx.config.outline.keywords,
    summarySection: ctx.config.outline.sections.summary,
  });
}

async function readTasks(ctx: LedgerContext): Promise<{ text: string; document: OrgDocument; etag: string }> {
  const path = ctx.config.tasksFile;
  const text = await readTextIfExists(path);
  if (text === undefined) throw new NotFoundError(`Tasks file not found: ${path}`);
  return { text, document: parseTasks(ctx, text), etag: sha256Hex(text) };
}

/**
 * The stored form of `entry` in `document` (with its line number), found by slug.
 */
function storedView(document: OrgDocument, entry: Entry, fallbackSection: string): EntryView {
  const slug = entrySlug(entry);
  const found = slug ? listEntries(document).find((located) => entrySlug(located.entry) === slug) : undefined;
  return found
    ? toEntryView(found.entry, found.section, { includeText: true })
    : toEntryView(entry, fallbackSection, { includeText: true });
}

export type TaskListResult = { tasks: EntryView[]; etag: string };

export async function listTasks(
  ctx: LedgerContext,
  options: { section?: string; status?: EntryStatus } = {}
): Promise<TaskListResult> {
  const { document, etag } = await readTasks(ctx);
  const scope = options.section ? [options.section] : statusSections(ctx.config.outline.sections);
  if (options.section && !document.sections.some((section) => section.name === options.section)) {
    throw new NotFoundError(`Section not found: ${options.section}`);
  }
  const tasks = listEntries(document, scope)
    .filter((located) => !options.status || located.entry.status === options.status)
    .map((located) => toEntryView(located.entry, located.section, { includeText: false }));
  ctx.logger.debug({ count: tasks.length, scope }, 'listed tasks');
  return { tasks, etag };
}

export type TaskGetResult = { task: EntryView; etag: string };

export async function getTask(ctx: LedgerContext, options: { identifier: string }): Promise<TaskGetResult> {
  const { document, etag } = await readTasks(ctx);
  const located = mutator(ctx).locate(document, options.identifier);
  return { task: toEntryView(located.entry, located.section, { includeText: true }), etag };
}

export type TaskSearchResult = { tasks: EntryView[] };

/**
 * Case-insensitive substring search over headlines, or over the whole entry
 * text when `full` is set.
 */
export async function searchTasks(
  ctx: LedgerContext,
  options: { query: string; full?: boolean; limit?: number }
): Promise<TaskSearchResult> {
  const { document } = await readTasks(ctx);
  const needle = options.query.trim().toLowerCase();
  if (!needle) return { tasks: [] };
  const hits = listEntries(document, statusSections(ctx.config.outline.sections)).filter((located) => {
    const haystack = options.full ? entryText(located.entry) : located.entry.title;
    return haystack.toLowerCase().includes(needle);
  });
  const limited = options.limit !== undefined ? hits.slice(0, options.limit) : hits;
  return { tasks: limited.map((located) => toEntryView(located.entry, located.section, { includeText: false })) };
}

export type TaskWriteResult = {
  task: EntryView;
  previous?: EntryView;
  fromSection?: string;
  section: string;
  moved: boolean;
  written: boolean;
  diff: string;
  etag: string;
  backup?: string;
};

async function writeTaskMutation(
  ctx: LedgerContext,
  operation: string,
  run: (document: OrgDocument) => MutationResult
): Promise<TaskWriteResult> {
  const path = ctx.config.tasksFile;
  return withFileQueue(path, async () => {
    const { text, document } = await readTasks(ctx);
    const result = run(document);
    const newText = serializeOutline(result.document);
    const commit = await commitText(ctx, path, text, newText, (edited) => {
      parseTasks(ctx, edited);
    });
    const task = storedView(parseTasks(ctx, commit.text), result.entry, result.toSection);
    ctx.logger.info(
      { operation, path, slug: task.slug, from: result.fromSection, to: result.toSection, written: commit.written },
      'task written'
    );
    return {
      task,
      previous: result.previous
        ? toEntryView(result.previous, result.fromSection ?? result.toSection, { includeText: true })
        : undefined,
      fromSection: result.fromSection,
      section: result.toSection,
      moved: result.moved,
      written: commit.written,
      diff: formatDiff(previewDiff(text, commit.text)),
      etag: sha256Hex(commit.text),
      backup: commit.backup,
    };
  });
}

/**
 * Create an entry. Without `section`, the section mapped from the entry's
 * status is used.
 */
export async function createTask(
  ctx: LedgerContext,
  options: { entry: string; section?: string }
): Promise<TaskWriteResult> {
  const mutate = mutator(ctx);
  const section =
    options.section ?? sectionForStatus(mutate.parseFragment(options.entry).status, ctx.config.outline.sections);
  return writeTaskMutation(ctx, 'create', (document) => mutate.create(document, section, options.entry));
}

export async function updateTask(
  ctx: LedgerContext,
  options: { identifier: string; entry: string }
): Promise<TaskWriteResult> {
  const mutate = mutator(ctx);
  return writeTaskMutation(ctx, 'update', (document) => mutate.update(document, options.identifier, options.entry));
}

export async function moveTask(
  ctx: LedgerContext,
  options: { identifier: string; from: string; to: string }
): Promise<TaskWriteResult> {
  const mutate = mutator(ctx);
  return writeTaskMutation(ctx, 'move', (document) =>
    mutate.move(document, options.identifier, options.from, options.to)
  );
}

export type TaskPreviewResult = {
  task: EntryView;
  previous: EntryView;
  fromSection: string;
  section: string;
  moved: boolean;
  changed: boolean;
  diff: string;
};

/**
 * What `updateTask` would write, without writing. The diff covers the whole
 * file, so a relocation and the summary checklist change are visible.
 */
export async function previewTaskUpdate(
  ctx: LedgerContext,
  options: { identifier: string; entry: string }
): Promise<TaskPreviewResult> {
  const { text, document } = await readTasks(ctx);
  const result = mutator(ctx).update(document, options.identifier, options.entry);
  const newText = serializeOutline(result.document);
  const diff = previewDiff(text, newText);
  ctx.logger.debug({ identifier: options.identifier, added: diff.added, removed: diff.removed }, 'previewed task update');
  const fromSection = result.fromSection ?? result.toSection;
  return {
    task: storedView(parseTasks(ctx, newText), result.entry, result.toSection),
    previous: toEntryView(result.previous ?? result.entry, fromSection, { includeText: true }),
    fromSection,
    section: result.toSection,
    moved: result.moved,
    changed: diff.changed,
    diff: formatDiff(diff),
  };
}

export type ValidateResult = { errors: Diagnostic[]; warnings: Diagnostic[] };

export async function validateTasks(ctx: LedgerContext): Promise<ValidateResult> {
  const path = ctx.config.tasksFile;
  const text = await readTextIfExists(path);
  if (text === undefined) throw new NotFoundError(`Tasks file not found: ${path}`);
  try {
    return validateOutline(parseTasks(ctx, text), ctx.config.outline);
  } catch (error) {
    if (error instanceof ParseError) return { errors: error.diagnostics, warnings: [] };
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Journal

/**
 * `YYYY-MM-DD`, or today when omitted or `today`.
 */
export function resolveDate(ctx: LedgerContext, date: string | undefined): string {
  if (date === undefined || date === 'today') return formatIsoDate(ctx.now());
  if (!isValidDate(date)) {
    throw new ParseError([errorDiagnostic('INVALID_DATE', `Invalid date ${JSON.stringify(date)} (expected YYYY-MM-DD)`)]);
  }
  return date;
}

async function readJournal(
  ctx: LedgerContext,
  date: string
): Promise<{ path: string; text: string | undefined; day: JournalDay }> {
  const path = await resolveJournalPath(ctx.config.journalDir, date);
  const text = await readTextIfExists(path);
  const day = text === undefined ? emptyJournalDay(date) : parseJournalDay(text, { date });
  return { path, text, day };
}

/**
 * The stored form of the written entry (with its line number). An approver
 * edit may move entries, so the entry is then looked up by time and headline.
 */
function storedJournalView(
  date: string,
  commit: CommitResult,
  proposed: string,
  result: JournalMutationResult
): JournalEntryView {
  const day = parseJournalDay(commit.text, { date });
  const found =
    commit.text === proposed
      ? day.entries[result.index]
      : day.entries.find(
          (candidate) => candidate.time === result.entry.time && candidate.headline === result.entry.headline
        );
  return toJournalEntryView(date, found ?? result.entry, { includeText: true });
}

export type JournalListResult = { date: string; path: string; entries: JournalEntryView[] };

export async function listJournalEntries(ctx: LedgerContext, options: { date?: string } = {}): Promise<JournalListResult> {
  const date = resolveDate(ctx, options.date);
  const { path, day } = await readJournal(ctx, date);
  return { date, path, entries: day.entries.map((entry) => toJournalEntryView(date, entry, { includeText: false })) };
}

export type JournalGetResult = { entry: JournalEntryView };

export async function getJournalEntry(
  ctx: LedgerContext,
  options: { date?: string; locator: JournalLocator }
): Promise<JournalGetResult> {
  const date = resolveDate(ctx, options.date);
  const { day } = await readJournal(ctx, date);
  const { entry } = findJournalEntry(day, options.locator);
  return { entry: toJournalEntryView(date, entry, { includeText: true }) };
}

export type JournalWriteResult = {
  entry: JournalEntryView;
  previous?: JournalEntryView;
  date: string;
  path: string;
  written: boolean;
  diff: string;
  backup?: string;
};

export type CreateJournalEntryOptions = Omit<JournalEntryInput, 'time'> & { date?: string; time?: string };

/**
 * Add an entry to a day file (created when missing). `time` defaults to now.
 */
export async function createJournalEntry(
  ctx: LedgerContext,
  options: CreateJournalEntryOptions
): Promise<JournalWriteResult> {
  const date = resolveDate(ctx, options.date);
  const path = await resolveJournalPath(ctx.config.journalDir, date);
  return withFileQueue(path, async () => {
    const { text, day } = await readJournal(ctx, date);
    const result = createEntryInDay(day, {
      time: options.time ?? formatClockTime(ctx.now()),
      headline: options.headline,
      details: options.details,
      tags: options.tags,
      ticket: options.ticket,
      link: options.link,
    });
    const newText = serializeJournalDay(result.day);
    const commit = await commitText(ctx, path, text, newText, (edited) => {
      parseJournalDay(edited, { date });
    });
    ctx.logger.info({ path, date, time: result.entry.time, written: commit.written }, 'journal entry created');
    return {
      entry: storedJournalView(date, commit, newText, result),
      date,
      path,
      written: commit.written,
      diff: formatDiff(previewDiff(text ?? '', commit.text)),
      backup: commit.backup,
    };
  });
}

export async function updateJournalEntry(
  ctx: LedgerContext,
  options: { date?: string; locator: JournalLocator; patch: JournalEntryPatch }
): Promise<JournalWriteResult> {
  const date = resolveDate(ctx, options.date);
  const path = await resolveJournalPath(ctx.config.journalDir, date);
  return withFileQueue(path, async () => {
    const { text, day } = await readJournal(ctx, date);
    if (text === undefined) throw new NotFoundError(`No journal file for ${date}`);
    const result = updateEntryInDay(day, options.locator, options.patch);
    const newText = serializeJournalDay(result.day);
    const commit = await commitText(ctx, path, text, newText, (edited) => {
      parseJournalDay(edited, { date });
    });
    ctx.logger.info({ path, date, time: result.entry.time, written: commit.written }, 'journal entry updated');
    return {
      entry: storedJournalView(date, commit, newText, result),
      previous: result.previous ? toJournalEntryView(date, result.previous, { includeText: true }) : undefined,
      date,
      path,
      written: commit.written,
      diff: formatDiff(previewDiff(text, commit.text)),
      backup: commit.backup,
    };
  });
}

export type JournalPreviewResult = {
  entry: JournalEntryView;
  previous: JournalEntryView;
  changed: boolean;
  diff: string;
};

/**
 * The entry-level change `updateJournalEntry` would make, without writing.
 */
export async function previewJournalUpdate(
  ctx: LedgerContext,
  options: { date?: string; locator: JournalLocator; patch: JournalEntryPatch }
): Promise<JournalPreviewResult> {
  const date = resolveDate(ctx, options.date);
  const { day } = await readJournal(ctx, date);
  const result = updateEntryInDay(day, options.locator, options.patch);
  const previous = result.previous ?? result.entry;
  const diff = previewDiff(journalEntryText(previous), journalEntryText(result.entry));
  return {
    entry: toJournalEntryView(date, result.entry, { includeText: true }),
    previous: toJournalEntryView(date, previous, { includeText: true }),
    changed: diff.changed,
    diff: formatDiff(diff),
  };
}

export type JournalSearchMatch = JournalEntryView & { field: JournalMatchField };
export type JournalSearchResult = { matches: JournalSearchMatch[]; days: number };

/**
 * Search the day files of the last `days` calendar days (today included),
 * newest first. A file that fails to parse is skipped with a warning.
 */
export async function searchJournalEntries(
  ctx: LedgerContext,
  options: { query: string; days?: number; limit?: number }
): Promise<JournalSearchResult> {
  const window = options.days ?? DEFAULT_SEARCH_DAYS;
  const now = ctx.now();
  const wanted = new Set<string>();
  for (let offset = 0; offset < window; offset += 1) {
    wanted.add(formatIsoDate(new Date(now.getFullYear(), now.getMonth(), now.getDate() - offset)));
  }

  const days: JournalDay[] = [];
  for (const file of await listJournalFiles(ctx.config.journalDir)) {
    if (!wanted.has(file.date)) continue;
    const text = await readTextIfExists(file.path);
    if (text === undefined) continue;
    try {
      days.push(parseJournalDay(text, { date: file.date }));
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      ctx.logger.warn({ path: file.path, error: errorMessage(error) }, 'skipping unparseable journal file');
    }
  }

  const matches: JournalSearchMatch[] = [];
  for (const match of searchJournal(days, options.query, window)) {
    if (options.limit !== undefined && matches.length >= options.limit) break;
    matches.push({ ...toJournalEntryView(match.date, match.entry, { includeText: false }), field: match.field });
  }
  ctx.logger.debug({ query: options.query, days: window, count: matches.length }, 'searched journal');
  return { matches, days: window };
}
