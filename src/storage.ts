import { createHash, randomUUID } from 'node:crypto';
import { copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import { formatCompactStamp } from './timestamp.js';

/**
 * Filesystem helpers for the task outline and journal files.
 *
 * Responsibilities:
 * - Content hashing (etag) and atomic writes.
 * - Timestamped backups before overwriting.
 * - Journal file naming (`YYYYMMDD` or `YYYYMMDD.org`).
 * - Per-file serialization of read-modify-write cycles within this process.
 */
export const JOURNAL_EXTENSION = '.org';
const JOURNAL_NAME_RE = /^(\d{4})(\d{2})(\d{2})(\.org)?$/;

/**
 * Compute a stable hex-encoded SHA-256 digest, used as an etag.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

function isEnoent(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a UTF-8 file, or `undefined` when it does not exist.
 */
export async function readTextIfExists(absolutePath: string): Promise<string | undefined> {
  try {
    return await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (isEnoent(error)) return undefined;
    throw error;
  }
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  try {
    await writeFile(tmpPath, text, 'utf8');
    await rename(tmpPath, absolutePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/** `tasks.org` → `tasks.<YYYYMMDD_HHMMSS>.bak`; the stamp replaces the extension. */
export function backupPath(absolutePath: string, now: Date): string {
  const extension = extname(absolutePath);
  const stem = extension ? absolutePath.slice(0, -extension.length) : absolutePath;
  return `${stem}.${formatCompactStamp(now)}.bak`;
}

/**
 * Copy an existing file to its timestamped backup path beside it.
 * Returns the backup path, or `undefined` when there was nothing to back up.
 */
export async function backupFile(absolutePath: string, now: Date): Promise<string | undefined> {
  const target = backupPath(absolutePath, now);
  try {
    await copyFile(absolutePath, target);
  } catch (error) {
    if (isEnoent(error)) return undefined;
    throw error;
  }
  return target;
}

/** `2025-01-15` → `20250115`. */
export function compactDate(isoDate: string): string {
  return isoDate.replace(/-/g, '');
}

/**
 * ISO date of a journal file name, or `undefined` for any other file.
 */
export function journalDateFromName(name: string): string | undefined {
  const match = basename(name).match(JOURNAL_NAME_RE);
  if (!match) return undefined;
  return `${match[1]}-${match[2]}-${match[3]}`;
}

export interface JournalFileRef {
  date: string;
  path: string;
}

/**
 * Journal files in `journalDir`, newest first. A missing directory is empty.
 */
export async function listJournalFiles(journalDir: string): Promise<JournalFileRef[]> {
  let names: string[];
  try {
    names = await readdir(journalDir);
  } catch (error) {
    if (isEnoent(error)) return [];
    throw error;
  }
  const byDate = new Map<string, JournalFileRef>();
  for (const name of names.sort()) {
    const date = journalDateFromName(name);
    // `YYYYMMDD` sorts before `YYYYMMDD.org`; the bare name wins a tie.
    if (date && !byDate.has(date)) byDate.set(date, { date, path: join(journalDir, name) });
  }
  return [...byDate.values()].sort((a, b) => b.date.localeCompare(a.date));
}

/**
 * `.org` when any existing journal file uses it, otherwise no extension.
 */
export async function detectJournalExtension(journalDir: string): Promise<string> {
  let names: string[];
  try {
    names = await readdir(journalDir);
  } catch (error) {
    if (isEnoent(error)) return '';
    throw error;
  }
  return names.some((name) => journalDateFromName(name) !== undefined && name.endsWith(JOURNAL_EXTENSION))
    ? JOURNAL_EXTENSION
    : '';
}

/**
 * Path of the journal file for `isoDate`: an existing file of either naming
 * form, else a new name following the directory's convention.
 */
export async function resolveJournalPath(journalDir: string, isoDate: string): Promise<string> {
  const stem = compactDate(isoDate);
  for (const name of [stem, `${stem}${JOURNAL_EXTENSION}`]) {
    const candidate = join(journalDir, name);
    if ((await readTextIfExists(candidate)) !== undefined) return candidate;
  }
  return join(journalDir, `${stem}${await detectJournalExtension(journalDir)}`);
}

const queues = new Map<string, Promise<unknown>>();

/**
 * Run `fn` after every earlier call for the same path has settled.
 */
export async function withFileQueue<T>(absolutePath: string, fn: () => Promise<T>): Promise<T> {
  const previous = queues.get(absolutePath) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.then(
    () => undefined,
    () => undefined
  );
  queues.set(absolutePath, tail);
  try {
    return await run;
  } finally {
    if (queues.get(absolutePath) === tail) queues.delete(absolutePath);
  }
}
