#!/usr/bin/env node

/**
 * `org-ledger` - local CLI for the org task outline and journal.
 *
 * This CLI is a first-class interface alongside the stdio server. Both share
 * the same API so behavior stays in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { readFileSync } from 'node:fs';
import { readFile as readFileAsync } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  createJournalEntry,
  createLedgerContext,
  createTask,
  getJournalEntry,
  getTask,
  listJournalEntries,
  listTasks,
  moveTask,
  previewJournalUpdate,
  previewTaskUpdate,
  searchJournalEntries,
  searchTasks,
  updateJournalEntry,
  updateTask,
  validateTasks,
  type LedgerContext,
} from './api.js';
import type { Approver } from './approval.js';
import { resolveConfig, takeConfigFlags, takeFlag, takeOption } from './config.js';
import { errorMessage, isOrgLedgerError } from './errors.js';
import type { JournalEntryPatch, JournalLink, JournalLocator } from './journal/model.js';
import { createLogger, type Logger } from './logger.js';
import type { EntryStatus } from './outline/model.js';

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  now?: () => Date;
  approver?: Approver;
  logger?: Logger;
}

function helpText(): string {
  return [
    'org-ledger: org task outline and journal CLI',
    '',
    'Usage:',
    '  org-ledger [--org-dir <dir>] [--tasks-file <file>] [--journal-dir <dir>] [--no-backup] <cmd>',
    '',
    'Task:',
    '  org-ledger task list [--section <name>] [--status open|closed]',
    '  org-ledger task get <identifier>',
    '  org-ledger task search --query <text> [--full] [--limit <n>]',
    '  org-ledger task create [--section <name>] (--entry <text>|--entry-file <path>|--entry-stdin)',
    '  org-ledger task update <identifier> (--entry <text>|--entry-file <path>|--entry-stdin)',
    '  org-ledger task preview <identifier> (--entry <text>|--entry-file <path>|--entry-stdin)',
    '  org-ledger task move <identifier> --from <section> --to <section>',
    '',
    'Journal:',
    '  org-ledger journal list [--date YYYY-MM-DD]',
    '  org-ledger journal get (<HH:MM>|<headline>|--line <n>) [--date YYYY-MM-DD]',
    '  org-ledger journal create --headline <text> [--time HH:MM] [--date YYYY-MM-DD] [--tags a,b] [--ticket <id>] [--link <url>] [--link-label <text>] [--details <text>|--details-file <path>|--details-stdin]',
    '  org-ledger journal update (<HH:MM>|<headline>|--line <n>) [--date YYYY-MM-DD] [--time HH:MM] [--headline <text>] [--tags a,b] [--ticket <id>|--clear-ticket] [--link <url>|--clear-link] [--details ...]',
    '  org-ledger journal preview (same arguments as update)',
    '  org-ledger journal search --query <text> [--days <n>] [--limit <n>]',
    '',
    'Doc:',
    '  org-ledger doc validate',
    '',
    'Notes:',
    '  - Identifiers: slug (task-gh-28), slug without prefix (gh-28), ticket (GH-28) or headline substring.',
    '  - Output is JSON on stdout; errors go to stderr as CODE: message.',
    '',
  ].join('\n');
}

function writeHelp(io: CliIo): void {
  io.stdout.write(helpText());
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: CliIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) throw new Error(`Invalid ${flag}: ${JSON.stringify(raw)}`);
  return value;
}

function parseStatus(value: string | undefined): EntryStatus | undefined {
  if (!value) return undefined;
  if (value === 'open' || value === 'closed') return value;
  throw new Error(`Invalid --status: ${JSON.stringify(value)}`);
}

function parseTags(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((tag) => tag.trim())
    .filter(Boolean);
}

/**
 * Read `--<name>`, `--<name>-file` or `--<name>-stdin` (mutually exclusive).
 */
async function takeTextArgs(argv: string[], name: string, cwd: string): Promise<string | undefined> {
  const fromStdin = takeFlag(argv, `--${name}-stdin`);
  const fromFile = takeOption(argv, `--${name}-file`);
  const inline = takeOption(argv, `--${name}`);

  const selected = [fromStdin, fromFile !== undefined, inline !== undefined].filter(Boolean).length;
  if (selected > 1) {
    throw new Error(`Use only one of --${name}, --${name}-file, --${name}-stdin`);
  }
  if (inline !== undefined) return inline;
  if (fromFile !== undefined) return readFileAsync(resolvePath(cwd, fromFile), 'utf8');
  if (fromStdin) return readFileSync(0, 'utf8');
  return undefined;
}

async function requireEntryText(argv: string[], cwd: string): Promise<string> {
  const entry = await takeTextArgs(argv, 'entry', cwd);
  if (entry === undefined) throw new Error('Missing --entry, --entry-file or --entry-stdin');
  return entry;
}

async function handleTaskCommand(ctx: LedgerContext, argv: string[], io: CliIo, cwd: string): Promise<number> {
  const sub = argv.shift();

  if (sub === 'list') {
    const section = takeOption(argv, '--section');
    const status = parseStatus(takeOption(argv, '--status'));
    assertNoUnknownFlags(argv);
    writeJson(io, await listTasks(ctx, { section, status }));
    return 0;
  }

  if (sub === 'get') {
    const identifier = argv.shift();
    assertNoUnknownFlags(argv);
    if (!identifier) throw new Error('Missing <identifier>');
    writeJson(io, await getTask(ctx, { identifier }));
    return 0;
  }

  if (sub === 'search') {
    const query = takeOption(argv, '--query');
    const full = takeFlag(argv, '--full');
    const limit = parsePositiveInt(takeOption(argv, '--limit'), '--limit');
    assertNoUnknownFlags(argv);
    if (!query) throw new Error('Missing --query');
    writeJson(io, await searchTasks(ctx, { query, full, limit }));
    return 0;
  }

  if (sub === 'create') {
    const section = takeOption(argv, '--section');
    const entry = await requireEntryText(argv, cwd);
    assertNoUnknownFlags(argv);
    writeJson(io, await createTask(ctx, { entry, section }));
    return 0;
  }

  if (sub === 'update' || sub === 'preview') {
    const identifier = argv.shift();
    const entry = await requireEntryText(argv, cwd);
    assertNoUnknownFlags(argv);
    if (!identifier) throw new Error('Missing <identifier>');
    const result =
      sub === 'update'
        ? await updateTask(ctx, { identifier, entry })
        : await previewTaskUpdate(ctx, { identifier, entry });
    writeJson(io, result);
    return 0;
  }

  if (sub === 'move') {
    const identifier = argv.shift();
    const from = takeOption(argv, '--from');
    const to = takeOption(argv, '--to');
    assertNoUnknownFlags(argv);
    if (!identifier) throw new Error('Missing <identifier>');
    if (!from) throw new Error('Missing --from');
    if (!to) throw new Error('Missing --to');
    writeJson(io, await moveTask(ctx, { identifier, from, to }));
    return 0;
  }

  throw new Error(`Unknown task command: ${sub ?? '(missing)'}`);
}

function takeLocator(argv: string[]): JournalLocator {
  const line = parsePositiveInt(takeOption(argv, '--line'), '--line');
  if (line !== undefined) return { line };
  const first = argv[0];
  const positional = first !== undefined && !first.startsWith('--') ? argv.shift() : undefined;
  if (!positional) throw new Error('Missing <HH:MM>, <headline> or --line');
  return positional;
}

function takeLink(argv: string[]): JournalLink | undefined {
  const url = takeOption(argv, '--link');
  const label = takeOption(argv, '--link-label');
  if (url === undefined) {
    if (label !== undefined) throw new Error('--link-label needs --link');
    return undefined;
  }
  return { url, label };
}

async function takePatch(argv: string[], cwd: string): Promise<JournalEntryPatch> {
  const clearTicket = takeFlag(argv, '--clear-ticket');
  const clearLink = takeFlag(argv, '--clear-link');
  const ticket = takeOption(argv, '--ticket');
  const link = takeLink(argv);
  if (clearTicket && ticket !== undefined) throw new Error('Use only one of --ticket, --clear-ticket');
  if (clearLink && link !== undefined) throw new Error('Use only one of --link, --clear-link');
  return {
    time: takeOption(argv, '--time'),
    headline: takeOption(argv, '--headline'),
    tags: parseTags(takeOption(argv, '--tags')),
    details: await takeTextArgs(argv, 'details', cwd),
    ticket: clearTicket ? null : ticket,
    link: clearLink ? null : link,
  };
}

async function handleJournalCommand(ctx: LedgerContext, argv: string[], io: CliIo, cwd: string): Promise<number> {
  const sub = argv.shift();

  if (sub === 'list') {
    const date = takeOption(argv, '--date');
    assertNoUnknownFlags(argv);
    writeJson(io, await listJournalEntries(ctx, { date }));
    return 0;
  }

  if (sub === 'get') {
    const date = takeOption(argv, '--date');
    const locator = takeLocator(argv);
    assertNoUnknownFlags(argv);
    writeJson(io, await getJournalEntry(ctx, { date, locator }));
    return 0;
  }

  if (sub === 'create') {
    const date = takeOption(argv, '--date');
    const time = takeOption(argv, '--time');
    const headline = takeOption(argv, '--headline');
    const tags = parseTags(takeOption(argv, '--tags'));
    const ticket = takeOption(argv, '--ticket');
    const link = takeLink(argv);
    const details = await takeTextArgs(argv, 'details', cwd);
    assertNoUnknownFlags(argv);
    if (headline === undefined) throw new Error('Missing --headline');
    writeJson(io, await createJournalEntry(ctx, { date, time, headline, tags, ticket, link, details }));
    return 0;
  }

  if (sub === 'update' || sub === 'preview') {
    const date = takeOption(argv, '--date');
    const patch = await takePatch(argv, cwd);
    const locator = takeLocator(argv);
    assertNoUnknownFlags(argv);
    const result =
      sub === 'update'
        ? await updateJournalEntry(ctx, { date, locator, patch })
        : await previewJournalUpdate(ctx, { date, locator, patch });
    writeJson(io, result);
    return 0;
  }

  if (sub === 'search') {
    const query = takeOption(argv, '--query');
    const days = parsePositiveInt(takeOption(argv, '--days'), '--days');
    const limit = parsePositiveInt(takeOption(argv, '--limit'), '--limit');
    assertNoUnknownFlags(argv);
    if (!query) throw new Error('Missing --query');
    writeJson(io, await searchJournalEntries(ctx, { query, days, limit }));
    return 0;
  }

  throw new Error(`Unknown journal command: ${sub ?? '(missing)'}`);
}

async function handleDocCommand(ctx: LedgerContext, argv: string[], io: CliIo): Promise<number> {
  const sub = argv.shift();
  if (sub === 'validate') {
    assertNoUnknownFlags(argv);
    const { errors, warnings } = await validateTasks(ctx);
    writeJson(io, { errors, warnings });
    return errors.length > 0 ? 1 : 0;
  }
  throw new Error(`Unknown doc command: ${sub ?? '(missing)'}`);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runCli(
  args: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  options: RunCliOptions = {}
): Promise<number> {
  const argv = [...args];
  const cwd = options.cwd ?? process.cwd();

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io);
      return 0;
    }

    const config = resolveConfig(takeConfigFlags(argv), { env: options.env, cwd, homeDir: options.homeDir });
    const ctx = createLedgerContext(config, {
      logger: options.logger ?? createLogger(config.logLevel),
      approver: options.approver,
      now: options.now,
    });

    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io);
      return 0;
    }
    if (cmd === 'task') return await handleTaskCommand(ctx, argv, io, cwd);
    if (cmd === 'journal') return await handleJournalCommand(ctx, argv, io, cwd);
    if (cmd === 'doc') return await handleDocCommand(ctx, argv, io);

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    if (!isOrgLedgerError(error)) {
      io.stderr.write('\n');
      writeHelp(io);
    }
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
