import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import * as z from 'zod';
import {
  DEFAULT_CLOSED_KEYWORDS,
  DEFAULT_OPEN_KEYWORDS,
  DEFAULT_SLUG_PREFIX,
} from './outline/constants.js';
import type { OutlineOptions } from './outline/model.js';

/**
 * Runtime configuration: where the task outline and journal live, and the
 * section names the outline uses.
 *
 * Precedence is CLI flag, then environment variable, then default.
 */
export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type ApprovalFallback = 'approve' | 'reject';

export interface OrgLedgerConfig {
  orgDir: string;
  tasksFile: string;
  journalDir: string;
  outline: OutlineOptions;
  /** Write `<stem>.<YYYYMMDD_HHMMSS>.bak` before overwriting a file. */
  backups: boolean;
  approvalTimeoutMs: number;
  /** Decision used when the approver times out or fails. */
  approvalFallback: ApprovalFallback;
  logLevel: LogLevel;
}

export const DEFAULT_ORG_DIR = '~/org';
export const DEFAULT_TASKS_FILE_NAME = 'tasks.org';
export const DEFAULT_JOURNAL_DIR_NAME = 'journal';
export const DEFAULT_ACTIVE_SECTION = 'Tasks';
export const DEFAULT_COMPLETED_SECTION = 'Completed Tasks';
export const DEFAULT_SUMMARY_SECTION = 'High Level Tasks (in order)';
export const DEFAULT_APPROVAL_TIMEOUT_MS = 300_000;

const BOOLEAN_WORDS: Record<string, boolean> = {
  true: true,
  '1': true,
  yes: true,
  on: true,
  false: false,
  '0': false,
  no: false,
  off: false,
};

const booleanText = z
  .string()
  .transform((value, ctx) => {
    const parsed = BOOLEAN_WORDS[value.trim().toLowerCase()];
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected true/false, got ${JSON.stringify(value)}` });
      return z.NEVER;
    }
    return parsed;
  });

const RawConfigSchema = z.object({
  orgDir: z.string().min(1).default(DEFAULT_ORG_DIR),
  tasksFile: z.string().min(1).optional(),
  journalDir: z.string().min(1).optional(),
  activeSection: z.string().trim().min(1).default(DEFAULT_ACTIVE_SECTION),
  completedSection: z.string().trim().min(1).default(DEFAULT_COMPLETED_SECTION),
  summarySection: z.string().trim().min(1).default(DEFAULT_SUMMARY_SECTION),
  backups: z.union([z.boolean(), booleanText]).default(true),
  approvalTimeoutMs: z.coerce.number().int().nonnegative().default(DEFAULT_APPROVAL_TIMEOUT_MS),
  approvalFallback: z.enum(['approve', 'reject']).default('approve'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type RawConfig = z.input<typeof RawConfigSchema>;

/** Flag → field, for flags that take a value. */
const VALUE_FLAGS = {
  '--org-dir': 'orgDir',
  '--tasks-file': 'tasksFile',
  '--journal-dir': 'journalDir',
  '--active-section': 'activeSection',
  '--completed-section': 'completedSection',
  '--summary-section': 'summarySection',
  '--approval-timeout': 'approvalTimeoutMs',
  '--approval-fallback': 'approvalFallback',
  '--log-level': 'logLevel',
} as const satisfies Record<string, keyof RawConfig>;

/** Environment variable → field. */
const ENV_VARS = {
  ORG_DIR: 'orgDir',
  ORG_TASKS_FILE: 'tasksFile',
  JOURNAL_DIR: 'journalDir',
  ACTIVE_SECTION: 'activeSection',
  COMPLETED_SECTION: 'completedSection',
  // Older name of SUMMARY_SECTION; the newer one wins when both are set.
  HIGH_LEVEL_SECTION: 'summarySection',
  SUMMARY_SECTION: 'summarySection',
  ORG_BACKUPS: 'backups',
  APPROVAL_TIMEOUT_MS: 'approvalTimeoutMs',
  APPROVAL_FALLBACK: 'approvalFallback',
  LOG_LEVEL: 'logLevel',
} as const satisfies Record<string, keyof RawConfig>;

type RawValues = Partial<Record<keyof RawConfig, string | boolean>>;

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
export function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
export function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Consume the global configuration flags from argv, leaving everything else.
 */
export function takeConfigFlags(argv: string[]): RawValues {
  const values: RawValues = {};
  for (const [flag, field] of Object.entries(VALUE_FLAGS)) {
    const value = takeOption(argv, flag);
    if (value !== undefined) values[field] = value;
  }
  if (takeFlag(argv, '--no-backup')) values.backups = false;
  return values;
}

function envValues(env: NodeJS.ProcessEnv): RawValues {
  const values: RawValues = {};
  for (const [name, field] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') values[field] = value;
  }
  return values;
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

function expandPath(value: string, cwd: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return join(homeDir, value.slice(2));
  return isAbsolute(value) ? value : resolve(cwd, value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge flag values over environment values over defaults and validate.
 */
export function resolveConfig(flags: RawValues, options: ResolveConfigOptions = {}): OrgLedgerConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? homedir();

  const parsed = RawConfigSchema.safeParse({ ...envValues(env), ...flags });
  if (!parsed.success) throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  const raw = parsed.data;

  const orgDir = expandPath(raw.orgDir, cwd, homeDir);
  return {
    orgDir,
    tasksFile: raw.tasksFile
      ? expandPath(raw.tasksFile, cwd, homeDir)
      : join(orgDir, DEFAULT_TASKS_FILE_NAME),
    journalDir: raw.journalDir
      ? expandPath(raw.journalDir, cwd, homeDir)
      : join(orgDir, DEFAULT_JOURNAL_DIR_NAME),
    outline: {
      sections: {
        open: raw.activeSection,
        closed: raw.completedSection,
        summary: raw.summarySection,
      },
      keywords: { open: [...DEFAULT_OPEN_KEYWORDS], closed: [...DEFAULT_CLOSED_KEYWORDS] },
      slugPrefix: DEFAULT_SLUG_PREFIX,
    },
    backups: raw.backups,
    approvalTimeoutMs: raw.approvalTimeoutMs,
    approvalFallback: raw.approvalFallback,
    logLevel: raw.logLevel,
  };
}

/**
 * Parse the MCP server's argv into a config. Any argument left over is an error.
 */
export function loadConfigFromArgs(argv: string[], options: ResolveConfigOptions = {}): OrgLedgerConfig {
  const args = [...argv];
  const flags = takeConfigFlags(args);
  const unknown = args[0];
  if (unknown !== undefined) throw new Error(`Unknown argument: ${unknown}`);
  return resolveConfig(flags, options);
}
