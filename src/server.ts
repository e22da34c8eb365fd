import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod';
import {
  createJournalEntry,
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
import { errorMessage } from './errors.js';
import type { JournalLocator } from './journal/model.js';

export const SERVER_NAME = 'org-ledger';
export const SERVER_VERSION = '0.1.0';

const linkSchema = z.object({ url: z.string(), label: z.string().optional() });

const journalLocatorShape = {
  date: z.string().optional().describe('YYYY-MM-DD; defaults to today'),
  time: z.string().optional().describe('Exact entry time, HH:MM'),
  headline: z.string().optional().describe('Case-insensitive headline substring'),
  line: z.number().int().positive().optional().describe('Heading line number from journal.list'),
};

const journalPatchShape = {
  newTime: z.string().optional(),
  newHeadline: z.string().optional(),
  details: z.string().optional(),
  tags: z.array(z.string()).optional(),
  ticket: z.string().nullable().optional(),
  link: linkSchema.nullable().optional(),
};

function journalLocator(args: { time?: string; headline?: string; line?: number }): JournalLocator {
  if (args.line !== undefined) return { line: args.line };
  if (args.time !== undefined) return { time: args.time };
  if (args.headline !== undefined) return { headline: args.headline };
  throw new Error('Provide one of time, headline or line');
}

/**
 * Serve a handler's result as JSON text plus structured content. Failures
 * become tool errors whose text starts with the error code.
 */
async function runTool<T extends Record<string, unknown>>(
  ctx: LedgerContext,
  tool: string,
  fn: () => Promise<T>
): Promise<CallToolResult> {
  try {
    const value = await fn();
    return {
      content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
      structuredContent: value,
    };
  } catch (error) {
    ctx.logger.warn({ tool, error: errorMessage(error) }, 'tool failed');
    return { content: [{ type: 'text', text: errorMessage(error) }], isError: true };
  }
}

function jsonResource(uri: URL, value: unknown): ReadResourceResult {
  return { contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }] };
}

/**
 * Read-only JSON resources: the entries of the open and closed sections and
 * today's journal entries.
 */
function registerResources(server: McpServer, ctx: LedgerContext): void {
  const { sections } = ctx.config.outline;

  server.registerResource(
    'tasks-active',
    'org://tasks/active',
    { title: 'Active tasks', description: `Entries of the "${sections.open}" section`, mimeType: 'application/json' },
    async (uri) => jsonResource(uri, (await listTasks(ctx, { section: sections.open })).tasks)
  );

  server.registerResource(
    'tasks-completed',
    'org://tasks/completed',
    { title: 'Completed tasks', description: `Entries of the "${sections.closed}" section`, mimeType: 'application/json' },
    async (uri) => jsonResource(uri, (await listTasks(ctx, { section: sections.closed })).tasks)
  );

  server.registerResource(
    'journal-today',
    'org://journal/today',
    { title: "Today's journal", description: 'Journal entries for today', mimeType: 'application/json' },
    async (uri) => jsonResource(uri, (await listJournalEntries(ctx)).entries)
  );
}

/**
 * Create an MCP server instance and register all tools and resources.
 *
 * Tool naming convention:
 * - `task.*` operates on entries of the task outline.
 * - `journal.*` operates on day files of the journal.
 * - `doc.*` checks the task outline as a whole.
 */
export function createMcpServer(ctx: LedgerContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const { sections } = ctx.config.outline;

  server.registerTool(
    'task.list',
    {
      title: 'List tasks',
      description: `List entries of the "${sections.open}" and "${sections.closed}" sections, or of one section.`,
      inputSchema: {
        section: z.string().optional(),
        status: z.enum(['open', 'closed']).optional(),
      },
    },
    async ({ section, status }) => runTool(ctx, 'task.list', () => listTasks(ctx, { section, status }))
  );

  server.registerTool(
    'task.get',
    {
      title: 'Get a task',
      description:
        'Get one entry with its full text. The identifier is a slug (task-gh-28), a slug without the task- prefix (gh-28), a ticket (GH-28) or a headline substring.',
      inputSchema: { identifier: z.string() },
    },
    async ({ identifier }) => runTool(ctx, 'task.get', () => getTask(ctx, { identifier }))
  );

  server.registerTool(
    'task.search',
    {
      title: 'Search tasks',
      description: 'Case-insensitive search over headlines, or over whole entries with full=true.',
      inputSchema: {
        query: z.string(),
        full: z.boolean().optional(),
        limit: z.number().int().positive().optional(),
      },
    },
    async ({ query, full, limit }) => runTool(ctx, 'task.search', () => searchTasks(ctx, { query, full, limit }))
  );

  server.registerTool(
    'task.create',
    {
      title: 'Create a task',
      description: `Append an entry (org text starting with "** TODO headline") to a section. Without section, a TODO goes to "${sections.open}" and a DONE to "${sections.closed}". ID, CUSTOM_ID and timestamps are filled in.`,
      inputSchema: {
        entry: z.string(),
        section: z.string().optional(),
      },
    },
    async ({ entry, section }) => runTool(ctx, 'task.create', () => createTask(ctx, { entry, section }))
  );

  server.registerTool(
    'task.update',
    {
      title: 'Update a task',
      description:
        'Replace an entry with new org text. Changing TODO to DONE (or back) moves the entry to the matching section and sets (or clears) CLOSED.',
      inputSchema: {
        identifier: z.string(),
        entry: z.string(),
      },
    },
    async ({ identifier, entry }) => runTool(ctx, 'task.update', () => updateTask(ctx, { identifier, entry }))
  );

  server.registerTool(
    'task.preview',
    {
      title: 'Preview a task update',
      description: 'Show the diff task.update would produce, without writing.',
      inputSchema: {
        identifier: z.string(),
        entry: z.string(),
      },
    },
    async ({ identifier, entry }) =>
      runTool(ctx, 'task.preview', () => previewTaskUpdate(ctx, { identifier, entry }))
  );

  server.registerTool(
    'task.move',
    {
      title: 'Move a task',
      description: 'Move an entry between sections without changing its content, status or timestamps.',
      inputSchema: {
        identifier: z.string(),
        from: z.string(),
        to: z.string(),
      },
    },
    async ({ identifier, from, to }) => runTool(ctx, 'task.move', () => moveTask(ctx, { identifier, from, to }))
  );

  server.registerTool(
    'doc.validate',
    {
      title: 'Validate the task outline',
      description: 'Report parse errors and invariant violations (duplicate slugs, CLOSED mismatches, misplaced entries).',
      inputSchema: {},
    },
    async () => runTool(ctx, 'doc.validate', () => validateTasks(ctx))
  );

  server.registerTool(
    'journal.list',
    {
      title: 'List journal entries',
      description: 'List the entries of one day (default today).',
      inputSchema: { date: z.string().optional() },
    },
    async ({ date }) => runTool(ctx, 'journal.list', () => listJournalEntries(ctx, { date }))
  );

  server.registerTool(
    'journal.get',
    {
      title: 'Get a journal entry',
      description: 'Get one entry by time, headline substring or line number.',
      inputSchema: journalLocatorShape,
    },
    async ({ date, ...locator }) =>
      runTool(ctx, 'journal.get', () => getJournalEntry(ctx, { date, locator: journalLocator(locator) }))
  );

  server.registerTool(
    'journal.create',
    {
      title: 'Create a journal entry',
      description: 'Add "** HH:MM headline :tags:" to a day file, in time order. Time defaults to now, date to today.',
      inputSchema: {
        date: z.string().optional(),
        time: z.string().optional(),
        headline: z.string(),
        details: z.string().optional(),
        tags: z.array(z.string()).optional(),
        ticket: z.string().optional(),
        link: linkSchema.optional(),
      },
    },
    async (args) => runTool(ctx, 'journal.create', () => createJournalEntry(ctx, args))
  );

  server.registerTool(
    'journal.update',
    {
      title: 'Update a journal entry',
      description: 'Replace fields of one entry. Changing the time re-sorts it; null clears ticket or link.',
      inputSchema: { ...journalLocatorShape, ...journalPatchShape },
    },
    async ({ date, time, headline, line, newTime, newHeadline, ...patch }) =>
      runTool(ctx, 'journal.update', () =>
        updateJournalEntry(ctx, {
          date,
          locator: journalLocator({ time, headline, line }),
          patch: { ...patch, time: newTime, headline: newHeadline },
        })
      )
  );

  server.registerTool(
    'journal.preview',
    {
      title: 'Preview a journal update',
      description: 'Show the entry diff journal.update would produce, without writing.',
      inputSchema: { ...journalLocatorShape, ...journalPatchShape },
    },
    async ({ date, time, headline, line, newTime, newHeadline, ...patch }) =>
      runTool(ctx, 'journal.preview', () =>
        previewJournalUpdate(ctx, {
          date,
          locator: journalLocator({ time, headline, line }),
          patch: { ...patch, time: newTime, headline: newHeadline },
        })
      )
  );

  server.registerTool(
    'journal.search',
    {
      title: 'Search the journal',
      description: 'Case-insensitive search over headlines, details and tags of the last N days (default 30), newest first.',
      inputSchema: {
        query: z.string(),
        days: z.number().int().positive().optional(),
        limit: z.number().int().positive().optional(),
      },
    },
    async ({ query, days, limit }) =>
      runTool(ctx, 'journal.search', () => searchJournalEntries(ctx, { query, days, limit }))
  );

  registerResources(server, ctx);
  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 */
export async function runStdioServer(ctx: LedgerContext): Promise<void> {
  const server = createMcpServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  ctx.logger.info({ tasksFile: ctx.config.tasksFile, journalDir: ctx.config.journalDir }, 'server started');
}
