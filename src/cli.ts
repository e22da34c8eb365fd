#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * - Parse flags and environment into an `OrgLedgerConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { createLedgerContext } from './api.js';
import { loadConfigFromArgs } from './config.js';
import { createLogger } from './logger.js';
import { runStdioServer, SERVER_NAME, SERVER_VERSION } from './server.js';

function printHelp(): void {
  process.stdout.write(
    [
      `${SERVER_NAME}-mcp (stdio MCP server for an org task outline and journal)`,
      '',
      'Usage:',
      `  ${SERVER_NAME}-mcp [options]`,
      '',
      'Options (environment variable in brackets):',
      '  --org-dir <dir>              Org directory [ORG_DIR] (default: ~/org)',
      '  --tasks-file <file>          Task outline [ORG_TASKS_FILE] (default: <org-dir>/tasks.org)',
      '  --journal-dir <dir>          Journal directory [JOURNAL_DIR] (default: <org-dir>/journal)',
      '  --active-section <name>      Section of open entries [ACTIVE_SECTION] (default: Tasks)',
      '  --completed-section <name>   Section of closed entries [COMPLETED_SECTION] (default: Completed Tasks)',
      '  --summary-section <name>     Summary checklist section [SUMMARY_SECTION or HIGH_LEVEL_SECTION]',
      '  --no-backup                  Do not write .bak files [ORG_BACKUPS=false]',
      '  --approval-timeout <ms>      Approval timeout [APPROVAL_TIMEOUT_MS] (default: 300000)',
      '  --approval-fallback <mode>   approve|reject on timeout [APPROVAL_FALLBACK] (default: approve)',
      '  --log-level <level>          Log level on stderr [LOG_LEVEL] (default: info)',
      '  --help                       Show help',
      '  --version                    Show version',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`${SERVER_NAME}-mcp ${SERVER_VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv);
  const logger = createLogger(config.logLevel);
  await runStdioServer(createLedgerContext(config, { logger }));
}

await main();
