import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * JSON logger on stderr. stdout carries the MCP transport and CLI output.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'org-ledger', level }, pino.destination(2));
}

export function createSilentLogger(): Logger {
  return pino({ name: 'org-ledger', level: 'silent' });
}
