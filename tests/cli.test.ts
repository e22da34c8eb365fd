import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSilentLogger } from '../src/logger.js';
import { runCli, type CliIo } from '../src/org-ledger.js';
import { SAMPLE_OUTLINE, fixedClock, makeTempDir, removeTempDir } from './helpers.js';

function sink(chunks: string[]): Writable {
  return new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
}

function captureIo(): { io: CliIo; stdout: () => string; stderr: () => string } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { stdout: sink(out), stderr: sink(err) },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
  await writeFile(join(dir, 'tasks.org'), SAMPLE_OUTLINE);
});

afterEach(async () => {
  await removeTempDir(dir);
});

async function run(args: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  const capture = captureIo();
  const code = await runCli(['--org-dir', dir, ...args], capture.io, {
    env: {},
    cwd: dir,
    now: fixedClock,
    logger: createSilentLogger(),
  });
  return { code, stdout: capture.stdout(), stderr: capture.stderr() };
}

describe('runCli', () => {
  it('prints help without arguments', async () => {
    const capture = captureIo();
    expect(await runCli([], capture.io, { env: {} })).toBe(0);
    expect(capture.stdout().split('\n')[0]).toBe('org-ledger: org task outline and journal CLI');
  });

  it('lists tasks as JSON', async () => {
    const result = await run(['task', 'list', '--status', 'open']);
    expect(result.code).toBe(0);
    const parsed: unknown = JSON.parse(result.stdout);
    expect(parsed).toMatchObject({ tasks: [{ slug: 'task-gh-127', section: 'Tasks' }] });
  });

  it('prints core errors with their code and no help', async () => {
    const result = await run(['task', 'get', 'nothing']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('NOT_FOUND: Task not found: "nothing" in Tasks, Completed Tasks\n');
    expect(result.stdout).toBe('');
  });

  it('prints usage errors followed by help', async () => {
    const result = await run(['frobnicate']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Unknown command: frobnicate\n\n');
    expect(result.stdout.split('\n')[0]).toBe('org-ledger: org task outline and journal CLI');
  });

  it('creates a task from an entry file', async () => {
    await writeFile(join(dir, 'entry.org'), '** TODO GH-300 Tidy the backlog\n');
    const result = await run(['--no-backup', 'task', 'create', '--entry-file', 'entry.org']);
    expect(result.code).toBe(0);
    expect(JSON.parse(result.stdout)).toMatchObject({ task: { slug: 'task-gh-300' }, written: true });
    expect(await readFile(join(dir, 'tasks.org'), 'utf8')).toContain('** TODO GH-300 Tidy the backlog\n');
  });

  it('adds a journal entry', async () => {
    const result = await run(['journal', 'create', '--headline', 'Release', '--time', '10:00', '--tags', 'ops,release']);
    expect(result.code).toBe(0);
    expect(await readFile(join(dir, 'journal', '20250115'), 'utf8')).toBe(
      '* 2025-01-15\n\n** 10:00 Release :ops:release:\n'
    );
  });

  it('clears a journal ticket by headline', async () => {
    await run(['journal', 'create', '--headline', 'Review', '--ticket', 'GH-1', '--time', '11:00']);
    const result = await run(['journal', 'update', 'review', '--clear-ticket']);
    expect(result.code).toBe(0);
    expect(await readFile(join(dir, 'journal', '20250115'), 'utf8')).toBe('* 2025-01-15\n\n** 11:00 Review\n');
  });

  it('exits 1 when validation finds errors', async () => {
    await writeFile(join(dir, 'tasks.org'), '* Tasks\n* Completed Tasks\n** DONE Unstamped\n');
    const result = await run(['doc', 'validate']);
    expect(result.code).toBe(1);
    expect(JSON.parse(result.stdout)).toMatchObject({
      errors: [{ code: 'CLOSED_TIMESTAMP_MISMATCH', line: 2 }],
    });
  });

  it('rejects unknown options', async () => {
    const result = await run(['task', 'list', '--colour']);
    expect(result.code).toBe(1);
    expect(result.stderr.split('\n')[0]).toBe('Unknown option: --colour');
  });
});
