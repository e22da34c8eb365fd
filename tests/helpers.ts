import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { OrgLedgerConfig } from '../src/config.js';
import type { OutlineOptions } from '../src/outline/model.js';

export const OUTLINE_OPTIONS: OutlineOptions = {
  sections: { open: 'Tasks', closed: 'Completed Tasks', summary: 'High Level Tasks (in order)' },
  keywords: { open: ['TODO'], closed: ['DONE'] },
  slugPrefix: 'task-',
};

export const PARSE_OPTIONS = {
  keywords: OUTLINE_OPTIONS.keywords,
  summarySection: OUTLINE_OPTIONS.sections.summary,
};

/** Wednesday 2025-01-15 14:30 local time. */
export const FIXED_NOW = new Date(2025, 0, 15, 14, 30);

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

export function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `AAAAAAAA-0000-0000-0000-${String(next).padStart(12, '0')}`;
  };
}

export const SAMPLE_OUTLINE_LINES = [
  '#+TITLE: Tasks',
  '',
  '* High Level Tasks (in order) [1/2]',
  '- [ ] Add OAuth2 login',
  '- [X] Fix flaky build',
  '',
  '* Tasks',
  '** TODO GH-127 Add OAuth2 login :auth:',
  ':PROPERTIES:',
  ':ID:        11111111-1111-1111-1111-111111111111',
  ':CUSTOM_ID: task-gh-127',
  ':CREATED:   <2025-01-10 Fri 09:00>',
  ':MODIFIED:  [2025-01-10 Fri 09:00]',
  ':END:',
  '*** Description',
  'Support OAuth2 providers.',
  '*** Task items [1/3]',
  '- [X] Register app',
  '- [ ] Callback handler',
  '- [ ] Token refresh',
  '',
  '* Completed Tasks',
  '** DONE GH-98 Fix flaky build',
  ':PROPERTIES:',
  ':ID:        22222222-2222-2222-2222-222222222222',
  ':CUSTOM_ID: task-gh-98',
  ':CREATED:   <2025-01-05 Sun 10:00>',
  ':MODIFIED:  [2025-01-08 Wed 17:30]',
  ':CLOSED:    <2025-01-08 Wed 17:30>',
  ':END:',
];

export const SAMPLE_OUTLINE = `${SAMPLE_OUTLINE_LINES.join('\n')}\n`;

export const SAMPLE_JOURNAL = [
  '* 2025-01-15',
  '',
  '** 09:00 Standup :meeting:',
  'Discussed the release.',
  '',
  '** 16:00 GH-127 Review OAuth2 callback',
  '- token refresh still open',
  '',
].join('\n');

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'org-ledger-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testConfig(orgDir: string, overrides: Partial<OrgLedgerConfig> = {}): OrgLedgerConfig {
  return {
    orgDir,
    tasksFile: join(orgDir, 'tasks.org'),
    journalDir: join(orgDir, 'journal'),
    outline: OUTLINE_OPTIONS,
    backups: true,
    approvalTimeoutMs: 0,
    approvalFallback: 'approve',
    logLevel: 'silent',
    ...overrides,
  };
}
