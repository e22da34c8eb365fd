import { describe, expect, it } from 'vitest';
import { DuplicateSlugError, InvalidTransitionError, NotFoundError } from '../src/errors.js';
import { getProperty } from '../src/outline/entry.js';
import { OutlineMutator, generateSlug, slugify } from '../src/outline/mutate.js';
import { parseOutline } from '../src/outline/parse.js';
import { serializeOutline } from '../src/outline/serialize.js';
import { validateOutline } from '../src/outline/validate.js';
import { OUTLINE_OPTIONS, PARSE_OPTIONS, SAMPLE_OUTLINE, SAMPLE_OUTLINE_LINES, fixedClock, sequentialIds } from './helpers.js';

function newMutator(): OutlineMutator {
  return new OutlineMutator(OUTLINE_OPTIONS, { now: fixedClock, generateId: sequentialIds() });
}

const sample = () => parseOutline(SAMPLE_OUTLINE, PARSE_OPTIONS);

describe('slugs', () => {
  it('slugifies headlines', () => {
    expect(slugify('  Fix the Login -- Flow!  ')).toBe('fix-the-login-flow');
    expect(slugify('***')).toBe('');
  });

  it('prefers the ticket and adds a numeric suffix on collision', () => {
    const taken = new Set(['task-gh-5', 'task-gh-5-2']);
    expect(generateSlug({ title: 'GH-5 Ship', ticket: 'GH-5' }, 'task-', taken)).toBe('task-gh-5-3');
    expect(generateSlug({ title: 'Write docs', ticket: undefined }, 'task-', taken)).toBe('task-write-docs');
    expect(generateSlug({ title: '!!', ticket: undefined }, 'task-', taken)).toBe('task-entry');
  });
});

describe('OutlineMutator.create', () => {
  it('appends to the section, fills in managed properties and rebuilds the summary', () => {
    const result = newMutator().create(sample(), 'Tasks', '** TODO GH-200 Write docs\nSome body');

    expect(result.toSection).toBe('Tasks');
    expect(result.moved).toBe(false);
    expect(getProperty(result.entry, 'CUSTOM_ID')).toBe('task-gh-200');
    expect(serializeOutline(result.document)).toBe(
      [
        '#+TITLE: Tasks',
        '',
        '* High Level Tasks (in order) [1/3]',
        '- [ ] Add OAuth2 login',
        '- [ ] Write docs',
        '- [X] Fix flaky build',
        '',
        ...SAMPLE_OUTLINE_LINES.slice(6, 21),
        '** TODO GH-200 Write docs',
        ':PROPERTIES:',
        ':ID:        AAAAAAAA-0000-0000-0000-000000000001',
        ':CUSTOM_ID: task-gh-200',
        ':CREATED:   <2025-01-15 Wed 14:30>',
        ':MODIFIED:  [2025-01-15 Wed 14:30]',
        ':END:',
        'Some body',
        '',
        ...SAMPLE_OUTLINE_LINES.slice(21),
        '',
      ].join('\n')
    );
  });

  it('sets CLOSED on a closed entry', () => {
    const result = newMutator().create(sample(), 'Completed Tasks', '** DONE Old chore');
    expect(getProperty(result.entry, 'CLOSED')).toBe('<2025-01-15 Wed 14:30>');
    expect(getProperty(result.entry, 'CUSTOM_ID')).toBe('task-old-chore');
    expect(result.entry.trailingBlankLines).toBe(0);
  });

  it('rejects a section that does not match the status', () => {
    expect(() => newMutator().create(sample(), 'Completed Tasks', '** TODO Not yet')).toThrow(
      new InvalidTransitionError('A TODO entry belongs in "Tasks", not "Completed Tasks"')
    );
  });

  it('rejects a missing section', () => {
    expect(() => newMutator().create(sample(), 'Backlog', '** TODO Later')).toThrow(NotFoundError);
  });

  it('rejects a slug that is already taken', () => {
    const fragment = '** TODO Copy\n:PROPERTIES:\n:CUSTOM_ID: task-gh-98\n:END:';
    expect(() => newMutator().create(sample(), 'Tasks', fragment)).toThrow(DuplicateSlugError);
  });
});

describe('OutlineMutator.update', () => {
  const doneFragment = [
    '** DONE GH-127 Add OAuth2 login :auth:',
    '*** Task items [1/3]',
    '- [X] Register app',
    '- [X] Callback handler',
    '- [X] Token refresh',
  ].join('\n');

  it('moves a closed entry to the completed section and stamps CLOSED', () => {
    const result = newMutator().update(sample(), 'task-gh-127', doneFragment);

    expect(result.moved).toBe(true);
    expect(result.fromSection).toBe('Tasks');
    expect(result.toSection).toBe('Completed Tasks');
    expect(result.previous?.status).toBe('open');
    expect(serializeOutline(result.document)).toBe(
      [
        '#+TITLE: Tasks',
        '',
        '* High Level Tasks (in order) [2/2]',
        '- [X] Fix flaky build',
        '- [X] Add OAuth2 login',
        '',
        '* Tasks',
        '',
        ...SAMPLE_OUTLINE_LINES.slice(21),
        '',
        '** DONE GH-127 Add OAuth2 login :auth:',
        ':PROPERTIES:',
        ':ID:        11111111-1111-1111-1111-111111111111',
        ':CUSTOM_ID: task-gh-127',
        ':CREATED:   <2025-01-10 Fri 09:00>',
        ':MODIFIED:  [2025-01-15 Wed 14:30]',
        ':CLOSED:    <2025-01-15 Wed 14:30>',
        ':END:',
        '*** Task items [3/3]',
        '- [X] Register app',
        '- [X] Callback handler',
        '- [X] Token refresh',
        '',
      ].join('\n')
    );
  });

  it('edits in place when the status is unchanged', () => {
    const result = newMutator().update(sample(), 'GH-127', '** TODO GH-127 Add OAuth2 login :auth:security:');
    const lines = serializeOutline(result.document).split('\n');

    expect(result.moved).toBe(false);
    expect(lines.slice(7, 14)).toEqual([
      '** TODO GH-127 Add OAuth2 login :auth:security:',
      ':PROPERTIES:',
      ':ID:        11111111-1111-1111-1111-111111111111',
      ':CUSTOM_ID: task-gh-127',
      ':CREATED:   <2025-01-10 Fri 09:00>',
      ':MODIFIED:  [2025-01-15 Wed 14:30]',
      ':END:',
    ]);
    expect(lines[14]).toBe('');
    expect(lines[15]).toBe('* Completed Tasks');
    expect(getProperty(result.entry, 'CLOSED')).toBeUndefined();
  });

  it('keeps an existing CLOSED timestamp when a closed entry stays closed', () => {
    const result = newMutator().update(sample(), 'task-gh-98', '** DONE GH-98 Fix flaky build for good');
    expect(getProperty(result.entry, 'CLOSED')).toBe('<2025-01-08 Wed 17:30>');
    expect(getProperty(result.entry, 'MODIFIED')).toBe('[2025-01-15 Wed 14:30]');
  });

  it('advances MODIFIED even when the fragment equals the stored entry', () => {
    const stored = SAMPLE_OUTLINE_LINES.slice(22).join('\n');
    const result = newMutator().update(sample(), 'task-gh-98', stored);
    expect(result.moved).toBe(false);
    expect(serializeOutline(result.document)).toBe(
      [
        ...SAMPLE_OUTLINE_LINES.slice(0, 27),
        ':MODIFIED:  [2025-01-15 Wed 14:30]',
        ...SAMPLE_OUTLINE_LINES.slice(28),
        '',
      ].join('\n')
    );
  });

  it('clears CLOSED when an entry is reopened', () => {
    const result = newMutator().update(sample(), 'task-gh-98', '** TODO GH-98 Fix flaky build');
    expect(result.toSection).toBe('Tasks');
    expect(getProperty(result.entry, 'CLOSED')).toBeUndefined();
    expect(validateOutline(result.document, OUTLINE_OPTIONS).errors).toEqual([]);
  });

  it('rejects a slug change onto another entry', () => {
    const fragment = '** TODO GH-127 Add OAuth2 login\n:PROPERTIES:\n:CUSTOM_ID: task-gh-98\n:END:';
    expect(() => newMutator().update(sample(), 'task-gh-127', fragment)).toThrow(
      'Slug already in use: task-gh-98'
    );
  });
});

describe('OutlineMutator.move', () => {
  it('relocates an entry without touching its content', () => {
    const before = sample();
    const result = newMutator().move(before, 'task-gh-98', 'Completed Tasks', 'Tasks');

    expect(result.moved).toBe(true);
    expect(result.entry.source).toEqual(SAMPLE_OUTLINE_LINES.slice(22));
    expect(getProperty(result.entry, 'CLOSED')).toBe('<2025-01-08 Wed 17:30>');
    expect(serializeOutline(result.document)).toBe(
      [
        ...SAMPLE_OUTLINE_LINES.slice(0, 21),
        ...SAMPLE_OUTLINE_LINES.slice(22),
        '',
        '* Completed Tasks',
        '',
      ].join('\n')
    );
    expect(validateOutline(result.document, OUTLINE_OPTIONS).warnings.map((w) => w.code)).toEqual([
      'SECTION_STATUS_MISMATCH',
    ]);
  });

  it('is a no-op within the same section', () => {
    const before = sample();
    const result = newMutator().move(before, 'task-gh-127', 'Tasks', 'Tasks');
    expect(result.moved).toBe(false);
    expect(result.document).toBe(before);
  });

  it('requires the entry to be in the source section', () => {
    expect(() => newMutator().move(sample(), 'task-gh-127', 'Completed Tasks', 'Tasks')).toThrow(
      new InvalidTransitionError('"task-gh-127" is not in section "Completed Tasks"')
    );
  });

  it('rejects an unknown target section', () => {
    expect(() => newMutator().move(sample(), 'task-gh-127', 'Tasks', 'Someday')).toThrow(
      'Section not found: Someday'
    );
  });
});
