import { describe, expect, it } from 'vitest';
import { AmbiguousMatchError, NotFoundError, ParseError } from '../src/errors.js';
import { createJournalEntry, findJournalEntry, updateJournalEntry } from '../src/journal/mutate.js';
import { emptyJournalDay, normalizeTime, parseJournalDay, serializeJournalDay } from '../src/journal/parse.js';
import { SAMPLE_JOURNAL } from './helpers.js';

function parseCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error.diagnostics[0]?.code;
    throw error;
  }
  return undefined;
}

describe('parseJournalDay', () => {
  it('parses the date heading and entries', () => {
    const day = parseJournalDay(SAMPLE_JOURNAL);
    expect(day.date).toBe('2025-01-15');
    expect(day.intro).toEqual(['']);
    expect(day.entries.map((e) => [e.time, e.ticket, e.headline, e.tags, e.trailingBlankLines])).toEqual([
      ['09:00', undefined, 'Standup', ['meeting'], 1],
      ['16:00', 'GH-127', 'Review OAuth2 callback', [], 0],
    ]);
    expect(day.entries[1]?.details).toEqual(['- token refresh still open']);
    expect(serializeJournalDay(day)).toBe(SAMPLE_JOURNAL);
  });

  it('parses a link after the ticket', () => {
    const day = parseJournalDay('* 2025-01-15\n** 10:15 GH-9 [[https://example.com/pr/9][PR 9]] Merge review\n');
    expect(day.entries[0]).toMatchObject({
      time: '10:15',
      ticket: 'GH-9',
      link: { url: 'https://example.com/pr/9', label: 'PR 9' },
      headline: 'Merge review',
    });
  });

  it('treats a blank file as an empty day when the date is known', () => {
    const day = parseJournalDay('', { date: '2025-02-01' });
    expect(day.entries).toEqual([]);
    expect(serializeJournalDay(day)).toBe('* 2025-02-01\n');
  });

  it('rejects malformed files', () => {
    expect(parseCode(() => parseJournalDay('** 09:00 No heading\n'))).toBe('MISSING_DATE_HEADING');
    expect(parseCode(() => parseJournalDay('* 2025-01-15\n* 2025-01-16\n'))).toBe('MULTIPLE_DATE_HEADINGS');
    expect(parseCode(() => parseJournalDay('* 2025-02-30\n'))).toBe('MALFORMED_DATE_HEADING');
    expect(parseCode(() => parseJournalDay('* 2025-01-15\n** lunch\n'))).toBe('MALFORMED_ENTRY');
  });

  it('normalizes times', () => {
    expect(normalizeTime('9:05')).toBe('09:05');
    expect(normalizeTime('24:00')).toBeUndefined();
    expect(normalizeTime('noon')).toBeUndefined();
  });
});

describe('createJournalEntry', () => {
  it('inserts in time order without touching other entries', () => {
    const { day, entry } = createJournalEntry(parseJournalDay(SAMPLE_JOURNAL), {
      time: '14:30',
      headline: 'Pairing on auth',
      tags: ['pairing', ':auth:'],
      details: 'Walked through the callback.\n',
    });
    expect(entry.trailingBlankLines).toBe(1);
    expect(serializeJournalDay(day)).toBe(
      [
        '* 2025-01-15',
        '',
        '** 09:00 Standup :meeting:',
        'Discussed the release.',
        '',
        '** 14:30 Pairing on auth :pairing:auth:',
        'Walked through the callback.',
        '',
        '** 16:00 GH-127 Review OAuth2 callback',
        '- token refresh still open',
        '',
      ].join('\n')
    );
  });

  it('appends after the last entry and puts equal times after existing ones', () => {
    const { day } = createJournalEntry(parseJournalDay(SAMPLE_JOURNAL), { time: '16:00', headline: 'Wrap up' });
    expect(day.entries.map((e) => e.headline)).toEqual(['Standup', 'Review OAuth2 callback', 'Wrap up']);
    expect(serializeJournalDay(day).endsWith('- token refresh still open\n\n** 16:00 Wrap up\n')).toBe(true);
  });

  it('separates the first entry of an empty day from the heading', () => {
    const { day } = createJournalEntry(emptyJournalDay('2025-02-01'), {
      time: '8:00',
      headline: 'Start',
      ticket: 'OPS-4',
      link: { url: 'https://example.com/runbook' },
    });
    expect(serializeJournalDay(day)).toBe('* 2025-02-01\n\n** 08:00 OPS-4 [[https://example.com/runbook]] Start\n');
  });

  it('rejects invalid input', () => {
    const day = parseJournalDay(SAMPLE_JOURNAL);
    expect(parseCode(() => createJournalEntry(day, { time: '25:00', headline: 'x' }))).toBe('INVALID_TIME');
    expect(parseCode(() => createJournalEntry(day, { time: '10:00', headline: 'two\nlines' }))).toBe('INVALID_FIELD');
    expect(parseCode(() => createJournalEntry(day, { time: '10:00', headline: 'x', tags: ['a b'] }))).toBe(
      'INVALID_TAG'
    );
  });

  it('rejects detail lines that would start a heading', () => {
    const day = parseJournalDay(SAMPLE_JOURNAL);
    expect(parseCode(() => createJournalEntry(day, { time: '10:00', headline: 'Plan', details: '* agenda' }))).toBe(
      'INVALID_FIELD'
    );
    expect(
      parseCode(() => createJournalEntry(day, { time: '10:00', headline: 'Plan', details: 'ok\n** 23:59 not an entry' }))
    ).toBe('INVALID_FIELD');
  });

  it('keeps deeper headings as detail lines', () => {
    const { day } = createJournalEntry(parseJournalDay(SAMPLE_JOURNAL), {
      time: '10:00',
      headline: 'Plan',
      details: '*** agenda\n- item',
    });
    const reparsed = parseJournalDay(serializeJournalDay(day));
    expect(reparsed.entries.map((e) => e.time)).toEqual(['09:00', '10:00', '16:00']);
    expect(reparsed.entries[1]?.details).toEqual(['*** agenda', '- item']);
  });

  it('rejects a headline that would read back as tags, a ticket or a link', () => {
    const day = emptyJournalDay('2025-01-15');
    for (const headline of ['Sync with team :urgent:', 'GH-5 follow-up', '[[https://example.test/doc]] notes']) {
      expect(parseCode(() => createJournalEntry(day, { time: '10:00', headline }))).toBe('INVALID_FIELD');
    }
    const { entry } = createJournalEntry(day, { time: '10:00', ticket: 'GH-1', headline: 'GH-5 follow-up' });
    expect(entry.headline).toBe('GH-5 follow-up');
  });
});

describe('findJournalEntry', () => {
  const day = parseJournalDay(SAMPLE_JOURNAL);

  it('finds by time, headline or line', () => {
    expect(findJournalEntry(day, '9:00').entry.headline).toBe('Standup');
    expect(findJournalEntry(day, 'oauth2').entry.time).toBe('16:00');
    expect(findJournalEntry(day, { line: 6 }).entry.time).toBe('16:00');
  });

  it('reports ambiguity and absence', () => {
    expect(() => findJournalEntry(day, { headline: 'u' })).toThrow(AmbiguousMatchError);
    expect(() => findJournalEntry(day, '11:00')).toThrow(
      new NotFoundError('Journal entry not found: "11:00" on 2025-01-15')
    );
  });
});

describe('updateJournalEntry', () => {
  it('edits in place when the time is unchanged', () => {
    const { day, previous } = updateJournalEntry(parseJournalDay(SAMPLE_JOURNAL), '09:00', {
      headline: 'Daily standup',
      tags: [],
    });
    expect(previous?.headline).toBe('Standup');
    expect(serializeJournalDay(day).split('\n').slice(2, 5)).toEqual([
      '** 09:00 Daily standup',
      'Discussed the release.',
      '',
    ]);
  });

  it('re-sorts an entry whose time changed', () => {
    const { day, entry } = updateJournalEntry(parseJournalDay(SAMPLE_JOURNAL), { time: '09:00' }, { time: '17:15' });
    expect(entry.time).toBe('17:15');
    expect(serializeJournalDay(day)).toBe(
      [
        '* 2025-01-15',
        '',
        '** 16:00 GH-127 Review OAuth2 callback',
        '- token refresh still open',
        '',
        '** 17:15 Standup :meeting:',
        'Discussed the release.',
        '',
      ].join('\n')
    );
  });

  it('rejects patches that would not read back', () => {
    const day = parseJournalDay(SAMPLE_JOURNAL);
    expect(parseCode(() => updateJournalEntry(day, '09:00', { details: '* agenda' }))).toBe('INVALID_FIELD');
    expect(parseCode(() => updateJournalEntry(day, '09:00', { headline: 'Standup :x:', tags: [] }))).toBe(
      'INVALID_FIELD'
    );
  });

  it('keeps entries in time order through mixed creates and updates', () => {
    let day = emptyJournalDay('2025-01-15');
    day = createJournalEntry(day, { time: '12:00', headline: 'Lunch' }).day;
    day = createJournalEntry(day, { time: '08:30', headline: 'Email' }).day;
    day = createJournalEntry(day, { time: '17:00', headline: 'Retro' }).day;
    day = updateJournalEntry(day, 'email', { time: '18:00' }).day;
    day = createJournalEntry(day, { time: '12:00', headline: 'Walk' }).day;
    day = updateJournalEntry(day, 'retro', { time: '07:45' }).day;

    const text = serializeJournalDay(day);
    expect(text).toBe(
      '* 2025-01-15\n\n** 07:45 Retro\n\n** 12:00 Lunch\n\n** 12:00 Walk\n\n** 18:00 Email\n'
    );
    const reparsed = parseJournalDay(text);
    expect(reparsed.entries.map((e) => [e.time, e.headline])).toEqual([
      ['07:45', 'Retro'],
      ['12:00', 'Lunch'],
      ['12:00', 'Walk'],
      ['18:00', 'Email'],
    ]);
    expect(serializeJournalDay(reparsed)).toBe(text);
  });

  it('reports the position of the changed entry', () => {
    const result = updateJournalEntry(parseJournalDay(SAMPLE_JOURNAL), '09:00', { time: '17:15' });
    expect(result.index).toBe(1);
    expect(result.day.entries[result.index]?.headline).toBe('Standup');
  });

  it('clears the ticket with null', () => {
    const { entry } = updateJournalEntry(parseJournalDay(SAMPLE_JOURNAL), '16:00', { ticket: null });
    expect(entry.ticket).toBeUndefined();
    expect(entry.headline).toBe('Review OAuth2 callback');
  });
});
