import { describe, expect, it } from 'vitest';
import { parseOutline } from '../src/outline/parse.js';
import { serializeOutline } from '../src/outline/serialize.js';
import { synchronizeSummary } from '../src/outline/summary.js';
import { validateOutline, validateOutlineText } from '../src/outline/validate.js';
import { OUTLINE_OPTIONS, PARSE_OPTIONS, SAMPLE_OUTLINE } from './helpers.js';

const { sections } = OUTLINE_OPTIONS;

describe('synchronizeSummary', () => {
  it('leaves an already synchronized summary unchanged', () => {
    const doc = parseOutline(SAMPLE_OUTLINE, PARSE_OPTIONS);
    expect(serializeOutline(synchronizeSummary(doc, sections))).toBe(SAMPLE_OUTLINE);
  });

  it('fills an empty summary and adds a cookie', () => {
    const text = [
      '* High Level Tasks (in order)',
      '',
      '* Tasks',
      '** TODO First',
      '** TODO Second',
      '* Completed Tasks',
      '** DONE GH-3 Third',
      '',
    ].join('\n');
    const once = synchronizeSummary(parseOutline(text, PARSE_OPTIONS), sections);
    const expected = [
      '* High Level Tasks (in order) [1/3]',
      '- [ ] First',
      '- [ ] Second',
      '- [X] Third',
      '',
      '* Tasks',
      '** TODO First',
      '** TODO Second',
      '* Completed Tasks',
      '** DONE GH-3 Third',
      '',
    ].join('\n');
    expect(serializeOutline(once)).toBe(expected);

    const twice = synchronizeSummary(parseOutline(expected, PARSE_OPTIONS), sections);
    expect(serializeOutline(twice)).toBe(expected);
  });

  it('copies the indentation of existing items', () => {
    const text = '* High Level Tasks (in order) [0/1]\n  + [ ] stale\n* Tasks\n** TODO Fresh\n* Completed Tasks\n';
    const doc = synchronizeSummary(parseOutline(text, PARSE_OPTIONS), sections);
    expect(serializeOutline(doc).split('\n').slice(0, 2)).toEqual([
      '* High Level Tasks (in order) [0/1]',
      '  + [ ] Fresh',
    ]);
  });

  it('keeps a paragraph after the summary list', () => {
    const text = [
      '* High Level Tasks (in order) [0/1]',
      '- [ ] Stale',
      '',
      'Ordered by priority.',
      '',
      '* Tasks',
      '** TODO Fresh',
      '* Completed Tasks',
      '',
    ].join('\n');
    const doc = parseOutline(text, PARSE_OPTIONS);
    expect(serializeOutline(doc)).toBe(text);
    expect(serializeOutline(synchronizeSummary(doc, sections))).toBe(text.replace('Stale', 'Fresh'));
  });

  it('does nothing without a summary section', () => {
    const doc = parseOutline('* Tasks\n** TODO Only\n', PARSE_OPTIONS);
    expect(synchronizeSummary(doc, sections)).toBe(doc);
  });
});

describe('validateOutline', () => {
  it('accepts the sample document', () => {
    const result = validateOutline(parseOutline(SAMPLE_OUTLINE, PARSE_OPTIONS), OUTLINE_OPTIONS);
    expect(result).toEqual({ errors: [], warnings: [] });
  });

  it('reports duplicate slugs, CLOSED mismatches and misplaced entries', () => {
    const text = [
      '* Tasks',
      '** TODO One',
      ':PROPERTIES:',
      ':CUSTOM_ID: task-same',
      ':CLOSED:   <2025-01-01 Wed 10:00>',
      ':END:',
      '** DONE Two',
      ':PROPERTIES:',
      ':CUSTOM_ID: task-same',
      ':END:',
      '* Completed Tasks',
      '',
    ].join('\n');
    const result = validateOutline(parseOutline(text, PARSE_OPTIONS), OUTLINE_OPTIONS);

    expect(result.errors.map((d) => [d.code, d.line])).toEqual([
      ['CLOSED_TIMESTAMP_MISMATCH', 1],
      ['DUPLICATE_SLUG', 6],
      ['CLOSED_TIMESTAMP_MISMATCH', 6],
    ]);
    expect(result.errors[1]?.message).toBe('Duplicate slug: task-same (first at line 2)');
    expect(result.warnings.map((d) => d.code)).toEqual(['MISSING_SECTION', 'SECTION_STATUS_MISMATCH']);
  });

  it('returns parse failures as errors', () => {
    const result = validateOutlineText('* Tasks\n*** Too deep\n', OUTLINE_OPTIONS);
    expect(result.errors.map((d) => d.code)).toEqual(['HEADING_NESTING']);
    expect(result.warnings).toEqual([]);
  });
});
