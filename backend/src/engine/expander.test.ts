import { describe, expect, it } from 'vitest';
import { MalformedExtractError } from '../errors.js';
import { categorizeGoal, expandExtract, expandRow } from './expander.js';
import { DEFAULT_EXTRACT_FORMAT, parseExtractFormat } from './extract-format.js';
import type { RawExtractRow } from './types.js';

const format = DEFAULT_EXTRACT_FORMAT;
const identity = { 'Student Name': 'Ada Example' };

function row(overrides: Partial<RawExtractRow> = {}): RawExtractRow {
  return {
    rowId: 'E1',
    studentCode: 'S1',
    compiledField: null,
    category: null,
    occurredAt: null,
    entryId: null,
    passthrough: identity,
    ...overrides,
  };
}

describe('expandRow', () => {
  it('turns a meeting entry into one session keyed by its entry id', () => {
    const records = expandRow(
      row({ category: 'Compass Meetings', occurredAt: '14/01/2025 9:30 AM', entryId: 'E100' }),
      format
    );

    expect(records).toEqual([
      { factType: 'session', studentCode: 'S1', date: '2025-01-14', value: 'E100', identity },
    ]);
  });

  it('falls back to the category when a meeting has no entry id', () => {
    const [record] = expandRow(row({ category: 'Compass Meetings', occurredAt: '2025-01-14' }), format);
    expect(record).toMatchObject({ factType: 'session', value: 'Compass Meetings' });
  });

  it('reads goals and traffic-light flags from an IEP details column', () => {
    const records = expandRow(
      row({
        category: 'Individual Education Plan (IEP)',
        occurredAt: '3/02/2025 10:15:00 AM',
        compiledField:
          'Plan reviewed: Yes~Goal 1: Numeracy - times tables~Time frame: Term 1~Green (goal achieved): False~' +
          'Yellow (progressing): True~Red (no progress): False~Goal 2: Wellbeing check-ins~Time frame: Term 2',
      }),
      format
    );

    expect(records).toEqual([
      { factType: 'plan', studentCode: 'S1', date: '2025-02-03', identity },
      {
        factType: 'goal',
        studentCode: 'S1',
        date: '2025-02-03',
        category: 'numeracy',
        goalType: 'Numeracy - times tables',
        status: 'progressing',
        identity,
      },
      {
        factType: 'goal',
        studentCode: 'S1',
        date: '2025-02-03',
        category: 'wellbeing',
        goalType: 'Wellbeing check-ins',
        status: 'active',
        identity,
      },
    ]);
  });

  it('keeps a meeting whose details are free text', () => {
    const records = expandRow(
      row({
        category: 'Compass Meetings',
        occurredAt: '14/01/2025 9:30 AM',
        entryId: 'E100',
        compiledField: 'Discussed reading plan with parents',
      }),
      format
    );

    expect(records).toEqual([
      { factType: 'session', studentCode: 'S1', date: '2025-01-14', value: 'E100', identity },
    ]);
  });

  it('records a plan entry that lists no goals', () => {
    const records = expandRow(
      row({
        category: 'Individual Education Plan (IEP)',
        occurredAt: '3/02/2025 10:15:00 AM',
        compiledField: 'Template: IEP Term 1~Time frame: Term 1',
      }),
      format
    );

    expect(records).toEqual([{ factType: 'plan', studentCode: 'S1', date: '2025-02-03', identity }]);
  });

  it('reads packed sessions, labels, explicit statuses and goal dates', () => {
    const records = expandRow(
      row({
        compiledField:
          'Session: 2025-01-06 | Check-in~Session 2: 2025-01-13~Goal 1: Reading fluency~Status: Met~Date: 2025-01-20',
      }),
      format
    );

    expect(records).toEqual([
      { factType: 'session', studentCode: 'S1', date: '2025-01-06', value: 'Check-in', identity },
      { factType: 'session', studentCode: 'S1', date: '2025-01-13', value: 'session', identity },
      {
        factType: 'goal',
        studentCode: 'S1',
        date: '2025-01-20',
        category: 'reading',
        goalType: 'Reading fluency',
        status: 'met',
        identity,
      },
    ]);
  });

  it('lets an explicit status override the flags', () => {
    const [record] = expandRow(
      row({ occurredAt: '2025-03-01', compiledField: 'Goal 1: Numeracy~Green (goal achieved): True~Status: N/A' }),
      format
    );
    expect(record).toMatchObject({ factType: 'goal', status: 'not_applicable', date: '2025-03-01' });
  });

  it('takes the first set flag in flag order', () => {
    const [record] = expandRow(
      row({
        occurredAt: '2025-03-01',
        compiledField: 'Goal 1: Numeracy~Red (no progress): yes~Green (goal achieved): TRUE',
      }),
      format
    );
    expect(record).toMatchObject({ status: 'met' });
  });

  it('ignores blank items left by trailing delimiters', () => {
    const records = expandRow(row({ compiledField: 'Session: 2025-01-06~ ~' }), format);
    expect(records).toHaveLength(1);
  });

  it('follows a custom delimiter', () => {
    const custom = parseExtractFormat({ delimiter: ';' });
    const records = expandRow(row({ compiledField: 'Session: 2025-01-06;Session: 2025-01-07' }), custom);
    expect(records.map((record) => record.date)).toEqual(['2025-01-06', '2025-01-07']);
  });

  it.each([
    [{ studentCode: '  ' }, 'missing student code'],
    [{ occurredAt: 'yesterday' }, 'unparseable timestamp "yesterday"'],
    [{ category: 'Compass Meetings' }, 'Compass Meetings entry has no occurred date'],
    [{ category: 'Individual Education Plan (IEP)' }, 'Individual Education Plan (IEP) entry has no occurred date'],
    [{ occurredAt: '2025-03-01', compiledField: 'Goal 1: Numeracy~broken item' }, 'item 2 has no ":" separator'],
    [{ compiledField: 'Goal 1: Numeracy' }, 'Goal 1 has no date'],
    [{ occurredAt: '2025-03-01', compiledField: 'Goal 1: Numeracy~Goal 1: Wellbeing' }, 'Goal 1 appears more than once'],
    [{ occurredAt: '2025-03-01', compiledField: 'Goal 1: Numeracy~Status: Maybe' }, 'Goal 1 has unknown status "Maybe"'],
    [{ occurredAt: '2025-03-01', compiledField: 'Goal 3:' }, 'Goal 3 has no type'],
    [{ compiledField: 'Session: soon' }, 'Session has unparseable date "soon"'],
    [{ compiledField: ': value' }, 'item 1 has an empty key'],
  ])('rejects %j', (overrides, message) => {
    const attempt = () => expandRow(row(overrides), format);
    expect(attempt).toThrow(MalformedExtractError);
    expect(attempt).toThrow(message);
  });
});

describe('categorizeGoal', () => {
  it('maps goal types onto configured categories by keyword', () => {
    expect(categorizeGoal('Literacy support', format)).toBe('reading');
    expect(categorizeGoal('NUMERACY: fractions', format)).toBe('numeracy');
  });

  it('derives a category from unmatched goal types', () => {
    expect(categorizeGoal('Social Skills & Play', format)).toBe('social_skills_play');
  });
});

describe('expandExtract', () => {
  const rows: RawExtractRow[] = [
    row({ rowId: 'E1', studentCode: 'S1', compiledField: 'Session: 2025-01-06' }),
    row({ rowId: 'E2', studentCode: 'S2', compiledField: 'Goal 1: Reading~oops' }),
    row({ rowId: 'E3', studentCode: 'S3', compiledField: 'Session: 2025-01-07' }),
  ];

  it('skips malformed rows and reports them', () => {
    const expanded = expandExtract(rows, format);
    const records = [...expanded];

    expect(records.map((record) => record.studentCode)).toEqual(['S1', 'S3']);
    expect(expanded.errors).toEqual([{ rowId: 'E2', studentCode: 'S2', reason: 'item 2 has no ":" separator' }]);
  });

  it('can be iterated again with the same outcome', () => {
    const expanded = expandExtract(rows, format);
    const first = [...expanded];
    const second = [...expanded];

    expect(second).toEqual(first);
    expect(expanded.errors).toHaveLength(1);
  });

  it('leaves the input rows untouched', () => {
    const before = structuredClone(rows);
    [...expandExtract(rows, format)];
    expect(rows).toEqual(before);
  });
});
