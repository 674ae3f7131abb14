import { describe, expect, it } from 'vitest';
import { ReconciliationError } from '../errors.js';
import { reconcile } from './reconciler.js';
import type { GoalState, IdentityFields, MasterRow, SessionFact } from './types.js';

function facts(...dates: string[]): SessionFact[] {
  return dates.map((date) => ({ date, value: 'session' }));
}

function summary(
  studentCode: string,
  options: {
    sessions?: SessionFact[];
    goals?: Record<string, GoalState>;
    lastSeenDate?: string | null;
    identity?: IdentityFields;
  } = {}
): MasterRow {
  const sessionFacts = options.sessions ?? [];
  return {
    studentCode,
    sessionCount: sessionFacts.length,
    sessionFacts,
    goals: options.goals ?? {},
    lastSeenDate: options.lastSeenDate ?? sessionFacts[sessionFacts.length - 1]?.date ?? null,
    identity: options.identity ?? { 'Student Name': `Student ${studentCode}` },
  };
}

describe('reconcile', () => {
  it('appends unseen students in batch order', () => {
    const result = reconcile([], [summary('S2', { sessions: facts('2025-01-06') }), summary('S1')]);

    expect(result.master.map((row) => row.studentCode)).toEqual(['S2', 'S1']);
    expect(result.summary).toEqual({ appended: 2, updated: 0, unchanged: 0, errors: [] });
    expect([...result.changes]).toEqual([
      ['S2', 'appended'],
      ['S1', 'appended'],
    ]);
  });

  it('updates rows in place and keeps everyone else where they were', () => {
    const a = summary('A', { sessions: facts('2025-01-06') });
    const b = summary('B', { sessions: facts('2025-01-06') });
    const c = summary('C', { sessions: facts('2025-01-06') });

    const result = reconcile([a, b, c], [summary('B', { sessions: facts('2025-01-13') }), summary('D')]);

    expect(result.master.map((row) => row.studentCode)).toEqual(['A', 'B', 'C', 'D']);
    expect(result.master[0]).toBe(a);
    expect(result.master[2]).toBe(c);
    expect(result.master[1]).toMatchObject({ sessionCount: 2, lastSeenDate: '2025-01-13' });
    expect(result.summary).toEqual({ appended: 1, updated: 1, unchanged: 0, errors: [] });
  });

  it('counts overlapping sessions once', () => {
    const existing = summary('S1', { sessions: facts('2025-01-06', '2025-01-13', '2025-01-20') });
    const incoming = summary('S1', { sessions: facts('2025-01-13', '2025-01-20', '2025-01-27') });

    const result = reconcile([existing], [incoming]);

    expect(result.master[0].sessionCount).toBe(4);
    expect(result.master[0].sessionFacts.map((fact) => fact.date)).toEqual([
      '2025-01-06',
      '2025-01-13',
      '2025-01-20',
      '2025-01-27',
    ]);
  });

  it('keeps the existing row object when nothing material changed', () => {
    const existing = summary('S1', {
      sessions: facts('2025-01-06', '2025-01-13'),
      goals: { reading: { status: 'met', date: '2025-02-01' } },
      lastSeenDate: '2025-02-01',
    });
    const older = summary('S1', {
      sessions: facts('2025-01-06'),
      goals: { reading: { status: 'active', date: '2025-01-01' } },
    });

    const result = reconcile([existing], [older]);

    expect(result.master[0]).toBe(existing);
    expect(result.summary).toEqual({ appended: 0, updated: 0, unchanged: 1, errors: [] });
    expect(result.changes.get('S1')).toBe('unchanged');
  });

  it('treats stored facts in another order as the same facts', () => {
    const existing = summary('S1', {
      sessions: [
        { date: '2025-01-06', value: 'm2' },
        { date: '2025-01-06', value: 'M3' },
      ],
    });
    const incoming = summary('S1', {
      sessions: [
        { date: '2025-01-06', value: 'M3' },
        { date: '2025-01-06', value: 'm2' },
      ],
    });

    const result = reconcile([existing], [incoming]);

    expect(result.master[0]).toBe(existing);
    expect(result.summary).toEqual({ appended: 0, updated: 0, unchanged: 1, errors: [] });
  });

  it('overlays identity fields from a more recent extract', () => {
    const existing = summary('S1', {
      sessions: facts('2025-01-10'),
      identity: { 'Year Level': '7', House: 'Red' },
    });
    const incoming = summary('S1', {
      sessions: facts('2025-02-01'),
      identity: { 'Year Level': '8', House: null },
    });

    const result = reconcile([existing], [incoming]);

    expect(result.master[0].identity).toEqual({ 'Year Level': '8', House: 'Red' });
    expect(result.changes.get('S1')).toBe('updated');
  });

  it('does not touch students missing from the batch', () => {
    const existing = summary('S1', { sessions: facts('2025-01-06') });
    const result = reconcile([existing], []);

    expect(result.master).toEqual([existing]);
    expect(result.summary).toEqual({ appended: 0, updated: 0, unchanged: 0, errors: [] });
  });

  it('never mutates the table it was given', () => {
    const existing = Object.freeze(summary('S1', { sessions: facts('2025-01-06') }));
    const master = Object.freeze([existing]);

    const result = reconcile(master, [summary('S1', { sessions: facts('2025-01-13') }), summary('S2')]);

    expect(master).toHaveLength(1);
    expect(master[0].sessionCount).toBe(1);
    expect(result.master).toHaveLength(2);
  });

  it('rejects a batch that repeats a student code', () => {
    expect(() => reconcile([], [summary('S1'), summary('S1')])).toThrow(ReconciliationError);
    expect(() => reconcile([], [summary('S1'), summary('S1')])).toThrow('duplicate student code S1 in incoming batch');
  });

  it('rejects a master table that repeats a student code', () => {
    expect(() => reconcile([summary('S1'), summary('S1')], [])).toThrow('duplicate student code S1 in master table');
  });

  it('rejects a master row whose count disagrees with its retained facts', () => {
    const corrupt = { ...summary('S1', { sessions: facts('2025-01-06') }), sessionCount: 5 };
    expect(() => reconcile([corrupt], [])).toThrow(ReconciliationError);
  });
});
