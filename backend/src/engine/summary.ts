import { laterDate } from './dates.js';
import type { GoalState, GoalStatus, IdentityFields, SessionFact, StudentSummary } from './types.js';

// Same-day ties: the most informative status wins.
const STATUS_PRECEDENCE: Record<GoalStatus, number> = {
  not_applicable: 0,
  active: 1,
  no_progress: 2,
  progressing: 3,
  met: 4,
};

export function pickGoalState(current: GoalState | undefined, candidate: GoalState): GoalState {
  if (!current) return candidate;
  if (candidate.date !== current.date) {
    return candidate.date > current.date ? candidate : current;
  }
  return STATUS_PRECEDENCE[candidate.status] > STATUS_PRECEDENCE[current.status] ? candidate : current;
}

export function factKey(fact: SessionFact): string {
  return JSON.stringify([fact.date, fact.value]);
}

export function compareFacts(a: SessionFact, b: SessionFact): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

export function unionFacts(...sets: ReadonlyArray<readonly SessionFact[]>): SessionFact[] {
  const byKey = new Map<string, SessionFact>();
  for (const facts of sets) {
    for (const fact of facts) {
      const key = factKey(fact);
      if (!byKey.has(key)) byKey.set(key, { date: fact.date, value: fact.value });
    }
  }
  return [...byKey.values()].sort(compareFacts);
}

export function mergeGoals(
  ...maps: ReadonlyArray<Readonly<Record<string, GoalState>>>
): Record<string, GoalState> {
  const merged = new Map<string, GoalState>();
  for (const goals of maps) {
    for (const [category, state] of Object.entries(goals)) {
      merged.set(category, pickGoalState(merged.get(category), state));
    }
  }
  const sorted: Record<string, GoalState> = {};
  for (const category of [...merged.keys()].sort()) {
    const state = merged.get(category);
    if (state) sorted[category] = { status: state.status, date: state.date };
  }
  return sorted;
}

export function goalStatusOf(summary: Pick<StudentSummary, 'goals'>): Record<string, GoalStatus> {
  return Object.fromEntries(Object.entries(summary.goals).map(([category, state]) => [category, state.status]));
}

/**
 * Identity fields from the more recent side win; fields the winner lacks or
 * leaves empty keep the other side's value.
 */
export function mergeIdentity(
  existing: IdentityFields,
  existingDate: string | null,
  incoming: IdentityFields,
  incomingDate: string | null
): IdentityFields {
  const incomingWins = laterDate(existingDate, incomingDate) === incomingDate;
  const [base, overlay] = incomingWins ? [existing, incoming] : [incoming, existing];
  const merged: IdentityFields = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value != null && value !== '') {
      merged[key] = value;
    } else if (!(key in merged)) {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeSummaries(existing: StudentSummary, incoming: StudentSummary): StudentSummary {
  const sessionFacts = unionFacts(existing.sessionFacts, incoming.sessionFacts);
  return {
    studentCode: existing.studentCode,
    sessionCount: sessionFacts.length,
    sessionFacts,
    goals: mergeGoals(existing.goals, incoming.goals),
    lastSeenDate: laterDate(existing.lastSeenDate, incoming.lastSeenDate),
    identity: mergeIdentity(existing.identity, existing.lastSeenDate, incoming.identity, incoming.lastSeenDate),
  };
}

function sameRecord<V>(
  a: Readonly<Record<string, V>>,
  b: Readonly<Record<string, V>>,
  same: (x: V, y: V) => boolean
): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => key in b && same(a[key], b[key]));
}

// Order-insensitive: stored facts may come back in the database's collation.
function sameFacts(a: readonly SessionFact[], b: readonly SessionFact[]): boolean {
  if (a.length !== b.length) return false;
  const keys = new Set(a.map(factKey));
  return keys.size === a.length && b.every((fact) => keys.has(factKey(fact)));
}

export function sameSummary(a: StudentSummary, b: StudentSummary): boolean {
  if (a.studentCode !== b.studentCode) return false;
  if (a.sessionCount !== b.sessionCount || a.lastSeenDate !== b.lastSeenDate) return false;
  if (!sameFacts(a.sessionFacts, b.sessionFacts)) return false;
  if (!sameRecord(a.goals, b.goals, (x, y) => x.status === y.status && x.date === y.date)) return false;
  return sameRecord(a.identity, b.identity, (x, y) => x === y);
}
