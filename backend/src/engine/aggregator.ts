import { EmptyGroupError } from '../errors.js';
import { laterDate } from './dates.js';
import { compareFacts, factKey, pickGoalState } from './summary.js';
import type { GoalState, IdentityFields, NormalizedRecord, SessionFact, StudentSummary } from './types.js';

type StudentGroup = {
  sessions: Map<string, SessionFact>;
  goals: Map<string, GoalState>;
  lastSeenDate: string | null;
  identity: IdentityFields;
  identityDate: string;
};

/**
 * Groups normalized records by student code and derives one summary per
 * student, in first-seen order.
 */
export function aggregate(records: Iterable<NormalizedRecord>): Map<string, StudentSummary> {
  const groups = new Map<string, StudentGroup>();

  for (const record of records) {
    let group = groups.get(record.studentCode);
    if (!group) {
      group = {
        sessions: new Map(),
        goals: new Map(),
        lastSeenDate: null,
        identity: record.identity,
        identityDate: record.date,
      };
      groups.set(record.studentCode, group);
    }

    if (record.factType === 'session') {
      const fact = { date: record.date, value: record.value };
      group.sessions.set(factKey(fact), fact);
    } else if (record.factType === 'goal') {
      const state = { status: record.status, date: record.date };
      group.goals.set(record.category, pickGoalState(group.goals.get(record.category), state));
    }

    group.lastSeenDate = laterDate(group.lastSeenDate, record.date);
    if (record.date >= group.identityDate) {
      group.identity = record.identity;
      group.identityDate = record.date;
    }
  }

  if (!groups.size) {
    throw new EmptyGroupError();
  }

  const summaries = new Map<string, StudentSummary>();
  for (const [studentCode, group] of groups) {
    const sessionFacts = [...group.sessions.values()].sort(compareFacts);
    const goals: Record<string, GoalState> = {};
    for (const category of [...group.goals.keys()].sort()) {
      const state = group.goals.get(category);
      if (state) goals[category] = state;
    }
    summaries.set(studentCode, {
      studentCode,
      sessionCount: sessionFacts.length,
      sessionFacts,
      goals,
      lastSeenDate: group.lastSeenDate,
      identity: { ...group.identity },
    });
  }
  return summaries;
}
