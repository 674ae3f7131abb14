import { reconciliationFailed } from '../errors.js';
import { mergeSummaries, sameSummary } from './summary.js';
import type { ChangeSummary, MasterRow, MasterTable, RowChange, StudentSummary } from './types.js';

export type ReconcileResult = {
  master: MasterRow[];
  summary: ChangeSummary;
  changes: Map<string, RowChange>;
};

function assertMasterIntegrity(master: MasterTable): Map<string, number> {
  const positions = new Map<string, number>();
  master.forEach((row, index) => {
    if (positions.has(row.studentCode)) {
      throw reconciliationFailed(`duplicate student code ${row.studentCode} in master table`, {
        studentCode: row.studentCode,
        positions: [positions.get(row.studentCode), index],
      });
    }
    if (row.sessionCount !== row.sessionFacts.length) {
      throw reconciliationFailed(`master row ${row.studentCode} has ${row.sessionCount} sessions but retains ${row.sessionFacts.length} facts`, {
        studentCode: row.studentCode,
      });
    }
    positions.set(row.studentCode, index);
  });
  return positions;
}

function collectIncoming(incoming: Iterable<StudentSummary>): StudentSummary[] {
  const seen = new Set<string>();
  const summaries: StudentSummary[] = [];
  for (const summary of incoming) {
    if (seen.has(summary.studentCode)) {
      throw reconciliationFailed(`duplicate student code ${summary.studentCode} in incoming batch`, {
        studentCode: summary.studentCode,
      });
    }
    seen.add(summary.studentCode);
    summaries.push(summary);
  }
  return summaries;
}

/**
 * Upserts aggregated summaries into the master table. Returns a new table;
 * rows without material change keep their original object, and existing rows
 * never move.
 */
export function reconcile(master: MasterTable, incoming: Iterable<StudentSummary>): ReconcileResult {
  const positions = assertMasterIntegrity(master);
  const batch = collectIncoming(incoming);

  const next = [...master];
  const changes = new Map<string, RowChange>();
  const summary: ChangeSummary = { appended: 0, updated: 0, unchanged: 0, errors: [] };

  for (const candidate of batch) {
    const position = positions.get(candidate.studentCode);
    if (position === undefined) {
      positions.set(candidate.studentCode, next.length);
      next.push(candidate);
      changes.set(candidate.studentCode, 'appended');
      summary.appended += 1;
      continue;
    }

    const existing = next[position];
    const merged = mergeSummaries(existing, candidate);
    if (sameSummary(existing, merged)) {
      changes.set(candidate.studentCode, 'unchanged');
      summary.unchanged += 1;
    } else {
      next[position] = merged;
      changes.set(candidate.studentCode, 'updated');
      summary.updated += 1;
    }
  }

  return { master: next, summary, changes };
}
