import type { MasterRow, MasterTable, RowChange } from '../engine/types.js';
import type { MasterSession, MasterStore } from '../services/master-store.js';
import type { LogLevel, RunFinishFields, RunLog, RunOutcome } from '../services/run-log.js';

function cloneRows(rows: MasterTable): MasterRow[] {
  return rows.map((row) => structuredClone(row));
}

export class MemoryMasterStore implements MasterStore {
  rows: MasterRow[];
  saves = 0;

  constructor(rows: MasterTable = []) {
    this.rows = cloneRows(rows);
  }

  async transact<T>(fn: (session: MasterSession) => Promise<T>): Promise<T> {
    let staged = cloneRows(this.rows);
    const result = await fn({
      load: async () => cloneRows(staged),
      save: async (master: MasterTable, changes: ReadonlyMap<string, RowChange>) => {
        staged = cloneRows(master);
        this.saves += 1;
        return [...changes.values()].filter((change) => change !== 'unchanged').length;
      },
    });
    this.rows = staged;
    return result;
  }
}

export type MemoryRun = {
  id: string;
  sourceFile: string;
  dryRun: boolean;
  status: 'running' | RunOutcome;
  fields: RunFinishFields;
  logs: Array<{ level: LogLevel; message: string }>;
};

export class MemoryRunLog implements RunLog {
  readonly runs: MemoryRun[] = [];

  async start(sourceFile: string, dryRun: boolean): Promise<string> {
    const id = `run-${this.runs.length + 1}`;
    this.runs.push({ id, sourceFile, dryRun, status: 'running', fields: {}, logs: [] });
    return id;
  }

  async append(runId: string, level: LogLevel, message: string): Promise<void> {
    this.find(runId).logs.push({ level, message });
  }

  async finish(runId: string, status: RunOutcome, fields: RunFinishFields = {}): Promise<void> {
    const run = this.find(runId);
    run.status = status;
    run.fields = fields;
  }

  private find(runId: string): MemoryRun {
    const run = this.runs.find((candidate) => candidate.id === runId);
    if (!run) throw new Error(`unknown run ${runId}`);
    return run;
  }
}
