import type { PoolClient } from 'pg';
import { z } from 'zod';
import { query, withTransaction } from '../db.js';
import { compareFacts } from '../engine/summary.js';
import { GOAL_STATUSES } from '../engine/types.js';
import type { MasterRow, MasterTable, RowChange, SessionFact } from '../engine/types.js';
import { ConcurrentRunError, reconciliationFailed } from '../errors.js';

export interface MasterSession {
  load(): Promise<MasterRow[]>;
  /** Persists appended and updated rows; returns how many were written. */
  save(master: MasterTable, changes: ReadonlyMap<string, RowChange>): Promise<number>;
}

export interface MasterStore {
  /**
   * Runs `fn` with exclusive access to the master table. Nothing `fn` saved
   * survives if it throws.
   */
  transact<T>(fn: (session: MasterSession) => Promise<T>): Promise<T>;
}

const identitySchema = z.record(z.string().nullable());

const goalsSchema = z.record(
  z.object({
    status: z.enum(GOAL_STATUSES),
    date: z.string(),
  })
);

type MasterRecord = {
  student_code: string;
  identity: unknown;
  session_count: number;
  goal_status: unknown;
  last_seen_date: string | null;
};

type FactRecord = {
  student_code: string;
  fact_date: string;
  fact_value: string;
};

async function loadMaster(client: PoolClient): Promise<MasterRow[]> {
  const { rows } = await query<MasterRecord>(
    `select student_code, identity, session_count, goal_status,
            to_char(last_seen_date, 'YYYY-MM-DD') as last_seen_date
     from student_master
     order by position`,
    [],
    client
  );
  const factRows = await query<FactRecord>(
    `select student_code, to_char(fact_date, 'YYYY-MM-DD') as fact_date, fact_value
     from student_session_fact
     order by student_code, fact_date, fact_value`,
    [],
    client
  );

  const facts = new Map<string, SessionFact[]>();
  for (const row of factRows.rows) {
    const list = facts.get(row.student_code) ?? [];
    list.push({ date: row.fact_date, value: row.fact_value });
    facts.set(row.student_code, list);
  }

  for (const list of facts.values()) {
    list.sort(compareFacts);
  }

  return rows.map((row) => {
    const identity = identitySchema.safeParse(row.identity);
    const goals = goalsSchema.safeParse(row.goal_status);
    if (!identity.success || !goals.success) {
      throw reconciliationFailed(`stored master row ${row.student_code} is unreadable`, {
        identity: identity.success ? undefined : identity.error.flatten(),
        goals: goals.success ? undefined : goals.error.flatten(),
      });
    }
    return {
      studentCode: row.student_code,
      sessionCount: Number(row.session_count),
      sessionFacts: facts.get(row.student_code) ?? [],
      goals: goals.data,
      lastSeenDate: row.last_seen_date,
      identity: identity.data,
    };
  });
}

async function saveMaster(
  client: PoolClient,
  master: MasterTable,
  changes: ReadonlyMap<string, RowChange>
): Promise<number> {
  let written = 0;
  for (const row of master) {
    const change = changes.get(row.studentCode);
    if (change !== 'appended' && change !== 'updated') continue;

    await query(
      `insert into student_master (student_code, position, identity, session_count, goal_status, last_seen_date)
       values ($1, (select coalesce(max(position), -1) + 1 from student_master), $2::jsonb, $3, $4::jsonb, $5::date)
       on conflict (student_code) do update set
         identity = excluded.identity,
         session_count = excluded.session_count,
         goal_status = excluded.goal_status,
         last_seen_date = excluded.last_seen_date,
         updated_at = now()`,
      [row.studentCode, JSON.stringify(row.identity), row.sessionCount, JSON.stringify(row.goals), row.lastSeenDate],
      client
    );

    if (row.sessionFacts.length) {
      await query(
        `insert into student_session_fact (student_code, fact_date, fact_value)
         select $1, t.fact_date::date, t.fact_value
         from unnest($2::text[], $3::text[]) as t(fact_date, fact_value)
         on conflict do nothing`,
        [row.studentCode, row.sessionFacts.map((fact) => fact.date), row.sessionFacts.map((fact) => fact.value)],
        client
      );
    }
    written += 1;
  }
  return written;
}

export class PgMasterStore implements MasterStore {
  constructor(private readonly lockKey: number) {}

  async transact<T>(fn: (session: MasterSession) => Promise<T>): Promise<T> {
    return withTransaction(async (client) => {
      const { rows } = await query<{ locked: boolean }>(
        'select pg_try_advisory_xact_lock($1) as locked',
        [this.lockKey],
        client
      );
      if (!rows[0]?.locked) {
        throw new ConcurrentRunError();
      }
      return fn({
        load: () => loadMaster(client),
        save: (master, changes) => saveMaster(client, master, changes),
      });
    });
  }
}
