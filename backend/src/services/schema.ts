import { query } from '../db.js';

async function ensureMasterTables(): Promise<void> {
  await query(`
    create table if not exists student_master (
      student_code text primary key,
      position integer not null unique,
      identity jsonb not null default '{}'::jsonb,
      session_count integer not null default 0 check (session_count >= 0),
      goal_status jsonb not null default '{}'::jsonb,
      last_seen_date date,
      updated_at timestamptz not null default now()
    )
  `);

  await query(`
    create table if not exists student_session_fact (
      student_code text not null references student_master(student_code) on delete cascade,
      fact_date date not null,
      fact_value text not null,
      primary key (student_code, fact_date, fact_value)
    )
  `);
}

async function ensureRunTables(): Promise<void> {
  await query(`
    create table if not exists audit_run (
      id uuid primary key default gen_random_uuid(),
      source_file text not null,
      dry_run boolean not null default false,
      status text not null default 'running' check (status in ('running','completed','failed')),
      started_at timestamptz not null default now(),
      finished_at timestamptz,
      summary jsonb,
      report_path text,
      error_message text
    )
  `);

  await query(`
    create table if not exists audit_run_log (
      id bigserial primary key,
      run_id uuid not null references audit_run(id) on delete cascade,
      level text not null default 'info',
      message text not null,
      created_at timestamptz not null default now()
    )
  `);

  await query(`create index if not exists idx_audit_run_status on audit_run(status)`);
  await query(`create index if not exists idx_audit_run_log_run on audit_run_log(run_id, created_at)`);
}

export async function ensureSchema(): Promise<void> {
  await query(`create extension if not exists pgcrypto`);
  await ensureMasterTables();
  await ensureRunTables();
}
