import { query } from '../db.js';

export type LogLevel = 'info' | 'warn' | 'error';

export type RunOutcome = 'completed' | 'failed';

export type RunFinishFields = {
  summary?: unknown;
  reportPath?: string | null;
  errorMessage?: string | null;
};

export interface RunLog {
  start(sourceFile: string, dryRun: boolean): Promise<string>;
  append(runId: string, level: LogLevel, message: string): Promise<void>;
  finish(runId: string, status: RunOutcome, fields?: RunFinishFields): Promise<void>;
}

const CONSOLE: Record<LogLevel, (message: string) => void> = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export class PgRunLog implements RunLog {
  async start(sourceFile: string, dryRun: boolean): Promise<string> {
    const { rows } = await query<{ id: string }>(
      `insert into audit_run (source_file, dry_run, status) values ($1, $2, 'running') returning id`,
      [sourceFile, dryRun]
    );
    return rows[0].id;
  }

  async append(runId: string, level: LogLevel, message: string): Promise<void> {
    CONSOLE[level](`[audit] ${message}`);
    await query(`insert into audit_run_log (run_id, level, message) values ($1, $2, $3)`, [runId, level, message]);
  }

  async finish(runId: string, status: RunOutcome, fields: RunFinishFields = {}): Promise<void> {
    const columns: Record<string, unknown> = { finished_at: new Date().toISOString() };
    if (fields.summary !== undefined) columns.summary = JSON.stringify(fields.summary);
    if (fields.reportPath !== undefined) columns.report_path = fields.reportPath;
    if (fields.errorMessage !== undefined) columns.error_message = fields.errorMessage;

    const keys = Object.keys(columns);
    const sets = ['status = $2'];
    const values: unknown[] = [runId, status];
    keys.forEach((key, index) => {
      sets.push(`${key} = $${index + 3}`);
      values.push(columns[key]);
    });
    await query(`update audit_run set ${sets.join(', ')} where id = $1`, values);
  }
}
