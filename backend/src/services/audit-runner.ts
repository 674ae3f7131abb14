import type { ExtractFormat } from '../engine/extract-format.js';
import { runPipeline, type PipelineStats } from '../engine/pipeline.js';
import type { ChangeSummary } from '../engine/types.js';
import { errorMessage } from '../errors.js';
import { loadExtract } from './extract-loader.js';
import type { MasterStore } from './master-store.js';
import type { LogLevel, RunLog } from './run-log.js';
import { writeRunArtifacts, type RunArtifacts } from './run-artifacts.js';

export type AuditDependencies = {
  store: MasterStore;
  runLog: RunLog;
  format: ExtractFormat;
  reportDir: string;
  now?: () => Date;
};

export type AuditRunOptions = {
  extractFile: string;
  dryRun?: boolean;
};

export type AuditRunReport = {
  runId: string;
  sourceFile: string;
  dryRun: boolean;
  summary: ChangeSummary;
  stats: PipelineStats;
  rowsWritten: number;
  artifacts: RunArtifacts | null;
};

/**
 * One audit pass: read the extract, reconcile it against the stored master
 * table, persist the result (unless dry-run) and write the run artifacts.
 * A failed run is recorded and rethrown; the stored master stays untouched.
 * Artifacts that cannot be written leave the run completed, with a warning.
 */
export async function runAudit(deps: AuditDependencies, options: AuditRunOptions): Promise<AuditRunReport> {
  const { store, runLog, format } = deps;
  const dryRun = options.dryRun ?? false;
  const now = deps.now ?? (() => new Date());
  const runId = await runLog.start(options.extractFile, dryRun);
  const log = (level: LogLevel, message: string) => runLog.append(runId, level, message);

  try {
    await log('info', `Reading extract ${options.extractFile}`);
    const rows = await loadExtract(options.extractFile, format);
    await log('info', `Loaded ${rows.length} extract rows`);

    const outcome = await store.transact(async (session) => {
      const master = await session.load();
      await log('info', `Reconciling against ${master.length} master rows`);
      const result = runPipeline(rows, master, format);
      if (!result.ok) {
        throw result.error;
      }
      const rowsWritten = dryRun ? 0 : await session.save(result.master, result.changes);
      return { ...result, rowsWritten };
    });

    for (const error of outcome.summary.errors) {
      await log('warn', `Skipped ${error.rowId} (${error.studentCode || 'no code'}): ${error.reason}`);
    }
    const { appended, updated, unchanged } = outcome.summary;
    await log(
      'info',
      `Appended ${appended}, updated ${updated}, unchanged ${unchanged}` +
        (dryRun ? ' (dry run, master not saved)' : `, ${outcome.rowsWritten} rows written`)
    );

    // The master is already committed here; an artifact failure only warns.
    let artifacts: RunArtifacts | null = null;
    let artifactFailure: string | null = null;
    try {
      artifacts = await writeRunArtifacts({
        dir: deps.reportDir,
        master: outcome.master,
        changes: outcome.changes,
        summary: outcome.summary,
        stats: outcome.stats,
        format,
        metadata: { runId, sourceFile: options.extractFile, dryRun, createdAt: now().toISOString() },
        now: now(),
      });
      await log('info', `Wrote run artifacts to ${artifacts.archive}`);
    } catch (error) {
      artifactFailure = `${dryRun ? 'Reconciled' : 'Master saved'}, but writing run artifacts failed: ${errorMessage(error)}`;
      await log('warn', artifactFailure);
    }

    await runLog.finish(runId, 'completed', {
      summary: outcome.summary,
      reportPath: artifacts?.reportCsv ?? null,
      errorMessage: artifactFailure,
    });

    return {
      runId,
      sourceFile: options.extractFile,
      dryRun,
      summary: outcome.summary,
      stats: outcome.stats,
      rowsWritten: outcome.rowsWritten,
      artifacts,
    };
  } catch (error) {
    const message = errorMessage(error);
    await log('error', message);
    await runLog.finish(runId, 'failed', { errorMessage: message });
    throw error;
  }
}
