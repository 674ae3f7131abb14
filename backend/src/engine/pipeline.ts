import { ReconciliationError } from '../errors.js';
import { aggregate } from './aggregator.js';
import { expandExtract } from './expander.js';
import type { ExtractFormat } from './extract-format.js';
import { reconcile } from './reconciler.js';
import type {
  ChangeSummary,
  MasterRow,
  MasterTable,
  NormalizedRecord,
  RawExtractRow,
  RowChange,
  StudentSummary,
} from './types.js';

export type PipelineStats = {
  extractRows: number;
  records: number;
  students: number;
  masterRows: number;
};

export type PipelineSuccess = {
  ok: true;
  master: MasterRow[];
  summary: ChangeSummary;
  changes: Map<string, RowChange>;
  stats: PipelineStats;
};

export type PipelineFailure = {
  ok: false;
  error: ReconciliationError;
};

export type PipelineResult = PipelineSuccess | PipelineFailure;

export function runPipeline(
  rows: readonly RawExtractRow[],
  master: MasterTable,
  format: ExtractFormat
): PipelineResult {
  const expanded = expandExtract(rows, format);
  const records: NormalizedRecord[] = [...expanded];
  const errors = expanded.errors;

  const summaries = records.length ? aggregate(records) : new Map<string, StudentSummary>();

  try {
    const result = reconcile(master, summaries.values());
    return {
      ok: true,
      master: result.master,
      summary: { ...result.summary, errors },
      changes: result.changes,
      stats: {
        extractRows: rows.length,
        records: records.length,
        students: summaries.size,
        masterRows: result.master.length,
      },
    };
  } catch (error) {
    if (error instanceof ReconciliationError) {
      return { ok: false, error };
    }
    throw error;
  }
}
