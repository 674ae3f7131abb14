import path from 'node:path';
import os from 'node:os';
import { promises as fsp, createWriteStream } from 'node:fs';
import archiver from 'archiver';
import type { ExtractFormat } from '../engine/extract-format.js';
import type { PipelineStats } from '../engine/pipeline.js';
import type { ChangeSummary, MasterRow, MasterTable, RowChange } from '../engine/types.js';
import { toCsvLine } from '../utils/csv.js';

const CHANGE_LABELS: Record<RowChange, string> = {
  appended: 'new',
  updated: 'updated',
  unchanged: '',
};

export type RunMetadata = {
  runId: string;
  sourceFile: string;
  dryRun: boolean;
  createdAt: string;
};

export type RunArtifacts = {
  masterCsv: string;
  batchCsv: string;
  reportCsv: string;
  archive: string;
};

export type RunArtifactsInput = {
  dir: string;
  master: MasterTable;
  changes: ReadonlyMap<string, RowChange>;
  summary: ChangeSummary;
  stats: PipelineStats;
  format: ExtractFormat;
  metadata: RunMetadata;
  now?: Date;
};

export function timestampSuffix(now: Date): string {
  return [
    now.getUTCFullYear(),
    String(now.getUTCMonth() + 1).padStart(2, '0'),
    String(now.getUTCDate()).padStart(2, '0'),
    String(now.getUTCHours()).padStart(2, '0'),
    String(now.getUTCMinutes()).padStart(2, '0'),
    String(now.getUTCSeconds()).padStart(2, '0'),
  ].join('-');
}

type GoalColumn = { name: string; label: string };

function goalColumns(master: MasterTable, format: ExtractFormat): GoalColumn[] {
  const configured = format.goalCategories.map((category) => ({
    name: category.name,
    label: category.label ?? category.name,
  }));
  const known = new Set(configured.map((category) => category.name));
  const extra = new Set<string>();
  for (const row of master) {
    for (const category of Object.keys(row.goals)) {
      if (!known.has(category)) extra.add(category);
    }
  }
  return [...configured, ...[...extra].sort().map((name) => ({ name, label: name }))];
}

function buildExport(
  rows: MasterTable,
  changes: ReadonlyMap<string, RowChange>,
  format: ExtractFormat,
  goals: GoalColumn[]
): string[] {
  const header = [
    format.columns.studentCode,
    ...format.columns.passthrough,
    'Session Count',
    ...goals.flatMap((goal) => [`Has ${goal.label} Goal`, `${goal.label} Goal Status`]),
    'Last Seen',
    'Change',
  ];

  const lines = [toCsvLine(header)];
  for (const row of rows) {
    const change = changes.get(row.studentCode);
    lines.push(
      toCsvLine([
        row.studentCode,
        ...format.columns.passthrough.map((name) => row.identity[name] ?? ''),
        row.sessionCount,
        ...goals.flatMap((goal) => {
          const state = row.goals[goal.name];
          return state ? ['true', state.status] : ['false', ''];
        }),
        row.lastSeenDate ?? '',
        change ? CHANGE_LABELS[change] : '',
      ])
    );
  }
  return lines;
}

export function buildMasterExport(
  master: MasterTable,
  changes: ReadonlyMap<string, RowChange>,
  format: ExtractFormat
): string[] {
  return buildExport(master, changes, format, goalColumns(master, format));
}

/**
 * The students this run touched, as merged into the master: most sessions
 * first, then by name (rows without a name last), then by code.
 */
export function buildBatchExport(
  master: MasterTable,
  changes: ReadonlyMap<string, RowChange>,
  format: ExtractFormat
): string[] {
  const nameColumn = format.columns.studentName;
  const nameOf = (row: MasterRow) => (nameColumn ? row.identity[nameColumn] || null : null);
  const batch = master
    .filter((row) => changes.has(row.studentCode))
    .sort((a, b) => {
      if (a.sessionCount !== b.sessionCount) return b.sessionCount - a.sessionCount;
      const nameA = nameOf(a);
      const nameB = nameOf(b);
      if (nameA !== nameB) {
        if (nameA === null) return 1;
        if (nameB === null) return -1;
        return nameA < nameB ? -1 : 1;
      }
      return a.studentCode < b.studentCode ? -1 : a.studentCode > b.studentCode ? 1 : 0;
    });
  return buildExport(batch, changes, format, goalColumns(batch, format));
}

export function buildReconciliationReport(summary: ChangeSummary, stats: PipelineStats): string[] {
  const lines = [toCsvLine(['metric', 'value', 'notes'])];
  lines.push(toCsvLine(['extract_rows', stats.extractRows, '']));
  lines.push(toCsvLine(['normalized_records', stats.records, '']));
  lines.push(toCsvLine(['students_in_batch', stats.students, '']));
  lines.push(toCsvLine(['appended', summary.appended, '']));
  lines.push(toCsvLine(['updated', summary.updated, '']));
  lines.push(toCsvLine(['unchanged', summary.unchanged, '']));
  lines.push(toCsvLine(['master_rows', stats.masterRows, '']));
  lines.push(toCsvLine(['errors', summary.errors.length, '']));
  for (const error of summary.errors) {
    const code = error.studentCode ? ` (${error.studentCode})` : '';
    lines.push(toCsvLine(['error', '', `${error.rowId}${code}: ${error.reason}`]));
  }
  return lines;
}

async function createZipArchive(
  sourceFiles: { path: string; name: string }[],
  extras: { content: string; name: string }[],
  destination: string
): Promise<void> {
  await fsp.mkdir(path.dirname(destination), { recursive: true });

  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(destination);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);

    for (const file of sourceFiles) {
      archive.file(file.path, { name: file.name });
    }
    for (const extra of extras) {
      archive.append(extra.content, { name: extra.name });
    }

    void archive.finalize();
  });
}

export async function writeRunArtifacts(input: RunArtifactsInput): Promise<RunArtifacts> {
  const suffix = timestampSuffix(input.now ?? new Date());
  await fsp.mkdir(input.dir, { recursive: true });

  const masterCsv = path.join(input.dir, `master_${suffix}.csv`);
  const batchCsv = path.join(input.dir, `parsed_${suffix}.csv`);
  const reportCsv = path.join(input.dir, `reconciliation_${suffix}.csv`);
  const archive = path.join(input.dir, `audit-run_${suffix}.zip`);

  await fsp.writeFile(masterCsv, buildMasterExport(input.master, input.changes, input.format).join(os.EOL), 'utf8');
  await fsp.writeFile(batchCsv, buildBatchExport(input.master, input.changes, input.format).join(os.EOL), 'utf8');
  await fsp.writeFile(reportCsv, buildReconciliationReport(input.summary, input.stats).join(os.EOL), 'utf8');

  await createZipArchive(
    [
      { path: masterCsv, name: path.basename(masterCsv) },
      { path: batchCsv, name: path.basename(batchCsv) },
      { path: reportCsv, name: path.basename(reportCsv) },
    ],
    [{ content: JSON.stringify({ ...input.metadata, summary: input.summary, stats: input.stats }, null, 2), name: 'run.json' }],
    archive
  );

  return { masterCsv, batchCsv, reportCsv, archive };
}
