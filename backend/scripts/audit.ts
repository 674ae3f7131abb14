#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { connect, disconnect } from '../src/db.js';
import { loadExtractFormat } from '../src/engine/extract-format.js';
import { runAudit } from '../src/services/audit-runner.js';
import { findLatestExtract } from '../src/services/extract-loader.js';
import { PgMasterStore } from '../src/services/master-store.js';
import { PgRunLog } from '../src/services/run-log.js';
import { ensureSchema } from '../src/services/schema.js';

const USAGE = 'Usage: iep-audit [extract-file] [--dry-run]';

async function main(argv: string[]): Promise<void> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE);
    return;
  }
  const dryRun = argv.includes('--dry-run');
  const unknown = argv.filter((arg) => arg.startsWith('-') && arg !== '--dry-run');
  if (unknown.length) {
    throw new Error(`unknown option ${unknown[0]}\n${USAGE}`);
  }
  const explicitFile = argv.find((arg) => !arg.startsWith('-'));

  const config = loadConfig();
  const format = await loadExtractFormat(config.extractFormatPath);
  const extractFile = explicitFile ?? (await findLatestExtract(config.extractDir, config.extractPattern));

  connect(config.db);
  try {
    await ensureSchema();
    const report = await runAudit(
      {
        store: new PgMasterStore(config.lockKey),
        runLog: new PgRunLog(),
        format,
        reportDir: config.reportDir,
      },
      { extractFile, dryRun }
    );
    console.log(JSON.stringify(report, null, 2));
  } finally {
    await disconnect();
  }
}

main(process.argv.slice(2)).catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
