import path from 'node:path';
import os from 'node:os';
import { promises as fsp, type Dirent } from 'node:fs';
import extract from 'extract-zip';
import type { ExtractFormat } from '../engine/extract-format.js';
import type { IdentityFields, RawExtractRow } from '../engine/types.js';
import { errorMessage, extractFormat } from '../errors.js';
import { parseCsvRecords } from '../utils/csv.js';

const EXTRACT_EXTENSIONS = ['.csv', '.zip'];

export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 'i');
}

async function readDirectoryRecursive(root: string): Promise<string[]> {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const resolved = path.join(root, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await readDirectoryRecursive(resolved)));
    } else {
      results.push(resolved);
    }
  }
  return results;
}

async function newest(files: string[]): Promise<string | null> {
  let best: { file: string; mtime: number } | null = null;
  for (const file of files) {
    const { mtimeMs } = await fsp.stat(file);
    if (!best || mtimeMs > best.mtime || (mtimeMs === best.mtime && file > best.file)) {
      best = { file, mtime: mtimeMs };
    }
  }
  return best?.file ?? null;
}

/**
 * Picks the most recently modified extract (CSV or zipped CSV) in `dir`
 * whose file name matches the glob `pattern`.
 */
export async function findLatestExtract(dir: string, pattern: string): Promise<string> {
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw extractFormat(`cannot read extract directory ${dir}`, { cause: errorMessage(error) });
  }

  const matcher = globToRegExp(pattern);
  const candidates = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => EXTRACT_EXTENSIONS.includes(path.extname(name).toLowerCase()))
    .filter((name) => matcher.test(name) || matcher.test(path.parse(name).name))
    .map((name) => path.join(dir, name));

  const latest = await newest(candidates);
  if (!latest) {
    throw extractFormat(`no extract matching ${pattern} in ${dir}`);
  }
  return latest;
}

export function readExtractRows(text: string, format: ExtractFormat): RawExtractRow[] {
  const records = parseCsvRecords(text);
  if (!records.length) return [];

  const header = records[0].cells.map((cell) => cell.trim());
  const columnIndex = new Map<string, number>();
  header.forEach((name, index) => {
    if (!columnIndex.has(name)) columnIndex.set(name, index);
  });

  const { columns } = format;
  const required = [columns.studentCode, columns.compiledField, columns.category, columns.occurredAt].filter(
    (name): name is string => name != null
  );
  const missing = required.filter((name) => !columnIndex.has(name));
  if (missing.length) {
    throw extractFormat(`extract is missing required columns: ${missing.join(', ')}`, { header });
  }

  const cell = (cells: string[], name: string | null): string | null => {
    if (name == null) return null;
    const index = columnIndex.get(name);
    if (index === undefined) return null;
    const value = cells[index]?.trim();
    return value ? value : null;
  };

  return records.slice(1).map(({ line, cells }) => {
    const passthrough: IdentityFields = {};
    for (const name of columns.passthrough) {
      passthrough[name] = cell(cells, name);
    }
    const entryId = cell(cells, columns.entryId);
    return {
      rowId: entryId ?? `line ${line}`,
      studentCode: cell(cells, columns.studentCode) ?? '',
      compiledField: cell(cells, columns.compiledField),
      category: cell(cells, columns.category),
      occurredAt: cell(cells, columns.occurredAt),
      entryId,
      passthrough,
    };
  });
}

async function readExtractText(filePath: string): Promise<string> {
  if (path.extname(filePath).toLowerCase() !== '.zip') {
    return fsp.readFile(filePath, 'utf8');
  }

  const tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'iep-extract-'));
  try {
    await extract(path.resolve(filePath), { dir: tmpDir });
    const csvFiles = (await readDirectoryRecursive(tmpDir)).filter(
      (file) => path.extname(file).toLowerCase() === '.csv'
    );
    const csvPath = await newest(csvFiles);
    if (!csvPath) {
      throw extractFormat(`archive ${path.basename(filePath)} contains no CSV extract`);
    }
    return await fsp.readFile(csvPath, 'utf8');
  } finally {
    await fsp.rm(tmpDir, { recursive: true, force: true });
  }
}

export async function loadExtract(filePath: string, format: ExtractFormat): Promise<RawExtractRow[]> {
  const text = await readExtractText(filePath);
  return readExtractRows(text, format);
}
