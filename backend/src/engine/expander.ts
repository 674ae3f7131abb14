import { MalformedExtractError, malformed } from '../errors.js';
import { parseFactDate } from './dates.js';
import type { ExtractFormat } from './extract-format.js';
import type { GoalStatus, NormalizedRecord, RawExtractRow, RowError } from './types.js';

type PendingGoal = {
  number: number;
  goalType: string;
  status: GoalStatus | null;
  flags: Set<string>;
  date: string | null;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function numberedKey(base: string, optional: boolean): RegExp {
  const suffix = optional ? '(?:\\s+(\\d+))?' : '\\s+(\\d+)';
  return new RegExp(`^${escapeRegExp(base)}${suffix}$`, 'i');
}

export function categorizeGoal(goalType: string, format: ExtractFormat): string {
  const lowered = goalType.toLowerCase();
  for (const category of format.goalCategories) {
    if (category.keywords.some((keyword) => lowered.includes(keyword.toLowerCase()))) {
      return category.name;
    }
  }
  return lowered.replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'unspecified';
}

/**
 * Expands one extract row into its atomic facts. Throws
 * MalformedExtractError without emitting anything when any part of the row
 * breaks the packing convention.
 */
export function expandRow(row: RawExtractRow, format: ExtractFormat): NormalizedRecord[] {
  const studentCode = row.studentCode.trim();
  if (!studentCode) {
    throw malformed(row.rowId, 'missing student code');
  }

  let rowDate: string | null = null;
  if (row.occurredAt != null && row.occurredAt.trim()) {
    rowDate = parseFactDate(row.occurredAt, format.dateFormats);
    if (!rowDate) {
      throw malformed(row.rowId, `unparseable timestamp "${row.occurredAt.trim()}"`);
    }
  }

  const identity = row.passthrough;
  const records: NormalizedRecord[] = [];

  const category = row.category?.trim();
  if (format.sessionCategory && category === format.sessionCategory) {
    if (!rowDate) {
      throw malformed(row.rowId, `${category} entry has no occurred date`);
    }
    records.push({
      factType: 'session',
      studentCode,
      date: rowDate,
      value: row.entryId?.trim() || category,
      identity,
    });
  }

  if (format.planCategory && category === format.planCategory) {
    if (!rowDate) {
      throw malformed(row.rowId, `${category} entry has no occurred date`);
    }
    records.push({ factType: 'plan', studentCode, date: rowDate, identity });
  }

  const text = row.compiledField?.trim();
  if (!text) {
    return records;
  }

  const goalPattern = numberedKey(format.goalKey, false);
  const sessionPattern = numberedKey(format.sessionKey, true);
  const flagStatuses = new Map(format.statusFlags.map((flag) => [flag.key.toLowerCase(), flag.status]));
  const truthy = new Set(format.truthyValues.map((value) => value.toLowerCase()));
  const seenGoals = new Set<number>();
  let current: PendingGoal | null = null;

  const flush = () => {
    if (!current) return;
    const goal = current;
    current = null;
    const date = goal.date ?? rowDate;
    if (!date) {
      throw malformed(row.rowId, `${format.goalKey} ${goal.number} has no date`);
    }
    const flagged = format.statusFlags.find((flag) => goal.flags.has(flag.key.toLowerCase()));
    records.push({
      factType: 'goal',
      studentCode,
      date,
      category: categorizeGoal(goal.goalType, format),
      goalType: goal.goalType,
      status: goal.status ?? flagged?.status ?? 'active',
      identity,
    });
  };

  const items = text.split(format.delimiter);
  items.forEach((item, index) => {
    const trimmed = item.trim();
    if (!trimmed) return;

    const separatorAt = trimmed.indexOf(format.keyValueSeparator);
    // Free text ahead of the first goal is a note on the entry itself.
    if (separatorAt < 0 && !current) return;
    if (separatorAt < 0) {
      throw malformed(row.rowId, `item ${index + 1} has no "${format.keyValueSeparator}" separator`, { item: trimmed });
    }
    const key = trimmed.slice(0, separatorAt).trim();
    const value = trimmed.slice(separatorAt + format.keyValueSeparator.length).trim();
    if (!key) {
      throw malformed(row.rowId, `item ${index + 1} has an empty key`, { item: trimmed });
    }

    const goalMatch = goalPattern.exec(key);
    if (goalMatch) {
      flush();
      const number = Number(goalMatch[1]);
      if (seenGoals.has(number)) {
        throw malformed(row.rowId, `${format.goalKey} ${number} appears more than once`);
      }
      if (!value) {
        throw malformed(row.rowId, `${format.goalKey} ${number} has no type`);
      }
      seenGoals.add(number);
      current = { number, goalType: value, status: null, flags: new Set(), date: null };
      return;
    }

    if (sessionPattern.test(key)) {
      flush();
      const labelAt = value.indexOf(format.labelSeparator);
      const datePart = labelAt < 0 ? value : value.slice(0, labelAt);
      const label = labelAt < 0 ? '' : value.slice(labelAt + format.labelSeparator.length).trim();
      const date = parseFactDate(datePart, format.dateFormats);
      if (!date) {
        throw malformed(row.rowId, `${key} has unparseable date "${datePart.trim()}"`);
      }
      records.push({
        factType: 'session',
        studentCode,
        date,
        value: label || format.defaultSessionValue,
        identity,
      });
      return;
    }

    // Details ahead of the first goal describe the entry itself.
    if (!current) return;

    const lowered = key.toLowerCase();
    if (lowered === format.goalStatusKey.toLowerCase()) {
      const status = format.statusAliases[value.toLowerCase()];
      if (!status) {
        throw malformed(row.rowId, `${format.goalKey} ${current.number} has unknown status "${value}"`);
      }
      current.status = status;
    } else if (lowered === format.goalDateKey.toLowerCase()) {
      const date = parseFactDate(value, format.dateFormats);
      if (!date) {
        throw malformed(row.rowId, `${format.goalKey} ${current.number} has unparseable date "${value}"`);
      }
      current.date = date;
    } else if (flagStatuses.has(lowered) && truthy.has(value.toLowerCase())) {
      current.flags.add(lowered);
    }
  });
  flush();

  return records;
}

/**
 * Lazy, restartable view over an in-memory extract batch. Each iteration
 * re-expands every row and rebuilds `errors`.
 */
export class ExpandedExtract implements Iterable<NormalizedRecord> {
  private readonly rowErrors: RowError[] = [];

  constructor(
    private readonly rows: readonly RawExtractRow[],
    private readonly format: ExtractFormat
  ) {}

  get errors(): RowError[] {
    return [...this.rowErrors];
  }

  *[Symbol.iterator](): Iterator<NormalizedRecord> {
    this.rowErrors.length = 0;
    for (const row of this.rows) {
      let records: NormalizedRecord[];
      try {
        records = expandRow(row, this.format);
      } catch (error) {
        if (!(error instanceof MalformedExtractError)) throw error;
        this.rowErrors.push({ rowId: error.rowId, studentCode: row.studentCode.trim(), reason: error.message });
        continue;
      }
      yield* records;
    }
  }
}

export function expandExtract(rows: readonly RawExtractRow[], format: ExtractFormat): ExpandedExtract {
  return new ExpandedExtract(rows, format);
}
