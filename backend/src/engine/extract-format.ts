import { promises as fsp } from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';
import { errorMessage, extractFormat } from '../errors.js';
import { GOAL_STATUSES } from './types.js';

const goalStatusSchema = z.enum(GOAL_STATUSES);

const nonEmpty = z.string().trim().min(1);

const columnsSchema = z
  .object({
    studentCode: nonEmpty.default('Display Code'),
    compiledField: nonEmpty.default('Details'),
    category: nonEmpty.nullable().default('ChronicleItemTypeTextbox'),
    occurredAt: nonEmpty.nullable().default('OccurredTimestamp'),
    entryId: nonEmpty.nullable().default('EntryId'),
    studentName: nonEmpty.nullable().default('Student Name'),
    passthrough: z.array(nonEmpty).default(['Student Name', 'Gender', 'Year Level', 'House']),
  })
  .default({});

const goalCategorySchema = z.object({
  name: nonEmpty,
  label: nonEmpty.optional(),
  keywords: z.array(nonEmpty).min(1),
});

const statusFlagSchema = z.object({
  key: nonEmpty,
  status: goalStatusSchema,
});

/**
 * Unpacking convention for the compiled `Details` column, plus the CSV
 * column mapping. Every field has a default, so `{}` is the convention the
 * school extract currently uses.
 */
export const extractFormatSchema = z.object({
  version: z.literal(1).default(1),
  delimiter: z.string().min(1).default('~'),
  keyValueSeparator: z.string().min(1).default(':'),
  labelSeparator: z.string().min(1).default('|'),
  dateFormats: z
    .array(nonEmpty)
    .default(['yyyy-MM-dd', 'd/M/yyyy h:mm:ss a', 'd/M/yyyy h:mm a', 'd/M/yyyy']),
  sessionCategory: nonEmpty.nullable().default('Compass Meetings'),
  planCategory: nonEmpty.nullable().default('Individual Education Plan (IEP)'),
  sessionKey: nonEmpty.default('Session'),
  defaultSessionValue: nonEmpty.default('session'),
  goalKey: nonEmpty.default('Goal'),
  goalStatusKey: nonEmpty.default('Status'),
  goalDateKey: nonEmpty.default('Date'),
  statusFlags: z.array(statusFlagSchema).default([
    { key: 'Green (goal achieved)', status: 'met' },
    { key: 'Yellow (progressing)', status: 'progressing' },
    { key: 'Red (no progress)', status: 'no_progress' },
  ]),
  truthyValues: z.array(nonEmpty).default(['true', 'yes', '1']),
  statusAliases: z.record(goalStatusSchema).default({
    active: 'active',
    'in progress': 'progressing',
    progressing: 'progressing',
    'no progress': 'no_progress',
    achieved: 'met',
    met: 'met',
    'n/a': 'not_applicable',
    'not applicable': 'not_applicable',
  }),
  goalCategories: z.array(goalCategorySchema).default([
    { name: 'numeracy', label: 'Numeracy', keywords: ['numeracy'] },
    { name: 'wellbeing', label: 'Wellbeing', keywords: ['wellbeing'] },
    { name: 'reading', label: 'Reading', keywords: ['reading', 'literacy'] },
  ]),
  columns: columnsSchema,
});

export type ExtractFormat = z.infer<typeof extractFormatSchema>;

export type GoalCategory = z.infer<typeof goalCategorySchema>;

export function parseExtractFormat(input: unknown): ExtractFormat {
  const parsed = extractFormatSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw extractFormat('invalid extract format', parsed.error.flatten());
  }
  return parsed.data;
}

export const DEFAULT_EXTRACT_FORMAT: ExtractFormat = parseExtractFormat({});

export async function loadExtractFormat(filePath: string): Promise<ExtractFormat> {
  let text: string;
  try {
    text = await fsp.readFile(filePath, 'utf8');
  } catch (error) {
    throw extractFormat(`cannot read extract format ${filePath}`, { cause: errorMessage(error) });
  }
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw extractFormat(`extract format ${filePath} is not valid YAML`, { cause: errorMessage(error) });
  }
  return parseExtractFormat(document);
}
