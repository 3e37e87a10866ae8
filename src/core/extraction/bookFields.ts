import { z } from 'zod';
import { ParseError } from '../../utils/errors.js';
import { extractJsonObject, repairJson } from './jsonRepair.js';

const NULL_MARKERS = new Set(['', 'none', 'null', 'n/a', 'unknown']);

/** Oracles sometimes spell "no value" as a string; fold those into null. */
const nullableText = z.preprocess((value) => {
  if (value === undefined) return null;
  if (typeof value === 'string' && NULL_MARKERS.has(value.trim().toLowerCase())) return null;
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) return value.join('; ');
  return value;
}, z.string().nullable());

export const bookFieldsSchema = z
  .object({
    Title: nullableText,
    Author: nullableText,
    Publisher: nullableText,
    Description: nullableText,
  })
  .passthrough();

export const subjectFieldsSchema = z.object({
  Subject: nullableText,
  SubjectSpecific: nullableText,
});

export type BookFields = z.infer<typeof bookFieldsSchema>;

/** Set by classification, configuration or the operator, never by extraction. */
export const WORKFLOW_OWNED_FIELDS: readonly string[] = [
  'id',
  'Subject',
  'SubjectSpecific',
  'Location',
  'ReadingStatus',
];

const OWNED_KEYS = new Set(WORKFLOW_OWNED_FIELDS.map((field) => field.toLowerCase()));

/**
 * Remove extraction keys that would land in a workflow-owned column. Matched
 * case-insensitively, like the column mapping.
 */
export function omitWorkflowFields(book: BookFields): { book: BookFields; removed: string[] } {
  const kept: BookFields = {
    Title: book.Title,
    Author: book.Author,
    Publisher: book.Publisher,
    Description: book.Description,
  };
  const removed: string[] = [];
  for (const [key, value] of Object.entries(book)) {
    if (key in kept) continue;
    if (OWNED_KEYS.has(key.toLowerCase())) {
      removed.push(key);
    } else {
      kept[key] = value;
    }
  }
  return { book: kept, removed };
}
export type SubjectFields = z.infer<typeof subjectFieldsSchema>;

/** Extract, repair and JSON-parse an oracle reply into a plain object. */
export function parseOracleJson(rawText: string): Record<string, unknown> {
  const repaired = repairJson(extractJsonObject(rawText));
  let parsed: unknown;
  try {
    parsed = JSON.parse(repaired);
  } catch (error) {
    throw new ParseError('Oracle reply is not valid JSON', rawText, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ParseError('Oracle reply is not a JSON object', rawText);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseWith<S extends z.ZodTypeAny>(schema: S, rawText: string, label: string): z.infer<S> {
  const result = schema.safeParse(parseOracleJson(rawText));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ParseError(`Unexpected ${label} fields: ${issues.join('; ')}`, rawText, { cause: result.error });
  }
  return result.data;
}

export function parseBookFields(rawText: string): BookFields {
  return parseWith(bookFieldsSchema, rawText, 'book');
}

export function parseSubjectFields(rawText: string): SubjectFields {
  return parseWith(subjectFieldsSchema, rawText, 'subject');
}
