import { FieldNotFoundError } from "../errors.js";
import type { FieldMap, NoteRecord } from "../types.js";
import { FIELD_SEPARATOR } from "../types.js";
import { fieldNames } from "../db/schema.js";

export interface Selection<T extends NoteRecord> {
  pending: T[];
  alreadyDone: T[];
}

export function splitFields(flds: string): string[] {
  return flds.split(FIELD_SEPARATOR);
}

export function joinFields(values: readonly string[]): string {
  return values.join(FIELD_SEPARATOR);
}

/** Copy of values extended with empty strings up to the highest mapped position. */
export function padFields(values: readonly string[], fieldMap: FieldMap): string[] {
  const padded = [...values];
  const positions = Object.values(fieldMap);
  const width = positions.length > 0 ? Math.max(...positions) + 1 : 0;
  while (padded.length < width) padded.push("");
  return padded;
}

export function fieldIndex(fieldMap: FieldMap, field: string): number | undefined {
  return Object.hasOwn(fieldMap, field) ? fieldMap[field] : undefined;
}

export function fieldValue(record: NoteRecord, fieldMap: FieldMap, field: string): string {
  const index = fieldIndex(fieldMap, field);
  if (index === undefined) return "";
  return record.values[index] ?? "";
}

export function isPending(record: NoteRecord, targetIndex: number): boolean {
  if (record.values.length < targetIndex + 1) return true;
  return (record.values[targetIndex] ?? "").trim() === "";
}

/**
 * Partition records into those whose target field is absent or blank and
 * those already filled. Order within each partition follows the input.
 */
export function selectPending<T extends NoteRecord>(
  records: readonly T[],
  fieldMap: FieldMap,
  targetFieldName: string,
  noteTypeName = "(unknown)",
): Selection<T> {
  const targetIndex = fieldIndex(fieldMap, targetFieldName);
  if (targetIndex === undefined) {
    throw new FieldNotFoundError(targetFieldName, noteTypeName, fieldNames(fieldMap));
  }

  const pending: T[] = [];
  const alreadyDone: T[] = [];
  for (const record of records) {
    (isPending(record, targetIndex) ? pending : alreadyDone).push(record);
  }
  return { pending, alreadyDone };
}
