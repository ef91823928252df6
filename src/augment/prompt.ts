import { MissingSourceFieldError } from "../errors.js";
import type { FieldMap, NoteRecord } from "../types.js";
import { fieldNames } from "../db/schema.js";
import { fieldIndex, fieldValue } from "./selector.js";

type Segment = { kind: "text"; text: string } | { kind: "field"; name: string };

const PLACEHOLDER = /^\{([\p{L}\p{N}_]+)\}/u;

/**
 * Split a template into literal text and `{Field}` placeholders.
 * `{{` and `}}` stand for literal braces; other braces are left as written.
 */
export function parseTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let text = "";
  let i = 0;

  while (i < template.length) {
    const rest = template.slice(i);

    if (rest.startsWith("{{") || rest.startsWith("}}")) {
      text += rest[0];
      i += 2;
      continue;
    }

    const match = rest[0] === "{" ? PLACEHOLDER.exec(rest) : null;
    if (match && match[1] !== undefined) {
      if (text) segments.push({ kind: "text", text });
      text = "";
      segments.push({ kind: "field", name: match[1] });
      i += match[0].length;
      continue;
    }

    text += rest[0];
    i += 1;
  }

  if (text) segments.push({ kind: "text", text });
  return segments;
}

/** Field names referenced by the template, in order of first use. */
export function extractPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const segment of parseTemplate(template)) {
    if (segment.kind === "field" && !names.includes(segment.name)) names.push(segment.name);
  }
  return names;
}

export function assertSourceFields(template: string, fieldMap: FieldMap): string[] {
  const required = extractPlaceholders(template);
  for (const field of required) {
    if (fieldIndex(fieldMap, field) === undefined) {
      throw new MissingSourceFieldError(field, fieldNames(fieldMap));
    }
  }
  return required;
}

export function buildRequest(template: string, record: NoteRecord, fieldMap: FieldMap): string {
  return parseTemplate(template)
    .map((segment) => {
      if (segment.kind === "text") return segment.text;
      if (fieldIndex(fieldMap, segment.name) === undefined) {
        throw new MissingSourceFieldError(segment.name, fieldNames(fieldMap));
      }
      return fieldValue(record, fieldMap, segment.name);
    })
    .join("");
}

/** Single-line excerpt used in previews and failure logs. */
export function excerpt(text: string, length = 80): string {
  return text.replace(/\n/g, " ").slice(0, length);
}
