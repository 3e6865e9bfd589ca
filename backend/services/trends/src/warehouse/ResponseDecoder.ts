// backend/services/trends/src/warehouse/ResponseDecoder.ts
/**
 * Purpose:
 * - Turn a query response (schema.fields + rows[].f[].v, every value a string)
 *   into typed records, one per row.
 *
 * Rules:
 * - INTEGER/INT64 cells → number; absent, null or unparsable → 0. Values
 *   outside the safe-integer range stay exact as a decimal string.
 * - Everything else → string; absent or null → "".
 * - The "update" column carries URL-encoded text and is percent-decoded;
 *   no other column is. A "%" not followed by two hex digits is literal text;
 *   escapes that decode to invalid UTF-8 are a DecodeError.
 * - Keys follow schema order, records follow row order.
 * - Missing schema.fields or a row whose cell count differs from the field
 *   count → DecodeError. Missing rows → [].
 */

import { z } from "zod";
import { DecodeError } from "../errors";

/** Column whose values are stored URL-encoded. */
export const URL_ENCODED_COLUMN = "update";

const INTEGER_TYPES = new Set(["INTEGER", "INT64"]);

/** Runs of well-formed escapes; anything else is left as written. */
const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

export type SchemaField = { name: string; type: string };
export type RowCell = { v?: unknown };
export type Row = { f: RowCell[] };

export type CellValue = string | number;
export type StructuredRecord = Record<string, CellValue>;

const SchemaFieldSchema = z
  .object({ name: z.string().min(1), type: z.string().min(1) })
  .passthrough();

const RowSchema = z
  .object({ f: z.array(z.object({ v: z.unknown() }).passthrough()) })
  .passthrough();

const ResponseSchema = z
  .object({
    schema: z
      .object({ fields: z.array(SchemaFieldSchema) }, {
        required_error: "response lacks schema",
      })
      .passthrough(),
    rows: z.array(RowSchema).nullish(),
  })
  .passthrough();

/** Validate the envelope, then decode. */
export function decodeQueryResponse(response: unknown): StructuredRecord[] {
  const parsed = ResponseSchema.safeParse(response);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") || "<root>" : "<root>";
    throw new DecodeError(
      `query response has unexpected shape at ${where}: ${issue?.message ?? "invalid"}`
    );
  }
  const { schema, rows } = parsed.data;
  if (rows == null) return [];
  return decodeRows(schema.fields, rows);
}

export function decodeRows(
  fields: readonly SchemaField[],
  rows: readonly Row[]
): StructuredRecord[] {
  return rows.map((row, rowIndex) => {
    if (row.f.length !== fields.length) {
      throw new DecodeError(
        `row ${rowIndex} has ${row.f.length} cells but schema has ${fields.length} fields`
      );
    }
    return Object.fromEntries(
      fields.map((field, i) => [
        field.name,
        decodeCell(field, row.f[i]?.v, rowIndex),
      ])
    );
  });
}

function decodeCell(field: SchemaField, v: unknown, rowIndex: number): CellValue {
  if (INTEGER_TYPES.has(field.type.toUpperCase())) return toInteger(v);

  const text = typeof v === "string" ? v : "";
  if (field.name !== URL_ENCODED_COLUMN) return text;

  try {
    return text.replace(ESCAPE_RUN, (run) => decodeURIComponent(run));
  } catch (err: unknown) {
    throw new DecodeError(
      `row ${rowIndex} column "${field.name}" does not decode to valid UTF-8`,
      { cause: err }
    );
  }
}

function toInteger(v: unknown): CellValue {
  if (typeof v !== "string") return 0;
  const digits = v.trim();
  if (!/^[+-]?\d+$/.test(digits)) return 0;
  const n = Number.parseInt(digits, 10);
  if (Number.isSafeInteger(n)) return n;
  return BigInt(digits).toString();
}
