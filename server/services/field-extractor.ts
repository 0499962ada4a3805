/**
 * Field extractor: turns the ERP's column-oriented list response into typed
 * items using the store's field mapping.
 *
 * The ERP returns `fields` (column definitions) and `rows` (positional
 * values). Each item attribute is read from the column the mapping names.
 * Numeric attributes stay unset when the value is absent or unparseable, so
 * the matching engine can tell "not reported" from an explicit zero.
 */

import { z } from "zod";
import {
  erpStringFields,
  erpNumericFields,
  type ErpStringField,
  type ErpNumericField,
  type FieldMapping,
} from "@shared/schema";

export type ErpItem = { [K in ErpStringField]: string } & { [K in ErpNumericField]?: number };

export interface ErpFieldDefinition {
  name: string;
  type: string;
}

export interface ErpListResponse {
  fields: ErpFieldDefinition[];
  rows: (string | null)[][];
}

export class ErpResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ErpResponseError";
  }
}

// ---------------------------------------------------------------------------
// Raw response validation
// ---------------------------------------------------------------------------

const cellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? null : String(v)));

const erpResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  totalcount: z.number().optional(),
  fields: z.array(z.object({ name: z.string(), type: z.string().default("") })).default([]),
  rows: z.array(z.array(cellSchema)).default([]),
});

/**
 * Validates a raw `list/item` body. `success: false` is an empty listing
 * (the ERP reports "no rows" that way); anything that does not fit the
 * shape throws.
 */
export function validateErpResponse(json: unknown): ErpListResponse {
  const parsed = erpResponseSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ErpResponseError(
      `Corrupt ERP response: ${first ? `${first.path.join(".")}: ${first.message}` : "invalid body"}`,
    );
  }

  if (!parsed.data.success) {
    if (parsed.data.error) {
      console.warn(`[FieldExtractor] ERP reported failure: ${parsed.data.error}`);
    }
    return { fields: [], rows: [] };
  }

  return { fields: parsed.data.fields, rows: parsed.data.rows };
}

// ---------------------------------------------------------------------------
// Decimal parsing
// ---------------------------------------------------------------------------

const INVARIANT_DECIMAL = /^[+-]?(?:\d{1,3}(?:,\d{3})+|\d*)(?:\.\d+)?$/;

/**
 * Parses a decimal with a period separator and optional thousands commas.
 * Returns undefined for empty or unparseable input.
 */
export function parseInvariantDecimal(value: string | null | undefined): number | undefined {
  if (value == null) return undefined;
  const trimmed = value.trim();
  if (!trimmed || !/\d/.test(trimmed) || !INVARIANT_DECIMAL.test(trimmed)) return undefined;

  const parsed = Number(trimmed.replace(/,/g, ""));
  return Number.isFinite(parsed) ? parsed : undefined;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function extractErpItems(response: ErpListResponse, mapping: FieldMapping): ErpItem[] {
  const columnIndex = new Map<string, number>();
  response.fields.forEach((field, i) => {
    if (!columnIndex.has(field.name)) columnIndex.set(field.name, i);
  });

  return response.rows.map((row) => {
    const width = Math.min(row.length, response.fields.length);

    const cell = (attribute: ErpStringField | ErpNumericField): string | null | undefined => {
      const index = columnIndex.get(mapping[attribute]);
      if (index === undefined || index >= width) return undefined;
      return row[index];
    };

    const item: ErpItem = {
      internalId: "",
      sku: "",
      barcode: "",
      name: "",
      category: "",
      unit: "",
      group: "",
      vat: "",
    };

    for (const attribute of erpStringFields) {
      item[attribute] = cell(attribute) ?? "";
    }
    for (const attribute of erpNumericFields) {
      const parsed = parseInvariantDecimal(cell(attribute));
      if (parsed !== undefined) item[attribute] = parsed;
    }

    return item;
  });
}
