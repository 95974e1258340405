/**
 * Best-effort interpretation of free-text LLM output as tabular data.  Valid
 * JSON is used as is; anything else becomes a single `{ ai_output }` record.
 */

import type { FlatTable, JsonObject, JsonValue } from "./types";

export const FALLBACK_KEY = "ai_output";
export const SCALAR_COLUMN = "AI Output";

const CODE_FENCE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

export function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the output as JSON.  A single surrounding markdown code fence is
 * ignored; output that still does not parse is wrapped as `{ ai_output }`.
 */
export function interpretOutput(text: string): { value: JsonValue; parsed: boolean } {
    const trimmed = text.trim();
    const fenced = CODE_FENCE.exec(trimmed);
    const candidate = fenced ? fenced[1] : trimmed;

    try {
        const value: JsonValue = JSON.parse(candidate);
        return { value, parsed: true };
    } catch {
        return { value: { [FALLBACK_KEY]: text }, parsed: false };
    }
}

export function cellToString(value: JsonValue | undefined): string {
    if (value === undefined || value === null) {
        return "";
    }
    if (typeof value === "string") {
        return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    return JSON.stringify(value);
}

/**
 * Flatten a JSON value into rows:
 * - an array of objects gives one row per object
 * - an object gives one row
 * - anything else gives a single "AI Output" cell
 *
 * Columns are the union of keys in first-seen order.
 */
export function toTable(value: JsonValue): FlatTable {
    let records: JsonObject[];
    if (Array.isArray(value) && value.every(isJsonObject)) {
        records = value.filter(isJsonObject);
    } else if (isJsonObject(value)) {
        records = [value];
    } else {
        records = [{ [SCALAR_COLUMN]: cellToString(value) }];
    }

    const columns: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
        for (const key of Object.keys(record)) {
            if (!seen.has(key)) {
                seen.add(key);
                columns.push(key);
            }
        }
    }

    // Own properties only: "__proto__" and "constructor" are ordinary columns
    const rows = records.map((record) =>
        Object.fromEntries(
            columns.map((column) => [
                column,
                Object.prototype.hasOwnProperty.call(record, column) ? cellToString(record[column]) : "",
            ])
        )
    );

    return { columns, rows };
}

/** Cell of a flattened row, "" when the row has no such column */
export function cellAt(row: Record<string, string>, column: string): string {
    return Object.prototype.hasOwnProperty.call(row, column) ? row[column] : "";
}

export function isEmptyTable(table: FlatTable): boolean {
    return table.rows.length === 0 || table.columns.length === 0;
}

export function previewTable(table: FlatTable, limit = 5): FlatTable {
    return { columns: table.columns, rows: table.rows.slice(0, limit) };
}
