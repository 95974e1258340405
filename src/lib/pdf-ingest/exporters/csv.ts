/**
 * Semicolon-separated, with a UTF-8 byte-order mark.
 */

import { stringify } from "csv-stringify/sync";
import { cellAt } from "../structured";
import type { FlatTable } from "../types";

export const CSV_DELIMITER = ";";

export function tableToCsv(table: FlatTable): string {
    return stringify(
        table.rows.map((row) => table.columns.map((column) => cellAt(row, column))),
        {
            bom: true,
            columns: table.columns,
            delimiter: CSV_DELIMITER,
            header: true,
            record_delimiter: "unix",
        }
    );
}
