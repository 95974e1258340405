/**
 * One workbook, one sheet, header row first.  Uses `exceljs`.
 */

import ExcelJS from "exceljs";
import { cellAt } from "../structured";
import type { FlatTable } from "../types";

export const SHEET_NAME = "AI_Output";

export async function tableToXlsx(table: FlatTable): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet(SHEET_NAME);

    worksheet.addRow(table.columns);
    for (const row of table.rows) {
        worksheet.addRow(table.columns.map((column) => cellAt(row, column)));
    }

    const content = await workbook.xlsx.writeBuffer();
    return Buffer.from(content);
}
