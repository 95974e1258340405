/**
 * Turns transformed text into downloadable files.  The plain-text formats
 * are always produced; JSON, CSV and XLSX only when the output flattens into
 * a non-empty table.  A failing format is reported in `errors` and does not
 * stop the others.
 */

import { errorMessage } from "../errors";
import { interpretOutput, isEmptyTable, previewTable, toTable } from "../structured";
import type { ExportBundle, ExportFile } from "../types";
import { tableToCsv } from "./csv";
import { textToDocx } from "./docx";
import { tableToXlsx } from "./excel";
import { MIME_TYPES } from "./mime";

export const DEFAULT_EXPORT_BASENAME = "ai_output";
export const PREVIEW_ROWS = 5;

export async function buildExports(text: string, baseName = DEFAULT_EXPORT_BASENAME): Promise<ExportBundle> {
    const files: ExportFile[] = [
        { fileName: `${baseName}.txt`, mimeType: MIME_TYPES.txt, content: Buffer.from(text, "utf8") },
        { fileName: `${baseName}.md`, mimeType: MIME_TYPES.md, content: Buffer.from(text, "utf8") },
    ];
    const errors: string[] = [];

    try {
        files.push({ fileName: `${baseName}.docx`, mimeType: MIME_TYPES.docx, content: await textToDocx(text) });
    } catch (error) {
        errors.push(`Error creating DOCX: ${errorMessage(error)}`);
    }

    const { value, parsed } = interpretOutput(text);

    let preview: ExportBundle["preview"];
    try {
        const table = toTable(value);
        if (!isEmptyTable(table)) {
            const tableFiles: ExportFile[] = [
                {
                    fileName: `${baseName}.json`,
                    mimeType: MIME_TYPES.json,
                    content: Buffer.from(JSON.stringify(value, null, 2), "utf8"),
                },
                {
                    fileName: `${baseName}.csv`,
                    mimeType: MIME_TYPES.csv,
                    content: Buffer.from(tableToCsv(table), "utf8"),
                },
                {
                    fileName: `${baseName}.xlsx`,
                    mimeType: MIME_TYPES.xlsx,
                    content: await tableToXlsx(table),
                },
            ];
            files.push(...tableFiles);
            preview = previewTable(table, PREVIEW_ROWS);
        }
    } catch (error) {
        errors.push(`Error preparing data for Table/JSON/CSV/Excel export: ${errorMessage(error)}`);
        if (parsed) {
            files.push({
                fileName: `${baseName}_raw.json`,
                mimeType: MIME_TYPES.json,
                content: Buffer.from(JSON.stringify({ raw_ai_output: text }), "utf8"),
            });
        }
    }

    if (errors.length > 0) {
        console.warn(`[exports] ${errors.join("; ")}`);
    }

    return { files, preview, errors };
}
