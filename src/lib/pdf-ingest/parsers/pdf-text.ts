/**
 * Reads the embedded text layer page by page with `pdf-parse`.  Used when no
 * parse-service key is configured.  Scanned PDFs without a text layer come
 * back empty; OCR is out of scope.
 */

import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { isRecord } from "../guards";
import type { ParsedPdf, PdfParser } from "../types";

interface TextContentItem {
    str?: string;
    hasEOL?: boolean;
}

interface PageProxy {
    getTextContent(): Promise<{ items: TextContentItem[] }>;
}

function isPageProxy(value: unknown): value is PageProxy {
    return isRecord(value) && typeof value.getTextContent === "function";
}

export class PdfTextParser implements PdfParser {
    readonly name = "pdf-parse";

    async parse(buffer: Buffer): Promise<ParsedPdf> {
        const pages: string[] = [];

        const result = await pdfParse(buffer, {
            pagerender: async (pageData: unknown) => {
                if (!isPageProxy(pageData)) {
                    pages.push("");
                    return "";
                }

                const textContent = await pageData.getTextContent();
                const text = textContent.items
                    .map((item) => {
                        if (!item.str) {
                            return "";
                        }
                        return item.hasEOL ? `${item.str}\n` : item.str;
                    })
                    .join(" ")
                    .replace(/\s+\n/g, "\n")
                    .replace(/[ \t]+/g, " ")
                    .replace(/\n /g, "\n")
                    .replace(/\n{3,}/g, "\n\n")
                    .trim();

                pages.push(text);
                return text;
            },
            max: 0,
        });

        return {
            pages,
            pageCount: result.numpages,
            parser: this.name,
        };
    }
}
