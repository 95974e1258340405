/**
 * Cheap signals about a parsed document.  Language identification is
 * delegated to `tinyld`; table and image detection only look for markdown
 * syntax in the parsed text.
 */

import { detect } from "tinyld";
import type { DocumentFeatures } from "./types";

export const UNKNOWN_LANGUAGE = "Unknown";

const MARKDOWN_TABLE = /\|\s?.*\|\s?\n\|\s?-+/;
const MARKDOWN_IMAGE = /!\[.*?\]\(.*?\)/;

/** ISO 639-1 code of the dominant language, or "Unknown" */
export function detectLanguage(text: string): string {
    if (!text.trim()) {
        return UNKNOWN_LANGUAGE;
    }

    try {
        const language = detect(text);
        return language || UNKNOWN_LANGUAGE;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[features] Language detection failed: ${message}`);
        return UNKNOWN_LANGUAGE;
    }
}

/** A markdown table header row directly followed by its separator row */
export function containsTables(text: string): boolean {
    return MARKDOWN_TABLE.test(text);
}

export function containsImages(text: string): boolean {
    return text.includes("![image]") || MARKDOWN_IMAGE.test(text);
}

export function detectFeatures(text: string): DocumentFeatures {
    return {
        language: detectLanguage(text),
        hasTables: containsTables(text),
        hasImages: containsImages(text),
    };
}
