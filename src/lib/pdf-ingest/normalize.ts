/**
 * Parsers and the LLM may hand back strings with unpaired surrogates (broken
 * glyph mappings, truncated streams).  Everything that leaves the pipeline is
 * passed through `toWellFormedText`.
 */

/**
 * Round-trip through UTF-8: unpaired surrogates become U+FFFD.  Everything else
 * is returned unchanged.
 */
export function toWellFormedText(raw: string): string {
    return Buffer.from(raw, "utf8").toString("utf8");
}

/** Join the non-blank page texts with a blank line between them */
export function joinPages(pages: string[]): string {
    return toWellFormedText(pages.filter((page) => page.trim().length > 0).join("\n\n"));
}

/** Leading sample of a text, for debug logs */
export function sampleText(text: string, length = 500): string {
    return text.slice(0, length);
}
