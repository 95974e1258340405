/**
 * JSON shapes returned by the route handlers.  Binary payloads (images,
 * export files) are sent base64-encoded.
 */

import type { ExportFile, ExtractedImage, IngestionReport } from "./types";

export interface SerializedFile {
    fileName: string;
    mimeType: string;
    /** Base64 content */
    data: string;
}

export interface SerializedImage extends SerializedFile {
    page: number;
}

export function serializeImage(image: ExtractedImage): SerializedImage {
    return {
        fileName: image.fileName,
        page: image.page,
        mimeType: image.mimeType,
        data: image.data.toString("base64"),
    };
}

export function serializeFile(file: ExportFile): SerializedFile {
    return {
        fileName: file.fileName,
        mimeType: file.mimeType,
        data: file.content.toString("base64"),
    };
}

export function serializeReport(report: IngestionReport) {
    return {
        document: {
            documentId: report.documentId,
            fileName: report.fileName,
            parser: report.parser,
            pageCount: report.pageCount ?? null,
            parseError: report.parseError ?? null,
            textLength: report.text.length,
            text: report.text,
            features: report.features,
            transformAvailable: report.transformAvailable,
            transformUnavailableReason: report.transformUnavailableReason ?? null,
        },
        pageImages: report.pageImages.map(serializeImage),
        embeddedImages: report.embeddedImages.map(serializeImage),
        savedImagePaths: report.savedImagePaths,
    };
}
