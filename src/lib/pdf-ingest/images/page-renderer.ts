/**
 * Rasterizes every page to JPEG with MuPDF.  This is the only module that
 * imports "mupdf"; it is loaded on first use because the package is ESM-only
 * and initializes its WebAssembly build with a top-level await.
 */

import type { ExtractedImage, PageRenderer } from "../types";
import { randomSuffix } from "./naming";

/** PDF user space is 72 units per inch */
const PDF_POINTS_PER_INCH = 72;
const JPEG_QUALITY = 90;

export class MupdfPageRenderer implements PageRenderer {
    private readonly dpi: number;

    constructor(options?: { dpi?: number }) {
        this.dpi = options?.dpi ?? 150;
    }

    async render(buffer: Buffer): Promise<ExtractedImage[]> {
        const mupdf = await import("mupdf");
        const data: Uint8Array = buffer;
        const document = mupdf.Document.openDocument(data, "application/pdf");
        const zoom = this.dpi / PDF_POINTS_PER_INCH;
        const images: ExtractedImage[] = [];

        try {
            const pageCount = document.countPages();
            for (let index = 0; index < pageCount; index++) {
                const page = document.loadPage(index);
                const pixmap = page.toPixmap(mupdf.Matrix.scale(zoom, zoom), mupdf.ColorSpace.DeviceRGB, false, true);
                try {
                    images.push({
                        fileName: `page_${index + 1}_${randomSuffix(8)}.jpg`,
                        page: index + 1,
                        mimeType: "image/jpeg",
                        data: Buffer.from(pixmap.asJPEG(JPEG_QUALITY, false)),
                    });
                } finally {
                    pixmap.destroy();
                    page.destroy();
                }
            }
        } finally {
            document.destroy();
        }

        return images;
    }
}
