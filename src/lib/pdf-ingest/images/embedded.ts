/**
 * Walks each page's XObject resources with `pdf-lib` and returns the image
 * streams as files.  JPEG and JPEG 2000 streams are passed through as they
 * are stored; 8-bit Flate (or unfiltered) pixel data is re-encoded as PNG
 * with `sharp`.
 */

import sharp from "sharp";
import {
    PDFArray,
    PDFDict,
    PDFDocument,
    PDFName,
    PDFNumber,
    PDFPage,
    PDFRawStream,
    PDFStream,
    decodePDFRawStream,
} from "pdf-lib";
import type { EmbeddedImageSource, ExtractedImage } from "../types";
import { mimeTypeForExtension, randomSuffix } from "./naming";

type ColorSpaceKind = "DeviceRGB" | "DeviceGray" | "DeviceCMYK";

interface EncodedImage {
    ext: string;
    data: Buffer;
}

export class EmbeddedImageExtractor implements EmbeddedImageSource {
    async extract(buffer: Buffer): Promise<ExtractedImage[]> {
        const pdf = await PDFDocument.load(buffer, { ignoreEncryption: true, updateMetadata: false });
        const images: ExtractedImage[] = [];

        const pages = pdf.getPages();
        for (let index = 0; index < pages.length; index++) {
            const pageNumber = index + 1;
            const streams = this.getImageStreams(pages[index]);

            for (let imageIndex = 0; imageIndex < streams.length; imageIndex++) {
                const { stream, resources } = streams[imageIndex];
                const encoded = await this.encodeImage(stream, resources);
                if (!encoded) {
                    continue;
                }

                images.push({
                    fileName: `page${pageNumber}_img${imageIndex + 1}_${randomSuffix(6)}.${encoded.ext}`,
                    page: pageNumber,
                    mimeType: mimeTypeForExtension(encoded.ext),
                    data: encoded.data,
                });
            }
        }

        return images;
    }

    private getImageStreams(page: PDFPage): Array<{ stream: PDFStream; resources: PDFDict }> {
        const resources = page.node.Resources();
        if (!resources) {
            return [];
        }

        const xObjects = resources.lookupMaybe(PDFName.of("XObject"), PDFDict);
        if (!xObjects) {
            return [];
        }

        const streams: Array<{ stream: PDFStream; resources: PDFDict }> = [];
        for (const [key] of xObjects.entries()) {
            const stream = xObjects.lookupMaybe(key, PDFStream);
            if (!stream) {
                continue;
            }

            const subtype = stream.dict.lookupMaybe(PDFName.of("Subtype"), PDFName);
            if (subtype && this.normalizeName(subtype) === "Image") {
                streams.push({ stream, resources });
            }
        }
        return streams;
    }

    private async encodeImage(stream: PDFStream, resources: PDFDict): Promise<EncodedImage | null> {
        const filterEntry =
            stream.dict.lookupMaybe(PDFName.of("Filter"), PDFName) ??
            stream.dict.lookupMaybe(PDFName.of("Filter"), PDFArray);
        const filterNames = this.getFilterNames(filterEntry);

        if (filterNames.length === 1 && filterNames[0] === "DCTDecode") {
            return { ext: "jpg", data: Buffer.from(stream.getContents()) };
        }
        if (filterNames.length === 1 && filterNames[0] === "JPXDecode") {
            return { ext: "jp2", data: Buffer.from(stream.getContents()) };
        }

        const bitsPerComponent = stream.dict.lookupMaybe(PDFName.of("BitsPerComponent"), PDFNumber)?.asNumber() ?? 8;
        const rawStream = stream instanceof PDFRawStream ? stream : null;
        if (
            !rawStream ||
            bitsPerComponent !== 8 ||
            !filterNames.every((name) => name === "FlateDecode")
        ) {
            console.warn(
                `[EmbeddedImageExtractor] Skipping image with unsupported encoding (filters: ${filterNames.join(", ") || "none"}, bpc: ${bitsPerComponent})`
            );
            return null;
        }

        const colorSpaceEntry =
            stream.dict.lookupMaybe(PDFName.of("ColorSpace"), PDFName) ??
            stream.dict.lookupMaybe(PDFName.of("ColorSpace"), PDFArray);
        const colorSpace = this.resolveColorSpace(colorSpaceEntry, resources);
        if (!colorSpace) {
            console.warn("[EmbeddedImageExtractor] Skipping image with unsupported colour space");
            return null;
        }

        const width = stream.dict.lookupMaybe(PDFName.of("Width"), PDFNumber)?.asNumber() ?? 0;
        const height = stream.dict.lookupMaybe(PDFName.of("Height"), PDFNumber)?.asNumber() ?? 0;
        if (width <= 0 || height <= 0) {
            return null;
        }

        try {
            const decoded = filterNames.length === 0 ? rawStream.getContents() : decodePDFRawStream(rawStream).decode();
            const pixels = colorSpace === "DeviceCMYK" ? cmykToRgb(decoded) : Buffer.from(decoded);
            const channels = colorSpace === "DeviceGray" ? 1 : 3;

            if (pixels.length < width * height * channels) {
                console.warn(`[EmbeddedImageExtractor] Image data is shorter than ${width}x${height}x${channels}`);
                return null;
            }

            const png = await sharp(pixels.subarray(0, width * height * channels), {
                raw: { width, height, channels },
            })
                .png()
                .toBuffer();
            return { ext: "png", data: png };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[EmbeddedImageExtractor] Unable to convert image stream: ${message}`);
            return null;
        }
    }

    private getFilterNames(filter: PDFName | PDFArray | undefined): string[] {
        if (!filter) {
            return [];
        }

        if (filter instanceof PDFName) {
            return [this.normalizeName(filter)];
        }

        const names: string[] = [];
        for (let index = 0; index < filter.size(); index++) {
            const value = filter.lookupMaybe(index, PDFName);
            if (value) {
                names.push(this.normalizeName(value));
            }
        }
        return names;
    }

    private resolveColorSpace(value: PDFName | PDFArray | undefined, resources: PDFDict): ColorSpaceKind | null {
        if (!value) {
            return "DeviceRGB";
        }

        if (value instanceof PDFName) {
            const name = this.normalizeName(value);
            if (name === "DeviceRGB" || name === "DeviceGray" || name === "DeviceCMYK") {
                return name;
            }

            const colorSpaces = resources.lookupMaybe(PDFName.of("ColorSpace"), PDFDict);
            const referenced = colorSpaces?.lookupMaybe(value, PDFArray);
            return referenced ? this.resolveColorSpace(referenced, resources) : null;
        }

        const base = value.lookupMaybe(0, PDFName);
        if (!base) {
            return null;
        }

        // [/ICCBased stream]: the profile's /N gives the component count
        if (this.normalizeName(base) === "ICCBased") {
            const profile = value.lookupMaybe(1, PDFStream);
            const components = profile?.dict.lookupMaybe(PDFName.of("N"), PDFNumber)?.asNumber();
            switch (components) {
                case 1:
                    return "DeviceGray";
                case 3:
                    return "DeviceRGB";
                case 4:
                    return "DeviceCMYK";
                default:
                    return null;
            }
        }

        return this.resolveColorSpace(base, resources);
    }

    private normalizeName(name: PDFName): string {
        const raw = name.asString();
        return raw.startsWith("/") ? raw.slice(1) : raw;
    }
}

/** Naive CMYK → RGB, enough for previews */
export function cmykToRgb(cmyk: Uint8Array): Buffer {
    const pixelCount = Math.floor(cmyk.length / 4);
    const rgb = Buffer.alloc(pixelCount * 3);

    for (let pixel = 0; pixel < pixelCount; pixel++) {
        const c = cmyk[pixel * 4] / 255;
        const m = cmyk[pixel * 4 + 1] / 255;
        const y = cmyk[pixel * 4 + 2] / 255;
        const k = cmyk[pixel * 4 + 3] / 255;
        rgb[pixel * 3] = Math.round(255 * (1 - c) * (1 - k));
        rgb[pixel * 3 + 1] = Math.round(255 * (1 - m) * (1 - k));
        rgb[pixel * 3 + 2] = Math.round(255 * (1 - y) * (1 - k));
    }

    return rgb;
}
