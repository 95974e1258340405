import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ExtractedImage } from "../types";

export type ImageFolder = "images" | "embedded_images";

/**
 * Writes extracted images below a root directory, one sub-folder per kind.
 */
export class ImageStore {
    constructor(private readonly rootDir: string) {}

    async save(folder: ImageFolder, images: ExtractedImage[]): Promise<string[]> {
        if (images.length === 0) {
            return [];
        }

        const dir = path.join(this.rootDir, folder);
        await mkdir(dir, { recursive: true });

        const paths: string[] = [];
        for (const image of images) {
            const target = path.join(dir, path.basename(image.fileName));
            await writeFile(target, image.data);
            paths.push(target);
        }
        return paths;
    }
}
