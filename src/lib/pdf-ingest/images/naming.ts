import { v4 as uuidv4 } from "uuid";

/** Random lowercase hex suffix that keeps extracted file names unique */
export function randomSuffix(length: number): string {
    return uuidv4().replace(/-/g, "").slice(0, length);
}

export function mimeTypeForExtension(ext: string): string {
    switch (ext.toLowerCase()) {
        case "jpg":
        case "jpeg":
            return "image/jpeg";
        case "jp2":
            return "image/jp2";
        case "png":
            return "image/png";
        default:
            return "application/octet-stream";
    }
}
