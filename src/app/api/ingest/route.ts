/**
 * PDF Ingest: Upload Route
 *
 * POST /api/ingest
 *
 * Accepts a multipart/form-data upload with a single PDF under the field
 * name "file".  The document is parsed, its features detected and its page
 * and embedded images extracted.  The parsed text is kept in memory so it can
 * be transformed later through /api/ingest/transform.
 */

import { NextRequest, NextResponse } from "next/server";
import { IngestError, errorMessage } from "@/lib/pdf-ingest";
import { serializeReport } from "@/lib/pdf-ingest/http";
import { getIngestConfig, getIngestPipeline } from "@/lib/pdf-ingest/singleton";

export const runtime = "nodejs";

/**
 * Next.js Route Segment Config
 * Managed parsing and page rendering of long documents take a while.
 */
export const maxDuration = 300;

// ---------------------------------------------------------------------------
// POST handler
// ---------------------------------------------------------------------------

export async function POST(request: NextRequest) {
    try {
        // ── Validate content type ──
        const contentType = request.headers.get("content-type") ?? "";
        if (!contentType.includes("multipart/form-data")) {
            return NextResponse.json(
                { error: "Invalid content type. Expected multipart/form-data." },
                { status: 415 }
            );
        }

        // ── Parse multipart form data ──
        const formData = await request.formData();
        const entry = formData.get("file");

        if (!(entry instanceof File)) {
            return NextResponse.json(
                { error: "No file provided. Upload a PDF using the 'file' form field." },
                { status: 400 }
            );
        }

        const fileName = entry.name || "upload.pdf";
        const { maxFileSizeBytes } = getIngestConfig();

        // ── Size validation ──
        if (entry.size > maxFileSizeBytes) {
            return NextResponse.json(
                {
                    error: `File exceeds the ${(maxFileSizeBytes / 1024 / 1024).toFixed(0)} MB limit (${(entry.size / 1024 / 1024).toFixed(1)} MB).`,
                },
                { status: 413 }
            );
        }

        if (entry.size === 0) {
            return NextResponse.json({ error: "File is empty." }, { status: 400 });
        }

        // ── Parse, detect & extract (the pipeline checks the %PDF- header) ──
        const buffer = Buffer.from(await entry.arrayBuffer());
        const report = await getIngestPipeline().ingest(buffer, fileName);

        return NextResponse.json(serializeReport(report), { status: 200 });
    } catch (err: unknown) {
        if (err instanceof IngestError) {
            return NextResponse.json({ error: err.message }, { status: err.status });
        }
        console.error(`[api/ingest] ${errorMessage(err)}`);
        return NextResponse.json({ error: errorMessage(err) }, { status: 500 });
    }
}

// ---------------------------------------------------------------------------
// Reject non-POST methods
// ---------------------------------------------------------------------------

export async function GET() {
    return NextResponse.json(
        {
            error: "Method not allowed. Use POST with multipart/form-data.",
            usage: {
                method: "POST",
                path: "/api/ingest",
                body: "multipart/form-data with field 'file' (application/pdf)",
            },
        },
        { status: 405 }
    );
}
