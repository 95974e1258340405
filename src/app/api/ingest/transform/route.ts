/**
 * POST /api/ingest/transform
 *
 * JSON body: { documentId?, text?, preset?, prompt? }
 * `prompt` (a custom instruction) takes precedence over `preset`.
 */

import { NextRequest, NextResponse } from "next/server";
import { IngestError, TRANSFORM_PRESETS, errorMessage, isTransformPreset } from "@/lib/pdf-ingest";
import { isRecord } from "@/lib/pdf-ingest/guards";
import { serializeFile } from "@/lib/pdf-ingest/http";
import { getIngestPipeline } from "@/lib/pdf-ingest/singleton";

export const runtime = "nodejs";
export const maxDuration = 120;

interface TransformRequestBody {
    documentId?: string;
    text?: string;
    preset?: string;
    prompt?: string;
}

function readBody(value: unknown): TransformRequestBody | string {
    if (!isRecord(value)) {
        return "Request body must be a JSON object.";
    }

    const body: TransformRequestBody = {};
    for (const key of ["documentId", "text", "preset", "prompt"] as const) {
        const field = value[key];
        if (field === undefined || field === null) {
            continue;
        }
        if (typeof field !== "string") {
            return `"${key}" must be a string.`;
        }
        body[key] = field;
    }
    return body;
}

export async function POST(request: NextRequest) {
    let raw: unknown;
    try {
        raw = await request.json();
    } catch {
        return NextResponse.json({ error: "Invalid JSON body." }, { status: 400 });
    }

    const body = readBody(raw);
    if (typeof body === "string") {
        return NextResponse.json({ error: body }, { status: 400 });
    }

    const preset = body.preset?.trim();
    if (preset && !isTransformPreset(preset)) {
        return NextResponse.json(
            { error: `Unknown preset "${preset}". Expected one of: ${TRANSFORM_PRESETS.join(", ")}.` },
            { status: 400 }
        );
    }

    const instruction = body.prompt?.trim() || preset || null;

    try {
        const result = await getIngestPipeline().transform(
            { documentId: body.documentId?.trim() || undefined, text: body.text },
            instruction
        );

        if (!result.success) {
            return NextResponse.json({ error: result.error }, { status: 502 });
        }

        return NextResponse.json(
            {
                documentId: result.documentId ?? null,
                model: result.model,
                output: result.output,
                preview: result.exports.preview ?? null,
                files: result.exports.files.map(serializeFile),
                errors: result.exports.errors,
            },
            { status: 200 }
        );
    } catch (err: unknown) {
        if (err instanceof IngestError) {
            return NextResponse.json({ error: err.message }, { status: err.status });
        }
        console.error(`[api/ingest/transform] ${errorMessage(err)}`);
        return NextResponse.json({ error: errorMessage(err) }, { status: 500 });
    }
}

export async function GET() {
    return NextResponse.json(
        {
            error: "Method not allowed. Use POST.",
            usage: {
                method: "POST",
                path: "/api/ingest/transform",
                body: {
                    documentId: "string (from POST /api/ingest)",
                    text: "string (instead of documentId)",
                    preset: TRANSFORM_PRESETS.join(" | "),
                    prompt: "string (custom instruction, overrides preset)",
                },
            },
        },
        { status: 405 }
    );
}
