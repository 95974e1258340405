/**
 * GET /api/ingest/models
 *
 * Lists the model ids visible to the configured OpenAI key.
 */

import { NextResponse } from "next/server";
import { errorMessage } from "@/lib/pdf-ingest";
import { getIngestPipeline } from "@/lib/pdf-ingest/singleton";

export const runtime = "nodejs";

export async function GET() {
    const llm = getIngestPipeline().llmProvider;
    if (!llm) {
        return NextResponse.json({ error: "OPENAI_API_KEY is not set." }, { status: 503 });
    }

    try {
        const models = await llm.listModels();
        return NextResponse.json({ models, defaultModel: llm.model }, { status: 200 });
    } catch (err: unknown) {
        const message = errorMessage(err);
        console.error(`[api/ingest/models] ${message}`);
        return NextResponse.json({ error: message }, { status: 502 });
    }
}
