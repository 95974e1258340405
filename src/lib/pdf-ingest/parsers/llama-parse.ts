/**
 * Client for the managed LlamaParse API.  A parse is an asynchronous job:
 *
 *   POST /api/parsing/upload              → { id, status }
 *   GET  /api/parsing/job/{id}            → { status: PENDING | SUCCESS | ERROR | CANCELED, ... }
 *   GET  /api/parsing/job/{id}/result/{t} → { text | markdown, job_metadata }
 *
 * Talks to the API with plain `fetch`, the same way the chat route talks to
 * the completions endpoint.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ParseResultType } from "../config";
import { isRecord, readNumberField, readStringField } from "../guards";
import type { ParsedPdf, PdfParser } from "../types";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface LlamaParseOptions {
    apiKey: string;
    baseUrl: string;
    resultType?: ParseResultType;
    pollIntervalMs?: number;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

const FAILED_STATUSES = new Set(["ERROR", "CANCELED", "CANCELLED"]);

export class LlamaParseParser implements PdfParser {
    readonly name = "LlamaParse";

    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly resultType: ParseResultType;
    private readonly pollIntervalMs: number;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor(options: LlamaParseOptions) {
        if (!options.apiKey) {
            throw new Error("[LlamaParseParser] Missing LLAMA_CLOUD_API_KEY.");
        }
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.resultType = options.resultType ?? "text";
        this.pollIntervalMs = options.pollIntervalMs ?? 1000;
        this.timeoutMs = options.timeoutMs ?? 300_000;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async parse(buffer: Buffer, fileName: string): Promise<ParsedPdf> {
        const jobId = await this.upload(buffer, fileName);
        await this.waitForJob(jobId);
        const result = await this.request(`/api/parsing/job/${jobId}/result/${this.resultType}`);

        const text = readStringField(result, this.resultType);
        if (text === undefined) {
            throw new Error(`LlamaParse result for job ${jobId} has no "${this.resultType}" field`);
        }

        const metadata = isRecord(result) ? result.job_metadata : undefined;
        const pageCount = readNumberField(metadata, "job_pages");

        return {
            pages: [text],
            pageCount,
            parser: this.name,
        };
    }

    private async upload(buffer: Buffer, fileName: string): Promise<string> {
        const form = new FormData();
        form.append("file", new Blob([new Uint8Array(buffer)], { type: "application/pdf" }), fileName);

        const body = await this.request("/api/parsing/upload", { method: "POST", body: form });
        const jobId = readStringField(body, "id");
        if (!jobId) {
            throw new Error("LlamaParse upload response did not include a job id");
        }
        console.info(`[LlamaParseParser] Uploaded ${fileName} as job ${jobId}`);
        return jobId;
    }

    private async waitForJob(jobId: string): Promise<void> {
        const deadline = Date.now() + this.timeoutMs;

        for (;;) {
            const job = await this.request(`/api/parsing/job/${jobId}`);
            const status = readStringField(job, "status")?.toUpperCase() ?? "PENDING";

            if (status === "SUCCESS" || status === "PARTIAL_SUCCESS") {
                return;
            }
            if (FAILED_STATUSES.has(status)) {
                const reason = readStringField(job, "error_message") ?? status;
                throw new Error(`LlamaParse job ${jobId} failed: ${reason}`);
            }
            if (Date.now() >= deadline) {
                throw new Error(`LlamaParse job ${jobId} did not finish within ${this.timeoutMs} ms`);
            }

            await sleep(this.pollIntervalMs);
        }
    }

    private async request(path: string, init: RequestInit = {}): Promise<unknown> {
        const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
            ...init,
            headers: {
                Accept: "application/json",
                Authorization: `Bearer ${this.apiKey}`,
            },
        });

        const raw = await response.text();
        let data: unknown = null;
        if (raw) {
            try {
                data = JSON.parse(raw);
            } catch {
                data = raw;
            }
        }

        if (!response.ok) {
            const detail =
                readStringField(data, "detail") ??
                readStringField(data, "message") ??
                (typeof data === "string" ? data : undefined) ??
                response.statusText;
            throw new Error(`LlamaParse request ${path} failed (${response.status}): ${detail}`);
        }

        return data;
    }
}
