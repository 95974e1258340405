import OpenAI from "openai";
import { DEFAULT_OPENAI_MODEL } from "../config";
import type { ChatMessage, LlmProvider } from "../types";

interface OpenAIChatProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    model?: string;
    temperature?: number;
}

export class OpenAIChatProvider implements LlmProvider {
    readonly model: string;

    private readonly client: OpenAI;
    private readonly temperature: number;

    constructor(options: OpenAIChatProviderOptions = {}) {
        const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
        if (!apiKey) {
            throw new Error(
                "[OpenAIChatProvider] Missing OPENAI_API_KEY. Pass it via options or environment variable."
            );
        }

        this.client = new OpenAI({ apiKey, baseURL: options.baseUrl });
        this.model = options.model ?? DEFAULT_OPENAI_MODEL;
        this.temperature = options.temperature ?? 0.1;
    }

    async complete(messages: ChatMessage[]): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages,
            temperature: this.temperature,
        });

        return response.choices[0]?.message?.content ?? "";
    }

    async listModels(): Promise<string[]> {
        const page = await this.client.models.list();
        return page.data.map((model) => model.id);
    }
}
