/**
 * Rewrites parsed text into a target format with a single chat completion.
 * The target is either one of the preset keywords or a free-text
 * instruction used as the system prompt.
 */

import { errorMessage } from "./errors";
import { toWellFormedText } from "./normalize";
import type { LlmProvider, TransformPreset, TransformResult } from "./types";

export const PRESET_PROMPTS: Readonly<Record<TransformPreset, string>> = {
    table:
        "You are professional in analyzing and structuring documents. In the document, identify all tasks/questions and their respective answers. Structure them and convert the input into a well-structured CSV table. Consider a column for each answer per task/question. Take the exact formulation of each question and each answer. Make a column stating the correct answers. Be aware of correct CSV formatting and consider empty spaces if necessary. Separate all with semicolon. Encode in UTF-8, if you see Umlaute like ö,ä,ü,ß,... the transform them properly in oe,ae,ue,ss, etc.",
    summary:
        "You are an expert document summarizer. Convert the input markdown into a well-structured executive summary.",
    report: "You are a professional analyst. Turn the input markdown into a clear and concise report.",
    article: "You are a skilled writer. Transform the input markdown into a well-written, engaging article.",
};

export const TRANSFORM_PRESETS: readonly TransformPreset[] = ["table", "summary", "report", "article"];

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";

export const EMPTY_TEXT_ERROR =
    "⚠️ Error: Parsed markdown is empty. Please re-parse the document before running GPT transformation.";

export function isTransformPreset(value: string): value is TransformPreset {
    return Object.prototype.hasOwnProperty.call(PRESET_PROMPTS, value);
}

/** Preset prompt, else the custom instruction, else the generic assistant prompt */
export function resolvePrompt(presetOrCustom?: string | null): string {
    if (!presetOrCustom) {
        return DEFAULT_SYSTEM_PROMPT;
    }
    return isTransformPreset(presetOrCustom) ? PRESET_PROMPTS[presetOrCustom] : presetOrCustom;
}

export async function transformText(
    llm: LlmProvider,
    text: string,
    presetOrCustom?: string | null
): Promise<TransformResult> {
    if (!text.trim()) {
        return { success: false, error: EMPTY_TEXT_ERROR };
    }

    const prompt = resolvePrompt(presetOrCustom);

    try {
        const content = await llm.complete([
            { role: "system", content: prompt },
            { role: "user", content: text },
        ]);

        return {
            success: true,
            output: toWellFormedText(content).trim(),
            model: llm.model,
            prompt,
        };
    } catch (error) {
        const message = errorMessage(error);
        console.error(`[transform] LLM call failed: ${message}`);
        return { success: false, error: `LLM request failed: ${message}` };
    }
}
