/**
 * Helpers for writing `.env.local` files for named profiles.  Keys are never
 * stored in the repository; the profile name is only a label written into
 * the file header.
 */

export const ENV_PROFILE_NAMES = ["dev", "prod", "test", "custom_profile"] as const;

export const LLAMA_KEY_PREFIX = "llama-cloud-";

export interface ProfileKeys {
    llamaCloudApiKey: string;
    openaiApiKey?: string;
}

export function isKnownProfile(name: string): boolean {
    return ENV_PROFILE_NAMES.some((profile) => profile === name);
}

export function validateLlamaKey(key: string): boolean {
    const trimmed = key.trim();
    return trimmed.length > 0 && trimmed.startsWith(LLAMA_KEY_PREFIX);
}

/** Warning text for an OpenAI key with an unexpected prefix, or null */
export function checkOpenAiKey(key: string | undefined): string | null {
    const trimmed = key?.trim();
    if (!trimmed) {
        return null;
    }
    if (trimmed.startsWith("sk-") || trimmed.startsWith("org-")) {
        return null;
    }
    return "Warning: The OpenAI API key format seems unusual but proceeding.";
}

export function renderEnvFile(profile: string, keys: ProfileKeys): string {
    const lines = [
        `# Environment configuration for profile: ${profile}`,
        `LLAMA_CLOUD_API_KEY=${keys.llamaCloudApiKey.trim()}`,
    ];

    const openaiApiKey = keys.openaiApiKey?.trim();
    lines.push(openaiApiKey ? `OPENAI_API_KEY=${openaiApiKey}` : "# OPENAI_API_KEY is not set for this profile");

    return `${lines.join("\n")}\n`;
}
