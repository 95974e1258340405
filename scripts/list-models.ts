#!/usr/bin/env npx tsx
/**
 * Lists the OpenAI models visible to OPENAI_API_KEY.
 *
 * Usage:
 *   npm run models        (reads .env.local)
 */

import { loadConfig } from '../src/lib/pdf-ingest/config';
import { errorMessage } from '../src/lib/pdf-ingest/errors';
import { OpenAIChatProvider } from '../src/lib/pdf-ingest/llm/openai';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.openaiApiKey) {
    console.error('OPENAI_API_KEY is not set.');
    process.exitCode = 1;
    return;
  }

  const provider = new OpenAIChatProvider({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    model: config.openaiModel,
  });

  const models = await provider.listModels();
  for (const id of models.sort()) {
    console.log(id);
  }
}

main().catch((error: unknown) => {
  console.error(`Failed to list models: ${errorMessage(error)}`);
  process.exitCode = 1;
});
