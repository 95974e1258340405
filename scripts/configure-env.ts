#!/usr/bin/env npx tsx
/**
 * Interactive helper that writes .env.local for a named profile.
 *
 * Usage:
 *   npm run configure-env
 */

import { writeFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import {
  ENV_PROFILE_NAMES,
  checkOpenAiKey,
  isKnownProfile,
  renderEnvFile,
  validateLlamaKey,
} from '../src/lib/pdf-ingest/env-profile';
import { errorMessage } from '../src/lib/pdf-ingest/errors';

const ENV_FILE = '.env.local';

async function main(): Promise<void> {
  const rl = createInterface({ input, output });

  try {
    console.log('This script creates or updates .env.local with API keys.');
    console.log('Predefined profile names (you can also use a new custom name):');
    for (const name of ENV_PROFILE_NAMES) {
      console.log(`  - ${name}`);
    }

    const profile = (await rl.question('\nEnter a profile name to configure: ')).trim();
    if (!profile) {
      console.log('No profile name entered. Exiting.');
      return;
    }

    if (!isKnownProfile(profile)) {
      console.log(`Warning: '${profile}' is not a predefined profile name (${ENV_PROFILE_NAMES.join(', ')}).`);
      const confirm = (await rl.question(`Create ${ENV_FILE} for a new profile named '${profile}'? (y/n): `))
        .trim()
        .toLowerCase();
      if (confirm !== 'y') {
        console.log('Operation cancelled by user.');
        return;
      }
    }

    const llamaCloudApiKey = (await rl.question('Enter the LLAMA_CLOUD_API_KEY: ')).trim();
    if (!validateLlamaKey(llamaCloudApiKey)) {
      console.log("Invalid or empty LLAMA_CLOUD_API_KEY. Key should start with 'llama-cloud-'.");
      console.log('Operation cancelled.');
      return;
    }

    const openaiApiKey = (await rl.question('Enter the OPENAI_API_KEY (optional, press Enter to skip): ')).trim();
    const warning = checkOpenAiKey(openaiApiKey);
    if (warning) {
      console.log(warning);
    }

    await writeFile(ENV_FILE, renderEnvFile(profile, { llamaCloudApiKey, openaiApiKey }));
    console.log(`\nSaved ${ENV_FILE} for profile '${profile}'.`);
    if (!openaiApiKey) {
      console.log('Note: OPENAI_API_KEY was not provided; GPT transformation stays disabled.');
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Error writing ${ENV_FILE}: ${errorMessage(error)}`);
  process.exitCode = 1;
});
