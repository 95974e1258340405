import { describe, expect, it } from 'vitest';
import { checkOpenAiKey, isKnownProfile, renderEnvFile, validateLlamaKey } from './env-profile';

describe('env profiles', () => {
  it('knows the built-in profile names', () => {
    expect(isKnownProfile('dev')).toBe(true);
    expect(isKnownProfile('custom_profile')).toBe(true);
    expect(isKnownProfile('staging')).toBe(false);
  });

  it('accepts only parse-service keys with the expected prefix', () => {
    expect(validateLlamaKey('  llama-cloud-test-key ')).toBe(true);
    expect(validateLlamaKey('test-key')).toBe(false);
    expect(validateLlamaKey('   ')).toBe(false);
  });

  it('warns about unusual OpenAI key formats', () => {
    expect(checkOpenAiKey('sk-test-key')).toBeNull();
    expect(checkOpenAiKey('org-test')).toBeNull();
    expect(checkOpenAiKey(undefined)).toBeNull();
    expect(checkOpenAiKey('test-key')).toBe('Warning: The OpenAI API key format seems unusual but proceeding.');
  });

  it('renders the env file with both keys', () => {
    expect(renderEnvFile('dev', { llamaCloudApiKey: 'llama-cloud-test', openaiApiKey: ' sk-test ' })).toBe(
      '# Environment configuration for profile: dev\nLLAMA_CLOUD_API_KEY=llama-cloud-test\nOPENAI_API_KEY=sk-test\n'
    );
  });

  it('leaves a note when no OpenAI key is given', () => {
    expect(renderEnvFile('test', { llamaCloudApiKey: 'llama-cloud-test' })).toBe(
      '# Environment configuration for profile: test\nLLAMA_CLOUD_API_KEY=llama-cloud-test\n# OPENAI_API_KEY is not set for this profile\n'
    );
  });
});
