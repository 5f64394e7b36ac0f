import { defineSecret } from 'firebase-functions/params';
import type { SecretStore } from '../types/generation.js';
import { ConfigurationError } from '../types/errors.js';

export const openaiApiKey = defineSecret('OPENAI_API_KEY');
export const anthropicApiKey = defineSecret('ANTHROPIC_API_KEY');
export const googleSearchApiKey = defineSecret('GOOGLE_SEARCH_API_KEY');
export const googleSearchEngineId = defineSecret('GOOGLE_SEARCH_ENGINE_ID');

/** Secrets bound to the recommendation functions at deploy time. */
export const recommendationSecrets = [
  openaiApiKey,
  anthropicApiKey,
  googleSearchApiKey,
  googleSearchEngineId,
];

/**
 * Secret Manager values exposed through Firebase params. Values are read on
 * each `get`, never cached by this store.
 */
export class FirebaseSecretStore implements SecretStore {
  private readonly params = new Map(
    recommendationSecrets.map((param) => [param.name, param] as const)
  );

  get(secretId: string): string {
    const param = this.params.get(secretId);
    if (param === undefined) {
      throw new ConfigurationError(`Unknown secret ${secretId}`);
    }
    const value = param.value().trim();
    if (value === '') {
      throw new ConfigurationError(`Secret ${secretId} is not configured`);
    }
    return value;
  }
}
