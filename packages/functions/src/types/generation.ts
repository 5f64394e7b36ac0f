import type { PatientProfile } from './database.js';

/** Exercise proposed by a text-generation provider. Carries no media. */
export interface ExerciseProposal {
  name: string;
  description: string;
  target_joints: string[];
  instructions: string[];
}

/** Request-level provider tag: A is OpenAI, B is Anthropic. */
export const GENERATION_PROVIDER_TAGS = ['A', 'B'] as const;
export type GenerationProviderTag = (typeof GENERATION_PROVIDER_TAGS)[number];

export interface ExerciseGenerationProvider {
  readonly name: string;
  generate(profile: PatientProfile): Promise<ExerciseProposal[]>;
}

export interface SecretStore {
  /** Resolves the current value of a secret; throws ConfigurationError when unset. */
  get(secretId: string): string;
}
