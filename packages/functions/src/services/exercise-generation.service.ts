/**
 * Exercise Generation Service
 *
 * Produces 3-5 exercise proposals for a patient profile through one of two
 * text-generation backends. Both variants share the prompt and the parsing
 * step and differ only in how they reach their API:
 * - Provider A: OpenAI chat completions
 * - Provider B: Anthropic messages
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { info, warn } from 'firebase-functions/logger';
import type { PatientProfile } from '../types/database.js';
import type {
  ExerciseGenerationProvider,
  ExerciseProposal,
  GenerationProviderTag,
  SecretStore,
} from '../types/generation.js';
import { GenerationError } from '../types/errors.js';
import { parseExerciseProposals } from './exercise-proposal-parser.service.js';

export const OPENAI_MODEL = 'gpt-4o';
export const ANTHROPIC_MODEL = 'claude-3-5-sonnet-latest';
export const OPENAI_API_KEY_SECRET = 'OPENAI_API_KEY';
export const ANTHROPIC_API_KEY_SECRET = 'ANTHROPIC_API_KEY';

const MAX_TOKENS = 2000;
const TEMPERATURE = 0.3;
const REQUEST_TIMEOUT_MS = 60_000;

export function buildExerciseSystemPrompt(): string {
  return 'You are a senior physical therapist specializing in knee rehabilitation.';
}

export function describePainPoints(profile: PatientProfile): string {
  if (profile.pain_points.length === 0) {
    return 'No specific pain points mentioned.';
  }
  const descriptions = profile.pain_points.map(
    (painPoint) => `${painPoint.description} (severity: ${painPoint.severity}/10)`
  );
  return `Pain points: ${descriptions.join('; ')}`;
}

export function buildExercisePrompt(profile: PatientProfile): string {
  const name = profile.name.trim() !== '' ? profile.name : 'the patient';
  const age = profile.age !== null ? String(profile.age) : 'unknown age';
  const frequency = profile.exercise_frequency !== '' ? profile.exercise_frequency : 'daily';

  return `I need to generate personalized knee rehabilitation exercises for a patient with the following profile:

Name: ${name}
Age: ${age}
Exercise frequency: ${frequency}
${describePainPoints(profile)}

Please provide 3-5 evidence-based exercises appropriate for knee rehabilitation for this specific patient.
Consider standard physical therapy protocols and clinical practice guidelines.

For each exercise, include:
1. A clear name
2. A concise description
3. Target joints (list of joint names)
4. Step-by-step instructions (list of steps)

Do not include video links; demonstration videos are attached separately.

Format your response as a JSON array following this structure:
[
  {
    "name": "Exercise Name",
    "description": "Brief description of the exercise",
    "target_joints": ["knee", "ankle"],
    "instructions": ["Step 1", "Step 2", "Step 3"]
  }
]

Respond ONLY with the JSON array and nothing else.`;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

abstract class BaseExerciseProvider implements ExerciseGenerationProvider {
  abstract readonly name: string;

  protected abstract complete(system: string, prompt: string): Promise<string>;

  async generate(profile: PatientProfile): Promise<ExerciseProposal[]> {
    const prompt = buildExercisePrompt(profile);
    const start = Date.now();

    let content: string;
    try {
      content = await this.complete(buildExerciseSystemPrompt(), prompt);
    } catch (err) {
      if (err instanceof GenerationError) {
        throw err;
      }
      warn('generation:provider_failed', {
        phase: 'provider_call',
        provider: this.name,
        error_message: describeError(err),
      });
      throw new GenerationError(`${this.name} request failed: ${describeError(err)}`);
    }

    info('generation:provider_call', {
      phase: 'provider_call',
      provider: this.name,
      elapsed_ms: Date.now() - start,
      response_chars: content.length,
    });

    if (content.trim() === '') {
      throw new GenerationError(`${this.name} returned an empty response`);
    }

    const proposals = parseExerciseProposals(content);
    info('generation:parsed_ok', {
      phase: 'parse_response',
      provider: this.name,
      proposal_count: proposals.length,
    });
    return proposals;
  }
}

export class OpenAiExerciseProvider extends BaseExerciseProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    super();
    this.client = new OpenAI({ apiKey, timeout: REQUEST_TIMEOUT_MS });
  }

  protected async complete(system: string, prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: OPENAI_MODEL,
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
    });
    return response.choices[0]?.message?.content ?? '';
  }
}

export class AnthropicExerciseProvider extends BaseExerciseProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    super();
    this.client = new Anthropic({ apiKey, timeout: REQUEST_TIMEOUT_MS });
  }

  protected async complete(system: string, prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: ANTHROPIC_MODEL,
      max_tokens: MAX_TOKENS,
      temperature: TEMPERATURE,
      system,
      messages: [{ role: 'user', content: prompt }],
    });
    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}

/**
 * Picks the backend for a request tag. The key is read from the secret store
 * on every call so rotated secrets apply to the next request.
 */
export function createGenerationProvider(
  tag: GenerationProviderTag,
  secrets: SecretStore
): ExerciseGenerationProvider {
  switch (tag) {
    case 'A':
      return new OpenAiExerciseProvider(secrets.get(OPENAI_API_KEY_SECRET));
    case 'B':
      return new AnthropicExerciseProvider(secrets.get(ANTHROPIC_API_KEY_SECRET));
  }
}
