/**
 * Exercise Proposal Parser
 *
 * Turns free-text provider output into typed proposals. Kept apart from the
 * provider transports so parsing edge cases can be tested on their own.
 */

import { error as logError } from 'firebase-functions/logger';
import type { ExerciseProposal } from '../types/generation.js';
import { GenerationParseError } from '../types/errors.js';
import { isRecord, splitDelimited } from '../repositories/firestore-type-guards.js';

export const MIN_PROPOSALS = 3;
export const MAX_PROPOSALS = 5;

const JOINT_DELIMITER = ',';
const INSTRUCTION_DELIMITER = ';';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

/**
 * Extracts the JSON array text from a response, tolerating a code fence
 * and leading or trailing prose around a bare array.
 */
export function extractJsonArrayText(content: string): string {
  const fenced = FENCED_BLOCK.exec(content);
  if (fenced?.[1] !== undefined) {
    return fenced[1];
  }

  const start = content.indexOf('[');
  const end = content.lastIndexOf(']');
  if (start !== -1 && end > start) {
    return content.slice(start, end + 1);
  }

  return content.trim();
}

function normalizeList(value: unknown, delimiter: string): string[] {
  if (typeof value === 'string') {
    return splitDelimited(value, delimiter);
  }
  if (Array.isArray(value)) {
    return value
      .filter((entry): entry is string => typeof entry === 'string')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  return [];
}

function toProposal(raw: unknown, index: number): ExerciseProposal {
  if (!isRecord(raw)) {
    throw new GenerationParseError(`Proposal ${index} is not an object`);
  }

  const name = typeof raw['name'] === 'string' ? raw['name'].trim() : '';
  if (name === '') {
    throw new GenerationParseError(`Proposal ${index} is missing a name`);
  }

  // Any video_url the model volunteers is dropped; media comes from enrichment only.
  return {
    name,
    description: typeof raw['description'] === 'string' ? raw['description'].trim() : '',
    target_joints: normalizeList(raw['target_joints'], JOINT_DELIMITER),
    instructions: normalizeList(raw['instructions'], INSTRUCTION_DELIMITER),
  };
}

export function parseExerciseProposals(content: string): ExerciseProposal[] {
  if (content.trim() === '') {
    throw new GenerationParseError('Provider returned an empty response');
  }

  const jsonText = extractJsonArrayText(content);

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    // Raw model output stays in the logs, never in the response body.
    logError('generation:parse_failed', {
      phase: 'parse_response',
      error_message: message,
      response_preview: content.substring(0, 500),
    });
    throw new GenerationParseError(`Provider response is not valid JSON: ${message}`);
  }

  if (!Array.isArray(parsed)) {
    throw new GenerationParseError('Provider response is not a JSON array');
  }
  if (parsed.length < MIN_PROPOSALS) {
    throw new GenerationParseError(
      `Provider returned ${parsed.length} exercises, expected at least ${MIN_PROPOSALS}`
    );
  }

  return parsed.slice(0, MAX_PROPOSALS).map((raw, index) => toProposal(raw, index));
}
