/**
 * Test data fixtures and factory functions.
 *
 * These functions create properly typed test data with sensible defaults
 * that can be overridden for specific test scenarios.
 */

import type {
  Exercise,
  PainPoint,
  Patient,
  PatientExercise,
  PatientProfile,
} from '../../types/database.js';
import type { ExerciseProposal } from '../../types/generation.js';
import type { EnrichedProposal } from '../../types/video.js';

// ============ Counter for unique IDs ============

let idCounter = 0;

function generateId(prefix: string = 'test'): string {
  idCounter++;
  return `${prefix}-${idCounter}`;
}

/**
 * Reset the ID counter between test runs.
 * Call this in beforeEach to ensure deterministic IDs.
 */
export function resetIdCounter(): void {
  idCounter = 0;
}

const FIXED_TIMESTAMP = '2024-01-01T00:00:00.000Z';

// ============ Patients ============

export function createPatient(overrides: Partial<Patient> = {}): Patient {
  return {
    id: generateId('patient'),
    name: 'Jordan Lee',
    age: 52,
    exercise_frequency: 'daily',
    created_at: FIXED_TIMESTAMP,
    updated_at: FIXED_TIMESTAMP,
    ...overrides,
  };
}

export function createPainPoint(overrides: Partial<PainPoint> = {}): PainPoint {
  return {
    id: generateId('pain'),
    patient_id: 'patient-1',
    description: 'Pain behind kneecap when climbing stairs',
    severity: 6,
    created_at: FIXED_TIMESTAMP,
    ...overrides,
  };
}

export function createPatientProfile(
  overrides: Partial<PatientProfile> = {}
): PatientProfile {
  return {
    ...createPatient({ id: 'patient-1' }),
    pain_points: [createPainPoint()],
    ...overrides,
  };
}

// ============ Exercises ============

export function createExercise(overrides: Partial<Exercise> = {}): Exercise {
  return {
    id: generateId('exercise'),
    name: 'Heel Slides',
    description: 'Improve knee flexion while lying down',
    target_joints: ['knee'],
    instructions: ['Lie on your back', 'Slide your heel toward you', 'Return slowly'],
    video_url: '',
    video_thumbnail_url: '',
    source: 'llm-generated',
    is_template: false,
    created_at: FIXED_TIMESTAMP,
    ...overrides,
  };
}

export function createPatientExercise(
  overrides: Partial<PatientExercise> = {}
): PatientExercise {
  return {
    id: generateId('patient-exercise'),
    patient_id: 'patient-1',
    exercise_id: 'exercise-1',
    recommended_at: FIXED_TIMESTAMP,
    pt_modified: false,
    pt_id: null,
    frequency: 'daily',
    sets: 3,
    repetitions: 10,
    notes: '',
    ...overrides,
  };
}

// ============ Proposals ============

export function createProposal(overrides: Partial<ExerciseProposal> = {}): ExerciseProposal {
  return {
    name: 'Straight Leg Raise',
    description: 'Strengthen the quadriceps without bending the knee',
    target_joints: ['knee', 'hip'],
    instructions: ['Lie on your back', 'Lift the straight leg', 'Lower slowly'],
    ...overrides,
  };
}

export function createEnrichedProposal(
  overrides: Partial<EnrichedProposal> = {}
): EnrichedProposal {
  return {
    ...createProposal(),
    video_url: 'https://www.youtube.com/watch?v=abcdefghijk',
    video_thumbnail_url: 'https://img.youtube.com/vi/abcdefghijk/hqdefault.jpg',
    ...overrides,
  };
}
