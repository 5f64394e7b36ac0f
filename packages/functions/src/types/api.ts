import type { Exercise, PatientExercise, PatientPlanEntry } from './database.js';

/** Every failure reaches the caller in this shape, never as a raw exception. */
export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

export type RecommendationSource = 'cache' | 'generated';

export interface RecommendationResponse {
  status: 'success';
  exercises: Exercise[];
  source: RecommendationSource;
}

export interface PatientPlanResponse {
  status: 'success';
  patient_id: string;
  exercises: PatientPlanEntry[];
}

export interface PrescriptionUpdateResponse {
  status: 'success';
  patient_exercise: PatientExercise;
}
