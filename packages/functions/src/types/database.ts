// Patients
export interface Patient {
  id: string;
  name: string;
  age: number | null;
  exercise_frequency: string;
  created_at: string;
  updated_at: string;
}

export interface PainPoint {
  id: string;
  patient_id: string;
  description: string;
  /** 1-10 */
  severity: number;
  created_at: string;
}

/** A patient together with its pain points, fixed for one pipeline run. */
export interface PatientProfile extends Patient {
  pain_points: readonly PainPoint[];
}

// Exercises
export const EXERCISE_SOURCES = ['template', 'llm-generated', 'pt-created'] as const;
export type ExerciseSource = (typeof EXERCISE_SOURCES)[number];

export interface Exercise {
  id: string;
  /** Dedup key: unique within the store, exact case-sensitive match. */
  name: string;
  description: string;
  target_joints: string[];
  instructions: string[];
  /** Empty string until a validated video has been attached. */
  video_url: string;
  video_thumbnail_url: string;
  source: ExerciseSource;
  is_template: boolean;
  created_at: string;
  updated_at?: string;
}

export type CreateExerciseDTO = Omit<Exercise, 'id' | 'created_at' | 'updated_at'>;

export interface ExerciseMediaBackfill {
  video_url?: string;
  video_thumbnail_url?: string;
}

// Patient exercises
export interface Prescription {
  frequency: string;
  sets: number;
  repetitions: number;
  notes: string;
}

export const DEFAULT_PRESCRIPTION: Readonly<Prescription> = {
  frequency: 'daily',
  sets: 3,
  repetitions: 10,
  notes: '',
};

export interface PatientExercise extends Prescription {
  id: string;
  patient_id: string;
  exercise_id: string;
  recommended_at: string;
  pt_modified: boolean;
  pt_id: string | null;
  updated_at?: string;
}

export interface CreatePatientExerciseDTO {
  patient_id: string;
  exercise_id: string;
}

export interface UpdatePrescriptionDTO {
  frequency?: string;
  sets?: number;
  repetitions?: number;
  notes?: string;
  pt_id?: string;
}

export interface PatientPlanEntry {
  patient_exercise: PatientExercise;
  exercise: Exercise;
}
