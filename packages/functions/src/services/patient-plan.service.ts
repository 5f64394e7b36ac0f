import type { PatientExercise, PatientPlanEntry, UpdatePrescriptionDTO } from '../types/database.js';
import { NotFoundError } from '../types/errors.js';
import type { ExerciseRepository } from '../repositories/exercise.repository.js';
import type { PatientExerciseRepository } from '../repositories/patient-exercise.repository.js';
import type { PatientRepository } from '../repositories/patient.repository.js';

export interface PatientPlanDeps {
  patients: Pick<PatientRepository, 'findById'>;
  exercises: Pick<ExerciseRepository, 'findById'>;
  patientExercises: Pick<PatientExerciseRepository, 'findByPatientId' | 'updatePrescription'>;
}

/**
 * Every assignment of the patient joined with its exercise, oldest first.
 * Assignments whose exercise document is gone are left out.
 */
export async function getPatientPlan(
  deps: PatientPlanDeps,
  patientId: string
): Promise<PatientPlanEntry[]> {
  const patient = await deps.patients.findById(patientId);
  if (patient === null) {
    throw new NotFoundError('Patient', patientId);
  }

  const links = await deps.patientExercises.findByPatientId(patientId);
  const entries: PatientPlanEntry[] = [];
  for (const link of links) {
    const exercise = await deps.exercises.findById(link.exercise_id);
    if (exercise !== null) {
      entries.push({ patient_exercise: link, exercise });
    }
  }
  return entries;
}

export async function updatePrescription(
  deps: PatientPlanDeps,
  patientExerciseId: string,
  changes: UpdatePrescriptionDTO
): Promise<PatientExercise> {
  const updated = await deps.patientExercises.updatePrescription(patientExerciseId, changes);
  if (updated === null) {
    throw new NotFoundError('Patient exercise', patientExerciseId);
  }
  return updated;
}
