import type { PatientProfile } from '../types/database.js';
import { NotFoundError } from '../types/errors.js';
import type { PatientRepository } from '../repositories/patient.repository.js';
import type { PainPointRepository } from '../repositories/pain-point.repository.js';

export interface PatientProfileDeps {
  patients: Pick<PatientRepository, 'findById'>;
  painPoints: Pick<PainPointRepository, 'findByPatientId'>;
}

/**
 * Loads a patient and its pain points. Read-only.
 *
 * @throws NotFoundError when the patient id does not resolve
 */
export async function loadPatientProfile(
  deps: PatientProfileDeps,
  patientId: string
): Promise<PatientProfile> {
  const patient = await deps.patients.findById(patientId);
  if (patient === null) {
    throw new NotFoundError('Patient', patientId);
  }

  const painPoints = await deps.painPoints.findByPatientId(patientId);
  return { ...patient, pain_points: painPoints };
}
