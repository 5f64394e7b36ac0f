import type { Firestore } from 'firebase-admin/firestore';
import {
  DEFAULT_PRESCRIPTION,
  type CreatePatientExerciseDTO,
  type PatientExercise,
  type UpdatePrescriptionDTO,
} from '../types/database.js';
import { BaseRepository } from './base.repository.js';
import {
  readBoolean,
  readNullableString,
  readNumber,
  readString,
  readTimestamp,
} from './firestore-type-guards.js';

export class PatientExerciseRepository extends BaseRepository<
  PatientExercise,
  UpdatePrescriptionDTO & { pt_modified?: boolean }
> {
  constructor(db?: Firestore) {
    super('patient_exercises', db);
  }

  async create(data: CreatePatientExerciseDTO): Promise<PatientExercise> {
    return this.insert({
      id: this.generateId(),
      patient_id: data.patient_id,
      exercise_id: data.exercise_id,
      recommended_at: this.createTimestamp(),
      pt_modified: false,
      pt_id: null,
      ...DEFAULT_PRESCRIPTION,
    });
  }

  protected parseEntity(id: string, data: Record<string, unknown>): PatientExercise | null {
    const patientId = readString(data, 'patient_id');
    const exerciseId = readString(data, 'exercise_id');
    if (patientId === null || exerciseId === null) {
      return null;
    }

    const updatedAt = readTimestamp(data, 'updated_at');
    return {
      id,
      patient_id: patientId,
      exercise_id: exerciseId,
      recommended_at: readTimestamp(data, 'recommended_at') ?? '',
      pt_modified: readBoolean(data, 'pt_modified') ?? false,
      pt_id: readNullableString(data, 'pt_id') ?? null,
      frequency: readString(data, 'frequency') ?? DEFAULT_PRESCRIPTION.frequency,
      sets: readNumber(data, 'sets') ?? DEFAULT_PRESCRIPTION.sets,
      repetitions: readNumber(data, 'repetitions') ?? DEFAULT_PRESCRIPTION.repetitions,
      notes: readString(data, 'notes') ?? DEFAULT_PRESCRIPTION.notes,
      ...(updatedAt !== null ? { updated_at: updatedAt } : {}),
    };
  }

  async findByPatientId(patientId: string): Promise<PatientExercise[]> {
    const links = await this.queryEntities(
      this.collection.where('patient_id', '==', patientId)
    );
    return links.sort((a, b) => a.recommended_at.localeCompare(b.recommended_at));
  }

  /** Clinician adjustment of a prescription; marks the link as modified. */
  async updatePrescription(id: string, data: UpdatePrescriptionDTO): Promise<PatientExercise | null> {
    return this.update(id, { ...data, pt_modified: true });
  }
}
