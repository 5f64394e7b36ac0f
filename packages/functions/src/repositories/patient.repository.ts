import type { Firestore } from 'firebase-admin/firestore';
import type { Patient } from '../types/database.js';
import { BaseRepository } from './base.repository.js';
import { readNumber, readString, readTimestamp } from './firestore-type-guards.js';

/**
 * Patients are written by onboarding; this service only reads them.
 */
export class PatientRepository extends BaseRepository<Patient> {
  constructor(db?: Firestore) {
    super('patients', db);
  }

  protected parseEntity(id: string, data: Record<string, unknown>): Patient | null {
    const createdAt = readTimestamp(data, 'created_at') ?? '';
    return {
      id,
      // Prompt building substitutes a neutral phrase for a blank name.
      name: readString(data, 'name') ?? '',
      age: readNumber(data, 'age'),
      exercise_frequency: readString(data, 'exercise_frequency') ?? 'daily',
      created_at: createdAt,
      updated_at: readTimestamp(data, 'updated_at') ?? createdAt,
    };
  }
}
