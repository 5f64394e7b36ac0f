import type { Firestore } from 'firebase-admin/firestore';
import type { PainPoint } from '../types/database.js';
import { BaseRepository } from './base.repository.js';
import { readNumber, readString, readTimestamp } from './firestore-type-guards.js';

const DEFAULT_SEVERITY = 5;
const DEFAULT_DESCRIPTION = 'knee pain';

export class PainPointRepository extends BaseRepository<PainPoint> {
  constructor(db?: Firestore) {
    super('pain_points', db);
  }

  protected parseEntity(id: string, data: Record<string, unknown>): PainPoint | null {
    const patientId = readString(data, 'patient_id');
    if (patientId === null) {
      return null;
    }

    return {
      id,
      patient_id: patientId,
      description: readString(data, 'description') ?? DEFAULT_DESCRIPTION,
      severity: readNumber(data, 'severity') ?? DEFAULT_SEVERITY,
      created_at: readTimestamp(data, 'created_at') ?? '',
    };
  }

  async findByPatientId(patientId: string): Promise<PainPoint[]> {
    const painPoints = await this.queryEntities(
      this.collection.where('patient_id', '==', patientId)
    );
    return painPoints.sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  async hasPainPoints(patientId: string): Promise<boolean> {
    const snapshot = await this.collection
      .where('patient_id', '==', patientId)
      .limit(1)
      .get();
    return !snapshot.empty;
  }
}
