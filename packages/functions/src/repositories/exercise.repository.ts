import type { Firestore } from 'firebase-admin/firestore';
import {
  EXERCISE_SOURCES,
  type CreateExerciseDTO,
  type Exercise,
  type ExerciseMediaBackfill,
} from '../types/database.js';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readBoolean,
  readEnum,
  readString,
  readStringList,
  readTimestamp,
} from './firestore-type-guards.js';

export class ExerciseRepository extends BaseRepository<Exercise, ExerciseMediaBackfill> {
  constructor(db?: Firestore) {
    super('exercises', db);
  }

  async create(data: CreateExerciseDTO): Promise<Exercise> {
    return this.insert({
      id: this.generateId(),
      name: data.name,
      description: data.description,
      target_joints: data.target_joints,
      instructions: data.instructions,
      video_url: data.video_url,
      video_thumbnail_url: data.video_thumbnail_url,
      source: data.source,
      is_template: data.is_template,
      created_at: this.createTimestamp(),
    });
  }

  protected parseEntity(id: string, data: Record<string, unknown>): Exercise | null {
    const name = readString(data, 'name');
    if (name === null) {
      return null;
    }

    const isTemplate = readBoolean(data, 'is_template') ?? false;
    const updatedAt = readTimestamp(data, 'updated_at');

    return {
      id,
      name,
      description: readString(data, 'description') ?? '',
      target_joints: readStringList(data, 'target_joints', ',') ?? [],
      instructions: readStringList(data, 'instructions', ';') ?? [],
      video_url: readString(data, 'video_url') ?? '',
      video_thumbnail_url: readString(data, 'video_thumbnail_url') ?? '',
      source: readEnum(data, 'source', EXERCISE_SOURCES) ?? (isTemplate ? 'template' : 'llm-generated'),
      is_template: isTemplate,
      created_at: readTimestamp(data, 'created_at') ?? '',
      ...(updatedAt !== null ? { updated_at: updatedAt } : {}),
    };
  }

  /** Exact, case-sensitive lookup on the dedup key. */
  async findByName(name: string): Promise<Exercise | null> {
    const snapshot = await this.collection.where('name', '==', name).limit(1).get();
    if (snapshot.empty) {
      return null;
    }
    const doc = snapshot.docs[0];
    if (!doc || !isRecord(doc.data())) {
      return null;
    }
    return this.parseEntity(doc.id, doc.data());
  }

  async findTemplates(limit: number): Promise<Exercise[]> {
    return this.queryEntities(
      this.collection.where('is_template', '==', true).limit(limit)
    );
  }

  /**
   * Resolves ids one at a time, in order, dropping repeats and ids whose
   * document no longer exists.
   */
  async findByIds(ids: readonly string[]): Promise<Exercise[]> {
    const seen = new Set<string>();
    const exercises: Exercise[] = [];
    for (const id of ids) {
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);
      const exercise = await this.findById(id);
      if (exercise !== null) {
        exercises.push(exercise);
      }
    }
    return exercises;
  }
}
