import { randomUUID } from 'node:crypto';
import {
  type Firestore,
  type CollectionReference,
  type DocumentData,
  type DocumentSnapshot,
  type Query,
} from 'firebase-admin/firestore';
import { getFirestoreDb, getCollectionName } from '../firebase.js';
import { isRecord } from './firestore-type-guards.js';

export abstract class BaseRepository<T extends { id: string }, UpdateDTO extends object = Partial<T>> {
  protected db: Firestore;
  protected collectionName: string;
  protected includeTimestampOnUpdate = true;

  constructor(collectionName: string, db?: Firestore) {
    this.db = db ?? getFirestoreDb();
    this.collectionName = getCollectionName(collectionName);
  }

  protected get collection(): CollectionReference<DocumentData> {
    return this.db.collection(this.collectionName);
  }

  protected abstract parseEntity(id: string, data: Record<string, unknown>): T | null;

  async findById(id: string): Promise<T | null> {
    const doc = await this.collection.doc(id).get();
    if (!doc.exists) {
      return null;
    }

    return this.docToEntity(doc);
  }

  async update(id: string, data: UpdateDTO): Promise<T | null> {
    const existing = await this.findById(id);
    if (!existing) {
      return null;
    }

    const updates = this.buildUpdatePayload(data);

    if (Object.keys(updates).length === 0) {
      return existing;
    }

    if (this.includeTimestampOnUpdate) {
      updates['updated_at'] = this.updateTimestamp();
    }

    await this.collection.doc(id).update(updates);
    return this.findById(id);
  }

  protected buildUpdatePayload(data: UpdateDTO): Record<string, unknown> {
    const updates: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        updates[key] = value;
      }
    }
    return updates;
  }

  /**
   * Documents carry their own `id` field alongside the document key, so ids
   * are generated here and written with `set` rather than `add`.
   */
  protected async insert(entity: T): Promise<T> {
    await this.collection.doc(entity.id).set(entity);
    return entity;
  }

  protected generateId(): string {
    return randomUUID();
  }

  protected async queryEntities(query: Query<DocumentData>): Promise<T[]> {
    const snapshot = await query.get();
    return snapshot.docs
      .map((doc) => {
        const data = doc.data();
        if (!isRecord(data)) {
          return null;
        }
        return this.parseEntity(doc.id, data);
      })
      .filter((entity): entity is T => entity !== null);
  }

  protected updateTimestamp(): string {
    return new Date().toISOString();
  }

  protected createTimestamp(): string {
    return new Date().toISOString();
  }

  protected docToEntity(doc: DocumentSnapshot<DocumentData>): T | null {
    const data = doc.data();
    if (!isRecord(data)) {
      return null;
    }
    return this.parseEntity(doc.id, data);
  }
}
