/**
 * Minimal in-process Firestore stand-in for pipeline tests.
 *
 * Covers what the repositories use: doc get/set/update, equality `where`,
 * `limit` and query `get`. Records every write so tests can assert on
 * exactly what reached the store.
 */

import type { Firestore } from 'firebase-admin/firestore';

type DocData = Record<string, unknown>;

export interface WriteRecord {
  collection: string;
  id: string;
  op: 'set' | 'update';
  data: DocData;
}

interface Filter {
  field: string;
  value: unknown;
}

export class InMemoryFirestore {
  private readonly collections = new Map<string, Map<string, DocData>>();
  private readonly failingCollections = new Set<string>();
  readonly writes: WriteRecord[] = [];
  readCount = 0;

  seed(collection: string, id: string, data: DocData): void {
    this.store(collection).set(id, structuredClone(data));
  }

  all(collection: string): Array<{ id: string } & DocData> {
    return [...this.store(collection).entries()].map(([id, data]) => ({ id, ...data }));
  }

  get(collection: string, id: string): DocData | undefined {
    return this.store(collection).get(id);
  }

  /** Every subsequent write to the collection rejects. */
  failWritesTo(collection: string): void {
    this.failingCollections.add(collection);
  }

  asFirestore(): Firestore {
    return this as unknown as Firestore;
  }

  collection(name: string): InMemoryQuery & { doc: (id: string) => InMemoryDocRef } {
    const query = new InMemoryQuery(this, name, [], null);
    return Object.assign(query, {
      doc: (id: string): InMemoryDocRef => new InMemoryDocRef(this, name, id),
    });
  }

  store(collection: string): Map<string, DocData> {
    let docs = this.collections.get(collection);
    if (docs === undefined) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    return docs;
  }

  assertWritable(collection: string): void {
    if (this.failingCollections.has(collection)) {
      throw new Error(`Simulated write failure on ${collection}`);
    }
  }
}

class InMemoryDocRef {
  constructor(
    private readonly db: InMemoryFirestore,
    private readonly collectionName: string,
    readonly id: string
  ) {}

  get(): Promise<{ id: string; exists: boolean; data: () => DocData | undefined }> {
    this.db.readCount++;
    const data = this.db.store(this.collectionName).get(this.id);
    return Promise.resolve({
      id: this.id,
      exists: data !== undefined,
      data: () => (data !== undefined ? structuredClone(data) : undefined),
    });
  }

  set(data: DocData): Promise<void> {
    this.db.assertWritable(this.collectionName);
    const copy = structuredClone(data);
    this.db.store(this.collectionName).set(this.id, copy);
    this.db.writes.push({ collection: this.collectionName, id: this.id, op: 'set', data: copy });
    return Promise.resolve();
  }

  update(data: DocData): Promise<void> {
    this.db.assertWritable(this.collectionName);
    const docs = this.db.store(this.collectionName);
    const existing = docs.get(this.id);
    if (existing === undefined) {
      return Promise.reject(new Error(`No document to update: ${this.collectionName}/${this.id}`));
    }
    const copy = structuredClone(data);
    docs.set(this.id, { ...existing, ...copy });
    this.db.writes.push({ collection: this.collectionName, id: this.id, op: 'update', data: copy });
    return Promise.resolve();
  }
}

class InMemoryQuery {
  constructor(
    protected readonly db: InMemoryFirestore,
    protected readonly collectionName: string,
    private readonly filters: Filter[],
    private readonly max: number | null
  ) {}

  where(field: string, _op: '==', value: unknown): InMemoryQuery {
    return new InMemoryQuery(this.db, this.collectionName, [...this.filters, { field, value }], this.max);
  }

  limit(max: number): InMemoryQuery {
    return new InMemoryQuery(this.db, this.collectionName, this.filters, max);
  }

  get(): Promise<{ empty: boolean; size: number; docs: Array<{ id: string; data: () => DocData }> }> {
    this.db.readCount++;
    const matches = [...this.db.store(this.collectionName).entries()]
      .filter(([, data]) => this.filters.every((filter) => data[filter.field] === filter.value))
      .slice(0, this.max ?? undefined)
      .map(([id, data]) => ({ id, data: () => structuredClone(data) }));
    return Promise.resolve({ empty: matches.length === 0, size: matches.length, docs: matches });
  }
}
