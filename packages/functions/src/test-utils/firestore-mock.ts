import { vi } from 'vitest';
import type {
  Firestore,
  CollectionReference,
  DocumentReference,
} from 'firebase-admin/firestore';

export interface MockDocumentSnapshot {
  id: string;
  exists: boolean;
  data: () => Record<string, unknown> | undefined;
}

export interface MockQueryDocumentSnapshot {
  id: string;
  data: () => Record<string, unknown>;
}

export interface MockQuerySnapshot {
  empty: boolean;
  docs: MockQueryDocumentSnapshot[];
}

export interface MockFirestoreQuery {
  where: ReturnType<typeof vi.fn>;
  limit: ReturnType<typeof vi.fn>;
  get: ReturnType<typeof vi.fn>;
}

export function createFirestoreQueryChain(): MockFirestoreQuery {
  const chain: MockFirestoreQuery = {
    get: vi.fn(),
    where: vi.fn(),
    limit: vi.fn(),
  };

  chain.where.mockReturnValue(chain);
  chain.limit.mockReturnValue(chain);

  return chain;
}

export function createMockDoc(
  id: string,
  data: Record<string, unknown> | null
): MockDocumentSnapshot {
  return {
    id,
    exists: data !== null,
    data: () => data ?? undefined,
  };
}

export function createMockQuerySnapshot(
  docs: Array<{ id: string; data: Record<string, unknown> }>
): MockQuerySnapshot {
  return {
    empty: docs.length === 0,
    docs: docs.map((doc) => ({
      id: doc.id,
      data: () => doc.data,
    })),
  };
}

export interface FirestoreMocks {
  mockDb: Partial<Firestore>;
  mockCollection: Partial<CollectionReference>;
  mockDocRef: Partial<DocumentReference>;
  mockQueryChain: MockFirestoreQuery;
}

/**
 * One collection and one document reference shared by every call, so tests
 * can stub `get`/`set`/`update` once and assert on the arguments.
 */
export function createFirestoreMocks(): FirestoreMocks {
  const mockQueryChain = createFirestoreQueryChain();

  const mockDocRef: Partial<DocumentReference> = {
    id: 'test-id',
    get: vi.fn(),
    set: vi.fn(),
    update: vi.fn() as unknown as DocumentReference['update'],
  };

  const mockCollection: Partial<CollectionReference> = {
    doc: vi.fn().mockReturnValue(mockDocRef),
    where: mockQueryChain.where as unknown as CollectionReference['where'],
    limit: mockQueryChain.limit as unknown as CollectionReference['limit'],
    get: mockQueryChain.get as unknown as CollectionReference['get'],
  };

  const mockDb: Partial<Firestore> = {
    collection: vi.fn().mockReturnValue(mockCollection),
  };

  return { mockDb, mockCollection, mockDocRef, mockQueryChain };
}

export function setupFirebaseMock(mocks: FirestoreMocks): void {
  vi.doMock('../firebase.js', () => ({
    getFirestoreDb: vi.fn().mockReturnValue(mocks.mockDb),
    getCollectionName: vi.fn((name: string) => `test_${name}`),
  }));
}
