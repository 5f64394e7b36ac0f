export {
  type MockDocumentSnapshot,
  type MockQueryDocumentSnapshot,
  type MockQuerySnapshot,
  type FirestoreMocks,
  createMockDoc,
  createMockQuerySnapshot,
  createFirestoreMocks,
  setupFirebaseMock,
} from './firestore-mock.js';
export { InMemoryFirestore, type WriteRecord } from './in-memory-firestore.js';
