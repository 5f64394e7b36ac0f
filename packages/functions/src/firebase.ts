import { initializeApp, getApps } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

let db: Firestore | null = null;

export function initializeFirebase(): void {
  if (getApps().length === 0) {
    initializeApp();
  }
}

export function getFirestoreDb(): Firestore {
  if (db === null) {
    initializeFirebase();
    db = getFirestore();
  }
  return db;
}

/**
 * Dev functions (and the emulator) read and write `dev_`-prefixed collections
 * so both environments can live in one project.
 */
export function isDevEnvironment(): boolean {
  const service = process.env['K_SERVICE'] ?? '';
  return process.env['FUNCTIONS_EMULATOR'] === 'true' || service.startsWith('dev');
}

export function getCollectionName(name: string): string {
  return isDevEnvironment() ? `dev_${name}` : name;
}
