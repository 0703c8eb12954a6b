import fs from 'node:fs';
import admin from 'firebase-admin';
import { getEnv } from './env.js';

let app: admin.app.App | undefined;
let db: admin.firestore.Firestore | undefined;

function readServiceAccount(): admin.ServiceAccount | undefined {
  const env = getEnv();

  // Inline JSON wins over a path so CI can inject credentials without touching disk.
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    return JSON.parse(env.FIREBASE_SERVICE_ACCOUNT_JSON) as admin.ServiceAccount;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    return JSON.parse(
      fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' })
    ) as admin.ServiceAccount;
  }

  return undefined;
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();
  const serviceAccount = readServiceAccount();

  app = admin.initializeApp({
    // Fallback to ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS or the emulator)
    credential: serviceAccount ? admin.credential.cert(serviceAccount) : admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  if (db) return db;
  initFirebaseApp();
  db = admin.firestore();
  // Optional candidate fields (email, rating, ...) are left undefined rather than null.
  db.settings({ ignoreUndefinedProperties: true });
  return db;
}

export function nowTimestamp(): admin.firestore.Timestamp {
  return admin.firestore.Timestamp.now();
}

export function timestampToIso(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value instanceof admin.firestore.Timestamp) return value.toDate().toISOString();
  return undefined;
}
