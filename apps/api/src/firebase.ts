import fs from 'node:fs';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getEnv } from './env.js';

let app: admin.app.App | undefined;

const serviceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

function readServiceAccount(json: string): admin.ServiceAccount {
  const parsed = serviceAccountSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new Error(`Invalid Firebase service account: ${parsed.error.message}`);
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key
  };
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  // Prefer explicit service account json (useful for CI and simple local setup)
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    app = admin.initializeApp({
      credential: admin.credential.cert(readServiceAccount(env.FIREBASE_SERVICE_ACCOUNT_JSON))
    });
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const json = fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' });
    app = admin.initializeApp({
      credential: admin.credential.cert(readServiceAccount(json))
    });
    return app;
  }

  // Fallback to ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore() {
  initFirebaseApp();
  return admin.firestore();
}
