import admin from "firebase-admin";
import type { ServiceAccount } from "firebase-admin/app";
import fs from "node:fs";
import { z } from "zod";
import type { StoreSettings } from "./config.js";
import { ConfigError } from "./errors.js";
import type { DocumentCollection } from "./store.js";

type FirestoreSettings = Extract<StoreSettings, { backend: "firestore" }>;

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function parseServiceAccount(raw: string): ServiceAccount {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(["FIREBASE_SERVICE_ACCOUNT_JSON: not valid JSON"]);
  }
  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(["FIREBASE_SERVICE_ACCOUNT_JSON: missing project_id, client_email or private_key"]);
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key,
  };
}

function initializeFirebaseAdmin(settings: FirestoreSettings): admin.app.App {
  if (admin.apps.length) {
    return admin.app();
  }

  let credential: admin.credential.Credential;

  if (settings.serviceAccountJson) {
    credential = admin.credential.cert(parseServiceAccount(settings.serviceAccountJson));
  } else if (settings.credentialsPath) {
    const p = settings.credentialsPath;
    if (!fs.existsSync(p)) {
      throw new ConfigError([`GOOGLE_APPLICATION_CREDENTIALS: file not found at ${p}`]);
    }
    credential = admin.credential.cert(p);
  } else {
    throw new ConfigError(["FIREBASE_SERVICE_ACCOUNT_JSON: firestore backend needs a credential"]);
  }

  return admin.initializeApp({ credential });
}

export function firestoreCollection(settings: FirestoreSettings): DocumentCollection {
  const firestore = admin.firestore(initializeFirebaseAdmin(settings));
  const collection = firestore.collection(settings.collection);

  return {
    async get(id) {
      const doc = await collection.doc(id).get();
      return doc.exists ? doc.data() : undefined;
    },
    async set(id, data) {
      await collection.doc(id).set(data);
    },
  };
}
