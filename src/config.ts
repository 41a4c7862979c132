import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { WatchTarget } from "./types.js";
import { splitRecipients } from "./utils.js";

export const DEFAULT_RESEND_ENDPOINT = "https://api.resend.com/emails";
export const DEFAULT_MAX_DIFF_LINES = 2000;

const positiveInt = (fallback: string, min = 1) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v.trim()))
    .pipe(z.number().int().min(min));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const schema = z
  .object({
    WATCH_URL: z.string().url(),
    RESEND_API_KEY: z.string().trim().min(1),
    TO_EMAIL: z
      .string()
      .transform(splitRecipients)
      .pipe(z.array(z.string()).min(1, "at least one recipient is required")),
    FROM_EMAIL: z.string().trim().min(1),
    STATE_DIR: z.string().trim().min(1).default(".watch_state"),
    REQUEST_TIMEOUT: positiveInt("20"),
    SUBJECT_PREFIX: z.string().default("[Page Watch]"),
    USER_AGENT: optionalText,
    MAX_DIFF_LINES: positiveInt(String(DEFAULT_MAX_DIFF_LINES), 2),
    RESEND_ENDPOINT: z.string().url().default(DEFAULT_RESEND_ENDPOINT),
    STORE_BACKEND: z.enum(["file", "firestore"]).default("file"),
    FIRESTORE_COLLECTION: z.string().trim().min(1).default("page_watch_snapshots"),
    GOOGLE_APPLICATION_CREDENTIALS: optionalText,
    FIREBASE_SERVICE_ACCOUNT_JSON: optionalText,
  })
  .superRefine((env, ctx) => {
    if (
      env.STORE_BACKEND === "firestore" &&
      !env.GOOGLE_APPLICATION_CREDENTIALS &&
      !env.FIREBASE_SERVICE_ACCOUNT_JSON
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FIREBASE_SERVICE_ACCOUNT_JSON"],
        message: "firestore backend needs FIREBASE_SERVICE_ACCOUNT_JSON or GOOGLE_APPLICATION_CREDENTIALS",
      });
    }
  });

export type EnvInput = Record<string, string | undefined>;

export interface FetchSettings {
  timeoutMs: number;
  userAgent?: string;
}

export interface EmailSettings {
  apiKey: string;
  endpoint: string;
  from: string;
  to: string[];
  subjectPrefix: string;
  timeoutMs: number;
}

export type StoreSettings =
  | { backend: "file" }
  | {
      backend: "firestore";
      collection: string;
      credentialsPath?: string;
      serviceAccountJson?: string;
    };

export interface AppConfig {
  target: WatchTarget;
  fetch: FetchSettings;
  email: EmailSettings;
  store: StoreSettings;
  maxDiffLines: number;
}

export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Keys and messages only, never values
    const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new ConfigError(issues);
  }

  const c = parsed.data;
  const timeoutMs = c.REQUEST_TIMEOUT * 1000;

  const config: AppConfig = {
    target: { url: c.WATCH_URL, location: c.STATE_DIR },
    fetch: { timeoutMs, userAgent: c.USER_AGENT },
    email: {
      apiKey: c.RESEND_API_KEY,
      endpoint: c.RESEND_ENDPOINT,
      from: c.FROM_EMAIL,
      to: c.TO_EMAIL,
      subjectPrefix: c.SUBJECT_PREFIX,
      timeoutMs,
    },
    store:
      c.STORE_BACKEND === "firestore"
        ? {
            backend: "firestore",
            collection: c.FIRESTORE_COLLECTION,
            credentialsPath: c.GOOGLE_APPLICATION_CREDENTIALS,
            serviceAccountJson: c.FIREBASE_SERVICE_ACCOUNT_JSON,
          }
        : { backend: "file" },
    maxDiffLines: c.MAX_DIFF_LINES,
  };
  return Object.freeze(config);
}
