import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PersistError } from "./errors.js";
import type { FingerprintStore, Snapshot, WatchTarget } from "./types.js";
import { sha256 } from "./utils.js";

export const TEXT_FILE = "previous.txt";
export const HASH_FILE = "previous.sha256";

export function hashText(text: string): string {
  return sha256(text);
}

export function toSnapshot(text: string): Snapshot {
  return { text, hash: hashText(text) };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Keeps the last snapshot as two files in the target's state directory.
 * The hash file is for operators; load always rehashes the text.
 */
export class FileFingerprintStore implements FingerprintStore {
  async load(target: WatchTarget): Promise<Snapshot | null> {
    const file = path.join(target.location, TEXT_FILE);
    try {
      const text = await fs.readFile(file, "utf8");
      return toSnapshot(text);
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistError("load", file, err);
    }
  }

  async save(target: WatchTarget, snapshot: Snapshot): Promise<void> {
    try {
      await fs.mkdir(target.location, { recursive: true });
      await fs.writeFile(path.join(target.location, TEXT_FILE), snapshot.text, "utf8");
      await fs.writeFile(path.join(target.location, HASH_FILE), snapshot.hash, "utf8");
    } catch (err) {
      throw new PersistError("save", target.location, err);
    }
  }
}

/** Minimal key/value view of a document collection. */
export interface DocumentCollection {
  get(id: string): Promise<unknown | undefined>;
  set(id: string, data: Record<string, unknown>): Promise<void>;
}

const snapshotDocSchema = z.object({
  url: z.string(),
  text: z.string(),
  hash: z.string(),
  updatedAt: z.string(),
});

/**
 * One document per watched URL, keyed by the URL's hash so that any URL
 * makes a valid document id.
 */
export class DocumentFingerprintStore implements FingerprintStore {
  constructor(private readonly docs: DocumentCollection, private readonly now: () => Date = () => new Date()) {}

  static documentId(target: WatchTarget): string {
    return sha256(target.url);
  }

  async load(target: WatchTarget): Promise<Snapshot | null> {
    const id = DocumentFingerprintStore.documentId(target);
    let data: unknown;
    try {
      data = await this.docs.get(id);
    } catch (err) {
      throw new PersistError("load", id, err);
    }
    if (data === undefined) return null;

    const parsed = snapshotDocSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistError("load", id, new Error("malformed snapshot document"));
    }
    return toSnapshot(parsed.data.text);
  }

  async save(target: WatchTarget, snapshot: Snapshot): Promise<void> {
    const id = DocumentFingerprintStore.documentId(target);
    try {
      await this.docs.set(id, {
        url: target.url,
        text: snapshot.text,
        hash: snapshot.hash,
        updatedAt: this.now().toISOString(),
      });
    } catch (err) {
      throw new PersistError("save", id, err);
    }
  }
}
