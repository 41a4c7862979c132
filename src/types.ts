import type { NotifyError, WatchError } from "./errors.js";

export interface WatchTarget {
  url: string;
  location: string; // state directory for the file store
}

export interface Snapshot {
  text: string;
  hash: string; // sha256 hex of the UTF-8 text
}

export interface ChangeEvent {
  target: WatchTarget;
  previous: Snapshot;
  current: Snapshot;
  diff: string;
  detectedAt: Date;
}

export type NotifyResult =
  | { ok: true; id: string }
  | { ok: false; error: NotifyError };

export interface Notifier {
  notify(event: ChangeEvent): Promise<NotifyResult>;
}

export interface FingerprintStore {
  load(target: WatchTarget): Promise<Snapshot | null>;
  save(target: WatchTarget, snapshot: Snapshot): Promise<void>;
}

export type PageFetcher = (url: string) => Promise<string>;

export type PipelineStage =
  | "FETCHING"
  | "FETCH_FAILED"
  | "NORMALIZING"
  | "COMPARING"
  | "NO_CHANGE"
  | "BOOTSTRAP"
  | "CHANGED"
  | "NOTIFYING"
  | "PERSISTING"
  | "DONE";

export type RunStatus =
  | "no_change"
  | "bootstrap"
  | "change_notified"
  | "change_notify_failed"
  | "fetch_failed"
  | "persist_failed";

export interface RunResult {
  status: RunStatus;
  target: WatchTarget;
  stage: PipelineStage; // last stage reached
  snapshot?: Snapshot;
  diff?: string;
  notified: boolean | null; // null when no notification was attempted
  error?: WatchError;
}
