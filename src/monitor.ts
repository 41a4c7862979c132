import { diffTexts } from "./diff.js";
import { FetchError, NotifyError, PersistError, WatchError, describeError } from "./errors.js";
import { type Logger, logger as defaultLogger } from "./logger.js";
import { normalize } from "./normalize.js";
import { toSnapshot } from "./store.js";
import type {
  FingerprintStore,
  ChangeEvent,
  Notifier,
  NotifyResult,
  PageFetcher,
  PipelineStage,
  RunResult,
  Snapshot,
  WatchTarget,
} from "./types.js";

export interface WatchSettings {
  target: WatchTarget;
  maxDiffLines: number;
}

export interface PipelineDeps {
  fetchPage: PageFetcher;
  store: FingerprintStore;
  notifier: Notifier;
  now?: () => Date;
  logger?: Logger;
}

/**
 * One check of one page: fetch, normalize, compare with the stored
 * snapshot, notify on change, persist. The new snapshot is persisted on
 * every changed or first run whatever the notification outcome, so a
 * failed email never causes the same change to be reported twice.
 */
export async function runWatchOnce(settings: WatchSettings, deps: PipelineDeps): Promise<RunResult> {
  const { target } = settings;
  const log = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());

  let stage: PipelineStage = "FETCHING";
  const enter = (next: PipelineStage) => {
    stage = next;
    log.debug(`${target.url}: ${next}`);
  };
  const fail = (err: WatchError): void => {
    log.error(`${target.url} [${stage}] ${err.message}`, err);
  };

  enter("FETCHING");
  let markup: string;
  try {
    markup = await deps.fetchPage(target.url);
  } catch (err) {
    const error = err instanceof FetchError ? err : new FetchError(target.url, describeError(err), null, err);
    enter("FETCH_FAILED");
    fail(error);
    return { status: "fetch_failed", target, stage, notified: null, error };
  }

  enter("NORMALIZING");
  const current = toSnapshot(normalize(markup));

  enter("COMPARING");
  let previous: Snapshot | null;
  try {
    previous = await deps.store.load(target);
  } catch (err) {
    const error = err instanceof PersistError ? err : new PersistError("load", target.location, err);
    fail(error);
    return { status: "persist_failed", target, stage, snapshot: current, notified: null, error };
  }

  if (previous === null) {
    enter("BOOTSTRAP");
    const error = await persist(deps.store, target, current);
    if (error) {
      fail(error);
      return { status: "persist_failed", target, stage, snapshot: current, notified: null, error };
    }
    enter("DONE");
    log.info(`Initialized state for ${target.url}`);
    return { status: "bootstrap", target, stage, snapshot: current, notified: null };
  }

  if (previous.hash === current.hash) {
    enter("NO_CHANGE");
    enter("DONE");
    log.info(`No change on ${target.url}`);
    return { status: "no_change", target, stage, snapshot: current, notified: null };
  }

  enter("CHANGED");
  const diff = diffTexts(previous.text, current.text, settings.maxDiffLines);

  enter("NOTIFYING");
  const sent = await notify(deps.notifier, { target, previous, current, diff, detectedAt: now() });
  if (sent.ok) {
    log.info(`Change on ${target.url} notified (message ${sent.id})`);
  } else {
    fail(sent.error);
  }

  enter("PERSISTING");
  const persistError = await persist(deps.store, target, current);
  if (persistError) {
    // Most severe recoverable case: the next run will report this change again
    fail(persistError);
    return { status: "persist_failed", target, stage, snapshot: current, diff, notified: sent.ok, error: persistError };
  }

  enter("DONE");
  if (sent.ok) {
    return { status: "change_notified", target, stage, snapshot: current, diff, notified: true };
  }
  return { status: "change_notify_failed", target, stage, snapshot: current, diff, notified: false, error: sent.error };
}

// A rejecting notifier must not keep the snapshot from being persisted
async function notify(notifier: Notifier, event: ChangeEvent): Promise<NotifyResult> {
  try {
    return await notifier.notify(event);
  } catch (err) {
    return { ok: false, error: err instanceof NotifyError ? err : new NotifyError(describeError(err), null, err) };
  }
}

async function persist(store: FingerprintStore, target: WatchTarget, snapshot: Snapshot): Promise<PersistError | null> {
  try {
    await store.save(target, snapshot);
    return null;
  } catch (err) {
    return err instanceof PersistError ? err : new PersistError("save", target.location, err);
  }
}
