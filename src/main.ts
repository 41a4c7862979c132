import { type AppConfig, type EnvInput, loadConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { exitCodeFor } from "./exit.js";
import { createFetcher } from "./fetcher.js";
import { firestoreCollection } from "./firebase.js";
import { logger } from "./logger.js";
import { runWatchOnce } from "./monitor.js";
import { ResendNotifier } from "./resend.js";
import { DocumentFingerprintStore, FileFingerprintStore } from "./store.js";
import type { FingerprintStore } from "./types.js";

export function createStore(config: AppConfig): FingerprintStore {
  if (config.store.backend === "firestore") {
    return new DocumentFingerprintStore(firestoreCollection(config.store));
  }
  return new FileFingerprintStore();
}

export interface MainOptions {
  createStore?: (config: AppConfig) => FingerprintStore;
}

/** One watch run from environment settings; resolves to the process exit code. */
export async function main(env: EnvInput = process.env, options: MainOptions = {}): Promise<number> {
  let config: AppConfig;
  let store: FingerprintStore;
  try {
    config = loadConfig(env);
    store = (options.createStore ?? createStore)(config);
  } catch (err) {
    // Nothing has touched the network yet; any setup failure is a configuration problem
    logger.error(err instanceof ConfigError ? err.message : `Store setup failed: ${describeError(err)}`, err);
    return exitCodeFor("config_error");
  }

  const result = await runWatchOnce(config, {
    fetchPage: createFetcher(config.fetch),
    store,
    notifier: new ResendNotifier(config.email),
  });

  return exitCodeFor(result.status);
}
