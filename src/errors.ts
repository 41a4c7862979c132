export type WatchErrorCode = "CONFIG" | "FETCH" | "NOTIFY" | "PERSIST";

export class WatchError extends Error {
  readonly code: WatchErrorCode;

  constructor(code: WatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends WatchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join(", ")}`);
    this.issues = issues;
  }
}

export class FetchError extends WatchError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, detail: string, status: number | null = null, cause?: unknown) {
    super("FETCH", `Failed to fetch ${url}: ${detail}`, { cause });
    this.url = url;
    this.status = status;
  }
}

export class NotifyError extends WatchError {
  readonly status: number | null;
  readonly detail: string;

  constructor(detail: string, status: number | null = null, cause?: unknown) {
    super("NOTIFY", status === null ? `Notification failed: ${detail}` : `Notification failed (HTTP ${status}): ${detail}`, { cause });
    this.status = status;
    this.detail = detail;
  }
}

export type PersistOperation = "load" | "save";

export class PersistError extends WatchError {
  readonly operation: PersistOperation;
  readonly location: string;

  constructor(operation: PersistOperation, location: string, cause?: unknown) {
    super("PERSIST", `Failed to ${operation} snapshot at ${location}: ${describeError(cause)}`, { cause });
    this.operation = operation;
    this.location = location;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "unknown error";
  return String(err);
}
