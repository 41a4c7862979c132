import axios from "axios";
import type { FetchSettings } from "./config.js";
import { FetchError, describeError } from "./errors.js";
import type { PageFetcher } from "./types.js";

const MAX_REDIRECTS = 5;
const DEFAULT_CHARSET = "utf-8";

export function charsetOf(contentType: unknown): string {
  if (typeof contentType !== "string") return DEFAULT_CHARSET;
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match?.[1]?.toLowerCase() ?? DEFAULT_CHARSET;
}

// Labels follow the WHATWG Encoding Standard; unknown ones fall back to UTF-8
export function decodeBody(body: ArrayBuffer | Uint8Array, charset: string): string {
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder(DEFAULT_CHARSET);
  }
  return decoder.decode(body);
}

export async function fetchPage(url: string, settings: FetchSettings): Promise<string> {
  const headers: Record<string, string> = {};
  if (settings.userAgent) {
    headers["User-Agent"] = settings.userAgent;
  }

  try {
    const res = await axios.get<ArrayBuffer>(url, {
      headers,
      timeout: settings.timeoutMs,
      maxRedirects: MAX_REDIRECTS,
      responseType: "arraybuffer",
      validateStatus: (status) => status >= 200 && status < 300,
    });
    return decodeBody(res.data, charsetOf(res.headers["content-type"]));
  } catch (err) {
    if (axios.isAxiosError(err)) {
      if (err.response) {
        throw new FetchError(url, `HTTP ${err.response.status}`, err.response.status, err);
      }
      if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
        throw new FetchError(url, `timed out after ${settings.timeoutMs}ms`, null, err);
      }
    }
    throw new FetchError(url, describeError(err), null, err);
  }
}

export function createFetcher(settings: FetchSettings): PageFetcher {
  return (url) => fetchPage(url, settings);
}
