import axios from "axios";
import { z } from "zod";
import type { EmailSettings } from "./config.js";
import { NotifyError, describeError } from "./errors.js";
import type { ChangeEvent, Notifier, NotifyResult } from "./types.js";
import { escapeHtml, formatTimestamp } from "./utils.js";

export interface ChangeEmail {
  subject: string;
  html: string;
  text: string;
}

const successSchema = z.object({ id: z.string() });
const errorSchema = z.object({ message: z.string() }).passthrough();

export function buildChangeEmail(event: ChangeEvent, subjectPrefix: string): ChangeEmail {
  const ts = formatTimestamp(event.detectedAt);
  const url = event.target.url;

  const html = [
    "<div>",
    `  <p>Change detected on <a href="${escapeHtml(url)}">${escapeHtml(url)}</a> at ${escapeHtml(ts)}.</p>`,
    "  <p><strong>Unified diff</strong> (previous → current):</p>",
    `  <pre style="white-space:pre-wrap; word-wrap:break-word;">${escapeHtml(event.diff)}</pre>`,
    "</div>",
  ].join("\n");

  const text = `Change detected on ${url} at ${ts}.\n\nUnified diff (previous → current):\n\n${event.diff}`;

  return {
    subject: `${subjectPrefix} Change detected @ ${ts}`.trim(),
    html,
    text,
  };
}

function providerDetail(data: unknown): string {
  const parsed = errorSchema.safeParse(data);
  if (parsed.success) return parsed.data.message;
  if (typeof data === "string" && data.trim()) return data.trim();
  return "no error detail in response";
}

export async function sendEmailViaResend(settings: EmailSettings, email: ChangeEmail): Promise<NotifyResult> {
  let status: number;
  let data: unknown;
  try {
    const res = await axios.post<unknown>(
      settings.endpoint,
      {
        from: settings.from,
        to: settings.to,
        subject: email.subject,
        html: email.html,
        text: email.text,
      },
      {
        headers: {
          Authorization: `Bearer ${settings.apiKey}`,
          "Content-Type": "application/json",
        },
        timeout: settings.timeoutMs,
        // every status is inspected below
        validateStatus: () => true,
      },
    );
    status = res.status;
    data = res.data;
  } catch (err) {
    return { ok: false, error: new NotifyError(describeError(err), null, err) };
  }

  if (status >= 300) {
    return { ok: false, error: new NotifyError(providerDetail(data), status) };
  }

  const parsed = successSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: new NotifyError("malformed response body", status) };
  }
  return { ok: true, id: parsed.data.id };
}

export class ResendNotifier implements Notifier {
  constructor(private readonly settings: EmailSettings) {}

  notify(event: ChangeEvent): Promise<NotifyResult> {
    return sendEmailViaResend(this.settings, buildChangeEmail(event, this.settings.subjectPrefix));
  }
}
