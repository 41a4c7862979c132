import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { EnvInput } from "./config.js";
import { main } from "./main.js";
import { type StubServer, sendJson, startStubServer } from "./testing/stub-server.js";

const required: EnvInput = {
  WATCH_URL: "https://example.com/changelog",
  RESEND_API_KEY: "test-secret",
  TO_EMAIL: "ops@example.com",
  FROM_EMAIL: "Alerts <alerts@example.com>",
};

describe("main", () => {
  it("exits with the config code when required settings are missing", async () => {
    expect(await main({})).toBe(2);
  });

  it("exits with the config code when the store cannot be set up", async () => {
    const code = await main(required, {
      createStore: () => {
        throw new Error("Failed to parse private key");
      },
    });
    expect(code).toBe(2);
  });

  it("exits with the config code when the firestore credentials file is missing", async () => {
    const code = await main({
      ...required,
      STORE_BACKEND: "firestore",
      GOOGLE_APPLICATION_CREDENTIALS: "/nonexistent/sa.json",
    });
    expect(code).toBe(2);
  });

  describe("against a page and an email endpoint", () => {
    let root: string;
    let page: StubServer;
    let email: StubServer;
    let body = "<html><body><p>Hello</p></body></html>";

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), "page-watch-"));
      page = await startStubServer((_req, res) => {
        res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
        res.end(body);
      });
      email = await startStubServer((_req, res) => sendJson(res, 200, { id: "email-1" }));
    });

    afterEach(async () => {
      await page.close();
      await email.close();
      await fs.rm(root, { recursive: true, force: true });
    });

    it("bootstraps, then notifies on a change, then reports no change", async () => {
      const env: EnvInput = {
        ...required,
        WATCH_URL: `${page.url}/news`,
        RESEND_ENDPOINT: `${email.url}/emails`,
        STATE_DIR: path.join(root, "state"),
      };

      expect(await main(env)).toBe(10);
      expect(email.requests).toHaveLength(0);

      body = "<html><body><p>Hello</p><p>World</p></body></html>";
      expect(await main(env)).toBe(11);
      expect(email.requests).toHaveLength(1);

      expect(await main(env)).toBe(0);
      expect(email.requests).toHaveLength(1);
      expect(await fs.readFile(path.join(root, "state", "previous.txt"), "utf8")).toBe("Hello\nWorld");
    });
  });
});
