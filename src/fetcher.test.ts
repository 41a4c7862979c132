import { afterEach, describe, expect, it } from "vitest";
import { FetchError } from "./errors.js";
import { charsetOf, fetchPage } from "./fetcher.js";
import { type StubServer, startStubServer } from "./testing/stub-server.js";

describe("fetchPage", () => {
  let server: StubServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("returns the page body and sends the custom user agent", async () => {
    server = await startStubServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.end("<html><body>Hello</body></html>");
    });

    const body = await fetchPage(`${server.url}/page`, { timeoutMs: 2000, userAgent: "page-watch-test/1.0" });

    expect(body).toBe("<html><body>Hello</body></html>");
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]?.path).toBe("/page");
    expect(server.requests[0]?.headers["user-agent"]).toBe("page-watch-test/1.0");
  });

  it("does not parse JSON bodies", async () => {
    server = await startStubServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end('{"a":1}');
    });
    expect(await fetchPage(server.url, { timeoutMs: 2000 })).toBe('{"a":1}');
  });

  it("decodes the body with the charset the server declares", async () => {
    server = await startStubServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/html; charset=ISO-8859-1" });
      res.end(Buffer.from("<p>Caf\u00e9 cr\u00e8me</p>", "latin1"));
    });
    expect(await fetchPage(server.url, { timeoutMs: 2000 })).toBe("<p>Caf\u00e9 cr\u00e8me</p>");
  });

  it("decodes as UTF-8 when no charset is declared", async () => {
    server = await startStubServer((_req, res) => {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(Buffer.from("<p>Caf\u00e9</p>", "utf8"));
    });
    expect(await fetchPage(server.url, { timeoutMs: 2000 })).toBe("<p>Caf\u00e9</p>");
  });

  it("fails with the status on non-2xx responses", async () => {
    server = await startStubServer((_req, res) => {
      res.writeHead(404);
      res.end("not here");
    });

    const error = await fetchPage(server.url, { timeoutMs: 2000 }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, url: server.url, message: `Failed to fetch ${server.url}: HTTP 404` });
  });

  it("fails when the server does not answer within the timeout", async () => {
    server = await startStubServer((_req, res) => {
      const timer = setTimeout(() => res.end("late"), 1000);
      res.on("close", () => clearTimeout(timer));
    });

    await expect(fetchPage(server.url, { timeoutMs: 50 })).rejects.toMatchObject({
      name: "FetchError",
      status: null,
      message: `Failed to fetch ${server.url}: timed out after 50ms`,
    });
  });

  it("fails on connection errors", async () => {
    const closed = await startStubServer((_req, res) => res.end());
    const url = closed.url;
    await closed.close();

    await expect(fetchPage(url, { timeoutMs: 2000 })).rejects.toBeInstanceOf(FetchError);
  });
});

describe("charsetOf", () => {
  it("reads the charset parameter of a content type", () => {
    expect(charsetOf("text/html; charset=Windows-1252")).toBe("windows-1252");
    expect(charsetOf('text/html; charset="utf-8"')).toBe("utf-8");
  });

  it("defaults to UTF-8", () => {
    expect(charsetOf("text/html")).toBe("utf-8");
    expect(charsetOf(undefined)).toBe("utf-8");
  });
});
