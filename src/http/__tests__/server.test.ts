import type http from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { DOCS, STEMS, STOP_WORDS } from "../../core/impl/__tests__/fixtures.js";
import { createInMemoryEngine } from "../engine.js";
import { startServer } from "../server.js";
import { isRecord } from "../validation.js";

describe("http server", () => {
  let server: http.Server;
  let base = "";

  beforeAll(async () => {
    const engine = createInMemoryEngine({ stopWords: STOP_WORDS, stems: STEMS });
    const started = await startServer({ port: 0, engine });
    server = started.server;
    base = `http://127.0.0.1:${started.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function readBody(res: Response): Promise<Record<string, unknown>> {
    const body: unknown = await res.json();
    if (!isRecord(body)) throw new Error(`expected a JSON object, got ${JSON.stringify(body)}`);
    return body;
  }

  function post(path: string, body: unknown, method = "POST"): Promise<Response> {
    return fetch(base + path, {
      method,
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("loads documents", async () => {
    const res = await post("/documents", { documents: DOCS });
    expect(res.status).toBe(200);
    expect(await readBody(res)).toEqual({ loaded: 3, documentCount: 3, termCount: 13 });
  });

  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    const body = await readBody(res);
    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "ok", service: "text_index", documentCount: 3, termCount: 13 });
  });

  it("rejects a duplicate id", async () => {
    const res = await post("/documents", { documents: [{ id: 1, text: "again" }] });
    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await readBody(res)).toMatchObject({ code: "INVALID_INPUT", detail: "duplicate document id 1" });
  });

  it("rejects malformed documents with field errors", async () => {
    const res = await post("/documents", { documents: [{ id: "x", text: 5 }] });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [
        { path: "$.documents[0].id", message: "must be an integer" },
        { path: "$.documents[0].text", message: "must be a string" },
      ],
    });
  });

  it("answers single-keyword queries", async () => {
    const res = await post("/search", { mode: "single", query: "SQL" });
    const body = await readBody(res);
    expect(res.status).toBe(200);
    expect(body.ids).toEqual([1, 2, 3]);
    expect(body.tookMs).toBeTypeOf("number");
  });

  it("answers or queries made only of stop words with nothing", async () => {
    const res = await post("/search", { mode: "or", terms: ["and"] });
    expect((await readBody(res)).ids).toEqual([]);
  });

  it("answers phrase queries with text", async () => {
    const res = await post("/search", { mode: "phrase", query: "python and", includeText: true });
    const body = await readBody(res);
    expect(body.ids).toEqual([1, 3]);
    expect(body.documents).toEqual([DOCS[0], DOCS[2]]);
  });

  it("rejects an unknown mode", async () => {
    const res = await post("/search", { mode: "fuzzy", query: "x" });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({ code: "INVALID_INPUT", instance: "/search" });
  });

  it("rejects an or query without terms", async () => {
    const res = await post("/search", { mode: "or" });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [{ path: "$.terms", message: "must be an array of strings" }],
    });
  });

  it("requires json", async () => {
    const res = await fetch(`${base}/search`, { method: "POST", headers: { "content-type": "text/plain" }, body: "sql" });
    expect(res.status).toBe(415);
  });

  it("rejects a body that is not json", async () => {
    const res = await fetch(`${base}/search`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{",
    });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({ code: "INVALID_INPUT", detail: "body must be valid JSON" });
  });

  it("returns documents by id", async () => {
    const ok = await fetch(`${base}/documents/2`);
    expect(await readBody(ok)).toEqual({ id: 2, text: "More people should learn SQL from Prof_Chuck" });

    const missing = await fetch(`${base}/documents/99`);
    expect(missing.status).toBe(404);
    expect(await readBody(missing)).toMatchObject({ code: "NOT_FOUND", detail: "document 99 not found" });

    const bad = await fetch(`${base}/documents/abc`);
    expect(bad.status).toBe(400);
  });

  it("accepts only decimal document ids", async () => {
    const hex = await fetch(`${base}/documents/0x2`);
    expect(hex.status).toBe(400);
    expect(await readBody(hex)).toMatchObject({ code: "INVALID_ARGUMENT", detail: "document id must be an integer" });

    const exp = await fetch(`${base}/documents/2e0`);
    expect(exp.status).toBe(400);
  });

  it("rejects malformed percent-encoding in a term", async () => {
    const res = await fetch(`${base}/index/terms/%E0%A4%A`);
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({
      code: "INVALID_ARGUMENT",
      detail: "malformed percent-encoding in term",
      instance: "/index/terms/%E0%A4%A",
    });
  });

  it("refuses regex phrase searches unless enabled", async () => {
    const res = await post("/search", { mode: "phrase", query: "^prof", regex: true });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [{ path: "$.regex", message: "regular expressions are disabled on this server" }],
    });
  });

  it("explains how a term normalizes", async () => {
    const res = await fetch(`${base}/index/terms/Teaching`);
    expect(await readBody(res)).toEqual({ term: "Teaching", normalized: "teach", postings: [1, 3] });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
  });

  it("runs regex phrase searches when enabled", async () => {
    const engine = createInMemoryEngine({ documents: DOCS });
    const started = await startServer({ port: 0, engine, allowRegex: true });
    try {
      const res = await fetch(`http://127.0.0.1:${started.port}/search`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ mode: "phrase", query: "^prof", regex: true }),
      });
      expect(res.status).toBe(200);
      expect((await readBody(res)).ids).toEqual([3]);
    } finally {
      await new Promise<void>((resolve, reject) => started.server.close((err) => (err ? reject(err) : resolve())));
    }
  });

  it("rebuilds when the analysis config changes", async () => {
    const res = await post("/analysis", { stopWords: [] }, "PUT");
    expect(res.status).toBe(200);
    expect(await readBody(res)).toEqual({ documentCount: 3, termCount: 16 });

    const search = await post("/search", { mode: "single", query: "and" });
    expect((await readBody(search)).ids).toEqual([1, 3]);
  });
});
