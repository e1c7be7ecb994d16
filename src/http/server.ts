import http from "node:http";
import { randomUUID } from "node:crypto";

import { InvalidInputError } from "../core/errors.js";
import { parseQueryMode, type Query } from "../core/impl/queryEngine.js";
import type { Document } from "../core/types.js";
import { PROBLEM_CONTENT_TYPE, problem, problemFromError, type FieldError } from "./problem.js";
import { asBoolean, asInt, asString, asStringArray, asStringRecord, isRecord, pushErr } from "./validation.js";
import { createInMemoryEngine, type Engine } from "./engine.js";

const SERVICE = "text_index";
const VERSION = "0.1.0";

const MAX_DOCUMENTS = 10000;
const MAX_QUERY_LENGTH = 4096;

export interface ServerOptions {
  port?: number;
  engine?: Engine;
  /**
   * Accept `regex: true` on phrase searches. Off by default: client patterns run
   * without a time limit on the event loop.
   */
  allowRegex?: boolean;
  /** log one line per request */
  verbose?: boolean;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();
  const verbose = opts.verbose ?? false;
  const allowRegex = opts.allowRegex ?? false;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (verbose) res.once("finish", () => console.log(`${req.method} ${url.pathname} ${res.statusCode} ${requestId}`));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          ...engine.stats(),
        });
      }

      if (req.method === "POST" && url.pathname === "/documents") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const docsVal = body.documents;
        if (!Array.isArray(docsVal)) pushErr(errors, "$.documents", "must be an array");
        const items: unknown[] = Array.isArray(docsVal) ? docsVal : [];
        if (Array.isArray(docsVal) && docsVal.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
        if (items.length > MAX_DOCUMENTS) pushErr(errors, "$.documents", `must contain at most ${MAX_DOCUMENTS} items`);

        const docs: Document[] = [];
        items.forEach((d, i) => {
          if (!isRecord(d)) return pushErr(errors, `$.documents[${i}]`, "must be an object");
          const id = asInt(d.id);
          const text = asString(d.text);
          if (id === undefined) pushErr(errors, `$.documents[${i}].id`, "must be an integer");
          if (text === undefined) pushErr(errors, `$.documents[${i}].text`, "must be a string");
          if (id !== undefined && text !== undefined) docs.push({ id, text });
        });

        if (errors.length) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const stats = engine.loadDocuments(docs);
        return sendJson(res, 200, { loaded: docs.length, ...stats });
      }

      const docMatch = /^\/documents\/([^/]+)$/.exec(url.pathname);
      if (req.method === "GET" && docMatch) {
        const raw = docMatch[1] ?? "";
        const id = /^-?\d+$/.test(raw) ? Number(raw) : NaN;
        if (!Number.isSafeInteger(id)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "document id must be an integer", instance: url.pathname, requestId }));
        }
        return sendJson(res, 200, engine.getDocument(id));
      }

      if (req.method === "PUT" && url.pathname === "/analysis") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const stopWords = body.stopWords == null ? undefined : asStringArray(body.stopWords);
        if (body.stopWords != null && !stopWords) pushErr(errors, "$.stopWords", "must be an array of strings");
        const stems = body.stems == null ? undefined : asStringRecord(body.stems);
        if (body.stems != null && !stems) pushErr(errors, "$.stems", "must be an object of string values");

        if (errors.length) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const stats = engine.configure({ stopWords, stems: stems ? Object.entries(stems) : undefined });
        return sendJson(res, 200, stats);
      }

      const termMatch = /^\/index\/terms\/([^/]+)$/.exec(url.pathname);
      if (req.method === "GET" && termMatch) {
        const term = decodePathSegment(termMatch[1] ?? "");
        if (term === undefined) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed percent-encoding in term", instance: url.pathname, requestId }));
        }
        const r = engine.lookupTerm(term);
        return sendJson(res, 200, { term, normalized: r.normalized, postings: r.ids });
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const query = parseSearchBody(body, errors, allowRegex);
        if (!query || errors.length) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const r = engine.search(query);
        return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
      }

      return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      const p = problemFromError(e, url.pathname, requestId);
      if (p.status >= 500) console.error(`[${requestId}] ${req.method} ${url.pathname} failed:`, e);
      return sendProblem(res, p.status, p);
    }
  });
}

/** Throws InvalidInputError for an unknown mode; field problems go to `errors`. */
function parseSearchBody(body: Record<string, unknown>, errors: FieldError[], allowRegex: boolean): Query | undefined {
  const mode = parseQueryMode(body.mode);

  const includeText = body.includeText == null ? false : asBoolean(body.includeText);
  if (includeText === undefined) pushErr(errors, "$.includeText", "must be a boolean");

  if (mode === "or") {
    const terms = asStringArray(body.terms);
    if (!terms) pushErr(errors, "$.terms", "must be an array of strings");
    else if (terms.length < 1) pushErr(errors, "$.terms", "must contain at least 1 item");
    else if (terms.some((t) => t.length > MAX_QUERY_LENGTH)) pushErr(errors, "$.terms", "term too long");
    return terms ? { mode, terms, includeText } : undefined;
  }

  const text = asString(body.query);
  if (!text) pushErr(errors, "$.query", "must be non-empty");
  if (text && text.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");
  if (!text) return undefined;

  if (mode === "single") return { mode, term: text, includeText };

  const caseSensitive = body.caseSensitive == null ? false : asBoolean(body.caseSensitive);
  if (caseSensitive === undefined) pushErr(errors, "$.caseSensitive", "must be a boolean");
  const regex = body.regex == null ? false : asBoolean(body.regex);
  if (regex === undefined) pushErr(errors, "$.regex", "must be a boolean");
  if (regex && !allowRegex) pushErr(errors, "$.regex", "regular expressions are disabled on this server");
  return { mode, pattern: text, includeText, caseSensitive, regex };
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (e) {
    if (e instanceof URIError) return undefined;
    throw e;
  }
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidInputError("body must be valid JSON");
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
