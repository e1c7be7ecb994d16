import dotenv from "dotenv";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { InvalidInputError } from "./core/errors.js";
import type { Document } from "./core/types.js";
import { assertDocId } from "./core/impl/indexBuilder.js";

// src/ and dist/ both sit one level below the project root
const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

dotenv.config({ path: path.join(PROJECT_ROOT, ".env") });

export interface Config {
  PORT: number;
  STOP_WORDS_PATH: string;
  STEM_TABLE_PATH: string;
  DOCUMENTS_PATH: string | undefined;
  STRIP_PUNCTUATION: boolean;
  ALLOW_REGEX: boolean;
  VERBOSE: boolean;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const PORT = (() => {
    const raw = env.PORT?.trim();
    if (!raw) return 3000;
    const n = Number(raw);
    return Number.isInteger(n) && n >= 0 && n <= 65535 ? n : 3000;
  })();

  const STOP_WORDS_PATH = resolvePath(env.STOP_WORDS_PATH, "data/stopwords.json");
  const STEM_TABLE_PATH = resolvePath(env.STEM_TABLE_PATH, "data/stems.json");

  // no bulk load unless asked for
  const DOCUMENTS_PATH = env.DOCUMENTS_PATH?.trim() ? path.resolve(env.DOCUMENTS_PATH.trim()) : undefined;

  return {
    PORT,
    STOP_WORDS_PATH,
    STEM_TABLE_PATH,
    DOCUMENTS_PATH,
    STRIP_PUNCTUATION: truthy(env.STRIP_PUNCTUATION),
    ALLOW_REGEX: truthy(env.ALLOW_REGEX),
    VERBOSE: truthy(env.VERBOSE),
  };
}

/** Reads a JSON array of strings. */
export async function loadStopWords(file: string): Promise<Set<string>> {
  const data = await readJsonFile(file);
  if (!Array.isArray(data)) {
    throw new InvalidInputError(`${file}: stop words must be a JSON array of strings`);
  }
  const out = new Set<string>();
  for (const [i, w] of data.entries()) {
    if (typeof w !== "string") throw new InvalidInputError(`${file}: entry ${i} is not a string`);
    out.add(w.toLowerCase());
  }
  return out;
}

/** Reads a JSON object of surface form -> stem. */
export async function loadStemTable(file: string): Promise<Map<string, string>> {
  const data = await readJsonFile(file);
  if (!isRecord(data)) {
    throw new InvalidInputError(`${file}: stem table must be a JSON object`);
  }
  const out = new Map<string, string>();
  for (const [surface, stem] of Object.entries(data)) {
    if (typeof stem !== "string") throw new InvalidInputError(`${file}: stem for "${surface}" is not a string`);
    out.set(surface.toLowerCase(), stem.toLowerCase());
  }
  return out;
}

/** Reads a JSON array of `{ id, text }`. */
export async function loadDocuments(file: string): Promise<Document[]> {
  const data = await readJsonFile(file);
  if (!Array.isArray(data)) {
    throw new InvalidInputError(`${file}: documents must be a JSON array`);
  }
  return data.map((d: unknown, i) => {
    if (!isRecord(d) || typeof d.text !== "string") {
      throw new InvalidInputError(`${file}: entry ${i} must be an object with a string text`);
    }
    assertDocId(d.id);
    return { id: d.id, text: d.text };
  });
}

async function readJsonFile(file: string): Promise<unknown> {
  const raw = await fs.readFile(file, "utf8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new InvalidInputError(`${file}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
}

function resolvePath(value: string | undefined, fallback: string): string {
  const v = value?.trim();
  return v ? path.resolve(v) : path.join(PROJECT_ROOT, fallback);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function truthy(value: string | undefined): boolean {
  const v = (value ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}
