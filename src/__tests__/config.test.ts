import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { getConfig, loadDocuments, loadStemTable, loadStopWords } from "../config.js";
import { InvalidInputError } from "../core/errors.js";

describe("getConfig", () => {
  it("falls back to defaults", () => {
    const c = getConfig({});
    expect(c.PORT).toBe(3000);
    expect(c.STOP_WORDS_PATH.endsWith(path.join("data", "stopwords.json"))).toBe(true);
    expect(c.STEM_TABLE_PATH.endsWith(path.join("data", "stems.json"))).toBe(true);
    expect(c.DOCUMENTS_PATH).toBeUndefined();
    expect(c.STRIP_PUNCTUATION).toBe(false);
    expect(c.VERBOSE).toBe(false);
    expect(c.ALLOW_REGEX).toBe(false);
  });

  it("reads overrides", () => {
    const c = getConfig({ PORT: "8080", VERBOSE: "yes", STRIP_PUNCTUATION: "TRUE", ALLOW_REGEX: "on", DOCUMENTS_PATH: "docs.json" });
    expect(c.PORT).toBe(8080);
    expect(c.VERBOSE).toBe(true);
    expect(c.STRIP_PUNCTUATION).toBe(true);
    expect(c.ALLOW_REGEX).toBe(true);
    expect(c.DOCUMENTS_PATH).toBe(path.resolve("docs.json"));
  });

  it("ignores a malformed port", () => {
    expect(getConfig({ PORT: "abc" }).PORT).toBe(3000);
  });
});

describe("loaders", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "text-index-"));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, content, "utf8");
    return file;
  }

  it("loads the bundled stop words and stems", async () => {
    const c = getConfig({});
    const stopWords = await loadStopWords(c.STOP_WORDS_PATH);
    const stems = await loadStemTable(c.STEM_TABLE_PATH);
    expect(stopWords.size).toBe(33);
    expect(stopWords.has("and")).toBe(true);
    expect(stems.get("teaches")).toBe("teach");
  });

  it("case-folds stop words and stems", async () => {
    const stopWords = await loadStopWords(await write("sw.json", '["The", "AND"]'));
    const stems = await loadStemTable(await write("st.json", '{"Teaching": "Teach"}'));
    expect(Array.from(stopWords)).toEqual(["the", "and"]);
    expect(Array.from(stems)).toEqual([["teaching", "teach"]]);
  });

  it("rejects malformed files", async () => {
    await expect(loadStopWords(await write("bad1.json", '{"a": 1}'))).rejects.toThrow(InvalidInputError);
    await expect(loadStopWords(await write("bad2.json", '["a", 2]'))).rejects.toThrow(InvalidInputError);
    await expect(loadStemTable(await write("bad3.json", '["a"]'))).rejects.toThrow(InvalidInputError);
    await expect(loadStemTable(await write("bad4.json", "{"))).rejects.toThrow(InvalidInputError);
  });

  it("loads the bundled sample documents", async () => {
    const file = path.join(path.dirname(getConfig({}).STOP_WORDS_PATH), "documents.json");
    const docs = await loadDocuments(file);
    expect(docs.map((d) => d.id)).toEqual([1, 2, 3]);
    expect(docs[1]).toEqual({ id: 2, text: "More people should learn SQL from Prof_Chuck" });
  });

  it("loads documents", async () => {
    const docs = await loadDocuments(await write("docs.json", '[{"id": 1, "text": "hello"}, {"id": 2, "text": ""}]'));
    expect(docs).toEqual([
      { id: 1, text: "hello" },
      { id: 2, text: "" },
    ]);
    await expect(loadDocuments(await write("docs-bad.json", '[{"id": "x", "text": "hello"}]'))).rejects.toThrow(
      InvalidInputError,
    );
  });
});
