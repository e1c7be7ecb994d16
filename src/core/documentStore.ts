import type { DocId, Document } from "./types.js";

/**
 * Owns document text. Indexes refer to documents by id only.
 */
export interface DocumentStore {
  /** Validates the whole batch before inserting any of it. */
  add(docs: Iterable<Document>): void;
  has(id: DocId): boolean;

  /** Throws NotFoundError for an unknown id. */
  get(id: DocId): Document;
  getMany(ids: Iterable<DocId>): Document[];

  /** All documents by ascending id. */
  all(): Document[];
  readonly size: number;
}
