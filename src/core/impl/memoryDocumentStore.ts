import type { DocId, Document } from "../types.js";
import type { DocumentStore } from "../documentStore.js";
import { InvalidInputError, NotFoundError } from "../errors.js";
import { assertDocId } from "./indexBuilder.js";
import { sortIds } from "./memoryInvertedIndex.js";

export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<DocId, Document>();

  constructor(initial: Iterable<Document> = []) {
    this.add(initial);
  }

  get size(): number {
    return this.docs.size;
  }

  add(input: Iterable<Document>): void {
    const batch: Document[] = [];
    const batchIds = new Set<DocId>();

    for (const doc of input) {
      assertDocId(doc.id);
      if (typeof doc.text !== "string") {
        throw new InvalidInputError(`document ${doc.id}: text must be a string`);
      }
      if (this.docs.has(doc.id) || batchIds.has(doc.id)) {
        throw new InvalidInputError(`duplicate document id ${doc.id}`);
      }
      batchIds.add(doc.id);
      batch.push({ id: doc.id, text: doc.text });
    }

    for (const doc of batch) this.docs.set(doc.id, Object.freeze(doc));
  }

  has(id: DocId): boolean {
    return this.docs.has(id);
  }

  get(id: DocId): Document {
    const doc = this.docs.get(id);
    if (!doc) throw new NotFoundError(`document ${id} not found`);
    return doc;
  }

  getMany(ids: Iterable<DocId>): Document[] {
    return Array.from(ids, (id) => this.get(id));
  }

  all(): Document[] {
    return this.getMany(sortIds(this.docs.keys()));
  }
}
