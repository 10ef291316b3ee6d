// src/services/vectorStore.ts
// What: Persistence contract for the two vector collections (catalog, content) plus an in-process implementation.
// How: A collection stores records keyed by id (document text, flat metadata, embedding) and answers
//      nearest-neighbour queries filtered by metadata equality. Results are ordered by ascending cosine distance,
//      ties broken by ascending id, so repeated queries over an unchanged store return the same order.
//      MemoryVectorStore keeps records in Maps and implements transactions by snapshot/restore.

import type { CatalogMetadata, ContentMetadata } from '../models/types.js';
import { cosineDistance } from '../util/sql.js';

export type MetadataValue = string | number | null;
export type Metadata = { [key: string]: MetadataValue };

export interface VectorRecord<M extends Metadata> {
  id: string;
  document: string;
  metadata: M;
  embedding: number[];
}

export interface StoredRecord<M extends Metadata> {
  id: string;
  document: string;
  metadata: M;
}

export interface QueryMatch<M extends Metadata> extends StoredRecord<M> {
  distance: number;
}

export interface VectorQuery<M extends Metadata> {
  embedding: number[];
  limit: number;
  where?: Partial<M>;
}

export interface VectorCollection<M extends Metadata> {
  readonly name: string;
  upsert(records: VectorRecord<M>[]): Promise<void>;
  query(q: VectorQuery<M>): Promise<QueryMatch<M>[]>;
  get(ids: string[]): Promise<StoredRecord<M>[]>;
  ids(): Promise<string[]>;
  count(): Promise<number>;
  deleteWhere(where: Partial<M>): Promise<number>;
  clear(): Promise<void>;
}

export interface VectorStore {
  readonly catalog: VectorCollection<CatalogMetadata>;
  readonly content: VectorCollection<ContentMetadata>;
  /** Runs `fn` so that either all of its writes are kept or none are. */
  transaction<T>(fn: (store: VectorStore) => Promise<T>): Promise<T>;
}

export const CATALOG_COLLECTION = 'course_catalog';
export const CONTENT_COLLECTION = 'course_content';

export function matchesWhere<M extends Metadata>(metadata: M, where: Partial<M> | undefined): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, value]) => value === undefined || metadata[key] === value);
}

export function compareMatches(a: { id: string; distance: number }, b: { id: string; distance: number }): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class MemoryVectorCollection<M extends Metadata> implements VectorCollection<M> {
  private records = new Map<string, VectorRecord<M>>();

  constructor(readonly name: string) {}

  async upsert(records: VectorRecord<M>[]): Promise<void> {
    for (const r of records) {
      this.records.set(r.id, { ...r, metadata: { ...r.metadata }, embedding: [...r.embedding] });
    }
  }

  async query(q: VectorQuery<M>): Promise<QueryMatch<M>[]> {
    const matches: QueryMatch<M>[] = [];
    for (const r of this.records.values()) {
      if (!matchesWhere(r.metadata, q.where)) continue;
      matches.push({
        id: r.id,
        document: r.document,
        metadata: { ...r.metadata },
        distance: cosineDistance(q.embedding, r.embedding),
      });
    }
    return matches.sort(compareMatches).slice(0, q.limit);
  }

  async get(ids: string[]): Promise<StoredRecord<M>[]> {
    const out: StoredRecord<M>[] = [];
    for (const id of ids) {
      const r = this.records.get(id);
      if (r) out.push({ id: r.id, document: r.document, metadata: { ...r.metadata } });
    }
    return out;
  }

  async ids(): Promise<string[]> {
    return [...this.records.keys()];
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async deleteWhere(where: Partial<M>): Promise<number> {
    let removed = 0;
    for (const [id, r] of this.records) {
      if (matchesWhere(r.metadata, where)) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.records.clear();
  }

  snapshot(): Map<string, VectorRecord<M>> {
    return new Map(this.records);
  }

  restore(snapshot: Map<string, VectorRecord<M>>): void {
    this.records = new Map(snapshot);
  }
}

export class MemoryVectorStore implements VectorStore {
  readonly catalog = new MemoryVectorCollection<CatalogMetadata>(CATALOG_COLLECTION);
  readonly content = new MemoryVectorCollection<ContentMetadata>(CONTENT_COLLECTION);

  async transaction<T>(fn: (store: VectorStore) => Promise<T>): Promise<T> {
    const catalogSnapshot = this.catalog.snapshot();
    const contentSnapshot = this.content.snapshot();
    try {
      return await fn(this);
    } catch (err) {
      this.catalog.restore(catalogSnapshot);
      this.content.restore(contentSnapshot);
      throw err;
    }
  }
}
