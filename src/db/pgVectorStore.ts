// src/db/pgVectorStore.ts
// What: pgvector-backed implementation of the VectorStore contract.
// How: Both collections live in one `vector_records` table keyed by (collection, id). Metadata is JSONB and filtered
//      with containment (`metadata @> $n::jsonb`); nearest neighbours are ordered by cosine distance (`<=>`), then id.
//      Rows come back untyped and are validated with zod before they leave this module. transaction() holds one
//      pooled client for BEGIN..COMMIT and guards ROLLBACK with an inTx flag so it never runs outside a transaction.

import type pg from 'pg';
import { z } from 'zod';
import logger from '../logging.js';
import type { CatalogMetadata, ContentMetadata } from '../models/types.js';
import {
  CATALOG_COLLECTION,
  CONTENT_COLLECTION,
  type Metadata,
  type QueryMatch,
  type StoredRecord,
  type VectorCollection,
  type VectorQuery,
  type VectorRecord,
  type VectorStore,
} from '../services/vectorStore.js';
import { vectorToParam } from '../util/sql.js';

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlClient extends SqlExecutor {
  release(): void;
}

/** Width of `vector_records.embedding`; see migrations/001_vector_records.sql. */
export const PG_EMBEDDING_DIMENSIONS = 1536;

type MetadataSchema<M> = z.ZodType<M, z.ZodTypeDef, unknown>;

export const catalogMetadataSchema: MetadataSchema<CatalogMetadata> = z.object({
  title: z.string(),
  instructor: z.string().nullable(),
  course_link: z.string().nullable(),
  lessons_json: z.string(),
  lesson_count: z.number().int(),
});

export const contentMetadataSchema: MetadataSchema<ContentMetadata> = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int(),
});

const storedRowSchema = z.object({
  id: z.string(),
  document: z.string(),
  metadata: z.unknown(),
});

const matchRowSchema = storedRowSchema.extend({
  distance: z.coerce.number(),
});

const idRowSchema = z.object({ id: z.string() });
const countRowSchema = z.object({ count: z.coerce.number().int() });

// Drop undefined filter values so they do not constrain the containment match.
function whereJson(where: Record<string, unknown> | undefined): string {
  const defined = Object.fromEntries(Object.entries(where ?? {}).filter(([, v]) => v !== undefined));
  return JSON.stringify(defined);
}

export class PgVectorCollection<M extends Metadata> implements VectorCollection<M> {
  constructor(
    private readonly db: SqlExecutor,
    readonly name: string,
    private readonly metadataSchema: MetadataSchema<M>,
  ) {}

  async upsert(records: VectorRecord<M>[]): Promise<void> {
    for (const r of records) {
      await this.db.query(
        `INSERT INTO vector_records (collection, id, document, metadata, embedding)
         VALUES ($1, $2, $3, $4::jsonb, $5::vector)
         ON CONFLICT (collection, id) DO UPDATE
           SET document = EXCLUDED.document, metadata = EXCLUDED.metadata,
               embedding = EXCLUDED.embedding, updated_at = NOW()`,
        [this.name, r.id, r.document, JSON.stringify(r.metadata), vectorToParam(r.embedding)],
      );
    }
  }

  async query(q: VectorQuery<M>): Promise<QueryMatch<M>[]> {
    const sql = `
      SELECT id, document, metadata, (embedding <=> $2::vector) AS distance
      FROM vector_records
      WHERE collection = $1 AND metadata @> $3::jsonb
      ORDER BY distance, id
      LIMIT $4
    `;
    const r = await this.db.query(sql, [this.name, vectorToParam(q.embedding), whereJson(q.where), q.limit]);
    return r.rows.map((row) => {
      const parsed = matchRowSchema.parse(row);
      return {
        id: parsed.id,
        document: parsed.document,
        metadata: this.metadataSchema.parse(parsed.metadata),
        distance: parsed.distance,
      };
    });
  }

  async get(ids: string[]): Promise<StoredRecord<M>[]> {
    if (ids.length === 0) return [];
    const r = await this.db.query(
      'SELECT id, document, metadata FROM vector_records WHERE collection = $1 AND id = ANY($2::text[])',
      [this.name, ids],
    );
    const byId = new Map<string, StoredRecord<M>>();
    for (const row of r.rows) {
      const parsed = storedRowSchema.parse(row);
      byId.set(parsed.id, {
        id: parsed.id,
        document: parsed.document,
        metadata: this.metadataSchema.parse(parsed.metadata),
      });
    }
    // Preserve the caller's id order
    return ids.flatMap((id) => byId.get(id) ?? []);
  }

  async ids(): Promise<string[]> {
    const r = await this.db.query('SELECT id FROM vector_records WHERE collection = $1 ORDER BY id', [this.name]);
    return r.rows.map((row) => idRowSchema.parse(row).id);
  }

  async count(): Promise<number> {
    const r = await this.db.query('SELECT COUNT(*)::int AS count FROM vector_records WHERE collection = $1', [
      this.name,
    ]);
    return r.rows.length > 0 ? countRowSchema.parse(r.rows[0]).count : 0;
  }

  async deleteWhere(where: Partial<M>): Promise<number> {
    const r = await this.db.query('DELETE FROM vector_records WHERE collection = $1 AND metadata @> $2::jsonb', [
      this.name,
      whereJson(where),
    ]);
    return r.rowCount ?? 0;
  }

  async clear(): Promise<void> {
    await this.db.query('DELETE FROM vector_records WHERE collection = $1', [this.name]);
  }
}

export class PgVectorStore implements VectorStore {
  readonly catalog: PgVectorCollection<CatalogMetadata>;
  readonly content: PgVectorCollection<ContentMetadata>;

  /**
   * @param db - executor for standalone statements
   * @param connect - checks out a dedicated client for transactions; omitted when this store is already bound to
   *   a client inside a transaction, in which case nested transactions join the outer one
   */
  constructor(
    db: SqlExecutor,
    private readonly connect?: () => Promise<SqlClient>,
  ) {
    this.catalog = new PgVectorCollection(db, CATALOG_COLLECTION, catalogMetadataSchema);
    this.content = new PgVectorCollection(db, CONTENT_COLLECTION, contentMetadataSchema);
  }

  static fromPool(pool: pg.Pool): PgVectorStore {
    return new PgVectorStore(
      { query: (text, values) => pool.query(text, values) },
      async () => {
        const client = await pool.connect();
        return {
          query: (text, values) => client.query(text, values),
          release: () => client.release(),
        };
      },
    );
  }

  async transaction<T>(fn: (store: VectorStore) => Promise<T>): Promise<T> {
    if (!this.connect) return fn(this);

    const client = await this.connect();
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      const result = await fn(new PgVectorStore(client));
      await client.query('COMMIT');
      inTx = false;
      return result;
    } catch (err) {
      if (inTx) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.warn({ err: rollbackErr }, 'Rollback failed');
        }
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
