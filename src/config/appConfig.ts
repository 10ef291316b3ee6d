/**
 * src/config/appConfig.ts
 * What: Environment schema and the typed application config derived from it.
 * How: Validates an env-like record with zod. Integers arrive as strings and are coerced with the same preprocess
 *      helper for every numeric variable. DATABASE_URL is only required when the Postgres vector store is selected,
 *      and that store fixes EMBED_DIMENSIONS to the width of its embedding column.
 *      The RAG tunables are re-validated through the settings schema so range errors read the same everywhere.
 */

import { z } from 'zod';
import { PG_EMBEDDING_DIMENSIONS } from '../db/pgVectorStore.js';
import { resolveSettings, type RagSettings } from './settings.js';

const intWithDefault = (def: number, min = 1) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' ? (v.trim() === '' ? undefined : Number(v)) : v),
    z.number().int().min(min).default(def),
  );

const optionalString = z.preprocess(
  (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().optional(),
);

const schema = z
  .object({
    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o'),
    OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBED_DIMENSIONS: intWithDefault(1536),
    EMBED_BATCH_SIZE: intWithDefault(64),
    AZURE_OPENAI_ENDPOINT: optionalString,
    AZURE_OPENAI_API_VERSION: z.string().min(1).default('2024-10-21'),
    CHAT_MAX_TOKENS: intWithDefault(800),
    VECTOR_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: optionalString,
    DOCS_DIR: z.string().min(1).default('./docs'),
    CHUNK_SIZE: intWithDefault(800),
    CHUNK_OVERLAP: intWithDefault(100, 0),
    MAX_RESULTS: intWithDefault(5),
    MAX_HISTORY: intWithDefault(2),
    INDEX_CONCURRENCY: intWithDefault(2),
    PORT: intWithDefault(3000),
    NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when VECTOR_STORE=postgres',
      });
    }
    if (env.VECTOR_STORE === 'postgres' && env.EMBED_DIMENSIONS !== PG_EMBEDDING_DIMENSIONS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMBED_DIMENSIONS'],
        message: `EMBED_DIMENSIONS must be ${PG_EMBEDDING_DIMENSIONS} to match the vector_records.embedding column`,
      });
    }
  });

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_CHAT_MODEL: string;
  OPENAI_EMBED_MODEL: string;
  EMBED_DIMENSIONS: number;
  EMBED_BATCH_SIZE: number;
  AZURE_OPENAI_ENDPOINT?: string;
  AZURE_OPENAI_API_VERSION: string;
  CHAT_MAX_TOKENS: number;
  VECTOR_STORE: 'postgres' | 'memory';
  DATABASE_URL?: string;
  DOCS_DIR: string;
  INDEX_CONCURRENCY: number;
  PORT: number;
  NODE_ENV: 'production' | 'development' | 'test';
  RAG: RagSettings;
}

export function parseAppConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const { CHUNK_SIZE, CHUNK_OVERLAP, MAX_RESULTS, MAX_HISTORY, ...rest } = parsed.data;
  return {
    ...rest,
    RAG: resolveSettings({
      chunkSize: CHUNK_SIZE,
      chunkOverlap: CHUNK_OVERLAP,
      maxResults: MAX_RESULTS,
      maxHistory: MAX_HISTORY,
    }),
  };
}
