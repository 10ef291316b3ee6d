// src/bootstrap.ts
// What: Builds the RAG services from config.
// How: Picks the vector store (pgvector or in-memory) and the OpenAI or Azure OpenAI client, then wires the
//      document processor, index, tools, orchestrator and session store into a RagSystem. close() releases the pool.

import OpenAI, { AzureOpenAI } from 'openai';
import type { AppConfig } from './config/appConfig.js';
import { createPool } from './db/pool.js';
import { PgVectorStore } from './db/pgVectorStore.js';
import { ConversationOrchestrator } from './services/conversation.js';
import { DocumentProcessor } from './services/documentProcessor.js';
import { createOpenAIEmbedder } from './services/embeddings.js';
import { createToolRegistry, RagSystem } from './services/ragSystem.js';
import { SessionStore } from './services/sessionStore.js';
import { VectorIndex } from './services/vectorIndex.js';
import { MemoryVectorStore, type VectorStore } from './services/vectorStore.js';

function createOpenAIClient(cfg: AppConfig): OpenAI {
  if (cfg.AZURE_OPENAI_ENDPOINT) {
    return new AzureOpenAI({
      endpoint: cfg.AZURE_OPENAI_ENDPOINT,
      apiKey: cfg.OPENAI_API_KEY,
      apiVersion: cfg.AZURE_OPENAI_API_VERSION,
    });
  }
  return new OpenAI({ apiKey: cfg.OPENAI_API_KEY });
}

export interface Services {
  rag: RagSystem;
  close(): Promise<void>;
}

function createVectorStore(cfg: AppConfig): { store: VectorStore; close(): Promise<void> } {
  if (cfg.VECTOR_STORE === 'memory' || !cfg.DATABASE_URL) {
    return { store: new MemoryVectorStore(), close: async () => {} };
  }
  const pool = createPool(cfg.DATABASE_URL);
  return { store: PgVectorStore.fromPool(pool), close: () => pool.end() };
}

export function buildServices(cfg: AppConfig): Services {
  const openai = createOpenAIClient(cfg);
  const embed = createOpenAIEmbedder(openai, {
    model: cfg.OPENAI_EMBED_MODEL,
    dimensions: cfg.EMBED_DIMENSIONS,
    batchSize: cfg.EMBED_BATCH_SIZE,
  });
  const { store, close } = createVectorStore(cfg);
  const index = new VectorIndex(store, embed, cfg.RAG);
  const rag = new RagSystem({
    processor: new DocumentProcessor(cfg.RAG),
    index,
    registry: createToolRegistry(index),
    orchestrator: new ConversationOrchestrator(openai, { model: cfg.OPENAI_CHAT_MODEL, maxTokens: cfg.CHAT_MAX_TOKENS }),
    sessions: new SessionStore(cfg.RAG),
    indexConcurrency: cfg.INDEX_CONCURRENCY,
  });
  return { rag, close };
}
