// src/services/embeddings.ts
// What: OpenAI embedding function used by the vector index.
// How: Wraps `embeddings.create` in an EmbeddingFunction that batches inputs, keeps output order aligned with input
//      order, requests the configured dimension count and validates the vector size against it.

import type { CreateEmbeddingResponse, EmbeddingCreateParams } from 'openai/resources/embeddings';

export type EmbeddingFunction = (texts: string[]) => Promise<number[][]>;

export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams): Promise<CreateEmbeddingResponse>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  dimensions: number;
  batchSize?: number;
}

export function createOpenAIEmbedder(client: EmbeddingsClient, opts: OpenAIEmbedderOptions): EmbeddingFunction {
  const batchSize = Math.max(1, opts.batchSize ?? 64);

  return async (texts: string[]): Promise<number[][]> => {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += batchSize) {
      const batch = texts.slice(offset, offset + batchSize);
      const res = await client.embeddings.create({ model: opts.model, input: batch, dimensions: opts.dimensions });
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(`Embedding count mismatch; expected ${batch.length}, got ${ordered.length}`);
      }
      for (const d of ordered) {
        if (d.embedding.length !== opts.dimensions) {
          throw new Error(`Unexpected embedding size; expected ${opts.dimensions}, got ${d.embedding.length}`);
        }
        vectors.push(d.embedding);
      }
    }
    return vectors;
  };
}
