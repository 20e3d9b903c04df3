import { OllamaClient } from "../llm/ollama.service";
import { Embedder, Reranker } from "../retrieval/types";

export class OllamaEmbedder implements Embedder {
  constructor(private readonly client: OllamaClient) {}

  embed(text: string): Promise<number[]> {
    return this.client.embed(text);
  }
}

/**
 * Cosine similarity of two vectors. Mismatched lengths or a zero vector
 * give 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  const dot = a.reduce((sum, val, i) => sum + val * b[i], 0);
  const normA = Math.sqrt(a.reduce((sum, val) => sum + val * val, 0));
  const normB = Math.sqrt(b.reduce((sum, val) => sum + val * val, 0));

  if (normA === 0 || normB === 0) return 0;
  return dot / (normA * normB);
}

const RERANK_CENTER = 0.5;
const RERANK_SPREAD = 10;
const QUERY_CACHE_SIZE = 256;

/**
 * Bi-encoder reranker: scores a chunk by the cosine similarity of its
 * embedding to the query's, stretched around 0.5 so the pipeline's
 * sigmoid separates close scores.
 *
 * A query's embedding request is shared by every chunk scored against it,
 * including concurrent ones. Failed requests are dropped from the cache.
 */
export class EmbeddingReranker implements Reranker {
  private readonly queryEmbeddings = new Map<string, Promise<number[]>>();

  constructor(private readonly embedder: Embedder) {}

  async score(queryText: string, chunkText: string): Promise<number> {
    const [queryEmbedding, chunkEmbedding] = await Promise.all([
      this.embedQuery(queryText),
      this.embedder.embed(chunkText),
    ]);
    return RERANK_SPREAD * (cosineSimilarity(queryEmbedding, chunkEmbedding) - RERANK_CENTER);
  }

  private embedQuery(queryText: string): Promise<number[]> {
    const cached = this.queryEmbeddings.get(queryText);
    if (cached) return cached;

    if (this.queryEmbeddings.size >= QUERY_CACHE_SIZE) {
      this.queryEmbeddings.clear();
    }
    const pending = this.embedder.embed(queryText).catch((error: unknown) => {
      if (this.queryEmbeddings.get(queryText) === pending) {
        this.queryEmbeddings.delete(queryText);
      }
      throw error;
    });
    this.queryEmbeddings.set(queryText, pending);
    return pending;
  }
}
