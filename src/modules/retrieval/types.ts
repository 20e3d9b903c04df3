export type SourceMethod = "vector" | "keyword";

/**
 * A single hit from one retrieval method. `rank` is 1-based within the
 * list the candidate came from.
 */
export interface Candidate {
  readonly chunkId: string;
  readonly documentId: string;
  readonly rawScore: number;
  readonly rank: number;
  readonly sourceMethod: SourceMethod;
  readonly text: string;
}

export interface FusedResult {
  readonly chunkId: string;
  readonly documentId: string;
  readonly text: string;
  readonly fusedScore: number;
  readonly rank: number;
  /** Sum of the chunk's original ranks over the lists it appeared in. */
  readonly rankSum: number;
}

export interface RerankedResult extends FusedResult {
  readonly rawScore: number;
  readonly normalizedScore: number;
}

export type GateTier = "proceed" | "fallback" | "abstain";

export type RetrievalReasonCode =
  | "no_results"
  | "low_relevance"
  | "low_margin"
  | "low_coverage"
  | "low_consistency";

export interface RetrievalQualityReport {
  relevance: number;
  margin: number;
  coverage: number;
  consistency: number;
  rq: number;
  tier: GateTier;
  reasons: RetrievalReasonCode[];
}

export interface VectorSearch {
  search(queryEmbedding: number[], k: number): Promise<Candidate[]>;
}

export interface KeywordSearch {
  search(queryText: string, k: number): Promise<Candidate[]>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

/**
 * Pairwise relevance scorer. Returns an unbounded raw score; the pipeline
 * maps it onto [0,1] itself.
 */
export interface Reranker {
  score(queryText: string, chunkText: string): Promise<number>;
}

export interface CorpusStats {
  documentCount(): Promise<number>;
}
