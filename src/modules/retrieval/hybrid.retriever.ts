import { IndexGuard } from "../concurrency/index.guard";
import { callOrDefault } from "../concurrency/timeout";
import { RetrievalUnavailable } from "../errors/pipeline.errors";
import { fuseRankings } from "./rank.fusion";
import { rerankAndNormalize } from "./score.normalizer";
import {
  Candidate,
  Embedder,
  FusedResult,
  KeywordSearch,
  RerankedResult,
  Reranker,
  VectorSearch,
} from "./types";

export interface RetrievalDependencies {
  embedder: Embedder;
  vectorSearch: VectorSearch;
  keywordSearch: KeywordSearch;
  reranker: Reranker;
  guard?: IndexGuard;
}

export interface RetrievalSettings {
  searchK: number;
  rerankTopN: number;
  topK: number;
  rrfK: number;
  embedTimeoutMs: number;
  searchTimeoutMs: number;
  rerankTimeoutMs: number;
}

export interface RetrievalAttempt {
  query: string;
  fused: FusedResult[];
  evidence: RerankedResult[];
  vectorCount: number;
  keywordCount: number;
  performance: {
    searchMs: number;
    rerankMs: number;
  };
}

async function searchBoth(
  query: string,
  deps: RetrievalDependencies,
  settings: RetrievalSettings
): Promise<[Candidate[], Candidate[]]> {
  const vectorBranch = async (): Promise<Candidate[]> => {
    const embedding = await callOrDefault(
      () => deps.embedder.embed(query),
      settings.embedTimeoutMs,
      "query embedding",
      []
    );
    if (embedding.value.length === 0) return [];
    const hits = await callOrDefault(
      () => deps.vectorSearch.search(embedding.value, settings.searchK),
      settings.searchTimeoutMs,
      "vector search",
      []
    );
    return hits.value;
  };

  const keywordBranch = async (): Promise<Candidate[]> => {
    const hits = await callOrDefault(
      () => deps.keywordSearch.search(query, settings.searchK),
      settings.searchTimeoutMs,
      "keyword search",
      []
    );
    return hits.value;
  };

  return Promise.all([vectorBranch(), keywordBranch()]);
}

/**
 * Vector and keyword search run concurrently and are joined before
 * fusion. Throws `RetrievalUnavailable` when neither returns anything.
 */
export async function hybridRetrieve(
  query: string,
  deps: RetrievalDependencies,
  settings: RetrievalSettings
): Promise<RetrievalAttempt> {
  const startSearch = Date.now();
  const [vectorHits, keywordHits] = deps.guard
    ? await deps.guard.read(() => searchBoth(query, deps, settings))
    : await searchBoth(query, deps, settings);
  const searchMs = Date.now() - startSearch;

  console.log(
    `Retrieved ${vectorHits.length} vector and ${keywordHits.length} keyword candidates in ${searchMs}ms`
  );

  if (vectorHits.length === 0 && keywordHits.length === 0) {
    throw new RetrievalUnavailable();
  }

  const fused = fuseRankings(vectorHits, keywordHits, settings.rrfK);

  const startRerank = Date.now();
  const evidence = await rerankAndNormalize(query, fused, deps.reranker, {
    topN: settings.rerankTopN,
    topK: settings.topK,
    timeoutMs: settings.rerankTimeoutMs,
  });
  const rerankMs = Date.now() - startRerank;

  return {
    query,
    fused,
    evidence,
    vectorCount: vectorHits.length,
    keywordCount: keywordHits.length,
    performance: { searchMs, rerankMs },
  };
}
