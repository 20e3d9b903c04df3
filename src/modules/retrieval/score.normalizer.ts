import { callOrDefault } from "../concurrency/timeout";
import { FusedResult, RerankedResult, Reranker } from "./types";

export function sigmoid(raw: number): number {
  if (Number.isNaN(raw) || raw === Number.NEGATIVE_INFINITY) return 0;
  if (raw === Number.POSITIVE_INFINITY) return 1;
  return 1 / (1 + Math.exp(-raw));
}

export interface RerankOptions {
  /** How many fused results are sent to the reranker. */
  topN: number;
  /** How many reranked results are kept. */
  topK: number;
  timeoutMs: number;
}

/**
 * Scores the fused top-N against the query, maps each raw score onto
 * [0,1] and keeps the best `topK`. A reranker call that fails or times
 * out scores the chunk 0.
 */
export async function rerankAndNormalize(
  query: string,
  fused: FusedResult[],
  reranker: Reranker,
  options: RerankOptions
): Promise<RerankedResult[]> {
  const pool = fused.slice(0, options.topN);

  const outcomes = await Promise.all(
    pool.map((result) =>
      callOrDefault(
        () => reranker.score(query, result.text),
        options.timeoutMs,
        `rerank ${result.chunkId}`,
        Number.NEGATIVE_INFINITY
      )
    )
  );

  const scored = pool.map((result, index) => {
    const rawScore = outcomes[index].value;
    return { result, rawScore, normalizedScore: sigmoid(rawScore) };
  });

  // Stable sort keeps fused order between equal normalized scores.
  scored.sort((a, b) => b.normalizedScore - a.normalizedScore);

  return scored.slice(0, options.topK).map(({ result, rawScore, normalizedScore }, index) => ({
    ...result,
    rank: index + 1,
    rawScore,
    normalizedScore,
  }));
}
