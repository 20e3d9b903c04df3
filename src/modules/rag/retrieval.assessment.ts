import { PipelineConfig } from "../config/pipeline.config";
import { RetrievalUnavailable } from "../errors/pipeline.errors";
import {
  RetrievalDependencies,
  hybridRetrieve,
} from "../retrieval/hybrid.retriever";
import { RerankedResult, RetrievalQualityReport } from "../retrieval/types";
import { scoreRetrievalQuality } from "../scoring/retrieval.quality";

export type RetrievalBreadth = "initial" | "widened";

export interface RetrievalRound {
  query: string;
  breadth: RetrievalBreadth;
  /** Ungated report: `tier` is set by whoever classifies it. */
  report: RetrievalQualityReport;
  evidence: RerankedResult[];
  candidateCounts: { vector: number; keyword: number };
  unavailable: boolean;
}

export type AssessRetrieval = (
  query: string,
  breadth: RetrievalBreadth
) => Promise<RetrievalRound>;

/**
 * Binds retrieval, fusion, reranking and RQS into one call. The widened
 * breadth searches a larger pool and keeps more results.
 */
export function createRetrievalAssessor(
  deps: RetrievalDependencies,
  config: PipelineConfig,
  totalDocuments: number
): AssessRetrieval {
  const { retrieval, timeouts } = config;

  return async (query, breadth) => {
    const widened = breadth === "widened";
    const topK = widened ? retrieval.fallbackTopK : retrieval.topK;
    const searchK = widened ? retrieval.fallbackSearchK : retrieval.searchK;

    try {
      const attempt = await hybridRetrieve(query, deps, {
        searchK,
        topK,
        rerankTopN: Math.max(retrieval.rerankTopN, topK),
        rrfK: retrieval.rrfK,
        embedTimeoutMs: timeouts.embedMs,
        searchTimeoutMs: timeouts.searchMs,
        rerankTimeoutMs: timeouts.rerankMs,
      });

      const report = scoreRetrievalQuality(attempt.evidence, totalDocuments, {
        topK,
        weights: retrieval.rqWeights,
        consistencyScale: retrieval.consistencyScale,
      });

      return {
        query,
        breadth,
        report,
        evidence: attempt.evidence,
        candidateCounts: { vector: attempt.vectorCount, keyword: attempt.keywordCount },
        unavailable: false,
      };
    } catch (error) {
      if (!(error instanceof RetrievalUnavailable)) throw error;
      console.warn(`No retrieval candidates for "${query}" (${breadth})`);
      return {
        query,
        breadth,
        report: scoreRetrievalQuality([], totalDocuments, {
          topK,
          weights: retrieval.rqWeights,
          consistencyScale: retrieval.consistencyScale,
        }),
        evidence: [],
        candidateCounts: { vector: 0, keyword: 0 },
        unavailable: true,
      };
    }
  };
}
