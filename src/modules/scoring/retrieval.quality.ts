import { RqWeights } from "../config/pipeline.config";
import {
  RerankedResult,
  RetrievalQualityReport,
  RetrievalReasonCode,
} from "../retrieval/types";

const CONSISTENCY_WINDOW = 5;

const LOW_RELEVANCE = 0.4;
const LOW_MARGIN = 0.1;
const LOW_COVERAGE = 0.3;
const LOW_CONSISTENCY = 0.3;

export interface RetrievalQualityOptions {
  topK: number;
  weights: RqWeights;
  consistencyScale: number;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function populationStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * RQ = w1·relevance + w2·margin + w3·coverage + w4·consistency
 *
 * Pure. `tier` is left as "abstain" until the decision gate classifies
 * the report.
 */
export function scoreRetrievalQuality(
  results: RerankedResult[],
  totalDocuments: number,
  options: RetrievalQualityOptions
): RetrievalQualityReport {
  const top = results.slice(0, options.topK);
  const scores = top.map((r) => clamp01(r.normalizedScore));

  if (scores.length === 0) {
    return {
      relevance: 0,
      margin: 0,
      coverage: 0,
      consistency: 0,
      rq: 0,
      tier: "abstain",
      reasons: ["no_results"],
    };
  }

  const relevance = scores[0];
  const margin = scores.length > 1 ? clamp01(scores[0] - scores[1]) : 0;

  const distinctDocuments = new Set(top.map((r) => r.documentId)).size;
  const coverageBase = Math.min(options.topK, Math.max(0, totalDocuments));
  const coverage = coverageBase > 0 ? clamp01(distinctDocuments / coverageBase) : 0;

  const spread = populationStdDev(scores.slice(0, CONSISTENCY_WINDOW));
  const consistency = clamp01(1 - Math.min(1, spread / options.consistencyScale));

  const { weights } = options;
  const rq = clamp01(
    weights.relevance * relevance +
      weights.margin * margin +
      weights.coverage * coverage +
      weights.consistency * consistency
  );

  const reasons: RetrievalReasonCode[] = [];
  if (relevance < LOW_RELEVANCE) reasons.push("low_relevance");
  if (margin < LOW_MARGIN) reasons.push("low_margin");
  if (coverage < LOW_COVERAGE) reasons.push("low_coverage");
  if (consistency < LOW_CONSISTENCY) reasons.push("low_consistency");

  return { relevance, margin, coverage, consistency, rq, tier: "abstain", reasons };
}
