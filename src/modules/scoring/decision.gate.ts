import { GateThresholds } from "../config/pipeline.config";
import { GateTier, RetrievalQualityReport } from "../retrieval/types";

export function classifyRetrieval(rq: number, thresholds: GateThresholds): GateTier {
  if (rq >= thresholds.high) return "proceed";
  if (rq >= thresholds.low) return "fallback";
  return "abstain";
}

export function applyGate(
  report: RetrievalQualityReport,
  thresholds: GateThresholds
): RetrievalQualityReport {
  return { ...report, tier: classifyRetrieval(report.rq, thresholds) };
}
