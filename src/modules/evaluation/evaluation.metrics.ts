import { FinalDecision } from "../scoring/confidence.score";
import {
  CategoryMetrics,
  ConfusionMatrix,
  EvaluationCaseResult,
  EvaluationMetrics,
} from "./types";

const DECISIONS: readonly FinalDecision[] = ["answer", "clarify", "abstain"];

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function share<T>(items: T[], predicate: (item: T) => boolean): number {
  if (items.length === 0) return 0;
  return items.filter(predicate).length / items.length;
}

export function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const index = Math.floor(p * (sorted.length - 1));
  return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function isValid(result: EvaluationCaseResult): boolean {
  return result.error === undefined;
}

/**
 * Aggregates case results. Rates and averages cover only cases that ran;
 * errored cases are counted separately.
 */
export function computeEvaluationMetrics(results: EvaluationCaseResult[]): EvaluationMetrics {
  const valid = results.filter(isValid);
  const expectedAbstain = valid.filter((r) => r.expectedDecision === "abstain");
  const expectedAnswer = valid.filter((r) => r.expectedDecision === "answer");
  const answeredWithKeywords = valid.filter(
    (r) =>
      r.actualDecision !== "abstain" &&
      r.expectedDecision !== "abstain" &&
      r.keywordsFound.length + r.keywordsMissing.length > 0
  );
  const latencies = valid.map((r) => r.latencyMs);

  return {
    totalCases: results.length,
    validCases: valid.length,
    errorCount: results.length - valid.length,
    decisionAccuracy: share(valid, (r) => r.decisionCorrect),
    abstainRate: share(valid, (r) => r.actualDecision === "abstain"),
    correctAbstainRate: share(expectedAbstain, (r) => r.actualDecision === "abstain"),
    falseAbstainRate: share(expectedAnswer, (r) => r.actualDecision === "abstain"),
    answerQuality: share(answeredWithKeywords, (r) => r.keywordsMissing.length === 0),
    averageConfidence: average(valid.map((r) => r.confidence)),
    averageRetrievalQuality: average(valid.map((r) => r.retrievalQuality)),
    averageLatencyMs: average(latencies),
    p95LatencyMs: percentile(latencies, 0.95),
  };
}

export function buildConfusionMatrix(results: EvaluationCaseResult[]): ConfusionMatrix {
  const row = (): Record<FinalDecision, number> => ({ answer: 0, clarify: 0, abstain: 0 });
  const matrix: ConfusionMatrix = { answer: row(), clarify: row(), abstain: row() };

  for (const r of results) {
    const actual = DECISIONS.find((d) => d === r.actualDecision);
    if (!isValid(r) || actual === undefined) continue;
    matrix[r.expectedDecision][actual]++;
  }
  return matrix;
}

/** Per-category breakdown over valid cases, keyed in category order. */
export function computeCategoryMetrics(
  results: EvaluationCaseResult[]
): Record<string, CategoryMetrics> {
  const groups = new Map<string, EvaluationCaseResult[]>();
  for (const r of results.filter(isValid)) {
    const group = groups.get(r.category) ?? [];
    group.push(r);
    groups.set(r.category, group);
  }

  const byCategory: Record<string, CategoryMetrics> = {};
  for (const category of [...groups.keys()].sort()) {
    const group = groups.get(category) ?? [];
    byCategory[category] = {
      count: group.length,
      decisionAccuracy: share(group, (r) => r.decisionCorrect),
      averageConfidence: average(group.map((r) => r.confidence)),
      averageRetrievalQuality: average(group.map((r) => r.retrievalQuality)),
      averageLatencyMs: average(group.map((r) => r.latencyMs)),
      abstainRate: share(group, (r) => r.actualDecision === "abstain"),
    };
  }
  return byCategory;
}
