import fs from "fs";
import path from "path";
import { ConcurrencyLimiter } from "../concurrency/concurrency.limiter";
import { describeError } from "../errors/pipeline.errors";
import { RagPipeline } from "../rag/rag.service";
import {
  buildConfusionMatrix,
  computeCategoryMetrics,
  computeEvaluationMetrics,
} from "./evaluation.metrics";
import { EvaluationCase, EvaluationCaseResult, EvaluationReport } from "./types";

export const DEFAULT_EVALUATION_CONCURRENCY = 3;

function matchKeywords(answer: string, keywords: string[]) {
  const lower = answer.toLowerCase();
  return {
    keywordsFound: keywords.filter((kw) => lower.includes(kw.toLowerCase())),
    keywordsMissing: keywords.filter((kw) => !lower.includes(kw.toLowerCase())),
  };
}

function errorResult(item: EvaluationCase, error: unknown): EvaluationCaseResult {
  return {
    caseId: item.id,
    query: item.query,
    category: item.category,
    mode: item.mode,
    expectedDecision: item.expectedDecision,
    acceptableDecisions: item.acceptableDecisions,
    actualDecision: "error",
    answer: "",
    confidence: 0,
    retrievalQuality: 0,
    latencyMs: 0,
    reasons: [],
    decisionCorrect: false,
    keywordsFound: [],
    keywordsMissing: item.expectedAnswerContains,
    error: describeError(error),
  };
}

/**
 * Runs one labeled case through the pipeline. A thrown error becomes an
 * `error` result instead of failing the batch.
 */
export async function evaluateCase(
  pipeline: RagPipeline,
  item: EvaluationCase
): Promise<EvaluationCaseResult> {
  try {
    const result = await pipeline.run(item.query, item.mode);
    const answer = result.answer ?? "";

    return {
      caseId: item.id,
      query: item.query,
      category: item.category,
      mode: item.mode,
      expectedDecision: item.expectedDecision,
      acceptableDecisions: item.acceptableDecisions,
      actualDecision: result.decision,
      answer,
      confidence: result.confidence,
      retrievalQuality: result.debug.scoringReport?.rq ?? 0,
      latencyMs: result.debug.latencyMs,
      reasons: result.reasons,
      decisionCorrect: item.acceptableDecisions.includes(result.decision),
      ...matchKeywords(answer, item.expectedAnswerContains),
    };
  } catch (error) {
    console.warn(`Evaluation case "${item.id}" failed:`, describeError(error));
    return errorResult(item, error);
  }
}

/**
 * Runs every case with at most `concurrency` in flight and aggregates the
 * results. Results keep the order of `cases`.
 */
export async function runEvaluation(
  pipeline: RagPipeline,
  cases: EvaluationCase[],
  concurrency: number = DEFAULT_EVALUATION_CONCURRENCY
): Promise<EvaluationReport> {
  const startBatch = Date.now();
  const startedAt = new Date(startBatch).toISOString();
  const limiter = new ConcurrencyLimiter(concurrency);

  console.log(`Evaluating ${cases.length} case(s) with concurrency ${concurrency}`);

  const results = await Promise.all(
    cases.map((item) => limiter.run(() => evaluateCase(pipeline, item)))
  );

  return {
    startedAt,
    totalMs: Date.now() - startBatch,
    concurrency,
    metrics: computeEvaluationMetrics(results),
    confusionMatrix: buildConfusionMatrix(results),
    byCategory: computeCategoryMetrics(results),
    results,
  };
}

export async function saveEvaluationReport(
  report: EvaluationReport,
  outputFile: string
): Promise<string> {
  const resolved = path.resolve(process.cwd(), outputFile);
  await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
  await fs.promises.writeFile(resolved, JSON.stringify(report, null, 2), "utf8");
  console.log(`Evaluation report saved to ${resolved}`);
  return resolved;
}
