import dotenv from "dotenv";
import { loadPipelineConfig } from "../config/pipeline.config";
import { loadServiceConfig } from "../config/service.config";
import { describeError } from "../errors/pipeline.errors";
import { createServicePipeline } from "../rag/pipeline.factory";
import { FinalDecision } from "../scoring/confidence.score";
import { loadEvaluationCases } from "./dataset.loader";
import { runEvaluation, saveEvaluationReport } from "./evaluation.service";
import { EvaluationReport } from "./types";

const DECISIONS: FinalDecision[] = ["answer", "clarify", "abstain"];

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** Console summary of a finished run. */
export function formatEvaluationReport(report: EvaluationReport): string[] {
  const m = report.metrics;
  const lines = [
    "EVALUATION SUMMARY",
    `  Total cases:          ${m.totalCases}`,
    `  Valid cases:          ${m.validCases}`,
    `  Errors:               ${m.errorCount}`,
    `  Decision accuracy:    ${pct(m.decisionAccuracy)}`,
    `  Abstain rate:         ${pct(m.abstainRate)}`,
    `  Correct abstain rate: ${pct(m.correctAbstainRate)}`,
    `  False abstain rate:   ${pct(m.falseAbstainRate)}`,
    `  Answer quality:       ${pct(m.answerQuality)}`,
    `  Avg confidence:       ${m.averageConfidence.toFixed(4)}`,
    `  Avg RQ:               ${m.averageRetrievalQuality.toFixed(4)}`,
    `  Avg latency:          ${m.averageLatencyMs.toFixed(0)} ms (p95 ${m.p95LatencyMs} ms)`,
    "",
    "PER-CATEGORY BREAKDOWN",
  ];

  for (const [category, c] of Object.entries(report.byCategory)) {
    lines.push(
      `  ${category.padEnd(16)} n=${c.count} accuracy=${pct(c.decisionAccuracy)} ` +
        `conf=${c.averageConfidence.toFixed(3)} rq=${c.averageRetrievalQuality.toFixed(3)} ` +
        `latency=${c.averageLatencyMs.toFixed(0)}ms abstain=${pct(c.abstainRate)}`
    );
  }

  lines.push("", "CONFUSION MATRIX (expected \\ actual)");
  lines.push(`  ${"".padStart(10)}${DECISIONS.map((d) => d.padStart(10)).join("")}`);
  for (const expected of DECISIONS) {
    const row = DECISIONS.map((actual) => String(report.confusionMatrix[expected][actual]).padStart(10));
    lines.push(`  ${expected.padStart(10)}${row.join("")}`);
  }

  lines.push("", "CASES");
  for (const r of report.results) {
    const status = r.error !== undefined ? "ERROR" : r.decisionCorrect ? "PASS" : "FAIL";
    lines.push(
      `  [${status.padStart(5)}] ${r.caseId.padEnd(16)} expected=${r.expectedDecision.padEnd(8)} ` +
        `actual=${r.actualDecision.padEnd(8)} conf=${r.confidence.toFixed(3)} rq=${r.retrievalQuality.toFixed(3)}`
    );
    if (r.keywordsMissing.length > 0 && r.error === undefined) {
      lines.push(`          missing keywords: ${r.keywordsMissing.join(", ")}`);
    }
    if (r.error !== undefined) {
      lines.push(`          error: ${r.error}`);
    }
  }
  return lines;
}

async function main(): Promise<void> {
  dotenv.config();
  const service = loadServiceConfig();
  const casesFile = process.argv[2] ?? service.evaluation.casesFile;
  const outputFile = process.argv[3] ?? service.evaluation.outputFile;

  const cases = await loadEvaluationCases(casesFile);
  const pipeline = createServicePipeline(service, loadPipelineConfig());
  const report = await runEvaluation(pipeline, cases, service.evaluation.concurrency);

  for (const line of formatEvaluationReport(report)) console.log(line);
  await saveEvaluationReport(report, outputFile);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Evaluation failed:", describeError(error));
    process.exitCode = 1;
  });
}
