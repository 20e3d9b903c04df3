import assert from "assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { test } from "node:test";
import { PipelineMode } from "../modules/config/pipeline.config";
import { EvaluationDatasetError } from "../modules/errors/pipeline.errors";
import {
  loadEvaluationCases,
  parseEvaluationCases,
} from "../modules/evaluation/dataset.loader";
import {
  computeEvaluationMetrics,
  percentile,
} from "../modules/evaluation/evaluation.metrics";
import {
  runEvaluation,
  saveEvaluationReport,
} from "../modules/evaluation/evaluation.service";
import { formatEvaluationReport } from "../modules/evaluation/run_evaluation";
import { EvaluationCase } from "../modules/evaluation/types";
import { RagPipeline, createRagPipeline } from "../modules/rag/rag.service";
import { PipelineResult } from "../modules/rag/types";
import {
  approxEqual,
  FakeContradictionDetector,
  FakeGenerator,
  FakeIndex,
  FakeReranker,
  fixedCorpus,
  logit,
} from "./fixtures";

function datasetIssues(raw: unknown): string[] {
  try {
    parseEvaluationCases(raw);
  } catch (error) {
    assert.ok(error instanceof EvaluationDatasetError);
    return error.issues;
  }
  assert.fail("expected an EvaluationDatasetError");
}

test("a minimal case gets normal mode and its expected decision as acceptable", () => {
  const cases = parseEvaluationCases([
    {
      id: "fees-1",
      query: "How much is tuition?",
      category: "factual",
      expectedDecision: "answer",
      acceptableDecisions: ["clarify", "answer"],
    },
  ]);

  assert.deepEqual(cases, [
    {
      id: "fees-1",
      query: "How much is tuition?",
      category: "factual",
      mode: "normal",
      expectedDecision: "answer",
      acceptableDecisions: ["answer", "clarify"],
      expectedAnswerContains: [],
    },
  ]);
});

test("every malformed case is reported together", () => {
  const issues = datasetIssues([
    { id: "a", query: " ", category: "factual", expectedDecision: "maybe" },
    { id: "b", query: "q", category: "c", expectedDecision: "abstain", mode: "lenient" },
    { id: "c", query: "q", category: "c", expectedDecision: "abstain", expectedAnswerContains: [1] },
    "not a case",
  ]);

  assert.deepEqual(issues, [
    'case 1: "query" must be a non-empty string',
    'case 1: "expectedDecision" must be one of answer, clarify, abstain',
    'case 2: "mode" must be one of normal, strict',
    'case 3: "expectedAnswerContains" must be an array of non-empty strings',
    "case 4 must be an object",
  ]);
});

test("duplicate ids, empty lists and non-arrays are rejected", () => {
  const item = { id: "a", query: "q", category: "c", expectedDecision: "abstain" };

  assert.deepEqual(datasetIssues([item, item]), ['case 2: duplicate id "a"']);
  assert.deepEqual(datasetIssues([]), ["cases must not be empty"]);
  assert.deepEqual(datasetIssues({ cases: [] }), ["cases must be a JSON array"]);
});

test("the bundled case file loads", async () => {
  const cases = await loadEvaluationCases("data/eval_cases.json");

  assert.equal(cases.length, 12);
  assert.equal(new Set(cases.map((c) => c.id)).size, 12);
  assert.deepEqual(
    cases.filter((c) => c.mode === "strict").map((c) => c.id),
    ["strict-001", "strict-002"]
  );
});

test("a case file that is not JSON is a dataset error", async () => {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "eval-cases-"));
  const file = path.join(dir, "cases.json");
  await fs.promises.writeFile(file, "[{", "utf8");

  await assert.rejects(() => loadEvaluationCases(file), EvaluationDatasetError);
  await fs.promises.rm(dir, { recursive: true, force: true });
});

const alphaAnswer = "Alpha is the first letter of the Greek alphabet [1].";

function fakePipeline(): RagPipeline {
  const index = new FakeIndex({
    q: [{ chunkId: "c1", documentId: "d1", text: "alpha text" }],
    weak: [{ chunkId: "c2", documentId: "d2", text: "weak text" }],
  });
  const pipeline = createRagPipeline({
    embedder: index.embedder,
    vectorSearch: index.vector,
    keywordSearch: index.keyword,
    reranker: new FakeReranker({ "alpha text": logit(0.95), "weak text": logit(0.05) }),
    corpus: fixedCorpus(1),
    generator: new FakeGenerator({ answers: [alphaAnswer] }),
    contradictionDetector: new FakeContradictionDetector(),
  });

  return {
    config: pipeline.config,
    run: (query, mode) =>
      query === "explode" ? Promise.reject(new Error("index corrupted")) : pipeline.run(query, mode),
  };
}

function labeled(
  id: string,
  query: string,
  category: string,
  expectedDecision: EvaluationCase["expectedDecision"],
  expectedAnswerContains: string[] = []
): EvaluationCase {
  return {
    id,
    query,
    category,
    mode: "normal",
    expectedDecision,
    acceptableDecisions: [expectedDecision],
    expectedAnswerContains,
  };
}

const labeledCases: EvaluationCase[] = [
  labeled("a", "q", "factual", "answer", ["greek", "omega"]),
  labeled("b", "nothing", "out_of_scope", "abstain"),
  labeled("c", "weak", "factual", "answer"),
  labeled("d", "explode", "factual", "answer", ["alpha"]),
];

test("an evaluation run scores each case and aggregates the batch", async () => {
  const report = await runEvaluation(fakePipeline(), labeledCases, 2);
  const [a, b, c, d] = report.results;

  assert.deepEqual(
    report.results.map((r) => [r.caseId, r.actualDecision, r.decisionCorrect]),
    [
      ["a", "answer", true],
      ["b", "abstain", true],
      ["c", "abstain", false],
      ["d", "error", false],
    ]
  );
  assert.equal(a.answer, alphaAnswer);
  assert.deepEqual(a.keywordsFound, ["greek"]);
  assert.deepEqual(a.keywordsMissing, ["omega"]);
  approxEqual(a.confidence, 0.75);
  approxEqual(a.retrievalQuality, 0.78);
  assert.deepEqual(b.reasons, ["no_results", "no_evidence"]);
  assert.equal(b.retrievalQuality, 0);
  assert.ok(c.reasons.includes("low_retrieval_quality_after_fallback"));
  assert.equal(d.error, "index corrupted");
  assert.deepEqual(d.keywordsMissing, ["alpha"]);

  const m = report.metrics;
  assert.equal(m.totalCases, 4);
  assert.equal(m.validCases, 3);
  assert.equal(m.errorCount, 1);
  approxEqual(m.decisionAccuracy, 2 / 3);
  approxEqual(m.abstainRate, 2 / 3);
  assert.equal(m.correctAbstainRate, 1);
  assert.equal(m.falseAbstainRate, 0.5);
  assert.equal(m.answerQuality, 0);
  approxEqual(m.averageConfidence, 0.25);

  assert.deepEqual(report.confusionMatrix, {
    answer: { answer: 1, clarify: 0, abstain: 1 },
    clarify: { answer: 0, clarify: 0, abstain: 0 },
    abstain: { answer: 0, clarify: 0, abstain: 1 },
  });
  assert.deepEqual(Object.keys(report.byCategory), ["factual", "out_of_scope"]);
  assert.equal(report.byCategory.factual.count, 2);
  assert.equal(report.byCategory.factual.decisionAccuracy, 0.5);
  assert.equal(report.byCategory.factual.abstainRate, 0.5);
  assert.equal(report.byCategory.out_of_scope.abstainRate, 1);
  assert.equal(report.concurrency, 2);
});

test("the run keeps at most the requested number of cases in flight", async () => {
  let inFlight = 0;
  let peak = 0;
  const modes: Array<PipelineMode | undefined> = [];
  const result: PipelineResult = {
    citations: [],
    confidence: 0,
    decision: "abstain",
    reasons: ["no_evidence"],
    debug: {
      mode: "normal",
      retrieval: [],
      fallbackTriggered: false,
      fallbackCount: 0,
      subQuestions: [],
      generationAttempted: false,
      latencyMs: 4,
    },
  };
  const pipeline: RagPipeline = {
    config: fakePipeline().config,
    run: async (_query, mode) => {
      modes.push(mode);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return result;
    },
  };
  const cases = ["1", "2", "3", "4", "5"].map((id) => ({
    ...labeled(id, `query ${id}`, "c", "abstain"),
    mode: "strict" as const,
  }));

  const report = await runEvaluation(pipeline, cases, 2);

  assert.equal(peak, 2);
  assert.deepEqual(modes, ["strict", "strict", "strict", "strict", "strict"]);
  assert.equal(report.metrics.decisionAccuracy, 1);
  assert.equal(report.metrics.averageLatencyMs, 4);
  assert.equal(report.metrics.p95LatencyMs, 4);
});

test("metrics over no cases are all zero", () => {
  assert.deepEqual(computeEvaluationMetrics([]), {
    totalCases: 0,
    validCases: 0,
    errorCount: 0,
    decisionAccuracy: 0,
    abstainRate: 0,
    correctAbstainRate: 0,
    falseAbstainRate: 0,
    answerQuality: 0,
    averageConfidence: 0,
    averageRetrievalQuality: 0,
    averageLatencyMs: 0,
    p95LatencyMs: 0,
  });
});

test("percentile picks the floor index of the sorted values", () => {
  assert.equal(percentile([30, 10, 20, 40], 0.95), 30);
  assert.equal(percentile([5], 0.95), 5);
  assert.equal(percentile([], 0.95), 0);
});

test("the summary and the saved report reflect the run", async () => {
  const report = await runEvaluation(fakePipeline(), labeledCases, 1);
  const lines = formatEvaluationReport(report);

  assert.ok(lines.includes("  Decision accuracy:    66.7%"));
  assert.ok(lines.includes("      answer         1         0         1"));
  assert.ok(lines.includes("          error: index corrupted"));

  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "eval-report-"));
  const saved = await saveEvaluationReport(report, path.join(dir, "nested", "report.json"));
  const reloaded: unknown = JSON.parse(await fs.promises.readFile(saved, "utf8"));

  assert.deepEqual(reloaded, JSON.parse(JSON.stringify(report)));
  await fs.promises.rm(dir, { recursive: true, force: true });
});
