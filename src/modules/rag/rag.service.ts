import {
  DEFAULT_PIPELINE_CONFIG,
  PIPELINE_MODES,
  PipelineConfig,
  PipelineMode,
} from "../config/pipeline.config";
import { callOrDefault } from "../concurrency/timeout";
import { PipelineInputError } from "../errors/pipeline.errors";
import {
  ContradictionDetector,
  Generator,
  QueryDecomposer,
} from "../llm/types";
import { RetrievalDependencies } from "../retrieval/hybrid.retriever";
import {
  CorpusStats,
  RerankedResult,
  RetrievalQualityReport,
} from "../retrieval/types";
import { resolveDecision } from "../scoring/confidence.score";
import { applyGate } from "../scoring/decision.gate";
import { ReasonCode } from "../scoring/reason.codes";
import { verifyAnswer } from "../verification/verification.aggregator";
import { extractAndValidateCitations } from "./citation.extractor";
import { mergeEvidence, toEvidencePassages } from "./context.builder";
import { FallbackController } from "./fallback.controller";
import {
  AssessRetrieval,
  createRetrievalAssessor,
} from "./retrieval.assessment";
import { PipelineDebug, PipelineResult, SubQuestionTrace } from "./types";

export interface PipelineDependencies extends RetrievalDependencies {
  generator: Generator;
  contradictionDetector: ContradictionDetector;
  corpus: CorpusStats;
  decomposer?: QueryDecomposer;
}

const CLARIFY_NOTE =
  "\n\nNote: This answer has moderate uncertainty. Some claims may not be fully supported by the available evidence.";

interface SubQuestionResult {
  trace: SubQuestionTrace;
  evidence: RerankedResult[];
  scoringReport: RetrievalQualityReport;
  reasons: ReasonCode[];
}

function validateInput(query: unknown, mode: unknown): asserts query is string {
  if (typeof query !== "string" || normalizeQuery(query).length === 0) {
    throw new PipelineInputError("Query cannot be empty");
  }
  if (!PIPELINE_MODES.some((m) => m === mode)) {
    throw new PipelineInputError(
      `Mode must be one of ${PIPELINE_MODES.join(", ")}`
    );
  }
}

/**
 * Folds compatibility forms (fullwidth letters, ligatures) and collapses
 * every whitespace run, NBSP included, to one space.
 */
export function normalizeQuery(query: string): string {
  return query.normalize("NFKC").replace(/\s+/g, " ").trim();
}

function uniqueReasons(reasons: ReasonCode[]): ReasonCode[] {
  return Array.from(new Set(reasons));
}

async function planSubQuestions(
  query: string,
  deps: PipelineDependencies,
  config: PipelineConfig
): Promise<string[]> {
  if (!config.decomposition.enabled || !deps.decomposer) return [query];
  const decomposer = deps.decomposer;

  const outcome = await callOrDefault(
    () => decomposer.decompose(query, config.decomposition.maxSubQuestions),
    config.timeouts.decomposeMs,
    "query decomposition",
    [query]
  );

  const subQuestions = Array.from(
    new Set(outcome.value.map(normalizeQuery).filter((q) => q.length > 0))
  ).slice(0, config.decomposition.maxSubQuestions);

  return subQuestions.length > 0 ? subQuestions : [query];
}

async function resolveSubQuestion(
  subQuestion: string,
  assess: AssessRetrieval,
  fallback: FallbackController,
  config: PipelineConfig,
  mode: PipelineMode
): Promise<SubQuestionResult> {
  const gate = config.profiles[mode].gate;
  const initialRound = await assess(subQuestion, "initial");
  const initial = applyGate(initialRound.report, gate);

  const trace: SubQuestionTrace = {
    subQuestion,
    status: "abstain",
    reports: [initial],
    fallbackTriggered: false,
    candidateCounts: initialRound.candidateCounts,
  };

  if (initialRound.unavailable) {
    return {
      trace,
      evidence: [],
      scoringReport: initial,
      reasons: [...initial.reasons, "no_evidence"],
    };
  }

  if (initial.tier === "abstain") {
    return {
      trace,
      evidence: [],
      scoringReport: initial,
      reasons: [...initial.reasons, "low_retrieval_quality"],
    };
  }

  if (initial.tier === "proceed") {
    trace.status = "proceed";
    return {
      trace,
      evidence: initialRound.evidence,
      scoringReport: initial,
      reasons: [...initial.reasons],
    };
  }

  const outcome = await fallback.run(subQuestion, subQuestion);
  const retried = outcome.round.report;
  trace.reports.push(retried);
  trace.fallbackTriggered = true;
  trace.rewrittenQuery = outcome.rewrittenQuery;
  trace.candidateCounts = outcome.round.candidateCounts;

  if (outcome.status === "abstain") {
    return {
      trace,
      evidence: [],
      scoringReport: retried,
      reasons: [...retried.reasons, outcome.reason],
    };
  }

  trace.status = "proceed";
  return {
    trace,
    evidence: outcome.round.evidence,
    scoringReport: retried,
    reasons: [...retried.reasons, "fallback_used"],
  };
}

function weakestReport(results: SubQuestionResult[]): RetrievalQualityReport {
  return results.reduce((weakest, r) =>
    r.scoringReport.rq < weakest.scoringReport.rq ? r : weakest
  ).scoringReport;
}

/**
 * Runs one query through retrieval, gating, optional fallback,
 * generation, verification and the final decision.
 *
 * Anticipated failures resolve to an `abstain` result with reasons.
 * Only bad input (`PipelineInputError`) and unexpected internal errors
 * are thrown.
 */
export async function runPipeline(
  query: string,
  mode: PipelineMode,
  deps: PipelineDependencies,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): Promise<PipelineResult> {
  validateInput(query, mode);
  const startTotal = Date.now();
  const normalizedQuery = normalizeQuery(query);
  const profile = config.profiles[mode];

  const corpusSize = await callOrDefault(
    () => deps.corpus.documentCount(),
    config.timeouts.corpusStatsMs,
    "corpus document count",
    0
  );
  const assess = createRetrievalAssessor(deps, config, corpusSize.value);
  const fallback = new FallbackController(deps.generator, assess, {
    gate: profile.gate,
    rewriteTimeoutMs: config.timeouts.rewriteMs,
  });

  const subQuestions = await planSubQuestions(normalizedQuery, deps, config);
  console.log(`Resolving ${subQuestions.length} sub-question(s) in ${mode} mode`);

  const results = await Promise.all(
    subQuestions.map((subQuestion) =>
      resolveSubQuestion(subQuestion, assess, fallback, config, mode)
    )
  );

  const debug: PipelineDebug = {
    mode,
    retrieval: results.flatMap((r) => r.trace.reports),
    fallbackTriggered: results.some((r) => r.trace.fallbackTriggered),
    fallbackCount: fallback.invocationCount,
    subQuestions: results.map((r) => r.trace),
    generationAttempted: false,
    latencyMs: 0,
  };

  const retrievalReasons = results.flatMap((r) => r.reasons);
  const finish = (result: Omit<PipelineResult, "debug">): PipelineResult => {
    debug.latencyMs = Date.now() - startTotal;
    console.log(
      `Pipeline finished in ${debug.latencyMs}ms: ${result.decision} (confidence ${result.confidence.toFixed(2)})`
    );
    return { ...result, reasons: uniqueReasons(result.reasons), debug };
  };

  if (results.some((r) => r.trace.status === "abstain")) {
    debug.scoringReport = weakestReport(results);
    return finish({
      citations: [],
      confidence: 0,
      decision: "abstain",
      reasons: retrievalReasons,
    });
  }

  const scoringReport = weakestReport(results);
  debug.scoringReport = scoringReport;
  const evidenceResults =
    results.length === 1
      ? results[0].evidence
      : mergeEvidence(
          results.map((r) => r.evidence),
          debug.fallbackTriggered ? config.retrieval.fallbackTopK : config.retrieval.topK
        );
  const evidence = toEvidencePassages(evidenceResults);

  debug.generationAttempted = true;
  const startGeneration = Date.now();
  const generated = await callOrDefault<string | null>(
    () => deps.generator.answer(normalizedQuery, evidence),
    config.timeouts.generationMs,
    "answer generation",
    null
  );
  console.log(`Answer generated in ${Date.now() - startGeneration}ms`);

  if (generated.value === null || generated.value.trim().length === 0) {
    return finish({
      citations: [],
      confidence: 0,
      decision: "abstain",
      reasons: [...retrievalReasons, "generation_failed"],
    });
  }

  const answer = generated.value.trim();
  const citationValidation = extractAndValidateCitations(answer, evidence);
  debug.citationValidation = citationValidation;

  const signals = await verifyAnswer(
    {
      question: normalizedQuery,
      answer,
      evidence,
      citedChunkIds: citationValidation.chunkIds,
    },
    deps,
    {
      ...config.verification,
      checks: profile.checks,
      timeouts: {
        judgeMs: config.timeouts.judgeMs,
        contradictionMs: config.timeouts.contradictionMs,
        selfConsistencyMs: config.timeouts.selfConsistencyMs,
      },
    }
  );
  debug.verification = signals;

  const report = resolveDecision(
    {
      rq: scoringReport.rq,
      groundedness: signals.groundedness,
      contradictionRate: signals.contradictionRate,
      flags: signals.flags,
      outcomes: signals.outcomes,
    },
    {
      weights: profile.confidence,
      thresholds: profile.decision,
      gateHigh: profile.gate.high,
    }
  );

  const reasons: ReasonCode[] = [
    ...retrievalReasons,
    ...signals.reasons,
    ...report.reasons,
  ];

  if (report.decision === "abstain") {
    return finish({
      citations: [],
      confidence: report.confidence,
      decision: "abstain",
      reasons,
    });
  }

  return finish({
    answer: report.decision === "clarify" ? answer + CLARIFY_NOTE : answer,
    citations: citationValidation.chunkIds,
    confidence: report.confidence,
    decision: report.decision,
    reasons,
  });
}

export interface RagPipeline {
  readonly config: PipelineConfig;
  run(query: string, mode?: PipelineMode): Promise<PipelineResult>;
}

export function createRagPipeline(
  deps: PipelineDependencies,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): RagPipeline {
  return {
    config,
    run: (query, mode = config.defaultMode) => runPipeline(query, mode, deps, config),
  };
}
