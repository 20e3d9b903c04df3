import { PipelineMode } from "../config/pipeline.config";
import { FinalDecision } from "../scoring/confidence.score";
import { ReasonCode } from "../scoring/reason.codes";

/** A labeled query with the decision the pipeline should reach. */
export interface EvaluationCase {
  id: string;
  query: string;
  category: string;
  mode: PipelineMode;
  expectedDecision: FinalDecision;
  /** Decisions counted as correct; always includes `expectedDecision`. */
  acceptableDecisions: FinalDecision[];
  /** Substrings the answer should contain, compared case-insensitively. */
  expectedAnswerContains: string[];
}

export interface EvaluationCaseResult {
  caseId: string;
  query: string;
  category: string;
  mode: PipelineMode;
  expectedDecision: FinalDecision;
  acceptableDecisions: FinalDecision[];
  actualDecision: FinalDecision | "error";
  answer: string;
  confidence: number;
  retrievalQuality: number;
  latencyMs: number;
  reasons: ReasonCode[];
  decisionCorrect: boolean;
  keywordsFound: string[];
  keywordsMissing: string[];
  error?: string;
}

export interface EvaluationMetrics {
  totalCases: number;
  validCases: number;
  errorCount: number;
  decisionAccuracy: number;
  abstainRate: number;
  /** Of the cases expected to abstain, the share that did. */
  correctAbstainRate: number;
  /** Of the cases expected to answer, the share that abstained. */
  falseAbstainRate: number;
  /** Of answered cases with expected keywords, the share containing all of them. */
  answerQuality: number;
  averageConfidence: number;
  averageRetrievalQuality: number;
  averageLatencyMs: number;
  p95LatencyMs: number;
}

export interface CategoryMetrics {
  count: number;
  decisionAccuracy: number;
  averageConfidence: number;
  averageRetrievalQuality: number;
  averageLatencyMs: number;
  abstainRate: number;
}

/** Rows are expected decisions, columns actual ones. */
export type ConfusionMatrix = Record<FinalDecision, Record<FinalDecision, number>>;

export interface EvaluationReport {
  startedAt: string;
  totalMs: number;
  concurrency: number;
  metrics: EvaluationMetrics;
  confusionMatrix: ConfusionMatrix;
  byCategory: Record<string, CategoryMetrics>;
  results: EvaluationCaseResult[];
}
