import { PipelineMode } from "../config/pipeline.config";
import { RetrievalQualityReport } from "../retrieval/types";
import { FinalDecision } from "../scoring/confidence.score";
import { ReasonCode } from "../scoring/reason.codes";
import { VerificationSignals } from "../verification/types";

export interface CitationValidationResult {
  /** Every [n] marker in order of appearance, duplicates included. */
  citations: number[];
  /** Distinct valid markers in order of first appearance. */
  uniqueCitations: number[];
  invalidCitations: number[];
  chunkIds: string[];
  hasCitations: boolean;
  factualSentenceCount: number;
  citedSentenceCount: number;
  coverage: number;
}

export interface SubQuestionTrace {
  subQuestion: string;
  status: "proceed" | "abstain";
  /** Initial report first; a post-fallback report, when any, second. */
  reports: RetrievalQualityReport[];
  fallbackTriggered: boolean;
  rewrittenQuery?: string;
  candidateCounts: { vector: number; keyword: number };
}

export interface PipelineDebug {
  mode: PipelineMode;
  /** Every retrieval report produced, in the order they were produced. */
  retrieval: RetrievalQualityReport[];
  /** The report downstream scoring used, if retrieval got that far. */
  scoringReport?: RetrievalQualityReport;
  fallbackTriggered: boolean;
  fallbackCount: number;
  subQuestions: SubQuestionTrace[];
  generationAttempted: boolean;
  verification?: VerificationSignals;
  citationValidation?: CitationValidationResult;
  latencyMs: number;
}

export interface PipelineResult {
  answer?: string;
  citations: string[];
  confidence: number;
  decision: FinalDecision;
  reasons: ReasonCode[];
  debug: PipelineDebug;
}
