import { RetrievalReasonCode } from "../retrieval/types";

export type GateReasonCode =
  | "no_evidence"
  | "low_retrieval_quality"
  | "low_retrieval_quality_after_fallback"
  | "fallback_used";

export type VerificationReasonCode =
  | "low_groundedness"
  | "self_inconsistency"
  | "verification_timeout"
  | "verification_error";

export type DecisionReasonCode =
  | "contradiction_detected"
  | "ignorance_with_strong_evidence"
  | "self_admitted_ignorance"
  | "verification_warn_groundedness"
  | "verification_warn_contradiction"
  | "verification_warn_self_consistency"
  | "high_confidence"
  | "moderate_confidence"
  | "low_confidence";

export type ReasonCode =
  | RetrievalReasonCode
  | GateReasonCode
  | VerificationReasonCode
  | DecisionReasonCode
  | "generation_failed";
