import { ConfidenceWeights, DecisionThresholds } from "../config/pipeline.config";
import { FlagKind } from "../llm/types";
import { CheckName, CheckOutcome } from "../verification/types";
import { DecisionReasonCode } from "./reason.codes";
import { clamp01 } from "./retrieval.quality";

export type FinalDecision = "answer" | "clarify" | "abstain";

export interface ConfidenceReport {
  readonly confidence: number;
  readonly decision: FinalDecision;
  readonly reasons: readonly DecisionReasonCode[];
}

export interface DecisionInput {
  rq: number;
  groundedness: number;
  contradictionRate: number;
  flags: readonly FlagKind[];
  outcomes: Readonly<Record<CheckName, CheckOutcome>>;
}

export interface DecisionPolicy {
  weights: ConfidenceWeights;
  thresholds: DecisionThresholds;
  /** T_high of the active mode; separates the two ignorance rules. */
  gateHigh: number;
}

/**
 * CONF = clamp01(α·RQ + β·groundedness − γ·contradictionRate)
 */
export function computeConfidence(
  rq: number,
  groundedness: number,
  contradictionRate: number,
  weights: ConfidenceWeights
): number {
  return clamp01(
    weights.alpha * clamp01(rq) +
      weights.beta * clamp01(groundedness) -
      weights.gamma * clamp01(contradictionRate)
  );
}

interface RuleContext extends DecisionInput {
  confidence: number;
  policy: DecisionPolicy;
}

interface DecisionRule {
  decision: FinalDecision;
  reasons(ctx: RuleContext): DecisionReasonCode[];
}

const WARN_REASONS: Record<CheckName, DecisionReasonCode> = {
  groundedness: "verification_warn_groundedness",
  contradiction: "verification_warn_contradiction",
  selfConsistency: "verification_warn_self_consistency",
};

const CHECK_ORDER: CheckName[] = ["groundedness", "contradiction", "selfConsistency"];

// Priority order matters: the first rule that fires decides, later rules
// that also fire only add their reasons.
const DECISION_RULES: DecisionRule[] = [
  {
    decision: "abstain",
    reasons: (ctx) =>
      ctx.flags.includes("evidence_conflict") ||
      ctx.contradictionRate > ctx.policy.thresholds.contradictionCeiling
        ? ["contradiction_detected"]
        : [],
  },
  {
    decision: "clarify",
    reasons: (ctx) =>
      ctx.flags.includes("self_admitted_ignorance") && ctx.rq >= ctx.policy.gateHigh
        ? ["ignorance_with_strong_evidence"]
        : [],
  },
  {
    decision: "abstain",
    reasons: (ctx) =>
      ctx.flags.includes("self_admitted_ignorance") && ctx.rq < ctx.policy.gateHigh
        ? ["self_admitted_ignorance"]
        : [],
  },
  {
    decision: "clarify",
    reasons: (ctx) =>
      CHECK_ORDER.filter((check) => ctx.outcomes[check] === "warn").map(
        (check) => WARN_REASONS[check]
      ),
  },
  {
    decision: "answer",
    reasons: (ctx) =>
      ctx.confidence >= ctx.policy.thresholds.clarifyHigh ? ["high_confidence"] : [],
  },
  {
    decision: "clarify",
    reasons: (ctx) =>
      ctx.confidence >= ctx.policy.thresholds.clarifyLow &&
      ctx.confidence < ctx.policy.thresholds.clarifyHigh
        ? ["moderate_confidence"]
        : [],
  },
  {
    decision: "abstain",
    reasons: (ctx) =>
      ctx.confidence < ctx.policy.thresholds.clarifyLow ? ["low_confidence"] : [],
  },
];

/**
 * Computes CONF and walks the decision cascade. Pure: the same input
 * always yields an equal report.
 */
export function resolveDecision(
  input: DecisionInput,
  policy: DecisionPolicy
): ConfidenceReport {
  const confidence = computeConfidence(
    input.rq,
    input.groundedness,
    input.contradictionRate,
    policy.weights
  );
  const ctx: RuleContext = { ...input, confidence, policy };

  let decision: FinalDecision | undefined;
  const reasons: DecisionReasonCode[] = [];

  for (const rule of DECISION_RULES) {
    const fired = rule.reasons(ctx);
    if (fired.length === 0) continue;
    reasons.push(...fired);
    if (decision === undefined) decision = rule.decision;
  }

  // Rules 5-7 partition [0,1], so one of them always fires.
  return { confidence, decision: decision ?? "abstain", reasons };
}
