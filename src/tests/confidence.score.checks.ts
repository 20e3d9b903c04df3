import assert from "assert/strict";
import { test } from "node:test";
import { DEFAULT_PIPELINE_CONFIG } from "../modules/config/pipeline.config";
import {
  DecisionInput,
  DecisionPolicy,
  computeConfidence,
  resolveDecision,
} from "../modules/scoring/confidence.score";
import { approxEqual } from "./fixtures";

const profile = DEFAULT_PIPELINE_CONFIG.profiles.normal;
const policy: DecisionPolicy = {
  weights: profile.confidence,
  thresholds: profile.decision,
  gateHigh: profile.gate.high,
};

function decisionInput(overrides: Partial<DecisionInput> = {}): DecisionInput {
  return {
    rq: 0.8,
    groundedness: 0.9,
    contradictionRate: 0,
    flags: [],
    outcomes: { groundedness: "pass", contradiction: "pass", selfConsistency: "pass" },
    ...overrides,
  };
}

test("CONF = 0.5·RQ + 0.4·g − 0.3·c", () => {
  approxEqual(computeConfidence(0.8, 0.9, 0, profile.confidence), 0.76);
  approxEqual(computeConfidence(0.6, 0.9, 0, profile.confidence), 0.66);
  approxEqual(computeConfidence(0.8, 0.9, 0.5, profile.confidence), 0.61);
  assert.equal(computeConfidence(0, 0, 1, profile.confidence), 0);
});

test("strong retrieval and grounding answer with high confidence", () => {
  const report = resolveDecision(decisionInput(), policy);

  approxEqual(report.confidence, 0.76);
  assert.equal(report.decision, "answer");
  assert.deepEqual(report.reasons, ["high_confidence"]);
});

test("RQ 0.60 with groundedness 0.9 answers at 0.66", () => {
  const report = resolveDecision(decisionInput({ rq: 0.6 }), policy);

  approxEqual(report.confidence, 0.66);
  assert.equal(report.decision, "answer");
});

test("moderate contradiction lowers confidence but still answers", () => {
  const report = resolveDecision(
    decisionInput({
      contradictionRate: 0.5,
      outcomes: { groundedness: "pass", contradiction: "fail", selfConsistency: "pass" },
    }),
    policy
  );

  approxEqual(report.confidence, 0.61);
  assert.equal(report.decision, "answer");
});

test("contradiction above the ceiling abstains regardless of confidence", () => {
  const report = resolveDecision(
    decisionInput({
      rq: 1,
      groundedness: 1,
      contradictionRate: 0.65,
      outcomes: { groundedness: "pass", contradiction: "fail", selfConsistency: "pass" },
    }),
    policy
  );

  approxEqual(report.confidence, 0.705);
  assert.equal(report.decision, "abstain");
  assert.deepEqual(report.reasons, ["contradiction_detected", "high_confidence"]);
});

test("a conflict between cited passages abstains", () => {
  const report = resolveDecision(decisionInput({ flags: ["evidence_conflict"] }), policy);

  assert.equal(report.decision, "abstain");
  assert.equal(report.reasons[0], "contradiction_detected");
});

test("admitted ignorance over strong evidence asks for clarification", () => {
  const report = resolveDecision(
    decisionInput({ rq: 0.7, flags: ["self_admitted_ignorance"] }),
    policy
  );

  assert.equal(report.decision, "clarify");
  assert.deepEqual(report.reasons, ["ignorance_with_strong_evidence", "high_confidence"]);
});

test("admitted ignorance over weak evidence abstains", () => {
  const report = resolveDecision(
    decisionInput({ rq: 0.5, flags: ["self_admitted_ignorance"] }),
    policy
  );

  assert.equal(report.decision, "abstain");
  assert.equal(report.reasons[0], "self_admitted_ignorance");
});

test("contradiction outranks admitted ignorance", () => {
  const report = resolveDecision(
    decisionInput({ rq: 0.7, flags: ["self_admitted_ignorance", "evidence_conflict"] }),
    policy
  );

  assert.equal(report.decision, "abstain");
  assert.deepEqual(report.reasons.slice(0, 2), [
    "contradiction_detected",
    "ignorance_with_strong_evidence",
  ]);
});

test("a warn outcome turns a confident answer into clarify", () => {
  const report = resolveDecision(
    decisionInput({
      outcomes: { groundedness: "pass", contradiction: "pass", selfConsistency: "warn" },
    }),
    policy
  );

  assert.equal(report.decision, "clarify");
  assert.deepEqual(report.reasons, ["verification_warn_self_consistency", "high_confidence"]);
});

test("confidence bands map onto answer, clarify and abstain", () => {
  // 0.5·0.5 + 0.4·0.5 = 0.45
  const middle = resolveDecision(decisionInput({ rq: 0.5, groundedness: 0.5 }), policy);
  // 0.5·0.2 + 0.4·0.3 = 0.22
  const low = resolveDecision(decisionInput({ rq: 0.2, groundedness: 0.3 }), policy);

  assert.equal(middle.decision, "clarify");
  assert.deepEqual(middle.reasons, ["moderate_confidence"]);
  assert.equal(low.decision, "abstain");
  assert.deepEqual(low.reasons, ["low_confidence"]);
});

test("resolving the same input twice gives identical reports", () => {
  const input = decisionInput({ rq: 0.63, groundedness: 0.71, contradictionRate: 0.12 });
  assert.deepEqual(resolveDecision(input, policy), resolveDecision(input, policy));
});
