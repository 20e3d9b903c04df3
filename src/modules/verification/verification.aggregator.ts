import { CheckThresholds, ScoreBand, VerificationConfig } from "../config/pipeline.config";
import { CallOutcome, callOrDefault } from "../concurrency/timeout";
import { VerificationTimeout } from "../errors/pipeline.errors";
import {
  ContradictionDetector,
  EvidencePassage,
  FlagKind,
  Generator,
  JudgeVerdict,
} from "../llm/types";
import { clamp01 } from "../scoring/retrieval.quality";
import { VerificationReasonCode } from "../scoring/reason.codes";
import { answerAgreement } from "./answer.agreement";
import { admitsIgnorance } from "./ignorance.detector";
import {
  CheckName,
  CheckOutcome,
  DegradedCheck,
  VerificationSignals,
} from "./types";

export interface VerificationInput {
  question: string;
  answer: string;
  evidence: EvidencePassage[];
  citedChunkIds: string[];
}

export interface VerificationDependencies {
  generator: Generator;
  contradictionDetector: ContradictionDetector;
}

export interface VerificationSettings extends VerificationConfig {
  checks: CheckThresholds;
  timeouts: {
    judgeMs: number;
    contradictionMs: number;
    selfConsistencyMs: number;
  };
}

interface ContradictionFinding {
  rate: number;
  citedConflict: boolean;
}

function pairKey(first: string, second: string): string {
  return first < second ? `${first}\u0000${second}` : `${second}\u0000${first}`;
}

async function measureContradiction(
  input: VerificationInput,
  detector: ContradictionDetector,
  maxPassages: number
): Promise<ContradictionFinding> {
  const passages = input.evidence.slice(0, maxPassages);
  const [pairs, answerReport] = await Promise.all([
    passages.length >= 2 ? detector.evidenceConflicts(passages) : Promise.resolve([]),
    detector.answerConflicts(input.answer, input.evidence),
  ]);

  const known = new Set(passages.map((p) => p.chunkId));
  const conflicting = new Set<string>();
  let citedConflict = false;
  const cited = new Set(input.citedChunkIds);

  for (const pair of pairs) {
    if (pair.firstChunkId === pair.secondChunkId) continue;
    if (!known.has(pair.firstChunkId) || !known.has(pair.secondChunkId)) continue;
    conflicting.add(pairKey(pair.firstChunkId, pair.secondChunkId));
    if (cited.has(pair.firstChunkId) && cited.has(pair.secondChunkId)) {
      citedConflict = true;
    }
  }

  const comparedPairs = (passages.length * (passages.length - 1)) / 2;
  const claimsChecked = Math.max(0, Math.floor(answerReport.claimsChecked));
  const conflictingClaims = Math.min(
    claimsChecked,
    Math.max(0, Math.floor(answerReport.conflictingClaims))
  );

  const compared = comparedPairs + claimsChecked;
  const rate = compared > 0 ? (conflicting.size + conflictingClaims) / compared : 0;

  return { rate: clamp01(rate), citedConflict };
}

function scoreOutcome(score: number, band: ScoreBand): CheckOutcome {
  if (score >= band.pass) return "pass";
  if (score >= band.warn) return "warn";
  return "fail";
}

function rateOutcome(rate: number, band: ScoreBand): CheckOutcome {
  if (rate <= band.pass) return "pass";
  if (rate <= band.warn) return "warn";
  return "fail";
}

function collectDegraded(
  check: CheckName,
  outcome: CallOutcome<unknown>,
  degraded: DegradedCheck[]
): void {
  if (outcome.status === "ok") return;
  if (outcome.status === "timeout") {
    const timeout = new VerificationTimeout(check, outcome.error.timeoutMs);
    degraded.push({ check, status: "timeout", message: timeout.message });
    return;
  }
  degraded.push({ check, status: "error", message: outcome.error.message });
}

/**
 * Groundedness, contradiction and self-consistency run concurrently and
 * are joined before anything is returned. A check that fails or times out
 * contributes its conservative value and is listed in `degraded`.
 */
export async function verifyAnswer(
  input: VerificationInput,
  deps: VerificationDependencies,
  settings: VerificationSettings
): Promise<VerificationSignals> {
  const { conservative } = settings;

  const [judged, contradiction, regenerated] = await Promise.all([
    callOrDefault<JudgeVerdict>(
      () => deps.generator.judge(input.question, input.answer, input.evidence),
      settings.timeouts.judgeMs,
      "groundedness judge",
      { groundedness: conservative.groundedness, flags: [] }
    ),
    callOrDefault<ContradictionFinding>(
      () =>
        measureContradiction(
          input,
          deps.contradictionDetector,
          settings.maxContradictionPassages
        ),
      settings.timeouts.contradictionMs,
      "contradiction check",
      { rate: conservative.contradictionRate, citedConflict: false }
    ),
    callOrDefault<string | null>(
      () => deps.generator.answer(input.question, input.evidence),
      settings.timeouts.selfConsistencyMs,
      "self-consistency regeneration",
      null
    ),
  ]);

  const groundedness = clamp01(judged.value.groundedness);
  const contradictionRate = clamp01(contradiction.value.rate);
  const selfConsistency =
    regenerated.value === null
      ? conservative.selfConsistency
      : clamp01(answerAgreement(input.answer, regenerated.value));

  const flags = new Set<FlagKind>(judged.value.flags);
  if (admitsIgnorance(input.answer)) flags.add("self_admitted_ignorance");
  if (contradiction.value.citedConflict) flags.add("evidence_conflict");

  const outcomes: Record<CheckName, CheckOutcome> = {
    groundedness: scoreOutcome(groundedness, settings.checks.groundedness),
    contradiction: rateOutcome(contradictionRate, settings.checks.contradiction),
    selfConsistency: scoreOutcome(selfConsistency, settings.checks.selfConsistency),
  };

  const degraded: DegradedCheck[] = [];
  collectDegraded("groundedness", judged, degraded);
  collectDegraded("contradiction", contradiction, degraded);
  collectDegraded("selfConsistency", regenerated, degraded);

  const reasons: VerificationReasonCode[] = [];
  if (outcomes.groundedness === "fail") reasons.push("low_groundedness");
  if (outcomes.selfConsistency === "fail") reasons.push("self_inconsistency");
  if (degraded.some((d) => d.status === "timeout")) reasons.push("verification_timeout");
  if (degraded.some((d) => d.status === "error")) reasons.push("verification_error");

  console.log(
    `Verification: groundedness=${groundedness.toFixed(2)} contradiction=${contradictionRate.toFixed(2)} selfConsistency=${selfConsistency.toFixed(2)}`
  );

  return {
    groundedness,
    contradictionRate,
    selfConsistency,
    flags: Array.from(flags),
    outcomes,
    degraded,
    reasons,
  };
}
