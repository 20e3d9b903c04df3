import { FlagKind } from "../llm/types";
import { VerificationReasonCode } from "../scoring/reason.codes";

export type CheckName = "groundedness" | "contradiction" | "selfConsistency";

export type CheckOutcome = "pass" | "warn" | "fail";

export interface DegradedCheck {
  check: CheckName;
  status: "timeout" | "error";
  message: string;
}

export interface VerificationSignals {
  groundedness: number;
  contradictionRate: number;
  selfConsistency: number;
  /** Unique flag kinds raised for this answer. */
  flags: FlagKind[];
  outcomes: Record<CheckName, CheckOutcome>;
  degraded: DegradedCheck[];
  reasons: VerificationReasonCode[];
}
