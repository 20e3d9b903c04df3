import { GateThresholds } from "../config/pipeline.config";
import { callOrDefault } from "../concurrency/timeout";
import { FallbackExhausted } from "../errors/pipeline.errors";
import { Generator } from "../llm/types";
import { AssessRetrieval, RetrievalRound } from "./retrieval.assessment";

export interface FallbackSettings {
  gate: GateThresholds;
  rewriteTimeoutMs: number;
}

export type FallbackOutcome =
  | { status: "proceed"; round: RetrievalRound; rewrittenQuery: string }
  | {
      status: "abstain";
      round: RetrievalRound;
      rewrittenQuery: string;
      reason: "low_retrieval_quality_after_fallback";
    };

/**
 * One bounded retry per scope: rewrite the query, widen retrieval and
 * score again. The second report either clears T_low and is used as is,
 * or the scope abstains. A controller lives for one top-level query;
 * scopes are the query itself or its sub-questions.
 */
export class FallbackController {
  private readonly usedScopes = new Set<string>();
  private invocations = 0;

  constructor(
    private readonly generator: Generator,
    private readonly assess: AssessRetrieval,
    private readonly settings: FallbackSettings
  ) {}

  get invocationCount(): number {
    return this.invocations;
  }

  async run(scope: string, query: string): Promise<FallbackOutcome> {
    if (this.usedScopes.has(scope)) {
      throw new FallbackExhausted(scope);
    }
    this.usedScopes.add(scope);
    this.invocations++;

    const rewrite = await callOrDefault(
      () => this.generator.rewrite(query),
      this.settings.rewriteTimeoutMs,
      "query rewrite",
      query
    );
    const rewrittenQuery = rewrite.value.trim().length > 0 ? rewrite.value.trim() : query;
    console.log(`Fallback for "${scope}": retrying with "${rewrittenQuery}"`);

    const round = await this.assess(rewrittenQuery, "widened");

    if (round.report.rq >= this.settings.gate.low) {
      return {
        status: "proceed",
        round: { ...round, report: { ...round.report, tier: "proceed" } },
        rewrittenQuery,
      };
    }

    return {
      status: "abstain",
      round: { ...round, report: { ...round.report, tier: "abstain" } },
      rewrittenQuery,
      reason: "low_retrieval_quality_after_fallback",
    };
  }
}
