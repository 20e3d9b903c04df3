import { ConfigurationError } from "../errors/pipeline.errors";

export type PipelineMode = "normal" | "strict";

export const PIPELINE_MODES: readonly PipelineMode[] = ["normal", "strict"];

export interface RqWeights {
  relevance: number;
  margin: number;
  coverage: number;
  consistency: number;
}

export interface ConfidenceWeights {
  alpha: number;
  beta: number;
  gamma: number;
}

export interface GateThresholds {
  high: number;
  low: number;
}

export interface ScoreBand {
  pass: number;
  warn: number;
}

/**
 * Groundedness and self-consistency pass when the score is at or above
 * `pass`; contradiction passes when the rate is at or below `pass`.
 */
export interface CheckThresholds {
  groundedness: ScoreBand;
  contradiction: ScoreBand;
  selfConsistency: ScoreBand;
}

export interface DecisionThresholds {
  clarifyHigh: number;
  clarifyLow: number;
  contradictionCeiling: number;
}

export interface ModeProfile {
  gate: GateThresholds;
  confidence: ConfidenceWeights;
  checks: CheckThresholds;
  decision: DecisionThresholds;
}

export interface RetrievalConfig {
  rrfK: number;
  searchK: number;
  rerankTopN: number;
  topK: number;
  fallbackSearchK: number;
  fallbackTopK: number;
  rqWeights: RqWeights;
  consistencyScale: number;
}

export interface TimeoutConfig {
  embedMs: number;
  searchMs: number;
  rerankMs: number;
  corpusStatsMs: number;
  decomposeMs: number;
  rewriteMs: number;
  generationMs: number;
  judgeMs: number;
  contradictionMs: number;
  selfConsistencyMs: number;
}

export interface VerificationConfig {
  maxContradictionPassages: number;
  conservative: {
    groundedness: number;
    contradictionRate: number;
    selfConsistency: number;
  };
}

export interface DecompositionConfig {
  enabled: boolean;
  maxSubQuestions: number;
}

export interface PipelineConfig {
  defaultMode: PipelineMode;
  retrieval: RetrievalConfig;
  timeouts: TimeoutConfig;
  verification: VerificationConfig;
  decomposition: DecompositionConfig;
  profiles: Record<PipelineMode, ModeProfile>;
}

const NORMAL_PROFILE: ModeProfile = {
  gate: { high: 0.55, low: 0.35 },
  confidence: { alpha: 0.5, beta: 0.4, gamma: 0.3 },
  checks: {
    groundedness: { pass: 0.7, warn: 0.5 },
    contradiction: { pass: 0.2, warn: 0.4 },
    selfConsistency: { pass: 0.6, warn: 0.4 },
  },
  decision: { clarifyHigh: 0.6, clarifyLow: 0.35, contradictionCeiling: 0.6 },
};

const STRICT_PROFILE: ModeProfile = {
  gate: { high: 0.65, low: 0.45 },
  confidence: { alpha: 0.5, beta: 0.4, gamma: 0.3 },
  checks: {
    groundedness: { pass: 0.85, warn: 0.5 },
    contradiction: { pass: 0.1, warn: 0.4 },
    selfConsistency: { pass: 0.6, warn: 0.4 },
  },
  decision: { clarifyHigh: 0.6, clarifyLow: 0.35, contradictionCeiling: 0.6 },
};

export const DEFAULT_PIPELINE_CONFIG = deepFreeze<PipelineConfig>({
  defaultMode: "normal",
  retrieval: {
    rrfK: 60,
    searchK: 50,
    rerankTopN: 20,
    topK: 10,
    fallbackSearchK: 100,
    fallbackTopK: 20,
    rqWeights: { relevance: 0.4, margin: 0.2, coverage: 0.2, consistency: 0.2 },
    consistencyScale: 0.25,
  },
  timeouts: {
    embedMs: 10_000,
    searchMs: 10_000,
    rerankMs: 10_000,
    corpusStatsMs: 5_000,
    decomposeMs: 15_000,
    rewriteMs: 15_000,
    generationMs: 60_000,
    judgeMs: 30_000,
    contradictionMs: 30_000,
    selfConsistencyMs: 60_000,
  },
  verification: {
    maxContradictionPassages: 5,
    conservative: { groundedness: 0, contradictionRate: 1, selfConsistency: 0 },
  },
  decomposition: { enabled: false, maxSubQuestions: 5 },
  profiles: { normal: NORMAL_PROFILE, strict: STRICT_PROFILE },
});

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

export type Env = Record<string, string | undefined>;

export class EnvReader {
  readonly issues: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string, fallback: string): string {
    const raw = this.env[name];
    if (raw === undefined || raw.trim().length === 0) return fallback;
    return raw.trim();
  }

  number(name: string, fallback: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw.trim().length === 0) return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
      this.issues.push(`${name} must be a number (got "${raw}")`);
      return fallback;
    }
    return n;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name];
    if (raw === undefined || raw.trim().length === 0) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "off"].includes(normalized)) return false;
    this.issues.push(`${name} must be a boolean (got "${raw}")`);
    return fallback;
  }

  mode(name: string, fallback: PipelineMode): PipelineMode {
    const raw = this.env[name];
    if (raw === undefined || raw.trim().length === 0) return fallback;
    const mode = PIPELINE_MODES.find((m) => m === raw.trim().toLowerCase());
    if (!mode) {
      this.issues.push(`${name} must be one of ${PIPELINE_MODES.join(", ")}`);
      return fallback;
    }
    return mode;
  }
}

function readProfile(
  reader: EnvReader,
  prefix: string,
  base: ModeProfile
): ModeProfile {
  return {
    gate: {
      high: reader.number(`${prefix}T_HIGH`, base.gate.high),
      low: reader.number(`${prefix}T_LOW`, base.gate.low),
    },
    confidence: {
      alpha: reader.number(`${prefix}CONF_ALPHA`, base.confidence.alpha),
      beta: reader.number(`${prefix}CONF_BETA`, base.confidence.beta),
      gamma: reader.number(`${prefix}CONF_GAMMA`, base.confidence.gamma),
    },
    checks: {
      groundedness: {
        pass: reader.number(`${prefix}GROUNDEDNESS_PASS`, base.checks.groundedness.pass),
        warn: reader.number(`${prefix}GROUNDEDNESS_WARN`, base.checks.groundedness.warn),
      },
      contradiction: {
        pass: reader.number(`${prefix}CONTRADICTION_PASS`, base.checks.contradiction.pass),
        warn: reader.number(`${prefix}CONTRADICTION_WARN`, base.checks.contradiction.warn),
      },
      selfConsistency: {
        pass: reader.number(`${prefix}SELF_CONSISTENCY_PASS`, base.checks.selfConsistency.pass),
        warn: reader.number(`${prefix}SELF_CONSISTENCY_WARN`, base.checks.selfConsistency.warn),
      },
    },
    decision: {
      clarifyHigh: reader.number(`${prefix}CLARIFY_HIGH`, base.decision.clarifyHigh),
      clarifyLow: reader.number(`${prefix}CLARIFY_LOW`, base.decision.clarifyLow),
      contradictionCeiling: reader.number(
        `${prefix}CONTRADICTION_CEILING`,
        base.decision.contradictionCeiling
      ),
    },
  };
}

/**
 * Builds the pipeline configuration from `RAG_*` variables. Strict-mode
 * overrides use the `RAG_STRICT_` prefix. Throws `ConfigurationError`
 * when any value is malformed.
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const reader = new EnvReader(env);
  const base = DEFAULT_PIPELINE_CONFIG;
  const callTimeout = reader.number("RAG_CALL_TIMEOUT_MS", base.timeouts.searchMs);
  const generationTimeout = reader.number(
    "RAG_GENERATION_TIMEOUT_MS",
    base.timeouts.generationMs
  );

  const config: PipelineConfig = {
    defaultMode: reader.mode("RAG_MODE", base.defaultMode),
    retrieval: {
      rrfK: reader.number("RAG_RRF_K", base.retrieval.rrfK),
      searchK: reader.number("RAG_SEARCH_K", base.retrieval.searchK),
      rerankTopN: reader.number("RAG_RERANK_TOP_N", base.retrieval.rerankTopN),
      topK: reader.number("RAG_TOP_K", base.retrieval.topK),
      fallbackSearchK: reader.number("RAG_FALLBACK_SEARCH_K", base.retrieval.fallbackSearchK),
      fallbackTopK: reader.number("RAG_FALLBACK_TOP_K", base.retrieval.fallbackTopK),
      rqWeights: {
        relevance: reader.number("RAG_RQ_W_RELEVANCE", base.retrieval.rqWeights.relevance),
        margin: reader.number("RAG_RQ_W_MARGIN", base.retrieval.rqWeights.margin),
        coverage: reader.number("RAG_RQ_W_COVERAGE", base.retrieval.rqWeights.coverage),
        consistency: reader.number("RAG_RQ_W_CONSISTENCY", base.retrieval.rqWeights.consistency),
      },
      consistencyScale: reader.number("RAG_CONSISTENCY_SCALE", base.retrieval.consistencyScale),
    },
    timeouts: {
      embedMs: callTimeout,
      searchMs: callTimeout,
      rerankMs: callTimeout,
      corpusStatsMs: Math.min(callTimeout, base.timeouts.corpusStatsMs),
      decomposeMs: reader.number("RAG_DECOMPOSE_TIMEOUT_MS", base.timeouts.decomposeMs),
      rewriteMs: reader.number("RAG_REWRITE_TIMEOUT_MS", base.timeouts.rewriteMs),
      generationMs: generationTimeout,
      judgeMs: reader.number("RAG_JUDGE_TIMEOUT_MS", base.timeouts.judgeMs),
      contradictionMs: reader.number("RAG_JUDGE_TIMEOUT_MS", base.timeouts.contradictionMs),
      selfConsistencyMs: generationTimeout,
    },
    verification: {
      maxContradictionPassages: reader.number(
        "RAG_MAX_CONTRADICTION_PASSAGES",
        base.verification.maxContradictionPassages
      ),
      conservative: { ...base.verification.conservative },
    },
    decomposition: {
      enabled: reader.boolean("RAG_DECOMPOSE", base.decomposition.enabled),
      maxSubQuestions: reader.number("RAG_MAX_SUB_QUESTIONS", base.decomposition.maxSubQuestions),
    },
    profiles: {
      normal: readProfile(reader, "RAG_", base.profiles.normal),
      strict: readProfile(reader, "RAG_STRICT_", base.profiles.strict),
    },
  };

  if (reader.issues.length > 0) {
    throw new ConfigurationError(reader.issues);
  }

  return validatePipelineConfig(config);
}

function checkUnit(issues: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    issues.push(`${name} must be within [0, 1] (got ${value})`);
  }
}

function checkPositiveInt(issues: string[], name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    issues.push(`${name} must be a positive integer (got ${value})`);
  }
}

function checkProfile(issues: string[], mode: PipelineMode, profile: ModeProfile): void {
  const { gate, confidence, checks, decision } = profile;
  checkUnit(issues, `${mode}.gate.high`, gate.high);
  checkUnit(issues, `${mode}.gate.low`, gate.low);
  if (gate.low >= gate.high) {
    issues.push(`${mode}.gate.low must be below ${mode}.gate.high`);
  }

  for (const [name, weight] of Object.entries(confidence)) {
    if (!Number.isFinite(weight) || weight < 0) {
      issues.push(`${mode}.confidence.${name} must be a non-negative number`);
    }
  }

  checkUnit(issues, `${mode}.checks.groundedness.pass`, checks.groundedness.pass);
  checkUnit(issues, `${mode}.checks.groundedness.warn`, checks.groundedness.warn);
  if (checks.groundedness.warn > checks.groundedness.pass) {
    issues.push(`${mode}.checks.groundedness.warn must not exceed pass`);
  }
  checkUnit(issues, `${mode}.checks.selfConsistency.pass`, checks.selfConsistency.pass);
  checkUnit(issues, `${mode}.checks.selfConsistency.warn`, checks.selfConsistency.warn);
  if (checks.selfConsistency.warn > checks.selfConsistency.pass) {
    issues.push(`${mode}.checks.selfConsistency.warn must not exceed pass`);
  }
  checkUnit(issues, `${mode}.checks.contradiction.pass`, checks.contradiction.pass);
  checkUnit(issues, `${mode}.checks.contradiction.warn`, checks.contradiction.warn);
  if (checks.contradiction.pass > checks.contradiction.warn) {
    issues.push(`${mode}.checks.contradiction.pass must not exceed warn`);
  }

  checkUnit(issues, `${mode}.decision.clarifyHigh`, decision.clarifyHigh);
  checkUnit(issues, `${mode}.decision.clarifyLow`, decision.clarifyLow);
  checkUnit(issues, `${mode}.decision.contradictionCeiling`, decision.contradictionCeiling);
  if (decision.clarifyLow >= decision.clarifyHigh) {
    issues.push(`${mode}.decision.clarifyLow must be below clarifyHigh`);
  }
}

/**
 * Validates a complete configuration and returns a deep-frozen copy.
 */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
  const issues: string[] = [];
  const { retrieval, timeouts, verification, decomposition } = config;

  checkPositiveInt(issues, "retrieval.rrfK", retrieval.rrfK);
  checkPositiveInt(issues, "retrieval.searchK", retrieval.searchK);
  checkPositiveInt(issues, "retrieval.rerankTopN", retrieval.rerankTopN);
  checkPositiveInt(issues, "retrieval.topK", retrieval.topK);
  checkPositiveInt(issues, "retrieval.fallbackSearchK", retrieval.fallbackSearchK);
  checkPositiveInt(issues, "retrieval.fallbackTopK", retrieval.fallbackTopK);
  if (retrieval.rerankTopN < retrieval.topK) {
    issues.push("retrieval.rerankTopN must be at least retrieval.topK");
  }
  if (retrieval.fallbackSearchK < retrieval.searchK) {
    issues.push("retrieval.fallbackSearchK must be at least retrieval.searchK");
  }
  if (retrieval.fallbackTopK < retrieval.topK) {
    issues.push("retrieval.fallbackTopK must be at least retrieval.topK");
  }

  const weights = Object.values(retrieval.rqWeights);
  for (const [name, weight] of Object.entries(retrieval.rqWeights)) {
    checkUnit(issues, `retrieval.rqWeights.${name}`, weight);
  }
  const weightSum = weights.reduce((sum, w) => sum + w, 0);
  if (Math.abs(weightSum - 1) > 1e-6) {
    issues.push(`retrieval.rqWeights must sum to 1 (got ${weightSum})`);
  }
  if (!Number.isFinite(retrieval.consistencyScale) || retrieval.consistencyScale <= 0) {
    issues.push("retrieval.consistencyScale must be a positive number");
  }

  for (const [name, ms] of Object.entries(timeouts)) {
    if (!Number.isFinite(ms) || ms <= 0) {
      issues.push(`timeouts.${name} must be a positive number of milliseconds`);
    }
  }

  checkPositiveInt(
    issues,
    "verification.maxContradictionPassages",
    verification.maxContradictionPassages
  );
  checkUnit(issues, "verification.conservative.groundedness", verification.conservative.groundedness);
  checkUnit(
    issues,
    "verification.conservative.contradictionRate",
    verification.conservative.contradictionRate
  );
  checkUnit(
    issues,
    "verification.conservative.selfConsistency",
    verification.conservative.selfConsistency
  );
  checkPositiveInt(issues, "decomposition.maxSubQuestions", decomposition.maxSubQuestions);

  if (!PIPELINE_MODES.includes(config.defaultMode)) {
    issues.push(`defaultMode must be one of ${PIPELINE_MODES.join(", ")}`);
  }
  for (const mode of PIPELINE_MODES) {
    checkProfile(issues, mode, config.profiles[mode]);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return deepFreeze(structuredClone(config));
}
