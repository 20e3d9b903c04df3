import fs from "fs";
import path from "path";
import { PIPELINE_MODES, PipelineMode } from "../config/pipeline.config";
import { EvaluationDatasetError } from "../errors/pipeline.errors";
import { isRecord } from "../llm/json.reply";
import { FinalDecision } from "../scoring/confidence.score";
import { EvaluationCase } from "./types";

const DECISIONS: readonly FinalDecision[] = ["answer", "clarify", "abstain"];

function asDecision(value: unknown): FinalDecision | undefined {
  return DECISIONS.find((d) => d === value);
}

function asMode(value: unknown): PipelineMode | undefined {
  return PIPELINE_MODES.find((m) => m === value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function readCase(raw: unknown, index: number, issues: string[]): EvaluationCase | undefined {
  const at = `case ${index + 1}`;
  if (!isRecord(raw)) {
    issues.push(`${at} must be an object`);
    return undefined;
  }

  const before = issues.length;
  const { id, query, category } = raw;
  if (!nonEmptyString(id)) issues.push(`${at}: "id" must be a non-empty string`);
  if (!nonEmptyString(query)) issues.push(`${at}: "query" must be a non-empty string`);
  if (!nonEmptyString(category)) issues.push(`${at}: "category" must be a non-empty string`);

  const mode = raw.mode === undefined ? "normal" : asMode(raw.mode);
  if (mode === undefined) {
    issues.push(`${at}: "mode" must be one of ${PIPELINE_MODES.join(", ")}`);
  }

  const expectedDecision = asDecision(raw.expectedDecision);
  if (expectedDecision === undefined) {
    issues.push(`${at}: "expectedDecision" must be one of ${DECISIONS.join(", ")}`);
  }

  const acceptable: FinalDecision[] = [];
  if (raw.acceptableDecisions !== undefined) {
    if (!Array.isArray(raw.acceptableDecisions)) {
      issues.push(`${at}: "acceptableDecisions" must be an array`);
    } else {
      for (const value of raw.acceptableDecisions) {
        const decision = asDecision(value);
        if (decision === undefined) {
          issues.push(`${at}: unknown decision ${JSON.stringify(value)} in "acceptableDecisions"`);
        } else {
          acceptable.push(decision);
        }
      }
    }
  }

  const keywords: string[] = [];
  if (raw.expectedAnswerContains !== undefined) {
    if (
      !Array.isArray(raw.expectedAnswerContains) ||
      !raw.expectedAnswerContains.every(nonEmptyString)
    ) {
      issues.push(`${at}: "expectedAnswerContains" must be an array of non-empty strings`);
    } else {
      keywords.push(...raw.expectedAnswerContains);
    }
  }

  if (
    issues.length > before ||
    !nonEmptyString(id) ||
    !nonEmptyString(query) ||
    !nonEmptyString(category) ||
    mode === undefined ||
    expectedDecision === undefined
  ) {
    return undefined;
  }

  return {
    id,
    query,
    category,
    mode,
    expectedDecision,
    acceptableDecisions: Array.from(new Set([expectedDecision, ...acceptable])),
    expectedAnswerContains: keywords,
  };
}

/**
 * Validates a parsed case list. Every problem is collected before a single
 * `EvaluationDatasetError` is thrown; duplicate ids are rejected.
 */
export function parseEvaluationCases(raw: unknown): EvaluationCase[] {
  if (!Array.isArray(raw)) {
    throw new EvaluationDatasetError(["cases must be a JSON array"]);
  }

  const issues: string[] = [];
  const cases: EvaluationCase[] = [];
  const seen = new Set<string>();

  raw.forEach((item, index) => {
    const parsed = readCase(item, index, issues);
    if (!parsed) return;
    if (seen.has(parsed.id)) {
      issues.push(`case ${index + 1}: duplicate id "${parsed.id}"`);
      return;
    }
    seen.add(parsed.id);
    cases.push(parsed);
  });

  if (cases.length === 0 && issues.length === 0) {
    issues.push("cases must not be empty");
  }
  if (issues.length > 0) {
    throw new EvaluationDatasetError(issues);
  }
  return cases;
}

export async function loadEvaluationCases(filePath: string): Promise<EvaluationCase[]> {
  const resolved = path.resolve(process.cwd(), filePath);
  const content = await fs.promises.readFile(resolved, "utf8");

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new EvaluationDatasetError([
      `${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return parseEvaluationCases(raw);
}
