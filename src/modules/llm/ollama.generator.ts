import { OllamaClient } from "./ollama.service";
import {
  buildAnswerConflictPrompt,
  buildAnswerPrompt,
  buildDecompositionPrompt,
  buildEvidenceConflictPrompt,
  buildJudgePrompt,
  buildRewritePrompt,
} from "./prompts";
import { parseJsonReply, readNonNegativeInt, readUnitScore } from "./json.reply";
import {
  AnswerConflictReport,
  ConflictPair,
  ContradictionDetector,
  EvidencePassage,
  FlagKind,
  Generator,
  JudgeVerdict,
  QueryDecomposer,
} from "./types";

export class OllamaGenerator implements Generator {
  constructor(private readonly client: OllamaClient) {}

  async answer(queryText: string, evidence: EvidencePassage[]): Promise<string> {
    const reply = await this.client.generate(buildAnswerPrompt(queryText, evidence));
    return reply.trim();
  }

  async rewrite(queryText: string): Promise<string> {
    const reply = await this.client.generate(buildRewritePrompt(queryText));
    const firstLine = reply
      .split("\n")
      .map((line) => line.trim().replace(/^["']|["']$/g, ""))
      .find((line) => line.length > 0);
    return firstLine ?? queryText;
  }

  async judge(
    question: string,
    answer: string,
    evidence: EvidencePassage[]
  ): Promise<JudgeVerdict> {
    const reply = await this.client.generate(
      buildJudgePrompt(question, answer, evidence),
      this.client.judgeModel
    );

    const groundedness = readUnitScore(reply, "groundedness");
    const flags: FlagKind[] =
      parseJsonReply(reply)?.admits_ignorance === true ? ["self_admitted_ignorance"] : [];

    return { groundedness, flags };
  }
}

export class OllamaContradictionDetector implements ContradictionDetector {
  constructor(private readonly client: OllamaClient) {}

  async evidenceConflicts(passages: EvidencePassage[]): Promise<ConflictPair[]> {
    if (passages.length < 2) return [];

    const reply = await this.client.generate(
      buildEvidenceConflictPrompt(passages),
      this.client.judgeModel
    );
    const parsed = parseJsonReply(reply);
    if (!parsed || !Array.isArray(parsed.conflicts)) {
      throw new Error("Contradiction reply is missing the conflicts list");
    }

    const pairs: ConflictPair[] = [];
    for (const entry of parsed.conflicts) {
      if (!Array.isArray(entry) || entry.length !== 2) continue;
      const [a, b] = entry;
      if (typeof a !== "number" || typeof b !== "number") continue;
      const first = passages[a - 1];
      const second = passages[b - 1];
      if (!first || !second || first === second) continue;
      pairs.push({ firstChunkId: first.chunkId, secondChunkId: second.chunkId });
    }
    return pairs;
  }

  async answerConflicts(
    answer: string,
    evidence: EvidencePassage[]
  ): Promise<AnswerConflictReport> {
    const reply = await this.client.generate(
      buildAnswerConflictPrompt(answer, evidence),
      this.client.judgeModel
    );
    const parsed = parseJsonReply(reply);
    const claimsChecked = parsed ? readNonNegativeInt(parsed, "claims_checked") : undefined;
    const conflictingClaims = parsed
      ? readNonNegativeInt(parsed, "conflicting_claims")
      : undefined;

    if (claimsChecked === undefined || conflictingClaims === undefined) {
      throw new Error("Claim check reply is missing its counts");
    }

    return {
      claimsChecked,
      conflictingClaims: Math.min(conflictingClaims, claimsChecked),
    };
  }
}

export class OllamaQueryDecomposer implements QueryDecomposer {
  constructor(private readonly client: OllamaClient) {}

  async decompose(queryText: string, maxSubQuestions: number): Promise<string[]> {
    const reply = await this.client.generate(
      buildDecompositionPrompt(queryText, maxSubQuestions)
    );
    const parsed = parseJsonReply(reply);
    if (!parsed || !Array.isArray(parsed.sub_questions)) {
      return [queryText];
    }

    const subQuestions = parsed.sub_questions
      .filter((q): q is string => typeof q === "string")
      .map((q) => q.trim())
      .filter((q) => q.length > 0)
      .slice(0, maxSubQuestions);

    return subQuestions.length > 0 ? subQuestions : [queryText];
  }
}
