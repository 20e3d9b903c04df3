import { buildEvidenceBlock } from "../rag/context.builder";
import { EvidencePassage } from "./types";

export function buildAnswerPrompt(query: string, evidence: EvidencePassage[]): string {
  return `You are an assistant that answers questions strictly from provided evidence.

Rules:
- Use ONLY the provided evidence.
- Every factual sentence MUST include at least one numeric citation like [1].
- Use only citation indices between 1 and ${evidence.length}.
- If the evidence does not contain the answer, reply exactly: "I cannot find this information in the provided documents."

Evidence:
${buildEvidenceBlock(evidence)}

Question:
${query}

Answer:`;
}

export function buildRewritePrompt(query: string): string {
  return `Rewrite the search query below so that a document search engine finds better matches.
Keep the meaning. Expand abbreviations and add likely synonyms.
Reply with the rewritten query only, on a single line.

Query:
${query}

Rewritten query:`;
}

export function buildJudgePrompt(
  question: string,
  answer: string,
  evidence: EvidencePassage[]
): string {
  return `You are an evaluator that checks whether an answer is grounded in evidence.

Evaluate which share of the answer's claims is supported by the evidence.
Set "admits_ignorance" to true when the answer says it does not know or cannot find the information.

Evidence:
${buildEvidenceBlock(evidence)}

Question:
${question}

Answer:
${answer}

Respond ONLY in valid JSON format with NO additional text:
{
  "groundedness": number between 0 and 1,
  "admits_ignorance": boolean,
  "reason": "short explanation"
}`;
}

export function buildEvidenceConflictPrompt(passages: EvidencePassage[]): string {
  return `You compare evidence passages for factual contradictions.

Two passages contradict each other when they state incompatible facts about the same subject.
Differences in scope or wording are not contradictions.

Passages:
${buildEvidenceBlock(passages)}

Respond ONLY in valid JSON format with NO additional text:
{
  "conflicts": [[first passage number, second passage number], ...]
}`;
}

export function buildAnswerConflictPrompt(
  answer: string,
  evidence: EvidencePassage[]
): string {
  return `You check the claims of an answer against evidence passages.

Split the answer into its factual claims. Count a claim as conflicting when any passage states something incompatible with it.

Evidence:
${buildEvidenceBlock(evidence)}

Answer:
${answer}

Respond ONLY in valid JSON format with NO additional text:
{
  "claims_checked": integer,
  "conflicting_claims": integer
}`;
}

export function buildDecompositionPrompt(query: string, maxSubQuestions: number): string {
  return `Split the question below into at most ${maxSubQuestions} self-contained sub-questions that can each be answered from a single document.
If the question is already simple, return it unchanged as the only sub-question.

Question:
${query}

Respond ONLY in valid JSON format with NO additional text:
{
  "sub_questions": ["...", "..."]
}`;
}
