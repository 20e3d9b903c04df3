import { EvidencePassage } from "../llm/types";
import { CitationValidationResult } from "./types";

const CITATION_REGEX = /\[(\d+)\]/g;
const MIN_FACTUAL_SENTENCE_LENGTH = 20;

function splitSentences(answer: string): string[] {
  return answer
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function isFactualSentence(sentence: string): boolean {
  if (sentence.length < MIN_FACTUAL_SENTENCE_LENGTH) {
    return false;
  }
  return /[\p{L}\p{N}]/u.test(sentence);
}

/**
 * Maps `[n]` markers in a generated answer back to the evidence they
 * point at. Markers outside 1..evidence.length are reported as invalid
 * and never become citations.
 */
export function extractAndValidateCitations(
  answer: string,
  evidence: EvidencePassage[]
): CitationValidationResult {
  const citations: number[] = [];
  for (const match of answer.matchAll(CITATION_REGEX)) {
    const citation = Number(match[1]);
    if (Number.isFinite(citation)) {
      citations.push(citation);
    }
  }

  const ordered = Array.from(new Set(citations));
  const uniqueCitations = ordered.filter((c) => c >= 1 && c <= evidence.length);
  const invalidCitations = ordered
    .filter((c) => c < 1 || c > evidence.length)
    .sort((a, b) => a - b);
  const chunkIds = Array.from(
    new Set(uniqueCitations.map((c) => evidence[c - 1].chunkId))
  );

  const factualSentences = splitSentences(answer).filter(isFactualSentence);
  const citedSentenceCount = factualSentences.filter((s) =>
    /\[(\d+)\]/.test(s)
  ).length;
  const factualSentenceCount = factualSentences.length;
  const coverage =
    factualSentenceCount > 0 ? citedSentenceCount / factualSentenceCount : 0;

  return {
    citations,
    uniqueCitations,
    invalidCitations,
    chunkIds,
    hasCitations: uniqueCitations.length > 0,
    factualSentenceCount,
    citedSentenceCount,
    coverage,
  };
}
