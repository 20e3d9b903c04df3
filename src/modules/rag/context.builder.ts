import { EvidencePassage } from "../llm/types";
import { RerankedResult } from "../retrieval/types";

export function toEvidencePassages(results: RerankedResult[]): EvidencePassage[] {
  return results.map((result) => ({
    chunkId: result.chunkId,
    documentId: result.documentId,
    text: result.text,
  }));
}

/**
 * Numbered evidence block for prompts. Marker `[n]` refers to
 * `passages[n - 1]`, which is what the citation extractor assumes.
 */
export function buildEvidenceBlock(passages: EvidencePassage[]): string {
  return passages
    .map((passage, index) => `[${index + 1}] (${passage.documentId})\n${passage.text}`)
    .join("\n\n");
}

/**
 * Merges the evidence of several sub-questions: one entry per chunk with
 * its best normalized score, best first, truncated to `topK`.
 */
export function mergeEvidence(
  lists: RerankedResult[][],
  topK: number
): RerankedResult[] {
  const best = new Map<string, RerankedResult>();
  for (const list of lists) {
    for (const result of list) {
      const existing = best.get(result.chunkId);
      if (!existing || result.normalizedScore > existing.normalizedScore) {
        best.set(result.chunkId, result);
      }
    }
  }

  return Array.from(best.values())
    .sort((a, b) => {
      if (b.normalizedScore !== a.normalizedScore) {
        return b.normalizedScore - a.normalizedScore;
      }
      return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
    })
    .slice(0, topK)
    .map((result, index) => ({ ...result, rank: index + 1 }));
}
