import { Candidate, FusedResult } from "./types";

export const DEFAULT_RRF_K = 60;

interface FusionEntry {
  chunkId: string;
  documentId: string;
  text: string;
  score: number;
  rankSum: number;
}

function bestRankPerChunk(candidates: Candidate[]): Map<string, Candidate> {
  const best = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const existing = best.get(candidate.chunkId);
    if (!existing || candidate.rank < existing.rank) {
      best.set(candidate.chunkId, candidate);
    }
  }
  return best;
}

function compareEntries(a: FusionEntry, b: FusionEntry): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.rankSum !== b.rankSum) return a.rankSum - b.rankSum;
  if (a.chunkId < b.chunkId) return -1;
  if (a.chunkId > b.chunkId) return 1;
  return 0;
}

/**
 * Reciprocal Rank Fusion over the vector and keyword lists.
 *
 * score(chunk) = Σ 1 / (k + rank) over every list the chunk appears in.
 * Output order: score desc, then rank sum asc, then chunk id.
 */
export function fuseRankings(
  vectorCandidates: Candidate[],
  keywordCandidates: Candidate[],
  k: number = DEFAULT_RRF_K
): FusedResult[] {
  const entries = new Map<string, FusionEntry>();

  for (const list of [vectorCandidates, keywordCandidates]) {
    for (const candidate of bestRankPerChunk(list).values()) {
      const contribution = 1 / (k + candidate.rank);
      const entry = entries.get(candidate.chunkId);
      if (entry) {
        entry.score += contribution;
        entry.rankSum += candidate.rank;
      } else {
        entries.set(candidate.chunkId, {
          chunkId: candidate.chunkId,
          documentId: candidate.documentId,
          text: candidate.text,
          score: contribution,
          rankSum: candidate.rank,
        });
      }
    }
  }

  return Array.from(entries.values())
    .sort(compareEntries)
    .map((entry, index) => ({
      chunkId: entry.chunkId,
      documentId: entry.documentId,
      text: entry.text,
      fusedScore: entry.score,
      rank: index + 1,
      rankSum: entry.rankSum,
    }));
}
