import assert from "assert/strict";
import {
  AnswerConflictReport,
  ConflictPair,
  ContradictionDetector,
  EvidencePassage,
  Generator,
  JudgeVerdict,
  QueryDecomposer,
} from "../modules/llm/types";
import {
  Candidate,
  CorpusStats,
  Embedder,
  KeywordSearch,
  RerankedResult,
  Reranker,
  SourceMethod,
  VectorSearch,
} from "../modules/retrieval/types";

export function approxEqual(actual: number, expected: number, epsilon = 1e-6): void {
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    `Expected ${expected}, received ${actual}`
  );
}

/** Raw reranker score whose sigmoid is `p`. */
export function logit(p: number): number {
  return Math.log(p / (1 - p));
}

export function candidate(
  chunkId: string,
  rank: number,
  sourceMethod: SourceMethod,
  documentId = `doc-${chunkId}`
): Candidate {
  return { chunkId, documentId, rawScore: 1 / rank, rank, sourceMethod, text: `text of ${chunkId}` };
}

export function reranked(
  chunkId: string,
  documentId: string,
  normalizedScore: number,
  rank = 1
): RerankedResult {
  return {
    chunkId,
    documentId,
    text: `text of ${chunkId}`,
    fusedScore: 0,
    rank,
    rankSum: rank,
    rawScore: logit(normalizedScore),
    normalizedScore,
  };
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export interface FakeChunk {
  chunkId: string;
  documentId: string;
  text: string;
}

/**
 * In-memory index keyed by query text. Both search methods return the
 * chunks registered for the query; the fake embedding carries the query's
 * position so vector search can find it again.
 */
export class FakeIndex {
  private readonly queries: string[];
  vectorCalls = 0;
  keywordCalls = 0;

  constructor(private readonly byQuery: Record<string, FakeChunk[]>) {
    this.queries = Object.keys(byQuery);
  }

  private toCandidates(query: string | undefined, k: number, method: SourceMethod): Candidate[] {
    const chunks = query === undefined ? [] : this.byQuery[query] ?? [];
    return chunks.slice(0, k).map((chunk, index) => ({
      ...chunk,
      rawScore: 1 - index * 0.1,
      rank: index + 1,
      sourceMethod: method,
    }));
  }

  readonly embedder: Embedder = {
    embed: async (text) => [this.queries.indexOf(text)],
  };

  readonly vector: VectorSearch = {
    search: async (embedding, k) => {
      this.vectorCalls++;
      return this.toCandidates(this.queries[embedding[0]], k, "vector");
    },
  };

  readonly keyword: KeywordSearch = {
    search: async (text, k) => {
      this.keywordCalls++;
      return this.toCandidates(text, k, "keyword");
    },
  };
}

/** Scores chunks by their text; unknown text scores very low. */
export class FakeReranker implements Reranker {
  calls = 0;

  constructor(private readonly rawByText: Record<string, number>) {}

  async score(_queryText: string, chunkText: string): Promise<number> {
    this.calls++;
    return this.rawByText[chunkText] ?? -10;
  }
}

export interface FakeGeneratorOptions {
  answers?: string[];
  rewrites?: Record<string, string>;
  verdict?: JudgeVerdict;
  answer?: (queryText: string, evidence: EvidencePassage[]) => Promise<string>;
  judge?: () => Promise<JudgeVerdict>;
}

/**
 * Replays scripted answers in order; the last one repeats. Records every
 * call so tests can assert what was (not) invoked.
 */
export class FakeGenerator implements Generator {
  answerCalls: Array<{ queryText: string; evidence: EvidencePassage[] }> = [];
  rewriteCalls: string[] = [];
  judgeCalls = 0;

  constructor(private readonly options: FakeGeneratorOptions = {}) {}

  async answer(queryText: string, evidence: EvidencePassage[]): Promise<string> {
    this.answerCalls.push({ queryText, evidence });
    if (this.options.answer) return this.options.answer(queryText, evidence);
    const answers = this.options.answers ?? ["An answer [1]."];
    return answers[Math.min(this.answerCalls.length - 1, answers.length - 1)];
  }

  async rewrite(queryText: string): Promise<string> {
    this.rewriteCalls.push(queryText);
    return this.options.rewrites?.[queryText] ?? queryText;
  }

  async judge(): Promise<JudgeVerdict> {
    this.judgeCalls++;
    if (this.options.judge) return this.options.judge();
    return this.options.verdict ?? { groundedness: 0.9, flags: [] };
  }
}

export class FakeContradictionDetector implements ContradictionDetector {
  evidenceCalls = 0;

  constructor(
    private readonly pairs: ConflictPair[] = [],
    private readonly report: AnswerConflictReport = { claimsChecked: 1, conflictingClaims: 0 },
    private readonly delay?: () => Promise<void>
  ) {}

  async evidenceConflicts(): Promise<ConflictPair[]> {
    this.evidenceCalls++;
    if (this.delay) await this.delay();
    return this.pairs;
  }

  async answerConflicts(): Promise<AnswerConflictReport> {
    if (this.delay) await this.delay();
    return this.report;
  }
}

export class FakeDecomposer implements QueryDecomposer {
  constructor(private readonly subQuestions: string[]) {}

  async decompose(_queryText: string, maxSubQuestions: number): Promise<string[]> {
    return this.subQuestions.slice(0, maxSubQuestions);
  }
}

export function fixedCorpus(count: number): CorpusStats {
  return { documentCount: async () => count };
}
