export type FlagKind = "self_admitted_ignorance" | "evidence_conflict";

export interface EvidencePassage {
  chunkId: string;
  documentId: string;
  text: string;
}

export interface JudgeVerdict {
  /** Support of the answer's claims by the evidence, in [0,1]. */
  groundedness: number;
  flags: FlagKind[];
}

export interface Generator {
  answer(queryText: string, evidence: EvidencePassage[]): Promise<string>;
  rewrite(queryText: string): Promise<string>;
  judge(
    question: string,
    answer: string,
    evidence: EvidencePassage[]
  ): Promise<JudgeVerdict>;
}

export interface ConflictPair {
  firstChunkId: string;
  secondChunkId: string;
}

export interface AnswerConflictReport {
  claimsChecked: number;
  conflictingClaims: number;
}

export interface ContradictionDetector {
  evidenceConflicts(passages: EvidencePassage[]): Promise<ConflictPair[]>;
  answerConflicts(
    answer: string,
    evidence: EvidencePassage[]
  ): Promise<AnswerConflictReport>;
}

export interface QueryDecomposer {
  decompose(queryText: string, maxSubQuestions: number): Promise<string[]>;
}
