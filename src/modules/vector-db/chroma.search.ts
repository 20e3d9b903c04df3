import {
  Candidate,
  CorpusStats,
  KeywordSearch,
  VectorSearch,
} from "../retrieval/types";
import { ChromaClient, WhereDocument, documentIdOf } from "./chroma.service";

const KEYWORD_POOL_FACTOR = 4;
const MIN_TERM_LENGTH = 3;
const STOPWORDS = new Set([
  "the", "and", "for", "are", "was", "were", "what", "which", "who", "whom",
  "when", "where", "why", "how", "does", "did", "with", "from", "that", "this",
  "these", "those", "into", "about", "than", "then", "there", "their", "have", "has",
]);

export class ChromaVectorSearch implements VectorSearch {
  constructor(
    private readonly client: ChromaClient,
    private readonly collectionName: string
  ) {}

  async search(queryEmbedding: number[], k: number): Promise<Candidate[]> {
    const collection = await this.client.getCollection(this.collectionName);
    const rows = await this.client.query(collection.id, queryEmbedding, k);

    return rows.map((row, index): Candidate => ({
      chunkId: row.id,
      documentId: documentIdOf(row.id, row.metadata),
      // cosine space: distance = 1 - similarity
      rawScore: 1 - row.distance,
      rank: index + 1,
      sourceMethod: "vector",
      text: row.text,
    }));
  }
}

export function keywordTerms(queryText: string): string[] {
  const tokens = queryText.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return Array.from(
    new Set(tokens.filter((t) => t.length >= MIN_TERM_LENGTH && !STOPWORDS.has(t)))
  );
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Distinct matched terms dominate; total occurrences only break ties
 * between chunks that match the same number of terms.
 */
export function keywordScore(text: string, terms: string[]): number {
  const lower = text.toLowerCase();
  let matched = 0;
  let occurrences = 0;
  for (const term of terms) {
    const count = countOccurrences(lower, term);
    if (count > 0) matched++;
    occurrences += count;
  }
  return matched + occurrences / (occurrences + 1);
}

function whereAnyTerm(terms: string[]): WhereDocument {
  // $contains is case-sensitive
  const variants = terms.flatMap((term) => {
    const capitalized = term.charAt(0).toUpperCase() + term.slice(1);
    return Array.from(new Set([term, capitalized, term.toUpperCase()]));
  });
  const clauses = variants.map((v) => ({ $contains: v }));
  return clauses.length === 1 ? clauses[0] : { $or: clauses };
}

/**
 * Lexical search through Chroma's document filter. Chroma returns matches
 * unordered, so a wider pool is fetched and ranked locally by term hits.
 */
export class ChromaKeywordSearch implements KeywordSearch {
  constructor(
    private readonly client: ChromaClient,
    private readonly collectionName: string
  ) {}

  async search(queryText: string, k: number): Promise<Candidate[]> {
    const terms = keywordTerms(queryText);
    if (terms.length === 0) return [];

    const collection = await this.client.getCollection(this.collectionName);
    const rows = await this.client.get(collection.id, {
      whereDocument: whereAnyTerm(terms),
      limit: k * KEYWORD_POOL_FACTOR,
      include: ["documents", "metadatas"],
    });

    return rows
      .map((row) => ({ row, score: keywordScore(row.text, terms) }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        return a.row.id < b.row.id ? -1 : a.row.id > b.row.id ? 1 : 0;
      })
      .slice(0, k)
      .map(({ row, score }, index): Candidate => ({
        chunkId: row.id,
        documentId: documentIdOf(row.id, row.metadata),
        rawScore: score,
        rank: index + 1,
        sourceMethod: "keyword",
        text: row.text,
      }));
  }
}

/** Distinct source documents in the collection. */
export class ChromaCorpusStats implements CorpusStats {
  constructor(
    private readonly client: ChromaClient,
    private readonly collectionName: string
  ) {}

  async documentCount(): Promise<number> {
    const collection = await this.client.getCollection(this.collectionName);
    const rows = await this.client.get(collection.id, { include: ["metadatas"] });
    return new Set(rows.map((row) => documentIdOf(row.id, row.metadata))).size;
  }
}
