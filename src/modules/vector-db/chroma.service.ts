import fetch from "node-fetch";
import { ChromaSettings } from "../config/service.config";
import { FetchLike } from "../llm/ollama.service";

export type ChromaMetadata = Record<string, string | number | boolean>;

/**
 * Interface for collection response
 */
export interface CollectionInfo {
  id: string;
  name: string;
}

export interface QueryRow {
  id: string;
  text: string;
  distance: number;
  metadata?: ChromaMetadata;
}

export interface GetRow {
  id: string;
  text: string;
  metadata?: ChromaMetadata;
}

export type WhereDocument =
  | { $contains: string }
  | { $or: WhereDocument[] }
  | { $and: WhereDocument[] };

export interface GetOptions {
  whereDocument?: WhereDocument;
  limit?: number;
  include: Array<"documents" | "metadatas">;
}

/**
 * Client for a Chroma v2 tenant/database. Collection ids are cached by
 * name for the lifetime of the client.
 */
export class ChromaClient {
  private readonly collectionCache = new Map<string, string>();
  private readonly apiBase: string;

  constructor(
    settings: Omit<ChromaSettings, "collection">,
    private readonly fetchFn: FetchLike = fetch
  ) {
    this.apiBase = `${settings.baseUrl}/api/v2/tenants/${settings.tenant}/databases/${settings.database}`;
  }

  async getCollection(collectionName: string): Promise<CollectionInfo> {
    const cachedId = this.collectionCache.get(collectionName);
    if (cachedId) {
      return { id: cachedId, name: collectionName };
    }

    const listResponse = await this.fetchFn(`${this.apiBase}/collections`);

    if (!listResponse.ok) {
      const errorText = await listResponse.text();
      throw new Error(`Failed to list collections: ${errorText}`);
    }

    const json = (await listResponse.json()) as
      | CollectionInfo[]
      | { collections?: CollectionInfo[] };

    // Handle both array and object response formats
    const collections = Array.isArray(json) ? json : json.collections ?? [];

    const existing = collections.find((c) => c.name === collectionName);
    if (!existing) {
      throw new Error(`Collection "${collectionName}" not found`);
    }

    this.collectionCache.set(collectionName, existing.id);
    console.log(`✅ Collection "${collectionName}" resolved (id: ${existing.id})`);
    return { id: existing.id, name: existing.name };
  }

  async query(
    collectionId: string,
    queryEmbedding: number[],
    topK: number
  ): Promise<QueryRow[]> {
    if (!queryEmbedding || queryEmbedding.length === 0) {
      throw new Error("Query embedding cannot be empty");
    }

    const data = (await this.post(`/collections/${collectionId}/query`, {
      query_embeddings: [queryEmbedding],
      n_results: topK,
      include: ["documents", "distances", "metadatas"],
    }, "perform similarity search")) as {
      ids?: string[][];
      documents?: Array<Array<string | null>>;
      distances?: number[][];
      metadatas?: Array<Array<ChromaMetadata | null>>;
    };

    const results: QueryRow[] = [];

    if (data.ids && data.ids[0]) {
      data.ids[0].forEach((id, index) => {
        results.push({
          id,
          text: data.documents?.[0]?.[index] ?? "",
          distance: data.distances?.[0]?.[index] ?? 0,
          metadata: data.metadatas?.[0]?.[index] ?? undefined,
        });
      });
    }

    return results;
  }

  async get(collectionId: string, options: GetOptions): Promise<GetRow[]> {
    const data = (await this.post(`/collections/${collectionId}/get`, {
      where_document: options.whereDocument,
      limit: options.limit,
      include: options.include,
    }, "get documents")) as {
      ids?: string[];
      documents?: Array<string | null>;
      metadatas?: Array<ChromaMetadata | null>;
    };

    return (data.ids ?? []).map((id, index) => ({
      id,
      text: data.documents?.[index] ?? "",
      metadata: data.metadatas?.[index] ?? undefined,
    }));
  }

  private async post(path: string, body: object, action: string): Promise<unknown> {
    const response = await this.fetchFn(`${this.apiBase}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Failed to ${action}: ${errorText}`);
    }

    return response.json();
  }
}

/**
 * Chunks are stored one per Chroma record; the source document id lives
 * in metadata. Records without one count as their own document.
 */
export function documentIdOf(id: string, metadata?: ChromaMetadata): string {
  const value = metadata?.documentId ?? metadata?.source;
  return value === undefined ? id : String(value);
}
