import { PipelineConfig } from "../config/pipeline.config";
import { ServiceConfig } from "../config/service.config";
import { IndexGuard } from "../concurrency/index.guard";
import { EmbeddingReranker, OllamaEmbedder } from "../embeddings/embedding.service";
import {
  OllamaContradictionDetector,
  OllamaGenerator,
  OllamaQueryDecomposer,
} from "../llm/ollama.generator";
import { OllamaClient } from "../llm/ollama.service";
import { ChromaClient } from "../vector-db/chroma.service";
import {
  ChromaCorpusStats,
  ChromaKeywordSearch,
  ChromaVectorSearch,
} from "../vector-db/chroma.search";
import { RagPipeline, createRagPipeline } from "./rag.service";

/** Wires the Ollama and Chroma adapters into a pipeline. */
export function createServicePipeline(
  service: ServiceConfig,
  config: PipelineConfig,
  guard: IndexGuard = new IndexGuard()
): RagPipeline {
  const ollama = new OllamaClient(service.ollama);
  const chroma = new ChromaClient(service.chroma);
  const embedder = new OllamaEmbedder(ollama);
  const collection = service.chroma.collection;

  return createRagPipeline(
    {
      embedder,
      vectorSearch: new ChromaVectorSearch(chroma, collection),
      keywordSearch: new ChromaKeywordSearch(chroma, collection),
      reranker: new EmbeddingReranker(embedder),
      corpus: new ChromaCorpusStats(chroma, collection),
      generator: new OllamaGenerator(ollama),
      contradictionDetector: new OllamaContradictionDetector(ollama),
      decomposer: new OllamaQueryDecomposer(ollama),
      guard,
    },
    config
  );
}
