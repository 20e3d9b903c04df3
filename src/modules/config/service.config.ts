import { ConfigurationError } from "../errors/pipeline.errors";
import { Env, EnvReader } from "./pipeline.config";

export interface OllamaSettings {
  baseUrl: string;
  model: string;
  judgeModel: string;
  embeddingModel: string;
}

export interface ChromaSettings {
  baseUrl: string;
  tenant: string;
  database: string;
  collection: string;
}

export interface EvaluationSettings {
  casesFile: string;
  outputFile: string;
  concurrency: number;
}

export interface ServiceConfig {
  port: number;
  ollama: OllamaSettings;
  chroma: ChromaSettings;
  evaluation: EvaluationSettings;
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const reader = new EnvReader(env);
  const port = reader.number("PORT", 4000);
  const model = reader.string("OLLAMA_MODEL", "llama3.2");
  const evalConcurrency = reader.number("EVAL_CONCURRENCY", 3);

  const config: ServiceConfig = {
    port,
    ollama: {
      baseUrl: reader.string("OLLAMA_BASE_URL", "http://localhost:11434"),
      model,
      judgeModel: reader.string("OLLAMA_EVALUATION_MODEL", model),
      embeddingModel: reader.string("EMBEDDING_MODEL", "nomic-embed-text"),
    },
    chroma: {
      baseUrl: reader.string("CHROMA_BASE_URL", "http://localhost:8000"),
      tenant: reader.string("CHROMA_TENANT", "default"),
      database: reader.string("CHROMA_DATABASE", "default"),
      collection: reader.string("CHROMA_COLLECTION", "private_docs"),
    },
    evaluation: {
      casesFile: reader.string("EVAL_CASES_FILE", "data/eval_cases.json"),
      outputFile: reader.string("EVAL_OUTPUT_FILE", "data/eval_results.json"),
      concurrency: evalConcurrency,
    },
  };

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    reader.issues.push(`PORT must be an integer between 0 and 65535 (got ${port})`);
  }
  if (!Number.isInteger(evalConcurrency) || evalConcurrency < 1) {
    reader.issues.push(`EVAL_CONCURRENCY must be a positive integer (got ${evalConcurrency})`);
  }
  if (reader.issues.length > 0) {
    throw new ConfigurationError(reader.issues);
  }
  return config;
}
