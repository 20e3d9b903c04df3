import express, { Application, Request, Response } from "express";
import { PIPELINE_MODES, PipelineMode } from "../modules/config/pipeline.config";
import {
  EvaluationDatasetError,
  PipelineInputError,
  describeError,
} from "../modules/errors/pipeline.errors";
import { isRecord } from "../modules/llm/json.reply";
import { parseEvaluationCases } from "../modules/evaluation/dataset.loader";
import {
  DEFAULT_EVALUATION_CONCURRENCY,
  runEvaluation,
} from "../modules/evaluation/evaluation.service";
import { RagPipeline } from "../modules/rag/rag.service";

export interface AppOptions {
  /** Batch concurrency when a request does not set `maxConcurrency`. */
  evaluationConcurrency?: number;
}

function field(body: unknown, name: string): unknown {
  return isRecord(body) ? body[name] : undefined;
}

function parseMode(value: unknown): PipelineMode | undefined | null {
  if (value === undefined) return undefined;
  return PIPELINE_MODES.find((m) => m === value) ?? null;
}

export function createApp(pipeline: RagPipeline, options: AppOptions = {}): Application {
  const app: Application = express();

  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", mode: pipeline.config.defaultMode });
  });

  app.post("/rag/query", async (req: Request, res: Response) => {
    console.log("RAG/QUERY ENDPOINT HIT");
    const body: unknown = req.body;
    const query = field(body, "query");
    const rawMode = field(body, "mode");

    if (typeof query !== "string" || !query.trim()) {
      return res.status(400).json({
        success: false,
        error: "Field 'query' is required and must be a string.",
      });
    }

    const mode = parseMode(rawMode);
    if (mode === null) {
      return res.status(400).json({
        success: false,
        error: `Field 'mode' must be one of ${PIPELINE_MODES.join(", ")}.`,
      });
    }

    try {
      const result = await pipeline.run(query, mode);
      return res.json({ success: true, ...result });
    } catch (error) {
      if (error instanceof PipelineInputError) {
        return res.status(400).json({ success: false, error: error.message });
      }

      console.error("Error in /rag/query endpoint:", describeError(error));
      return res.status(500).json({ success: false, error: "Internal server error." });
    }
  });

  app.post("/rag/evaluate", async (req: Request, res: Response) => {
    console.log("RAG/EVALUATE ENDPOINT HIT");
    const body: unknown = req.body;
    const rawConcurrency = field(body, "maxConcurrency");
    const concurrency =
      rawConcurrency === undefined
        ? options.evaluationConcurrency ?? DEFAULT_EVALUATION_CONCURRENCY
        : rawConcurrency;

    if (typeof concurrency !== "number" || !Number.isInteger(concurrency) || concurrency < 1) {
      return res.status(400).json({
        success: false,
        error: "Field 'maxConcurrency' must be a positive integer.",
      });
    }

    try {
      const cases = parseEvaluationCases(field(body, "cases"));
      const report = await runEvaluation(pipeline, cases, concurrency);
      return res.json({ success: true, ...report });
    } catch (error) {
      if (error instanceof EvaluationDatasetError) {
        return res.status(400).json({ success: false, error: error.message, issues: error.issues });
      }

      console.error("Error in /rag/evaluate endpoint:", describeError(error));
      return res.status(500).json({ success: false, error: "Internal server error." });
    }
  });

  return app;
}
