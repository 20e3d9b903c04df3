import dotenv from "dotenv";
import { loadPipelineConfig } from "./modules/config/pipeline.config";
import { loadServiceConfig } from "./modules/config/service.config";
import { createServicePipeline } from "./modules/rag/pipeline.factory";
import { createApp } from "./server/app";

dotenv.config();

const service = loadServiceConfig();
const pipelineConfig = loadPipelineConfig();
const pipeline = createServicePipeline(service, pipelineConfig);

createApp(pipeline, { evaluationConcurrency: service.evaluation.concurrency }).listen(
  service.port,
  () => {
    console.log(`Backend server is running on http://localhost:${service.port}`);
    console.log(`Pipeline mode: ${pipelineConfig.defaultMode}`);
  }
);
