export { deriveRunId, runPipeline } from './run-pipeline.js';
export type { PipelineResult, RunPipelineOptions, RunReport } from './run-pipeline.js';
