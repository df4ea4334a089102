// src/core/pipeline/index.ts
export { SummaryPipeline, printSummary } from './runner.js';
export type { PipelineDeps, PipelineOptions } from './runner.js';
export { fail, proceed, skip, statusGroup } from './outcome.js';
export type { StageOutcome, StatusGroup } from './outcome.js';
