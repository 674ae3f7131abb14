export * from './errors.js';
export * from './engine/types.js';
export { aggregate } from './engine/aggregator.js';
export { categorizeGoal, expandExtract, expandRow, ExpandedExtract } from './engine/expander.js';
export {
  DEFAULT_EXTRACT_FORMAT,
  extractFormatSchema,
  loadExtractFormat,
  parseExtractFormat,
} from './engine/extract-format.js';
export type { ExtractFormat, GoalCategory } from './engine/extract-format.js';
export { runPipeline } from './engine/pipeline.js';
export type { PipelineFailure, PipelineResult, PipelineStats, PipelineSuccess } from './engine/pipeline.js';
export { reconcile } from './engine/reconciler.js';
export type { ReconcileResult } from './engine/reconciler.js';
export { goalStatusOf, mergeSummaries } from './engine/summary.js';
