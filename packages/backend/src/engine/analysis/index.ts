export type { RedFlaggedRecord, AnalysisSummary, AnalysisResult } from './types.js';
export { aggregateFlags, buildSummary, maxSeverity } from './flag-aggregator.js';
export type { Partition } from './flag-aggregator.js';
export { AnalysisOrchestrator } from './analysis-orchestrator.js';
export type { AnalysisOrchestratorOptions, RunOptions } from './analysis-orchestrator.js';
