export type {
  StringSimilarity,
  BatchAnalyzerResult,
  BatchContext,
  CrossRecordAnalyzer,
} from './types.js';

export { groupIndices } from './grouping.js';
export { BigramDiceSimilarity, normalizeWorkName, workNameSimilarity } from './text-similarity.js';
export { OverlapAnalyzer } from './overlap-analyzer.js';
export { SplittingAnalyzer } from './splitting-analyzer.js';
export { BatchAnalyzer } from './batch-analyzer.js';
