// packages/core/src/engine -- Reference indexing, classification and the deletion gate

export { buildReferenceIndex } from './reference-index.js';
export { classifyHelper, classifyAll, summarizeCounts, CLASSIFICATIONS } from './classifier.js';
export { runAnalysis } from './analyzer.js';
export type { AnalysisOptions } from './analyzer.js';
export { analysisResultSchema, parseAnalysisResult } from './result-schema.js';
export { parseOrphanList } from './orphan-list.js';
export {
  evaluateDeletionGate,
  resolveLiveHelpers,
  MANUAL_REMOVAL_MESSAGE,
} from './deletion-gate.js';
export type { DeletionGateInput, LiveLookupResult } from './deletion-gate.js';
