export * from './errors.js';
export * from './memory/types.js';
export { extractTokens, countWords } from './memory/tokenizer.js';
export { scoreSignificance, clampSignificance, WEIGHTS } from './memory/significance.js';
export { loadKeywordSets } from './memory/keywords.js';
export {
  appendEntry,
  createEmptyDocument,
  createSession,
  findDanglingRefs,
  findSession,
  hashText,
  nextSequence,
  removeEntry,
  resolveRef,
  setSignificance,
  type DanglingRef,
} from './memory/document.js';
export { IndexStore } from './memory/index-store.js';
export * from './memory/query.js';
export * from './extraction/types.js';
export { extractSince } from './extraction/extract.js';
export { persistSnapshot, sanitizeTimestamp } from './extraction/snapshot.js';
export { analyzeSnapshot, generateReport, readSnapshot, runAnalysis, saveAnalysis } from './extraction/analyze.js';
export { runProcess, triggerExtraction } from './extraction/trigger.js';
export {
  computeNextRun,
  createCronConfig,
  loadCronConfig,
  saveCronConfig,
  startExtractionLoop,
} from './extraction/schedule.js';
export {
  buildContext,
  findLatestAnalysis,
  formatAnalysisSection,
  formatRecentSection,
  injectIntoPrompt,
} from './context/context-builder.js';
