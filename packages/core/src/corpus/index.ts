// packages/core/src/corpus/index.ts -- barrel re-export

export { loadCorpus, byPath, normalizePath } from './loader.js';
export type { CorpusFile, CorpusFileKind, CorpusOptions, CorpusLoadResult } from './loader.js';
export { readTextFile, readJsonFile, readOptionalJsonFile, toLoadIssue } from './read.js';
