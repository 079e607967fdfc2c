export { DiffEngine } from './engine';
export type { DiffEngineOptions } from './engine';
export { align, diffSegments, toSegments } from './alignment';
export type { Alignment } from './alignment';
export { SequenceMatcher } from './sequence-matcher';
export type { MatchingBlock, Opcode, OpcodeTag } from './sequence-matcher';
export { similarity, similarityFromAlignment } from './similarity';
export { escapeHtml, renderHtml } from './render';
export { summarize } from './summary';
export { splitLines } from './tokenize';
