export type { IChunker } from "./chunker.interface.js";
export { BoundaryChunker, chunkText } from "./boundary-chunker.js";
export { classifyLength, classifyText, estimateTokens } from "./length-classifier.js";
export {
  CATEGORY_DEFAULTS,
  computeChunkParameters,
  createChunkParameters,
  validateChunkSizing,
} from "./chunk-parameters.js";
