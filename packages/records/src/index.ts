/**
 * Record decoding for the transit area of FeliCa cards
 */

export * from "./types.js";
export * from "./packed.js";
export * from "./decoder.js";
export * from "./labels.js";
export { LAYOUTS, findLayout, expectedLength } from "./layouts.js";
export type { Layout } from "./layouts.js";
