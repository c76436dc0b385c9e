/**
 * Shared types and utilities for the FeliCa remote reader
 *
 * Holds what every other package needs: the error taxonomy, the structured
 * logger, hex helpers and the FeliCa frame codec.
 */

export * from "./types/index.js";
export * from "./errors.js";
export * from "./utils/index.js";
export * from "./protocol/frame-codec.js";
