/**
 * Intermediate Representation (IR) types for projection compilation
 */

export * from "./types/index.js";
