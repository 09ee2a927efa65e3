/**
 * CLI constants
 */

/** Kept equal to the version in package.json (see constants.test.ts) */
export const VERSION = "0.3.0";
