/**
 * Core emitter types
 */

/**
 * Options for the generated module
 */
export type EmitterOptions = {
  /** Absolute path of the generated file; imports are relative to it */
  readonly outputFile: string;
  /** Indentation width (spaces) */
  readonly indent?: number;
  /** Emit `readonly` on generated properties */
  readonly readonlyProperties?: boolean;
  /** `all` writes `From:` comments on types and fields */
  readonly commentOutput?: "all" | "none";
  /** Project root, used to print call-site locations */
  readonly projectRoot?: string;
  /** Header line written at the top of the module */
  readonly banner?: string;
};

export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
  /** Print object literals on one line (comments, diagnostics) */
  readonly singleLine: boolean;
};

/**
 * Printed expression text with the precedence of its outermost operator
 */
export type TsFragment = {
  readonly text: string;
  readonly precedence: number;
};
