/**
 * ConverterContext: shared context for IR converters
 */

import type { Diagnostic } from "../../types/diagnostic.js";
import type { IrNodeMap } from "../node-map.js";

/**
 * Context object passed through all IR converters.
 */
export type ConverterContext = {
  /** Records which syntax node each IR node came from */
  readonly nodes: IrNodeMap;

  /** Sink for conversion diagnostics (unsupported syntax) */
  readonly report: (diagnostic: Diagnostic) => void;
};

export const createConverterContext = (params: {
  nodes: IrNodeMap;
  report: (diagnostic: Diagnostic) => void;
}): ConverterContext => ({
  nodes: params.nodes,
  report: params.report,
});
