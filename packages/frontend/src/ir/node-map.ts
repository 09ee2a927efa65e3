/**
 * IR → TypeScript node correspondence.
 *
 * Conversion records the syntax node each IR node came from. Semantic
 * queries on IR (types, symbol classification) go through this map;
 * synthesized nodes have no entry and resolve to "unknown".
 */

import * as ts from "typescript";
import { IrExpression } from "./types.js";

export type IrNodeMap = {
  readonly record: <T extends IrExpression>(ir: T, node: ts.Node) => T;
  readonly get: (ir: IrExpression) => ts.Node | undefined;
};

export const createNodeMap = (): IrNodeMap => {
  const nodes = new WeakMap<IrExpression, ts.Node>();
  return {
    record: (ir, node) => {
      nodes.set(ir, node);
      return ir;
    },
    get: (ir) => nodes.get(ir),
  };
};
