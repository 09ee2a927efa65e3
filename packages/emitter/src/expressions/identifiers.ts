/**
 * Identifier expression emitters
 */

import { IrIdentifierExpression } from "@dtoshape/frontend";
import { TsFragment } from "../types.js";
import { Precedence, fragment } from "./parentheses.js";

export const emitIdentifier = (expr: IrIdentifierExpression): TsFragment =>
  fragment(expr.name, Precedence.primary);

export const emitThis = (): TsFragment => fragment("this", Precedence.primary);
