/**
 * A small interpreter for projection IR, used to compare rewritten forms
 * against the originals on concrete inputs.
 */

import { IrBinaryExpression, IrExpression } from "@dtoshape/frontend";

export type Environment = Readonly<Record<string, unknown>>;

const isIndexable = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const readMember = (object: unknown, key: PropertyKey): unknown => {
  if (typeof object === "string") {
    return Reflect.get(new String(object), key);
  }
  if (!isIndexable(object)) {
    throw new TypeError(`Cannot read '${String(key)}' of ${String(object)}`);
  }
  return Reflect.get(object, key);
};

const toKey = (value: unknown): PropertyKey =>
  typeof value === "number" || typeof value === "symbol" ? value : String(value);

const numeric = (value: unknown): number => {
  if (typeof value !== "number") {
    throw new TypeError(`Expected a number, got ${typeof value}`);
  }
  return value;
};

const applyBinary = (
  operator: IrBinaryExpression["operator"],
  left: unknown,
  right: unknown
): unknown => {
  switch (operator) {
    case "==":
      return left == right;
    case "!=":
      return left != right;
    case "===":
      return left === right;
    case "!==":
      return left !== right;
    case "+":
      return typeof left === "number" && typeof right === "number"
        ? left + right
        : `${String(left)}${String(right)}`;
    case "-":
      return numeric(left) - numeric(right);
    case "*":
      return numeric(left) * numeric(right);
    case "/":
      return numeric(left) / numeric(right);
    case "<":
      return numeric(left) < numeric(right);
    case ">":
      return numeric(left) > numeric(right);
    case "<=":
      return numeric(left) <= numeric(right);
    case ">=":
      return numeric(left) >= numeric(right);
    default:
      throw new Error(`Operator '${operator}' is not supported`);
  }
};

const invoke = (
  callee: IrExpression,
  args: readonly unknown[],
  env: Environment,
  optional: boolean
): unknown => {
  let receiver: unknown = undefined;
  let fn: unknown;
  if (callee.kind === "memberAccess") {
    receiver = evaluate(callee.object, env);
    if (receiver == null && callee.isOptional) return undefined;
    fn = readMember(receiver, callee.property);
  } else {
    fn = evaluate(callee, env);
  }
  if (fn == null && optional) return undefined;
  if (typeof fn !== "function") {
    throw new TypeError("Callee is not a function");
  }
  return Reflect.apply(fn, receiver, args);
};

/**
 * Evaluate an expression. Optional links short-circuit to undefined;
 * non-optional access on null throws like the engine would.
 */
export const evaluate = (expr: IrExpression, env: Environment): unknown => {
  switch (expr.kind) {
    case "literal":
      return expr.value;
    case "identifier":
      if (!(expr.name in env)) throw new ReferenceError(`${expr.name} is not defined`);
      return env[expr.name];
    case "memberAccess": {
      const object = evaluate(expr.object, env);
      if (object == null && expr.isOptional) return undefined;
      return readMember(object, expr.property);
    }
    case "elementAccess": {
      const object = evaluate(expr.object, env);
      if (object == null && expr.isOptional) return undefined;
      return readMember(object, toKey(evaluate(expr.index, env)));
    }
    case "call":
      return invoke(
        expr.callee,
        expr.arguments.map((arg) => evaluate(arg, env)),
        env,
        expr.isOptional
      );
    case "arrowFunction":
      return (...args: readonly unknown[]): unknown => {
        const scope: Record<string, unknown> = { ...env };
        expr.parameters.forEach((parameter, index) => {
          scope[parameter.name] = args[index];
        });
        return evaluate(expr.body, scope);
      };
    case "object": {
      const result: Record<string, unknown> = {};
      for (const property of expr.properties) {
        if (property.kind !== "property") {
          throw new Error(`Object ${property.kind} entries are not supported`);
        }
        result[property.key] = evaluate(property.value, env);
      }
      return result;
    }
    case "array":
      return expr.elements.map((element) => evaluate(element, env));
    case "unary": {
      const operand = evaluate(expr.expression, env);
      switch (expr.operator) {
        case "!":
          return !operand;
        case "-":
          return -numeric(operand);
        case "+":
          return numeric(operand);
        case "typeof":
          return typeof operand;
        default:
          throw new Error(`Operator '${expr.operator}' is not supported`);
      }
    }
    case "binary":
      return applyBinary(
        expr.operator,
        evaluate(expr.left, env),
        evaluate(expr.right, env)
      );
    case "logical": {
      const left = evaluate(expr.left, env);
      if (expr.operator === "&&") return left ? evaluate(expr.right, env) : left;
      if (expr.operator === "||") return left ? left : evaluate(expr.right, env);
      return left ?? evaluate(expr.right, env);
    }
    case "conditional":
      return evaluate(expr.condition, env)
        ? evaluate(expr.whenTrue, env)
        : evaluate(expr.whenFalse, env);
    case "typeAssertion":
    case "satisfies":
    case "nonNull":
    case "annotated":
      return evaluate(expr.expression, env);
    case "templateLiteral":
      return expr.quasis.reduce(
        (text, quasi, index) => {
          const part = expr.expressions[index - 1];
          return part === undefined
            ? `${text}${quasi}`
            : `${text}${String(evaluate(part, env))}${quasi}`;
        },
        ""
      );
    default:
      throw new Error(`Cannot evaluate ${expr.kind} expressions`);
  }
};
