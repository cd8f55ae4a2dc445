// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * GitHub Actions expressions, as values that can be rendered into a
 * workflow or evaluated locally against a run context.
 * @module
 */

export type Value = string | number | boolean | null;

export type StatusFunction = "success" | "failure" | "cancelled" | "always";

export type Expr =
  | { op: "literal"; value: Value }
  | { op: "context"; path: string }
  | { op: "eq" | "ne"; left: Expr; right: Expr }
  | { op: "and" | "or"; args: Expr[] }
  | { op: "not"; arg: Expr }
  | { op: "startsWith"; subject: Expr; prefix: Expr }
  | { op: "status"; fn: StatusFunction };

export interface JobStatus {
  failed: boolean;
  cancelled: boolean;
}

export interface EvalContext {
  /** Nested context objects, keyed by their root name (`github`, `env`, …). */
  contexts: Record<string, unknown>;
  status?: JobStatus;
}

export const lit = (value: Value): Expr => ({ op: "literal", value });
export const ctx = (path: string): Expr => ({ op: "context", path });
export const eq = (left: Expr, right: Expr): Expr => ({ op: "eq", left, right });
export const ne = (left: Expr, right: Expr): Expr => ({ op: "ne", left, right });
export const and = (...args: Expr[]): Expr => ({ op: "and", args });
export const or = (...args: Expr[]): Expr => ({ op: "or", args });
export const not = (arg: Expr): Expr => ({ op: "not", arg });
export const startsWith = (subject: Expr, prefix: Expr): Expr => ({
  op: "startsWith",
  subject,
  prefix,
});
export const success = (): Expr => ({ op: "status", fn: "success" });
export const cancelled = (): Expr => ({ op: "status", fn: "cancelled" });
export const always = (): Expr => ({ op: "status", fn: "always" });

// binding strength, loosest first
const PRECEDENCE: Record<Expr["op"], number> = {
  or: 1,
  and: 2,
  eq: 3,
  ne: 3,
  not: 4,
  literal: 5,
  context: 5,
  startsWith: 5,
  status: 5,
};

function renderLiteral(value: Value): string {
  if (typeof value == "string") {
    return `'${value.replaceAll("'", "''")}'`;
  } else if (value === null) {
    return "null";
  } else {
    return String(value);
  }
}

function renderOperand(expr: Expr, parent: number): string {
  const text = render(expr);
  return PRECEDENCE[expr.op] < parent ? `(${text})` : text;
}

/**
 * Render an expression in GitHub's expression syntax, without the
 * surrounding `${{ }}`.
 */
export function render(expr: Expr): string {
  switch (expr.op) {
    case "literal":
      return renderLiteral(expr.value);
    case "context":
      return expr.path;
    case "eq":
    case "ne": {
      const sym = expr.op == "eq" ? "==" : "!=";
      const p = PRECEDENCE[expr.op] + 1;
      return `${renderOperand(expr.left, p)} ${sym} ${renderOperand(expr.right, p)}`;
    }
    case "and":
    case "or": {
      const sym = expr.op == "and" ? " && " : " || ";
      const p = PRECEDENCE[expr.op];
      return expr.args.map((a) => renderOperand(a, p)).join(sym);
    }
    case "not":
      return `!${renderOperand(expr.arg, PRECEDENCE.not + 1)}`;
    case "startsWith":
      return `startsWith(${render(expr.subject)}, ${render(expr.prefix)})`;
    case "status":
      return `${expr.fn}()`;
  }
}

/** Render an expression for use inside a string value. */
export function wrap(expr: Expr): string {
  return `\${{ ${render(expr)} }}`;
}

export function truthy(value: Value): boolean {
  return !(value === false || value === 0 || value === "" || value === null);
}

function lookup(contexts: Record<string, unknown>, path: string): Value {
  let cur: unknown = contexts;
  for (const part of path.split(".")) {
    if (cur == null || typeof cur != "object") {
      return null;
    }
    cur = Object.getOwnPropertyDescriptor(cur, part)?.value;
  }
  if (
    typeof cur == "string" || typeof cur == "number" ||
    typeof cur == "boolean"
  ) {
    return cur;
  }
  return null;
}

function looseEquals(a: Value, b: Value): boolean {
  if (typeof a == "string" && typeof b == "string") {
    return a.toLowerCase() == b.toLowerCase();
  }
  if (typeof a == typeof b || a === null || b === null) {
    return a === b;
  }
  // mixed types compare as numbers
  return Number(a) === Number(b);
}

function asString(value: Value): string {
  return value === null ? "" : String(value);
}

/**
 * Evaluate an expression the way the Actions runner does: string
 * comparisons ignore case, missing context values are `null`, and the
 * logical operators yield their deciding operand.
 */
export function evaluate(expr: Expr, context: EvalContext): Value {
  const status = context.status ?? { failed: false, cancelled: false };
  switch (expr.op) {
    case "literal":
      return expr.value;
    case "context":
      return lookup(context.contexts, expr.path);
    case "eq":
      return looseEquals(
        evaluate(expr.left, context),
        evaluate(expr.right, context),
      );
    case "ne":
      return !looseEquals(
        evaluate(expr.left, context),
        evaluate(expr.right, context),
      );
    case "and": {
      let last: Value = true;
      for (const arg of expr.args) {
        last = evaluate(arg, context);
        if (!truthy(last)) return last;
      }
      return last;
    }
    case "or": {
      let last: Value = false;
      for (const arg of expr.args) {
        last = evaluate(arg, context);
        if (truthy(last)) return last;
      }
      return last;
    }
    case "not":
      return !truthy(evaluate(expr.arg, context));
    case "startsWith": {
      const subject = asString(evaluate(expr.subject, context));
      const prefix = asString(evaluate(expr.prefix, context));
      return subject.toLowerCase().startsWith(prefix.toLowerCase());
    }
    case "status":
      switch (expr.fn) {
        case "always":
          return true;
        case "cancelled":
          return status.cancelled;
        case "failure":
          return status.failed;
        case "success":
          return !status.failed && !status.cancelled;
      }
  }
}

export function test(expr: Expr, context: EvalContext): boolean {
  return truthy(evaluate(expr, context));
}

function hasStatusCheck(expr: Expr): boolean {
  switch (expr.op) {
    case "status":
      return true;
    case "eq":
    case "ne":
      return hasStatusCheck(expr.left) || hasStatusCheck(expr.right);
    case "and":
    case "or":
      return expr.args.some(hasStatusCheck);
    case "not":
      return hasStatusCheck(expr.arg);
    case "startsWith":
      return hasStatusCheck(expr.subject) || hasStatusCheck(expr.prefix);
    default:
      return false;
  }
}

/**
 * Decide a step or job `if:` condition.  A condition that calls no status
 * function only applies while the job is succeeding.
 */
export function shouldRun(expr: Expr, context: EvalContext): boolean {
  const cond = hasStatusCheck(expr) ? expr : and(success(), expr);
  return test(cond, context);
}
