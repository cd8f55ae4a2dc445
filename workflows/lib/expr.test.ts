import { describe, expect, it } from "vitest";

import {
  always,
  and,
  cancelled,
  ctx,
  eq,
  evaluate,
  lit,
  ne,
  not,
  or,
  render,
  shouldRun,
  startsWith,
  success,
  wrap,
} from "./expr.ts";

describe("render", () => {
  it("quotes strings and doubles embedded quotes", () => {
    expect(render(lit("it's"))).toBe("'it''s'");
  });

  it("renders other literals bare", () => {
    expect(render(lit(1))).toBe("1");
    expect(render(lit(true))).toBe("true");
    expect(render(lit(null))).toBe("null");
  });

  it("parenthesizes || inside &&", () => {
    const expr = and(ctx("a"), or(ctx("b"), ctx("c")));
    expect(render(expr)).toBe("a && (b || c)");
  });

  it("leaves && inside || bare", () => {
    const expr = or(and(ctx("a"), ctx("b")), ctx("c"));
    expect(render(expr)).toBe("a && b || c");
  });

  it("parenthesizes a negated comparison", () => {
    expect(render(not(eq(ctx("a"), lit(1))))).toBe("!(a == 1)");
    expect(render(not(cancelled()))).toBe("!cancelled()");
  });

  it("renders function calls", () => {
    const expr = startsWith(ctx("github.ref"), lit("refs/tags/"));
    expect(render(expr)).toBe("startsWith(github.ref, 'refs/tags/')");
  });

  it("wraps for use in values", () => {
    expect(wrap(ctx("secrets.TOKEN"))).toBe("${{ secrets.TOKEN }}");
  });
});

describe("evaluate", () => {
  const context = {
    contexts: {
      github: { ref: "refs/heads/main", event_name: "push" },
    },
  };

  it("compares strings ignoring case", () => {
    expect(evaluate(eq(ctx("github.event_name"), lit("PUSH")), context)).toBe(true);
  });

  it("tests prefixes ignoring case", () => {
    const expr = startsWith(ctx("github.ref"), lit("REFS/HEADS/"));
    expect(evaluate(expr, context)).toBe(true);
  });

  it("reads missing context values as null", () => {
    expect(evaluate(ctx("github.head_ref"), context)).toBe(null);
    expect(evaluate(ctx("steps.x.outcome"), context)).toBe(null);
    expect(evaluate(not(ctx("github.head_ref")), context)).toBe(true);
  });

  it("returns the deciding operand from && and ||", () => {
    expect(evaluate(and(lit("x"), lit("")), context)).toBe("");
    expect(evaluate(and(lit("x"), lit("y")), context)).toBe("y");
    expect(evaluate(or(lit(0), lit("y")), context)).toBe("y");
    expect(evaluate(or(lit(0), lit(false)), context)).toBe(false);
  });

  it("compares mixed types as numbers", () => {
    expect(evaluate(eq(lit("1"), lit(1)), context)).toBe(true);
    expect(evaluate(eq(lit(true), lit(1)), context)).toBe(true);
  });

  it("negates comparisons with !=", () => {
    expect(evaluate(ne(ctx("github.ref"), lit("refs/heads/dev")), context)).toBe(true);
    expect(render(ne(ctx("a"), lit("b")))).toBe("a != 'b'");
  });

  it("reports job status", () => {
    const failed = { ...context, status: { failed: true, cancelled: false } };
    expect(evaluate(success(), failed)).toBe(false);
    expect(evaluate(cancelled(), failed)).toBe(false);
    expect(evaluate(success(), context)).toBe(true);
    expect(evaluate(always(), failed)).toBe(true);
  });
});

describe("shouldRun", () => {
  const published = eq(ctx("steps.publish.outcome"), lit("success"));
  const contexts = { steps: { publish: { outcome: "success" } } };

  it("requires success when no status function is called", () => {
    expect(shouldRun(published, { contexts })).toBe(true);
    expect(
      shouldRun(published, { contexts, status: { failed: true, cancelled: false } }),
    ).toBe(false);
  });

  it("takes an explicit status check as given", () => {
    const expr = and(published, not(cancelled()));
    expect(
      shouldRun(expr, { contexts, status: { failed: true, cancelled: false } }),
    ).toBe(true);
    expect(
      shouldRun(expr, { contexts, status: { failed: false, cancelled: true } }),
    ).toBe(false);
  });
});
