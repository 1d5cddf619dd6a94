import { test, expect } from "vitest";

import { MisuseError } from "../error.ts";
import { isViolation, resolveViolations, UNBOUNDED, Violation } from "../options.ts";

test("Violation names are stable strings", () => {
  expect(Violation.ALLOW_NULL).toBe("allow-null");
  expect(Violation.REQUEST_OVERFLOW).toBe("request-overflow");
});

test("UNBOUNDED is the largest safe integer", () => {
  expect(UNBOUNDED).toBe(Number.MAX_SAFE_INTEGER);
});

test("isViolation narrows known names only", () => {
  expect(isViolation("allow-null")).toBe(true);
  expect(isViolation("request-overflow")).toBe(true);
  expect(isViolation("cleanup-on-terminate")).toBe(false);
  expect(isViolation(42)).toBe(false);
});

test("resolveViolations defaults to no relaxations", () => {
  expect(resolveViolations().size).toBe(0);
  expect(resolveViolations(null).size).toBe(0);
  expect(resolveViolations({}).size).toBe(0);
});

test("resolveViolations collects and de-duplicates", () => {
  const violations = resolveViolations({
    violations: [Violation.ALLOW_NULL, Violation.ALLOW_NULL, Violation.REQUEST_OVERFLOW],
  });

  expect([...violations].sort()).toEqual(["allow-null", "request-overflow"]);
});

test("resolveViolations accepts any iterable", () => {
  const violations = resolveViolations({ violations: new Set([Violation.REQUEST_OVERFLOW]) });
  expect(violations.has(Violation.REQUEST_OVERFLOW)).toBe(true);
});

test("resolveViolations copies its input", () => {
  const input: Violation[] = [Violation.ALLOW_NULL];
  const violations = resolveViolations({ violations: input });

  input.push(Violation.REQUEST_OVERFLOW);

  expect(violations.has(Violation.REQUEST_OVERFLOW)).toBe(false);
});

test("resolveViolations rejects unknown names", () => {
  // Called through Reflect.apply: the option type only admits known names.
  const options = { violations: ["defer-cancellation"] };
  expect(() => Reflect.apply(resolveViolations, undefined, [options])).toThrow(MisuseError);
  expect(() => Reflect.apply(resolveViolations, undefined, [options])).toThrow("Unknown violation: defer-cancellation");
});
