// test/helpers/fixtures.ts
// Shared type definitions and capture helpers for specs

import { field, product, sum, t, variant } from "../../src/registry/dsl";
import type { TypeDefinition } from "../../src/registry/types";
import type { LogWriter } from "../../src/core/log/logger";

export const Point = product("Point", [field("x", t.number), field("y", t.number)]);

export const Line = product("Line", [field("from", t.ref("Point")), field("to", t.ref("Point"))]);

export const Polygon = product("Polygon", [field("points", t.seq(t.ref("Point")))]);

export const Option = sum("Option", [variant("None"), variant("Some", field("value", t.any))]);

export const Shape = sum("Shape", [
  variant("Circle", field("radius", t.number)),
  variant("Square", field("side", t.number)),
  variant("Tri", field("base", t.number), field("height", t.number)),
]);

export const List = sum("List", [
  variant("Cons", field("head", t.any), field("tail", t.rec("List"))),
  variant("Nil"),
]);

export const Result = sum("Result", [
  variant("Ok", field("value", t.string)),
  variant("Err", field("message", t.string)),
]);

export const ALL_FIXTURES: readonly TypeDefinition[] = [Point, Line, Polygon, Option, Shape, List, Result];

/**
 * LogWriter that keeps lines per level.
 */
export function captureWriter(): LogWriter & { lines: string[] } {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  return { lines, error: push, warn: push, info: push, debug: push };
}
