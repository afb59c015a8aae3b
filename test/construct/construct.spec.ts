import { describe, it, expect, beforeEach } from "vitest";
import { TypeRegistry } from "../../src/registry/registry";
import { type ConstructContext, constructProduct, constructVariant } from "../../src/core/construct/construct";
import { getField, isInstance, isProduct, isVariant, showInstance } from "../../src/core/construct/instance";
import { FrozenMap, describeValue } from "../../src/core/construct/typecheck";
import { field, product, t } from "../../src/registry/dsl";
import { eager, force, lazy, resetCellIds } from "../../src/core/cell/cell";
import { EventBus, recordEvents } from "../../src/core/events/bus";
import { manualClock } from "../../src/ports/clock";
import { unwrap } from "../../src/outcome/matchers";
import { ALL_FIXTURES } from "../helpers/fixtures";

let ctx: ConstructContext;

beforeEach(() => {
  resetCellIds();
  const registry = new TypeRegistry();
  unwrap(registry.defineAll(ALL_FIXTURES));
  ctx = { registry };
});

describe("constructProduct", () => {
  it("builds a frozen instance with fields in declaration order", () => {
    const point = unwrap(constructProduct(ctx, "Point", { y: 2, x: 1 }));

    expect(point).toEqual({ tag: "Product", type: "Point", fields: { x: 1, y: 2 } });
    expect(Object.keys(point.fields)).toEqual(["x", "y"]);
    expect(Object.isFrozen(point)).toBe(true);
    expect(Object.isFrozen(point.fields)).toBe(true);
    expect(isProduct(point, "Point")).toBe(true);
    expect(getField(point, "x")).toBe(1);
    expect(getField(point, "toString")).toBeUndefined();
  });

  it("reports unknown fields", () => {
    const result = constructProduct(ctx, "Point", { x: 1, y: 2, z: 3 });
    expect(result.tag).toBe("Fail");
    if (result.tag === "Fail") {
      expect(result.failure.reason).toBe("validation-error");
      expect(result.failure.kind).toBe("UnknownField");
      expect(result.failure.message).toBe("Invalid fields for Point: unknown z");
      expect(result.failure.context?.["unknownFields"]).toEqual(["z"]);
    }
  });

  it("reports missing fields", () => {
    const result = constructProduct(ctx, "Point", { x: 1 });
    expect(result.tag === "Fail" && result.failure.kind).toBe("MissingField");
    expect(result.tag === "Fail" && result.failure.message).toBe("Invalid fields for Point: missing y");
  });

  it("reports type mismatches with their paths", () => {
    const result = constructProduct(ctx, "Point", { x: 1, y: "2" });
    expect(result.tag === "Fail" && result.failure.kind).toBe("TypeMismatch");
    expect(result.tag === "Fail" && result.failure.message).toBe("Invalid fields for Point: y: expected number, got string");
  });

  it("puts unknown fields ahead of other problems", () => {
    const result = constructProduct(ctx, "Point", { x: "1", z: 0 });
    expect(result.tag === "Fail" && result.failure.kind).toBe("UnknownField");
    expect(result.tag === "Fail" && result.failure.message).toBe(
      "Invalid fields for Point: unknown z; missing y; x: expected number, got string"
    );
  });

  it("checks references and sequences of instances", () => {
    const a = unwrap(constructProduct(ctx, "Point", { x: 0, y: 0 }));
    const b = unwrap(constructProduct(ctx, "Point", { x: 1, y: 1 }));

    expect(unwrap(constructProduct(ctx, "Line", { from: a, to: b })).fields["to"]).toBe(b);

    const result = constructProduct(ctx, "Polygon", { points: [a, 3, b] });
    expect(result.tag).toBe("Fail");
    if (result.tag === "Fail") {
      expect(result.failure.context?.["mismatches"]).toEqual([{ path: "points[1]", expected: "Point", actual: "number" }]);
    }
  });

  it("copies sequences and maps so later changes do not reach the instance", () => {
    const a = unwrap(constructProduct(ctx, "Point", { x: 0, y: 0 }));
    const b = unwrap(constructProduct(ctx, "Point", { x: 1, y: 1 }));
    const pts: unknown[] = [a, b];

    const polygon = unwrap(constructProduct(ctx, "Polygon", { points: pts }));
    pts.push("not a point");

    expect(polygon.fields["points"]).toEqual([a, b]);
    expect(Object.isFrozen(polygon.fields["points"])).toBe(true);

    unwrap(ctx.registry.define(product("Tally", [field("counts", t.mapOf(t.number)), field("named", t.mapOf(t.number))])));
    const counts = new Map([["a", 1]]);
    const named: Record<string, number> = { a: 1 };

    const tally = unwrap(constructProduct(ctx, "Tally", { counts, named }));
    counts.set("b", 2);
    named["b"] = 2;

    const stored = tally.fields["counts"];
    expect(stored).toBeInstanceOf(FrozenMap);
    if (stored instanceof FrozenMap) {
      expect(Array.from(stored)).toEqual([["a", 1]]);
      expect(() => stored.set("c", 3)).toThrow("Cannot modify a frozen map");
    }
    expect(tally.fields["named"]).toEqual({ a: 1 });
  });

  it("rejects sum types", () => {
    const result = constructProduct(ctx, "Option", {});
    expect(result.tag === "Fail" && result.failure.kind).toBe("KindMismatch");
  });

  it("fails with TypeNotFound for unknown types", () => {
    const result = constructProduct(ctx, "Nope", {});
    expect(result.tag === "Fail" && result.failure.kind).toBe("TypeNotFound");
  });
});

describe("constructVariant", () => {
  it("builds a variant with exactly its fields", () => {
    const some = unwrap(constructVariant(ctx, "Option", "Some", { value: 42 }));
    const none = unwrap(constructVariant(ctx, "Option", "None"));

    expect(isVariant(some, "Option", "Some")).toBe(true);
    expect(some.fields).toEqual({ value: 42 });
    expect(none.fields).toEqual({});
  });

  it("rejects unknown variants and names the declared ones", () => {
    const result = constructVariant(ctx, "Option", "Maybe", {});
    expect(result.tag).toBe("Fail");
    if (result.tag === "Fail") {
      expect(result.failure.kind).toBe("UnknownVariant");
      expect(result.failure.message).toBe("Unknown variant Maybe of Option (expected one of None, Some)");
      expect(result.failure.context?.["knownVariants"]).toEqual(["None", "Some"]);
    }
  });

  it("rejects fields of another variant", () => {
    const result = constructVariant(ctx, "Shape", "Circle", { side: 2 });
    expect(result.tag === "Fail" && result.failure.message).toBe("Invalid fields for Shape.Circle: unknown side; missing radius");
  });

  it("rejects variants of product types", () => {
    const result = constructVariant(ctx, "Point", "Point", { x: 1, y: 1 });
    expect(result.tag === "Fail" && result.failure.kind).toBe("KindMismatch");
  });

  it("requires recursive fields to hold cells", () => {
    const nil = unwrap(constructVariant(ctx, "List", "Nil"));
    const result = constructVariant(ctx, "List", "Cons", { head: 1, tail: nil });
    expect(result.tag === "Fail" && result.failure.message).toBe(
      "Invalid fields for List.Cons: tail: expected Rec<List>, got instance of List.Nil"
    );
  });

  it("accepts an unforced lazy cell without running it", () => {
    let runs = 0;
    const tail = lazy(() => {
      runs++;
      return unwrap(constructVariant(ctx, "List", "Nil"));
    });
    const cons = unwrap(constructVariant(ctx, "List", "Cons", { head: 1, tail }));

    expect(runs).toBe(0);
    expect(cons.fields["tail"]).toBe(tail);
    expect(force(tail).variant).toBe("Nil");
    expect(runs).toBe(1);
  });

  it("checks the value of an eager cell", () => {
    const result = constructVariant(ctx, "List", "Cons", { head: 1, tail: eager(5) });
    expect(result.tag === "Fail" && result.failure.message).toBe("Invalid fields for List.Cons: tail: expected List, got number");
  });
});

describe("instances", () => {
  it("treats look-alike literals as non-instances", () => {
    const fake = { tag: "Variant", type: "Option", variant: "None", fields: {} };
    expect(isInstance(fake)).toBe(false);
    expect(describeValue(fake)).toBe("object");
    expect(describeValue(null)).toBe("null");
    expect(describeValue([1])).toBe("array");
  });

  it("renders without forcing lazy cells", () => {
    const nil = unwrap(constructVariant(ctx, "List", "Nil"));
    const tail = lazy(() => nil);
    const list = unwrap(constructVariant(ctx, "List", "Cons", { head: "a", tail }));
    const point = unwrap(constructProduct(ctx, "Point", { x: 1, y: 2 }));

    expect(showInstance(list)).toBe('Cons(head: "a", tail: <pending cell-0>)');
    expect(showInstance(point)).toBe("Point { x: 1, y: 2 }");
    force(tail);
    expect(showInstance(list)).toBe('Cons(head: "a", tail: Nil)');
  });

  it("reports construction to the event bus", () => {
    const bus = new EventBus();
    const rec = recordEvents(bus);
    const clock = manualClock(100);
    ctx = { ...ctx, events: bus, clock };

    constructProduct(ctx, "Point", { x: 1, y: 2 });
    constructVariant(ctx, "Option", "Maybe");

    expect(rec.events).toMatchObject([
      { tag: "InstanceConstructed", type: "Point", durationMs: 0 },
      { tag: "ValidationFailed", type: "Option", variant: "Maybe", errorKind: "UnknownVariant" },
    ]);
  });
});
