import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { AdtRuntime } from "../../src/runtime";
import { field, product, sum, t, variant } from "../../src/registry/dsl";
import { clausesFrom, on, otherwise, when } from "../../src/core/match/clauses";
import type { Clause } from "../../src/core/match/types";
import { rule } from "../../src/core/synthesis/synthesis";
import { isCell, resetCellIds } from "../../src/core/cell/cell";
import { type VariantInstance, isVariant } from "../../src/core/construct/instance";
import { recordEvents } from "../../src/core/events/bus";
import { manualClock } from "../../src/ports/clock";
import { unwrap } from "../../src/outcome/matchers";
import { List, Option, Result, captureWriter } from "../helpers/fixtures";

let adt: AdtRuntime;

beforeEach(() => {
  resetCellIds();
  adt = new AdtRuntime({ clock: manualClock() });
});

describe("AdtRuntime", () => {
  it("defines, constructs and matches an Option", () => {
    unwrap(adt.define(Option));
    const unwrapOrZero: Clause<unknown>[] = [on("Some", f => f["value"]), on("None", () => 0)];

    const some = unwrap(adt.constructVariant("Option", "Some", { value: 3 }));
    const none = unwrap(adt.constructVariant("Option", "None"));

    expect(unwrap(adt.distill("Option", unwrapOrZero, some))).toBe(3);
    expect(unwrap(adt.distill("Option", unwrapOrZero, none))).toBe(0);
  });

  it("rejects a match that forgets a variant", () => {
    unwrap(adt.define(Option));
    const result = adt.distill("Option", [on("Some", () => 1)], unwrap(adt.constructVariant("Option", "None")));
    expect(result.tag === "Fail" && result.failure.message).toBe("Non-exhaustive match on Option: missing None");
  });

  it("round-trips a value through construction and matching", () => {
    unwrap(adt.define(Result));
    const ok = unwrap(adt.constructVariant("Result", "Ok", { value: "x" }));
    const show = clausesFrom<string>({
      Ok: f => String(f["value"]),
      Err: f => `error: ${String(f["message"])}`,
    });

    expect(unwrap(adt.distill("Result", show, ok))).toBe("x");
  });

  it("builds products through the registry", () => {
    unwrap(adt.define(product("Pair", [field("left", t.integer), field("right", t.integer)])));
    expect(unwrap(adt.constructProduct("Pair", { left: 1, right: 2 })).fields).toEqual({ left: 1, right: 2 });
    expect(adt.constructProduct("Pair", { left: 1.5, right: 2 }).tag).toBe("Fail");
  });

  it("walks an unbounded lazy list, forcing only what it reads", () => {
    unwrap(adt.define(List));
    const rec = recordEvents(adt.events, ["LazyForced"]);

    const naturals = (n: number): VariantInstance =>
      unwrap(adt.constructVariant("List", "Cons", { head: n, tail: adt.lazy(() => naturals(n + 1)) }));

    const next = (node: VariantInstance): VariantInstance => {
      const tail = node.fields["tail"];
      if (!isCell(tail)) throw new Error("tail is not a cell");
      const value = adt.force(tail);
      if (!isVariant(value, "List")) throw new Error("tail is not a List");
      return value;
    };

    const take = (list: VariantInstance, k: number): unknown[] => {
      const out: unknown[] = [];
      let node = list;
      for (let i = 0; i < k; i++) {
        out.push(node.fields["head"]);
        if (i < k - 1) node = next(node);
      }
      return out;
    };

    const list = naturals(0);
    expect(take(list, 5)).toEqual([0, 1, 2, 3, 4]);
    expect(rec.events).toHaveLength(4);

    expect(take(list, 5)).toEqual([0, 1, 2, 3, 4]);
    expect(rec.events).toHaveLength(4);
    expect(take(list, 6)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(rec.ofKind("LazyForced").map(e => e.cellId)).toEqual(["cell-0", "cell-1", "cell-2", "cell-3", "cell-4"]);
  });

  it("forces async cells once and reports them", async () => {
    const rec = recordEvents(adt.events, ["LazyForced"]);
    let runs = 0;
    const cell = adt.lazyAsync(async () => {
      runs++;
      return "fetched";
    }, "remote");

    const [a, b] = await Promise.all([adt.forceAsync(cell), adt.forceAsync(cell)]);
    expect([a, b]).toEqual(["fetched", "fetched"]);
    expect(runs).toBe(1);
    expect(rec.events).toHaveLength(1);
    expect(adt.tryForce(cell).tag).toBe("Done");
    expect(adt.force(adt.eager(9))).toBe(9);
  });

  it("synthesizes instances and matches on them", () => {
    unwrap(adt.define(Option));
    const plan = unwrap(adt.compileSynthesis<number>("Option", [
      rule("Some", (n: number) => n >= 0, n => ({ value: n })),
      rule("None", () => true, () => ({})),
    ]));
    const label = [when("Some", f => f["value"] === 0, () => "zero", "is-zero"), on("Some", () => "positive"), otherwise(() => "nothing")];

    expect(unwrap(adt.distill("Option", label, unwrap(adt.synthesize(plan, 0))))).toBe("zero");
    expect(unwrap(adt.distill("Option", label, unwrap(adt.synthesize(plan, 4))))).toBe("positive");
    expect(unwrap(adt.distill("Option", label, unwrap(adt.synthesize(plan, -1))))).toBe("nothing");
  });

  it("logs variants no synthesis rule produces", () => {
    const writer = captureWriter();
    adt = new AdtRuntime({ config: { logging: { level: "info" } }, writer });
    unwrap(adt.define(Option));

    unwrap(adt.compileSynthesis("Option", [rule("Some", (n: number) => n > 0, n => ({ value: n }))]));
    expect(writer.lines).toEqual(['[adt] info: No rule produces variant None of Option {"type":"Option"}']);
  });
});

describe("AdtRuntime observability", () => {
  it("reports each step of a define, construct and match", () => {
    const tags: string[] = [];
    const handle = adt.subscribe(() => true, e => {
      tags.push(e.tag);
    });

    unwrap(adt.define(Option));
    const some = unwrap(adt.constructVariant("Option", "Some", { value: 1 }));
    unwrap(adt.distill("Option", clausesFrom({ Some: () => 1, None: () => 0 }), some));
    adt.constructVariant("Option", "Maybe");

    expect(tags).toEqual(["TypeDefined", "InstanceConstructed", "PatternCompiled", "PatternDispatched", "ValidationFailed"]);
    expect(adt.unsubscribe(handle)).toBe(true);
  });

  it("stays silent when events are disabled", () => {
    adt = new AdtRuntime({ config: { events: { enabled: false } } });
    const rec = recordEvents(adt.events);
    unwrap(adt.define(Option));
    expect(rec.events).toEqual([]);
  });

  it("drops cached tables of a redefined type", () => {
    unwrap(adt.define(Option));
    unwrap(adt.compile("Option", clausesFrom({ Some: () => 1, None: () => 0 })));
    expect(adt.compiler.size).toBe(1);

    unwrap(adt.define(sum("Option", [variant("None"), variant("Some", field("value", t.number))])));
    expect(adt.compiler.size).toBe(0);
    expect(adt.lookup("Option")?.kind).toBe("Sum");
  });

  it("stops defineAll at the first bad definition", () => {
    const result = adt.defineAll([Option, sum("Empty", []), Result]);
    expect(result.tag === "Fail" && result.failure.kind).toBe("NoVariants");
    expect(adt.registry.names()).toEqual(["Option"]);
  });
});

describe("AdtRuntime.fromEnvironment", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "adt-runtime-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("picks up a config file from the working directory", () => {
    fs.writeFileSync(path.join(dir, ".alembicrc.json"), JSON.stringify({ compiler: { maxCacheEntries: 4 } }));
    adt = AdtRuntime.fromEnvironment({ cwd: dir, overrides: { logging: { level: "silent" } } });

    expect(adt.config.compiler.maxCacheEntries).toBe(4);
    expect(adt.logger.level).toBe("silent");
  });
});
