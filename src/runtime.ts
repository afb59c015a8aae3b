// src/runtime.ts
// AdtRuntime - one registry, compiler and event bus behind a single API
//
// Usage:
//   import { AdtRuntime, sum, variant, field, t, on, unwrap } from "alembic-adt";
//
//   const adt = new AdtRuntime();
//   adt.define(sum("Option", [variant("None"), variant("Some", field("value", t.any))]));
//   const some = adt.constructVariant("Option", "Some", { value: 1 });
//   adt.distill("Option", [on("Some", f => f.value), on("None", () => 0)], unwrap(some));

import type { TypeDefinition } from "./registry/types";
import type { Outcome } from "./outcome/outcome";
import type { AdtConfig, PartialAdtConfig } from "./core/config/config";
import type { Logger, LogWriter } from "./core/log/logger";
import type { ClockPort } from "./ports/clock";
import type { ProductInstance, VariantInstance } from "./core/construct/instance";
import type { CellObserver, EagerCell, LazyCell, RecursionCell } from "./core/cell/types";
import type { EventFilter, EventListener, SubscriptionHandle } from "./core/events/types";
import type { Clause, CompiledPattern } from "./core/match/types";
import type { SynthesisPlan, SynthesisRule } from "./core/synthesis/types";

import { TypeRegistry } from "./registry/registry";
import { done } from "./outcome/constructors";
import { loadConfig, mergeConfigs } from "./core/config/config";
import { createLogger } from "./core/log/logger";
import { systemClock } from "./ports/clock";
import { EventBus } from "./core/events/bus";
import { type ConstructContext, constructProduct, constructVariant } from "./core/construct/construct";
import { eager, force, forceAsync, lazy, lazyAsync, tryForce } from "./core/cell/cell";
import { PatternCompiler } from "./core/match/compiler";
import { dispatch, distill } from "./core/match/dispatch";
import { compileSynthesis, synthesize } from "./core/synthesis/synthesis";

/**
 * Options for AdtRuntime
 */
export type AdtRuntimeOptions = {
  /** Overrides on top of the defaults (the constructor reads no env or files) */
  config?: PartialAdtConfig;

  /** Logger to use instead of one built from config.logging */
  logger?: Logger;

  /** Where the default logger writes (default: console) */
  writer?: LogWriter;

  /** Clock for event durations (default: performance.now) */
  clock?: ClockPort;
};

/**
 * AdtRuntime - Main entry point
 *
 * Owns:
 * - a TypeRegistry
 * - a PatternCompiler whose cache lives as long as the runtime
 * - an EventBus that every operation reports to
 *
 * Lazy cells made through the runtime report their forces to the bus.
 */
export class AdtRuntime {
  readonly config: AdtConfig;
  readonly logger: Logger;
  readonly events: EventBus;
  readonly registry: TypeRegistry;
  readonly compiler: PatternCompiler;
  private readonly clock: ClockPort;

  constructor(options: AdtRuntimeOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger(this.config.logging.level, "adt", options.writer);
    this.events = new EventBus({ enabled: this.config.events.enabled, logger: this.logger.child("events") });
    this.registry = new TypeRegistry({ events: this.events, logger: this.logger.child("registry") });
    this.compiler = new PatternCompiler({
      registry: this.registry,
      events: this.events,
      clock: this.clock,
      logger: this.logger.child("compiler"),
      config: this.config.compiler,
    });
  }

  /**
   * Build a runtime from ADT_* environment variables and the first config
   * file found in `cwd`, then `overrides`.
   */
  static fromEnvironment(options: { cwd?: string; configFile?: string; overrides?: PartialAdtConfig } = {}): AdtRuntime {
    return new AdtRuntime({ config: loadConfig(options) });
  }

  private get ctx(): ConstructContext {
    return { registry: this.registry, events: this.events, clock: this.clock };
  }

  private get observer(): CellObserver {
    return { clock: this.clock, events: this.events };
  }

  // ─────────────────────────────────────────────────────────────────
  // Types
  // ─────────────────────────────────────────────────────────────────

  define(def: TypeDefinition): Outcome<TypeDefinition> {
    const result = this.registry.define(def);
    if (result.tag === "Done" && this.registry.revision(def.name) > 1) {
      this.compiler.invalidate(def.name);
    }
    return result;
  }

  defineAll(defs: readonly TypeDefinition[]): Outcome<TypeDefinition[]> {
    const installed: TypeDefinition[] = [];
    for (const def of defs) {
      const result = this.define(def);
      if (result.tag === "Fail") return result;
      installed.push(result.value);
    }
    return done(installed);
  }

  lookup(name: string): TypeDefinition | undefined {
    return this.registry.lookup(name);
  }

  // ─────────────────────────────────────────────────────────────────
  // Instances
  // ─────────────────────────────────────────────────────────────────

  constructProduct(typeName: string, values: Readonly<Record<string, unknown>>): Outcome<ProductInstance> {
    return constructProduct(this.ctx, typeName, values);
  }

  constructVariant(
    typeName: string,
    variantName: string,
    values: Readonly<Record<string, unknown>> = {}
  ): Outcome<VariantInstance> {
    return constructVariant(this.ctx, typeName, variantName, values);
  }

  // ─────────────────────────────────────────────────────────────────
  // Recursion cells
  // ─────────────────────────────────────────────────────────────────

  eager<T>(value: T, label?: string): EagerCell<T> {
    return eager(value, { label });
  }

  lazy<T>(computation: () => T, label?: string): LazyCell<T> {
    return lazy(computation, { label, observer: this.observer });
  }

  lazyAsync<T>(computation: () => Promise<T>, label?: string): LazyCell<T> {
    return lazyAsync(computation, { label, observer: this.observer });
  }

  force<T>(cell: RecursionCell<T>): T {
    return force(cell);
  }

  tryForce<T>(cell: RecursionCell<T>): Outcome<T> {
    return tryForce(cell);
  }

  forceAsync<T>(cell: RecursionCell<T>): Promise<T> {
    return forceAsync(cell);
  }

  // ─────────────────────────────────────────────────────────────────
  // Pattern matching
  // ─────────────────────────────────────────────────────────────────

  compile<R>(typeName: string, clauses: readonly Clause<R>[]): Outcome<CompiledPattern<R>> {
    return this.compiler.compile(typeName, clauses);
  }

  dispatch<R>(compiled: CompiledPattern<R>, value: unknown): Outcome<R> {
    return dispatch({ events: this.events, clock: this.clock }, compiled, value);
  }

  /**
   * Compile (cached) and dispatch in one call.
   */
  distill<R>(typeName: string, clauses: readonly Clause<R>[], value: unknown): Outcome<R> {
    return distill(this.compiler, { events: this.events, clock: this.clock }, typeName, clauses, value);
  }

  // ─────────────────────────────────────────────────────────────────
  // Synthesis
  // ─────────────────────────────────────────────────────────────────

  compileSynthesis<I>(typeName: string, rules: readonly SynthesisRule<I>[]): Outcome<SynthesisPlan<I>> {
    const plan = compileSynthesis(this.registry, typeName, rules);
    if (plan.tag === "Done") {
      for (const w of plan.value.warnings) {
        this.logger.info(w.message, { type: typeName });
      }
    }
    return plan;
  }

  synthesize<I>(plan: SynthesisPlan<I>, input: I): Outcome<VariantInstance> {
    return synthesize(this.ctx, plan, input);
  }

  // ─────────────────────────────────────────────────────────────────
  // Observability
  // ─────────────────────────────────────────────────────────────────

  subscribe(filter: EventFilter, listener: EventListener): SubscriptionHandle {
    return this.events.subscribe(filter, listener);
  }

  unsubscribe(handle: SubscriptionHandle | number): boolean {
    return this.events.unsubscribe(handle);
  }
}
