// src/index.ts
// alembic-adt - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { AdtRuntime, type AdtRuntimeOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./registry";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & FAILURES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// INSTANCES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/construct";

// ═══════════════════════════════════════════════════════════════════════════════
// RECURSION CELLS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/cell";

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERN MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/match";

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTHESIS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/synthesis";

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS, CONFIG, LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/events";
export * from "./core/config";
export * from "./core/log";
export * from "./ports";
