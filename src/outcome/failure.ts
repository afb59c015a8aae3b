import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "malformed-type-definition"
  | "type-not-found"
  | "validation-error"
  | "compile-error"
  | "dispatch-error"
  | "computation-failed"
  | "synthesis-error";

/**
 * Fine-grained failure kinds, grouped by the reason they appear under.
 */
export type DefinitionFailureKind =
  | "DuplicateField"
  | "DuplicateVariant"
  | "EmptyName"
  | "ReservedName"
  | "NoVariants"
  | "InvalidTypeTag";

export type ValidationFailureKind =
  | "UnknownField"
  | "MissingField"
  | "UnknownVariant"
  | "TypeMismatch"
  | "KindMismatch";

export type CompileFailureKind =
  | "NonExhaustiveMatch"
  | "DuplicateVariant"
  | "UnknownVariant"
  | "KindMismatch";

export type DispatchFailureKind =
  | "GuardExhaustionFailure"
  | "TypeMismatch"
  | "NotAnInstance"
  | "UnknownVariant";

export type CellFailureKind = "ComputationFailed" | "ReentrantForce" | "AsyncComputation";

export type SynthesisFailureKind = "NoMatchingRule" | "UnknownVariant" | "KindMismatch";

export type FailureKind =
  | DefinitionFailureKind
  | ValidationFailureKind
  | CompileFailureKind
  | DispatchFailureKind
  | CellFailureKind
  | SynthesisFailureKind
  | "TypeNotFound";

export interface Failure {
  reason: FailureReason;
  kind: FailureKind;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  kind: FailureKind,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "kind" | "message">>
): Failure {
  return {
    reason,
    kind,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}

/**
 * Thrown by the APIs that return plain values (`unwrap`, `force`).
 * `failure` is the same record the Outcome-returning form would have produced.
 */
export class AdtError extends Error {
  readonly failure: Failure;

  constructor(f: Failure, options?: { cause?: unknown }) {
    super(f.message, options);
    this.name = "AdtError";
    this.failure = f;
  }

  get reason(): FailureReason {
    return this.failure.reason;
  }

  get kind(): FailureKind {
    return this.failure.kind;
  }
}

export function isAdtError(e: unknown): e is AdtError {
  return e instanceof AdtError;
}
