import type { Done, Fail, OutcomeMeta } from "./outcome";
import type {
  CellFailureKind,
  CompileFailureKind,
  DefinitionFailureKind,
  DispatchFailureKind,
  Failure,
  SynthesisFailureKind,
  ValidationFailureKind,
} from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Diagnostic } from "./diagnostic";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

type FailureOpts = {
  diagnostics?: Diagnostic[];
  context?: Record<string, unknown>;
  cause?: Failure;
};

export function malformedDefinition(
  name: string,
  kind: DefinitionFailureKind,
  diagnostics: Diagnostic[]
): Fail {
  const detail = diagnostics.map(d => d.message).join("; ");
  return fail(
    failure("malformed-type-definition", kind, `Malformed type definition ${name}: ${detail}`, {
      diagnostics: [makeDiagnostic("E0100", { name }), ...diagnostics],
      context: { type: name },
      recoverable: false,
    })
  );
}

export function typeNotFound(name: string): Fail {
  return fail(
    failure("type-not-found", "TypeNotFound", `Unknown type: ${name}`, {
      diagnostics: [makeDiagnostic("E0110", { name })],
      context: { type: name },
      recoverable: false,
    })
  );
}

export function validationError(kind: ValidationFailureKind, message: string, opts: FailureOpts = {}): Fail {
  return fail(failure("validation-error", kind, message, { ...opts, recoverable: false }));
}

export function compileError(kind: CompileFailureKind, message: string, opts: FailureOpts = {}): Fail {
  return fail(failure("compile-error", kind, message, { ...opts, recoverable: false }));
}

/**
 * Dispatch failures are recoverable: guards refine values at run time and
 * the compiler cannot rule them out.
 */
export function dispatchError(kind: DispatchFailureKind, message: string, opts: FailureOpts = {}): Fail {
  return fail(failure("dispatch-error", kind, message, { ...opts, recoverable: true }));
}

export function computationFailed(kind: CellFailureKind, message: string, opts: FailureOpts = {}): Fail {
  return fail(failure("computation-failed", kind, message, { ...opts, recoverable: true }));
}

export function synthesisError(kind: SynthesisFailureKind, message: string, opts: FailureOpts = {}): Fail {
  return fail(failure("synthesis-error", kind, message, { ...opts, recoverable: kind === "NoMatchingRule" }));
}
