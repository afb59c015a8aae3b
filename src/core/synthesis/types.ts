// src/core/synthesis/types.ts

import type { Diagnostic } from "../../outcome/diagnostic";

/**
 * Produce one variant of a sum type from an input when `when` holds.
 * `build` returns the variant's field values; they are validated like any
 * other construction.
 */
export interface SynthesisRule<I> {
  readonly variant: string;
  readonly when: (input: I) => boolean;
  readonly build: (input: I) => Readonly<Record<string, unknown>>;
  readonly name?: string;
}

export interface SynthesisPlan<I> {
  readonly type: string;
  readonly fingerprint: string;
  readonly rules: readonly SynthesisRule<I>[];
  /** Declared variants no rule produces */
  readonly unproducible: readonly string[];
  readonly warnings: readonly Diagnostic[];
}
