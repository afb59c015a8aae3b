import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Definition", template: "Malformed type definition: {name}" },
  E0101: { code: "E0101", severity: "error", category: "Definition", template: "Duplicate field {field} in {owner}" },
  E0102: { code: "E0102", severity: "error", category: "Definition", template: "Duplicate variant {variant} in {name}" },
  E0103: { code: "E0103", severity: "error", category: "Definition", template: "Empty name in {owner}" },
  E0104: { code: "E0104", severity: "error", category: "Definition", template: "Reserved name {reserved} used in {owner}" },
  E0105: { code: "E0105", severity: "error", category: "Definition", template: "Sum type {name} declares no variants" },
  E0106: { code: "E0106", severity: "error", category: "Definition", template: "Invalid type tag for {owner}: {detail}" },
  E0110: { code: "E0110", severity: "error", category: "Definition", template: "Unknown type: {name}" },
  E0111: { code: "E0111", severity: "error", category: "Definition", template: "Dangling reference from {owner} to {target}" },

  E0200: { code: "E0200", severity: "error", category: "Validation", template: "Unknown field {field} for {owner}" },
  E0201: { code: "E0201", severity: "error", category: "Validation", template: "Required field missing: {field} for {owner}" },
  E0202: { code: "E0202", severity: "error", category: "Validation", template: "Type mismatch: expected {expected}, got {actual}" },
  E0203: { code: "E0203", severity: "error", category: "Validation", template: "Unknown variant {variant} of {name}" },
  E0204: { code: "E0204", severity: "error", category: "Validation", template: "{name} is a {actual} type, not a {expected} type" },

  E0300: { code: "E0300", severity: "error", category: "Compile", template: "Non-exhaustive match on {name}: missing {missing}" },
  E0301: { code: "E0301", severity: "error", category: "Compile", template: "Duplicate unconditional clause for {variant}" },
  E0302: { code: "E0302", severity: "error", category: "Compile", template: "Clause names unknown variant {variant} of {name}" },
  E0303: { code: "E0303", severity: "error", category: "Compile", template: "Cannot match on {name}: it is a {actual} type" },

  E0400: { code: "E0400", severity: "error", category: "Dispatch", template: "No guard matched for {name}.{variant}" },
  E0401: { code: "E0401", severity: "error", category: "Dispatch", template: "Pattern compiled for {expected} applied to {actual}" },
  E0402: { code: "E0402", severity: "error", category: "Dispatch", template: "Value is not an instance: {actual}" },
  E0403: { code: "E0403", severity: "error", category: "Dispatch", template: "Variant {variant} is not in the decision table for {name}" },

  E0500: { code: "E0500", severity: "error", category: "Cell", template: "Lazy computation failed in {cell}: {error}" },
  E0501: { code: "E0501", severity: "error", category: "Cell", template: "Cell {cell} was forced while its computation was running" },
  E0502: { code: "E0502", severity: "error", category: "Cell", template: "Cell {cell} holds an async computation; use forceAsync" },

  E0600: { code: "E0600", severity: "error", category: "Synthesis", template: "No synthesis rule matched input for {name}" },
  E0601: { code: "E0601", severity: "error", category: "Synthesis", template: "Rule {rule} builds unknown variant {variant} of {name}" },
  E0602: { code: "E0602", severity: "error", category: "Synthesis", template: "Cannot synthesize {name}: it is a {actual} type" },

  W0001: { code: "W0001", severity: "warning", category: "Compile", template: "Unreachable clause {index} ({variant})" },
  W0002: { code: "W0002", severity: "warning", category: "Synthesis", template: "No rule produces variant {variant} of {name}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: string
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    path,
    data: params,
  };
}
