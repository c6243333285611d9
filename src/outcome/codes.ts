import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Mutability", template: "Cannot assign to an immutable value ({target})" },

  E0200: { code: "E0200", severity: "error", category: "Positional", template: "Index out of range: {index} (elems {elems})" },
  E0201: { code: "E0201", severity: "error", category: "Positional", template: "Cannot {op} from an empty {kind}" },
  E0202: { code: "E0202", severity: "error", category: "Positional", template: "Cannot {op} an infinite {kind}" },
  E0203: { code: "E0203", severity: "error", category: "Positional", template: "Type {type} does not do Positional" },

  E0300: { code: "E0300", severity: "error", category: "Sequence", template: "Seq {id} has already been consumed ({state})" },

  E0400: { code: "E0400", severity: "error", category: "Parallel", template: "{count} work unit(s) failed" },
  E0401: { code: "E0401", severity: "error", category: "Parallel", template: "Parallel iteration cancelled" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
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
    data: params,
  };
}
