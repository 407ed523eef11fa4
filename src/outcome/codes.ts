import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Unexpected '{char}' at offset {offset}" },

  E0100: { code: "E0100", severity: "error", category: "Eval", template: "Symbol's value as variable is void: {name}" },
  E0101: { code: "E0101", severity: "error", category: "Eval", template: "Symbol's function definition is void: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Eval", template: "Wrong type argument: {expected}, {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Eval", template: "Wrong number of arguments: {name}, {actual}" },
  E0104: { code: "E0104", severity: "error", category: "Eval", template: "{message}" },
  E0105: { code: "E0105", severity: "error", category: "Eval", template: "Attempt to set a constant symbol: {name}" },
  E0199: { code: "E0199", severity: "error", category: "Eval", template: "Internal error: {message}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
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
    span,
    data: params,
  };
}
