import type { Span } from "./syntax.js";
import { spanText } from "./syntax.js";

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticKind =
  | "InternalError"
  | "ParseError"
  | "UnsupportedConstruct"
  | "NameCollision"
  | "UnresolvedReference"
  | "CyclicLayout"
  | "MappingError"
  | "LayoutMismatch"
  | "Renamed";

type RegistryEntry = {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
};

const DIAGNOSTIC_REGISTRY = {
  WZ0001: { kind: "InternalError", severity: "error" },
  WZ0101: { kind: "ParseError", severity: "error" },
  WZ0102: { kind: "ParseError", severity: "error" },
  WZ0103: { kind: "ParseError", severity: "error" },
  WZ1001: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1002: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1003: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1004: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1005: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1006: { kind: "UnsupportedConstruct", severity: "warning" },
  WZ1007: { kind: "UnsupportedConstruct", severity: "error" },
  WZ1008: { kind: "UnsupportedConstruct", severity: "error" },
  WZ2001: { kind: "NameCollision", severity: "error" },
  WZ2002: { kind: "UnresolvedReference", severity: "error" },
  WZ2003: { kind: "CyclicLayout", severity: "error" },
  WZ2004: { kind: "UnresolvedReference", severity: "error" },
  WZ2005: { kind: "NameCollision", severity: "warning" },
  WZ2006: { kind: "UnresolvedReference", severity: "error" },
  WZ3001: { kind: "MappingError", severity: "error" },
  WZ3002: { kind: "MappingError", severity: "error" },
  WZ3003: { kind: "MappingError", severity: "error" },
  WZ3004: { kind: "MappingError", severity: "error" },
  WZ3005: { kind: "MappingError", severity: "error" },
  WZ3006: { kind: "MappingError", severity: "error" },
  WZ4001: { kind: "LayoutMismatch", severity: "error" },
  WZ4002: { kind: "LayoutMismatch", severity: "warning" },
  WZ4003: { kind: "LayoutMismatch", severity: "warning" },
  WZ4004: { kind: "LayoutMismatch", severity: "error" },
  WZ4005: { kind: "LayoutMismatch", severity: "error" },
  WZ4006: { kind: "LayoutMismatch", severity: "error" },
  WZ4007: { kind: "LayoutMismatch", severity: "warning" },
  WZ5001: { kind: "Renamed", severity: "note" },
} as const satisfies Record<string, RegistryEntry>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_REGISTRY;

export const DIAGNOSTIC_CODES: readonly DiagnosticCode[] = Object.freeze(
  Object.keys(DIAGNOSTIC_REGISTRY).filter(isDiagnosticCode)
);

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.hasOwn(DIAGNOSTIC_REGISTRY, code);
}

export function assertDiagnosticCode(code: string): asserts code is DiagnosticCode {
  if (!isDiagnosticCode(code)) {
    throw new Error(`Unknown diagnostic code '${code}'.`);
  }
}

export function diagnosticDomain(
  code: DiagnosticCode
): "frontend" | "expand" | "resolve" | "mapping" | "layout" | "emit" | "internal" {
  if (code === "WZ0001") return "internal";
  switch (code[2]) {
    case "0":
      return "frontend";
    case "1":
      return "expand";
    case "2":
      return "resolve";
    case "3":
      return "mapping";
    case "4":
      return "layout";
    default:
      return "emit";
  }
}

export type Diagnostic = {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly kind: DiagnosticKind;
  readonly qualifiedName?: string;
  readonly message: string;
  readonly span?: Span;
};

export type ReportOptions = {
  readonly qualifiedName?: string;
  readonly span?: Span;
  readonly severity?: DiagnosticSeverity;
};

export class DiagnosticsCollector {
  readonly #items: Diagnostic[] = [];

  report(code: DiagnosticCode, message: string, opts: ReportOptions = {}): Diagnostic {
    const entry: RegistryEntry = DIAGNOSTIC_REGISTRY[code];
    const diagnostic: Diagnostic = Object.freeze({
      severity: opts.severity ?? entry.severity,
      code,
      kind: entry.kind,
      ...(opts.qualifiedName !== undefined ? { qualifiedName: opts.qualifiedName } : {}),
      message,
      ...(opts.span ? { span: opts.span } : {}),
    });
    this.#items.push(diagnostic);
    return diagnostic;
  }

  append(items: readonly Diagnostic[]): void {
    this.#items.push(...items);
  }

  get items(): readonly Diagnostic[] {
    return Object.freeze([...this.#items]);
  }

  get errorCount(): number {
    return this.#items.filter((d) => d.severity === "error").length;
  }
}

export class TranslateError extends Error {
  readonly code: DiagnosticCode;
  readonly span?: Span;

  constructor(code: string, message: string, span?: Span) {
    assertDiagnosticCode(code);
    super(message);
    this.code = code;
    this.span = span;
    this.name = "TranslateError";
  }
}

export function fail(code: string, message: string, span: Span | undefined): never {
  throw new TranslateError(code, message, span);
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.span ? `${spanText(d.span)}: ` : "";
  const subject = d.qualifiedName ? ` [${d.qualifiedName}]` : "";
  return `${where}${d.severity} ${d.code}: ${d.message}${subject}`;
}

