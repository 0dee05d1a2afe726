import type { DiagnosticsCollector } from "../diagnostics.js";
import type { LayoutMode } from "../ir.js";
import type { SourceAttr } from "../syntax.js";
import { attrListArgs, attrStringValue, tokensText, unquoteString } from "../tokens.js";

const IGNORED_ATTRS = new Set([
  "doc",
  "derive",
  "allow",
  "warn",
  "deny",
  "cfg",
  "repr",
  "link",
  "link_name",
  "inline",
  "must_use",
  "deprecated",
  "non_exhaustive",
  "rustfmt::skip",
]);

export type Repr = {
  readonly c: boolean;
  readonly transparent: boolean;
  readonly packed?: number;
  readonly align?: number;
  readonly int?: string;
  readonly unknown: readonly string[];
};

export function parseRepr(attrs: readonly SourceAttr[]): Repr {
  let c = false;
  let transparent = false;
  let packed: number | undefined;
  let align: number | undefined;
  let int: string | undefined;
  const unknown: string[] = [];
  for (const attr of attrs) {
    if (attr.name !== "repr") continue;
    for (const part of attrListArgs(attr) ?? []) {
      const [head, arg] = part;
      if (head?.kind !== "ident") {
        unknown.push(tokensText(part));
        continue;
      }
      const n = arg?.kind === "group" ? Number(tokensText(arg.tokens)) : undefined;
      switch (head.text) {
        case "C":
          c = true;
          break;
        case "transparent":
          transparent = true;
          break;
        case "packed":
          packed = n ?? 1;
          break;
        case "align":
          if (n === undefined || !Number.isInteger(n)) unknown.push(tokensText(part));
          else align = n;
          break;
        case "u8":
        case "u16":
        case "u32":
        case "u64":
        case "i8":
        case "i16":
        case "i32":
        case "i64":
        case "usize":
        case "isize":
          int = head.text;
          break;
        default:
          unknown.push(tokensText(part));
      }
    }
  }
  return {
    c,
    transparent,
    ...(packed !== undefined ? { packed } : {}),
    ...(align !== undefined ? { align } : {}),
    ...(int !== undefined ? { int } : {}),
    unknown,
  };
}

export function layoutFromRepr(repr: Repr): { layout: LayoutMode; conflict?: string } {
  const conflicts: string[] = [];
  if (repr.packed !== undefined && repr.align !== undefined) conflicts.push("packed with align");
  if (repr.transparent && (repr.c || repr.packed !== undefined || repr.align !== undefined)) {
    conflicts.push("transparent with other layout hints");
  }
  if (repr.int !== undefined) conflicts.push(`integer repr '${repr.int}' on a record`);
  if (repr.unknown.length > 0) conflicts.push(`unrecognized repr ${repr.unknown.join(", ")}`);
  const conflict = conflicts.length > 0 ? conflicts.join("; ") : undefined;
  const withConflict = (layout: LayoutMode) => (conflict ? { layout, conflict } : { layout });

  if (repr.transparent) return withConflict({ kind: "transparent" });
  if (repr.packed !== undefined) return withConflict({ kind: "packed", pack: repr.packed });
  if (repr.c) {
    return withConflict(
      repr.align !== undefined ? { kind: "c_compatible", align: repr.align } : { kind: "c_compatible" }
    );
  }
  return withConflict({ kind: "unspecified" });
}

export function linkName(attrs: readonly SourceAttr[]): string | undefined {
  for (const attr of attrs) {
    if (attr.name === "link_name") return attrStringValue(attr);
  }
  return undefined;
}

export function linkLibrary(attrs: readonly SourceAttr[]): string | undefined {
  for (const attr of attrs) {
    if (attr.name !== "link") continue;
    for (const part of attrListArgs(attr) ?? []) {
      const [key, eq, value] = part;
      if (key?.kind === "ident" && key.text === "name" && eq?.kind === "punct" && value?.kind === "literal") {
        return unquoteString(value.text);
      }
    }
  }
  return undefined;
}

export function warnUnknownAttrs(
  attrs: readonly SourceAttr[],
  qualifiedName: string | undefined,
  diagnostics: DiagnosticsCollector
): void {
  for (const attr of attrs) {
    if (IGNORED_ATTRS.has(attr.name)) continue;
    diagnostics.report("WZ1006", `Attribute '#[${attr.name}]' has no translation and was ignored.`, {
      span: attr.span,
      ...(qualifiedName !== undefined ? { qualifiedName } : {}),
    });
  }
}
