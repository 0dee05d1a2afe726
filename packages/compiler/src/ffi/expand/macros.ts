import { fail } from "../diagnostics.js";
import type { AssociatedConst, ConstExpr, EnumVariant, FfiField, FfiType, StorageHint } from "../ir.js";
import { parseItem, parseVariants } from "../items.js";
import type { SourceAttr, SourceVariant, Span, TokenTree } from "../syntax.js";
import {
  TokenCursor,
  parseExpr,
  parseOuterAttrs,
  parseParamList,
  parseType,
  splitByComma,
} from "../tokens.js";
import { layoutFromRepr, parseRepr, warnUnknownAttrs } from "./attrs.js";
import { convertExpr, convertParams, convertType, rebaseSelf } from "./convert.js";
import { guidLiteral, parseDefineGuid } from "./guid.js";
import type { ExpandScope } from "./scope.js";
import { convertFields, declBase, enabledAttrs } from "./scope.js";

type MacroRule = (tokens: readonly TokenTree[], scope: ExpandScope, span: Span) => void;

const RULES: Readonly<Record<string, MacroRule>> = {
  STRUCT: expandStruct,
  UNION: expandUnion,
  ENUM: expandEnum,
  DEFINE_GUID: expandDefineGuid,
  DECLARE_HANDLE: expandDeclareHandle,
  FN: expandFn,
  bitflags: expandBitflags,
  BITFLAGS: expandBitflags,
};

export function expandMacro(
  path: readonly string[],
  tokens: readonly TokenTree[],
  scope: ExpandScope,
  span: Span
): void {
  const name = path.at(-1) ?? "";
  const rule = Object.hasOwn(RULES, name) ? RULES[name] : undefined;
  if (!rule) {
    const guessed = guessDeclaredName(tokens);
    scope.diagnostics.report("WZ1001", `Macro '${path.join("::")}!' has no expansion rule; item skipped.`, {
      span,
      ...(guessed !== undefined ? { qualifiedName: declBase(scope, guessed, "pub", span).qualifiedName } : {}),
    });
    return;
  }
  rule(tokens, scope, span);
}

function guessDeclaredName(tokens: readonly TokenTree[]): string | undefined {
  for (let i = 0; i + 1 < tokens.length; i++) {
    const t = tokens[i];
    const next = tokens[i + 1];
    if (t?.kind === "ident" && ["struct", "union", "enum", "interface"].includes(t.text) && next?.kind === "ident") {
      return next.text;
    }
  }
  const [first] = tokens;
  return first?.kind === "ident" ? first.text : undefined;
}

function expandStruct(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const c = new TokenCursor(tokens, span);
  const item = parseItem(c);
  c.expectEnd("STRUCT! body");
  if (item.kind !== "struct") return fail("WZ1002", "STRUCT! expects a struct definition.", span);
  const base = declBase(scope, item.name, "pub", item.span);
  const attrs = enabledAttrs(scope, item.attrs, base.qualifiedName);
  if (!attrs) return;
  warnUnknownAttrs(attrs, base.qualifiedName, scope.diagnostics);
  const { layout, conflict } = layoutFromRepr({ ...parseRepr(attrs), c: true });
  scope.declarations.push({
    kind: "struct",
    ...base,
    layout,
    fields: convertFields(scope, item.fields),
    associated: [],
    ...(conflict !== undefined ? { reprConflict: conflict } : {}),
  });
}

function storageOf(group: TokenTree, span: Span): { element: FfiType; count: bigint } {
  const c = new TokenCursor([group], span);
  const type = convertType(parseType(c), span);
  if (type.kind !== "array" || type.length.kind !== "int") {
    return fail("WZ1002", "UNION! storage must be an array with a literal length.", span);
  }
  return { element: type.element, count: type.length.value };
}

function expandUnion(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const c = new TokenCursor(tokens, span);
  const rawAttrs = parseOuterAttrs(c);
  c.eatIdent("pub");
  if (!c.eatIdent("union")) return fail("WZ1002", "UNION! expects a union definition.", span);
  const name = c.expectIdent("union name");
  const body = c.expectGroup("brace", `body of union '${name}'`);
  c.expectEnd("UNION! body");
  const base = declBase(scope, name, "pub", span);
  const attrs = enabledAttrs(scope, rawAttrs, base.qualifiedName);
  if (!attrs) return;
  warnUnknownAttrs(attrs, base.qualifiedName, scope.diagnostics);

  let storage: StorageHint | undefined;
  const fields: FfiField[] = [];
  for (const part of splitByComma(body.tokens)) {
    const [first, second] = part;
    if (first?.kind === "group" && first.delimiter === "bracket") {
      const bits32 = storageOf(first, span);
      const bits64 = second?.kind === "group" ? storageOf(second, span) : bits32;
      storage = { bits32, bits64 };
      continue;
    }
    const f = new TokenCursor(part, body.span);
    const fieldSpan = f.span();
    const fieldAttrs = parseOuterAttrs(f);
    const fieldName = f.expectIdent("union field name");
    // Accessor pair: `Name Name_mut: T`.
    if (f.isIdent()) f.next();
    f.expectPunct(":");
    const type = parseType(f);
    f.expectEnd("union field type");
    if (!enabledAttrs(scope, fieldAttrs)) continue;
    fields.push({ name: fieldName, type: convertType(type, fieldSpan), span: fieldSpan });
  }

  scope.declarations.push({
    kind: "union",
    ...base,
    layout: { kind: "c_compatible" },
    fields,
    ...(storage ? { storage } : {}),
  });
}

function expandEnum(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const c = new TokenCursor(tokens, span);
  const rawAttrs = parseOuterAttrs(c);
  c.eatIdent("pub");
  if (!c.eatIdent("enum")) return fail("WZ1002", "ENUM! expects an enum definition.", span);
  const name = c.expectIdent("enum name");
  const discriminantType: FfiType = c.eatPunct(":")
    ? convertType(parseType(c), span)
    : { kind: "int", width: 32, signed: false };
  const body = c.expectGroup("brace", `body of enum '${name}'`);
  c.expectEnd("ENUM! body");
  const base = declBase(scope, name, "pub", span);
  const attrs = enabledAttrs(scope, rawAttrs, base.qualifiedName);
  if (!attrs) return;
  warnUnknownAttrs(attrs, base.qualifiedName, scope.diagnostics);

  const variants = sequenceVariants(
    parseVariants(body).filter((v) => enabledAttrs(scope, v.attrs) !== undefined)
  );
  scope.declarations.push({
    kind: "enum",
    ...base,
    style: "c_like",
    discriminantType,
    explicitWidth: true,
    variants,
  });
}

export function sequenceVariants(variants: readonly SourceVariant[]): EnumVariant[] {
  const out: EnumVariant[] = [];
  let previous: ConstExpr | undefined;
  for (const v of variants) {
    let value: ConstExpr;
    if (v.discriminant) value = convertExpr(v.discriminant, v.span);
    else if (!previous) value = { kind: "int", value: 0n };
    else if (previous.kind === "int") value = { kind: "int", value: previous.value + 1n };
    else value = { kind: "binary", op: "+", left: previous, right: { kind: "int", value: 1n } };
    out.push({ name: v.name, value, span: v.span });
    previous = value;
  }
  return out;
}

function expandDefineGuid(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const { name, parts } = parseDefineGuid(tokens, span);
  scope.declarations.push({
    kind: "constant",
    ...declBase(scope, name, "pub", span),
    type: { kind: "path", segments: ["GUID"], args: [] },
    value: guidLiteral(parts),
  });
}

function expandDeclareHandle(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const parts = splitByComma(tokens);
  const [handle, target] = parts.map((part) => {
    const [only] = part;
    return part.length === 1 && only?.kind === "ident" ? only.text : undefined;
  });
  if (parts.length !== 2 || handle === undefined || target === undefined) {
    return fail("WZ1002", "DECLARE_HANDLE! expects '{Handle, Handle__}'.", span);
  }
  scope.declarations.push({ kind: "opaque", ...declBase(scope, target, "pub", span) });
  scope.declarations.push({
    kind: "type_alias",
    ...declBase(scope, handle, "pub", span),
    target: { kind: "pointer", mutable: true, pointee: { kind: "path", segments: [target], args: [] } },
  });
}

function expandFn(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const c = new TokenCursor(tokens, span);
  const convention = c.expectIdent("calling convention");
  const name = c.expectIdent("function pointer name");
  const group = c.expectGroup("paren", `parameters of '${name}'`);
  const { params, variadic } = parseParamList(TokenCursor.of(group));
  const ret = c.eatPunct("->") ? parseType(c) : ({ kind: "unit" } as const);
  c.expectEnd("FN! body");
  scope.declarations.push({
    kind: "type_alias",
    ...declBase(scope, name, "pub", span),
    target: {
      kind: "fn_pointer",
      callingConvention: convention,
      params: convertParams(params, span),
      returnType: convertType(ret, span),
      variadic,
      nullable: true,
    },
  });
}

function expandBitflags(tokens: readonly TokenTree[], scope: ExpandScope, span: Span): void {
  const c = new TokenCursor(tokens, span);
  const rawAttrs: SourceAttr[] = parseOuterAttrs(c);
  const vis = c.eatIdent("pub") ? "pub" : "private";
  c.eatGroup("paren");
  if (!c.eatIdent("struct")) return fail("WZ1002", "bitflags! expects 'struct Name: Type { ... }'.", span);
  const name = c.expectIdent("flags name");
  c.expectPunct(":");
  const bitsType = convertType(parseType(c), span);
  const body = c.expectGroup("brace", `body of flags '${name}'`);
  c.expectEnd("bitflags! body");
  const base = declBase(scope, name, vis, span);
  const attrs = enabledAttrs(scope, rawAttrs, base.qualifiedName);
  if (!attrs) return;
  warnUnknownAttrs(attrs, base.qualifiedName, scope.diagnostics);

  const associated: AssociatedConst[] = [];
  const inner = TokenCursor.of(body);
  while (!inner.atEnd()) {
    const constAttrs = parseOuterAttrs(inner);
    if (!inner.eatIdent("const")) return fail("WZ1002", `Expected 'const' in flags '${name}'.`, inner.span());
    const constName = inner.expectIdent("flag name");
    inner.expectPunct("=");
    const value = rebaseSelf(convertExpr(parseExpr(inner), span), name);
    inner.expectPunct(";");
    if (!enabledAttrs(scope, constAttrs)) continue;
    associated.push({ name: constName, value });
  }

  scope.declarations.push({
    kind: "struct",
    ...base,
    layout: { kind: "c_compatible" },
    fields: [{ name: "bits", type: bitsType, span }],
    associated,
  });
}
