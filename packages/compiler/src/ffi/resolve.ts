import type { Diagnostic } from "./diagnostics.js";
import { DiagnosticsCollector, TranslateError, fail } from "./diagnostics.js";
import { absolutePath } from "./expand/index.js";
import type {
  ConstExpr,
  Declaration,
  ExpandedFile,
  FfiType,
  Import,
  IntWidth,
  StructDecl,
} from "./ir.js";
import { isTypeDeclaration, moduleKey, qualify } from "./ir.js";
import type { SymbolTable, VariantSymbol } from "./symbols.js";
import type { Span } from "./syntax.js";

export type Target =
  | { readonly kind: "decl"; readonly decl: Declaration }
  | { readonly kind: "variant"; readonly qualifiedName: string; readonly symbol: VariantSymbol }
  | {
      readonly kind: "assoc";
      readonly qualifiedName: string;
      readonly owner: StructDecl;
      readonly value: ConstExpr;
    }
  | { readonly kind: "module"; readonly path: readonly string[] }
  | { readonly kind: "primitive"; readonly type: FfiType };

const int = (width: IntWidth, signed: boolean): FfiType => ({ kind: "int", width, signed });

export const PRIMITIVES: Readonly<Record<string, FfiType>> = {
  u8: int(8, false),
  u16: int(16, false),
  u32: int(32, false),
  u64: int(64, false),
  u128: int(128, false),
  usize: int("ptr", false),
  i8: int(8, true),
  i16: int(16, true),
  i32: int(32, true),
  i64: int(64, true),
  i128: int(128, true),
  isize: int("ptr", true),
  f32: { kind: "float", bits: 32 },
  f64: { kind: "float", bits: 64 },
  bool: { kind: "bool" },
  c_char: int(8, true),
  c_schar: int(8, true),
  c_uchar: int(8, false),
  c_short: int(16, true),
  c_ushort: int(16, false),
  c_int: int(32, true),
  c_uint: int(32, false),
  c_long: int(32, true),
  c_ulong: int(32, false),
  c_longlong: int(64, true),
  c_ulonglong: int(64, false),
  c_float: { kind: "float", bits: 32 },
  c_double: { kind: "float", bits: 64 },
  c_void: { kind: "void" },
  __int8: int(8, true),
  __uint8: int(8, false),
  __int16: int(16, true),
  __uint16: int(16, false),
  __int32: int(32, true),
  __uint32: int(32, false),
  __int64: int(64, true),
  __uint64: int(64, false),
};

const C_NAMESPACES: readonly (readonly string[])[] = [
  ["ctypes"],
  ["std", "os", "raw"],
  ["core", "ffi"],
  ["std", "ffi"],
  ["libc"],
];

// Names the declaration macros refer to through the crate root.
const CORPUS_WIDE_NAMES: readonly string[] = ["GUID"];

function primitiveOf(name: string): FfiType | undefined {
  return Object.hasOwn(PRIMITIVES, name) ? PRIMITIVES[name] : undefined;
}

function isPrimitiveNamespace(prefix: readonly string[]): boolean {
  return C_NAMESPACES.some(
    (ns) => prefix.length >= ns.length && ns.every((seg, i) => prefix[prefix.length - ns.length + i] === seg)
  );
}

export type ResolveContext = {
  readonly table: SymbolTable;
  readonly pointerBits: 32 | 64;
  readonly constCache: Map<string, ConstExpr>;
  readonly evaluating: Set<string>;
  corpusWide?: ReadonlyMap<string, Declaration | null>;
};

export function createResolveContext(table: SymbolTable, pointerBits: 32 | 64): ResolveContext {
  return { table, pointerBits, constCache: new Map(), evaluating: new Set() };
}

// Path lookup

function direct(ctx: ResolveContext, abs: readonly string[]): Target | undefined {
  const key = moduleKey(abs);
  const decl = ctx.table.declarations.get(key);
  if (decl && decl.kind !== "module") return { kind: "decl", decl };
  const symbol = ctx.table.variants.get(key);
  if (symbol) return { kind: "variant", qualifiedName: key, symbol };
  if (ctx.table.modules.has(key)) return { kind: "module", path: abs };
  return undefined;
}

function importsOf(ctx: ResolveContext, modulePath: readonly string[]): readonly Import[] {
  return ctx.table.imports.get(moduleKey(modulePath)) ?? [];
}

function followImport(ctx: ResolveContext, imp: Import, guard: Set<string>): Target | undefined {
  const key = `${moduleKey(imp.modulePath)}|${imp.alias}|${moduleKey(imp.target)}`;
  if (guard.has(key)) {
    return fail("WZ2006", `Import '${imp.target.join("::")}' is part of an import cycle.`, imp.span);
  }
  guard.add(key);
  try {
    return (
      lookupAbsolute(ctx, imp.target, guard) ??
      (imp.modulePath.length > 0 ? lookupAbsolute(ctx, [...imp.modulePath, ...imp.target], guard) : undefined)
    );
  } finally {
    guard.delete(key);
  }
}

// Glob imports may form cycles; a glob already on the lookup path is skipped.
function viaGlob(ctx: ResolveContext, imp: Import, name: string, guard: Set<string>): Target | undefined {
  const key = `*${moduleKey(imp.modulePath)}|${moduleKey(imp.target)}|${name}`;
  if (guard.has(key)) return undefined;
  guard.add(key);
  try {
    return lookupAbsolute(ctx, [...imp.target, name], guard);
  } finally {
    guard.delete(key);
  }
}

function memberOf(ctx: ResolveContext, owner: readonly string[], name: string): Target | undefined {
  const decl = ctx.table.declarations.get(moduleKey(owner));
  if (decl?.kind === "enum") {
    const variant = decl.variants.find((v) => v.name === name);
    if (variant) {
      return {
        kind: "variant",
        qualifiedName: `${decl.qualifiedName}::${name}`,
        symbol: { owner: decl, variant },
      };
    }
  }
  if (decl?.kind === "struct") {
    const assoc = decl.associated.find((a) => a.name === name);
    if (assoc) {
      return { kind: "assoc", qualifiedName: `${decl.qualifiedName}::${name}`, owner: decl, value: assoc.value };
    }
  }
  return undefined;
}

export function lookupAbsolute(
  ctx: ResolveContext,
  abs: readonly string[],
  guard: Set<string> = new Set()
): Target | undefined {
  const found = direct(ctx, abs);
  if (found) return found;
  const name = abs.at(-1);
  if (name === undefined) return undefined;
  const owner = abs.slice(0, -1);

  if (ctx.table.modules.has(moduleKey(owner))) {
    for (const imp of importsOf(ctx, owner)) {
      if (imp.visibility !== "pub") continue;
      if (!imp.glob && imp.alias === name) {
        const target = followImport(ctx, imp, guard);
        if (target) return target;
      }
    }
    for (const imp of importsOf(ctx, owner)) {
      if (imp.visibility !== "pub" || !imp.glob) continue;
      const target = viaGlob(ctx, imp, name, guard);
      if (target) return target;
    }
  }

  const member = memberOf(ctx, owner, name);
  if (member) return member;

  if (isPrimitiveNamespace(owner)) {
    const prim = primitiveOf(name);
    if (prim) return { kind: "primitive", type: prim };
  }
  return undefined;
}

function corpusWide(ctx: ResolveContext, name: string): Declaration | undefined {
  if (!ctx.corpusWide) {
    const index = new Map<string, Declaration | null>();
    for (const decl of ctx.table.declarations.values()) {
      if (!CORPUS_WIDE_NAMES.includes(decl.name) || !isTypeDeclaration(decl)) continue;
      index.set(decl.name, index.has(decl.name) ? null : decl);
    }
    ctx.corpusWide = index;
  }
  return ctx.corpusWide.get(name) ?? undefined;
}

function lookupName(
  ctx: ResolveContext,
  name: string,
  modulePath: readonly string[],
  guard: Set<string>
): Target | undefined {
  const local = direct(ctx, [...modulePath, name]);
  if (local) return local;

  const imports = importsOf(ctx, modulePath);
  for (const imp of imports) {
    if (imp.glob || imp.alias !== name) continue;
    const target = followImport(ctx, imp, guard);
    if (target) return target;
  }
  for (const imp of imports) {
    if (!imp.glob) continue;
    const target = viaGlob(ctx, imp, name, guard);
    if (target) return target;
  }

  const prim = primitiveOf(name);
  if (prim) return { kind: "primitive", type: prim };

  // Top-level modules are reachable by bare name.
  if (ctx.table.modules.has(name)) return { kind: "module", path: [name] };

  const wide = corpusWide(ctx, name);
  return wide ? { kind: "decl", decl: wide } : undefined;
}

export function lookupPath(
  ctx: ResolveContext,
  segments: readonly string[],
  modulePath: readonly string[],
  span: Span
): Target | undefined {
  const guard = new Set<string>();
  const [head, ...rest] = segments;
  if (head === undefined) return undefined;
  if (head === "crate" || head === "self" || head === "super") {
    return lookupAbsolute(ctx, absolutePath(segments, modulePath, span), guard);
  }
  if (rest.length === 0) return lookupName(ctx, head, modulePath, guard);

  if (isPrimitiveNamespace(segments.slice(0, -1))) {
    const prim = primitiveOf(segments.at(-1) ?? "");
    if (prim) return { kind: "primitive", type: prim };
  }

  const first = lookupName(ctx, head, modulePath, guard);
  if (first?.kind === "module") {
    const viaModule = lookupAbsolute(ctx, [...first.path, ...rest], guard);
    if (viaModule) return viaModule;
  }
  if (first?.kind === "decl" && rest.length === 1 && rest[0] !== undefined) {
    const member = memberOf(ctx, first.decl.qualifiedName.split("::"), rest[0]);
    if (member) return member;
  }
  return lookupAbsolute(ctx, segments, guard) ?? lookupAbsolute(ctx, [...modulePath, ...segments], guard);
}

// Types

export function resolveType(
  ctx: ResolveContext,
  type: FfiType,
  modulePath: readonly string[],
  span: Span
): FfiType {
  switch (type.kind) {
    case "int":
    case "float":
    case "bool":
    case "void":
    case "unit":
    case "never":
    case "named":
      return type;
    case "pointer":
      return { ...type, pointee: resolveType(ctx, type.pointee, modulePath, span) };
    case "array":
      return {
        kind: "array",
        length: { kind: "int", value: evalLength(ctx, type.length, modulePath, span) },
        element: resolveType(ctx, type.element, modulePath, span),
      };
    case "fn_pointer":
      return {
        ...type,
        params: type.params.map((p) => ({ name: p.name, type: resolveType(ctx, p.type, modulePath, span) })),
        returnType: resolveType(ctx, type.returnType, modulePath, span),
      };
    case "path": {
      const text = type.segments.join("::");
      const target = lookupPath(ctx, type.segments, modulePath, span);
      if (!target) return fail("WZ2002", `Cannot resolve type '${text}'.`, span);
      if (type.args.length > 0) {
        return fail("WZ1007", `Generic arguments on '${text}' have no FFI equivalent.`, span);
      }
      if (target.kind === "primitive") return target.type;
      if (target.kind === "decl" && isTypeDeclaration(target.decl)) {
        return { kind: "named", qualifiedName: target.decl.qualifiedName };
      }
      return fail("WZ2002", `'${text}' does not name a type.`, span);
    }
  }
}

function evalLength(ctx: ResolveContext, expr: ConstExpr, modulePath: readonly string[], span: Span): bigint {
  let value: ConstExpr;
  try {
    value = evalExpr(ctx, expr, modulePath, span);
  } catch (error) {
    if (!(error instanceof TranslateError)) throw error;
    return fail("WZ2004", `Array length cannot be evaluated: ${error.message}`, span);
  }
  if (value.kind !== "int" || value.value < 0n) {
    return fail("WZ2004", "Array length must be a non-negative integer.", span);
  }
  return value.value;
}

// Constant evaluation

export function wrapInt(value: bigint, bits: number, signed: boolean): bigint {
  const width = BigInt(bits);
  const masked = value & ((1n << width) - 1n);
  return signed && masked >= 1n << (width - 1n) ? masked - (1n << width) : masked;
}

type IntShape = { readonly bits: number; readonly signed: boolean };

function widthBits(ctx: ResolveContext, width: IntWidth): number {
  return width === "ptr" ? ctx.pointerBits : width;
}

function intShape(ctx: ResolveContext, type: FfiType, guard: Set<string> = new Set()): IntShape | undefined {
  if (type.kind === "int") return { bits: widthBits(ctx, type.width), signed: type.signed };
  if (type.kind !== "named" || guard.has(type.qualifiedName)) return undefined;
  guard.add(type.qualifiedName);
  const decl = ctx.table.declarations.get(type.qualifiedName);
  if (decl?.kind === "type_alias") {
    return intShape(ctx, resolveType(ctx, decl.target, decl.modulePath, decl.span), guard);
  }
  if (decl?.kind === "enum") {
    return intShape(ctx, resolveType(ctx, decl.discriminantType, decl.modulePath, decl.span), guard);
  }
  return undefined;
}

function floatType(ctx: ResolveContext, type: FfiType, guard: Set<string> = new Set()): boolean {
  if (type.kind === "float") return true;
  if (type.kind !== "named" || guard.has(type.qualifiedName)) return false;
  guard.add(type.qualifiedName);
  const decl = ctx.table.declarations.get(type.qualifiedName);
  return decl?.kind === "type_alias" && floatType(ctx, resolveType(ctx, decl.target, decl.modulePath, decl.span), guard);
}

// Float to integer casts clamp to the target range; NaN becomes zero.
function saturate(value: number, shape: IntShape): bigint {
  const bits = BigInt(shape.bits);
  const min = shape.signed ? -(1n << (bits - 1n)) : 0n;
  const max = shape.signed ? (1n << (bits - 1n)) - 1n : (1n << bits) - 1n;
  if (Number.isNaN(value)) return 0n;
  if (value === Infinity) return max;
  if (value === -Infinity) return min;
  const truncated = BigInt(Math.trunc(value));
  return truncated < min ? min : truncated > max ? max : truncated;
}

function asInt(value: ConstExpr, span: Span): bigint {
  if (value.kind === "int") return value.value;
  if (value.kind === "bool") return value.value ? 1n : 0n;
  return fail("WZ1008", `Expected an integer constant, found ${value.kind}.`, span);
}

// Shifts past the widest integer have no value in any target type.
const MAX_SHIFT = 128n;

function binary(op: string, a: bigint, b: bigint, span: Span): bigint {
  if ((op === "<<" || op === ">>") && (b < 0n || b >= MAX_SHIFT)) {
    return fail("WZ1008", `Shift amount ${b} is out of range.`, span);
  }
  switch (op) {
    case "|":
      return a | b;
    case "^":
      return a ^ b;
    case "&":
      return a & b;
    case "<<":
      return a << b;
    case ">>":
      return a >> b;
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
    case "%":
      if (b === 0n) return fail("WZ1008", "Division by zero in constant expression.", span);
      return op === "/" ? a / b : a % b;
    default:
      return fail("WZ1008", `Operator '${op}' is not supported.`, span);
  }
}

function evalTarget(ctx: ResolveContext, target: Target, text: string, span: Span): ConstExpr {
  switch (target.kind) {
    case "decl": {
      const decl = target.decl;
      if (decl.kind !== "constant") return fail("WZ2002", `'${text}' is not a constant.`, span);
      return cached(ctx, decl.qualifiedName, span, () =>
        normalize(
          ctx,
          evalExpr(ctx, decl.value, decl.modulePath, decl.span),
          resolveType(ctx, decl.type, decl.modulePath, decl.span),
          decl.span
        )
      );
    }
    case "variant": {
      const { owner, variant } = target.symbol;
      return cached(ctx, target.qualifiedName, span, () =>
        normalize(
          ctx,
          evalExpr(ctx, variant.value, owner.modulePath, variant.span),
          resolveType(ctx, owner.discriminantType, owner.modulePath, owner.span),
          variant.span
        )
      );
    }
    case "assoc": {
      const { owner, value } = target;
      const [bits] = owner.fields;
      return cached(ctx, target.qualifiedName, span, () => {
        const folded = evalExpr(ctx, value, owner.modulePath, owner.span);
        return bits ? normalize(ctx, folded, resolveType(ctx, bits.type, owner.modulePath, owner.span), owner.span) : folded;
      });
    }
    default:
      return fail("WZ2002", `'${text}' is not a constant.`, span);
  }
}

function cached(ctx: ResolveContext, key: string, span: Span, compute: () => ConstExpr): ConstExpr {
  const hit = ctx.constCache.get(key);
  if (hit) return hit;
  if (ctx.evaluating.has(key)) return fail("WZ2004", `Constant '${key}' depends on itself.`, span);
  ctx.evaluating.add(key);
  try {
    const value = compute();
    ctx.constCache.set(key, value);
    return value;
  } finally {
    ctx.evaluating.delete(key);
  }
}

export function evalExpr(
  ctx: ResolveContext,
  expr: ConstExpr,
  modulePath: readonly string[],
  span: Span
): ConstExpr {
  switch (expr.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
      return expr;
    case "const_ref": {
      const target = lookupAbsolute(ctx, expr.qualifiedName.split("::"));
      if (!target) return fail("WZ2002", `Cannot resolve constant '${expr.qualifiedName}'.`, span);
      return evalTarget(ctx, target, expr.qualifiedName, span);
    }
    case "ref": {
      const text = expr.segments.join("::");
      const target = lookupPath(ctx, expr.segments, modulePath, span);
      if (!target) return fail("WZ2002", `Cannot resolve constant '${text}'.`, span);
      return evalTarget(ctx, target, text, span);
    }
    case "unary": {
      const operand = evalExpr(ctx, expr.operand, modulePath, span);
      if (expr.op === "-") {
        if (operand.kind === "float") {
          return { kind: "float", text: operand.text.startsWith("-") ? operand.text.slice(1) : `-${operand.text}` };
        }
        return { kind: "int", value: -asInt(operand, span) };
      }
      if (operand.kind === "bool") return { kind: "bool", value: !operand.value };
      return { kind: "int", value: ~asInt(operand, span) };
    }
    case "binary": {
      const left = asInt(evalExpr(ctx, expr.left, modulePath, span), span);
      const right = asInt(evalExpr(ctx, expr.right, modulePath, span), span);
      return { kind: "int", value: binary(expr.op, left, right, span) };
    }
    case "cast": {
      const operand = evalExpr(ctx, expr.operand, modulePath, span);
      const type = resolveType(ctx, expr.type, modulePath, span);
      const shape = intShape(ctx, type);
      if (shape) {
        if (operand.kind === "float") return { kind: "int", value: saturate(Number(operand.text), shape) };
        return { kind: "int", value: wrapInt(asInt(operand, span), shape.bits, shape.signed) };
      }
      if (floatType(ctx, type)) {
        return operand.kind === "float" ? operand : { kind: "float", text: `${asInt(operand, span)}.0` };
      }
      if (type.kind === "bool") return operand;
      return fail("WZ1008", "Casts are only evaluated to integer, float or bool types.", span);
    }
    case "array":
      return { kind: "array", elements: expr.elements.map((e) => evalExpr(ctx, e, modulePath, span)) };
    case "struct":
      return {
        kind: "struct",
        type: resolveType(ctx, expr.type, modulePath, span),
        fields: expr.fields.map((f) => ({ name: f.name, value: evalExpr(ctx, f.value, modulePath, span) })),
      };
  }
}

// Fits a folded value to its declared type. Integers wrap when they fit the
// width as either signedness; anything wider is out of range.
export function normalize(ctx: ResolveContext, value: ConstExpr, type: FfiType, span: Span): ConstExpr {
  const shape = intShape(ctx, type);
  if (shape && value.kind === "int") {
    const bits = BigInt(shape.bits);
    if (value.value < -(1n << (bits - 1n)) || value.value >= 1n << bits) {
      return fail("WZ3005", `Value ${value.value} does not fit in ${shape.signed ? "i" : "u"}${shape.bits}.`, span);
    }
    return { kind: "int", value: wrapInt(value.value, shape.bits, shape.signed) };
  }
  if (shape && value.kind === "bool") return { kind: "int", value: value.value ? 1n : 0n };
  if (floatType(ctx, type) && value.kind === "int") return { kind: "float", text: `${value.value}.0` };

  if (type.kind === "array" && value.kind === "array") {
    const expected = type.length.kind === "int" ? type.length.value : undefined;
    if (expected !== undefined && BigInt(value.elements.length) !== expected) {
      return fail("WZ3005", `Array literal has ${value.elements.length} elements; the type holds ${expected}.`, span);
    }
    return { kind: "array", elements: value.elements.map((e) => normalize(ctx, e, type.element, span)) };
  }

  if (type.kind === "named" && value.kind === "struct") {
    const decl = ctx.table.declarations.get(type.qualifiedName);
    if (decl?.kind !== "struct") return value;
    return {
      kind: "struct",
      type,
      fields: value.fields.map((f) => {
        const field = decl.fields.find((candidate) => candidate.name === f.name);
        if (!field) return fail("WZ2002", `'${decl.name}' has no field '${f.name}'.`, span);
        return { name: f.name, value: normalize(ctx, f.value, resolveType(ctx, field.type, decl.modulePath, decl.span), span) };
      }),
    };
  }

  if (type.kind === "named") {
    const decl = ctx.table.declarations.get(type.qualifiedName);
    if (decl?.kind === "type_alias") {
      return normalize(ctx, value, resolveType(ctx, decl.target, decl.modulePath, decl.span), span);
    }
  }
  return value;
}

// Declarations

function resolveDeclaration(ctx: ResolveContext, decl: Declaration): Declaration {
  const m = decl.modulePath;
  const rt = (type: FfiType, span: Span = decl.span) => resolveType(ctx, type, m, span);
  switch (decl.kind) {
    case "struct": {
      const fields = decl.fields.map((f) => ({ ...f, type: rt(f.type, f.span) }));
      const associated = decl.associated.map((a) => {
        const value = evalTarget(
          ctx,
          { kind: "assoc", qualifiedName: `${decl.qualifiedName}::${a.name}`, owner: decl, value: a.value },
          a.name,
          decl.span
        );
        return { name: a.name, value };
      });
      return { ...decl, fields, associated };
    }
    case "union":
      return {
        ...decl,
        fields: decl.fields.map((f) => ({ ...f, type: rt(f.type, f.span) })),
        ...(decl.storage
          ? {
              storage: {
                bits32: { ...decl.storage.bits32, element: rt(decl.storage.bits32.element) },
                bits64: { ...decl.storage.bits64, element: rt(decl.storage.bits64.element) },
              },
            }
          : {}),
      };
    case "enum": {
      const discriminantType = rt(decl.discriminantType);
      if (!intShape(ctx, discriminantType)) {
        return fail("WZ3001", `Enum '${decl.name}' needs an integer discriminant type.`, decl.span);
      }
      const variants = decl.variants.map((v) => {
        const value = normalize(ctx, evalExpr(ctx, v.value, m, v.span), discriminantType, v.span);
        if (value.kind !== "int") return fail("WZ1008", `Variant '${v.name}' needs an integer value.`, v.span);
        return { ...v, value };
      });
      return { ...decl, discriminantType, variants };
    }
    case "function":
      return {
        ...decl,
        params: decl.params.map((p) => ({ name: p.name, type: rt(p.type) })),
        returnType: rt(decl.returnType),
      };
    case "type_alias":
      return { ...decl, target: rt(decl.target) };
    case "constant": {
      const type = rt(decl.type);
      return { ...decl, type, value: normalize(ctx, evalExpr(ctx, decl.value, m, decl.span), type, decl.span) };
    }
    case "opaque":
    case "module":
      return decl;
  }
}

export type ResolvedItem =
  | { readonly status: "resolved"; readonly decl: Declaration }
  | { readonly status: "unresolved"; readonly decl: Declaration; readonly message: string }
  | { readonly status: "failed"; readonly decl: Declaration };

export type ReexportTarget =
  | { readonly kind: "decl"; readonly qualifiedName: string }
  | { readonly kind: "module"; readonly path: readonly string[] }
  | { readonly kind: "primitive"; readonly type: FfiType };

export type Reexport = {
  readonly modulePath: readonly string[];
  readonly alias: string;
  readonly glob: boolean;
  readonly target: ReexportTarget;
  readonly span: Span;
};

export type ResolvedFile = {
  readonly fileName: string;
  readonly modulePath: readonly string[];
  readonly items: readonly ResolvedItem[];
  readonly reexports: readonly Reexport[];
  readonly diagnostics: readonly Diagnostic[];
};

function reexportTarget(target: Target): ReexportTarget {
  switch (target.kind) {
    case "decl":
      return { kind: "decl", qualifiedName: target.decl.qualifiedName };
    case "variant":
    case "assoc":
      return { kind: "decl", qualifiedName: target.qualifiedName };
    case "module":
      return { kind: "module", path: target.path };
    case "primitive":
      return { kind: "primitive", type: target.type };
  }
}

export function resolveFilePass(
  file: ExpandedFile,
  table: SymbolTable,
  pointerBits: 32 | 64
): ResolvedFile {
  const ctx = createResolveContext(table, pointerBits);
  const diagnostics = new DiagnosticsCollector();

  const items: ResolvedItem[] = file.declarations.map((decl) => {
    try {
      return { status: "resolved", decl: resolveDeclaration(ctx, decl) };
    } catch (error) {
      if (!(error instanceof TranslateError)) throw error;
      const d = diagnostics.report(error.code, error.message, {
        qualifiedName: decl.qualifiedName,
        span: error.span ?? decl.span,
      });
      return d.kind === "UnresolvedReference"
        ? { status: "unresolved", decl, message: error.message }
        : { status: "failed", decl };
    }
  });

  const reexports: Reexport[] = [];
  for (const imp of file.imports) {
    if (!imp.glob && table.declarations.has(qualify(imp.modulePath, imp.alias))) {
      diagnostics.report("WZ2005", `Import '${imp.alias}' is shadowed by a local declaration.`, {
        qualifiedName: qualify(imp.modulePath, imp.alias),
        span: imp.span,
      });
      continue;
    }
    if (imp.visibility !== "pub") continue;
    try {
      if (imp.glob) {
        const target = lookupAbsolute(ctx, imp.target) ?? lookupAbsolute(ctx, [...imp.modulePath, ...imp.target]);
        if (target?.kind !== "module") {
          return fail("WZ2002", `Glob re-export '${imp.target.join("::")}::*' does not name a module.`, imp.span);
        }
        reexports.push({ modulePath: imp.modulePath, alias: "*", glob: true, target: reexportTarget(target), span: imp.span });
        continue;
      }
      const target = followImport(ctx, imp, new Set());
      if (!target) return fail("WZ2002", `Cannot resolve re-export '${imp.target.join("::")}'.`, imp.span);
      reexports.push({ modulePath: imp.modulePath, alias: imp.alias, glob: false, target: reexportTarget(target), span: imp.span });
    } catch (error) {
      if (!(error instanceof TranslateError)) throw error;
      diagnostics.report(error.code, error.message, {
        qualifiedName: qualify(imp.modulePath, imp.alias),
        span: error.span ?? imp.span,
      });
    }
  }

  return Object.freeze({
    fileName: file.fileName,
    modulePath: file.modulePath,
    items: Object.freeze(items),
    reexports: Object.freeze(reexports),
    diagnostics: diagnostics.items,
  });
}
