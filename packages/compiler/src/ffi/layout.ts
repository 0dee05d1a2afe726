import type { ZigDecl, ZigType } from "../zig/ir.js";
import type { DiagnosticsCollector } from "./diagnostics.js";
import type { ConstExpr, Declaration, FfiType, StorageHint, StructDecl, UnionDecl } from "./ir.js";
import { typeText } from "./ir.js";
import { guidBytes, guidPartsOf } from "./expand/guid.js";

export type SizeAlign = { readonly size: number; readonly align: number };

export type RecordLayout = SizeAlign & { readonly offsets: readonly number[] };

export type RecordMember = SizeAlign & { readonly alignOverride?: number };

export type LayoutEnv = {
  readonly pointerBits: 32 | 64;
  readonly lookup: (qualifiedName: string) => Declaration | undefined;
};

export type ZigLayoutEnv = {
  readonly pointerBits: 32 | 64;
  readonly lookup: (qualifiedName: string) => ZigDecl | undefined;
};

const alignUp = (n: number, a: number): number => Math.ceil(n / a) * a;

function intSizeAlign(bits: number): SizeAlign {
  const size = bits / 8;
  return { size, align: size };
}

// C record layout: each member at the next multiple of its alignment,
// capped by `pack`; total size rounded to the record alignment.
export function layoutRecord(
  members: readonly RecordMember[],
  opts: { readonly pack?: number; readonly minAlign?: number },
  isUnion: boolean
): RecordLayout {
  let offset = 0;
  let size = 0;
  let align = 1;
  const offsets: number[] = [];
  for (const m of members) {
    let a = m.alignOverride ?? m.align;
    if (opts.pack !== undefined) a = Math.min(a, opts.pack);
    align = Math.max(align, a);
    if (isUnion) {
      offsets.push(0);
      size = Math.max(size, m.size);
    } else {
      offset = alignUp(offset, a);
      offsets.push(offset);
      offset += m.size;
      size = offset;
    }
  }
  if (opts.minAlign !== undefined) align = Math.max(align, opts.minAlign);
  return { size: alignUp(size, align), align, offsets };
}

// Source side

export function sourceSizeAlign(type: FfiType, env: LayoutEnv, guard: Set<string> = new Set()): SizeAlign | undefined {
  switch (type.kind) {
    case "int":
      return intSizeAlign(type.width === "ptr" ? env.pointerBits : type.width);
    case "float":
      return intSizeAlign(type.bits);
    case "bool":
      return { size: 1, align: 1 };
    case "pointer":
    case "fn_pointer":
      return intSizeAlign(env.pointerBits);
    case "array": {
      const elem = sourceSizeAlign(type.element, env, guard);
      if (!elem || type.length.kind !== "int") return undefined;
      return { size: elem.size * Number(type.length.value), align: elem.align };
    }
    case "named": {
      if (guard.has(type.qualifiedName)) return undefined;
      const decl = env.lookup(type.qualifiedName);
      if (!decl) return undefined;
      guard.add(type.qualifiedName);
      try {
        return declSizeAlign(decl, env, guard);
      } finally {
        guard.delete(type.qualifiedName);
      }
    }
    default:
      return undefined;
  }
}

function declSizeAlign(decl: Declaration, env: LayoutEnv, guard: Set<string>): SizeAlign | undefined {
  switch (decl.kind) {
    case "struct":
    case "union":
      return sourceRecordLayout(decl, env, guard);
    case "enum":
      return sourceSizeAlign(decl.discriminantType, env, guard);
    case "type_alias":
      return sourceSizeAlign(decl.target, env, guard);
    default:
      return undefined;
  }
}

export function sourceRecordLayout(
  decl: StructDecl | UnionDecl,
  env: LayoutEnv,
  guard: Set<string> = new Set()
): RecordLayout | undefined {
  const members: RecordMember[] = [];
  for (const f of decl.fields) {
    const m = sourceSizeAlign(f.type, env, guard);
    if (!m) return undefined;
    members.push(m);
  }
  const layout = decl.layout;
  return layoutRecord(
    members,
    {
      ...(layout.kind === "packed" ? { pack: layout.pack } : {}),
      ...(layout.kind === "c_compatible" && layout.align !== undefined ? { minAlign: layout.align } : {}),
    },
    decl.kind === "union"
  );
}

// Target side

export function zigSizeAlign(type: ZigType, env: ZigLayoutEnv, guard: Set<string> = new Set()): SizeAlign | undefined {
  switch (type.kind) {
    case "int":
      return intSizeAlign(type.bits);
    case "prim":
      switch (type.name) {
        case "usize":
        case "isize":
          return intSizeAlign(env.pointerBits);
        case "f32":
          return intSizeAlign(32);
        case "f64":
          return intSizeAlign(64);
        case "bool":
          return { size: 1, align: 1 };
        default:
          return undefined;
      }
    case "pointer":
      return intSizeAlign(env.pointerBits);
    case "fn":
      return intSizeAlign(env.pointerBits);
    case "array": {
      const child = zigSizeAlign(type.child, env, guard);
      return child ? { size: child.size * Number(type.len), align: child.align } : undefined;
    }
    case "ref": {
      if (guard.has(type.qualifiedName)) return undefined;
      const decl = env.lookup(type.qualifiedName);
      if (!decl) return undefined;
      guard.add(type.qualifiedName);
      try {
        switch (decl.kind) {
          case "container":
            return zigContainerLayout(decl, env, guard);
          case "enum":
            return zigSizeAlign(decl.tagType, env, guard);
          case "alias":
            return zigSizeAlign(decl.type, env, guard);
          default:
            return undefined;
        }
      } finally {
        guard.delete(type.qualifiedName);
      }
    }
  }
}

export function zigContainerLayout(
  decl: Extract<ZigDecl, { kind: "container" }>,
  env: ZigLayoutEnv,
  guard: Set<string> = new Set()
): RecordLayout | undefined {
  const members: RecordMember[] = [];
  for (const f of decl.fields) {
    const m = zigSizeAlign(f.type, env, guard);
    if (!m) return undefined;
    members.push(f.align !== undefined ? { ...m, alignOverride: f.align } : m);
  }
  return layoutRecord(members, {}, decl.tag === "union");
}

// Checks

function describe(layout: RecordLayout): string {
  return `size ${layout.size}, align ${layout.align}, offsets [${layout.offsets.join(", ")}]`;
}

function sameLayout(a: RecordLayout, b: RecordLayout): boolean {
  return (
    a.size === b.size &&
    a.align === b.align &&
    a.offsets.length === b.offsets.length &&
    a.offsets.every((o, i) => o === b.offsets[i])
  );
}

function storageFor(storage: StorageHint, bits: 32 | 64): StorageHint["bits32"] {
  return bits === 64 ? storage.bits64 : storage.bits32;
}

function isUnsigned(type: FfiType, bits: number): boolean {
  return type.kind === "int" && type.width === bits && !type.signed;
}

function checkGuid(decl: StructDecl, env: LayoutEnv, diagnostics: DiagnosticsCollector): void {
  const [d1, d2, d3, d4] = decl.fields;
  const shapeOk =
    decl.fields.length === 4 &&
    d1 !== undefined &&
    d2 !== undefined &&
    d3 !== undefined &&
    d4 !== undefined &&
    isUnsigned(d1.type, 32) &&
    isUnsigned(d2.type, 16) &&
    isUnsigned(d3.type, 16) &&
    d4.type.kind === "array" &&
    d4.type.length.kind === "int" &&
    d4.type.length.value === 8n &&
    isUnsigned(d4.type.element, 8);
  const layout = sourceRecordLayout(decl, env);
  const layoutOk =
    layout !== undefined &&
    layout.size === 16 &&
    layout.align === 4 &&
    layout.offsets.join(",") === "0,4,6,8";
  if (shapeOk && layoutOk) return;
  const fields = decl.fields.map((f) => typeText(f.type)).join(", ");
  diagnostics.report(
    "WZ4006",
    `GUID must be {u32, u16, u16, [u8; 8]} with size 16 and align 4; found {${fields}}${layout ? ` with ${describe(layout)}` : ""}.`,
    { qualifiedName: decl.qualifiedName, span: decl.span }
  );
}

export function checkLayout(
  decl: Declaration,
  zig: ZigDecl | undefined,
  env: LayoutEnv,
  zigEnv: ZigLayoutEnv,
  diagnostics: DiagnosticsCollector
): void {
  const where = { qualifiedName: decl.qualifiedName, span: decl.span };

  if (decl.kind === "enum") {
    if (!decl.explicitWidth) {
      diagnostics.report(
        "WZ4007",
        `Enum '${decl.name}' has no integer repr; its discriminant is emitted as i32.`,
        where
      );
    }
    return;
  }
  if (decl.kind === "constant") {
    const parts = guidPartsOf(decl.value);
    if (!parts) return;
    const image = encodeConstant(decl.value, decl.type, env);
    const expected = guidBytes(parts);
    if (!image || image.length !== expected.length || image.some((b, i) => b !== expected[i])) {
      diagnostics.report("WZ4006", `GUID constant '${decl.name}' does not encode to its 16-byte image.`, where);
    }
    return;
  }
  if (decl.kind !== "struct" && decl.kind !== "union") return;

  if (decl.reprConflict !== undefined) {
    diagnostics.report("WZ4004", `Contradictory layout attributes on '${decl.name}': ${decl.reprConflict}.`, where);
  }
  if (decl.layout.kind === "transparent") {
    diagnostics.report(
      "WZ4002",
      `'${decl.name}' is repr(transparent); it is emitted as an extern ${decl.kind} with the same single field.`,
      where
    );
  } else if (decl.layout.kind === "unspecified") {
    diagnostics.report(
      "WZ4003",
      `'${decl.name}' has no repr(C); it is emitted with C layout, which the source does not promise.`,
      where
    );
  }

  const source = sourceRecordLayout(decl, env);
  const target = zig?.kind === "container" ? zigContainerLayout(zig, zigEnv) : undefined;
  if (source && target && !sameLayout(source, target)) {
    const exact = decl.layout.kind === "c_compatible" || decl.layout.kind === "packed";
    diagnostics.report(
      "WZ4001",
      `Emitted layout of '${decl.name}' (${describe(target)}) differs from the source (${describe(source)}).`,
      { ...where, severity: exact ? "error" : "warning" }
    );
  }

  if (decl.kind === "union" && decl.storage && source) {
    const storage = storageFor(decl.storage, env.pointerBits);
    const elem = sourceSizeAlign(storage.element, env);
    if (elem) {
      const size = elem.size * Number(storage.count);
      if (size !== source.size || elem.align !== source.align) {
        diagnostics.report(
          "WZ4005",
          `Declared storage of '${decl.name}' is size ${size}, align ${elem.align}; the fields need size ${source.size}, align ${source.align}.`,
          where
        );
      }
    }
  }

  if (decl.kind === "struct" && decl.name === "GUID") checkGuid(decl, env, diagnostics);
}

// Memory image of a folded constant, little-endian.

function underlying(type: FfiType, env: LayoutEnv, depth = 0): FfiType {
  if (type.kind !== "named" || depth > 32) return type;
  const decl = env.lookup(type.qualifiedName);
  if (decl?.kind === "type_alias") return underlying(decl.target, env, depth + 1);
  if (decl?.kind === "enum") return underlying(decl.discriminantType, env, depth + 1);
  return type;
}

function writeValue(out: Uint8Array, at: number, value: ConstExpr, type: FfiType, env: LayoutEnv): boolean {
  const base = underlying(type, env);
  const shape = sourceSizeAlign(base, env);
  if (!shape) return false;
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);

  if (base.kind === "float" && (value.kind === "float" || value.kind === "int")) {
    const n = value.kind === "int" ? Number(value.value) : Number(value.text);
    if (base.bits === 32) view.setFloat32(at, n, true);
    else view.setFloat64(at, n, true);
    return true;
  }
  if ((base.kind === "int" || base.kind === "bool") && (value.kind === "int" || value.kind === "bool")) {
    let bits = value.kind === "bool" ? (value.value ? 1n : 0n) : value.value;
    bits &= (1n << BigInt(shape.size * 8)) - 1n;
    for (let i = 0; i < shape.size; i++) {
      view.setUint8(at + i, Number(bits & 0xffn));
      bits >>= 8n;
    }
    return true;
  }
  if (base.kind === "array" && value.kind === "array") {
    const elem = sourceSizeAlign(base.element, env);
    if (!elem) return false;
    return value.elements.every((e, i) => writeValue(out, at + i * elem.size, e, base.element, env));
  }
  if (base.kind === "named" && value.kind === "struct") {
    const decl = env.lookup(base.qualifiedName);
    if (decl?.kind !== "struct") return false;
    const layout = sourceRecordLayout(decl, env);
    if (!layout) return false;
    return value.fields.every((f) => {
      const index = decl.fields.findIndex((candidate) => candidate.name === f.name);
      const field = decl.fields[index];
      const offset = layout.offsets[index];
      return field !== undefined && offset !== undefined && writeValue(out, at + offset, f.value, field.type, env);
    });
  }
  return false;
}

export function encodeConstant(value: ConstExpr, type: FfiType, env: LayoutEnv): Uint8Array | undefined {
  const shape = sourceSizeAlign(type, env);
  if (!shape) return undefined;
  const out = new Uint8Array(shape.size);
  return writeValue(out, 0, value, type, env) ? out : undefined;
}
