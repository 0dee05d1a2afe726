import { fail } from "../ffi/diagnostics.js";
import type {
  ConstExpr,
  Declaration,
  EnumDecl,
  FfiField,
  FfiType,
  LayoutMode,
  StructDecl,
  UnionDecl,
} from "../ffi/ir.js";
import { qualify } from "../ffi/ir.js";
import { formatGuid, guidPartsOf } from "../ffi/expand/guid.js";
import type { LayoutEnv } from "../ffi/layout.js";
import { sourceSizeAlign } from "../ffi/layout.js";
import type { TargetProfile } from "../ffi/profile.js";
import type { MapContext, TypePosition } from "../ffi/type-mapping.js";
import { callingConventionFor, mapType } from "../ffi/type-mapping.js";
import type { Span } from "../ffi/syntax.js";
import type { ZigConst, ZigDecl, ZigField, ZigType, ZigValue } from "./ir.js";
import { fieldNames } from "./naming.js";

export type LowerContext = MapContext & {
  readonly profile: TargetProfile;
  readonly layout: LayoutEnv;
};

// One source declaration can produce several top-level Zig declarations
// (a C-like enum becomes an alias plus one constant per variant).
export type LoweredDecl = {
  readonly qualifiedName: string;
  readonly decl: ZigDecl;
};

function typeOf(ctx: LowerContext, type: FfiType, position: TypePosition, span: Span): ZigType {
  const mapped = mapType(type, ctx.profile, ctx, position);
  if (!mapped.ok) return fail(mapped.error.code, mapped.error.message, span);
  return mapped.type;
}

function lowerFields(ctx: LowerContext, fields: readonly FfiField[], layout: LayoutMode): ZigField[] {
  return fields.map((f, i) => {
    const type = typeOf(ctx, f.type, "value", f.span);
    const natural = sourceSizeAlign(f.type, ctx.layout)?.align;
    if (layout.kind === "packed" && natural !== undefined && natural > layout.pack) {
      return { name: f.name, type, align: layout.pack };
    }
    // The record alignment is the largest field alignment, so raising the
    // first field is enough.
    if (i === 0 && layout.kind === "c_compatible" && layout.align !== undefined && (natural ?? 1) < layout.align) {
      return { name: f.name, type, align: layout.align };
    }
    return { name: f.name, type };
  });
}

function underlying(ctx: LowerContext, type: FfiType, depth = 0): FfiType {
  if (type.kind !== "named" || depth > 32) return type;
  const decl = ctx.lookup(type.qualifiedName);
  return decl?.kind === "type_alias" ? underlying(ctx, decl.target, depth + 1) : type;
}

export function lowerValue(ctx: LowerContext, value: ConstExpr, type: FfiType, span: Span): ZigValue {
  const base = underlying(ctx, type);
  switch (value.kind) {
    case "int": {
      const decl = base.kind === "named" ? ctx.lookup(base.qualifiedName) : undefined;
      if (decl?.kind === "enum" && decl.style === "tagged") return { kind: "enum_from_int", value: value.value };
      return { kind: "int", value: value.value };
    }
    case "float":
      return { kind: "float", text: value.text };
    case "bool":
      return { kind: "bool", value: value.value };
    case "string":
      return { kind: "string", value: value.value };
    case "array": {
      const element = base.kind === "array" ? base.element : base;
      return { kind: "array", elements: value.elements.map((e) => lowerValue(ctx, e, element, span)) };
    }
    case "struct": {
      const decl = base.kind === "named" ? ctx.lookup(base.qualifiedName) : undefined;
      if (decl?.kind !== "struct") return fail("WZ3004", "Struct literal of a non-struct type.", span);
      const emitted = fieldNames(decl.fields.map((candidate) => candidate.name), ctx.profile);
      return {
        kind: "struct",
        fields: value.fields.map((f) => {
          const index = decl.fields.findIndex((candidate) => candidate.name === f.name);
          const field = decl.fields[index];
          if (!field) return fail("WZ2002", `'${decl.name}' has no field '${f.name}'.`, span);
          return { name: emitted[index] ?? f.name, value: lowerValue(ctx, f.value, field.type, span) };
        }),
      };
    }
    default:
      return fail("WZ1008", "Constant was not folded to a value.", span);
  }
}

function lowerRecord(ctx: LowerContext, decl: StructDecl | UnionDecl): LoweredDecl {
  const fields = lowerFields(ctx, decl.fields, decl.layout);
  const self: FfiType = { kind: "named", qualifiedName: decl.qualifiedName };
  const decls: ZigConst[] = [];
  if (decl.kind === "struct") {
    const [bits] = decl.fields;
    for (const a of decl.associated) {
      const value: ConstExpr =
        a.value.kind === "struct" || !bits
          ? a.value
          : { kind: "struct", type: self, fields: [{ name: bits.name, value: a.value }] };
      decls.push({
        name: a.name,
        type: { kind: "ref", qualifiedName: decl.qualifiedName },
        value: lowerValue(ctx, value, self, decl.span),
      });
    }
  }
  return {
    qualifiedName: decl.qualifiedName,
    decl: { kind: "container", name: decl.name, isPub: decl.visibility === "pub", tag: decl.kind, fields, decls },
  };
}

function lowerEnum(ctx: LowerContext, decl: EnumDecl): LoweredDecl[] {
  const tagType = typeOf(ctx, decl.discriminantType, "value", decl.span);
  const values = decl.variants.map((v) => {
    if (v.value.kind !== "int") return fail("WZ1008", `Variant '${v.name}' has no integer value.`, v.span);
    return { name: v.name, value: v.value.value };
  });
  const isPub = decl.visibility === "pub";
  if (decl.style === "tagged") {
    return [{ qualifiedName: decl.qualifiedName, decl: { kind: "enum", name: decl.name, isPub, tagType, fields: values } }];
  }
  const self: ZigType = { kind: "ref", qualifiedName: decl.qualifiedName };
  return [
    { qualifiedName: decl.qualifiedName, decl: { kind: "alias", name: decl.name, isPub, type: tagType } },
    ...values.map(
      (v): LoweredDecl => ({
        qualifiedName: qualify(decl.modulePath, v.name),
        decl: { kind: "const", name: v.name, isPub, type: self, value: { kind: "int", value: v.value } },
      })
    ),
  ];
}

// Throws TranslateError when a type has no target equivalent; the caller
// drops the whole declaration.
export function lowerDeclaration(ctx: LowerContext, decl: Declaration): LoweredDecl[] {
  const isPub = decl.visibility === "pub";
  switch (decl.kind) {
    case "struct":
    case "union":
      return [lowerRecord(ctx, decl)];
    case "enum":
      return lowerEnum(ctx, decl);
    case "function": {
      const cc = callingConventionFor(decl.callingConvention, ctx.profile);
      if (!cc.ok) return fail(cc.error.code, cc.error.message, decl.span);
      if (decl.variadic && cc.spelling !== "C") {
        return fail("WZ3002", `Variadic function '${decl.name}' needs the C convention.`, decl.span);
      }
      return [
        {
          qualifiedName: decl.qualifiedName,
          decl: {
            kind: "extern_fn",
            name: decl.name,
            isPub,
            ...(decl.library !== undefined ? { library: decl.library } : {}),
            params: decl.params.map((p) => ({ name: p.name, type: typeOf(ctx, p.type, "param", decl.span) })),
            ret: typeOf(ctx, decl.returnType, "return", decl.span),
            callconv: cc.spelling,
            variadic: decl.variadic,
            linkageName: decl.linkageName,
          },
        },
      ];
    }
    case "type_alias":
      return [
        {
          qualifiedName: decl.qualifiedName,
          decl: { kind: "alias", name: decl.name, isPub, type: typeOf(ctx, decl.target, "alias", decl.span) },
        },
      ];
    case "constant": {
      const guid = guidPartsOf(decl.value);
      return [
        {
          qualifiedName: decl.qualifiedName,
          decl: {
            kind: "const",
            name: decl.name,
            isPub,
            ...(guid ? { doc: [formatGuid(guid)] } : {}),
            type: typeOf(ctx, decl.type, "value", decl.span),
            value: lowerValue(ctx, decl.value, decl.type, decl.span),
          },
        },
      ];
    }
    case "opaque":
      return [{ qualifiedName: decl.qualifiedName, decl: { kind: "opaque", name: decl.name, isPub } }];
    case "module":
      // Module imports are produced per unit from the module set.
      return [];
  }
}
