import type { ZigType } from "../zig/ir.js";
import type { DiagnosticCode } from "./diagnostics.js";
import type { Declaration, FfiType } from "./ir.js";
import { typeText } from "./ir.js";
import type { TargetProfile } from "./profile.js";

// `alias` is the right-hand side of a type alias: it may name anything that
// a pointer could later point at.
export type TypePosition = "value" | "pointee" | "param" | "return" | "alias";

export type MappingFailure = {
  readonly code: DiagnosticCode;
  readonly message: string;
};

export type MapResult =
  | { readonly ok: true; readonly type: ZigType }
  | { readonly ok: false; readonly error: MappingFailure };

export type MapContext = {
  readonly lookup: (qualifiedName: string) => Declaration | undefined;
};

const ok = (type: ZigType): MapResult => ({ ok: true, type });
const err = (code: DiagnosticCode, message: string): MapResult => ({ ok: false, error: { code, message } });

export function callingConventionFor(
  convention: string,
  profile: TargetProfile
): { readonly ok: true; readonly spelling: string } | { readonly ok: false; readonly error: MappingFailure } {
  const spelling = Object.hasOwn(profile.callingConventions, convention)
    ? profile.callingConventions[convention]
    : undefined;
  if (spelling === undefined) {
    return {
      ok: false,
      error: {
        code: "WZ3002",
        message: `Calling convention "${convention}" has no ${profile.name} equivalent on a ${profile.nativePointer.bits}-bit target.`,
      },
    };
  }
  return { ok: true, spelling };
}

function isOpaqueLike(type: FfiType, ctx: MapContext, depth = 0): boolean {
  if (type.kind === "void") return true;
  if (type.kind !== "named" || depth > 32) return false;
  const decl = ctx.lookup(type.qualifiedName);
  if (decl?.kind === "opaque") return true;
  return decl?.kind === "type_alias" && isOpaqueLike(decl.target, ctx, depth + 1);
}

// Pure: the same type and profile always map to the same target type.
export function mapType(
  type: FfiType,
  profile: TargetProfile,
  ctx: MapContext,
  position: TypePosition = "value"
): MapResult {
  switch (type.kind) {
    case "int":
      if (type.width === "ptr") return ok({ kind: "prim", name: type.signed ? "isize" : "usize" });
      if (!profile.integerWidths.includes(type.width)) {
        return err("WZ3001", `${profile.name} has no ${type.width}-bit integer type.`);
      }
      return ok({ kind: "int", bits: type.width, signed: type.signed });
    case "float":
      return ok({ kind: "prim", name: type.bits === 32 ? "f32" : "f64" });
    case "bool":
      return ok({ kind: "prim", name: "bool" });
    case "void":
      if (position === "pointee" || position === "alias") return ok({ kind: "prim", name: "anyopaque" });
      return err("WZ3003", "C 'void' can only be used behind a pointer.");
    case "unit":
      if (position === "return" || position === "alias") return ok({ kind: "prim", name: "void" });
      return err("WZ3003", "The unit type '()' has no layout outside a return position.");
    case "never":
      if (position === "return") return ok({ kind: "prim", name: "noreturn" });
      return err("WZ3003", "'!' can only be a return type.");
    case "pointer": {
      const child = mapType(type.pointee, profile, ctx, "pointee");
      if (!child.ok) return child;
      // C pointers cannot point at opaque types.
      const style = profile.nativePointer.syntax === "c_pointer" && !isOpaqueLike(type.pointee, ctx) ? "c" : "optional";
      return ok({ kind: "pointer", style, isConst: !type.mutable, child: child.type });
    }
    case "array": {
      if (type.length.kind !== "int") return err("WZ3004", "Array length was not evaluated.");
      const child = mapType(type.element, profile, ctx, "value");
      if (!child.ok) return child;
      return ok({ kind: "array", len: type.length.value, child: child.type });
    }
    case "fn_pointer": {
      const cc = callingConventionFor(type.callingConvention, profile);
      if (!cc.ok) return { ok: false, error: cc.error };
      if (type.variadic && cc.spelling !== "C") {
        return err("WZ3002", `Variadic function pointers need the C convention, not "${type.callingConvention}".`);
      }
      const params: ZigType[] = [];
      for (const p of type.params) {
        const mapped = mapType(p.type, profile, ctx, "param");
        if (!mapped.ok) return mapped;
        params.push(mapped.type);
      }
      const ret = mapType(type.returnType, profile, ctx, "return");
      if (!ret.ok) return ret;
      return ok({
        kind: "fn",
        params,
        ret: ret.type,
        callconv: cc.spelling,
        variadic: type.variadic,
        optional: type.nullable,
      });
    }
    case "named": {
      const decl = ctx.lookup(type.qualifiedName);
      if (!decl) return err("WZ3004", `'${type.qualifiedName}' is not a known declaration.`);
      if (decl.kind === "opaque" && position !== "pointee" && position !== "alias") {
        return err("WZ3006", `Opaque type '${decl.name}' can only be used behind a pointer.`);
      }
      return ok({ kind: "ref", qualifiedName: type.qualifiedName });
    }
    case "path":
      return err("WZ3004", `Type '${typeText(type)}' was never resolved.`);
  }
}
