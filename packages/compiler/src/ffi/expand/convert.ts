import { fail } from "../diagnostics.js";
import type { ConstExpr, FfiParam, FfiType } from "../ir.js";
import { isBinaryOp } from "../ir.js";
import type { SourceExpr, SourceParam, SourceType, Span } from "../syntax.js";

const INT_SUFFIX = /(u8|u16|u32|u64|u128|usize|i8|i16|i32|i64|i128|isize)$/;

export function parseIntLiteral(text: string): bigint | undefined {
  const clean = text.replaceAll("_", "").replace(INT_SUFFIX, "");
  if (!/^(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|[0-9]+)$/.test(clean)) return undefined;
  return BigInt(clean.replace(/^0X/, "0x").replace(/^0O/, "0o").replace(/^0B/, "0b"));
}

export function convertParams(params: readonly SourceParam[], span: Span): FfiParam[] {
  return params.map((p, index) => ({
    name: p.name === "" || p.name === "_" ? `arg${index}` : p.name,
    type: convertType(p.type, span),
  }));
}

export function convertType(type: SourceType, span: Span): FfiType {
  switch (type.kind) {
    case "unit":
      return { kind: "unit" };
    case "never":
      return { kind: "never" };
    case "ptr":
      return { kind: "pointer", mutable: type.mut, pointee: convertType(type.inner, span) };
    case "array":
      return { kind: "array", length: convertExpr(type.len, span), element: convertType(type.elem, span) };
    case "fn":
      return {
        kind: "fn_pointer",
        callingConvention: type.abi ?? "Rust",
        params: convertParams(type.params, span),
        returnType: convertType(type.ret, span),
        variadic: type.variadic,
        nullable: false,
      };
    case "path": {
      const [only] = type.args;
      if (type.segments.at(-1) === "Option" && type.args.length === 1 && only?.kind === "fn") {
        const inner = convertType(only, span);
        return inner.kind === "fn_pointer" ? { ...inner, nullable: true } : inner;
      }
      return {
        kind: "path",
        segments: type.segments,
        args: type.args.map((arg) => convertType(arg, span)),
      };
    }
    case "other":
      return fail("WZ1007", `Type '${type.text}' has no FFI equivalent.`, span);
  }
}

export function convertExpr(expr: SourceExpr, span: Span): ConstExpr {
  switch (expr.kind) {
    case "int": {
      const value = parseIntLiteral(expr.text);
      if (value === undefined) return fail("WZ1008", `Malformed integer literal '${expr.text}'.`, span);
      return { kind: "int", value };
    }
    case "float":
      return { kind: "float", text: expr.text.replaceAll("_", "").replace(/(f32|f64)$/, "") };
    case "bool":
      return { kind: "bool", value: expr.value };
    case "str":
      return { kind: "string", value: expr.value };
    case "path":
      return { kind: "ref", segments: expr.segments };
    case "unary":
      return { kind: "unary", op: expr.op, operand: convertExpr(expr.expr, span) };
    case "binary":
      if (!isBinaryOp(expr.op)) return fail("WZ1008", `Operator '${expr.op}' is not supported.`, span);
      return {
        kind: "binary",
        op: expr.op,
        left: convertExpr(expr.left, span),
        right: convertExpr(expr.right, span),
      };
    case "cast":
      return { kind: "cast", operand: convertExpr(expr.expr, span), type: convertType(expr.type, span) };
    case "array":
      return { kind: "array", elements: expr.elements.map((e) => convertExpr(e, span)) };
    case "struct":
      return {
        kind: "struct",
        type: { kind: "path", segments: expr.path, args: [] },
        fields: expr.fields.map((f) => ({ name: f.name, value: convertExpr(f.value, span) })),
      };
    case "other":
      return fail("WZ1008", `Constant expression '${expr.text}' is not supported.`, span);
  }
}

// `Self::X` inside an associated constant names a sibling constant.
export function rebaseSelf(expr: ConstExpr, owner: string): ConstExpr {
  switch (expr.kind) {
    case "ref":
      return expr.segments[0] === "Self"
        ? { kind: "ref", segments: [owner, ...expr.segments.slice(1)] }
        : expr;
    case "unary":
      return { ...expr, operand: rebaseSelf(expr.operand, owner) };
    case "binary":
      return { ...expr, left: rebaseSelf(expr.left, owner), right: rebaseSelf(expr.right, owner) };
    case "cast":
      return { ...expr, operand: rebaseSelf(expr.operand, owner) };
    case "array":
      return { ...expr, elements: expr.elements.map((e) => rebaseSelf(e, owner)) };
    default:
      return expr;
  }
}
