import type { Span } from "./syntax.js";

// Declaration IR. Built by the expander, rewritten once by the resolver
// (paths become `named`, constant expressions become values) and read by
// the emitter.

export type IntWidth = 8 | 16 | 32 | 64 | 128 | "ptr";

export type FfiParam = {
  readonly name: string;
  readonly type: FfiType;
};

export type FfiType =
  | { readonly kind: "int"; readonly width: IntWidth; readonly signed: boolean }
  | { readonly kind: "float"; readonly bits: 32 | 64 }
  | { readonly kind: "bool" }
  | { readonly kind: "void" }
  | { readonly kind: "unit" }
  | { readonly kind: "never" }
  | { readonly kind: "pointer"; readonly mutable: boolean; readonly pointee: FfiType }
  | { readonly kind: "array"; readonly length: ConstExpr; readonly element: FfiType }
  | {
      readonly kind: "fn_pointer";
      readonly callingConvention: string;
      readonly params: readonly FfiParam[];
      readonly returnType: FfiType;
      readonly variadic: boolean;
      readonly nullable: boolean;
    }
  | { readonly kind: "path"; readonly segments: readonly string[]; readonly args: readonly FfiType[] }
  | { readonly kind: "named"; readonly qualifiedName: string };

export type ConstExpr =
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly text: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly elements: readonly ConstExpr[] }
  | {
      readonly kind: "struct";
      readonly type: FfiType;
      readonly fields: readonly { readonly name: string; readonly value: ConstExpr }[];
    }
  | { readonly kind: "ref"; readonly segments: readonly string[] }
  | { readonly kind: "const_ref"; readonly qualifiedName: string }
  | { readonly kind: "unary"; readonly op: "-" | "!"; readonly operand: ConstExpr }
  | {
      readonly kind: "binary";
      readonly op: BinaryOp;
      readonly left: ConstExpr;
      readonly right: ConstExpr;
    }
  | { readonly kind: "cast"; readonly operand: ConstExpr; readonly type: FfiType };

export type BinaryOp = "|" | "^" | "&" | "<<" | ">>" | "+" | "-" | "*" | "/" | "%";

export const BINARY_OPS: readonly BinaryOp[] = ["|", "^", "&", "<<", ">>", "+", "-", "*", "/", "%"];

export function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.some((candidate) => candidate === op);
}

export type LayoutMode =
  | { readonly kind: "c_compatible"; readonly align?: number }
  | { readonly kind: "packed"; readonly pack: number }
  | { readonly kind: "transparent" }
  | { readonly kind: "unspecified" };

export type FfiField = {
  readonly name: string;
  readonly type: FfiType;
  readonly span: Span;
};

export type AssociatedConst = {
  readonly name: string;
  readonly value: ConstExpr;
};

export type EnumVariant = {
  readonly name: string;
  readonly value: ConstExpr;
  readonly span: Span;
};

// UNION! carries the storage it was declared with for each pointer width.
export type StorageHint = {
  readonly bits32: { readonly element: FfiType; readonly count: bigint };
  readonly bits64: { readonly element: FfiType; readonly count: bigint };
};

export type Visibility = "pub" | "private";

type DeclBase = {
  readonly name: string;
  readonly qualifiedName: string;
  readonly modulePath: readonly string[];
  readonly visibility: Visibility;
  readonly span: Span;
};

export type StructDecl = DeclBase & {
  readonly kind: "struct";
  readonly layout: LayoutMode;
  readonly fields: readonly FfiField[];
  readonly associated: readonly AssociatedConst[];
  // Conflicting repr attributes, reported by the layout pass.
  readonly reprConflict?: string;
};

export type UnionDecl = DeclBase & {
  readonly kind: "union";
  readonly layout: LayoutMode;
  readonly fields: readonly FfiField[];
  readonly storage?: StorageHint;
  readonly reprConflict?: string;
};

export type EnumDecl = DeclBase & {
  readonly kind: "enum";
  readonly style: "c_like" | "tagged";
  readonly discriminantType: FfiType;
  readonly explicitWidth: boolean;
  readonly variants: readonly EnumVariant[];
};

export type FunctionDecl = DeclBase & {
  readonly kind: "function";
  readonly callingConvention: string;
  readonly params: readonly FfiParam[];
  readonly returnType: FfiType;
  readonly linkageName: string;
  readonly library?: string;
  readonly variadic: boolean;
};

export type TypeAliasDecl = DeclBase & {
  readonly kind: "type_alias";
  readonly target: FfiType;
};

export type ConstantDecl = DeclBase & {
  readonly kind: "constant";
  readonly type: FfiType;
  readonly value: ConstExpr;
};

export type OpaqueDecl = DeclBase & { readonly kind: "opaque" };

export type ModuleDecl = DeclBase & { readonly kind: "module" };

export type Declaration =
  | StructDecl
  | UnionDecl
  | EnumDecl
  | FunctionDecl
  | TypeAliasDecl
  | ConstantDecl
  | OpaqueDecl
  | ModuleDecl;

export type Import = {
  readonly alias: string;
  // Absolute path from the crate root, or a foreign namespace path.
  readonly target: readonly string[];
  readonly glob: boolean;
  readonly visibility: Visibility;
  readonly modulePath: readonly string[];
  readonly span: Span;
};

export type ExpandedFile = {
  readonly fileName: string;
  readonly modulePath: readonly string[];
  readonly declarations: readonly Declaration[];
  readonly imports: readonly Import[];
};

export function qualify(modulePath: readonly string[], name: string): string {
  return [...modulePath, name].join("::");
}

export function moduleKey(modulePath: readonly string[]): string {
  return modulePath.join("::");
}

export function isTypeDeclaration(decl: Declaration): boolean {
  switch (decl.kind) {
    case "struct":
    case "union":
    case "enum":
    case "type_alias":
    case "opaque":
      return true;
    default:
      return false;
  }
}

// Stable text form used to decide whether two declarations sharing a
// qualified name are the same re-included item.
export function canonicalDeclaration(decl: Declaration): string {
  return JSON.stringify(decl, (_key, value: unknown) => {
    if (typeof value === "bigint") return `${value}n`;
    if (isSpan(value)) return undefined;
    return value;
  });
}

function isSpan(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "fileName" in value &&
    "line" in value &&
    "column" in value
  );
}

export function typeText(type: FfiType): string {
  switch (type.kind) {
    case "int":
      return `${type.signed ? "i" : "u"}${type.width === "ptr" ? "size" : type.width}`;
    case "float":
      return `f${type.bits}`;
    case "bool":
    case "void":
    case "unit":
    case "never":
      return type.kind;
    case "pointer":
      return `*${type.mutable ? "mut" : "const"} ${typeText(type.pointee)}`;
    case "array":
      return `[${typeText(type.element)}; ${type.length.kind === "int" ? type.length.value : "?"}]`;
    case "fn_pointer":
      return `extern "${type.callingConvention}" fn(${type.params.map((p) => typeText(p.type)).join(", ")})`;
    case "path":
      return type.segments.join("::");
    case "named":
      return type.qualifiedName;
  }
}
