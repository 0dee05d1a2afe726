// Zig declaration AST. Only what extern declarations need.

export type ZigType =
  | { readonly kind: "int"; readonly bits: number; readonly signed: boolean }
  | { readonly kind: "prim"; readonly name: ZigPrimitive }
  | {
      readonly kind: "pointer";
      readonly style: "optional" | "single" | "c";
      readonly isConst: boolean;
      readonly child: ZigType;
    }
  | { readonly kind: "array"; readonly len: bigint; readonly child: ZigType }
  | {
      readonly kind: "fn";
      readonly params: readonly ZigType[];
      readonly ret: ZigType;
      readonly callconv: string;
      readonly variadic: boolean;
      readonly optional: boolean;
    }
  // A declaration of the corpus, named by its source qualified name; the
  // writer turns it into a local or module-qualified identifier.
  | { readonly kind: "ref"; readonly qualifiedName: string };

export type ZigPrimitive =
  | "usize"
  | "isize"
  | "f32"
  | "f64"
  | "bool"
  | "void"
  | "anyopaque"
  | "noreturn";

export type ZigValue =
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly text: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly elements: readonly ZigValue[] }
  | {
      readonly kind: "struct";
      readonly fields: readonly { readonly name: string; readonly value: ZigValue }[];
    }
  | { readonly kind: "enum_from_int"; readonly value: bigint };

export type ZigField = {
  readonly name: string;
  readonly type: ZigType;
  readonly align?: number;
};

export type ZigParam = {
  readonly name: string;
  readonly type: ZigType;
};

export type ZigConst = {
  readonly name: string;
  readonly type: ZigType;
  readonly value: ZigValue;
};

type ZigDeclBase = {
  readonly name: string;
  readonly isPub: boolean;
  readonly doc?: readonly string[];
};

export type ZigDecl =
  | (ZigDeclBase & {
      readonly kind: "container";
      readonly tag: "struct" | "union";
      readonly fields: readonly ZigField[];
      readonly decls: readonly ZigConst[];
    })
  | (ZigDeclBase & {
      readonly kind: "enum";
      readonly tagType: ZigType;
      readonly fields: readonly { readonly name: string; readonly value: bigint }[];
    })
  | (ZigDeclBase & { readonly kind: "opaque" })
  | (ZigDeclBase & { readonly kind: "alias"; readonly type: ZigType })
  | (ZigDeclBase & {
      readonly kind: "const";
      readonly type: ZigType;
      readonly value: ZigValue;
    })
  | (ZigDeclBase & {
      readonly kind: "extern_fn";
      readonly library?: string;
      readonly params: readonly ZigParam[];
      readonly ret: ZigType;
      readonly callconv: string;
      readonly variadic: boolean;
      // Exported symbol; differs from `name` when the name was changed.
      readonly linkageName: string;
    })
  | (ZigDeclBase & { readonly kind: "import"; readonly path: string })
  | (ZigDeclBase & { readonly kind: "reexport"; readonly target: ZigType })
  | (ZigDeclBase & { readonly kind: "usingnamespace"; readonly modulePath: readonly string[] })
  | (ZigDeclBase & { readonly kind: "compile_error"; readonly message: string });

export type ZigUnit = {
  readonly modulePath: readonly string[];
  readonly fileName: string;
  readonly header: readonly string[];
  readonly decls: readonly ZigDecl[];
};
