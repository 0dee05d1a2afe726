// Syntax trees handed over by the front end. One `SourceFile` per input file.

export type Span = {
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
};

export type Delimiter = "paren" | "brace" | "bracket";

export type TokenTree =
  | { readonly kind: "ident"; readonly text: string; readonly span: Span }
  | {
      readonly kind: "punct";
      readonly ch: string;
      readonly joint: boolean;
      readonly span: Span;
    }
  | { readonly kind: "literal"; readonly text: string; readonly span: Span }
  | {
      readonly kind: "group";
      readonly delimiter: Delimiter;
      readonly tokens: readonly TokenTree[];
      readonly span: Span;
    };

export type SourceVisibility = "pub" | "private";

export type SourceAttr = {
  readonly name: string;
  readonly args: readonly TokenTree[];
  readonly span: Span;
};

export type SourceExpr =
  | { readonly kind: "int"; readonly text: string }
  | { readonly kind: "float"; readonly text: string }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "str"; readonly value: string }
  | { readonly kind: "path"; readonly segments: readonly string[] }
  | { readonly kind: "unary"; readonly op: "-" | "!"; readonly expr: SourceExpr }
  | {
      readonly kind: "binary";
      readonly op: string;
      readonly left: SourceExpr;
      readonly right: SourceExpr;
    }
  | { readonly kind: "cast"; readonly expr: SourceExpr; readonly type: SourceType }
  | { readonly kind: "array"; readonly elements: readonly SourceExpr[] }
  | {
      readonly kind: "struct";
      readonly path: readonly string[];
      readonly fields: readonly { readonly name: string; readonly value: SourceExpr }[];
    }
  | { readonly kind: "other"; readonly text: string };

export type SourceParam = {
  readonly name: string;
  readonly type: SourceType;
};

export type SourceType =
  | { readonly kind: "unit" }
  | { readonly kind: "never" }
  | {
      readonly kind: "path";
      readonly segments: readonly string[];
      readonly args: readonly SourceType[];
    }
  | { readonly kind: "ptr"; readonly mut: boolean; readonly inner: SourceType }
  | { readonly kind: "array"; readonly elem: SourceType; readonly len: SourceExpr }
  | {
      readonly kind: "fn";
      readonly abi?: string;
      readonly params: readonly SourceParam[];
      readonly ret: SourceType;
      readonly variadic: boolean;
    }
  | { readonly kind: "other"; readonly text: string };

export type SourceField = {
  readonly attrs: readonly SourceAttr[];
  readonly name: string;
  readonly type: SourceType;
  readonly span: Span;
};

export type SourceVariant = {
  readonly attrs: readonly SourceAttr[];
  readonly name: string;
  readonly discriminant?: SourceExpr;
  readonly hasPayload: boolean;
  readonly span: Span;
};

export type ForeignFn = {
  readonly kind: "fn";
  readonly vis: SourceVisibility;
  readonly name: string;
  readonly attrs: readonly SourceAttr[];
  readonly params: readonly SourceParam[];
  readonly ret: SourceType;
  readonly variadic: boolean;
  readonly span: Span;
};

export type ForeignItem =
  | ForeignFn
  | { readonly kind: "static"; readonly name: string; readonly span: Span };

export type UseTree =
  | { readonly kind: "path"; readonly ident: string; readonly tree: UseTree }
  | { readonly kind: "name"; readonly ident: string }
  | { readonly kind: "rename"; readonly ident: string; readonly alias: string }
  | { readonly kind: "glob" }
  | { readonly kind: "group"; readonly items: readonly UseTree[] };

type ItemBase = {
  readonly attrs: readonly SourceAttr[];
  readonly span: Span;
};

export type SourceItem =
  | (ItemBase & {
      readonly kind: "struct";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly tuple: boolean;
      readonly fields: readonly SourceField[];
    })
  | (ItemBase & {
      readonly kind: "union";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly fields: readonly SourceField[];
    })
  | (ItemBase & {
      readonly kind: "enum";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly variants: readonly SourceVariant[];
    })
  | (ItemBase & {
      readonly kind: "type";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly type: SourceType;
    })
  | (ItemBase & {
      readonly kind: "const";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly type: SourceType;
      readonly value: SourceExpr;
    })
  | (ItemBase & { readonly kind: "static"; readonly name: string })
  | (ItemBase & {
      readonly kind: "foreign_mod";
      readonly abi: string;
      readonly items: readonly ForeignItem[];
    })
  | (ItemBase & { readonly kind: "use"; readonly vis: SourceVisibility; readonly tree: UseTree })
  | (ItemBase & {
      readonly kind: "mod";
      readonly vis: SourceVisibility;
      readonly name: string;
      readonly external: boolean;
      readonly items: readonly SourceItem[];
    })
  | (ItemBase & {
      readonly kind: "macro";
      readonly path: readonly string[];
      readonly tokens: readonly TokenTree[];
    })
  | (ItemBase & { readonly kind: "fn"; readonly name: string })
  | (ItemBase & { readonly kind: "other"; readonly label: string });

export type SourceFile = {
  readonly fileName: string;
  readonly modulePath: readonly string[];
  readonly items: readonly SourceItem[];
};

export type Corpus = {
  readonly files: readonly SourceFile[];
};

export function spanText(span: Span | undefined): string {
  if (!span) return "<unknown>";
  return `${span.fileName}:${span.line}:${span.column}`;
}
