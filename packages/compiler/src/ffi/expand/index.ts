import type { Diagnostic } from "../diagnostics.js";
import { DiagnosticsCollector, TranslateError, fail } from "../diagnostics.js";
import type { ExpandedFile, FfiType, Import, Visibility } from "../ir.js";
import { qualify } from "../ir.js";
import type { ForeignFn, SourceFile, SourceItem, Span, UseTree } from "../syntax.js";
import { SyntaxIssue } from "../tokens.js";
import { layoutFromRepr, linkLibrary, linkName, parseRepr, warnUnknownAttrs } from "./attrs.js";
import { convertExpr, convertParams, convertType } from "./convert.js";
import { expandMacro, sequenceVariants } from "./macros.js";
import type { ExpandOptions, ExpandScope } from "./scope.js";
import { childScope, convertFields, declBase, enabledAttrs } from "./scope.js";

export type { ExpandOptions } from "./scope.js";

// Expansion is per file and touches nothing outside the file's own output.
export function expandFile(
  file: SourceFile,
  options: ExpandOptions
): { readonly expanded: ExpandedFile; readonly diagnostics: readonly Diagnostic[] } {
  const scope: ExpandScope = {
    modulePath: file.modulePath,
    options,
    diagnostics: new DiagnosticsCollector(),
    declarations: [],
    imports: [],
  };
  expandItems(file.items, scope);
  return {
    expanded: Object.freeze({
      fileName: file.fileName,
      modulePath: file.modulePath,
      declarations: Object.freeze(scope.declarations),
      imports: Object.freeze(scope.imports),
    }),
    diagnostics: scope.diagnostics.items,
  };
}

function itemName(item: SourceItem): string | undefined {
  switch (item.kind) {
    case "foreign_mod":
    case "use":
    case "other":
      return undefined;
    case "macro":
      return undefined;
    default:
      return item.name;
  }
}

// Macro bodies are parsed here, so their syntax errors belong to the item.
function asItemError(error: unknown): TranslateError {
  if (error instanceof TranslateError) return error;
  if (error instanceof SyntaxIssue) return new TranslateError("WZ1002", error.message, error.span);
  throw error;
}

function expandItems(items: readonly SourceItem[], scope: ExpandScope): void {
  for (const item of items) {
    const name = itemName(item);
    const qualifiedName = name !== undefined ? qualify(scope.modulePath, name) : undefined;
    const attrs = enabledAttrs(scope, item.attrs, qualifiedName);
    if (!attrs) continue;
    try {
      expandItem({ ...item, attrs }, scope);
    } catch (error) {
      const issue = asItemError(error);
      scope.diagnostics.report(issue.code, issue.message, {
        span: issue.span ?? item.span,
        ...(qualifiedName !== undefined ? { qualifiedName } : {}),
      });
    }
  }
}

function expandItem(item: SourceItem, scope: ExpandScope): void {
  const name = itemName(item);
  if (item.kind !== "macro") {
    warnUnknownAttrs(item.attrs, name !== undefined ? qualify(scope.modulePath, name) : undefined, scope.diagnostics);
  }

  switch (item.kind) {
    case "struct": {
      const { layout, conflict } = layoutFromRepr(parseRepr(item.attrs));
      scope.declarations.push({
        kind: "struct",
        ...declBase(scope, item.name, item.vis, item.span),
        layout,
        fields: convertFields(scope, item.fields),
        associated: [],
        ...(conflict !== undefined ? { reprConflict: conflict } : {}),
      });
      return;
    }
    case "union": {
      const { layout, conflict } = layoutFromRepr(parseRepr(item.attrs));
      scope.declarations.push({
        kind: "union",
        ...declBase(scope, item.name, item.vis, item.span),
        layout,
        fields: convertFields(scope, item.fields),
        ...(conflict !== undefined ? { reprConflict: conflict } : {}),
      });
      return;
    }
    case "enum":
      expandPlainEnum(item, scope);
      return;
    case "type":
      scope.declarations.push({
        kind: "type_alias",
        ...declBase(scope, item.name, item.vis, item.span),
        target: convertType(item.type, item.span),
      });
      return;
    case "const":
      scope.declarations.push({
        kind: "constant",
        ...declBase(scope, item.name, item.vis, item.span),
        type: convertType(item.type, item.span),
        value: convertExpr(item.value, item.span),
      });
      return;
    case "static":
      return fail("WZ1003", `Static '${item.name}' is not translated; only declarations are.`, item.span);
    case "fn":
      return fail("WZ1003", `Function '${item.name}' has a body; bodies are not translated.`, item.span);
    case "other":
      return fail("WZ1003", `'${item.label}' items are not translated.`, item.span);
    case "foreign_mod":
      expandForeignMod(item, scope);
      return;
    case "use":
      for (const imp of flattenUse(item.tree, [], scope.modulePath, item.vis, item.span)) scope.imports.push(imp);
      return;
    case "mod":
      scope.declarations.push({ kind: "module", ...declBase(scope, item.name, item.vis, item.span) });
      if (!item.external) expandItems(item.items, childScope(scope, item.name));
      return;
    case "macro":
      expandMacro(item.path, item.tokens, scope, item.span);
      return;
  }
}

function expandPlainEnum(item: Extract<SourceItem, { kind: "enum" }>, scope: ExpandScope): void {
  const base = declBase(scope, item.name, item.vis, item.span);
  const variants = item.variants.filter((v) => enabledAttrs(scope, v.attrs) !== undefined);
  if (variants.length === 0) {
    scope.declarations.push({ kind: "opaque", ...base });
    return;
  }
  const withPayload = variants.find((v) => v.hasPayload);
  if (withPayload) {
    return fail(
      "WZ1004",
      `Enum '${item.name}' has a variant with data ('${withPayload.name}'); only fieldless enums are translated.`,
      withPayload.span
    );
  }
  const repr = parseRepr(item.attrs);
  const discriminantType: FfiType = repr.int
    ? { kind: "path", segments: [repr.int], args: [] }
    : { kind: "int", width: 32, signed: true };
  scope.declarations.push({
    kind: "enum",
    ...base,
    style: "tagged",
    discriminantType,
    explicitWidth: repr.int !== undefined || repr.c,
    variants: sequenceVariants(variants),
  });
}

function expandForeignMod(item: Extract<SourceItem, { kind: "foreign_mod" }>, scope: ExpandScope): void {
  const library = linkLibrary(item.attrs) ?? scope.options.defaultLibrary;
  for (const foreign of item.items) {
    if (foreign.kind === "static") {
      scope.diagnostics.report("WZ1003", `Foreign static '${foreign.name}' is not translated.`, {
        span: foreign.span,
        qualifiedName: qualify(scope.modulePath, foreign.name),
      });
      continue;
    }
    const attrs = enabledAttrs(scope, foreign.attrs, qualify(scope.modulePath, foreign.name));
    if (!attrs) continue;
    try {
      pushForeignFn({ ...foreign, attrs }, item.abi, library, scope);
    } catch (error) {
      const issue = asItemError(error);
      scope.diagnostics.report(issue.code, issue.message, {
        span: issue.span ?? foreign.span,
        qualifiedName: qualify(scope.modulePath, foreign.name),
      });
    }
  }
}

function pushForeignFn(fn: ForeignFn, abi: string, library: string | undefined, scope: ExpandScope): void {
  warnUnknownAttrs(fn.attrs, qualify(scope.modulePath, fn.name), scope.diagnostics);
  scope.declarations.push({
    kind: "function",
    ...declBase(scope, fn.name, fn.vis, fn.span),
    callingConvention: abi,
    params: convertParams(fn.params, fn.span),
    returnType: convertType(fn.ret, fn.span),
    linkageName: linkName(fn.attrs) ?? fn.name,
    ...(library !== undefined ? { library } : {}),
    variadic: fn.variadic,
  });
}

// Turns `crate::`, `self::` and `super::` prefixes into a path from the
// crate root. Anything else is already crate-relative or foreign.
export function absolutePath(
  segments: readonly string[],
  modulePath: readonly string[],
  span: Span
): string[] {
  const [head, ...rest] = segments;
  if (head === "crate") return rest;
  if (head === "self") return [...modulePath, ...rest];
  if (head === "super") {
    let base = [...modulePath];
    let tail: readonly string[] = segments;
    while (tail[0] === "super") {
      if (base.length === 0) return fail("WZ2002", `'super' goes above the crate root.`, span);
      base = base.slice(0, -1);
      tail = tail.slice(1);
    }
    return [...base, ...tail];
  }
  return [...segments];
}

function flattenUse(
  tree: UseTree,
  prefix: readonly string[],
  modulePath: readonly string[],
  visibility: Visibility,
  span: Span
): Import[] {
  const make = (alias: string, target: readonly string[], glob: boolean): Import => ({
    alias,
    target: absolutePath(target, modulePath, span),
    glob,
    visibility,
    modulePath,
    span,
  });
  switch (tree.kind) {
    case "path":
      return flattenUse(tree.tree, [...prefix, tree.ident], modulePath, visibility, span);
    case "name": {
      if (tree.ident === "self") {
        const last = prefix.at(-1);
        return last === undefined ? [] : [make(last, prefix, false)];
      }
      return [make(tree.ident, [...prefix, tree.ident], false)];
    }
    case "rename":
      if (tree.alias === "_") return [];
      return [make(tree.alias, tree.ident === "self" ? prefix : [...prefix, tree.ident], false)];
    case "glob":
      return [make("*", prefix, true)];
    case "group":
      return tree.items.flatMap((t) => flattenUse(t, prefix, modulePath, visibility, span));
  }
}
