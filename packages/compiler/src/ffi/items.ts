import type { DiagnosticsCollector } from "./diagnostics.js";
import type {
  ForeignItem,
  SourceAttr,
  SourceField,
  SourceItem,
  SourceVariant,
  SourceVisibility,
  Span,
  TokenTree,
  UseTree,
} from "./syntax.js";
import {
  SyntaxIssue,
  TokenCursor,
  parseExpr,
  parseOuterAttrs,
  parseParamList,
  parseType,
  splitByComma,
  tokensText,
  unquoteString,
} from "./tokens.js";

// Item grammar over token trees. Shared by the reader (whole files) and the
// expander (macro bodies). A malformed item is reported as WZ0101 and skipped.

export function parseItems(
  tokens: readonly TokenTree[],
  endSpan: Span,
  diagnostics: DiagnosticsCollector
): SourceItem[] {
  const c = new TokenCursor(tokens, endSpan);
  const items: SourceItem[] = [];
  while (!c.atEnd()) {
    if (c.eatPunct(";")) continue;
    try {
      items.push(parseItem(c));
    } catch (error) {
      if (!(error instanceof SyntaxIssue)) throw error;
      diagnostics.report("WZ0101", error.message, { span: error.span });
      skipItem(c);
    }
  }
  return items;
}

function skipItem(c: TokenCursor): void {
  while (!c.atEnd()) {
    const t = c.next();
    if (t?.kind === "punct" && t.ch === ";") return;
    if (t?.kind === "group" && t.delimiter === "brace") return;
  }
}

function parseVisibility(c: TokenCursor): SourceVisibility {
  if (!c.eatIdent("pub")) return "private";
  c.eatGroup("paren");
  return "pub";
}

export function parseItem(c: TokenCursor): SourceItem {
  const span = c.span();
  const attrs = parseOuterAttrs(c);
  const vis = parseVisibility(c);

  if (c.isIdent() && c.isPunct("!", 1)) return parseMacroItem(c, attrs, span);
  if (c.isPunct("::") || (c.isIdent() && c.isPunct("::", 1))) {
    if (isMacroPath(c)) return parseMacroItem(c, attrs, span);
  }

  if (c.eatIdent("struct")) return parseStruct(c, attrs, vis, span);
  if (c.eatIdent("union")) return parseUnion(c, attrs, vis, span);
  if (c.eatIdent("enum")) return parseEnum(c, attrs, vis, span);

  if (c.eatIdent("type")) {
    const name = c.expectIdent("alias name");
    rejectGenerics(c, name);
    c.expectPunct("=");
    const type = parseType(c);
    c.expectPunct(";");
    return { kind: "type", attrs, span, vis, name, type };
  }

  if (c.isIdent("const") && !isFnAhead(c, 1)) {
    c.next();
    const name = c.expectIdent("constant name");
    c.expectPunct(":");
    const type = parseType(c);
    c.expectPunct("=");
    const value = parseExpr(c);
    c.expectPunct(";");
    return { kind: "const", attrs, span, vis, name, type, value };
  }

  if (c.eatIdent("static")) {
    c.eatIdent("mut");
    const name = c.expectIdent("static name");
    skipPastSemicolon(c);
    return { kind: "static", attrs, span, name };
  }

  if (c.isIdent("extern") || (c.isIdent("unsafe") && c.isIdent("extern", 1))) {
    const foreign = tryForeignMod(c, attrs, span);
    if (foreign) return foreign;
  }

  if (c.eatIdent("use")) {
    const tree = parseUseTree(c);
    c.expectPunct(";");
    return { kind: "use", attrs, span, vis, tree };
  }

  if (c.eatIdent("mod")) {
    const name = c.expectIdent("module name");
    if (c.eatPunct(";")) return { kind: "mod", attrs, span, vis, name, external: true, items: [] };
    const body = c.expectGroup("brace", "module body");
    const nested = new TokenCursor(body.tokens, body.span);
    const items: SourceItem[] = [];
    while (!nested.atEnd()) {
      if (nested.eatPunct(";")) continue;
      items.push(parseItem(nested));
    }
    return { kind: "mod", attrs, span, vis, name, external: false, items };
  }

  if (isFnAhead(c, 0)) {
    while (!c.isIdent("fn")) c.next();
    c.next();
    const name = c.expectIdent("function name");
    skipPastBody(c);
    return { kind: "fn", attrs, span, name };
  }

  for (const keyword of ["impl", "trait"]) {
    if (c.isIdent(keyword) || (c.isIdent("unsafe") && c.isIdent(keyword, 1))) {
      c.eatIdent("unsafe");
      c.next();
      skipPastBody(c);
      return { kind: "other", attrs, span, label: keyword };
    }
  }

  if (c.eatIdent("extern") && c.eatIdent("crate")) {
    const crateName = c.expectIdent("crate name");
    skipPastSemicolon(c);
    return { kind: "other", attrs, span, label: `extern crate ${crateName}` };
  }

  throw new SyntaxIssue(`Expected an item, found '${tokensText(c.rest().slice(0, 1))}'.`, c.span());
}

function isFnAhead(c: TokenCursor, offset: number): boolean {
  for (let i = offset; ; i++) {
    if (c.isIdent("fn", i)) return true;
    const t = c.peek(i);
    if (t?.kind === "literal" && t.text.startsWith('"')) continue;
    if (!(c.isIdent("const", i) || c.isIdent("unsafe", i) || c.isIdent("extern", i) || c.isIdent("async", i))) {
      return false;
    }
  }
}

function isMacroPath(c: TokenCursor): boolean {
  let i = c.isPunct("::") ? 2 : 0;
  for (;;) {
    if (!c.isIdent(undefined, i)) return false;
    i += 1;
    if (c.isPunct("::", i)) {
      i += 2;
      continue;
    }
    return c.isPunct("!", i);
  }
}

function parseMacroItem(c: TokenCursor, attrs: readonly SourceAttr[], span: Span): SourceItem {
  c.eatPunct("::");
  const path = [c.expectIdent("macro name")];
  while (c.eatPunct("::")) path.push(c.expectIdent("macro path segment"));
  c.expectPunct("!");
  // macro_rules! name { ... }
  if (c.isIdent()) c.next();
  const body = c.next();
  if (body?.kind !== "group") throw new SyntaxIssue("Expected a macro body.", body?.span ?? c.span());
  if (body.delimiter !== "brace") c.expectPunct(";");
  else c.eatPunct(";");
  return { kind: "macro", attrs, span, path, tokens: body.tokens };
}

function rejectGenerics(c: TokenCursor, name: string): void {
  if (c.isPunct("<")) throw new SyntaxIssue(`Generic parameters on '${name}' are not supported.`, c.span());
}

function skipPastSemicolon(c: TokenCursor): void {
  while (!c.atEnd()) {
    if (c.eatPunct(";")) return;
    c.next();
  }
}

function skipPastBody(c: TokenCursor): void {
  while (!c.atEnd()) {
    if (c.eatPunct(";")) return;
    if (c.eatGroup("brace")) return;
    c.next();
  }
}

export function parseNamedFields(group: Extract<TokenTree, { kind: "group" }>): SourceField[] {
  return splitByComma(group.tokens).map((part) => {
    const c = new TokenCursor(part, group.span);
    const span = c.span();
    const attrs = parseOuterAttrs(c);
    parseVisibility(c);
    const name = c.expectIdent("field name");
    c.expectPunct(":");
    const type = parseType(c);
    c.expectEnd("field type");
    return { attrs, name, type, span };
  });
}

function parseTupleFields(group: Extract<TokenTree, { kind: "group" }>): SourceField[] {
  return splitByComma(group.tokens).map((part, index) => {
    const c = new TokenCursor(part, group.span);
    const span = c.span();
    const attrs = parseOuterAttrs(c);
    parseVisibility(c);
    const type = parseType(c);
    c.expectEnd("tuple field type");
    return { attrs, name: String(index), type, span };
  });
}

function parseStruct(
  c: TokenCursor,
  attrs: readonly SourceAttr[],
  vis: SourceVisibility,
  span: Span
): SourceItem {
  const name = c.expectIdent("struct name");
  rejectGenerics(c, name);
  if (c.eatPunct(";")) return { kind: "struct", attrs, span, vis, name, tuple: false, fields: [] };
  const tuple = c.eatGroup("paren");
  if (tuple) {
    c.expectPunct(";");
    return { kind: "struct", attrs, span, vis, name, tuple: true, fields: parseTupleFields(tuple) };
  }
  const body = c.expectGroup("brace", `body of struct '${name}'`);
  return { kind: "struct", attrs, span, vis, name, tuple: false, fields: parseNamedFields(body) };
}

function parseUnion(
  c: TokenCursor,
  attrs: readonly SourceAttr[],
  vis: SourceVisibility,
  span: Span
): SourceItem {
  const name = c.expectIdent("union name");
  rejectGenerics(c, name);
  const body = c.expectGroup("brace", `body of union '${name}'`);
  return { kind: "union", attrs, span, vis, name, fields: parseNamedFields(body) };
}

export function parseVariants(group: Extract<TokenTree, { kind: "group" }>): SourceVariant[] {
  return splitByComma(group.tokens).map((part) => {
    const c = new TokenCursor(part, group.span);
    const span = c.span();
    const attrs = parseOuterAttrs(c);
    const name = c.expectIdent("variant name");
    const hasPayload = c.eatGroup("paren") !== undefined || c.eatGroup("brace") !== undefined;
    const discriminant = c.eatPunct("=") ? parseExpr(c) : undefined;
    c.expectEnd(`variant '${name}'`);
    return { attrs, name, ...(discriminant ? { discriminant } : {}), hasPayload, span };
  });
}

function parseEnum(
  c: TokenCursor,
  attrs: readonly SourceAttr[],
  vis: SourceVisibility,
  span: Span
): SourceItem {
  const name = c.expectIdent("enum name");
  rejectGenerics(c, name);
  const body = c.expectGroup("brace", `body of enum '${name}'`);
  return { kind: "enum", attrs, span, vis, name, variants: parseVariants(body) };
}

function tryForeignMod(c: TokenCursor, attrs: readonly SourceAttr[], span: Span): SourceItem | undefined {
  const abiOffset = c.isIdent("unsafe") ? 2 : 1;
  const abiToken = c.peek(abiOffset);
  const hasAbi = abiToken?.kind === "literal" && abiToken.text.startsWith('"');
  if (!c.isGroup("brace", hasAbi ? abiOffset + 1 : abiOffset)) return undefined;
  c.eatIdent("unsafe");
  c.eatIdent("extern");
  const abi = hasAbi ? unquoteString(c.eatLiteral() ?? '"C"') : "C";
  const body = c.expectGroup("brace", "extern block body");
  const inner = new TokenCursor(body.tokens, body.span);
  const items: ForeignItem[] = [];
  while (!inner.atEnd()) items.push(parseForeignItem(inner));
  return { kind: "foreign_mod", attrs, span, abi, items };
}

function parseForeignItem(c: TokenCursor): ForeignItem {
  const span = c.span();
  const attrs = parseOuterAttrs(c);
  const vis = parseVisibility(c);
  c.eatIdent("safe");
  c.eatIdent("unsafe");
  if (c.eatIdent("static")) {
    c.eatIdent("mut");
    const name = c.expectIdent("static name");
    skipPastSemicolon(c);
    return { kind: "static", name, span };
  }
  if (!c.eatIdent("fn")) throw new SyntaxIssue("Expected 'fn' or 'static' in extern block.", c.span());
  const name = c.expectIdent("function name");
  rejectGenerics(c, name);
  const group = c.expectGroup("paren", `parameters of '${name}'`);
  const { params, variadic } = parseParamList(new TokenCursor(group.tokens, group.span));
  const ret = c.eatPunct("->") ? parseType(c) : ({ kind: "unit" } as const);
  c.expectPunct(";");
  return { kind: "fn", vis, name, attrs, params, ret, variadic, span };
}

export function parseUseTree(c: TokenCursor): UseTree {
  if (c.eatPunct("*")) return { kind: "glob" };
  const group = c.eatGroup("brace");
  if (group) {
    const items = splitByComma(group.tokens).map((part) => {
      const inner = new TokenCursor(part, group.span);
      const tree = parseUseTree(inner);
      inner.expectEnd("use tree");
      return tree;
    });
    return { kind: "group", items };
  }
  c.eatPunct("::");
  const ident = c.expectIdent("path in use tree");
  if (c.eatPunct("::")) return { kind: "path", ident, tree: parseUseTree(c) };
  if (c.eatIdent("as")) return { kind: "rename", ident, alias: c.expectIdent("import alias") };
  return { kind: "name", ident };
}
