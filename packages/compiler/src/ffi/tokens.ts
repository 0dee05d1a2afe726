import type {
  Delimiter,
  SourceAttr,
  SourceExpr,
  SourceParam,
  SourceType,
  Span,
  TokenTree,
} from "./syntax.js";

export type GroupToken = Extract<TokenTree, { readonly kind: "group" }>;

export class SyntaxIssue extends Error {
  readonly span: Span;

  constructor(message: string, span: Span) {
    super(message);
    this.span = span;
    this.name = "SyntaxIssue";
  }
}

export class TokenCursor {
  readonly #tokens: readonly TokenTree[];
  readonly #endSpan: Span;
  #pos = 0;

  constructor(tokens: readonly TokenTree[], endSpan: Span) {
    this.#tokens = tokens;
    this.#endSpan = endSpan;
  }

  static of(group: GroupToken): TokenCursor {
    return new TokenCursor(group.tokens, group.span);
  }

  peek(offset = 0): TokenTree | undefined {
    return this.#tokens[this.#pos + offset];
  }

  next(): TokenTree | undefined {
    const t = this.#tokens[this.#pos];
    if (t) this.#pos += 1;
    return t;
  }

  atEnd(): boolean {
    return this.#pos >= this.#tokens.length;
  }

  span(): Span {
    return this.peek()?.span ?? this.#endSpan;
  }

  rest(): readonly TokenTree[] {
    return this.#tokens.slice(this.#pos);
  }

  isIdent(text?: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t?.kind === "ident" && (text === undefined || t.text === text);
  }

  isPunct(seq: string, offset = 0): boolean {
    for (let i = 0; i < seq.length; i++) {
      const t = this.peek(offset + i);
      if (!t || t.kind !== "punct" || t.ch !== seq[i]) return false;
      if (i < seq.length - 1 && !t.joint) return false;
    }
    return true;
  }

  isGroup(delimiter: Delimiter, offset = 0): boolean {
    const t = this.peek(offset);
    return t?.kind === "group" && t.delimiter === delimiter;
  }

  eatIdent(text?: string): string | undefined {
    const t = this.peek();
    if (t?.kind !== "ident" || (text !== undefined && t.text !== text)) return undefined;
    this.#pos += 1;
    return t.text;
  }

  eatPunct(seq: string): boolean {
    if (!this.isPunct(seq)) return false;
    this.#pos += seq.length;
    return true;
  }

  eatGroup(delimiter: Delimiter): GroupToken | undefined {
    const t = this.peek();
    if (t?.kind !== "group" || t.delimiter !== delimiter) return undefined;
    this.#pos += 1;
    return t;
  }

  eatLiteral(): string | undefined {
    const t = this.peek();
    if (t?.kind !== "literal") return undefined;
    this.#pos += 1;
    return t.text;
  }

  expectIdent(what: string): string {
    const name = this.eatIdent();
    if (name === undefined) throw new SyntaxIssue(`Expected ${what}.`, this.span());
    return name;
  }

  expectPunct(seq: string): void {
    if (!this.eatPunct(seq)) throw new SyntaxIssue(`Expected '${seq}'.`, this.span());
  }

  expectGroup(delimiter: Delimiter, what: string): GroupToken {
    const g = this.eatGroup(delimiter);
    if (!g) throw new SyntaxIssue(`Expected ${what}.`, this.span());
    return g;
  }

  expectEnd(what: string): void {
    if (!this.atEnd()) throw new SyntaxIssue(`Unexpected tokens after ${what}.`, this.span());
  }

  skipPast(ch: string): void {
    while (!this.atEnd()) {
      const t = this.next();
      if (t?.kind === "punct" && t.ch === ch) return;
    }
  }
}

const DELIMS: Readonly<Record<Delimiter, readonly [string, string]>> = {
  paren: ["(", ")"],
  brace: ["{", "}"],
  bracket: ["[", "]"],
};

export function tokensText(tokens: readonly TokenTree[]): string {
  let out = "";
  let glue = false;
  for (const t of tokens) {
    if (out.length > 0 && !glue) out += " ";
    switch (t.kind) {
      case "ident":
      case "literal":
        out += t.text;
        glue = false;
        break;
      case "punct":
        out += t.ch;
        glue = t.joint;
        break;
      case "group": {
        const [open, close] = DELIMS[t.delimiter];
        out += `${open}${tokensText(t.tokens)}${close}`;
        glue = false;
        break;
      }
    }
  }
  return out;
}

export function splitByComma(tokens: readonly TokenTree[]): TokenTree[][] {
  const parts: TokenTree[][] = [];
  let current: TokenTree[] = [];
  for (const t of tokens) {
    if (t.kind === "punct" && t.ch === ",") {
      parts.push(current);
      current = [];
      continue;
    }
    current.push(t);
  }
  if (current.length > 0) parts.push(current);
  return parts;
}

export function unquoteString(text: string): string {
  const body = text.startsWith("b\"") ? text.slice(2, -1) : text.slice(1, -1);
  return body.replaceAll(/\\(x[0-9A-Fa-f]{2}|u\{[0-9A-Fa-f]+\}|.)/g, (_m, esc: string) => {
    if (esc.startsWith("x")) return String.fromCharCode(Number.parseInt(esc.slice(1), 16));
    if (esc.startsWith("u{")) return String.fromCodePoint(Number.parseInt(esc.slice(2, -1), 16));
    switch (esc) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "0":
        return "\0";
      default:
        return esc;
    }
  });
}

// Attributes

export function parseOuterAttrs(c: TokenCursor): SourceAttr[] {
  const attrs: SourceAttr[] = [];
  for (;;) {
    if (c.isPunct("#") && c.isPunct("!", 1) && c.isGroup("bracket", 2)) {
      c.next();
      c.next();
      c.next();
      continue;
    }
    if (!c.isPunct("#") || !c.isGroup("bracket", 1)) return attrs;
    const hash = c.next();
    const group = c.eatGroup("bracket");
    if (!hash || !group) return attrs;
    const inner = TokenCursor.of(group);
    const segments = [inner.expectIdent("attribute name")];
    while (inner.eatPunct("::")) segments.push(inner.expectIdent("attribute path segment"));
    attrs.push({ name: segments.join("::"), args: inner.rest(), span: hash.span });
  }
}

export function attrListArgs(attr: SourceAttr): TokenTree[][] | undefined {
  const [first] = attr.args;
  if (first?.kind !== "group" || first.delimiter !== "paren") return undefined;
  return splitByComma(first.tokens);
}

export function attrStringValue(attr: SourceAttr): string | undefined {
  const [eq, lit] = attr.args;
  if (eq?.kind !== "punct" || eq.ch !== "=" || lit?.kind !== "literal") return undefined;
  return lit.text.startsWith('"') ? unquoteString(lit.text) : undefined;
}

// Types

export function parseType(c: TokenCursor): SourceType {
  const t = c.peek();
  if (!t) throw new SyntaxIssue("Expected a type.", c.span());

  if (t.kind === "group" && t.delimiter === "paren") {
    c.next();
    if (t.tokens.length === 0) return { kind: "unit" };
    const inner = TokenCursor.of(t);
    const ty = parseType(inner);
    if (inner.atEnd()) return ty;
    return { kind: "other", text: `(${tokensText(t.tokens)})` };
  }

  if (t.kind === "group" && t.delimiter === "bracket") {
    c.next();
    const inner = TokenCursor.of(t);
    const elem = parseType(inner);
    if (!inner.eatPunct(";")) return { kind: "other", text: `[${tokensText(t.tokens)}]` };
    const len = parseExpr(inner);
    inner.expectEnd("array length");
    return { kind: "array", elem, len };
  }

  if (c.eatPunct("!")) return { kind: "never" };

  if (c.eatPunct("*")) {
    if (c.eatIdent("const")) return { kind: "ptr", mut: false, inner: parseType(c) };
    if (c.eatIdent("mut")) return { kind: "ptr", mut: true, inner: parseType(c) };
    throw new SyntaxIssue("Raw pointer types need 'const' or 'mut'.", c.span());
  }

  if (c.isPunct("&")) {
    const start = c.rest();
    c.next();
    if (c.eatPunct("'")) c.expectIdent("lifetime name");
    c.eatIdent("mut");
    parseType(c);
    const consumed = start.length - c.rest().length;
    return { kind: "other", text: tokensText(start.slice(0, consumed)) };
  }

  if (c.isIdent("unsafe") || c.isIdent("extern") || c.isIdent("fn")) return parseFnType(c);

  if (c.isIdent("dyn") || c.isIdent("impl")) {
    const keyword = c.next();
    const bound = parsePathType(c);
    const label = bound.kind === "path" ? bound.segments.join("::") : "?";
    return { kind: "other", text: `${keyword?.kind === "ident" ? keyword.text : ""} ${label}` };
  }

  if (t.kind === "ident" || c.isPunct("::")) return parsePathType(c);

  throw new SyntaxIssue(`Unexpected '${tokensText([t])}' in type.`, t.span);
}

function parsePathType(c: TokenCursor): SourceType {
  c.eatPunct("::");
  const segments = [c.expectIdent("type name")];
  while (c.isPunct("::") && c.isIdent(undefined, 2)) {
    c.eatPunct("::");
    segments.push(c.expectIdent("path segment"));
  }
  if (c.isPunct("::") && c.isPunct("<", 2)) c.eatPunct("::");
  const args: SourceType[] = [];
  if (c.eatPunct("<")) {
    for (;;) {
      if (c.eatPunct(">")) break;
      if (c.eatPunct("'")) {
        c.expectIdent("lifetime name");
      } else {
        args.push(parseType(c));
      }
      if (c.eatPunct(",")) continue;
      c.expectPunct(">");
      break;
    }
  }
  return { kind: "path", segments, args };
}

function parseFnType(c: TokenCursor): SourceType {
  c.eatIdent("unsafe");
  let abi: string | undefined;
  if (c.eatIdent("extern")) {
    const lit = c.peek();
    if (lit?.kind === "literal" && lit.text.startsWith('"')) {
      c.next();
      abi = unquoteString(lit.text);
    } else {
      abi = "C";
    }
  }
  if (!c.eatIdent("fn")) throw new SyntaxIssue("Expected 'fn' in function pointer type.", c.span());
  const group = c.expectGroup("paren", "function pointer parameters");
  const { params, variadic } = parseParamList(TokenCursor.of(group));
  const ret = c.eatPunct("->") ? parseType(c) : ({ kind: "unit" } as const);
  return { kind: "fn", ...(abi !== undefined ? { abi } : {}), params, ret, variadic };
}

export function parseParamList(c: TokenCursor): {
  readonly params: SourceParam[];
  readonly variadic: boolean;
} {
  const params: SourceParam[] = [];
  let variadic = false;
  while (!c.atEnd()) {
    if (c.eatPunct("...")) {
      variadic = true;
      c.eatPunct(",");
      continue;
    }
    if (c.isIdent("mut") && c.isIdent(undefined, 1)) c.next();
    let name = "";
    if (c.isIdent() && c.isPunct(":", 1) && !c.isPunct("::", 1)) {
      name = c.expectIdent("parameter name");
      c.expectPunct(":");
    }
    params.push({ name, type: parseType(c) });
    if (!c.atEnd()) c.expectPunct(",");
  }
  return { params, variadic };
}

// Constant expressions

const BINARY_LEVELS: readonly (readonly string[])[] = [
  ["|"],
  ["^"],
  ["&"],
  ["<<", ">>"],
  ["+", "-"],
  ["*", "/", "%"],
];

function isBinaryOp(c: TokenCursor, op: string): boolean {
  if (!c.isPunct(op)) return false;
  if (op.length > 1) return true;
  const t = c.peek();
  const after = c.peek(1);
  if (t?.kind === "punct" && t.joint && after?.kind === "punct" && "=|&<>".includes(after.ch)) return false;
  return true;
}

export function parseExpr(c: TokenCursor): SourceExpr {
  return parseBinary(c, 0);
}

function parseBinary(c: TokenCursor, level: number): SourceExpr {
  const ops = BINARY_LEVELS[level];
  if (!ops) return parseCast(c);
  let left = parseBinary(c, level + 1);
  for (;;) {
    const op = ops.find((o) => isBinaryOp(c, o));
    if (!op) return left;
    c.eatPunct(op);
    const right = parseBinary(c, level + 1);
    left = { kind: "binary", op, left, right };
  }
}

function parseCast(c: TokenCursor): SourceExpr {
  let expr = parseUnary(c);
  while (c.eatIdent("as")) expr = { kind: "cast", expr, type: parseType(c) };
  return expr;
}

function parseUnary(c: TokenCursor): SourceExpr {
  if (c.eatPunct("-")) return { kind: "unary", op: "-", expr: parseUnary(c) };
  if (c.eatPunct("!")) return { kind: "unary", op: "!", expr: parseUnary(c) };
  return parsePrimary(c);
}

export function isFloatLiteral(text: string): boolean {
  if (/^0[xXbBoO]/.test(text)) return false;
  return /[.eE]/.test(text.replace(/(f32|f64)$/, "")) || /(f32|f64)$/.test(text);
}

function parsePrimary(c: TokenCursor): SourceExpr {
  const t = c.peek();
  if (!t) throw new SyntaxIssue("Expected an expression.", c.span());

  if (t.kind === "literal") {
    c.next();
    if (t.text.startsWith('"') || t.text.startsWith('b"')) return { kind: "str", value: unquoteString(t.text) };
    if (t.text.startsWith("'") || t.text.startsWith("b'")) {
      const ch = unquoteString(t.text.startsWith("b") ? t.text.slice(1) : t.text);
      return { kind: "int", text: String(ch.codePointAt(0) ?? 0) };
    }
    return isFloatLiteral(t.text) ? { kind: "float", text: t.text } : { kind: "int", text: t.text };
  }

  if (t.kind === "group" && t.delimiter === "paren") {
    c.next();
    const inner = TokenCursor.of(t);
    const expr = parseExpr(inner);
    inner.expectEnd("parenthesized expression");
    return expr;
  }

  if (t.kind === "group" && t.delimiter === "bracket") {
    c.next();
    const parts = splitByComma(t.tokens);
    if (t.tokens.some((tok) => tok.kind === "punct" && tok.ch === ";")) {
      return { kind: "other", text: `[${tokensText(t.tokens)}]` };
    }
    const elements = parts.map((part) => {
      const inner = new TokenCursor(part, t.span);
      const expr = parseExpr(inner);
      inner.expectEnd("array element");
      return expr;
    });
    return { kind: "array", elements };
  }

  if (c.eatIdent("true")) return { kind: "bool", value: true };
  if (c.eatIdent("false")) return { kind: "bool", value: false };

  if (t.kind === "ident" || c.isPunct("::")) {
    c.eatPunct("::");
    const segments = [c.expectIdent("name")];
    while (c.isPunct("::") && c.isIdent(undefined, 2)) {
      c.eatPunct("::");
      segments.push(c.expectIdent("path segment"));
    }
    // `FLAG.bits` and `FLAG.bits()` name the flag's integer, which is what
    // the path folds to already.
    if (c.isPunct(".") && c.isIdent("bits", 1)) {
      c.next();
      c.next();
      const call = c.eatGroup("paren");
      if (call && call.tokens.length > 0) throw new SyntaxIssue("'bits()' takes no arguments.", call.span);
      return { kind: "path", segments };
    }
    const body = c.eatGroup("brace");
    if (!body) return { kind: "path", segments };
    const fields = splitByComma(body.tokens).map((part) => {
      const inner = new TokenCursor(part, body.span);
      const name = inner.expectIdent("field name");
      inner.expectPunct(":");
      const value = parseExpr(inner);
      inner.expectEnd("field initializer");
      return { name, value };
    });
    return { kind: "struct", path: segments, fields };
  }

  throw new SyntaxIssue(`Unexpected '${tokensText([t])}' in expression.`, t.span);
}
