import type { Diagnostic } from "./diagnostics.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import { parseItems } from "./items.js";
import type { Delimiter, SourceFile, Span, TokenTree } from "./syntax.js";

const PUNCT_CHARS = new Set("+-*/%^!&|=<>@.,;:#$?~'".split(""));

const OPENERS: Readonly<Record<string, Delimiter>> = { "(": "paren", "[": "bracket", "{": "brace" };
const CLOSERS: Readonly<Record<string, Delimiter>> = { ")": "paren", "]": "bracket", "}": "brace" };

const isIdentStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isIdentChar = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);
const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

type OpenGroup = {
  readonly delimiter: Delimiter;
  readonly span: Span;
  readonly tokens: TokenTree[];
};

class Scanner {
  readonly #text: string;
  readonly #fileName: string;
  pos = 0;
  line = 1;
  column = 1;

  constructor(text: string, fileName: string) {
    this.#text = text;
    this.#fileName = fileName;
  }

  peek(offset = 0): string {
    return this.#text.charAt(this.pos + offset);
  }

  atEnd(): boolean {
    return this.pos >= this.#text.length;
  }

  span(): Span {
    return { fileName: this.#fileName, line: this.line, column: this.column };
  }

  advance(count = 1): string {
    let out = "";
    for (let i = 0; i < count && !this.atEnd(); i++) {
      const ch = this.#text.charAt(this.pos);
      out += ch;
      this.pos += 1;
      if (ch === "\n") {
        this.line += 1;
        this.column = 1;
      } else {
        this.column += 1;
      }
    }
    return out;
  }

  startsWith(s: string): boolean {
    return this.#text.startsWith(s, this.pos);
  }
}

class Unterminated extends Error {
  readonly span: Span;

  constructor(message: string, span: Span) {
    super(message);
    this.span = span;
  }
}

function skipBlockComment(s: Scanner): void {
  const start = s.span();
  s.advance(2);
  let depth = 1;
  while (depth > 0) {
    if (s.atEnd()) throw new Unterminated("Unterminated block comment.", start);
    if (s.startsWith("/*")) {
      s.advance(2);
      depth += 1;
    } else if (s.startsWith("*/")) {
      s.advance(2);
      depth -= 1;
    } else {
      s.advance();
    }
  }
}

// Quoted body up to the closing quote, escapes kept verbatim.
function readQuoted(s: Scanner, quote: string, start: Span): string {
  let out = s.advance();
  for (;;) {
    if (s.atEnd()) {
      throw new Unterminated(quote === '"' ? "Unterminated string literal." : "Unterminated character literal.", start);
    }
    const ch = s.advance();
    out += ch;
    if (ch === "\\") {
      out += s.advance();
      continue;
    }
    if (ch === quote) return out;
  }
}

// r"..." and r#"..."#; rewritten as an ordinary escaped string literal.
function readRawString(s: Scanner, start: Span, prefix: string): string {
  s.advance(prefix.length);
  let hashes = 0;
  while (s.peek() === "#") {
    s.advance();
    hashes += 1;
  }
  s.advance();
  const close = `"${"#".repeat(hashes)}`;
  let body = "";
  while (!s.startsWith(close)) {
    if (s.atEnd()) throw new Unterminated("Unterminated raw string literal.", start);
    body += s.advance();
  }
  s.advance(close.length);
  const escaped = body.replaceAll("\\", "\\\\").replaceAll('"', '\\"');
  return `${prefix.startsWith("b") ? "b" : ""}"${escaped}"`;
}

function readNumber(s: Scanner): string {
  let out = "";
  if (s.peek() === "0" && /[xob]/i.test(s.peek(1))) {
    out += s.advance(2);
    while (/[0-9A-Fa-f_]/.test(s.peek())) out += s.advance();
  } else {
    while (isDigit(s.peek()) || s.peek() === "_") out += s.advance();
    // `1.0` but not `1..2` or `1.method`
    if (s.peek() === "." && s.peek(1) !== "." && !isIdentStart(s.peek(1))) {
      out += s.advance();
      while (isDigit(s.peek()) || s.peek() === "_") out += s.advance();
    }
    if (/[eE]/.test(s.peek()) && (isDigit(s.peek(1)) || (/[+-]/.test(s.peek(1)) && isDigit(s.peek(2))))) {
      out += s.advance(2);
      while (isDigit(s.peek()) || s.peek() === "_") out += s.advance();
    }
  }
  while (isIdentChar(s.peek())) out += s.advance();
  return out;
}

function readIdent(s: Scanner): string {
  let out = "";
  while (isIdentChar(s.peek())) out += s.advance();
  return out;
}

export type LexResult = {
  readonly tokens: readonly TokenTree[];
  readonly endSpan: Span;
  readonly diagnostics: readonly Diagnostic[];
};

// Token trees for one file. Comments are dropped, doc comments included.
export function lexSource(text: string, fileName: string): LexResult {
  const s = new Scanner(text, fileName);
  const diagnostics = new DiagnosticsCollector();
  const root: TokenTree[] = [];
  const stack: OpenGroup[] = [];
  const current = (): TokenTree[] => stack[stack.length - 1]?.tokens ?? root;

  try {
    while (!s.atEnd()) {
      const ch = s.peek();
      const span = s.span();
      if (/\s/.test(ch)) {
        s.advance();
      } else if (s.startsWith("//")) {
        while (!s.atEnd() && s.peek() !== "\n") s.advance();
      } else if (s.startsWith("/*")) {
        skipBlockComment(s);
      } else if (s.startsWith("r#") && isIdentStart(s.peek(2))) {
        s.advance(2);
        current().push({ kind: "ident", text: readIdent(s), span });
      } else if (/^(r|br)#*"/.test(text.slice(s.pos, s.pos + 8))) {
        current().push({ kind: "literal", text: readRawString(s, span, s.peek() === "b" ? "br" : "r"), span });
      } else if (s.startsWith('b"') || s.startsWith("b'")) {
        s.advance();
        current().push({ kind: "literal", text: `b${readQuoted(s, s.peek(), span)}`, span });
      } else if (ch === '"') {
        current().push({ kind: "literal", text: readQuoted(s, '"', span), span });
      } else if (ch === "'") {
        // 'a' and '\n' are characters; 'a without a closing quote is a lifetime.
        const isChar = s.peek(1) === "\\" || (s.peek(2) === "'" && s.peek(1) !== "'");
        if (isChar) {
          current().push({ kind: "literal", text: readQuoted(s, "'", span), span });
        } else {
          s.advance();
          current().push({ kind: "punct", ch: "'", joint: true, span });
        }
      } else if (isIdentStart(ch)) {
        current().push({ kind: "ident", text: readIdent(s), span });
      } else if (isDigit(ch)) {
        current().push({ kind: "literal", text: readNumber(s), span });
      } else if (Object.hasOwn(OPENERS, ch)) {
        s.advance();
        const delimiter = OPENERS[ch];
        if (delimiter) stack.push({ delimiter, span, tokens: [] });
      } else if (Object.hasOwn(CLOSERS, ch)) {
        s.advance();
        const open = stack.pop();
        if (!open || open.delimiter !== CLOSERS[ch]) {
          diagnostics.report("WZ0103", `Unbalanced '${ch}'.`, { span });
          return { tokens: [], endSpan: s.span(), diagnostics: diagnostics.items };
        }
        current().push({ kind: "group", delimiter: open.delimiter, tokens: open.tokens, span: open.span });
      } else if (PUNCT_CHARS.has(ch)) {
        s.advance();
        current().push({ kind: "punct", ch, joint: PUNCT_CHARS.has(s.peek()) && s.peek() !== "'", span });
      } else {
        s.advance();
        diagnostics.report("WZ0101", `Unexpected character '${ch}'.`, { span });
      }
    }
  } catch (error) {
    if (!(error instanceof Unterminated)) throw error;
    diagnostics.report("WZ0102", error.message, { span: error.span });
    return { tokens: [], endSpan: s.span(), diagnostics: diagnostics.items };
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    diagnostics.report("WZ0103", "Unclosed delimiter.", { span: unclosed.span });
    return { tokens: [], endSpan: s.span(), diagnostics: diagnostics.items };
  }
  return { tokens: root, endSpan: s.span(), diagnostics: diagnostics.items };
}

// Lexes and parses one file. A file that does not lex yields no items.
export function parseSourceFile(
  text: string,
  fileName: string,
  modulePath: readonly string[]
): { readonly file: SourceFile; readonly diagnostics: readonly Diagnostic[] } {
  const lexed = lexSource(text, fileName);
  const diagnostics = new DiagnosticsCollector();
  diagnostics.append(lexed.diagnostics);
  const items = parseItems(lexed.tokens, lexed.endSpan, diagnostics);
  return { file: { fileName, modulePath, items }, diagnostics: diagnostics.items };
}
