import { expect } from "chai";

import { lexSource, parseSourceFile } from "./lexer.js";
import type { TokenTree } from "./syntax.js";

function describeToken(t: TokenTree): string {
  switch (t.kind) {
    case "ident":
      return `ident:${t.text}`;
    case "literal":
      return `lit:${t.text}`;
    case "punct":
      return `punct:${t.ch}${t.joint ? "+" : ""}`;
    case "group":
      return `group:${t.delimiter}(${t.tokens.map(describeToken).join(" ")})`;
  }
}

function lex(text: string): string[] {
  const result = lexSource(text, "test.rs");
  expect(result.diagnostics).to.deep.equal([]);
  return result.tokens.map(describeToken);
}

describe("@winzig/compiler lexer", () => {
  it("builds token trees with positions", () => {
    const result = lexSource("pub struct A { x: u32 }", "a.rs");
    expect(result.tokens.map(describeToken)).to.deep.equal([
      "ident:pub",
      "ident:struct",
      "ident:A",
      "group:brace(ident:x punct:: ident:u32)",
    ]);
    expect(result.tokens[3]?.span).to.deep.equal({ fileName: "a.rs", line: 1, column: 14 });
  });

  it("skips nested block comments and line comments", () => {
    const result = lexSource("/* outer /* inner */ still */ fn // trailing\nx", "c.rs");
    expect(result.tokens.map(describeToken)).to.deep.equal(["ident:fn", "ident:x"]);
    expect(result.tokens[0]?.span.column).to.equal(31);
    expect(result.tokens[1]?.span).to.deep.equal({ fileName: "c.rs", line: 2, column: 1 });
  });

  it("marks punctuation that is followed by more punctuation as joint", () => {
    expect(lex("a::b -> c")).to.deep.equal([
      "ident:a",
      "punct::+",
      "punct::",
      "ident:b",
      "punct:-+",
      "punct:>",
      "ident:c",
    ]);
  });

  it("reads numeric literals with radix prefixes, exponents and suffixes", () => {
    expect(lex("0x1F_u32 1.5e3f64 0b1010 7usize")).to.deep.equal([
      "lit:0x1F_u32",
      "lit:1.5e3f64",
      "lit:0b1010",
      "lit:7usize",
    ]);
  });

  it("does not read a range as a float", () => {
    expect(lex("1..2")).to.deep.equal(["lit:1", "punct:.+", "punct:.", "lit:2"]);
  });

  it("keeps string escapes verbatim and rewrites raw strings", () => {
    expect(lex(String.raw`"a\"b" r#"x"y"# b'c' '\n'`)).to.deep.equal([
      String.raw`lit:"a\"b"`,
      String.raw`lit:"x\"y"`,
      "lit:b'c'",
      String.raw`lit:'\n'`,
    ]);
  });

  it("reads lifetimes as a quote followed by an identifier", () => {
    expect(lex("&'a T")).to.deep.equal(["punct:&", "punct:'+", "ident:a", "ident:T"]);
  });

  it("reads raw identifiers as plain identifiers", () => {
    expect(lex("r#type r#match")).to.deep.equal(["ident:type", "ident:match"]);
  });

  it("reports an unterminated string and yields no tokens", () => {
    const result = lexSource('const S: &str = "abc', "s.rs");
    expect(result.tokens).to.deep.equal([]);
    expect(result.diagnostics.map((d) => [d.code, d.message, d.span?.column])).to.deep.equal([
      ["WZ0102", "Unterminated string literal.", 17],
    ]);
  });

  it("reports an unterminated block comment", () => {
    const result = lexSource("struct A; /* open", "s.rs");
    expect(result.tokens).to.deep.equal([]);
    expect(result.diagnostics.map((d) => d.message)).to.deep.equal(["Unterminated block comment."]);
  });

  it("reports mismatched and unclosed delimiters", () => {
    const mismatched = lexSource("(]", "m.rs");
    expect(mismatched.tokens).to.deep.equal([]);
    expect(mismatched.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([["WZ0103", "Unbalanced ']'."]]);

    const unclosed = lexSource("struct A {", "u.rs");
    expect(unclosed.tokens).to.deep.equal([]);
    expect(unclosed.diagnostics.map((d) => [d.code, d.message, d.span?.column])).to.deep.equal([
      ["WZ0103", "Unclosed delimiter.", 10],
    ]);
  });

  it("reports unexpected characters and keeps lexing", () => {
    const result = lexSource("a ` b", "x.rs");
    expect(result.tokens.map(describeToken)).to.deep.equal(["ident:a", "ident:b"]);
    expect(result.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([["WZ0101", "Unexpected character '`'."]]);
  });

  it("parses a file into items under its module path", () => {
    const { file, diagnostics } = parseSourceFile("pub struct A;\nstruct B;", "lib.rs", ["um"]);
    expect(diagnostics).to.deep.equal([]);
    expect(file.modulePath).to.deep.equal(["um"]);
    expect(file.items.map((i) => i.kind)).to.deep.equal(["struct", "struct"]);
  });
});
