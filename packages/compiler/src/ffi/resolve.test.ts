import { expect } from "chai";

import { defaultCfg } from "./cfg.js";
import { expandFile } from "./expand/index.js";
import type { Declaration } from "./ir.js";
import { parseSourceFile } from "./lexer.js";
import { findLayoutCycles, orderModule } from "./order.js";
import type { ResolvedFile } from "./resolve.js";
import { resolveFilePass } from "./resolve.js";
import { collectSymbolsPass } from "./symbols.js";

type FileSpec = { readonly path: readonly string[]; readonly text: string };

function collect(files: readonly FileSpec[]) {
  const expanded = files.map((f, i) => {
    const { file, diagnostics } = parseSourceFile(f.text, `f${i}.rs`, f.path);
    expect(diagnostics).to.deep.equal([]);
    return expandFile(file, { cfg: defaultCfg(64) }).expanded;
  });
  return { expanded, ...collectSymbolsPass(expanded) };
}

function resolveAll(files: readonly FileSpec[]): ResolvedFile[] {
  const { expanded, table } = collect(files);
  return expanded.map((f) => resolveFilePass(f, table, 64));
}

function resolved<K extends Declaration["kind"]>(
  files: readonly ResolvedFile[],
  qualifiedName: string,
  kind: K
): Extract<Declaration, { kind: K }> {
  for (const file of files) {
    for (const item of file.items) {
      const decl = item.decl;
      if (item.status === "resolved" && decl.qualifiedName === qualifiedName && decl.kind === kind) {
        return narrow(decl, kind);
      }
    }
  }
  throw new Error(`'${qualifiedName}' was not resolved`);
}

function narrow<K extends Declaration["kind"]>(decl: Declaration, kind: K): Extract<Declaration, { kind: K }> {
  const isKind = (d: Declaration): d is Extract<Declaration, { kind: K }> => d.kind === kind;
  if (!isKind(decl)) throw new Error(`expected a ${kind}`);
  return decl;
}

const LIB: FileSpec = { path: [], text: "pub mod shared;\npub mod um;" };
const SHARED: FileSpec = { path: ["shared"], text: "pub type DWORD = u32;\npub type HANDLE = *mut ctypes::c_void;" };

describe("@winzig/compiler name resolution", () => {
  it("resolves types through imports, globs and super paths", () => {
    const files = resolveAll([
      LIB,
      SHARED,
      {
        path: ["um"],
        text: "use shared::DWORD;\npub struct S { a: DWORD, b: *mut super::shared::HANDLE }\npub mod inner { use shared::*; pub struct T { h: HANDLE } }",
      },
    ]);
    const s = resolved(files, "um::S", "struct");
    expect(s.fields.map((f) => f.type)).to.deep.equal([
      { kind: "named", qualifiedName: "shared::DWORD" },
      { kind: "pointer", mutable: true, pointee: { kind: "named", qualifiedName: "shared::HANDLE" } },
    ]);
    const t = resolved(files, "um::inner::T", "struct");
    expect(t.fields[0]?.type).to.deep.equal({ kind: "named", qualifiedName: "shared::HANDLE" });
    expect(resolved(files, "shared::HANDLE", "type_alias").target).to.deep.equal({
      kind: "pointer",
      mutable: true,
      pointee: { kind: "void" },
    });
  });

  it("maps C type namespaces to primitives", () => {
    const files = resolveAll([{ path: [], text: "pub type L = std::os::raw::c_long;\npub type U = libc::c_ulonglong;" }]);
    expect(resolved(files, "L", "type_alias").target).to.deep.equal({ kind: "int", width: 32, signed: true });
    expect(resolved(files, "U", "type_alias").target).to.deep.equal({ kind: "int", width: 64, signed: false });
  });

  it("folds constant expressions to their declared width", () => {
    const files = resolveAll([
      {
        path: [],
        text: "pub const A: u32 = 1 << 4;\npub const B: u8 = A as u8 | 0x0F;\npub const C: i32 = -1;\npub const D: u32 = !0;\npub const E: i8 = 0xFF;",
      },
    ]);
    const values = ["A", "B", "C", "D", "E"].map((name) => resolved(files, name, "constant").value);
    expect(values).to.deep.equal([
      { kind: "int", value: 16n },
      { kind: "int", value: 31n },
      { kind: "int", value: -1n },
      { kind: "int", value: 4294967295n },
      { kind: "int", value: -1n },
    ]);
  });

  it("reports constants that do not fit their type", () => {
    const [file] = resolveAll([{ path: [], text: "pub const WIDE: u8 = 256;" }]);
    expect(file?.items.map((i) => i.status)).to.deep.equal(["failed"]);
    expect(file?.diagnostics.map((d) => [d.code, d.qualifiedName, d.message])).to.deep.equal([
      ["WZ3005", "WIDE", "Value 256 does not fit in u8."],
    ]);
  });

  it("saturates float casts and rejects shifts past 128 bits", () => {
    const [file] = resolveAll([
      {
        path: [],
        text: [
          "pub const BIG: u64 = 1e400 as u64;",
          "pub const LOW: i8 = -1e400 as i8;",
          "pub const CLAMPED: u8 = 300.7 as u8;",
          "pub const TRUNC: i32 = -2.9 as i32;",
          "pub const FAR: u64 = 1 << 4000000000;",
          "pub const BACK: u32 = 8 >> 128;",
        ].join("\n"),
      },
    ]);
    expect(
      file?.items.map((i) => [i.decl.name, i.status === "resolved" && i.decl.kind === "constant" ? i.decl.value : i.status])
    ).to.deep.equal([
      ["BIG", { kind: "int", value: 18446744073709551615n }],
      ["LOW", { kind: "int", value: -128n }],
      ["CLAMPED", { kind: "int", value: 255n }],
      ["TRUNC", { kind: "int", value: -2n }],
      ["FAR", "failed"],
      ["BACK", "failed"],
    ]);
    expect(file?.diagnostics.map((d) => [d.code, d.qualifiedName, d.message])).to.deep.equal([
      ["WZ1008", "FAR", "Shift amount 4000000000 is out of range."],
      ["WZ1008", "BACK", "Shift amount 128 is out of range."],
    ]);
  });

  it("evaluates array lengths from constants", () => {
    const files = resolveAll([{ path: [], text: "pub const N: usize = 4;\npub struct Buf { data: [u8; N * 2] }" }]);
    expect(resolved(files, "Buf", "struct").fields[0]?.type).to.deep.equal({
      kind: "array",
      length: { kind: "int", value: 8n },
      element: { kind: "int", width: 8, signed: false },
    });
  });

  it("resolves C-like enum constants at module level and associated flags", () => {
    const files = resolveAll([
      {
        path: [],
        text: `
          ENUM!{enum COLOR { RED = 1, GREEN, }}
          pub const FAVORITE: COLOR = GREEN;
          bitflags! { pub struct Access: u32 { const READ = 1; const BOTH = Self::READ | 2; } }
        `,
      },
    ]);
    expect(resolved(files, "FAVORITE", "constant").value).to.deep.equal({ kind: "int", value: 2n });
    expect(resolved(files, "Access", "struct").associated).to.deep.equal([
      { name: "READ", value: { kind: "int", value: 1n } },
      { name: "BOTH", value: { kind: "int", value: 3n } },
    ]);
  });

  it("marks declarations with unknown names as unresolved", () => {
    const [file] = resolveAll([{ path: [], text: "pub struct U { h: HMODULE }\npub struct Fine { a: u8 }" }]);
    expect(file?.items.map((i) => [i.decl.name, i.status])).to.deep.equal([
      ["U", "unresolved"],
      ["Fine", "resolved"],
    ]);
    const [item] = file?.items ?? [];
    expect(item?.status === "unresolved" ? item.message : undefined).to.equal("Cannot resolve type 'HMODULE'.");
  });

  it("reports import cycles instead of looping", () => {
    const [file] = resolveAll([{ path: [], text: "pub use self::B as A;\npub use self::A as B;\npub struct S { x: A }" }]);
    const [item] = file?.items ?? [];
    expect(item?.status).to.equal("unresolved");
    expect(item?.status === "unresolved" ? item.message : undefined).to.equal(
      "Import 'B' is part of an import cycle."
    );
  });

  it("records public re-exports and warns about shadowed imports", () => {
    const files = resolveAll([
      LIB,
      SHARED,
      { path: ["um"], text: "pub use shared::DWORD;\npub use shared::*;\nuse shared::HANDLE;\npub struct HANDLE;" },
    ]);
    const um = files[2];
    expect(um?.reexports.map((r) => [r.alias, r.glob, r.target])).to.deep.equal([
      ["DWORD", false, { kind: "decl", qualifiedName: "shared::DWORD" }],
      ["*", true, { kind: "module", path: ["shared"] }],
    ]);
    expect(um?.diagnostics.map((d) => [d.code, d.qualifiedName, d.message])).to.deep.equal([
      ["WZ2005", "um::HANDLE", "Import 'HANDLE' is shadowed by a local declaration."],
    ]);
  });
});

describe("@winzig/compiler symbol collection", () => {
  it("reports conflicting declarations of one name", () => {
    const { collided, diagnostics } = collect([
      { path: [], text: "pub struct X { a: u8 }" },
      { path: [], text: "pub struct X { a: u16 }" },
    ]);
    expect(collided).to.equal(true);
    expect(diagnostics.map((d) => [d.code, d.qualifiedName, d.message])).to.deep.equal([
      ["WZ2001", "X", "Declaration 'X' is already declared at f0.rs:1:1."],
    ]);
  });

  it("accepts identical re-declarations", () => {
    const { collided, diagnostics, table } = collect([
      { path: [], text: "pub struct X { a: u8 }" },
      { path: [], text: "pub struct X { a: u8 }" },
    ]);
    expect(collided).to.equal(false);
    expect(diagnostics).to.deep.equal([]);
    expect([...table.declarations.keys()]).to.deep.equal(["X"]);
  });
});

describe("@winzig/compiler declaration order", () => {
  it("finds by-value cycles but not pointer ones", () => {
    const files = resolveAll([
      {
        path: [],
        text: "pub struct A { b: B }\npub struct B { a: A }\npub struct C { c: [C; 1] }\npub struct D { next: *mut D }\npub struct E { d: D }",
      },
    ]);
    const decls = files.flatMap((f) => f.items.map((i) => i.decl));
    expect(findLayoutCycles(decls)).to.deep.equal([["A", "B"], ["C"]]);
  });

  it("orders dependencies first and keeps source order otherwise", () => {
    const files = resolveAll([{ path: [], text: "pub struct E { d: D }\npub type Z = u8;\npub struct D { x: u32 }" }]);
    const decls = files.flatMap((f) => f.items.map((i) => i.decl));
    expect(orderModule(decls).map((d) => d.name)).to.deep.equal(["Z", "D", "E"]);
  });
});
