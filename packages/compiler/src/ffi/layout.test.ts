import { expect } from "chai";

import type { ZigDecl } from "../zig/ir.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import { guidLiteral } from "./expand/guid.js";
import type { Declaration, FfiField, FfiType, LayoutMode, StructDecl, UnionDecl } from "./ir.js";
import type { LayoutEnv, ZigLayoutEnv } from "./layout.js";
import { checkLayout, encodeConstant, layoutRecord, sourceRecordLayout } from "./layout.js";

const SPAN = { fileName: "layout.rs", line: 1, column: 1 };

const u = (width: 8 | 16 | 32 | 64): FfiType => ({ kind: "int", width, signed: false });
const named = (qualifiedName: string): FfiType => ({ kind: "named", qualifiedName });
const array = (element: FfiType, length: bigint): FfiType => ({ kind: "array", length: { kind: "int", value: length }, element });

function fields(...types: readonly [string, FfiType][]): FfiField[] {
  return types.map(([name, type]) => ({ name, type, span: SPAN }));
}

function struct(name: string, members: FfiField[], layout: LayoutMode = { kind: "c_compatible" }): StructDecl {
  return {
    kind: "struct",
    name,
    qualifiedName: name,
    modulePath: [],
    visibility: "pub",
    span: SPAN,
    layout,
    fields: members,
    associated: [],
  };
}

function env(pointerBits: 32 | 64, decls: readonly Declaration[] = []): LayoutEnv {
  const byName = new Map(decls.map((d) => [d.qualifiedName, d]));
  return { pointerBits, lookup: (qn) => byName.get(qn) };
}

function zigEnv(pointerBits: 32 | 64, decls: readonly [string, ZigDecl][] = []): ZigLayoutEnv {
  const byName = new Map(decls);
  return { pointerBits, lookup: (qn) => byName.get(qn) };
}

function check(decl: Declaration, zig?: ZigDecl, decls: readonly Declaration[] = [decl]) {
  const diagnostics = new DiagnosticsCollector();
  checkLayout(decl, zig, env(64, decls), zigEnv(64), diagnostics);
  return diagnostics.items.map((d) => [d.code, d.severity, d.message]);
}

const GUID = struct(
  "GUID",
  fields(["Data1", u(32)], ["Data2", u(16)], ["Data3", u(16)], ["Data4", array(u(8), 8n)])
);

describe("@winzig/compiler record layout", () => {
  it("places members at their alignment and pads the tail", () => {
    expect(layoutRecord([{ size: 4, align: 4 }, { size: 8, align: 8 }, { size: 4, align: 4 }], {}, false)).to.deep.equal({
      size: 24,
      align: 8,
      offsets: [0, 8, 16],
    });
  });

  it("caps alignment by the pack value and raises it by a minimum", () => {
    expect(layoutRecord([{ size: 1, align: 1 }, { size: 4, align: 4 }], { pack: 2 }, false)).to.deep.equal({
      size: 6,
      align: 2,
      offsets: [0, 2],
    });
    expect(layoutRecord([{ size: 1, align: 1 }], { minAlign: 16 }, false)).to.deep.equal({
      size: 16,
      align: 16,
      offsets: [0],
    });
  });

  it("overlays union members", () => {
    expect(layoutRecord([{ size: 1, align: 1 }, { size: 8, align: 8 }], {}, true)).to.deep.equal({
      size: 8,
      align: 8,
      offsets: [0, 0],
    });
  });

  it("sizes pointers by the target width", () => {
    const s = struct("S", fields(["a", u(32)], ["p", { kind: "pointer", mutable: true, pointee: u(8) }], ["b", u(32)]));
    expect(sourceRecordLayout(s, env(64))).to.deep.equal({ size: 24, align: 8, offsets: [0, 8, 16] });
    expect(sourceRecordLayout(s, env(32))).to.deep.equal({ size: 12, align: 4, offsets: [0, 4, 8] });
  });
});

describe("@winzig/compiler layout checks", () => {
  it("accepts the native GUID shape", () => {
    expect(check(GUID)).to.deep.equal([]);
  });

  it("rejects a GUID with the wrong fields", () => {
    const bad = struct("GUID", fields(["a", u(32)], ["b", u(32)], ["c", u(16)], ["d", array(u(8), 8n)]));
    expect(check(bad)).to.deep.equal([
      [
        "WZ4006",
        "error",
        "GUID must be {u32, u16, u16, [u8; 8]} with size 16 and align 4; found {u32, u32, u16, [u8; 8]} with size 20, align 4, offsets [0, 4, 8, 10].",
      ],
    ]);
  });

  it("compares the emitted container with the source layout", () => {
    const packed = struct("P", fields(["a", u(8)], ["b", u(32)]), { kind: "packed", pack: 1 });
    const natural: ZigDecl = {
      kind: "container",
      name: "P",
      isPub: true,
      tag: "struct",
      fields: [
        { name: "a", type: { kind: "int", bits: 8, signed: false } },
        { name: "b", type: { kind: "int", bits: 32, signed: false } },
      ],
      decls: [],
    };
    expect(check(packed, natural)).to.deep.equal([
      [
        "WZ4001",
        "error",
        "Emitted layout of 'P' (size 8, align 4, offsets [0, 4]) differs from the source (size 5, align 1, offsets [0, 1]).",
      ],
    ]);
    const aligned: ZigDecl = {
      ...natural,
      fields: [
        { name: "a", type: { kind: "int", bits: 8, signed: false } },
        { name: "b", type: { kind: "int", bits: 32, signed: false }, align: 1 },
      ],
    };
    expect(check(packed, aligned)).to.deep.equal([]);
  });

  it("warns about records without a C layout promise", () => {
    expect(check(struct("Loose", fields(["a", u(8)]), { kind: "unspecified" }))).to.deep.equal([
      [
        "WZ4003",
        "warning",
        "'Loose' has no repr(C); it is emitted with C layout, which the source does not promise.",
      ],
    ]);
    expect(check(struct("Wrap", fields(["a", u(8)]), { kind: "transparent" }))).to.deep.equal([
      [
        "WZ4002",
        "warning",
        "'Wrap' is repr(transparent); it is emitted as an extern struct with the same single field.",
      ],
    ]);
  });

  it("reports contradictory repr attributes", () => {
    const conflicted: StructDecl = { ...struct("Q", fields(["a", u(8)])), reprConflict: "packed with align" };
    expect(check(conflicted)).to.deep.equal([
      ["WZ4004", "error", "Contradictory layout attributes on 'Q': packed with align."],
    ]);
  });

  it("checks declared union storage against the fields", () => {
    const union: UnionDecl = {
      kind: "union",
      name: "U",
      qualifiedName: "U",
      modulePath: [],
      visibility: "pub",
      span: SPAN,
      layout: { kind: "c_compatible" },
      fields: fields(["a", u(32)]),
      storage: { bits32: { element: u(32), count: 1n }, bits64: { element: u(64), count: 2n } },
    };
    expect(check(union)).to.deep.equal([
      ["WZ4005", "error", "Declared storage of 'U' is size 16, align 8; the fields need size 4, align 4."],
    ]);
  });

  it("warns when an enum width is implicit", () => {
    const decl: Declaration = {
      kind: "enum",
      name: "Mode",
      qualifiedName: "Mode",
      modulePath: [],
      visibility: "pub",
      span: SPAN,
      style: "tagged",
      discriminantType: { kind: "int", width: 32, signed: true },
      explicitWidth: false,
      variants: [],
    };
    expect(check(decl)).to.deep.equal([
      ["WZ4007", "warning", "Enum 'Mode' has no integer repr; its discriminant is emitted as i32."],
    ]);
  });
});

describe("@winzig/compiler constant images", () => {
  it("encodes a GUID in its native byte order", () => {
    const value = guidLiteral({ data1: 0x12345678n, data2: 0x9abcn, data3: 0xdef0n, data4: [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n] });
    const image = encodeConstant(value, named("GUID"), env(64, [GUID]));
    expect(image ? [...image] : undefined).to.deep.equal([
      0x78, 0x56, 0x34, 0x12, 0xbc, 0x9a, 0xf0, 0xde, 1, 2, 3, 4, 5, 6, 7, 8,
    ]);
  });

  it("encodes integers and floats little-endian", () => {
    const i16: FfiType = { kind: "int", width: 16, signed: true };
    const image = encodeConstant({ kind: "int", value: -2n }, i16, env(64));
    expect(image ? [...image] : undefined).to.deep.equal([0xfe, 0xff]);
    const float = encodeConstant({ kind: "float", text: "1.5" }, { kind: "float", bits: 32 }, env(64));
    expect(float ? [...float] : undefined).to.deep.equal([0x00, 0x00, 0xc0, 0x3f]);
  });

  it("has no image for unsized types", () => {
    expect(encodeConstant({ kind: "int", value: 1n }, named("Missing"), env(64))).to.equal(undefined);
  });
});
