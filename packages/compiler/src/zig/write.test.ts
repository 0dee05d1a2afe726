import { expect } from "chai";

import type { ZigDecl, ZigType, ZigUnit } from "./ir.js";
import { writeZigUnit } from "./write.js";

const u32: ZigType = { kind: "int", bits: 32, signed: false };
const hwnd: ZigType = { kind: "ref", qualifiedName: "shared::windef::HWND" };

const opts = {
  refText: (qn: string) => (qn.startsWith("shared::") ? `shared.${qn.split("::").at(-1) ?? ""}` : qn),
  moduleText: (path: readonly string[]) => path.join("_"),
};

function unit(decls: readonly ZigDecl[], header: readonly string[] = []): ZigUnit {
  return { modulePath: ["um"], fileName: "um.zig", header, decls };
}

describe("@winzig/compiler zig writer", () => {
  it("writes containers, enums and one-line declarations deterministically", () => {
    const decls: ZigDecl[] = [
      { kind: "import", name: "shared", isPub: false, path: "shared.zig" },
      { kind: "opaque", name: "HWND__", isPub: true },
      { kind: "alias", name: "DWORD", isPub: true, type: u32 },
      {
        kind: "container",
        name: "POINT",
        isPub: true,
        tag: "struct",
        fields: [
          { name: "x", type: { kind: "int", bits: 32, signed: true } },
          { name: "y", type: { kind: "int", bits: 32, signed: true }, align: 8 },
        ],
        decls: [],
      },
      {
        kind: "enum",
        name: "Mode",
        isPub: true,
        tagType: { kind: "int", bits: 8, signed: false },
        fields: [
          { name: "A", value: 0n },
          { name: "B", value: 5n },
        ],
      },
      { kind: "const", name: "MAX_PATH", isPub: true, type: u32, value: { kind: "int", value: 260n } },
    ];
    const text = writeZigUnit(unit(decls, ["// Generated from winapi declarations."]), opts);
    expect(text).to.equal(
      [
        "// Generated from winapi declarations.",
        "",
        "const shared = @import(\"shared.zig\");",
        "pub const HWND__ = opaque {};",
        "pub const DWORD = u32;",
        "",
        "pub const POINT = extern struct {",
        "    x: i32,",
        "    y: i32 align(8),",
        "};",
        "",
        "pub const Mode = enum(u8) {",
        "    A = 0,",
        "    B = 5,",
        "};",
        "",
        "pub const MAX_PATH: u32 = 260;",
        "",
      ].join("\n")
    );
    expect(writeZigUnit(unit(decls, ["// Generated from winapi declarations."]), opts)).to.equal(text);
  });

  it("writes pointers, arrays and function pointers", () => {
    const decls: ZigDecl[] = [
      {
        kind: "alias",
        name: "LPCSTR",
        isPub: true,
        type: { kind: "pointer", style: "c", isConst: true, child: { kind: "int", bits: 8, signed: true } },
      },
      {
        kind: "alias",
        name: "PHWND",
        isPub: true,
        type: { kind: "pointer", style: "optional", isConst: false, child: hwnd },
      },
      { kind: "alias", name: "NAME", isPub: true, type: { kind: "array", len: 16n, child: u32 } },
      {
        kind: "alias",
        name: "WNDPROC",
        isPub: true,
        type: {
          kind: "fn",
          params: [hwnd, u32],
          ret: { kind: "prim", name: "isize" },
          callconv: "Stdcall",
          variadic: false,
          optional: true,
        },
      },
    ];
    expect(writeZigUnit(unit(decls), opts)).to.equal(
      [
        "pub const LPCSTR = [*c]const i8;",
        "pub const PHWND = ?*shared.HWND;",
        "pub const NAME = [16]u32;",
        "pub const WNDPROC = ?*const fn (shared.HWND, u32) callconv(.Stdcall) isize;",
        "",
      ].join("\n")
    );
  });

  it("writes extern functions directly or through @extern when renamed", () => {
    const decls: ZigDecl[] = [
      {
        kind: "extern_fn",
        name: "GetTickCount",
        isPub: true,
        library: "kernel32",
        params: [],
        ret: u32,
        callconv: "C",
        variadic: false,
        linkageName: "GetTickCount",
      },
      {
        kind: "extern_fn",
        name: "wsprintf",
        isPub: true,
        library: "user32",
        params: [{ name: "buf", type: { kind: "pointer", style: "optional", isConst: false, child: u32 } }],
        ret: { kind: "int", bits: 32, signed: true },
        callconv: "C",
        variadic: true,
        linkageName: "wsprintfW",
      },
    ];
    expect(writeZigUnit(unit(decls), opts)).to.equal(
      [
        'pub extern "kernel32" fn GetTickCount() callconv(.C) u32;',
        'pub const wsprintf = @extern(*const fn (?*u32, ...) callconv(.C) i32, .{ .name = "wsprintfW", .library_name = "user32" });',
        "",
      ].join("\n")
    );
  });

  it("writes constants with struct, array and enum values", () => {
    const decls: ZigDecl[] = [
      {
        kind: "const",
        name: "IID_IThing",
        isPub: true,
        doc: ["{12345678-9ABC-DEF0-0102-030405060708}"],
        type: { kind: "ref", qualifiedName: "GUID" },
        value: {
          kind: "struct",
          fields: [
            { name: "Data1", value: { kind: "int", value: 305419896n } },
            { name: "Data4", value: { kind: "array", elements: [{ kind: "int", value: 1n }, { kind: "int", value: 2n }] } },
          ],
        },
      },
      { kind: "const", name: "RATIO", isPub: false, type: { kind: "prim", name: "f64" }, value: { kind: "float", text: "2." } },
      {
        kind: "const",
        name: "DEFAULT_MODE",
        isPub: true,
        type: { kind: "ref", qualifiedName: "Mode" },
        value: { kind: "enum_from_int", value: 5n },
      },
    ];
    expect(writeZigUnit(unit(decls), opts)).to.equal(
      [
        "/// {12345678-9ABC-DEF0-0102-030405060708}",
        "pub const IID_IThing: GUID = .{ .Data1 = 305419896, .Data4 = .{ 1, 2 } };",
        "",
        "const RATIO: f64 = 2.0;",
        "pub const DEFAULT_MODE: Mode = @enumFromInt(5);",
        "",
      ].join("\n")
    );
  });

  it("writes flag structs with nested constants", () => {
    const decls: ZigDecl[] = [
      {
        kind: "container",
        name: "Access",
        isPub: true,
        tag: "struct",
        fields: [{ name: "bits", type: u32 }],
        decls: [
          {
            name: "READ",
            type: { kind: "ref", qualifiedName: "Access" },
            value: { kind: "struct", fields: [{ name: "bits", value: { kind: "int", value: 1n } }] },
          },
        ],
      },
      { kind: "container", name: "EMPTY", isPub: true, tag: "union", fields: [], decls: [] },
    ];
    expect(writeZigUnit(unit(decls), opts)).to.equal(
      [
        "pub const Access = extern struct {",
        "    bits: u32,",
        "",
        "    pub const READ: Access = .{ .bits = 1 };",
        "};",
        "",
        "pub const EMPTY = extern union {};",
        "",
      ].join("\n")
    );
  });

  it("writes module plumbing and placeholders", () => {
    const decls: ZigDecl[] = [
      { kind: "import", name: "winuser", isPub: true, path: "um/winuser.zig" },
      { kind: "usingnamespace", name: "", isPub: true, modulePath: ["shared", "minwindef"] },
      { kind: "reexport", name: "HWND", isPub: true, target: hwnd },
      { kind: "compile_error", name: "BROKEN", isPub: false, message: "unresolved reference in 'um::BROKEN'" },
    ];
    expect(writeZigUnit(unit(decls), opts)).to.equal(
      [
        'pub const winuser = @import("um/winuser.zig");',
        "pub usingnamespace shared_minwindef;",
        "pub const HWND = shared.HWND;",
        "const BROKEN = @compileError(\"unresolved reference in 'um::BROKEN'\");",
        "",
      ].join("\n")
    );
  });
});
