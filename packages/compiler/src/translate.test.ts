import { expect } from "chai";

import { parseSourceFile } from "./ffi/lexer.js";
import { zigProfile } from "./ffi/profile.js";
import type { TargetArch } from "./ffi/profile.js";
import type { Corpus } from "./ffi/syntax.js";
import type { TranslateOptions } from "./translate.js";
import { relativeImport, translate, unitFileName } from "./translate.js";

type FileSpec = { readonly path: readonly string[]; readonly text: string };

function corpusOf(files: readonly FileSpec[]): Corpus {
  return {
    files: files.map((f, i) => {
      const { file, diagnostics } = parseSourceFile(f.text, `f${i}.rs`, f.path);
      expect(diagnostics).to.deep.equal([]);
      return file;
    }),
  };
}

function run(files: readonly FileSpec[], options: TranslateOptions = {}, arch: TargetArch = "x86_64") {
  return translate(corpusOf(files), zigProfile(arch), options);
}

function rootText(text: string, options: TranslateOptions = {}, arch: TargetArch = "x86_64") {
  const result = run([{ path: [], text }], options, arch);
  const root = result.modules.find((m) => m.modulePath.length === 0);
  return { text: root?.text, diagnostics: result.diagnostics.map((d) => [d.code, d.qualifiedName, d.message]) };
}

const lines = (...parts: string[]) => parts.join("\n");

const CURSOR = `
pub type DWORD = u32;
STRUCT!{struct POINT { x: i32, y: i32, }}
#[link(name = "user32")]
extern "system" {
    pub fn GetCursorPos(lpPoint: *mut POINT) -> i32;
}
`;

describe("@winzig/compiler translate", () => {
  it("names unit files after their module path", () => {
    expect(unitFileName([])).to.equal("root.zig");
    expect(unitFileName(["um", "winuser"])).to.equal("um/winuser.zig");
    expect(relativeImport([], ["um"])).to.equal("um.zig");
    expect(relativeImport(["um"], ["um", "winuser"])).to.equal("um/winuser.zig");
    expect(relativeImport(["um", "winuser"], ["shared", "windef"])).to.equal("../shared/windef.zig");
    expect(relativeImport(["um", "winuser"], [])).to.equal("../root.zig");
  });

  it("translates structs, aliases and extern functions in source order", () => {
    const { text, diagnostics } = rootText(CURSOR);
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const DWORD = u32;",
        "",
        "pub const POINT = extern struct {",
        "    x: i32,",
        "    y: i32,",
        "};",
        "",
        'pub extern "user32" fn GetCursorPos(lpPoint: ?*POINT) callconv(.C) i32;',
        ""
      )
    );
  });

  it("uses the stdcall convention on 32-bit x86 only", () => {
    const on32 = rootText(CURSOR, {}, "x86");
    expect(on32.text?.split("\n").at(-2)).to.equal(
      'pub extern "user32" fn GetCursorPos(lpPoint: ?*POINT) callconv(.Stdcall) i32;'
    );
  });

  it("is deterministic", () => {
    const files = [{ path: [], text: CURSOR }];
    expect(run(files)).to.deep.equal(run(files));
  });

  it("splits modules into units that import each other", () => {
    const result = run([
      { path: [], text: "pub mod shared;\npub mod um;" },
      { path: ["shared"], text: "pub type DWORD = u32;\nDECLARE_HANDLE!{HWND, HWND__}" },
      {
        path: ["um"],
        text: 'use shared::HWND;\npub use shared::DWORD;\n#[link(name = "user32")]\nextern "system" {\n    pub fn GetWindowLongW(hWnd: HWND, nIndex: i32) -> DWORD;\n}',
      },
    ]);
    expect(result.aborted).to.equal(false);
    expect(result.diagnostics).to.deep.equal([]);
    expect(result.modules.map((m) => [m.fileName, m.text])).to.deep.equal([
      ["root.zig", lines('pub const shared = @import("shared.zig");', 'pub const um = @import("um.zig");', "")],
      ["shared.zig", lines("pub const DWORD = u32;", "pub const HWND__ = opaque {};", "pub const HWND = ?*HWND__;", "")],
      [
        "um.zig",
        lines(
          'const shared = @import("shared.zig");',
          "pub const DWORD = shared.DWORD;",
          'pub extern "user32" fn GetWindowLongW(hWnd: shared.HWND, nIndex: i32) callconv(.C) shared.DWORD;',
          ""
        ),
      ],
    ]);
  });

  it("aborts without output when two declarations collide", () => {
    const result = run([
      { path: [], text: "pub struct X { a: u8 }" },
      { path: [], text: "pub struct X { a: u16 }" },
    ]);
    expect(result.aborted).to.equal(true);
    expect(result.modules).to.deep.equal([]);
    expect(result.diagnostics.map((d) => d.code)).to.deep.equal(["WZ2001"]);
  });

  it("drops by-value cycles and the declarations that need them", () => {
    const { text, diagnostics } = rootText(
      "#[repr(C)] pub struct A { b: B }\n#[repr(C)] pub struct B { a: A }\n#[repr(C)] pub struct C { a: A }\n#[repr(C)] pub struct D { x: u8 }"
    );
    expect(diagnostics).to.deep.equal([
      ["WZ2003", "A", "'A' contains itself by value: A -> B -> A."],
      ["WZ2003", "B", "'B' contains itself by value: A -> B -> A."],
      ["WZ3004", "C", "'A' is not a known declaration."],
    ]);
    expect(text).to.equal(lines("pub const D = extern struct {", "    x: u8,", "};", ""));
  });

  it("allows a record to point at itself", () => {
    const { text, diagnostics } = rootText("#[repr(C)] pub struct NODE { next: *mut NODE, value: u32 }");
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(lines("pub const NODE = extern struct {", "    next: ?*NODE,", "    value: u32,", "};", ""));
  });

  it("keeps translating around an unsupported macro", () => {
    const { text, diagnostics } = rootText(
      "STRUCT!{struct A { x: u8, }}\nDECLARE_INTERFACE!{interface IThing(IThingVtbl): IUnknown {}}\npub type B = u16;"
    );
    expect(diagnostics).to.deep.equal([
      ["WZ1001", "IThing", "Macro 'DECLARE_INTERFACE!' has no expansion rule; item skipped."],
    ]);
    expect(text).to.equal(lines("pub const A = extern struct {", "    x: u8,", "};", "", "pub const B = u16;", ""));
  });

  it("emits nine of ten declarations when one macro is unsupported", () => {
    const items = Array.from({ length: 9 }, (_, i) => `pub type T${i} = u8;`);
    items.splice(4, 0, "DECLARE_INTERFACE!{interface IThing(IThingVtbl): IUnknown {}}");
    const { text, diagnostics } = rootText(items.join("\n"));
    expect(diagnostics.map(([code]) => code)).to.deep.equal(["WZ1001"]);
    expect(text).to.equal(lines(...Array.from({ length: 9 }, (_, i) => `pub const T${i} = u8;`), ""));
  });

  it("keeps parameter order, constness, convention and linkage of CreateFileW", () => {
    const source = [
      "pub type HANDLE = *mut c_void;",
      "pub type DWORD = u32;",
      "pub type LPCWSTR = *const u16;",
      "#[repr(C)] pub struct SECURITY_ATTRIBUTES { nLength: DWORD, lpSecurityDescriptor: *mut c_void, bInheritHandle: i32 }",
      '#[link(name = "kernel32")]',
      'extern "system" {',
      "    pub fn CreateFileW(lpFileName: LPCWSTR, dwDesiredAccess: DWORD, dwShareMode: DWORD, lpSecurityAttributes: *mut SECURITY_ATTRIBUTES, dwCreationDisposition: DWORD) -> HANDLE;",
      "}",
    ].join("\n");
    const { text, diagnostics } = rootText(source, {}, "x86");
    expect(diagnostics).to.deep.equal([]);
    const out = text?.split("\n") ?? [];
    expect(out).to.include("pub const HANDLE = ?*anyopaque;");
    expect(out).to.include("pub const LPCWSTR = ?*const u16;");
    expect(out.at(-2)).to.equal(
      'pub extern "kernel32" fn CreateFileW(lpFileName: LPCWSTR, dwDesiredAccess: DWORD, dwShareMode: DWORD, lpSecurityAttributes: ?*SECURITY_ATTRIBUTES, dwCreationDisposition: DWORD) callconv(.Stdcall) HANDLE;'
    );
  });

  it("omits unresolved declarations and everything that depends on them", () => {
    const { text, diagnostics } = rootText("#[repr(C)] pub struct U { h: HANDLE }\npub type PU = *mut U;\npub type Fine = u8;");
    expect(diagnostics).to.deep.equal([
      ["WZ2002", "U", "Cannot resolve type 'HANDLE'."],
      ["WZ3004", "PU", "'U' is not a known declaration."],
    ]);
    expect(text).to.equal(lines("pub const Fine = u8;", ""));
  });

  it("emits compile-error placeholders when asked", () => {
    const { text, diagnostics } = rootText(
      "#[repr(C)] pub struct U { h: HANDLE }\npub type PU = *mut U;\npub type Fine = u8;",
      { unresolved: "placeholder" }
    );
    expect(diagnostics).to.deep.equal([["WZ2002", "U", "Cannot resolve type 'HANDLE'."]]);
    expect(text).to.equal(
      lines(
        "pub const PU = ?*U;",
        "pub const Fine = u8;",
        "const U = @compileError(\"unresolved reference in 'U': Cannot resolve type 'HANDLE'.\");",
        ""
      )
    );
  });

  it("renames identifiers the target reserves", () => {
    const { text, diagnostics } = rootText("#[repr(C)] pub struct error { r#type: u32 }");
    expect(diagnostics).to.deep.equal([["WZ5001", "error", "'error' is emitted as 'error_'."]]);
    expect(text).to.equal(lines("pub const error_ = extern struct {", "    type_: u32,", "};", ""));
  });

  it("binds renamed symbols through @extern", () => {
    const { text } = rootText('extern "C" {\n    #[link_name = "wsprintfW"]\n    pub fn wsprintf(buf: *mut u16, ...) -> i32;\n}');
    expect(text).to.equal(
      lines('pub const wsprintf = @extern(*const fn (?*u16, ...) callconv(.C) i32, .{ .name = "wsprintfW" });', "")
    );
  });

  it("rejects variadic functions without the C convention", () => {
    const { text, diagnostics } = rootText('extern "system" {\n    pub fn logf(fmt: *const u8, ...);\n}', {}, "x86");
    expect(diagnostics).to.deep.equal([["WZ3002", "logf", "Variadic function 'logf' needs the C convention."]]);
    expect(text).to.equal("");
  });

  it("emits GUID constants with their canonical form", () => {
    const { text, diagnostics } = rootText(
      "STRUCT!{struct GUID { Data1: u32, Data2: u16, Data3: u16, Data4: [u8; 8], }}\nDEFINE_GUID!{IID_IThing, 0x12345678, 0x9ABC, 0xDEF0, 1, 2, 3, 4, 5, 6, 7, 8}"
    );
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const GUID = extern struct {",
        "    Data1: u32,",
        "    Data2: u16,",
        "    Data3: u16,",
        "    Data4: [8]u8,",
        "};",
        "",
        "/// {12345678-9ABC-DEF0-0102-030405060708}",
        "pub const IID_IThing: GUID = .{ .Data1 = 305419896, .Data2 = 39612, .Data3 = 57072, .Data4 = .{ 1, 2, 3, 4, 5, 6, 7, 8 } };",
        ""
      )
    );
  });

  it("emits C-like enums as an alias plus constants and fieldless enums as enums", () => {
    const { text, diagnostics } = rootText(
      "ENUM!{enum COLOR { RED = 1, GREEN, }}\n#[repr(u8)] pub enum Mode { A, B = 5 }\npub const DEFAULT: Mode = Mode::B;"
    );
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const COLOR = u32;",
        "pub const RED: COLOR = 1;",
        "pub const GREEN: COLOR = 2;",
        "",
        "pub const Mode = enum(u8) {",
        "    A = 0,",
        "    B = 5,",
        "};",
        "",
        "pub const DEFAULT: Mode = @enumFromInt(5);",
        ""
      )
    );
  });

  it("emits flags as a struct with typed constants", () => {
    const { text } = rootText("bitflags! { pub struct Access: u32 { const READ = 1; const WRITE = 2; } }");
    expect(text).to.equal(
      lines(
        "pub const Access = extern struct {",
        "    bits: u32,",
        "",
        "    pub const READ: Access = .{ .bits = 1 };",
        "    pub const WRITE: Access = .{ .bits = 2 };",
        "};",
        ""
      )
    );
  });

  it("folds flags combined through .bits", () => {
    const { text, diagnostics } = rootText(
      "bitflags! { pub struct Access: u32 { const R = 1; const W = 2; const RW = Self::R.bits | Self::W.bits; const ALL = Self::RW.bits() | 4; } }"
    );
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const Access = extern struct {",
        "    bits: u32,",
        "",
        "    pub const R: Access = .{ .bits = 1 };",
        "    pub const W: Access = .{ .bits = 2 };",
        "    pub const RW: Access = .{ .bits = 3 };",
        "    pub const ALL: Access = .{ .bits = 7 };",
        "};",
        ""
      )
    );
  });

  it("uses emitted field names in struct literals", () => {
    const { text, diagnostics } = rootText(
      "#[repr(C)] pub struct S { r#type: u32, align: u16 }\npub const C: S = S { r#type: 1, align: 2 };"
    );
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const S = extern struct {",
        "    type_: u32,",
        "    align_: u16,",
        "};",
        "",
        "pub const C: S = .{ .type_ = 1, .align_ = 2 };",
        ""
      )
    );
  });

  it("treats only Data1..Data4 records as GUIDs", () => {
    const { text, diagnostics } = rootText(
      "#[repr(C)] pub struct Q { a: u32, b: u32, c: u32, d: [u8; 8] }\npub const X: Q = Q { a: 1, b: 2, c: 3, d: [1, 2, 3, 4, 5, 6, 7, 8] };"
    );
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(
      lines(
        "pub const Q = extern struct {",
        "    a: u32,",
        "    b: u32,",
        "    c: u32,",
        "    d: [8]u8,",
        "};",
        "",
        "pub const X: Q = .{ .a = 1, .b = 2, .c = 3, .d = .{ 1, 2, 3, 4, 5, 6, 7, 8 } };",
        ""
      )
    );
  });

  it("reports malformed macro bodies and keeps the other items", () => {
    const { text, diagnostics } = rootText(
      [
        "STRUCT!{struct A { x: u8 y: u8, }}",
        "ENUM!{enum E { A = 1 B, }}",
        "FN!{stdcall}",
        "UNION!{union U { a: u32 b: u16, }}",
        "pub type Ok = u8;",
      ].join("\n")
    );
    expect(diagnostics).to.deep.equal([
      ["WZ1002", undefined, "Unexpected tokens after field type."],
      ["WZ1002", undefined, "Unexpected tokens after variant 'A'."],
      ["WZ1002", undefined, "Expected function pointer name."],
      ["WZ1002", undefined, "Unexpected tokens after union field type."],
    ]);
    expect(text).to.equal(lines("pub const Ok = u8;", ""));
  });

  it("applies cfg_attr layout attributes for the selected architecture", () => {
    const source = 'STRUCT!{#[cfg_attr(target_arch = "x86", repr(packed))] struct P { a: u16, b: u32, }}';
    const on32 = rootText(source, {}, "x86");
    expect(on32.diagnostics).to.deep.equal([]);
    expect(on32.text).to.equal(
      lines("pub const P = extern struct {", "    a: u16 align(1),", "    b: u32 align(1),", "};", "")
    );
    const on64 = rootText(source);
    expect(on64.diagnostics).to.deep.equal([]);
    expect(on64.text).to.equal(lines("pub const P = extern struct {", "    a: u16,", "    b: u32,", "};", ""));
  });

  it("reports layout attributes behind an unsupported cfg_attr predicate", () => {
    const { text, diagnostics } = rootText("#[cfg_attr(vendor(x), repr(packed))]\n#[repr(C)] pub struct Q { a: u8 }");
    expect(diagnostics).to.deep.equal([
      ["WZ4004", "Q", "Layout attribute 'repr' depends on unsupported cfg_attr predicate 'vendor(...)'; not applied."],
    ]);
    expect(text).to.equal(lines("pub const Q = extern struct {", "    a: u8,", "};", ""));
  });

  it("lowers packed records with explicit field alignment", () => {
    const { text, diagnostics } = rootText("#[repr(C, packed)] pub struct P { a: u8, b: u32 }");
    expect(diagnostics).to.deep.equal([]);
    expect(text).to.equal(lines("pub const P = extern struct {", "    a: u8,", "    b: u32 align(1),", "};", ""));
  });

  it("applies cfg overrides and the header", () => {
    const source = '#[cfg(feature = "winuser")] pub type A = u8;';
    expect(rootText(source).text).to.equal("");
    expect(rootText(source, { cfg: { feature: ["winuser"] }, header: ["// Generated file."] }).text).to.equal(
      lines("// Generated file.", "", "pub const A = u8;", "")
    );
  });
});
