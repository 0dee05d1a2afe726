import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { discoverSources, modulePathFor, readCorpus } from "./corpus.js";

describe("@winzig/reader corpus", () => {
  it("maps file paths to module paths", () => {
    expect(modulePathFor("lib.rs")).to.deep.equal([]);
    expect(modulePathFor("main.rs")).to.deep.equal([]);
    expect(modulePathFor("um/mod.rs")).to.deep.equal(["um"]);
    expect(modulePathFor("um/winuser.rs")).to.deep.equal(["um", "winuser"]);
    expect(modulePathFor("shared\\lib.rs")).to.deep.equal(["shared", "lib"]);
  });

  it("discovers sources in a stable order", () => {
    const root = mkdtempSync(join(tmpdir(), "winzig-reader-discover-"));
    mkdirSync(join(root, "um"), { recursive: true });
    mkdirSync(join(root, "target"), { recursive: true });
    writeFileSync(join(root, "lib.rs"), "pub mod um;\n", "utf-8");
    writeFileSync(join(root, "um", "mod.rs"), "", "utf-8");
    writeFileSync(join(root, "um", "winuser.rs"), "", "utf-8");
    writeFileSync(join(root, "um", "notes.txt"), "", "utf-8");
    writeFileSync(join(root, "target", "stale.rs"), "", "utf-8");

    expect(discoverSources(root)).to.deep.equal(["lib.rs", "um/mod.rs", "um/winuser.rs"]);
  });

  it("orders sources by code unit, not by locale", () => {
    const root = mkdtempSync(join(tmpdir(), "winzig-reader-order-"));
    for (const name of ["a.rs", "B.rs", "_x.rs", "Z.rs"]) writeFileSync(join(root, name), "", "utf-8");

    expect(discoverSources(root)).to.deep.equal(["B.rs", "Z.rs", "_x.rs", "a.rs"]);
  });

  it("reads a corpus and collects parse diagnostics", () => {
    const root = mkdtempSync(join(tmpdir(), "winzig-reader-corpus-"));
    mkdirSync(join(root, "shared"), { recursive: true });
    writeFileSync(join(root, "lib.rs"), "pub mod shared;\n", "utf-8");
    writeFileSync(join(root, "shared", "mod.rs"), "pub type DWORD = u32;\npub struct ;\n", "utf-8");

    const { corpus, diagnostics } = readCorpus(root);
    expect(corpus.files.map((f) => [f.fileName, f.modulePath, f.items.map((i) => i.kind)])).to.deep.equal([
      [join(root, "lib.rs"), [], ["mod"]],
      [join(root, "shared", "mod.rs"), ["shared"], ["type"]],
    ]);
    expect(diagnostics.map((d) => [d.code, d.message, d.span?.line])).to.deep.equal([
      ["WZ0101", "Expected struct name.", 2],
    ]);
  });
});
