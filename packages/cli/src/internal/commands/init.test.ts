import { expect } from "chai";
import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { loadProjectConfig } from "../config.js";
import { DEFAULT_CONFIG, runInit } from "./init.js";

describe("@winzig/cli init", () => {
  it("writes a loadable default config and a root module", async () => {
    const dir = join(mkdtempSync(join(tmpdir(), "winzig-init-")), "demo");
    await runInit({ dir });

    expect(loadProjectConfig(join(dir, "winzig.json"))).to.deep.equal(DEFAULT_CONFIG);
    expect(readFileSync(join(dir, "src", "lib.rs"), "utf-8")).to.equal("// Declarations to translate.\n");
  });

  it("refuses to overwrite an existing config", async () => {
    const dir = mkdtempSync(join(tmpdir(), "winzig-init-twice-"));
    await runInit({ dir });
    let message = "";
    try {
      await runInit({ dir });
    } catch (err: unknown) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).to.equal(`winzig.json already exists in ${dir}.`);
  });
});
