import { readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";

import type { Corpus, Diagnostic, SourceFile } from "@winzig/compiler";
import { parseSourceFile } from "@winzig/compiler";

export type ReadResult = {
  readonly corpus: Corpus;
  readonly diagnostics: readonly Diagnostic[];
};

const ROOT_FILES = new Set(["lib.rs", "main.rs"]);
const SKIPPED_DIRS = new Set(["target", "node_modules"]);

/**
 * Module path of a source file given its path relative to the crate root.
 *
 * `lib.rs` and `main.rs` at the top are the root module; `mod.rs` names the
 * module of its directory.
 */
export function modulePathFor(relativePath: string): readonly string[] {
  const parts = relativePath.split(/[\\/]/).filter((p) => p.length > 0);
  const last = parts.pop();
  if (last === undefined) return [];
  if (parts.length === 0 && ROOT_FILES.has(last)) return [];
  if (last === "mod.rs") return parts;
  return [...parts, last.replace(/\.rs$/, "")];
}

export function discoverSources(dir: string): readonly string[] {
  const out: string[] = [];
  const walk = (current: string): void => {
    for (const entry of readdirSync(current)) {
      if (entry.startsWith(".")) continue;
      const abs = join(current, entry);
      if (statSync(abs).isDirectory()) {
        if (!SKIPPED_DIRS.has(entry)) walk(abs);
        continue;
      }
      if (entry.endsWith(".rs")) out.push(relative(dir, abs).split(sep).join("/"));
    }
  };
  walk(dir);
  // Plain code-unit order, whatever the locale.
  return out.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function readSource(dir: string, relativePath: string): { readonly file: SourceFile; readonly diagnostics: readonly Diagnostic[] } {
  const text = readFileSync(join(dir, relativePath), "utf-8");
  return parseSourceFile(text, join(dir, relativePath), modulePathFor(relativePath));
}

export function readCorpus(dir: string): ReadResult {
  const files: SourceFile[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const rel of discoverSources(dir)) {
    const read = readSource(dir, rel);
    files.push(read.file);
    diagnostics.push(...read.diagnostics);
  }
  return { corpus: { files }, diagnostics };
}
