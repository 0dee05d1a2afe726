import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import type { ProjectConfig } from "../config.js";
import { CONFIG_FILE_NAME } from "../config.js";

export type InitArgs = {
  readonly dir: string;
};

export const DEFAULT_CONFIG: ProjectConfig = {
  schema: 1,
  input: "src",
  out: "zig",
  target: { arch: "x86_64" },
  unresolved: "omit",
  header: ["// Generated by winzig. Do not edit."],
};

export async function runInit(args: InitArgs): Promise<void> {
  const root = resolve(args.dir);
  const configPath = join(root, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    throw new Error(`${CONFIG_FILE_NAME} already exists in ${root}.`);
  }

  mkdirSync(join(root, DEFAULT_CONFIG.input), { recursive: true });
  writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");

  const lib = join(root, DEFAULT_CONFIG.input, "lib.rs");
  if (!existsSync(lib)) writeFileSync(lib, "// Declarations to translate.\n", "utf-8");
}
