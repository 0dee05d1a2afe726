import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import type { CfgOverrides, PointerSyntax, ProfileOverrides, TargetArch, UnresolvedPolicy } from "@winzig/compiler";
import { asRecord, asString, asStringArray, asStringMap, asWidths } from "@winzig/compiler";

export const CONFIG_FILE_NAME = "winzig.json";

export type TargetConfig = {
  readonly arch: TargetArch;
  readonly pointerSyntax?: PointerSyntax;
  readonly overrides?: Omit<ProfileOverrides, "pointerSyntax">;
};

export type ProjectConfig = {
  readonly schema: 1;
  readonly input: string;
  readonly out: string;
  readonly target: TargetConfig;
  readonly link?: {
    readonly defaultLibrary?: string;
  };
  readonly unresolved: UnresolvedPolicy;
  readonly cfg?: CfgOverrides;
  readonly header?: readonly string[];
};

export type ProjectContext = {
  readonly projectRoot: string;
  readonly configPath: string;
  readonly config: ProjectConfig;
};

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asLines(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array of strings.`);
  }
  return value.map((entry, i) => {
    if (typeof entry !== "string") throw new Error(`${label}[${i}] must be a string.`);
    return entry;
  });
}

function parseOverrides(value: unknown): Omit<ProfileOverrides, "pointerSyntax"> {
  const label = `${CONFIG_FILE_NAME}: 'target.overrides'`;
  const raw = asRecord(value, label);
  assertKnownKeys(raw, ["integerWidths", "callingConventions", "reservedWords"], label);

  return {
    ...(raw.integerWidths !== undefined ? { integerWidths: asWidths(raw.integerWidths, `${label}.integerWidths`) } : {}),
    ...(raw.callingConventions !== undefined
      ? { callingConventions: asStringMap(raw.callingConventions, `${label}.callingConventions`) }
      : {}),
    ...(raw.reservedWords !== undefined ? { reservedWords: asStringArray(raw.reservedWords, `${label}.reservedWords`) } : {}),
  };
}

function parseTarget(value: unknown): TargetConfig {
  const label = `${CONFIG_FILE_NAME}: 'target'`;
  const target = asRecord(value, label);
  assertKnownKeys(target, ["arch", "pointerSyntax", "overrides"], label);

  const arch = target.arch;
  if (arch !== "x86_64" && arch !== "x86") {
    throw new Error(`${label}.arch must be 'x86_64' or 'x86'.`);
  }
  const pointerSyntax = target.pointerSyntax;
  if (pointerSyntax !== undefined && pointerSyntax !== "optional_single" && pointerSyntax !== "c_pointer") {
    throw new Error(`${label}.pointerSyntax must be 'optional_single' or 'c_pointer'.`);
  }

  return {
    arch,
    ...(pointerSyntax !== undefined ? { pointerSyntax } : {}),
    ...(target.overrides !== undefined ? { overrides: parseOverrides(target.overrides) } : {}),
  };
}

function parseCfg(value: unknown): CfgOverrides {
  const label = `${CONFIG_FILE_NAME}: 'cfg'`;
  const raw = asRecord(value, label);
  const out: Record<string, string | boolean | readonly string[]> = {};
  for (const key of Object.keys(raw)) {
    const entry = raw[key];
    if (typeof entry === "boolean") out[key] = entry;
    else if (typeof entry === "string") out[key] = entry;
    else if (Array.isArray(entry)) out[key] = asStringArray(entry, `${label}.${key}`);
    else throw new Error(`${label}.${key} must be a boolean, a string or an array of strings.`);
  }
  return out;
}

export function parseProjectConfig(value: unknown): ProjectConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "input", "out", "target", "link", "unresolved", "cfg", "header"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }

  const input = asString(root.input, `${CONFIG_FILE_NAME}: 'input'`);
  const out = asString(root.out, `${CONFIG_FILE_NAME}: 'out'`);
  const target = parseTarget(root.target);

  let link: ProjectConfig["link"];
  if (root.link !== undefined) {
    const raw = asRecord(root.link, `${CONFIG_FILE_NAME}: 'link'`);
    assertKnownKeys(raw, ["defaultLibrary"], `${CONFIG_FILE_NAME}: 'link'`);
    link =
      raw.defaultLibrary === undefined
        ? {}
        : { defaultLibrary: asString(raw.defaultLibrary, `${CONFIG_FILE_NAME}: 'link.defaultLibrary'`) };
  }

  const unresolved = root.unresolved ?? "omit";
  if (unresolved !== "omit" && unresolved !== "placeholder") {
    throw new Error(`${CONFIG_FILE_NAME}: 'unresolved' must be 'omit' or 'placeholder'.`);
  }

  return {
    schema: 1,
    input,
    out,
    target,
    ...(link ? { link } : {}),
    unresolved,
    ...(root.cfg !== undefined ? { cfg: parseCfg(root.cfg) } : {}),
    ...(root.header !== undefined ? { header: asLines(root.header, `${CONFIG_FILE_NAME}: 'header'`) } : {}),
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function loadProjectConfig(path: string): ProjectConfig {
  return parseProjectConfig(readJson(path));
}

export function findProjectRoot(fromDir: string): string {
  let cur = resolve(fromDir);
  while (true) {
    try {
      readFileSync(join(cur, CONFIG_FILE_NAME), "utf-8");
      return cur;
    } catch (err: unknown) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
    }
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  throw new Error(`Could not find ${CONFIG_FILE_NAME} in this directory or any parent.`);
}

export function loadProjectContext(fromDir: string, configPath?: string): ProjectContext {
  const path = configPath ? resolve(fromDir, configPath) : join(findProjectRoot(fromDir), CONFIG_FILE_NAME);
  return { projectRoot: dirname(path), configPath: path, config: loadProjectConfig(path) };
}
