import type { CfgOverrides } from "./ffi/cfg.js";
import { defaultCfg, withOverrides } from "./ffi/cfg.js";
import type { Diagnostic } from "./ffi/diagnostics.js";
import { DiagnosticsCollector, TranslateError } from "./ffi/diagnostics.js";
import { expandFile } from "./ffi/expand/index.js";
import type { Declaration, ExpandedFile } from "./ffi/ir.js";
import { moduleKey } from "./ffi/ir.js";
import type { LayoutEnv, ZigLayoutEnv } from "./ffi/layout.js";
import { checkLayout } from "./ffi/layout.js";
import { findLayoutCycles, orderModule } from "./ffi/order.js";
import type { TargetProfile } from "./ffi/profile.js";
import type { Reexport, ResolvedFile } from "./ffi/resolve.js";
import { resolveFilePass } from "./ffi/resolve.js";
import { collectSymbolsPass } from "./ffi/symbols.js";
import type { Corpus } from "./ffi/syntax.js";
import { mapType } from "./ffi/type-mapping.js";
import type { ZigDecl, ZigType, ZigUnit } from "./zig/ir.js";
import type { LowerContext, LoweredDecl } from "./zig/lower.js";
import { lowerDeclaration } from "./zig/lower.js";
import type { NameRequest } from "./zig/naming.js";
import { assignNames, renameMembers } from "./zig/naming.js";
import { writeZigUnit } from "./zig/write.js";

export type UnresolvedPolicy = "omit" | "placeholder";

export type TranslateOptions = {
  readonly unresolved?: UnresolvedPolicy;
  readonly defaultLibrary?: string;
  readonly cfg?: CfgOverrides;
  readonly header?: readonly string[];
};

export type EmittedModule = {
  readonly modulePath: readonly string[];
  readonly fileName: string;
  readonly text: string;
};

export type TranslateResult = {
  readonly modules: readonly EmittedModule[];
  readonly diagnostics: readonly Diagnostic[];
  // Set when a name collision stopped the run after collection.
  readonly aborted: boolean;
};

export function unitFileName(modulePath: readonly string[]): string {
  return modulePath.length === 0 ? "root.zig" : `${modulePath.join("/")}.zig`;
}

// Path of `to`'s unit as written in an @import inside `from`'s unit.
export function relativeImport(from: readonly string[], to: readonly string[]): string {
  const fromDir = from.slice(0, -1);
  const target = unitFileName(to).split("/");
  let common = 0;
  while (common < fromDir.length && common < target.length - 1 && fromDir[common] === target[common]) common++;
  return [...fromDir.slice(common).map(() => ".."), ...target.slice(common)].join("/");
}

function parentKey(key: string): string | undefined {
  if (key === "") return undefined;
  const at = key.lastIndexOf("::");
  return at === -1 ? "" : key.slice(0, at);
}

function splitKey(key: string): string[] {
  return key === "" ? [] : key.split("::");
}

function typeRefs(type: ZigType, out: Set<string>): void {
  switch (type.kind) {
    case "ref":
      out.add(type.qualifiedName);
      return;
    case "pointer":
    case "array":
      typeRefs(type.child, out);
      return;
    case "fn":
      for (const p of type.params) typeRefs(p, out);
      typeRefs(type.ret, out);
      return;
    default:
      return;
  }
}

function declRefs(decl: ZigDecl): Set<string> {
  const out = new Set<string>();
  switch (decl.kind) {
    case "container":
      for (const f of decl.fields) typeRefs(f.type, out);
      for (const c of decl.decls) typeRefs(c.type, out);
      break;
    case "enum":
      typeRefs(decl.tagType, out);
      break;
    case "alias":
    case "const":
      typeRefs(decl.type, out);
      break;
    case "extern_fn":
      for (const p of decl.params) typeRefs(p.type, out);
      typeRefs(decl.ret, out);
      break;
    case "reexport":
      typeRefs(decl.target, out);
      break;
    default:
      break;
  }
  return out;
}

type PendingDecl = {
  readonly key: string;
  readonly decl: ZigDecl;
};

type UnitPlan = {
  readonly modulePath: readonly string[];
  readonly decls: PendingDecl[];
  readonly modulesUsed: Set<string>;
};

export function translate(corpus: Corpus, profile: TargetProfile, options: TranslateOptions = {}): TranslateResult {
  const bits = profile.nativePointer.bits;
  const diagnostics = new DiagnosticsCollector();
  const placeholders = options.unresolved === "placeholder";
  const expandOptions = {
    cfg: withOverrides(defaultCfg(bits), options.cfg),
    ...(options.defaultLibrary !== undefined ? { defaultLibrary: options.defaultLibrary } : {}),
  };

  const expanded: ExpandedFile[] = corpus.files.map((file) => {
    const result = expandFile(file, expandOptions);
    diagnostics.append(result.diagnostics);
    return result.expanded;
  });

  // Barrier: the table is complete and read-only from here on.
  const collected = collectSymbolsPass(expanded);
  diagnostics.append(collected.diagnostics);
  if (collected.collided) return { modules: [], diagnostics: diagnostics.items, aborted: true };
  const table = collected.table;

  const resolvedFiles: ResolvedFile[] = expanded.map((file) => resolveFilePass(file, table, bits));
  const resolved = new Map<string, Declaration>();
  const unresolved = new Map<string, { readonly decl: Declaration; readonly message: string }>();
  for (const file of resolvedFiles) {
    diagnostics.append(file.diagnostics);
    for (const item of file.items) {
      if (item.status === "resolved") resolved.set(item.decl.qualifiedName, item.decl);
      else if (item.status === "unresolved" && placeholders) unresolved.set(item.decl.qualifiedName, item);
    }
  }

  for (const cycle of findLayoutCycles([...resolved.values()])) {
    const chain = [...cycle, cycle[0]].join(" -> ");
    for (const qn of cycle) {
      const decl = resolved.get(qn);
      diagnostics.report("WZ2003", `'${qn}' contains itself by value: ${chain}.`, {
        qualifiedName: qn,
        ...(decl ? { span: decl.span } : {}),
      });
      resolved.delete(qn);
    }
  }

  const layoutEnv: LayoutEnv = { pointerBits: bits, lookup: (qn) => resolved.get(qn) };
  const lowerCtx: LowerContext = {
    profile,
    layout: layoutEnv,
    lookup: (qn) => resolved.get(qn) ?? unresolved.get(qn)?.decl,
  };

  const lowered = new Map<string, readonly LoweredDecl[]>();
  for (const decl of resolved.values()) {
    if (decl.kind === "module") continue;
    try {
      lowered.set(decl.qualifiedName, lowerDeclaration(lowerCtx, decl));
    } catch (error) {
      if (!(error instanceof TranslateError)) throw error;
      diagnostics.report(error.code, error.message, {
        qualifiedName: decl.qualifiedName,
        span: error.span ?? decl.span,
      });
    }
  }

  // Drop declarations that reference something that will not be emitted,
  // until nothing changes.
  const emitted = new Set<string>(unresolved.keys());
  for (const group of lowered.values()) for (const l of group) emitted.add(l.qualifiedName);
  for (let changed = true; changed; ) {
    changed = false;
    for (const [qn, group] of lowered) {
      const missing = group.flatMap((l) => [...declRefs(l.decl)]).find((ref) => !emitted.has(ref));
      if (missing === undefined) continue;
      const decl = resolved.get(qn);
      diagnostics.report("WZ3004", `'${qn}' refers to '${missing}', which is not emitted.`, {
        qualifiedName: qn,
        ...(decl ? { span: decl.span } : {}),
      });
      lowered.delete(qn);
      for (const l of group) emitted.delete(l.qualifiedName);
      changed = true;
    }
  }

  const zigDecls = new Map<string, ZigDecl>();
  for (const group of lowered.values()) for (const l of group) zigDecls.set(l.qualifiedName, l.decl);
  const zigEnv: ZigLayoutEnv = { pointerBits: bits, lookup: (qn) => zigDecls.get(qn) };
  for (const decl of resolved.values()) {
    if (!lowered.has(decl.qualifiedName)) continue;
    checkLayout(decl, zigDecls.get(decl.qualifiedName), layoutEnv, zigEnv, diagnostics);
  }

  // Units
  const moduleOf = new Map<string, string>();
  const plans = new Map<string, UnitPlan>();
  for (const key of [...table.modules].sort()) {
    plans.set(key, { modulePath: splitKey(key), decls: [], modulesUsed: new Set() });
  }
  const plan = (key: string): UnitPlan => {
    const existing = plans.get(key);
    if (existing) return existing;
    const created: UnitPlan = { modulePath: splitKey(key), decls: [], modulesUsed: new Set() };
    plans.set(key, created);
    return created;
  };

  for (const [key, unit] of plans) {
    const parent = parentKey(key);
    if (parent === undefined) continue;
    const moduleDecl = table.declarations.get(key);
    const name = unit.modulePath[unit.modulePath.length - 1] ?? key;
    plan(parent).decls.push({
      key: `module:${key}`,
      decl: {
        kind: "import",
        name,
        isPub: moduleDecl?.visibility !== "private",
        path: relativeImport(splitKey(parent), unit.modulePath),
      },
    });
  }

  const reexports: Reexport[] = resolvedFiles.flatMap((f) => f.reexports);
  for (const r of reexports) {
    const key = moduleKey(r.modulePath);
    const unit = plan(key);
    const entryKey = `reexport:${key}::${r.alias}`;
    switch (r.target.kind) {
      case "decl":
        if (!emitted.has(r.target.qualifiedName)) break;
        unit.decls.push({
          key: entryKey,
          decl: {
            kind: "reexport",
            name: r.alias,
            isPub: true,
            target: { kind: "ref", qualifiedName: r.target.qualifiedName },
          },
        });
        break;
      case "module":
        if (r.glob) {
          unit.modulesUsed.add(moduleKey(r.target.path));
          unit.decls.push({
            key: entryKey,
            decl: { kind: "usingnamespace", name: "*", isPub: true, modulePath: r.target.path },
          });
        } else {
          unit.decls.push({
            key: entryKey,
            decl: { kind: "import", name: r.alias, isPub: true, path: relativeImport(r.modulePath, r.target.path) },
          });
        }
        break;
      case "primitive": {
        const mapped = mapType(r.target.type, profile, lowerCtx, "alias");
        if (!mapped.ok) {
          diagnostics.report(mapped.error.code, mapped.error.message, { span: r.span });
          break;
        }
        unit.decls.push({ key: entryKey, decl: { kind: "reexport", name: r.alias, isPub: true, target: mapped.type } });
        break;
      }
    }
  }

  const byModule = new Map<string, Declaration[]>();
  for (const decl of [...resolved.values(), ...[...unresolved.values()].map((u) => u.decl)]) {
    const key = moduleKey(decl.modulePath);
    byModule.set(key, [...(byModule.get(key) ?? []), decl]);
  }
  for (const [key, decls] of byModule) {
    const unit = plan(key);
    for (const decl of orderModule(decls)) {
      const placeholder = unresolved.get(decl.qualifiedName);
      if (placeholder) {
        moduleOf.set(decl.qualifiedName, key);
        unit.decls.push({
          key: decl.qualifiedName,
          decl: {
            kind: "compile_error",
            name: decl.name,
            isPub: false,
            message: `unresolved reference in '${decl.qualifiedName}': ${placeholder.message}`,
          },
        });
        continue;
      }
      for (const l of lowered.get(decl.qualifiedName) ?? []) {
        moduleOf.set(l.qualifiedName, key);
        unit.decls.push({ key: l.qualifiedName, decl: l.decl });
      }
    }
  }

  // Names are assigned for every unit before any is written, since a
  // reference into another unit needs that unit's emitted name.
  const unitNames = new Map<string, ReadonlyMap<string, string>>();
  const pending: { readonly key: string; readonly unit: ZigUnit; readonly aliasOf: (m: string) => string }[] = [];
  for (const [key, unit] of [...plans].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    for (const { decl } of unit.decls) {
      for (const ref of declRefs(decl)) {
        const owner = moduleOf.get(ref);
        if (owner !== undefined && owner !== key) unit.modulesUsed.add(owner);
      }
    }

    const requests: NameRequest[] = unit.decls
      .filter((p) => p.decl.kind !== "usingnamespace")
      .map((p) => ({ key: p.key, name: p.decl.name }));
    const aliasKeys = [...unit.modulesUsed].sort();
    for (const m of aliasKeys) requests.push({ key: `alias:${m}`, name: m === "" ? "root" : splitKey(m).join("_") });
    const { names, renamed, scope } = assignNames(requests, profile);

    for (const r of renamed) {
      if (r.key.startsWith("alias:")) continue;
      const qualifiedName = r.key.replace(/^(module|reexport):/, "");
      diagnostics.report("WZ5001", `'${r.from}' is emitted as '${r.to}'.`, { qualifiedName });
    }
    unitNames.set(key, names);

    const aliasOf = (m: string): string => names.get(`alias:${m}`) ?? "root";
    const decls: ZigDecl[] = [
      ...aliasKeys.map(
        (m): ZigDecl => ({
          kind: "import",
          name: aliasOf(m),
          isPub: false,
          path: relativeImport(unit.modulePath, splitKey(m)),
        })
      ),
      ...unit.decls.map((p) => renameMembers({ ...p.decl, name: names.get(p.key) ?? p.decl.name }, profile, scope.names)),
    ];

    const zigUnit: ZigUnit = {
      modulePath: unit.modulePath,
      fileName: unitFileName(unit.modulePath),
      header: options.header ?? [],
      decls,
    };
    pending.push({ key, unit: zigUnit, aliasOf });
  }

  const modules: EmittedModule[] = [];
  for (const { key, unit, aliasOf } of pending) {
    const refText = (qn: string): string => {
      const owner = moduleOf.get(qn) ?? key;
      const name = unitNames.get(owner)?.get(qn) ?? qn;
      return owner === key ? name : `${aliasOf(owner)}.${name}`;
    };
    modules.push({
      modulePath: unit.modulePath,
      fileName: unit.fileName,
      text: writeZigUnit(unit, { refText, moduleText: (path) => aliasOf(moduleKey(path)) }),
    });
  }

  return { modules, diagnostics: diagnostics.items, aborted: false };
}
