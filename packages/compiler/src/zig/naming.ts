import { isReservedName } from "../ffi/profile.js";
import type { TargetProfile } from "../ffi/profile.js";
import type { ZigDecl } from "./ir.js";

export function sanitizeIdentifier(name: string): string {
  const cleaned = name.replaceAll(/[^A-Za-z0-9_]/g, "_");
  if (cleaned.length === 0) return "_";
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

// Hands out unique, non-reserved identifiers in claim order.
export class NameScope {
  readonly #profile: TargetProfile;
  readonly #taken = new Set<string>();
  readonly #outer: ReadonlySet<string>;

  constructor(profile: TargetProfile, outer: ReadonlySet<string> = new Set()) {
    this.#profile = profile;
    this.#outer = outer;
  }

  #free(name: string): boolean {
    return !this.#taken.has(name) && !this.#outer.has(name) && !isReservedName(this.#profile, name);
  }

  claim(wanted: string): string {
    const base = sanitizeIdentifier(wanted);
    let name = base;
    if (!this.#free(name)) {
      name = `${base}_`;
      for (let n = 2; !this.#free(name); n++) name = `${base}_${n}`;
    }
    this.#taken.add(name);
    return name;
  }

  get names(): ReadonlySet<string> {
    return this.#taken;
  }
}

export type NameRequest = {
  readonly key: string;
  readonly name: string;
};

export type Renamed = {
  readonly key: string;
  readonly from: string;
  readonly to: string;
};

export type NameAssignment = {
  readonly names: ReadonlyMap<string, string>;
  readonly renamed: readonly Renamed[];
  readonly scope: NameScope;
};

// Module-level names, first come first served.
export function assignNames(requests: readonly NameRequest[], profile: TargetProfile): NameAssignment {
  const scope = new NameScope(profile);
  const names = new Map<string, string>();
  const renamed: Renamed[] = [];
  for (const r of requests) {
    const to = scope.claim(r.name);
    names.set(r.key, to);
    if (to !== r.name) renamed.push({ key: r.key, from: r.name, to });
  }
  return { names, renamed, scope };
}

// Field names of one container. Struct literals of the container go through
// the same mapping, so `.field = ...` matches the emitted field.
export function fieldNames(names: readonly string[], profile: TargetProfile): string[] {
  const scope = new NameScope(profile);
  return names.map((name) => scope.claim(name));
}

// Member names (fields, params, nested constants). Zig forbids shadowing, so
// params and nested declarations also avoid every module-level name.
export function renameMembers(decl: ZigDecl, profile: TargetProfile, moduleNames: ReadonlySet<string>): ZigDecl {
  switch (decl.kind) {
    case "container": {
      const names = fieldNames(decl.fields.map((f) => f.name), profile);
      const fields = decl.fields.map((f, i) => ({ ...f, name: names[i] ?? f.name }));
      const nested = new NameScope(profile, new Set([...moduleNames, ...names]));
      const decls = decl.decls.map((c) => ({ ...c, name: nested.claim(c.name) }));
      return { ...decl, fields, decls };
    }
    case "enum": {
      const scope = new NameScope(profile);
      return { ...decl, fields: decl.fields.map((f) => ({ ...f, name: scope.claim(f.name) })) };
    }
    case "extern_fn": {
      const scope = new NameScope(profile, moduleNames);
      return { ...decl, params: decl.params.map((p) => ({ ...p, name: scope.claim(p.name) })) };
    }
    default:
      return decl;
  }
}
