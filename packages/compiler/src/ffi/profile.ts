import { readFileSync } from "node:fs";

export type PointerSyntax = "optional_single" | "c_pointer";

export type TargetProfile = {
  readonly name: string;
  readonly nativePointer: {
    readonly syntax: PointerSyntax;
    readonly bits: 32 | 64;
  };
  readonly integerWidths: readonly number[];
  // Source ABI string -> target spelling.
  readonly callingConventions: Readonly<Record<string, string>>;
  readonly reservedWords: readonly string[];
  readonly reservedPatterns: readonly string[];
};

export type TargetArch = "x86_64" | "x86";

// JSON validators shared with the command-line config.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${label} must be a JSON object.`);
  return value;
}

export function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

export function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) throw new Error(`${label} must be an array of non-empty strings.`);
  return value.map((entry, i) => asString(entry, `${label}[${i}]`));
}

export function asStringMap(value: unknown, label: string): Readonly<Record<string, string>> {
  const record = asRecord(value, label);
  const out: Record<string, string> = {};
  for (const key of Object.keys(record)) out[key] = asString(record[key], `${label}.${key}`);
  return out;
}

function asPointer(value: unknown, label: string): TargetProfile["nativePointer"] {
  const pointer = asRecord(value, label);
  const { syntax, bits } = pointer;
  if (syntax !== "optional_single" && syntax !== "c_pointer") {
    throw new Error(`${label}.syntax must be 'optional_single' or 'c_pointer'.`);
  }
  if (bits !== 32 && bits !== 64) throw new Error(`${label}.bits must be 32 or 64.`);
  return { syntax, bits };
}

export function asWidths(value: unknown, label: string): readonly number[] {
  if (!Array.isArray(value)) throw new Error(`${label} must be an array of integer widths.`);
  return value.map((entry, i) => {
    if (typeof entry !== "number" || ![8, 16, 32, 64, 128].includes(entry)) {
      throw new Error(`${label}[${i}] must be one of 8, 16, 32, 64, 128.`);
    }
    return entry;
  });
}

// Profile file: shared fields plus a `targets` table keyed by architecture.
export function parseProfileFile(value: unknown, arch: TargetArch, label: string): TargetProfile {
  const root = asRecord(value, label);
  const targets = asRecord(root.targets, `${label}: 'targets'`);
  const target = asRecord(targets[arch], `${label}: 'targets.${arch}'`);
  return {
    name: asString(root.name, `${label}: 'name'`),
    nativePointer: asPointer(target.nativePointer, `${label}: 'targets.${arch}.nativePointer'`),
    integerWidths: asWidths(root.integerWidths, `${label}: 'integerWidths'`),
    callingConventions: asStringMap(target.callingConventions, `${label}: 'targets.${arch}.callingConventions'`),
    reservedWords: asStringArray(root.reservedWords, `${label}: 'reservedWords'`),
    reservedPatterns: asStringArray(root.reservedPatterns ?? [], `${label}: 'reservedPatterns'`),
  };
}

export type ProfileOverrides = {
  readonly pointerSyntax?: PointerSyntax;
  readonly integerWidths?: readonly number[];
  readonly callingConventions?: Readonly<Record<string, string>>;
  readonly reservedWords?: readonly string[];
};

export function withProfileOverrides(profile: TargetProfile, overrides: ProfileOverrides): TargetProfile {
  return {
    ...profile,
    nativePointer: {
      ...profile.nativePointer,
      syntax: overrides.pointerSyntax ?? profile.nativePointer.syntax,
    },
    integerWidths: overrides.integerWidths ?? profile.integerWidths,
    callingConventions: { ...profile.callingConventions, ...overrides.callingConventions },
    reservedWords: [...profile.reservedWords, ...(overrides.reservedWords ?? [])],
  };
}

const profileCache = new Map<TargetArch, TargetProfile>();

export function zigProfile(arch: TargetArch = "x86_64"): TargetProfile {
  const cached = profileCache.get(arch);
  if (cached) return cached;
  const url = new URL("../../profiles/zig.json", import.meta.url);
  const profile = Object.freeze(parseProfileFile(JSON.parse(readFileSync(url, "utf-8")), arch, "profiles/zig.json"));
  profileCache.set(arch, profile);
  return profile;
}

export function isReservedName(profile: TargetProfile, name: string): boolean {
  if (profile.reservedWords.includes(name)) return true;
  return profile.reservedPatterns.some((pattern) => new RegExp(pattern).test(name));
}
