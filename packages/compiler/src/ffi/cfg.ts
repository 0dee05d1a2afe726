import type { DiagnosticsCollector } from "./diagnostics.js";
import type { SourceAttr, Span, TokenTree } from "./syntax.js";
import { TokenCursor, attrListArgs, splitByComma, tokensText, unquoteString } from "./tokens.js";

export type CfgSet = {
  readonly flags: ReadonlySet<string>;
  readonly values: ReadonlyMap<string, ReadonlySet<string>>;
};

export type CfgOverrides = Readonly<Record<string, string | boolean | readonly string[]>>;

export function defaultCfg(pointerBits: 32 | 64): CfgSet {
  return {
    flags: new Set(["windows"]),
    values: new Map<string, ReadonlySet<string>>([
      ["target_os", new Set(["windows"])],
      ["target_family", new Set(["windows"])],
      ["target_pointer_width", new Set([String(pointerBits)])],
      ["target_arch", new Set([pointerBits === 64 ? "x86_64" : "x86"])],
      ["target_env", new Set(["msvc"])],
    ]),
  };
}

export function withOverrides(base: CfgSet, overrides: CfgOverrides | undefined): CfgSet {
  if (!overrides) return base;
  const flags = new Set(base.flags);
  const values = new Map(base.values);
  for (const key of Object.keys(overrides).sort()) {
    const value = overrides[key];
    if (value === true) flags.add(key);
    else if (value === false) {
      flags.delete(key);
      values.delete(key);
    } else if (typeof value === "string") values.set(key, new Set([value]));
    else if (value) values.set(key, new Set(value));
  }
  return { flags, values };
}

type CfgOutcome =
  | { readonly ok: true; readonly value: boolean }
  | { readonly ok: false; readonly reason: string };

export function evalCfgPredicate(tokens: readonly TokenTree[], cfg: CfgSet): CfgOutcome {
  const [head, second, third] = tokens;
  if (head?.kind !== "ident") return { ok: false, reason: `'${tokensText(tokens)}'` };

  if (tokens.length === 1) return { ok: true, value: cfg.flags.has(head.text) };

  if (tokens.length === 3 && second?.kind === "punct" && second.ch === "=" && third?.kind === "literal") {
    return { ok: true, value: cfg.values.get(head.text)?.has(unquoteString(third.text)) ?? false };
  }

  if (tokens.length === 2 && second?.kind === "group" && second.delimiter === "paren") {
    const parts = splitByComma(second.tokens);
    const results: boolean[] = [];
    for (const part of parts) {
      const outcome = evalCfgPredicate(part, cfg);
      if (!outcome.ok) return outcome;
      results.push(outcome.value);
    }
    switch (head.text) {
      case "all":
        return { ok: true, value: results.every(Boolean) };
      case "any":
        return { ok: true, value: results.some(Boolean) };
      case "not": {
        const [only] = results;
        if (results.length !== 1 || only === undefined) return { ok: false, reason: "'not' takes one predicate" };
        return { ok: true, value: !only };
      }
      default:
        return { ok: false, reason: `'${head.text}(...)'` };
    }
  }

  return { ok: false, reason: `'${tokensText(tokens)}'` };
}

// Unknown predicate forms keep the item and leave a warning behind.
export function isCfgEnabled(
  attrs: readonly SourceAttr[],
  cfg: CfgSet,
  diagnostics: DiagnosticsCollector
): boolean {
  for (const attr of attrs) {
    if (attr.name !== "cfg") continue;
    const args = attrListArgs(attr);
    const [predicate] = args ?? [];
    if (args?.length !== 1 || !predicate) {
      diagnostics.report("WZ1006", "Malformed cfg attribute; item kept.", { span: attr.span });
      continue;
    }
    const outcome = evalCfgPredicate(predicate, cfg);
    if (!outcome.ok) {
      diagnostics.report("WZ1006", `Unsupported cfg predicate ${outcome.reason}; item kept.`, {
        span: attr.span,
      });
      continue;
    }
    if (!outcome.value) return false;
  }
  return true;
}

function innerAttr(tokens: readonly TokenTree[], span: Span): SourceAttr | undefined {
  const c = new TokenCursor(tokens, span);
  const head = c.eatIdent();
  if (head === undefined) return undefined;
  const segments = [head];
  while (c.eatPunct("::")) {
    const segment = c.eatIdent();
    if (segment === undefined) return undefined;
    segments.push(segment);
  }
  return { name: segments.join("::"), args: c.rest(), span };
}

// `#[cfg_attr(pred, a, b)]` becomes `#[a] #[b]` when the predicate holds and
// disappears when it does not.
export function expandCfgAttrs(
  attrs: readonly SourceAttr[],
  cfg: CfgSet,
  diagnostics: DiagnosticsCollector,
  qualifiedName?: string
): SourceAttr[] {
  const where = { ...(qualifiedName !== undefined ? { qualifiedName } : {}) };
  const out: SourceAttr[] = [];
  for (const attr of attrs) {
    if (attr.name !== "cfg_attr") {
      out.push(attr);
      continue;
    }
    const [predicate, ...parts] = attrListArgs(attr) ?? [];
    const inner: SourceAttr[] = [];
    for (const part of parts) {
      const parsed = innerAttr(part, attr.span);
      if (parsed) inner.push(parsed);
    }
    if (!predicate || inner.length === 0 || inner.length !== parts.length) {
      diagnostics.report("WZ1006", "Malformed cfg_attr attribute; ignored.", { span: attr.span, ...where });
      continue;
    }
    const outcome = evalCfgPredicate(predicate, cfg);
    if (!outcome.ok) {
      const names = inner.map((a) => a.name).join(", ");
      if (inner.some((a) => a.name === "repr")) {
        diagnostics.report(
          "WZ4004",
          `Layout attribute '${names}' depends on unsupported cfg_attr predicate ${outcome.reason}; not applied.`,
          { span: attr.span, ...where }
        );
      } else {
        diagnostics.report(
          "WZ1006",
          `Unsupported cfg_attr predicate ${outcome.reason}; '${names}' not applied.`,
          { span: attr.span, ...where }
        );
      }
      continue;
    }
    if (outcome.value) out.push(...expandCfgAttrs(inner, cfg, diagnostics, qualifiedName));
  }
  return out;
}
