import type { CfgSet } from "../cfg.js";
import { expandCfgAttrs, isCfgEnabled } from "../cfg.js";
import type { DiagnosticsCollector } from "../diagnostics.js";
import type { Declaration, FfiField, Import, Visibility } from "../ir.js";
import { qualify } from "../ir.js";
import type { SourceAttr, SourceField, Span } from "../syntax.js";
import { convertType } from "./convert.js";

export type ExpandOptions = {
  readonly cfg: CfgSet;
  readonly defaultLibrary?: string;
};

export type ExpandScope = {
  readonly modulePath: readonly string[];
  readonly options: ExpandOptions;
  readonly diagnostics: DiagnosticsCollector;
  readonly declarations: Declaration[];
  readonly imports: Import[];
};

export function declBase(
  scope: ExpandScope,
  name: string,
  visibility: Visibility,
  span: Span
): {
  readonly name: string;
  readonly qualifiedName: string;
  readonly modulePath: readonly string[];
  readonly visibility: Visibility;
  readonly span: Span;
} {
  return { name, qualifiedName: qualify(scope.modulePath, name), modulePath: scope.modulePath, visibility, span };
}

// The attributes in effect after `cfg_attr`, or undefined when `cfg` turns the item off.
export function enabledAttrs(
  scope: ExpandScope,
  attrs: readonly SourceAttr[],
  qualifiedName?: string
): SourceAttr[] | undefined {
  const active = expandCfgAttrs(attrs, scope.options.cfg, scope.diagnostics, qualifiedName);
  return isCfgEnabled(active, scope.options.cfg, scope.diagnostics) ? active : undefined;
}

export function convertFields(scope: ExpandScope, fields: readonly SourceField[]): FfiField[] {
  return fields
    .filter((f) => enabledAttrs(scope, f.attrs) !== undefined)
    .map((f) => ({ name: f.name, type: convertType(f.type, f.span), span: f.span }));
}

export function childScope(scope: ExpandScope, name: string): ExpandScope {
  return { ...scope, modulePath: [...scope.modulePath, name] };
}
