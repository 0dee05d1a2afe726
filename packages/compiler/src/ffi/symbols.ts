import { asReadonlyMap, freezeReadonlyArray } from "./contracts.js";
import type { Diagnostic } from "./diagnostics.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import type { Declaration, EnumDecl, EnumVariant, ExpandedFile, Import } from "./ir.js";
import { canonicalDeclaration, moduleKey, qualify } from "./ir.js";
import { spanText } from "./syntax.js";

export type VariantSymbol = {
  readonly owner: EnumDecl;
  readonly variant: EnumVariant;
};

// Written once per name during collection, read-only afterwards.
export type SymbolTable = {
  readonly declarations: ReadonlyMap<string, Declaration>;
  // Variants of C-like enums live at module level.
  readonly variants: ReadonlyMap<string, VariantSymbol>;
  readonly modules: ReadonlySet<string>;
  readonly imports: ReadonlyMap<string, readonly Import[]>;
};

export type CollectResult = {
  readonly table: SymbolTable;
  readonly diagnostics: readonly Diagnostic[];
  readonly collided: boolean;
};

export function collectSymbolsPass(files: readonly ExpandedFile[]): CollectResult {
  const diagnostics = new DiagnosticsCollector();
  const declarations = new Map<string, Declaration>();
  const canonical = new Map<string, string>();
  const variants = new Map<string, VariantSymbol>();
  const modules = new Set<string>([""]);
  const imports = new Map<string, Import[]>();
  let collided = false;

  const claim = (qualifiedName: string, decl: Declaration, what: string): boolean => {
    const existing = declarations.get(qualifiedName);
    const variant = variants.get(qualifiedName);
    if (!existing && !variant) return true;
    if (existing && canonical.get(qualifiedName) === canonicalDeclaration(decl)) return false;
    collided = true;
    const other = existing ? existing.span : variant?.variant.span;
    diagnostics.report("WZ2001", `${what} '${qualifiedName}' is already declared at ${spanText(other)}.`, {
      qualifiedName,
      span: decl.span,
    });
    return false;
  };

  for (const file of files) {
    for (let i = 0; i <= file.modulePath.length; i++) modules.add(moduleKey(file.modulePath.slice(0, i)));

    for (const decl of file.declarations) {
      if (!claim(decl.qualifiedName, decl, "Declaration")) continue;
      declarations.set(decl.qualifiedName, decl);
      canonical.set(decl.qualifiedName, canonicalDeclaration(decl));
      if (decl.kind === "module") modules.add(decl.qualifiedName);
      if (decl.kind === "enum" && decl.style === "c_like") {
        for (const variant of decl.variants) {
          const name = qualify(decl.modulePath, variant.name);
          if (declarations.has(name) || variants.has(name)) {
            collided = true;
            diagnostics.report("WZ2001", `Enum constant '${name}' is already declared.`, {
              qualifiedName: name,
              span: variant.span,
            });
            continue;
          }
          variants.set(name, { owner: decl, variant });
        }
      }
    }

    for (const imp of file.imports) {
      const key = moduleKey(imp.modulePath);
      const list = imports.get(key) ?? [];
      list.push(imp);
      imports.set(key, list);
    }
  }

  const frozenImports = new Map<string, readonly Import[]>();
  for (const [key, list] of imports) frozenImports.set(key, freezeReadonlyArray(list));

  return {
    table: Object.freeze({
      declarations: asReadonlyMap(declarations),
      variants: asReadonlyMap(variants),
      modules: Object.freeze(new Set(modules)),
      imports: asReadonlyMap(frozenImports),
    }),
    diagnostics: diagnostics.items,
    collided,
  };
}
