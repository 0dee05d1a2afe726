import type { Declaration, FfiType } from "./ir.js";

function valueEdges(type: FfiType, out: string[]): void {
  switch (type.kind) {
    case "named":
      out.push(type.qualifiedName);
      return;
    case "array":
      valueEdges(type.element, out);
      return;
    default:
      // Pointers and function pointers never need the pointee's size.
      return;
  }
}

// Declarations whose complete layout this one needs.
export function byValueDependencies(decl: Declaration): string[] {
  const out: string[] = [];
  switch (decl.kind) {
    case "struct":
    case "union":
      for (const f of decl.fields) valueEdges(f.type, out);
      break;
    case "type_alias":
      valueEdges(decl.target, out);
      break;
    case "enum":
      valueEdges(decl.discriminantType, out);
      break;
    default:
      break;
  }
  return [...new Set(out)];
}

// Strongly connected components over by-value edges; returns the cyclic ones
// (size > 1, or a self edge) in discovery order.
export function findLayoutCycles(decls: readonly Declaration[]): string[][] {
  const edges = new Map<string, string[]>();
  for (const decl of decls) edges.set(decl.qualifiedName, byValueDependencies(decl));

  let counter = 0;
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const cycles: string[][] = [];

  const visit = (node: string): void => {
    index.set(node, counter);
    low.set(node, counter);
    counter += 1;
    stack.push(node);
    onStack.add(node);

    for (const next of edges.get(node) ?? []) {
      if (!edges.has(next)) continue;
      if (!index.has(next)) {
        visit(next);
        low.set(node, Math.min(low.get(node) ?? 0, low.get(next) ?? 0));
      } else if (onStack.has(next)) {
        low.set(node, Math.min(low.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (low.get(node) !== index.get(node)) return;
    const component: string[] = [];
    for (;;) {
      const top = stack.pop();
      if (top === undefined) break;
      onStack.delete(top);
      component.push(top);
      if (top === node) break;
    }
    const selfEdge = (edges.get(node) ?? []).includes(node);
    if (component.length > 1 || selfEdge) cycles.push(component.reverse());
  };

  for (const decl of decls) {
    if (!index.has(decl.qualifiedName)) visit(decl.qualifiedName);
  }
  return cycles;
}

// Stable topological order over same-module by-value dependencies; ties keep
// source order.
export function orderModule<T extends Declaration>(decls: readonly T[]): T[] {
  const names = new Set(decls.map((d) => d.qualifiedName));
  const pending = decls.map((decl) => ({
    decl,
    deps: byValueDependencies(decl).filter((d) => names.has(d) && d !== decl.qualifiedName),
  }));
  const emitted = new Set<string>();
  const out: T[] = [];
  while (pending.length > 0) {
    const next = pending.findIndex((p) => p.deps.every((d) => emitted.has(d)));
    const [picked] = pending.splice(next === -1 ? 0 : next, 1);
    if (!picked) break;
    emitted.add(picked.decl.qualifiedName);
    out.push(picked.decl);
  }
  return out;
}
