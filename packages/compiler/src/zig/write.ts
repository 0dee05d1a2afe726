import type { ZigDecl, ZigField, ZigType, ZigUnit, ZigValue } from "./ir.js";

export type WriteOptions = {
  // Text for a reference to a declaration, local or through a module alias.
  readonly refText: (qualifiedName: string) => string;
  readonly moduleText: (modulePath: readonly string[]) => string;
};

function emitType(ty: ZigType, o: WriteOptions): string {
  switch (ty.kind) {
    case "int":
      return `${ty.signed ? "i" : "u"}${ty.bits}`;
    case "prim":
      return ty.name;
    case "pointer": {
      const constness = ty.isConst ? "const " : "";
      const child = emitType(ty.child, o);
      if (ty.style === "c") return `[*c]${constness}${child}`;
      return `${ty.style === "optional" ? "?" : ""}*${constness}${child}`;
    }
    case "array":
      return `[${ty.len}]${emitType(ty.child, o)}`;
    case "fn":
      return `${ty.optional ? "?" : ""}*const ${emitFnProto(ty.params.map((p) => emitType(p, o)), ty, o)}`;
    case "ref":
      return o.refText(ty.qualifiedName);
  }
}

function emitFnProto(
  params: readonly string[],
  fn: { readonly ret: ZigType; readonly callconv: string; readonly variadic: boolean },
  o: WriteOptions,
  name = ""
): string {
  const all = fn.variadic ? [...params, "..."] : params;
  return `fn ${name}(${all.join(", ")}) callconv(.${fn.callconv}) ${emitType(fn.ret, o)}`;
}

function emitFloat(text: string): string {
  return text.endsWith(".") ? `${text}0` : text;
}

function emitValue(v: ZigValue): string {
  switch (v.kind) {
    case "int":
      return v.value.toString();
    case "float":
      return emitFloat(v.text);
    case "bool":
      return v.value ? "true" : "false";
    case "string":
      return JSON.stringify(v.value);
    case "array":
      return v.elements.length === 0 ? ".{}" : `.{ ${v.elements.map(emitValue).join(", ")} }`;
    case "struct":
      return v.fields.length === 0 ? ".{}" : `.{ ${v.fields.map((f) => `.${f.name} = ${emitValue(f.value)}`).join(", ")} }`;
    case "enum_from_int":
      return `@enumFromInt(${v.value})`;
  }
}

function emitField(f: ZigField, o: WriteOptions): string {
  const align = f.align !== undefined ? ` align(${f.align})` : "";
  return `    ${f.name}: ${emitType(f.type, o)}${align},`;
}

function emitDecl(decl: ZigDecl, o: WriteOptions): string[] {
  const out: string[] = [];
  for (const line of decl.doc ?? []) out.push(`/// ${line}`);
  const vis = decl.isPub ? "pub " : "";
  const head = `${vis}const ${decl.name}`;
  switch (decl.kind) {
    case "container": {
      const keyword = `extern ${decl.tag}`;
      if (decl.fields.length === 0 && decl.decls.length === 0) {
        out.push(`${head} = ${keyword} {};`);
        return out;
      }
      out.push(`${head} = ${keyword} {`);
      for (const f of decl.fields) out.push(emitField(f, o));
      if (decl.fields.length > 0 && decl.decls.length > 0) out.push("");
      for (const c of decl.decls) {
        out.push(`    pub const ${c.name}: ${emitType(c.type, o)} = ${emitValue(c.value)};`);
      }
      out.push("};");
      return out;
    }
    case "enum":
      out.push(`${head} = enum(${emitType(decl.tagType, o)}) {`);
      for (const f of decl.fields) out.push(`    ${f.name} = ${f.value},`);
      out.push("};");
      return out;
    case "opaque":
      out.push(`${head} = opaque {};`);
      return out;
    case "alias":
      out.push(`${head} = ${emitType(decl.type, o)};`);
      return out;
    case "const":
      out.push(`${head}: ${emitType(decl.type, o)} = ${emitValue(decl.value)};`);
      return out;
    case "extern_fn": {
      if (decl.linkageName === decl.name) {
        const params = decl.params.map((p) => `${p.name}: ${emitType(p.type, o)}`);
        const lib = decl.library !== undefined ? `${JSON.stringify(decl.library)} ` : "";
        out.push(`${vis}extern ${lib}${emitFnProto(params, decl, o, decl.name)};`);
        return out;
      }
      const params = decl.params.map((p) => emitType(p.type, o));
      const lib = decl.library !== undefined ? `, .library_name = ${JSON.stringify(decl.library)}` : "";
      out.push(`${head} = @extern(*const ${emitFnProto(params, decl, o)}, .{ .name = ${JSON.stringify(decl.linkageName)}${lib} });`);
      return out;
    }
    case "import":
      out.push(`${head} = @import(${JSON.stringify(decl.path)});`);
      return out;
    case "reexport":
      out.push(`${head} = ${emitType(decl.target, o)};`);
      return out;
    case "usingnamespace":
      out.push(`${vis}usingnamespace ${o.moduleText(decl.modulePath)};`);
      return out;
    case "compile_error":
      out.push(`${head} = @compileError(${JSON.stringify(decl.message)});`);
      return out;
  }
}

export function writeZigUnit(unit: ZigUnit, opts: WriteOptions): string {
  const parts: string[] = [...unit.header];
  let previousWasBlock = unit.header.length > 0;
  for (const decl of unit.decls) {
    const lines = emitDecl(decl, opts);
    const isBlock = lines.length > 1;
    // One-liners stay together; multi-line declarations get a blank line around them.
    if (parts.length > 0 && (isBlock || previousWasBlock)) parts.push("");
    parts.push(...lines);
    previousWasBlock = isBlock;
  }
  parts.push("");
  return parts.join("\n");
}
