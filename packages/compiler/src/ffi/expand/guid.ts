import { fail } from "../diagnostics.js";
import type { ConstExpr } from "../ir.js";
import type { Span, TokenTree } from "../syntax.js";
import { TokenCursor, splitByComma, tokensText } from "../tokens.js";
import { parseIntLiteral } from "./convert.js";

export type GuidParts = {
  readonly data1: bigint;
  readonly data2: bigint;
  readonly data3: bigint;
  readonly data4: readonly bigint[];
};

// Native GUID: u32, u16, u16, [u8; 8]. 16 bytes, alignment 4.
export const GUID_SIZE = 16;

const COMPONENT_BITS = [32n, 16n, 16n, 8n, 8n, 8n, 8n, 8n, 8n, 8n, 8n] as const;

export function parseDefineGuid(
  tokens: readonly TokenTree[],
  span: Span
): { readonly name: string; readonly parts: GuidParts } {
  const [head, ...rest] = splitByComma(tokens);
  const nameCursor = new TokenCursor(head ?? [], span);
  const name = nameCursor.eatIdent();
  if (name === undefined || !nameCursor.atEnd()) {
    return fail("WZ1002", "DEFINE_GUID! expects a constant name first.", span);
  }
  if (rest.length !== COMPONENT_BITS.length) {
    return fail("WZ1005", `DEFINE_GUID! '${name}' needs 11 components, found ${rest.length}.`, span);
  }
  const values = rest.map((part, index) => {
    const [lit] = part;
    const value = part.length === 1 && lit?.kind === "literal" ? parseIntLiteral(lit.text) : undefined;
    const bits = COMPONENT_BITS[index] ?? 8n;
    if (value === undefined || value < 0n || value >= 1n << bits) {
      return fail(
        "WZ1005",
        `DEFINE_GUID! '${name}' component ${index + 1} ('${tokensText(part)}') is not a ${bits}-bit unsigned literal.`,
        span
      );
    }
    return value;
  });
  const [data1 = 0n, data2 = 0n, data3 = 0n, ...data4] = values;
  return { name, parts: { data1, data2, data3, data4 } };
}

export function guidLiteral(parts: GuidParts): ConstExpr {
  return {
    kind: "struct",
    type: { kind: "path", segments: ["GUID"], args: [] },
    fields: [
      { name: "Data1", value: { kind: "int", value: parts.data1 } },
      { name: "Data2", value: { kind: "int", value: parts.data2 } },
      { name: "Data3", value: { kind: "int", value: parts.data3 } },
      {
        name: "Data4",
        value: { kind: "array", elements: parts.data4.map((value) => ({ kind: "int", value })) },
      },
    ],
  };
}

export function guidBytes(parts: GuidParts): Uint8Array {
  const out = new Uint8Array(GUID_SIZE);
  const view = new DataView(out.buffer);
  view.setUint32(0, Number(parts.data1), true);
  view.setUint16(4, Number(parts.data2), true);
  view.setUint16(6, Number(parts.data3), true);
  parts.data4.forEach((b, i) => out.set([Number(b)], 8 + i));
  return out;
}

export function formatGuid(parts: GuidParts): string {
  const hex = (v: bigint, digits: number) => v.toString(16).toUpperCase().padStart(digits, "0");
  const tail = parts.data4.map((b) => hex(b, 2));
  return `{${hex(parts.data1, 8)}-${hex(parts.data2, 4)}-${hex(parts.data3, 4)}-${tail.slice(0, 2).join("")}-${tail.slice(2).join("")}}`;
}

const GUID_FIELDS = ["Data1", "Data2", "Data3", "Data4"] as const;

// Reads the parts back from a resolved GUID literal, if it is one. Any other
// record of the same shape is not a GUID.
export function guidPartsOf(value: ConstExpr): GuidParts | undefined {
  if (value.kind !== "struct" || value.fields.length !== GUID_FIELDS.length) return undefined;
  const [d1, d2, d3, d4] = GUID_FIELDS.map((name) => value.fields.find((f) => f.name === name)?.value);
  if (d1?.kind !== "int" || d2?.kind !== "int" || d3?.kind !== "int" || d4?.kind !== "array") return undefined;
  const data4: bigint[] = [];
  for (const e of d4.elements) {
    if (e.kind !== "int") return undefined;
    data4.push(e.value);
  }
  if (data4.length !== 8) return undefined;
  return { data1: d1.value, data2: d2.value, data3: d3.value, data4 };
}
