import {
  LosslessNumber,
  isLosslessNumber,
  isSafeNumber,
  parse,
  stringify,
} from "lossless-json";

// Numbers that survive a round trip through a JS number stay plain numbers;
// the rest (64-bit ids, long decimals) keep their exact text.
function parseNumber(text: string): number | LosslessNumber {
  return isSafeNumber(text) ? Number(text) : new LosslessNumber(text);
}

export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

/** Two-space indented JSON, writing lossless numbers from their original text. */
export function stringifyJson(value: unknown, indent?: number): string {
  const out = stringify(value, undefined, indent);
  if (out === undefined) throw new Error("Value cannot be serialized as JSON");
  return out;
}

export { isLosslessNumber };
