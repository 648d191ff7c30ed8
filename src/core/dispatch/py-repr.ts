/**
 * Python-style repr of JSON values, as carried in the `argsrepr` and
 * `kwargsrepr` headers of a task message.
 */

import type { JsonValue } from "./models/task-request.js";

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

export function reprString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = quote;
  for (const char of value) {
    const escaped = ESCAPES[char];
    if (escaped !== undefined) {
      out += escaped;
    } else if (char === quote) {
      out += `\\${char}`;
    } else {
      const code = char.codePointAt(0) ?? 0;
      out += code < 0x20 || code === 0x7f ? `\\x${code.toString(16).padStart(2, "0")}` : char;
    }
  }
  return out + quote;
}

export function pyRepr(value: JsonValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return reprString(value);
  if (Array.isArray(value)) {
    return `[${value.map(pyRepr).join(", ")}]`;
  }
  const items = Object.entries(value).map(([key, item]) => `${reprString(key)}: ${pyRepr(item)}`);
  return `{${items.join(", ")}}`;
}
