// Generic structured document type for capability arguments and schemas

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-copy an untrusted value into a JsonValue. Functions, symbols and
 * undefined are dropped, non-finite numbers become null, cycles are cut.
 */
export function toJsonValue(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "object":
      break;
    default:
      return undefined;
  }

  if (seen.has(value)) return undefined;
  seen.add(value);

  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const copy = toJsonValue(item, seen);
      items.push(copy === undefined ? null : copy);
    }
    seen.delete(value);
    return items;
  }

  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    const copy = toJsonValue(entry, seen);
    if (copy !== undefined) out[key] = copy;
  }
  seen.delete(value);
  return out;
}
