// Capability argument parsing and boundary validation

import type { CapabilityCallRequest, JsonObject, JsonValue, ObjectSchema, Result } from "./types";
import { CapabilityArgumentParseError, err, isJsonObject, ok } from "./types";

/**
 * Parse the raw argument text of a call. Blank text means "no arguments";
 * anything that is not a JSON object is a parse error.
 */
export function parseCapabilityArguments(
  call: CapabilityCallRequest,
): Result<JsonObject, CapabilityArgumentParseError> {
  const text = call.arguments.trim();
  if (text.length === 0) return ok({});

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err(new CapabilityArgumentParseError(call.name, call.id, error));
  }

  if (!isJsonObject(parsed)) {
    return err(
      new CapabilityArgumentParseError(call.name, call.id, new Error("arguments must be a JSON object")),
    );
  }
  return ok(parsed);
}

const KNOWN_TYPES = new Set(["string", "number", "integer", "boolean", "array", "object", "null"]);

function typeOf(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

function matchesType(value: JsonValue, expected: string): boolean {
  const actual = typeOf(value);
  if (expected === "number") return actual === "number" || actual === "integer";
  return actual === expected;
}

/**
 * Check arguments against a normalized schema: required keys present and
 * declared primitive types respected. Returns one issue string per problem.
 */
export function validateArguments(args: JsonObject, schema: ObjectSchema): string[] {
  const issues: string[] = [];

  for (const key of schema.required ?? []) {
    if (!Object.hasOwn(args, key)) issues.push(`missing required property "${key}"`);
  }

  for (const [key, value] of Object.entries(args)) {
    const property = schema.properties[key];
    if (!isJsonObject(property)) continue;

    const declared = property.type;
    const allowed: JsonValue[] = typeof declared === "string" ? [declared] : Array.isArray(declared) ? declared : [];
    const names = allowed.filter((t): t is string => typeof t === "string" && KNOWN_TYPES.has(t));
    if (names.length === 0) continue;

    if (!names.some((t) => matchesType(value, t))) {
      issues.push(`property "${key}" must be ${names.join(" or ")}, got ${typeOf(value)}`);
    }
  }

  return issues;
}
