import { describe, it, expect } from "vitest";
import { parseCapabilityArguments, validateArguments } from "../capability-arguments";
import { CapabilityArgumentParseError } from "../types";
import type { ObjectSchema } from "../types";

function request(args: string) {
  return { id: "call-1", name: "read_file", arguments: args };
}

describe("parseCapabilityArguments", () => {
  it("parses a JSON object", () => {
    const result = parseCapabilityArguments(request('{"path":"a.txt","lines":3}'));
    expect(result).toEqual({ ok: true, value: { path: "a.txt", lines: 3 } });
  });

  it("treats blank text as no arguments", () => {
    expect(parseCapabilityArguments(request(""))).toEqual({ ok: true, value: {} });
    expect(parseCapabilityArguments(request("  \n"))).toEqual({ ok: true, value: {} });
  });

  it("fails on malformed JSON", () => {
    const result = parseCapabilityArguments(request('{"path":'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CapabilityArgumentParseError);
    expect(result.error.capability).toBe("read_file");
    expect(result.error.callId).toBe("call-1");
    expect(result.error.code).toBe("CAPABILITY_ARGUMENT_PARSE");
  });

  it("fails on JSON that is not an object", () => {
    for (const text of ["[1,2]", '"str"', "42", "null"]) {
      const result = parseCapabilityArguments(request(text));
      expect(result.ok).toBe(false);
      if (result.ok) continue;
      expect(result.error.message).toBe(
        'Malformed arguments for "read_file" (call call-1): arguments must be a JSON object',
      );
    }
  });
});

describe("validateArguments", () => {
  const schema: ObjectSchema = {
    type: "object",
    properties: {
      path: { type: "string" },
      lines: { type: "integer" },
      ratio: { type: "number" },
      tag: { type: ["string", "null"] },
      extra: { description: "untyped" },
      custom: { type: "uuid" },
    },
    required: ["path"],
  };

  it("accepts matching arguments", () => {
    expect(validateArguments({ path: "a", lines: 2, ratio: 0.5, tag: null }, schema)).toEqual([]);
  });

  it("accepts an integer where a number is declared", () => {
    expect(validateArguments({ path: "a", ratio: 2 }, schema)).toEqual([]);
  });

  it("reports missing required properties", () => {
    expect(validateArguments({}, schema)).toEqual(['missing required property "path"']);
  });

  it("does not treat inherited object members as present", () => {
    const inherited: ObjectSchema = { type: "object", properties: {}, required: ["constructor", "toString"] };
    expect(validateArguments({}, inherited)).toEqual([
      'missing required property "constructor"',
      'missing required property "toString"',
    ]);
  });

  it("reports type mismatches", () => {
    expect(validateArguments({ path: 5, lines: 1.5 }, schema)).toEqual([
      'property "path" must be string, got integer',
      'property "lines" must be integer, got number',
    ]);
  });

  it("names every allowed type for union types", () => {
    expect(validateArguments({ path: "a", tag: 1 }, schema)).toEqual([
      'property "tag" must be string or null, got integer',
    ]);
  });

  it("ignores undeclared, untyped and unknown-typed properties", () => {
    expect(validateArguments({ path: "a", other: [1], extra: {}, custom: 7 }, schema)).toEqual([]);
  });
});
