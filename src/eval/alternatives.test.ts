import { describe, expect, it } from "vitest";
import { resolveScoringConfig } from "../agents/tool-policy-shared.js";
import { normalizeAlternative, resolveAlternatives } from "./alternatives.js";
import { decodeAlternatives } from "./decode.js";
import type { AlternativeSpec, ToolCall } from "./types.js";

const config = resolveScoringConfig({ tier: "mvp" });

const call = (name: string, args: Record<string, unknown> = {}): ToolCall => ({
  name,
  arguments: args,
});

describe("normalizeAlternative", () => {
  it("defaults legacy alternatives to acceptable with no reason", () => {
    const spec: AlternativeSpec = { kind: "legacy", toolCalls: [call("HassTurnOn")] };
    expect(normalizeAlternative(spec)).toEqual({
      toolCalls: [call("HassTurnOn")],
      quality: "acceptable",
      reason: "",
    });
  });

  it("keeps quality and reason of structured alternatives", () => {
    const spec: AlternativeSpec = {
      kind: "structured",
      toolCalls: [],
      quality: "degraded",
      reason: "area instead of name",
    };
    expect(normalizeAlternative(spec)).toEqual({
      toolCalls: [],
      quality: "degraded",
      reason: "area instead of name",
    });
  });
});

describe("resolveAlternatives", () => {
  const actual = [call("HassTurnOn", { area: "Kitchen", domain: ["light"] })];

  it("returns the primary result as optimal when it passes", () => {
    const resolution = resolveAlternatives({
      primary: [call("HassTurnOn", { area: "kitchen" })],
      alternatives: [{ kind: "legacy", toolCalls: [call("HassTurnOff")] }],
      actual,
      expectedType: "action_done",
      config,
    });
    expect(resolution.overall).toBe("correct");
    expect(resolution.quality).toBe("optimal");
    expect(resolution.reason).toBe("");
  });

  it("adopts the first alternative that fully passes", () => {
    const resolution = resolveAlternatives({
      primary: [call("HassTurnOn", { name: "Kitchen Light" })],
      alternatives: [
        {
          kind: "structured",
          toolCalls: [call("HassTurnOn", { area: "Hall" })],
          quality: "acceptable",
          reason: "wrong area",
        },
        {
          kind: "structured",
          toolCalls: [call("HassTurnOn", { area: "Kitchen", domain: ["light"] })],
          quality: "degraded",
          reason: "area-wide instead of a single light",
        },
        {
          kind: "legacy",
          toolCalls: [call("HassTurnOn", { area: "Kitchen" })],
        },
      ],
      actual,
      expectedType: "action_done",
      config,
    });
    expect(resolution.overall).toBe("correct");
    expect(resolution.quality).toBe("degraded");
    expect(resolution.reason).toBe("area-wide instead of a single light");
    expect(resolution.results.args).toBe("correct");
  });

  it("keeps the failing primary results when no alternative passes", () => {
    const resolution = resolveAlternatives({
      primary: [call("HassTurnOn", { name: "Kitchen Light" })],
      alternatives: [{ kind: "legacy", toolCalls: [call("HassTurnOff")] }],
      actual,
      expectedType: "action_done",
      config,
    });
    expect(resolution).toEqual({
      results: {
        response_type: "correct",
        format_valid: "correct",
        call_count: "correct",
        tool_name: "correct",
        args: "incorrect",
        no_hallucinated_tools: "correct",
      },
      overall: "incorrect",
      quality: "optimal",
      reason: "",
    });
  });

  it("accepts an empty alternative for a no-action response", () => {
    const resolution = resolveAlternatives({
      primary: [call("HassTurnOn", { name: "Kitchen Light" })],
      alternatives: [{ kind: "structured", toolCalls: [], quality: "acceptable", reason: "asked to clarify" }],
      actual: [],
      expectedType: "clarification",
      config,
    });
    expect(resolution.overall).toBe("correct");
    expect(resolution.reason).toBe("asked to clarify");
  });
});

describe("decodeAlternatives", () => {
  it("decodes legacy and structured entries from a JSON string", () => {
    const raw = JSON.stringify([
      [{ name: "HassTurnOn", arguments: { area: "Kitchen" } }],
      { tool_calls: [{ name: "HassTurnOff" }], quality: "degraded", reason: "r" },
    ]);
    expect(decodeAlternatives(raw)).toEqual([
      { kind: "legacy", toolCalls: [call("HassTurnOn", { area: "Kitchen" })] },
      { kind: "structured", toolCalls: [call("HassTurnOff")], quality: "degraded", reason: "r" },
    ]);
  });

  it("accepts already decoded lists and defaults missing tool_calls", () => {
    expect(decodeAlternatives([{ quality: "acceptable" }])).toEqual([
      { kind: "structured", toolCalls: [], quality: "acceptable", reason: undefined },
    ]);
  });

  it("returns nothing for absent alternatives", () => {
    expect(decodeAlternatives(undefined)).toEqual([]);
    expect(decodeAlternatives(null)).toEqual([]);
  });

  it("drops undecodable input with a warning", () => {
    const warnings: string[] = [];
    const warn = (message: string) => warnings.push(message);
    expect(decodeAlternatives("[{", warn)).toEqual([]);
    expect(decodeAlternatives({ tool_calls: [] }, warn)).toEqual([]);
    expect(decodeAlternatives([[{ arguments: {} }], [{ name: "HassNevermind" }]], warn)).toEqual([
      { kind: "legacy", toolCalls: [call("HassNevermind")] },
    ]);
    expect(warnings).toHaveLength(3);
    expect(warnings[0]).toContain("undecodable JSON");
    expect(warnings[1]).toBe("alternatives: expected an array of alternative call sets");
    expect(warnings[2]).toContain("dropping entry 0");
  });
});
