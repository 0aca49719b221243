import { describe, expect, it } from "vitest";
import { expandToolGroups, resolveScoringConfig } from "./tool-policy-shared.js";

describe("expandToolGroups", () => {
  it("expands groups and de-duplicates", () => {
    expect(expandToolGroups(["group:assistant", " HassRespond ", ""])).toEqual([
      "HassRespond",
      "HassBroadcast",
    ]);
    expect(expandToolGroups(undefined)).toEqual([]);
  });
});

describe("resolveScoringConfig", () => {
  it("allows the tier's tools", () => {
    const config = resolveScoringConfig({ tier: "mvp" });
    expect(config.validToolNames.size).toBe(11);
    expect(config.validToolNames.has("HassNevermind")).toBe(true);
    expect(config.validToolNames.has("HassMediaPause")).toBe(false);
    expect([...config.queryToolNames]).toContain("HassGetWeather");
  });

  it("applies alsoAllow and deny entries", () => {
    const config = resolveScoringConfig({
      tier: "mvp",
      alsoAllow: ["group:media", "HassRespond"],
      deny: ["HassNevermind", "HassMediaNext"],
    });
    expect(config.validToolNames.size).toBe(11 + 9 + 1 - 2);
    expect(config.validToolNames.has("HassMediaPause")).toBe(true);
    expect(config.validToolNames.has("HassMediaNext")).toBe(false);
    expect(config.validToolNames.has("HassNevermind")).toBe(false);
  });

  it("warns about unknown entries and still allows them", () => {
    const warnings: string[] = [];
    const config = resolveScoringConfig(
      { tier: "mvp", alsoAllow: ["CustomScript"], deny: ["group:garden"] },
      (message) => warnings.push(message),
    );
    expect(config.validToolNames.has("CustomScript")).toBe(true);
    expect(config.validToolNames.size).toBe(12);
    expect(warnings).toEqual([
      "tools: alsoAllow contains unknown entries (CustomScript). They are allowed as given.",
      "tools: deny contains unknown entries (group:garden). These entries won't match any tool.",
    ]);
  });

  it("treats object property names as plain unknown entries", () => {
    const warnings: string[] = [];
    const config = resolveScoringConfig(
      { tier: "mvp", alsoAllow: ["constructor"], deny: ["toString"] },
      (message) => warnings.push(message),
    );
    expect(config.validToolNames.has("constructor")).toBe(true);
    expect(config.validToolNames.size).toBe(12);
    expect(warnings).toEqual([
      "tools: alsoAllow contains unknown entries (constructor). They are allowed as given.",
      "tools: deny contains unknown entries (toString). These entries won't match any tool.",
    ]);
    expect(expandToolGroups(["__proto__", "hasOwnProperty"])).toEqual(["__proto__", "hasOwnProperty"]);
  });

  it("rejects an unknown tier", () => {
    expect(() => resolveScoringConfig({ tier: "everything" })).toThrow("Unknown tool tier: everything");
  });
});
