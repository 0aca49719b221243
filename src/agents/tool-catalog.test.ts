import { describe, expect, it } from "vitest";
import {
  INTENT_TOOL_GROUPS,
  isToolTierId,
  listIntentToolSections,
  listQueryToolIds,
  listToolIdsForTier,
} from "./tool-catalog.js";

describe("tool-catalog", () => {
  it("lists 11 tools for the mvp tier", () => {
    expect(listToolIdsForTier("mvp")).toEqual([
      "HassTurnOn",
      "HassTurnOff",
      "HassLightSet",
      "HassSetPosition",
      "HassGetState",
      "HassClimateSetTemperature",
      "HassClimateGetTemperature",
      "HassGetCurrentTime",
      "HassGetCurrentDate",
      "HassGetWeather",
      "HassNevermind",
    ]);
  });

  it("extends mvp to 31 tools in the full tier", () => {
    const full = listToolIdsForTier("full");
    expect(full).toHaveLength(31);
    expect(new Set(full).size).toBe(31);
    for (const id of listToolIdsForTier("mvp")) {
      expect(full).toContain(id);
    }
    expect(full).toContain("HassBroadcast");
  });

  it("rejects unknown tiers", () => {
    expect(() => listToolIdsForTier("tier2")).toThrow("Unknown tool tier: tier2");
    expect(isToolTierId("full")).toBe(true);
    expect(isToolTierId("FULL")).toBe(false);
  });

  it("marks the read-only query tools", () => {
    expect(listQueryToolIds()).toEqual([
      "HassGetState",
      "HassClimateGetTemperature",
      "HassGetCurrentTime",
      "HassGetCurrentDate",
      "HassGetWeather",
    ]);
  });

  it("groups tools by section", () => {
    expect(INTENT_TOOL_GROUPS["group:utility"]).toEqual([
      "HassGetCurrentTime",
      "HassGetCurrentDate",
      "HassGetWeather",
      "HassNevermind",
    ]);
    expect(INTENT_TOOL_GROUPS["group:media"]).toHaveLength(9);
    expect(INTENT_TOOL_GROUPS["group:household"]).toHaveLength(9);
    expect(INTENT_TOOL_GROUPS["group:query"]).toEqual(listQueryToolIds());
  });

  it("omits sections without tools in the tier", () => {
    expect(listIntentToolSections("mvp").map((s) => s.id)).toEqual(["control", "utility"]);
    expect(listIntentToolSections("full").map((s) => s.id)).toEqual([
      "control",
      "utility",
      "media",
      "household",
      "assistant",
    ]);
  });
});
