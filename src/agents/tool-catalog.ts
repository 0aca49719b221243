export type ToolTierId = "mvp" | "full";

export type IntentToolSection = {
  id: string;
  label: string;
  tools: Array<{
    id: string;
    description: string;
  }>;
};

type IntentToolDefinition = {
  id: string;
  description: string;
  sectionId: string;
  tiers: ToolTierId[];
  /** Reads state instead of changing it; satisfies a `query_response`. */
  query?: boolean;
};

const INTENT_TOOL_SECTION_ORDER: Array<{ id: string; label: string }> = [
  { id: "control", label: "Device control" },
  { id: "utility", label: "Utility" },
  { id: "media", label: "Media" },
  { id: "household", label: "Household" },
  { id: "assistant", label: "Assistant" },
];

const BOTH_TIERS: ToolTierId[] = ["mvp", "full"];
const FULL_ONLY: ToolTierId[] = ["full"];

const INTENT_TOOL_DEFINITIONS: IntentToolDefinition[] = [
  {
    id: "HassTurnOn",
    description: "Turns on/opens a device or entity",
    sectionId: "control",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassTurnOff",
    description: "Turns off/closes a device or entity",
    sectionId: "control",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassLightSet",
    description: "Sets the brightness or color of a light",
    sectionId: "control",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassSetPosition",
    description: "Sets the position of an entity",
    sectionId: "control",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassGetState",
    description: "Gets or checks the state of an entity",
    sectionId: "control",
    tiers: BOTH_TIERS,
    query: true,
  },
  {
    id: "HassClimateSetTemperature",
    description: "Sets the desired indoor temperature",
    sectionId: "control",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassClimateGetTemperature",
    description: "Gets the actual indoor temperature",
    sectionId: "control",
    tiers: BOTH_TIERS,
    query: true,
  },
  {
    id: "HassGetCurrentTime",
    description: "Gets the current time",
    sectionId: "utility",
    tiers: BOTH_TIERS,
    query: true,
  },
  {
    id: "HassGetCurrentDate",
    description: "Gets the current date",
    sectionId: "utility",
    tiers: BOTH_TIERS,
    query: true,
  },
  {
    id: "HassGetWeather",
    description: "Gets the current weather",
    sectionId: "utility",
    tiers: BOTH_TIERS,
    query: true,
  },
  {
    id: "HassNevermind",
    description: "Cancels the current request",
    sectionId: "utility",
    tiers: BOTH_TIERS,
  },
  {
    id: "HassMediaPause",
    description: "Pauses a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaUnpause",
    description: "Unpauses a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaNext",
    description: "Skips to the next item on a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaPrevious",
    description: "Skips to the previous item on a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassSetVolume",
    description: "Sets the volume of a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaPlayerMute",
    description: "Mutes a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaPlayerUnmute",
    description: "Unmutes a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassSetVolumeRelative",
    description: "Increases or decreases the volume of a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassMediaSearchAndPlay",
    description: "Searches for and plays media on a media player",
    sectionId: "media",
    tiers: FULL_ONLY,
  },
  {
    id: "HassFanSetSpeed",
    description: "Sets the speed of a fan",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassVacuumStart",
    description: "Starts a vacuum cleaner",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassVacuumReturnToBase",
    description: "Returns a vacuum cleaner to its base",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassLawnMowerStartMowing",
    description: "Starts a lawn mower",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassLawnMowerDock",
    description: "Sends a lawn mower to its dock",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassListAddItem",
    description: "Adds an item to a todo list",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassListCompleteItem",
    description: "Checks off an item on a todo list",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassShoppingListAddItem",
    description: "Adds an item to the shopping list",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassShoppingListCompleteItem",
    description: "Checks off an item on the shopping list",
    sectionId: "household",
    tiers: FULL_ONLY,
  },
  {
    id: "HassRespond",
    description: "Returns a response to the user without taking any action",
    sectionId: "assistant",
    tiers: FULL_ONLY,
  },
  {
    id: "HassBroadcast",
    description: "Announces a message on other voice satellites",
    sectionId: "assistant",
    tiers: FULL_ONLY,
  },
];

export const TOOL_TIER_OPTIONS = [
  { id: "mvp", label: "MVP (core + utility)" },
  { id: "full", label: "Full (media, household, assistant)" },
] as const;

export function isToolTierId(value: string): value is ToolTierId {
  return TOOL_TIER_OPTIONS.some((option) => option.id === value);
}

export function getToolTierLabel(tier: string): string {
  return TOOL_TIER_OPTIONS.find((option) => option.id === tier)?.label ?? tier;
}

function resolveTier(tier: string): ToolTierId {
  if (!isToolTierId(tier)) {
    throw new Error(`Unknown tool tier: ${tier}`);
  }
  return tier;
}

export function listToolIdsForTier(tier: string): string[] {
  const resolved = resolveTier(tier);
  return INTENT_TOOL_DEFINITIONS.filter((tool) => tool.tiers.includes(resolved)).map(
    (tool) => tool.id,
  );
}

export function listIntentToolIds(): string[] {
  return INTENT_TOOL_DEFINITIONS.map((tool) => tool.id);
}

export function listQueryToolIds(): string[] {
  return INTENT_TOOL_DEFINITIONS.filter((tool) => tool.query).map((tool) => tool.id);
}

function buildIntentToolGroupMap(): Record<string, string[]> {
  const sectionToolMap = new Map<string, string[]>();
  for (const tool of INTENT_TOOL_DEFINITIONS) {
    const groupId = `group:${tool.sectionId}`;
    const list = sectionToolMap.get(groupId) ?? [];
    list.push(tool.id);
    sectionToolMap.set(groupId, list);
  }
  return {
    "group:query": listQueryToolIds(),
    ...Object.fromEntries(sectionToolMap.entries()),
  };
}

export const INTENT_TOOL_GROUPS = buildIntentToolGroupMap();

export function listIntentToolSections(tier: string): IntentToolSection[] {
  const resolved = resolveTier(tier);
  return INTENT_TOOL_SECTION_ORDER.map((section) => ({
    id: section.id,
    label: section.label,
    tools: INTENT_TOOL_DEFINITIONS.filter(
      (tool) => tool.sectionId === section.id && tool.tiers.includes(resolved),
    ).map((tool) => ({ id: tool.id, description: tool.description })),
  })).filter((section) => section.tools.length > 0);
}
