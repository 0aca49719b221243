import type { ScoringConfig } from "../eval/types.js";
import {
  INTENT_TOOL_GROUPS,
  listIntentToolIds,
  listQueryToolIds,
  listToolIdsForTier,
} from "./tool-catalog.js";

export type ToolAllowListPolicy = {
  tier: string;
  alsoAllow?: string[];
  deny?: string[];
};

export const TOOL_GROUPS: Record<string, string[]> = { ...INTENT_TOOL_GROUPS };

// Intent names are case-sensitive; only surrounding whitespace is dropped.
export function normalizeToolList(list?: string[]) {
  if (!list) {
    return [];
  }
  return list.map((name) => name.trim()).filter(Boolean);
}

function resolveToolGroup(value: string): string[] | undefined {
  return Object.hasOwn(TOOL_GROUPS, value) ? TOOL_GROUPS[value] : undefined;
}

export function expandToolGroups(list?: string[]) {
  const normalized = normalizeToolList(list);
  const expanded: string[] = [];
  for (const value of normalized) {
    const group = resolveToolGroup(value);
    if (group) {
      expanded.push(...group);
      continue;
    }
    expanded.push(value);
  }
  return Array.from(new Set(expanded));
}

function findUnknownEntries(list: string[] | undefined, known: Set<string>): string[] {
  return normalizeToolList(list).filter((entry) => !resolveToolGroup(entry) && !known.has(entry));
}

/**
 * Resolve the valid-tool allow-list for a tier, applying extra allow and deny entries.
 * Entries may be tool names or `group:<section>` ids.
 */
export function resolveScoringConfig(
  policy: ToolAllowListPolicy,
  warn: (message: string) => void = () => {},
): ScoringConfig {
  const known = new Set(listIntentToolIds());

  const unknownAllow = findUnknownEntries(policy.alsoAllow, known);
  if (unknownAllow.length > 0) {
    warn(
      `tools: alsoAllow contains unknown entries (${unknownAllow.join(", ")}). They are allowed as given.`,
    );
  }
  const unknownDeny = findUnknownEntries(policy.deny, known);
  if (unknownDeny.length > 0) {
    warn(
      `tools: deny contains unknown entries (${unknownDeny.join(", ")}). These entries won't match any tool.`,
    );
  }

  const denied = new Set(expandToolGroups(policy.deny));
  const allowed = [...listToolIdsForTier(policy.tier), ...expandToolGroups(policy.alsoAllow)];
  return {
    validToolNames: new Set(allowed.filter((name) => !denied.has(name))),
    queryToolNames: new Set(listQueryToolIds()),
  };
}
