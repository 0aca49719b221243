import { aggregateVerdict, scoreDimensions } from "./dimensions.js";
import type {
  AlternativeResolution,
  AlternativeSpec,
  ResolvedAlternative,
  ScoringConfig,
  ToolCall,
} from "./types.js";

export const PRIMARY_MATCH_QUALITY = "optimal";
export const DEFAULT_ALTERNATIVE_QUALITY = "acceptable";

export function normalizeAlternative(spec: AlternativeSpec): ResolvedAlternative {
  switch (spec.kind) {
    case "legacy":
      return { toolCalls: spec.toolCalls, quality: DEFAULT_ALTERNATIVE_QUALITY, reason: "" };
    case "structured":
      return {
        toolCalls: spec.toolCalls,
        quality: spec.quality ?? DEFAULT_ALTERNATIVE_QUALITY,
        reason: spec.reason ?? "",
      };
  }
}

/**
 * Score the primary expected set, falling back to alternatives in order.
 *
 * The first alternative that passes every applicable dimension wins outright.
 * When nothing passes, the primary results are returned and the quality label
 * stays "optimal".
 */
export function resolveAlternatives(params: {
  primary: ToolCall[];
  alternatives: AlternativeSpec[];
  actual: ToolCall[];
  expectedType: string;
  config: ScoringConfig;
}): AlternativeResolution {
  const results = scoreDimensions(params.primary, params.actual, params.expectedType, params.config);
  const overall = aggregateVerdict(results);
  const primaryResolution: AlternativeResolution = {
    results,
    overall,
    quality: PRIMARY_MATCH_QUALITY,
    reason: "",
  };
  if (overall === "correct") {
    return primaryResolution;
  }

  for (const spec of params.alternatives) {
    const alt = normalizeAlternative(spec);
    const altResults = scoreDimensions(alt.toolCalls, params.actual, params.expectedType, params.config);
    if (aggregateVerdict(altResults) === "correct") {
      return { results: altResults, overall: "correct", quality: alt.quality, reason: alt.reason };
    }
  }

  return primaryResolution;
}
