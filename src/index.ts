export {
  isToolTierId,
  listIntentToolSections,
  listQueryToolIds,
  listToolIdsForTier,
  type ToolTierId,
} from "./agents/tool-catalog.js";
export { expandToolGroups, resolveScoringConfig } from "./agents/tool-policy-shared.js";
export { resolveAlternatives } from "./eval/alternatives.js";
export { toolCallMatches } from "./eval/argument-matcher.js";
export { decodeActualCallList, decodeAlternatives, decodeToolCallList } from "./eval/decode.js";
export { aggregateVerdict, isResponseType, scoreDimensions } from "./eval/dimensions.js";
export { buildExplanation } from "./eval/explanation.js";
export { extractToolCalls, toToolCall } from "./eval/extract-tool-calls.js";
export {
  formatScoreSummary,
  scoreToolCalls,
  summarizeScores,
  type ToolCallSample,
} from "./eval/tool-call-eval.js";
export * from "./eval/types.js";
