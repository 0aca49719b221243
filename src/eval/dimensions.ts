import { toolCallMatches } from "./argument-matcher.js";
import {
  DIMENSIONS,
  RESPONSE_TYPES,
  type DimensionResults,
  type OverallVerdict,
  type ResponseType,
  type ScoringConfig,
  type ToolCall,
  type Verdict,
} from "./types.js";

export const RAW_ARGUMENTS_KEY = "_raw";

const verdict = (pass: boolean): Verdict => (pass ? "correct" : "incorrect");

export function isResponseType(value: string): value is ResponseType {
  return RESPONSE_TYPES.some((type) => type === value);
}

/** Unrecognized response types are not applicable rather than incorrect. */
export function checkResponseType(
  expectedType: string,
  actual: ToolCall[],
  config: ScoringConfig,
): Verdict {
  if (!isResponseType(expectedType)) {
    return "not_applicable";
  }
  switch (expectedType) {
    case "action_done":
      return verdict(actual.length > 0);
    case "query_response":
      return verdict(actual.some((call) => config.queryToolNames.has(call.name)));
    case "text_response":
    case "error":
    case "clarification":
      return verdict(actual.length === 0);
  }
}

export function checkFormatValidity(actual: ToolCall[]): Verdict {
  if (actual.length === 0) {
    return "not_applicable";
  }
  const malformed = actual.some(
    (call) => !call.name || Object.hasOwn(call.arguments, RAW_ARGUMENTS_KEY),
  );
  return verdict(!malformed);
}

export function checkCallCount(expected: ToolCall[], actual: ToolCall[]): Verdict {
  return verdict(expected.length === actual.length);
}

export function checkToolNames(expected: ToolCall[], actual: ToolCall[]): Verdict {
  if (expected.length === 0) {
    return "not_applicable";
  }
  if (actual.length === 0 || expected.length !== actual.length) {
    return "incorrect";
  }
  const expectedNames = expected.map((call) => call.name).toSorted();
  const actualNames = actual.map((call) => call.name).toSorted();
  return verdict(expectedNames.every((name, idx) => name === actualNames[idx]));
}

/**
 * Pair every expected call with a distinct actual call, first fit.
 *
 * Expected calls are visited in order and each takes the lowest-index unmatched
 * actual call that satisfies it. This is greedy: an earlier expected call can
 * claim the only partner of a later one even when a full pairing exists.
 */
export function checkArguments(expected: ToolCall[], actual: ToolCall[]): Verdict {
  if (expected.length === 0) {
    return "not_applicable";
  }
  if (expected.length !== actual.length) {
    return "incorrect";
  }

  const unmatched = actual.map((_, idx) => idx);
  for (const exp of expected) {
    const position = unmatched.findIndex((idx) => toolCallMatches(exp, actual[idx]));
    if (position === -1) {
      return "incorrect";
    }
    unmatched.splice(position, 1);
  }
  return "correct";
}

export function checkNoHallucinatedTools(actual: ToolCall[], config: ScoringConfig): Verdict {
  if (actual.length === 0) {
    return "not_applicable";
  }
  // Nameless calls are a format problem, not a hallucination.
  const hallucinated = actual.some((call) => call.name && !config.validToolNames.has(call.name));
  return verdict(!hallucinated);
}

export function scoreDimensions(
  expected: ToolCall[],
  actual: ToolCall[],
  expectedType: string,
  config: ScoringConfig,
): DimensionResults {
  return {
    response_type: checkResponseType(expectedType, actual, config),
    format_valid: checkFormatValidity(actual),
    call_count: checkCallCount(expected, actual),
    tool_name: checkToolNames(expected, actual),
    args: checkArguments(expected, actual),
    no_hallucinated_tools: checkNoHallucinatedTools(actual, config),
  };
}

export function aggregateVerdict(results: DimensionResults): OverallVerdict {
  const failed = DIMENSIONS.some((dimension) => results[dimension] === "incorrect");
  return failed ? "incorrect" : "correct";
}
