export type ToolCallArguments = Record<string, unknown>;

export type ToolCall = {
  name: string;
  arguments: ToolCallArguments;
};

export type Verdict = "correct" | "incorrect" | "not_applicable";

export type OverallVerdict = Exclude<Verdict, "not_applicable">;

export const DIMENSIONS = [
  "response_type",
  "format_valid",
  "call_count",
  "tool_name",
  "args",
  "no_hallucinated_tools",
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type DimensionResults = Record<Dimension, Verdict>;

export const RESPONSE_TYPES = [
  "action_done",
  "query_response",
  "text_response",
  "error",
  "clarification",
] as const;

export type ResponseType = (typeof RESPONSE_TYPES)[number];

export type AlternativeSpec =
  | { kind: "legacy"; toolCalls: ToolCall[] }
  | { kind: "structured"; toolCalls: ToolCall[]; quality?: string; reason?: string };

export type ResolvedAlternative = {
  toolCalls: ToolCall[];
  quality: string;
  reason: string;
};

export type ScoringConfig = {
  validToolNames: ReadonlySet<string>;
  queryToolNames: ReadonlySet<string>;
};

export type AlternativeResolution = {
  results: DimensionResults;
  overall: OverallVerdict;
  quality: string;
  reason: string;
};

export type Score = {
  overall: OverallVerdict;
  serializedActual: ToolCall[];
  explanation: string;
  /** null on a scoring error, where no dimension was evaluated. */
  quality: string | null;
  reason: string;
  dimensions: DimensionResults | null;
};

export type ScoreSummary = {
  totalSamples: number;
  correctSamples: number;
  accuracy: number;
  scoringErrors: number;
  perDimension: Array<{
    dimension: Dimension;
    applicable: number;
    accuracy: number;
  }>;
  byQuality: Array<{ quality: string; count: number }>;
};
