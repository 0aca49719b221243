import { resolveScoringConfig } from "../agents/tool-policy-shared.js";
import { resolveAlternatives } from "./alternatives.js";
import { decodeAlternatives, decodeToolCallList } from "./decode.js";
import { buildExplanation } from "./explanation.js";
import {
  DIMENSIONS,
  type Score,
  type ScoreSummary,
  type ScoringConfig,
  type ToolCall,
} from "./types.js";

export const DEFAULT_RESPONSE_TYPE = "action_done";
export const TARGET_PARSE_ERROR = "Target parse error";

export type ToolCallSample = {
  /** JSON-encoded array of expected `{name, arguments}` calls. */
  target: string;
  actual: ToolCall[];
  responseType?: string;
  /** Decoded list or JSON string of alternative expected call sets. */
  alternatives?: unknown;
};

export type ScoreOptions = {
  config?: ScoringConfig;
  warn?: (message: string) => void;
};

let defaultConfig: ScoringConfig | null = null;

function getDefaultScoringConfig(): ScoringConfig {
  if (!defaultConfig) {
    defaultConfig = resolveScoringConfig({ tier: "mvp" });
  }
  return defaultConfig;
}

export function serializeActualCalls(actual: ToolCall[]): ToolCall[] {
  return actual.map((call) => ({ name: call.name, arguments: call.arguments }));
}

export function errorScore(message: string): Score {
  return {
    overall: "incorrect",
    serializedActual: [],
    explanation: `Scoring error: ${message}`,
    quality: null,
    reason: "",
    dimensions: null,
  };
}

/**
 * Score one sample's tool calls against its expected calls.
 * Never throws for well-formed inputs; an undecodable target yields an error score.
 */
export function scoreToolCalls(sample: ToolCallSample, options: ScoreOptions = {}): Score {
  const warn = options.warn ?? (() => {});
  const config = options.config ?? getDefaultScoringConfig();

  const expected = decodeToolCallList(sample.target);
  if (!expected.ok) {
    warn(`Could not parse target: ${sample.target} (${expected.error})`);
    return errorScore(TARGET_PARSE_ERROR);
  }

  const resolution = resolveAlternatives({
    primary: expected.value,
    alternatives: decodeAlternatives(sample.alternatives, warn),
    actual: sample.actual,
    expectedType: sample.responseType ?? DEFAULT_RESPONSE_TYPE,
    config,
  });

  // The explanation always lists the primary expected calls, even when an alternative won.
  const explanation = buildExplanation({
    expected: expected.value,
    actual: sample.actual,
    results: resolution.results,
    quality: resolution.quality,
    reason: resolution.reason,
  });

  return {
    overall: resolution.overall,
    serializedActual: serializeActualCalls(sample.actual),
    explanation,
    quality: resolution.quality,
    reason: resolution.reason,
    dimensions: resolution.results,
  };
}

export function summarizeScores(scores: Score[]): ScoreSummary {
  const totalSamples = scores.length;
  const correctSamples = scores.filter((s) => s.overall === "correct").length;
  const scoringErrors = scores.filter((s) => s.dimensions === null).length;

  const perDimension = DIMENSIONS.map((dimension) => {
    const verdicts = scores.flatMap((s) => (s.dimensions ? [s.dimensions[dimension]] : []));
    const applicable = verdicts.filter((v) => v !== "not_applicable");
    const passes = applicable.filter((v) => v === "correct").length;
    return {
      dimension,
      applicable: applicable.length,
      accuracy: applicable.length > 0 ? passes / applicable.length : 0,
    };
  });

  const qualityCounts = new Map<string, number>();
  for (const score of scores) {
    if (score.overall !== "correct" || score.quality === null) {
      continue;
    }
    qualityCounts.set(score.quality, (qualityCounts.get(score.quality) ?? 0) + 1);
  }
  const byQuality = [...qualityCounts.entries()]
    .map(([quality, count]) => ({ quality, count }))
    .toSorted((a, b) => b.count - a.count || a.quality.localeCompare(b.quality));

  return {
    totalSamples,
    correctSamples,
    accuracy: totalSamples > 0 ? correctSamples / totalSamples : 0,
    scoringErrors,
    perDimension,
    byQuality,
  };
}

export function formatScoreSummary(summary: ScoreSummary): string {
  const pct = (n: number) => `${(n * 100).toFixed(1)}%`;
  const lines: string[] = [
    "=== Tool-call Score Summary ===",
    `Samples: ${summary.totalSamples}`,
    `Correct: ${summary.correctSamples}`,
    `Accuracy: ${pct(summary.accuracy)}`,
    `Scoring errors: ${summary.scoringErrors}`,
    "",
    "Per-dimension:",
  ];
  for (const d of summary.perDimension) {
    lines.push(`  ${d.dimension}: ${pct(d.accuracy)} (${d.applicable} applicable)`);
  }
  if (summary.byQuality.length > 0) {
    lines.push("", "Match quality:");
    for (const q of summary.byQuality) {
      lines.push(`  ${q.quality}: ${q.count}`);
    }
  }
  return lines.join("\n");
}
