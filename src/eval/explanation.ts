import { DIMENSIONS, type DimensionResults, type ToolCall, type Verdict } from "./types.js";

function verdictMark(verdict: Verdict): string {
  switch (verdict) {
    case "correct":
      return "C";
    case "incorrect":
      return "I";
    case "not_applicable":
      return "-";
  }
}

export function formatToolCall(call: ToolCall): string {
  return `${call.name || "?"}(${JSON.stringify(call.arguments)})`;
}

export function buildExplanation(params: {
  expected: ToolCall[];
  actual: ToolCall[];
  results: DimensionResults;
  quality: string;
  reason: string;
}): string {
  const lines: string[] = [`MATCH_QUALITY: ${params.quality}`];
  if (params.reason) {
    lines.push(`MATCH_REASON: ${params.reason}`);
  }
  lines.push(`Expected ${params.expected.length} call(s):`);
  for (const call of params.expected) {
    lines.push(`  ${formatToolCall(call)}`);
  }
  lines.push(`Got ${params.actual.length} call(s):`);
  for (const call of params.actual) {
    lines.push(`  ${formatToolCall(call)}`);
  }
  lines.push("", "Checks:");
  for (const dimension of DIMENSIONS) {
    const verdict = params.results[dimension];
    lines.push(`  ${verdictMark(verdict)} ${dimension}: ${verdict}`);
  }
  return lines.join("\n");
}
