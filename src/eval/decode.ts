import { z } from "zod";
import type { AlternativeSpec, ToolCall } from "./types.js";

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

const ToolCallSchema = z.object({
  name: z.string(),
  arguments: z.record(z.string(), z.unknown()).nullish(),
});

const ToolCallListSchema = z.array(ToolCallSchema);

// Model output may omit the name; format_valid reports that instead of decoding failing.
const ActualToolCallSchema = ToolCallSchema.extend({
  name: z.string().nullish(),
});

const ActualToolCallListSchema = z.array(ActualToolCallSchema);

const StructuredAlternativeSchema = z.object({
  tool_calls: ToolCallListSchema.optional(),
  quality: z.string().optional(),
  reason: z.string().optional(),
});

type RawToolCall = z.infer<typeof ActualToolCallSchema>;

function toToolCalls(raw: RawToolCall[]): ToolCall[] {
  return raw.map((call) => ({ name: call.name ?? "", arguments: call.arguments ?? {} }));
}

function parseJson(text: string): DecodeResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Decode a JSON-encoded array of `{name, arguments}` objects. */
export function decodeToolCallList(text: string): DecodeResult<ToolCall[]> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return parsed;
  }
  const result = ToolCallListSchema.safeParse(parsed.value);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error) };
  }
  return { ok: true, value: toToolCalls(result.data) };
}

/** Like `decodeToolCallList`, but a missing or null `name` decodes as `""`. */
export function decodeActualCallList(text: string): DecodeResult<ToolCall[]> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return parsed;
  }
  const result = ActualToolCallListSchema.safeParse(parsed.value);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error) };
  }
  return { ok: true, value: toToolCalls(result.data) };
}

export function decodeAlternativeSpec(raw: unknown): DecodeResult<AlternativeSpec> {
  if (Array.isArray(raw)) {
    const legacy = ToolCallListSchema.safeParse(raw);
    if (!legacy.success) {
      return { ok: false, error: formatIssues(legacy.error) };
    }
    return { ok: true, value: { kind: "legacy", toolCalls: toToolCalls(legacy.data) } };
  }
  const structured = StructuredAlternativeSchema.safeParse(raw);
  if (!structured.success) {
    return { ok: false, error: formatIssues(structured.error) };
  }
  return {
    ok: true,
    value: {
      kind: "structured",
      toolCalls: toToolCalls(structured.data.tool_calls ?? []),
      quality: structured.data.quality,
      reason: structured.data.reason,
    },
  };
}

/**
 * Decode alternative expected call sets, given either decoded or as a JSON string.
 * Entries that cannot be decoded are dropped and reported through `warn`.
 */
export function decodeAlternatives(
  raw: unknown,
  warn: (message: string) => void = () => {},
): AlternativeSpec[] {
  if (raw === undefined || raw === null) {
    return [];
  }

  let value: unknown = raw;
  if (typeof raw === "string") {
    const parsed = parseJson(raw);
    if (!parsed.ok) {
      warn(`alternatives: ignoring undecodable JSON (${parsed.error})`);
      return [];
    }
    value = parsed.value;
  }

  if (!Array.isArray(value)) {
    warn("alternatives: expected an array of alternative call sets");
    return [];
  }

  const specs: AlternativeSpec[] = [];
  value.forEach((entry: unknown, idx) => {
    const decoded = decodeAlternativeSpec(entry);
    if (decoded.ok) {
      specs.push(decoded.value);
    } else {
      warn(`alternatives: dropping entry ${idx} (${decoded.error})`);
    }
  });
  return specs;
}
