import { RAW_ARGUMENTS_KEY } from "./dimensions.js";
import type { ToolCall, ToolCallArguments } from "./types.js";

/** A tool call as reported by a model provider, before normalization. */
export type ProviderToolCall = {
  function?: string;
  name?: string;
  arguments?: unknown;
  parseError?: string | null;
};

export type ProviderMessage = {
  role: string;
  toolCalls?: ProviderToolCall[] | null;
};

function isArgumentsRecord(value: unknown): value is ToolCallArguments {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rawText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return value === undefined ? "" : JSON.stringify(value);
}

function decodeArguments(value: unknown): ToolCallArguments | null {
  if (value === undefined || value === null) {
    return {};
  }
  if (isArgumentsRecord(value)) {
    return value;
  }
  if (typeof value !== "string") {
    return null;
  }
  if (!value.trim()) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return isArgumentsRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Convert a provider tool call to a `ToolCall`.
 * Arguments that could not be parsed are kept verbatim under `_raw`.
 */
export function toToolCall(call: ProviderToolCall): ToolCall {
  const name = call.function ?? call.name ?? "";
  const args = call.parseError ? null : decodeArguments(call.arguments);
  if (!args) {
    return { name, arguments: { [RAW_ARGUMENTS_KEY]: rawText(call.arguments) } };
  }
  return { name, arguments: args };
}

/** Tool calls of the final message of a conversation; empty when it made none. */
export function extractToolCalls(messages: ProviderMessage[]): ToolCall[] {
  const last = messages.at(-1);
  if (!last?.toolCalls?.length) {
    return [];
  }
  return last.toolCalls.map(toToolCall);
}
