import type { ToolCall } from "./types.js";

const ANY_OF_SUFFIX = "_any_of";
export const NUMERIC_TOLERANCE = 0.01;

export function stringifyArgValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) || (value !== null && typeof value === "object")) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function normalizeArgValue(value: unknown): string {
  return stringifyArgValue(value).trim().toLowerCase();
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

function readArg(args: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(args, key) ? args[key] : undefined;
}

function sortedLowered(values: unknown[]): string[] {
  return values.map((v) => stringifyArgValue(v).toLowerCase()).toSorted();
}

function sameMultiset(expected: unknown[], actual: unknown[]): boolean {
  if (expected.length !== actual.length) {
    return false;
  }
  const a = sortedLowered(expected);
  const b = sortedLowered(actual);
  return a.every((value, idx) => value === b[idx]);
}

// Booleans compare numerically as 1 and 0.
function asNumeric(value: unknown): number | null {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return null;
}

export function argValueMatches(expected: unknown, actual: unknown): boolean {
  const expectedNumber = asNumeric(expected);
  const actualNumber = asNumeric(actual);
  if (expectedNumber !== null && actualNumber !== null) {
    return Math.abs(expectedNumber - actualNumber) <= NUMERIC_TOLERANCE;
  }
  if (Array.isArray(expected) && Array.isArray(actual)) {
    return sameMultiset(expected, actual);
  }
  return normalizeArgValue(actual) === normalizeArgValue(expected);
}

function anyOfMatches(candidates: unknown, actual: unknown): boolean {
  // A non-list constraint only requires the argument to be present.
  if (!Array.isArray(candidates)) {
    return true;
  }
  const normalized = normalizeArgValue(actual);
  return candidates.some((candidate) => normalizeArgValue(candidate) === normalized);
}

/**
 * Check whether an actual call satisfies an expected one.
 *
 * Expected keys ending in `_any_of` accept any listed value for the base key.
 * An expected call without arguments matches any arguments.
 */
export function toolCallMatches(expected: ToolCall, actual: ToolCall): boolean {
  if (expected.name !== actual.name) {
    return false;
  }

  const expectedArgs = Object.entries(expected.arguments);
  if (expectedArgs.length === 0) {
    return true;
  }

  for (const [key, expectedValue] of expectedArgs) {
    if (key.endsWith(ANY_OF_SUFFIX)) {
      const baseKey = key.slice(0, -ANY_OF_SUFFIX.length);
      const actualValue = readArg(actual.arguments, baseKey);
      if (isAbsent(actualValue) || !anyOfMatches(expectedValue, actualValue)) {
        return false;
      }
      continue;
    }

    const actualValue = readArg(actual.arguments, key);
    if (isAbsent(actualValue) || !argValueMatches(expectedValue, actualValue)) {
      return false;
    }
  }

  return true;
}
