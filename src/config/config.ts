import { z } from "zod";

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
  );

/**
 * Environment variables read by the bench. All are optional.
 */
const EnvSchema = z.object({
  VOICE_BENCH_TOOL_TIER: z.enum(["mvp", "full"]).default("mvp"),
  // Comma-separated tool names or group:<section> ids
  VOICE_BENCH_ALSO_ALLOW: csvList,
  VOICE_BENCH_DENY: csvList,
});

export type BenchConfig = {
  tools: {
    tier: "mvp" | "full";
    alsoAllow: string[];
    deny: string[];
  };
};

let cached: BenchConfig | null = null;

export function parseConfig(env: Record<string, string | undefined>): BenchConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${messages?.join(", ")}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errorMessages}`);
  }
  return {
    tools: {
      tier: result.data.VOICE_BENCH_TOOL_TIER,
      alsoAllow: result.data.VOICE_BENCH_ALSO_ALLOW,
      deny: result.data.VOICE_BENCH_DENY,
    },
  };
}

/**
 * Validated configuration from `process.env`, parsed on first access and cached.
 */
export function loadConfig(): BenchConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}

export function resetConfigForTests(): void {
  cached = null;
}
