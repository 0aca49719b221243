import fs from "node:fs";
import type { Command } from "commander";
import { z } from "zod";
import { resolveScoringConfig } from "../agents/tool-policy-shared.js";
import { loadConfig } from "../config/config.js";
import { decodeActualCallList } from "../eval/decode.js";
import { scoreToolCalls, type ToolCallSample } from "../eval/tool-call-eval.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

type ScoreCommandOptions = {
  file?: string;
  target?: string;
  actual?: string;
  responseType?: string;
  alternatives?: string;
  tier?: string;
  json?: boolean;
  strict?: boolean;
};

const SampleFileSchema = z.object({
  target: z.union([z.string(), z.array(z.unknown())]),
  actual: z.array(z.unknown()).default([]),
  response_type: z.string().optional(),
  alternatives: z.unknown().optional(),
});

function decodeActualCalls(text: string): ToolCallSample["actual"] {
  const decoded = decodeActualCallList(text);
  if (!decoded.ok) {
    throw new Error(`Invalid --actual calls: ${decoded.error}`);
  }
  return decoded.value;
}

function readSampleFile(filePath: string): ToolCallSample {
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed = SampleFileSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid sample file ${filePath}: ${parsed.error.message}`);
  }
  const { target, actual, response_type, alternatives } = parsed.data;
  return {
    target: typeof target === "string" ? target : JSON.stringify(target),
    actual: decodeActualCalls(JSON.stringify(actual)),
    responseType: response_type,
    alternatives,
  };
}

export function resolveSample(opts: ScoreCommandOptions): ToolCallSample {
  if (opts.file) {
    const sample = readSampleFile(opts.file);
    return {
      ...sample,
      responseType: opts.responseType ?? sample.responseType,
      alternatives: opts.alternatives ?? sample.alternatives,
    };
  }
  if (opts.target === undefined) {
    throw new Error("Either --file or --target is required.");
  }
  return {
    target: opts.target,
    actual: decodeActualCalls(opts.actual ?? "[]"),
    responseType: opts.responseType,
    alternatives: opts.alternatives,
  };
}

export function registerScoreCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program
    .command("score")
    .description("Score one sample's tool calls against its expected calls")
    .option("--file <path>", "JSON file with target, actual, response_type and alternatives")
    .option("--target <json>", "Expected calls as a JSON array")
    .option("--actual <json>", "Actual calls as a JSON array", "[]")
    .option("--response-type <type>", "Expected response type (default: action_done)")
    .option("--alternatives <json>", "Alternative expected call sets as JSON (overrides the file's)")
    .option("--tier <tier>", "Tool tier for the allow-list (defaults to VOICE_BENCH_TOOL_TIER)")
    .option("--json", "Output the score as JSON", false)
    .option("--strict", "Exit with code 2 when the score is incorrect", false)
    .action((opts: ScoreCommandOptions) => {
      try {
        const config = loadConfig();
        const scoring = resolveScoringConfig(
          {
            tier: opts.tier ?? config.tools.tier,
            alsoAllow: config.tools.alsoAllow,
            deny: config.tools.deny,
          },
          runtime.error,
        );
        const sample = resolveSample(opts);
        const score = scoreToolCalls(sample, { config: scoring, warn: runtime.error });

        if (opts.json) {
          runtime.log(JSON.stringify(score, null, 2));
        } else {
          runtime.log(`Score: ${score.overall}`);
          runtime.log(score.explanation);
        }
        if (opts.strict && score.overall !== "correct") {
          runtime.exit(2);
        }
      } catch (err) {
        runtime.error(String(err));
        runtime.exit(1);
      }
    });
}
