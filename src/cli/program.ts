import { Command } from "commander";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { registerScoreCli } from "./score-cli.js";
import { registerToolsCli } from "./tools-cli.js";

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("voice-intent-bench")
    .description("Score voice-assistant intent tool calls against expected calls");
  registerScoreCli(program, runtime);
  registerToolsCli(program, runtime);
  return program;
}
