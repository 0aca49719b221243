import type { Command } from "commander";
import {
  getToolTierLabel,
  listIntentToolSections,
  type IntentToolSection,
} from "../agents/tool-catalog.js";
import { resolveScoringConfig } from "../agents/tool-policy-shared.js";
import { loadConfig } from "../config/config.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

type ToolsListOptions = {
  json?: boolean;
  tier?: string;
};

type ToolsListReport = {
  tier: string;
  label: string;
  count: number;
  validToolNames: string[];
  queryToolNames: string[];
  sections: IntentToolSection[];
};

function buildToolsListReport(tier: string, runtime: RuntimeEnv): ToolsListReport {
  const config = loadConfig();
  const scoring = resolveScoringConfig(
    { tier, alsoAllow: config.tools.alsoAllow, deny: config.tools.deny },
    runtime.error,
  );
  const validToolNames = [...scoring.validToolNames];
  return {
    tier,
    label: getToolTierLabel(tier),
    count: validToolNames.length,
    validToolNames,
    queryToolNames: [...scoring.queryToolNames],
    sections: listIntentToolSections(tier),
  };
}

function formatToolsListText(report: ToolsListReport): string {
  const lines: string[] = [];
  lines.push(`Tool tier: ${report.tier} - ${report.label}`);
  lines.push(`Allowed tools: ${report.count}`);
  for (const section of report.sections) {
    lines.push("");
    lines.push(`--- ${section.label} (${section.tools.length}) ---`);
    for (const tool of section.tools) {
      const query = report.queryToolNames.includes(tool.id) ? " [query]" : "";
      lines.push(`  ${tool.id}: ${tool.description}${query}`);
    }
  }
  const extra = report.validToolNames.filter(
    (name) => !report.sections.some((section) => section.tools.some((tool) => tool.id === name)),
  );
  if (extra.length) {
    lines.push("");
    lines.push(`Also allowed: ${extra.join(", ")}`);
  }
  return lines.join("\n");
}

export function registerToolsCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  const tools = program
    .command("tools")
    .description("Inspect the intent tool catalog and the allow-list used for scoring");

  tools
    .command("list")
    .description("List the tools allowed for a tier")
    .option("--json", "Output as JSON", false)
    .option("--tier <tier>", "Tool tier: mvp or full (defaults to VOICE_BENCH_TOOL_TIER)")
    .action((opts: ToolsListOptions) => {
      try {
        const tier = opts.tier ?? loadConfig().tools.tier;
        const report = buildToolsListReport(tier, runtime);
        if (opts.json) {
          runtime.log(JSON.stringify(report, null, 2));
        } else {
          runtime.log(formatToolsListText(report));
        }
      } catch (err) {
        runtime.error(String(err));
        runtime.exit(1);
      }
    });
}
