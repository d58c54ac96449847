import * as fs from "node:fs";

import { z } from "zod";

import { silentLogger, type AgentLogger } from "../logger";
import type { ToolSpec } from "../tools/tool_types";

export const PromptConfigSchema = z.object({
  version: z.string(),
  baseInstructions: z.string().min(1),
  dateGuidance: z.string().default("Today is {today}."),
  toolGuidance: z
    .object({
      whenToUseTools: z.array(z.string()).default([]),
      whenNotToUseTools: z.array(z.string()).default([]),
      toolCombinations: z.array(z.string()).default([]),
    })
    .default({}),
  communicationStyle: z.array(z.string()).default([]),
  formattingGuidelines: z.array(z.string()).default([]),
});

export type PromptConfig = z.infer<typeof PromptConfigSchema>;

export const FALLBACK_PROMPT_CONFIG: PromptConfig = {
  version: "fallback",
  baseInstructions:
    "You are a portfolio assistant for the signed-in user. Answer questions about their holdings and performance using the tools provided. Never guess figures; if a tool fails, say so.",
  dateGuidance: "Today is {today}.",
  toolGuidance: { whenToUseTools: [], whenNotToUseTools: [], toolCombinations: [] },
  communicationStyle: [],
  formattingGuidelines: [],
};

/**
 * Reads the prompt configuration. A missing or malformed file falls back to
 * a minimal built-in prompt so the agent still runs.
 */
export function loadPromptConfig(path: string, log: AgentLogger = silentLogger): PromptConfig {
  if (!fs.existsSync(path)) {
    log.warn({ evt: "prompt_config.missing", path }, "prompt_config.missing");
    return FALLBACK_PROMPT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (error) {
    log.error({ evt: "prompt_config.unreadable", path, error: String(error) }, "prompt_config.unreadable");
    return FALLBACK_PROMPT_CONFIG;
  }

  const parsed = PromptConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.error(
      { evt: "prompt_config.invalid", path, issues: parsed.error.issues.map((issue) => issue.message) },
      "prompt_config.invalid"
    );
    return FALLBACK_PROMPT_CONFIG;
  }
  return parsed.data;
}

function section(lines: string[], title: string, items: string[], format: (item: string) => string = (item) => `- ${item}`) {
  if (items.length === 0) return;
  lines.push(title);
  for (const item of items) lines.push(format(item));
  lines.push("");
}

export function buildSystemPrompt(config: PromptConfig, args: { today: string; tools: ToolSpec[] }): string {
  const lines: string[] = [];

  lines.push(config.baseInstructions.trim());
  lines.push(config.dateGuidance.replace(/\{today\}/g, args.today));
  lines.push("");

  section(
    lines,
    "YOUR AVAILABLE TOOLS:",
    args.tools.map((tool) => `${tool.name}: ${tool.description}`)
  );
  section(lines, "Use tools for requests like:", config.toolGuidance.whenToUseTools, (item) => `- "${item}"`);
  section(lines, "Answer directly, without tools, for:", config.toolGuidance.whenNotToUseTools, (item) => `- "${item}"`);
  section(lines, "TOOL COMBINATIONS:", config.toolGuidance.toolCombinations);
  section(lines, "COMMUNICATION STYLE:", config.communicationStyle);
  section(lines, "FORMATTING:", config.formattingGuidelines);

  return lines.join("\n").trimEnd();
}
