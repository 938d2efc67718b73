import { randomUUID } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z } from "zod";
import { errorMessage, PlanningError } from "../errors.ts";
import type { ChatClient } from "../ollama-client.ts";
import { validateInput, type ToolRegistry } from "../tools/base.ts";
import type { ChatMessage, Plan, PlanStep } from "../types.ts";
import { formatZodError } from "../utils/validation.ts";

/** Turns a prompt into an executable plan. */
export interface Planner {
  createPlan(prompt: string, signal?: AbortSignal): Promise<Plan>;
}

const rawStepSchema = z.object({
  step_number: z.number().int(),
  tool: z.string().min(1),
  input: z.record(z.unknown()),
  reasoning: z.string(),
});

const rawPlanSchema = z.object({
  steps: z.array(rawStepSchema).min(1, "Plan must have at least one step"),
});

const examplesSchema = z.array(
  z.object({
    prompt: z.string(),
    steps: z.array(rawStepSchema),
  })
);

export type PlannerExample = z.infer<typeof examplesSchema>[number];

const DEFAULT_EXAMPLES_PATH = join(dirname(fileURLToPath(import.meta.url)), "../../data/planner-examples.yaml");

/** Loads few-shot examples for the system prompt. A missing file yields none. */
export function loadPlannerExamples(path = DEFAULT_EXAMPLES_PATH): PlannerExample[] {
  if (!existsSync(path)) {
    console.warn(`[planner] ${path} not found, planning without examples`);
    return [];
  }

  const parsed: unknown = parse(readFileSync(path, "utf-8"));
  if (parsed == null) return [];
  return examplesSchema.parse(parsed);
}

/** Pulls the JSON object out of a reply that may be wrapped in a markdown fence or prose. */
export function extractJson(text: string): string {
  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/.exec(text);
  if (fenced?.[1]) return fenced[1];

  const bare = /\{[\s\S]*\}/.exec(text);
  if (bare) return bare[0];

  return text.trim();
}

export interface LlmPlannerOptions {
  model?: string;
  examples?: PlannerExample[];
}

export class LlmPlanner implements Planner {
  private readonly model: string;
  private readonly examples: PlannerExample[];

  constructor(
    private readonly registry: ToolRegistry,
    private readonly client: ChatClient,
    options: LlmPlannerOptions = {}
  ) {
    this.model = options.model ?? "gpt-oss";
    this.examples = options.examples ?? loadPlannerExamples();
  }

  async createPlan(prompt: string, signal?: AbortSignal): Promise<Plan> {
    if (!prompt.trim()) {
      throw new PlanningError("Prompt cannot be empty");
    }

    const toolsInfo = this.formatToolsForPrompt();
    try {
      const raw = await this.client.chat({
        model: this.model,
        messages: [
          { role: "system", content: this.buildSystemPrompt(toolsInfo) },
          { role: "user", content: prompt },
        ],
        temperature: 0.1,
        maxTokens: 1000,
        signal,
      });
      return this.parsePlan(raw);
    } catch (error) {
      if (signal?.aborted) throw error;
      console.warn(`[planner] First attempt failed: ${errorMessage(error)}. Trying simplified prompt...`);
    }

    try {
      const raw = await this.client.chat({
        model: this.model,
        messages: [{ role: "user", content: this.buildFallbackPrompt(toolsInfo, prompt) }],
        temperature: 0.1,
        signal,
      });
      return this.parsePlan(raw);
    } catch (error) {
      throw new PlanningError(`Failed to generate valid plan: ${errorMessage(error)}`);
    }
  }

  /** Parses and validates a model reply against the registered tools. */
  parsePlan(rawResponse: string): Plan {
    let data: unknown;
    try {
      data = JSON.parse(extractJson(rawResponse));
    } catch (error) {
      throw new PlanningError(`Invalid JSON in response: ${errorMessage(error)}`);
    }

    const result = rawPlanSchema.safeParse(data);
    if (!result.success) {
      throw new PlanningError(`Invalid plan: ${formatZodError(result.error)}`);
    }

    const steps: PlanStep[] = result.data.steps.map((step, idx) => {
      if (!this.registry.exists(step.tool)) {
        throw new PlanningError(
          `Invalid step ${idx + 1}: Tool '${step.tool}' not found. Available tools: ${this.registry.names().join(", ")}`
        );
      }
      const tool = this.registry.get(step.tool);
      if (!validateInput(tool.inputSchema, step.input)) {
        throw new PlanningError(
          `Invalid step ${idx + 1}: Input validation failed for tool '${step.tool}'. ` +
            `Expected schema: ${JSON.stringify(tool.inputSchema)}`
        );
      }
      return {
        stepNumber: step.step_number,
        tool: step.tool,
        input: step.input,
        reasoning: step.reasoning,
      };
    });

    return { planId: randomUUID(), steps };
  }

  private formatToolsForPrompt(): string {
    return Object.values(this.registry.listTools())
      .map(
        (info) =>
          `Tool: ${info.name}\nDescription: ${info.description}\nInput Schema: ${JSON.stringify(info.input_schema, null, 2)}`
      )
      .join("\n\n");
  }

  private buildSystemPrompt(toolsInfo: string): string {
    const toolNames = this.registry
      .names()
      .map((name) => `"${name}"`)
      .join(", ");
    const examples = this.examples
      .map((example) => `User: "${example.prompt}"\n${JSON.stringify({ steps: example.steps }, null, 2)}`)
      .join("\n\n");

    return [
      "You are a task planning assistant. Your job is to convert user requests into structured execution plans.",
      `Available Tools:\n${toolsInfo}`,
      "You must respond with ONLY a valid JSON object (no other text) with this exact structure:",
      JSON.stringify(
        {
          steps: [{ step_number: 1, tool: "ToolName", input: { param: "value" }, reasoning: "why this step is needed" }],
        },
        null,
        2
      ),
      [
        "Rules:",
        "1. Use only the tools listed above",
        `2. Tool names must match exactly (${toolNames})`,
        "3. Input must match the tool's schema",
        "4. Steps should be sequential and logical",
        "5. Respond ONLY with the JSON object, no markdown, no explanation",
      ].join("\n"),
      ...(examples ? [`Examples:\n\n${examples}`] : []),
    ].join("\n\n");
  }

  private buildFallbackPrompt(toolsInfo: string, userPrompt: string): string {
    return [
      `Create a JSON plan with steps to accomplish: ${userPrompt}`,
      `Available tools and their formats:\n${toolsInfo}`,
      "Respond with ONLY this JSON format:",
      '{"steps": [{"step_number": 1, "tool": "ToolName", "input": {}, "reasoning": "explanation"}]}',
    ].join("\n\n");
  }
}
