/**
 * Synthesis Prompt
 * Versioned template; the prompt is a pure function of question and evidence
 */

import { createPromptRegistry, definePrompt } from "../../shared/prompt/index.js";

export const SYNTHESIS_PROMPT_ID = "salesiq_synthesis_v1";

const SYSTEM_PROMPT = `You are a marketing performance analyst. You explain changes in campaign metrics using only the evidence you are given. You never invent numbers.`;

const TEMPLATE = `An analyst asked: "{{question}}"

Below is the complete investigation log. Each entry shows the action taken, its inputs and its outputs, in order. Metric computations compare a baseline window with the most recent window; "findings" lines give each metric as baseline → current with the relative change and the last baseline day.

<evidence>
{{evidence}}
</evidence>`;

const OUTPUT_FORMAT = `Write the report with exactly these five markdown headings, in this order:

## Summary
## Key Metrics
## Anomalies
## Possible Causes
## Recommendations

In Anomalies, state the size of each change and the day it started. Keep each section short and specific to the evidence.`;

export const synthesisPrompt = definePrompt({
  id: SYNTHESIS_PROMPT_ID,
  name: "Root-cause synthesis",
  version: "1.0.0",
  description: "Turns the investigation log into a five-section report",
  role: "synthesis",
  systemPrompt: SYSTEM_PROMPT,
  template: TEMPLATE,
  outputFormat: OUTPUT_FORMAT,
  isDefault: true,
  createdAt: "2024-06-01T00:00:00.000Z",
});

const registry = createPromptRegistry();
registry.register(synthesisPrompt);

export function buildSynthesisPrompt(evidence: string, question: string): string {
  return registry.render(SYNTHESIS_PROMPT_ID, { question, evidence });
}

export function getSynthesisSystemPrompt(): string {
  return SYSTEM_PROMPT;
}
