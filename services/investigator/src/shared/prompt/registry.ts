/**
 * Prompt Registry
 * Manages versioned prompts by role
 */

import type { IPromptRegistry, PromptVariant } from "./types.js";

export class PromptRegistry implements IPromptRegistry {
  private readonly prompts: Map<string, PromptVariant> = new Map();
  private readonly defaults: Map<string, string> = new Map(); // role -> id

  get(id: string): PromptVariant | undefined {
    return this.prompts.get(id);
  }

  getDefault(role: string): PromptVariant | undefined {
    const id = this.defaults.get(role);
    return id ? this.prompts.get(id) : undefined;
  }

  register(variant: PromptVariant): void {
    this.prompts.set(variant.id, variant);

    if (variant.isDefault) {
      this.defaults.set(variant.role, variant.id);
    }
  }

  list(): PromptVariant[] {
    return Array.from(this.prompts.values());
  }

  /**
   * Render template plus output format. Pure: same variables, same text.
   */
  render(id: string, variables: Record<string, unknown>): string {
    const variant = this.prompts.get(id);
    if (!variant) {
      throw new Error(`Prompt not found: ${id}`);
    }

    const parts = [renderTemplate(variant.template, variables)];
    if (variant.outputFormat) {
      parts.push(variant.outputFormat);
    }
    return parts.join("\n\n");
  }
}

/**
 * Render template with variable substitution
 */
export function renderTemplate(template: string, variables: Record<string, unknown>): string {
  let result = template;

  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    const stringValue = typeof value === "object" ? JSON.stringify(value, null, 2) : String(value);
    result = result.split(placeholder).join(stringValue);
  }

  return result;
}

export function createPromptRegistry(): PromptRegistry {
  return new PromptRegistry();
}

/**
 * Helper to define a prompt variant
 */
export function definePrompt(config: Omit<PromptVariant, "createdAt"> & { createdAt?: string }): PromptVariant {
  return {
    ...config,
    createdAt: config.createdAt ?? new Date().toISOString(),
  };
}
