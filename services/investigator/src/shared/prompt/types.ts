/**
 * Prompt Registry Types
 * Versioned prompt management
 */

/**
 * A versioned prompt variant
 */
export interface PromptVariant {
  /** Unique identifier (e.g., "salesiq_synthesis_v1") */
  id: string;

  name: string;

  version: string;

  description: string;

  /** Role this prompt is for ("synthesis") */
  role: string;

  systemPrompt?: string;

  /** Main template; `{{name}}` placeholders are substituted on render */
  template: string;

  /** Output format instructions appended after the template */
  outputFormat?: string;

  createdAt: string;

  /** Whether this is the default for its role */
  isDefault?: boolean;
}

export interface IPromptRegistry {
  get(id: string): PromptVariant | undefined;

  getDefault(role: string): PromptVariant | undefined;

  register(variant: PromptVariant): void;

  list(): PromptVariant[];

  /**
   * Render a prompt with variables
   */
  render(id: string, variables: Record<string, unknown>): string;
}
