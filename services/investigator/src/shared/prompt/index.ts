export type { PromptVariant, IPromptRegistry } from "./types.js";
export { PromptRegistry, createPromptRegistry, definePrompt, renderTemplate } from "./registry.js";
