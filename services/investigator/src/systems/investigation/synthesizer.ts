/**
 * Narrative Synthesizer
 * One backend call per investigation; output parsed into the five report sections
 */

import { SynthesisError, logger } from "@salesiq/core";
import type { ExecutorProfile, ExecutorResponse, IExecutor } from "../../shared/executor/index.js";
import { buildSynthesisPrompt, getSynthesisSystemPrompt, synthesisPrompt } from "./prompt.js";
import { parseReport } from "./report.js";
import type { Report } from "./types.js";

export interface SynthesizeOptions {
  question: string;
  signal?: AbortSignal;
  /** Sees every backend response, successful or not, before it is parsed */
  onResponse?: (response: ExecutorResponse) => void;
}

export class NarrativeSynthesizer {
  readonly promptId = synthesisPrompt.id;
  readonly promptVersion = synthesisPrompt.version;

  constructor(
    private readonly executor: IExecutor,
    private readonly profile: ExecutorProfile
  ) {}

  /**
   * @throws SynthesisError when the backend fails or times out
   * @throws MalformedResponseError when sections are missing
   */
  async synthesize(evidence: string, options: SynthesizeOptions): Promise<Report> {
    const prompt = buildSynthesisPrompt(evidence, options.question);

    let response: ExecutorResponse;
    try {
      response = await this.executor.execute({
        prompt,
        systemPrompt: getSynthesisSystemPrompt(),
        profile: this.profile,
        signal: options.signal,
      });
    } catch (error) {
      throw new SynthesisError(
        `Backend call failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    options.onResponse?.(response);

    if (!response.success || response.error) {
      const code = response.error?.code ?? "EXECUTOR_ERROR";
      throw new SynthesisError(response.error?.message ?? "Backend call failed", {
        code,
        retryable: code === "LLM_TIMEOUT",
      });
    }

    logger.debug(`[Synthesizer] Response received in ${response.durationMs}ms`, {
      component: "synthesizer",
      attempts: response.attempts,
      costUsd: response.costUsd,
    });

    return parseReport(response.output);
  }
}
