import type { LanguageModel } from 'ai';
import { ExternalCallError, PromptTooLargeError } from '../errors.js';
import { callLLM, type LLMResponse } from '../router/llm.js';
import { estimateTokens, getModelInfo } from '../router/models.js';
import { classifyError } from '../router/timeout.js';
import type { CostTracker } from '../router/cost.js';

export const NARRATIVE_SYSTEM_PROMPT =
  'You write data-grounded analytics reports in Markdown. You only state figures that appear in the supplied tables, and you cite each one.';

export const DEFAULT_GENERATION = {
  temperature: 0.2,
  topP: 0.8,
  maxOutputTokens: 8000,
  timeoutMs: 120_000,
} as const;

export interface GenerateOptions {
  prompt: string;
  model: LanguageModel;
  modelId: string;
  timeoutMs?: number;
  maxOutputTokens?: number;
  temperature?: number;
  topP?: number;
  budget?: { maxCostUsd: number; tracker: CostTracker };
  abortSignal?: AbortSignal;
}

/** Reject prompts that cannot fit the model's context window with room for the answer. */
export function checkPromptSize(prompt: string, modelId: string, maxOutputTokens: number): number {
  const estimated = estimateTokens(NARRATIVE_SYSTEM_PROMPT) + estimateTokens(prompt);
  const window = getModelInfo(modelId).contextWindow;
  if (estimated + maxOutputTokens > window) {
    throw new PromptTooLargeError(estimated, window - maxOutputTokens);
  }
  return estimated;
}

/**
 * Ask the model for the report narrative: one request, explicit timeout,
 * no retry. Any failure becomes an ExternalCallError.
 */
export async function generateNarrative(options: GenerateOptions): Promise<LLMResponse> {
  let response: LLMResponse;
  try {
    response = await callLLM({
      model: options.model,
      modelId: options.modelId,
      system: NARRATIVE_SYSTEM_PROMPT,
      prompt: options.prompt,
      timeoutMs: options.timeoutMs ?? DEFAULT_GENERATION.timeoutMs,
      maxOutputTokens: options.maxOutputTokens ?? DEFAULT_GENERATION.maxOutputTokens,
      temperature: options.temperature ?? DEFAULT_GENERATION.temperature,
      topP: options.topP ?? DEFAULT_GENERATION.topP,
      budget: options.budget,
      abortSignal: options.abortSignal,
    });
  } catch (err) {
    const category = classifyError(err);
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExternalCallError(`Model ${options.modelId} call failed (${category}): ${detail}`, category, err);
  }

  if (response.content.trim().length === 0) {
    throw new ExternalCallError(
      `Model ${options.modelId} returned an empty response (finish reason: ${response.finishReason})`,
      'empty_response',
    );
  }
  return response;
}
