import { generateText, type LanguageModel } from 'ai';
import { calculateCost } from './models.js';
import { BudgetExceededError, type CostTracker } from './cost.js';
import { withTimeout } from './timeout.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  /** Raw model-id string (for cost look-up). */
  modelId: string;
  system: string;
  /** The single user message. */
  prompt: string;
  maxOutputTokens?: number;
  temperature?: number;
  topP?: number;
  /** Hard limit for the whole call. */
  timeoutMs: number;
  budget?: { maxCostUsd: number; tracker: CostTracker };
  abortSignal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  finishReason: string;
  usage: { inputTokens: number; outputTokens: number; costUsd: number };
}

/**
 * One non-streaming model call. The AI SDK's own retries are disabled; a
 * failure surfaces to the caller unchanged.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  options.budget?.tracker.checkBudget(options.budget.maxCostUsd);

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.abortSignal?.addEventListener('abort', onAbort, { once: true });

  try {
    const result = await withTimeout(
      generateText({
        model: options.model,
        system: options.system,
        prompt: options.prompt,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        topP: options.topP,
        maxRetries: 0,
        abortSignal: controller.signal,
      }),
      options.timeoutMs,
      options.abortSignal,
    );

    const inputTokens = result.usage.inputTokens ?? 0;
    const outputTokens = result.usage.outputTokens ?? 0;
    const costUsd = calculateCost(options.modelId, inputTokens, outputTokens);

    if (options.budget) {
      options.budget.tracker.addCost(costUsd);
      if (options.budget.tracker.totalSpent > options.budget.maxCostUsd) {
        throw new BudgetExceededError(options.budget.tracker.totalSpent, options.budget.maxCostUsd);
      }
    }

    return {
      content: result.text,
      finishReason: result.finishReason,
      usage: { inputTokens, outputTokens, costUsd },
    };
  } catch (err) {
    // Stop the underlying request when the timeout fires first.
    controller.abort();
    throw err;
  } finally {
    options.abortSignal?.removeEventListener('abort', onAbort);
  }
}
