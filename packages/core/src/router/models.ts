/**
 * Known models: price per million tokens (USD) and input context window.
 */
export interface ModelInfo {
  inputPerMillion: number;
  outputPerMillion: number;
  contextWindow: number;
}

export const MODEL_CATALOG: Record<string, ModelInfo> = {
  // Anthropic
  'claude-sonnet-4-20250514':  { inputPerMillion: 3.0,  outputPerMillion: 15.0, contextWindow: 200_000 },
  'claude-3-5-haiku-20241022': { inputPerMillion: 0.80, outputPerMillion: 4.0,  contextWindow: 200_000 },
  // OpenAI
  'gpt-4o':                    { inputPerMillion: 2.50, outputPerMillion: 10.0, contextWindow: 128_000 },
  'gpt-4o-mini':               { inputPerMillion: 0.15, outputPerMillion: 0.60, contextWindow: 128_000 },
  // Google Gemini
  'gemini-2.5-pro':            { inputPerMillion: 1.25, outputPerMillion: 10.0, contextWindow: 1_000_000 },
  'gemini-2.5-flash':          { inputPerMillion: 0.30, outputPerMillion: 2.50, contextWindow: 1_000_000 },
  'gemini-2.0-flash':          { inputPerMillion: 0.10, outputPerMillion: 0.40, contextWindow: 1_000_000 },
};

// Unknown models: sonnet-level pricing and a small window.
const FALLBACK_MODEL: ModelInfo = { inputPerMillion: 3.0, outputPerMillion: 15.0, contextWindow: 128_000 };

export function getModelInfo(modelId: string): ModelInfo {
  return MODEL_CATALOG[modelId] ?? FALLBACK_MODEL;
}

export function calculateCost(modelId: string, inputTokens: number, outputTokens: number): number {
  const info = getModelInfo(modelId);
  return (inputTokens * info.inputPerMillion + outputTokens * info.outputPerMillion) / 1_000_000;
}

/** Tables full of digits and IDs tokenize densely; 3.5 chars/token overestimates a little. */
const CHARS_PER_TOKEN = 3.5;

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
