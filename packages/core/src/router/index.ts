export {
  type ModelInfo,
  MODEL_CATALOG,
  getModelInfo,
  calculateCost,
  estimateTokens,
} from './models.js';

export { CostTracker, BudgetExceededError } from './cost.js';

export {
  type ProviderId,
  type ProviderConfig,
  PROVIDER_DEFAULT_MODELS,
  detectProvider,
  remapModelForProvider,
  ProviderRegistry,
} from './providers.js';

export { type LLMCallOptions, type LLMResponse, callLLM } from './llm.js';

export {
  type ErrorCategory,
  classifyError,
  withTimeout,
  TimeoutError,
  AbortError,
} from './timeout.js';
