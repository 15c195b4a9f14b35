export {
  type GenerateOptions,
  NARRATIVE_SYSTEM_PROMPT,
  DEFAULT_GENERATION,
  checkPromptSize,
  generateNarrative,
} from './narrative.js';
