export {
  type PromptInstructions,
  DEFAULT_INSTRUCTIONS,
  CITATION_TOKEN_SHAPE,
  compose,
} from './composer.js';
