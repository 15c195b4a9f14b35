export {
  type IdentifiedRecord,
  type CitationResolver,
  type IdRegistryOptions,
  IdRegistry,
  RegistryGroup,
  formatId,
  CURRENT_PERIOD,
  COMPARISON_PERIOD,
  COMPARISON_PREFIX,
} from './id-registry.js';
