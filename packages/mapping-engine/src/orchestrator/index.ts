export {
  MappingOrchestrator,
  toMappingResult,
  DEFAULT_CONCURRENCY,
} from './mapping-orchestrator.js';
export type {
  MappingOrchestratorOptions,
  ConnectorTranslation,
  BatchTranslation,
} from './mapping-orchestrator.js';
export { mapBounded } from './bounded-map.js';
export {
  TIER_NAMES,
  DEFAULT_TIER_ORDER,
  isTierName,
  validateTierOrder,
} from './tier-order.js';
export type { TierName } from './tier-order.js';
