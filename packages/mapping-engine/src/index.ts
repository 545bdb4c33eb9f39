/**
 * @connect-migrator/mapping-engine
 *
 * Translates self-managed connector configs into fully-managed ones:
 * template catalog, mapping tiers, transform filter and validation.
 */

import type { TemplateCatalog } from './catalog/index.js';
import {
  MappingOrchestrator as _MappingOrchestrator,
  type MappingOrchestratorOptions,
} from './orchestrator/index.js';

export * from './catalog/index.js';
export * from './input/index.js';
export * from './issues/index.js';
export * from './tiers/index.js';
export * from './transforms/index.js';
export * from './validation/index.js';
export * from './orchestrator/index.js';
export * from './formatters/index.js';

/**
 * Factory function to create a MappingOrchestrator
 */
export function createMappingOrchestrator(
  catalog: TemplateCatalog,
  options: Omit<MappingOrchestratorOptions, 'catalog'> = {}
): _MappingOrchestrator {
  return new _MappingOrchestrator({ ...options, catalog });
}
