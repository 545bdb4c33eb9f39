import type { TierName } from '../orchestrator/tier-order.js';
import type { MappingContext } from './context.js';

/** One step of the mapping pipeline */
export interface MappingTier {
  readonly name: TierName;
  apply(ctx: MappingContext): void | Promise<void>;
}
