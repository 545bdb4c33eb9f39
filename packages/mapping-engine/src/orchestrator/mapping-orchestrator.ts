/**
 * Mapping Orchestrator
 *
 * Drives catalog lookup, the mapping tiers, the transform filter and the
 * validator for each connector. Errors never cross a connector boundary.
 */

import {
  createRunId,
  Logger,
  NAME_KEY,
  CONNECTOR_CLASS_KEY,
  TASKS_MAX_KEY,
  TranslationError,
  type IssueSeverity,
  type MappingIssue,
  type MappingResult,
  type SmConnector,
} from '@connect-migrator/core';
import {
  CachedSimilarityProvider,
  LexicalSimilarityProvider,
  type SimilarityProvider,
} from '@connect-migrator/similarity';
import type { TemplateCatalog } from '../catalog/template-catalog.js';
import { TransformRegistry } from '../catalog/transform-registry.js';
import { normalizeConnectorInput } from '../input/normalize-input.js';
import { issues, renderIssue } from '../issues/issues.js';
import { MappingContext } from '../tiers/context.js';
import { DirectMatcher } from '../tiers/direct-matcher.js';
import { SemanticMatcher } from '../tiers/semantic-matcher.js';
import {
  DEFAULT_STATIC_MAPPINGS,
  StaticMappingTable,
  type StaticMapping,
} from '../tiers/static-mapping-table.js';
import { TemplateRuleMapper } from '../tiers/template-rule-mapper.js';
import type { MappingTier } from '../tiers/tier.js';
import { filterTransforms } from '../transforms/transform-filter.js';
import { validateMapping } from '../validation/validator.js';
import { mapBounded } from './bounded-map.js';
import { DEFAULT_TIER_ORDER, validateTierOrder, type TierName } from './tier-order.js';

export const DEFAULT_CONCURRENCY = 4;

export interface MappingOrchestratorOptions {
  catalog: TemplateCatalog;
  transforms?: TransformRegistry;
  /** Backend for the semantic tier (default: cached lexical provider) */
  similarityProvider?: SimilarityProvider;
  semanticThreshold?: number;
  semanticFailureSeverity?: IssueSeverity;
  /** Tiers to run, highest priority first */
  tierOrder?: readonly string[];
  staticMappings?: readonly StaticMapping[];
  /** Connectors translated at once by translateAll (default: 4) */
  concurrency?: number;
  logger?: Logger;
}

export interface ConnectorTranslation {
  result: MappingResult;
  /** Structured issues behind mapping_errors and mapping_warnings */
  issues: MappingIssue[];
  templateId: string | null;
  successful: boolean;
}

export interface BatchTranslation {
  runId: string;
  results: ConnectorTranslation[];
  successful: number;
  failed: number;
  /** Input entries the normaliser skipped */
  inputWarnings: string[];
}

export function toMappingResult(
  connector: SmConnector,
  config: MappingResult['config'],
  found: readonly MappingIssue[],
  unmapped: readonly string[]
): MappingResult {
  return {
    name: connector.name,
    sm_config: { ...connector.config },
    config,
    mapping_errors: found.filter((issue) => issue.severity === 'error').map(renderIssue),
    mapping_warnings: found.filter((issue) => issue.severity === 'warning').map(renderIssue),
    unmapped_configs: [...unmapped],
  };
}

export class MappingOrchestrator {
  readonly tierOrder: readonly TierName[];
  private readonly catalog: TemplateCatalog;
  private readonly transforms: TransformRegistry;
  private readonly tiers: ReadonlyMap<TierName, MappingTier>;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: MappingOrchestratorOptions) {
    this.catalog = options.catalog;
    this.transforms = options.transforms ?? new TransformRegistry();
    this.tierOrder = validateTierOrder(options.tierOrder ?? DEFAULT_TIER_ORDER);
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger ?? new Logger({ level: 'warn' });

    const provider =
      options.similarityProvider ?? new CachedSimilarityProvider(new LexicalSimilarityProvider());

    this.tiers = new Map<TierName, MappingTier>([
      ['direct', new DirectMatcher()],
      ['template-rule', new TemplateRuleMapper()],
      ['static', new StaticMappingTable(options.staticMappings ?? DEFAULT_STATIC_MAPPINGS)],
      [
        'semantic',
        new SemanticMatcher(provider, {
          threshold: options.semanticThreshold,
          failureSeverity: options.semanticFailureSeverity,
        }),
      ],
    ]);
  }

  /**
   * Translate one connector. Never throws: failures become issues.
   */
  async translateConnector(connector: SmConnector, logger = this.logger): Promise<ConnectorTranslation> {
    const log = logger.child({ connector: connector.name });

    try {
      const template = this.catalog.resolve(connector.config);
      log.debug('Template resolved', { templateId: template.templateId });

      const ctx = new MappingContext(template, connector, log);
      this.writeStructural(ctx);

      for (const name of this.tierOrder) {
        const tier = this.tiers.get(name);
        if (tier) {
          await tier.apply(ctx);
        }
      }

      const filtered = filterTransforms(
        connector.config,
        this.transforms.supportedFor(template),
        log
      );
      for (const issue of filtered.issues) {
        ctx.report(issue);
      }
      for (const [key, value] of filtered.entries) {
        ctx.write(key, value, 'structural');
      }

      const { unmapped } = validateMapping(ctx);
      return this.finish(connector, template.templateId, ctx.toConfig(), ctx.issues, unmapped);
    } catch (error) {
      const failure = TranslationError.from(error, connector.name);
      const missingTemplate = failure.code === 'TEMPLATE_NOT_FOUND';
      const issue = missingTemplate
        ? issues.templateNotFound(connector.config[CONNECTOR_CLASS_KEY]?.trim() || undefined)
        : issues.internalError(failure.message);

      log.log(missingTemplate ? 'warn' : 'error', issue.message, {
        code: failure.code,
        ...(missingTemplate ? {} : { error: failure }),
      });
      return this.finish(connector, null, {}, [issue], []);
    }
  }

  /**
   * Translate a batch with bounded concurrency. Results keep input order.
   */
  async translateAll(
    connectors: readonly SmConnector[],
    inputWarnings: readonly string[] = []
  ): Promise<BatchTranslation> {
    const runId = createRunId();
    const log = this.logger.child({ runId });

    log.info('Translating connectors', { count: connectors.length, tiers: this.tierOrder });

    const results = await mapBounded(connectors, this.concurrency, (connector) =>
      this.translateConnector(connector, log)
    );

    const successful = results.filter((translation) => translation.successful).length;
    log.info('Translation finished', { successful, failed: results.length - successful });

    return {
      runId,
      results,
      successful,
      failed: results.length - successful,
      inputWarnings: [...inputWarnings],
    };
  }

  /**
   * Normalise raw input of any accepted shape, then translate it
   *
   * @throws TranslationError INVALID_INPUT for an unusable top-level shape
   */
  async translateInput(raw: unknown): Promise<BatchTranslation> {
    const { connectors, warnings } = normalizeConnectorInput(raw);
    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    return this.translateAll(connectors, warnings);
  }

  private writeStructural(ctx: MappingContext): void {
    ctx.write(CONNECTOR_CLASS_KEY, ctx.template.templateId, 'structural');
    ctx.write(NAME_KEY, ctx.connector.name, 'structural');
    const tasksMax = ctx.sourceValue(TASKS_MAX_KEY)?.trim();
    ctx.write(TASKS_MAX_KEY, tasksMax || '1', 'structural');
  }

  private finish(
    connector: SmConnector,
    templateId: string | null,
    config: MappingResult['config'],
    found: MappingIssue[],
    unmapped: string[]
  ): ConnectorTranslation {
    return {
      result: toMappingResult(connector, config, found, unmapped),
      issues: found,
      templateId,
      successful: !found.some((issue) => issue.severity === 'error'),
    };
  }
}
