/**
 * Per-connector mapping state shared by the tiers
 *
 * Targets are write-once: the first tier to set an FM key wins.
 * Source keys are claimed by the tier that consumed them; whatever is
 * left unclaimed at the end is reported as unmapped.
 */

import {
  isStructuralKey,
  type ConnectorConfig,
  type FmTemplate,
  type Logger,
  type MappingIssue,
  type MappingRule,
  type PropertyDefinition,
  type SmConnector,
} from '@connect-migrator/core';
import type { TierName } from '../orchestrator/tier-order.js';

export type WriteOrigin = TierName | 'structural' | 'default';

interface WrittenValue {
  value: string;
  origin: WriteOrigin;
}

export class MappingContext {
  readonly issues: MappingIssue[] = [];
  private readonly output = new Map<string, WrittenValue>();
  private readonly claimedSources = new Set<string>();
  private readonly reservedTargets = new Set<string>();
  private readonly rejectedBySemantic = new Set<string>();
  private readonly definitions: Map<string, PropertyDefinition>;

  constructor(
    readonly template: FmTemplate,
    readonly connector: SmConnector,
    readonly logger: Logger
  ) {
    this.definitions = new Map(template.configDefs.map((def) => [def.name, def]));
  }

  get source(): ConnectorConfig {
    return this.connector.config;
  }

  sourceValue(key: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.source, key) ? this.source[key] : undefined;
  }

  definition(name: string): PropertyDefinition | undefined {
    return this.definitions.get(name);
  }

  /** Rules that apply to this connector's direction, in template order */
  applicableRules(): MappingRule[] {
    return this.template.mappingRules.filter(
      (rule) =>
        rule.type !== 'value' ||
        rule.appliesTo === 'ANY' ||
        rule.appliesTo === this.template.connectorType
    );
  }

  /**
   * Write a target unless some tier already did.
   * @returns false when the target was already set
   */
  write(target: string, value: string, origin: WriteOrigin): boolean {
    const existing = this.output.get(target);
    if (existing) {
      this.logger.debug('Target already set; keeping first value', {
        target,
        keptFrom: existing.origin,
        skippedFrom: origin,
      });
      return false;
    }
    this.output.set(target, { value, origin });
    return true;
  }

  remove(target: string): void {
    this.output.delete(target);
  }

  has(target: string): boolean {
    return this.output.has(target);
  }

  valueOf(target: string): string | undefined {
    return this.output.get(target)?.value;
  }

  originOf(target: string): WriteOrigin | undefined {
    return this.output.get(target)?.origin;
  }

  outputKeys(): string[] {
    return [...this.output.keys()];
  }

  /** Keep a target out of later tiers without writing it */
  reserveTarget(target: string): void {
    this.reservedTargets.add(target);
  }

  isTargetTaken(target: string): boolean {
    return this.output.has(target) || this.reservedTargets.has(target);
  }

  claimSource(key: string): void {
    this.claimedSources.add(key);
  }

  isClaimed(key: string): boolean {
    return this.claimedSources.has(key);
  }

  /** Non-structural SM keys no tier has consumed, in declaration order */
  unclaimedSourceKeys(): string[] {
    return Object.keys(this.source).filter(
      (key) => !isStructuralKey(key) && !this.claimedSources.has(key)
    );
  }

  markSemanticRejected(key: string): void {
    this.rejectedBySemantic.add(key);
  }

  wasSemanticRejected(key: string): boolean {
    return this.rejectedBySemantic.has(key);
  }

  report(issue: MappingIssue): void {
    this.issues.push(issue);
    this.logger.log(issue.severity === 'error' ? 'warn' : 'info', issue.message, {
      code: issue.code,
      key: issue.key,
    });
  }

  toConfig(): ConnectorConfig {
    const config: ConnectorConfig = {};
    for (const [key, { value }] of this.output) {
      config[key] = value;
    }
    return config;
  }
}
