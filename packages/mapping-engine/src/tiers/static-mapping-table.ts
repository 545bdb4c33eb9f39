/**
 * Hand-curated mappings that hold for every template
 */

import type { RuleScope } from '@connect-migrator/core';
import { DEBEZIUM_V1_CLASSES } from '../catalog/connector-classes.js';
import { parseJdbcUrl, type JdbcUrlPart } from '../catalog/jdbc-url.js';
import { issues } from '../issues/index.js';
import type { MappingContext } from './context.js';
import type { MappingTier } from './tier.js';

interface MappingScope {
  appliesTo: RuleScope;
  /** Only for SM connectors of these classes */
  connectorClasses?: readonly string[];
}

/** Translate a source key's value through a lookup table */
export interface ValueTranslation extends MappingScope {
  kind: 'value';
  source: string;
  target: string;
  values: { [smValue: string]: string };
}

/** Rename every key under a prefix */
export interface PrefixRename extends MappingScope {
  kind: 'prefix';
  sourcePrefix: string;
  targetPrefix: string;
}

/** Move one key to a new name */
export interface KeyRename extends MappingScope {
  kind: 'rename';
  source: string;
  target: string;
}

/** Fill a target from one part of the JDBC URL held by a source key */
export interface UrlDerivation extends MappingScope {
  kind: 'derive';
  source: string;
  part: JdbcUrlPart;
  target: string;
}

export type StaticMapping = ValueTranslation | PrefixRename | KeyRename | UrlDerivation;

const CONVERTER_FORMATS = {
  'io.confluent.connect.avro.AvroConverter': 'AVRO',
  'io.confluent.connect.json.JsonSchemaConverter': 'JSON_SR',
  'io.confluent.connect.protobuf.ProtobufConverter': 'PROTOBUF',
  'org.apache.kafka.connect.converters.ByteArrayConverter': 'BYTES',
  'org.apache.kafka.connect.json.JsonConverter': 'JSON',
  'org.apache.kafka.connect.storage.StringConverter': 'STRING',
};

const SUBJECT_NAME_STRATEGIES = {
  'io.confluent.kafka.serializers.subject.TopicNameStrategy': 'TopicNameStrategy',
  'io.confluent.kafka.serializers.subject.RecordNameStrategy': 'RecordNameStrategy',
  'io.confluent.kafka.serializers.subject.TopicRecordNameStrategy': 'TopicRecordNameStrategy',
};

const URL_DERIVATIONS: ReadonlyArray<readonly [JdbcUrlPart, string]> = [
  ['host', 'connection.host'],
  ['port', 'connection.port'],
  ['user', 'connection.user'],
  ['password', 'connection.password'],
  ['database', 'connection.database'],
  ['database', 'db.name'],
  ['connectionType', 'db.connection.type'],
  ['sslServerCertDn', 'ssl.server.cert.dn'],
];

const DEBEZIUM_V1 = Object.values(DEBEZIUM_V1_CLASSES);
const DEBEZIUM_V1_WITH_HISTORY = [
  DEBEZIUM_V1_CLASSES.mysql,
  DEBEZIUM_V1_CLASSES.mariadb,
  DEBEZIUM_V1_CLASSES.sqlserver,
];
const DEBEZIUM_V1_SQLSERVER = [DEBEZIUM_V1_CLASSES.sqlserver];

export const DEFAULT_STATIC_MAPPINGS: readonly StaticMapping[] = [
  { kind: 'value', source: 'key.converter', target: 'output.key.format', appliesTo: 'SOURCE', values: CONVERTER_FORMATS },
  { kind: 'value', source: 'value.converter', target: 'output.data.format', appliesTo: 'SOURCE', values: CONVERTER_FORMATS },
  { kind: 'value', source: 'key.converter', target: 'input.key.format', appliesTo: 'SINK', values: CONVERTER_FORMATS },
  { kind: 'value', source: 'value.converter', target: 'input.data.format', appliesTo: 'SINK', values: CONVERTER_FORMATS },
  {
    kind: 'value',
    source: 'key.converter.key.subject.name.strategy',
    target: 'key.subject.name.strategy',
    appliesTo: 'ANY',
    values: SUBJECT_NAME_STRATEGIES,
  },
  {
    kind: 'value',
    source: 'value.converter.value.subject.name.strategy',
    target: 'value.subject.name.strategy',
    appliesTo: 'ANY',
    values: SUBJECT_NAME_STRATEGIES,
  },
  { kind: 'prefix', sourcePrefix: 'consumer.', targetPrefix: 'consumer.override.', appliesTo: 'SINK' },
  { kind: 'prefix', sourcePrefix: 'producer.', targetPrefix: 'producer.override.', appliesTo: 'SOURCE' },
  ...URL_DERIVATIONS.map(
    ([part, target]): UrlDerivation => ({ kind: 'derive', source: 'connection.url', part, target, appliesTo: 'ANY' })
  ),
  // Debezium v1 names the v2 connectors no longer take
  { kind: 'rename', source: 'database.server.name', target: 'topic.prefix', appliesTo: 'SOURCE', connectorClasses: DEBEZIUM_V1 },
  {
    kind: 'prefix',
    sourcePrefix: 'database.history.',
    targetPrefix: 'schema.history.internal.',
    appliesTo: 'SOURCE',
    connectorClasses: DEBEZIUM_V1_WITH_HISTORY,
  },
  { kind: 'rename', source: 'database.dbname', target: 'database.names', appliesTo: 'SOURCE', connectorClasses: DEBEZIUM_V1_SQLSERVER },
  {
    kind: 'rename',
    source: 'database.applicationIntent',
    target: 'driver.applicationIntent',
    appliesTo: 'SOURCE',
    connectorClasses: DEBEZIUM_V1_SQLSERVER,
  },
];

/**
 * Applies the table to keys still unclaimed. Targets must be declared,
 * non-internal and not yet set.
 */
export class StaticMappingTable implements MappingTier {
  readonly name = 'static' as const;

  constructor(private readonly mappings: readonly StaticMapping[] = DEFAULT_STATIC_MAPPINGS) {}

  apply(ctx: MappingContext): void {
    const direction = ctx.template.connectorType;
    const connectorClass = ctx.sourceValue('connector.class') ?? '';

    for (const mapping of this.mappings) {
      if (mapping.appliesTo !== 'ANY' && mapping.appliesTo !== direction) continue;
      if (mapping.connectorClasses && !mapping.connectorClasses.includes(connectorClass)) continue;

      switch (mapping.kind) {
        case 'value':
          this.applyValue(ctx, mapping);
          break;
        case 'prefix':
          this.applyPrefix(ctx, mapping);
          break;
        case 'rename':
          this.applyRename(ctx, mapping);
          break;
        case 'derive':
          this.applyDerivation(ctx, mapping);
          break;
      }
    }
  }

  private applyValue(ctx: MappingContext, mapping: ValueTranslation): void {
    const smValue = ctx.sourceValue(mapping.source);
    if (smValue === undefined || ctx.isClaimed(mapping.source)) return;
    if (!this.isWritableTarget(ctx, mapping.target)) return;

    const translated = Object.prototype.hasOwnProperty.call(mapping.values, smValue)
      ? mapping.values[smValue]
      : undefined;
    if (translated === undefined) return;

    const existing = ctx.valueOf(mapping.target);
    if (existing === undefined && ctx.isTargetTaken(mapping.target)) return;

    ctx.claimSource(mapping.source);

    if (existing !== undefined) {
      if (existing !== translated) {
        ctx.report(issues.valueMismatch(mapping.target, existing, smValue));
      }
      return;
    }

    ctx.write(mapping.target, translated, this.name);
    ctx.logger.debug('Static value mapping', { source: mapping.source, target: mapping.target });
  }

  private applyPrefix(ctx: MappingContext, mapping: PrefixRename): void {
    for (const key of ctx.unclaimedSourceKeys()) {
      if (!key.startsWith(mapping.sourcePrefix) || key.startsWith(mapping.targetPrefix)) continue;

      const target = mapping.targetPrefix + key.slice(mapping.sourcePrefix.length);
      if (!this.isWritableTarget(ctx, target) || ctx.isTargetTaken(target)) continue;

      ctx.write(target, ctx.sourceValue(key) ?? '', this.name);
      ctx.claimSource(key);
      ctx.logger.debug('Static prefix mapping', { source: key, target });
    }
  }

  private applyRename(ctx: MappingContext, mapping: KeyRename): void {
    const smValue = ctx.sourceValue(mapping.source);
    if (smValue === undefined || ctx.isClaimed(mapping.source)) return;
    if (!this.isWritableTarget(ctx, mapping.target) || ctx.isTargetTaken(mapping.target)) return;

    ctx.write(mapping.target, smValue, this.name);
    ctx.claimSource(mapping.source);
    ctx.logger.debug('Static rename', { source: mapping.source, target: mapping.target });
  }

  /** Runs even when connection.url itself was copied */
  private applyDerivation(ctx: MappingContext, mapping: UrlDerivation): void {
    const url = ctx.sourceValue(mapping.source);
    if (url === undefined) return;
    if (!this.isWritableTarget(ctx, mapping.target) || ctx.isTargetTaken(mapping.target)) return;

    const value = parseJdbcUrl(url)[mapping.part];
    if (value === undefined) return;

    ctx.write(mapping.target, value, this.name);
    ctx.claimSource(mapping.source);
    ctx.logger.debug('Derived from JDBC URL', { source: mapping.source, target: mapping.target });
  }

  private isWritableTarget(ctx: MappingContext, target: string): boolean {
    const def = ctx.definition(target);
    return def !== undefined && !def.internal;
  }
}
