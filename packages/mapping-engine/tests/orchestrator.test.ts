import { beforeAll, describe, expect, it } from 'vitest';
import type { MappingResult, SmConnector } from '@connect-migrator/core';
import {
  createMappingOrchestrator,
  DEFAULT_TIER_ORDER,
  MappingOrchestrator,
  TemplateCatalog,
  TransformRegistry,
  type MappingOrchestratorOptions,
} from '../src/index.js';
import {
  EXAMPLE_SINK,
  JDBC_SOURCE,
  silentLogger,
  stubProvider,
  TEMPLATES_DIR,
  TRANSFORMS_FALLBACK_FILE,
} from './helpers.js';

let catalog: TemplateCatalog;
let transforms: TransformRegistry;

beforeAll(async () => {
  catalog = await TemplateCatalog.fromDirectory(TEMPLATES_DIR);
  transforms = await TransformRegistry.fromFile(TRANSFORMS_FALLBACK_FILE);
});

const pollIntervalProvider = stubProvider([['poll interval', 'poll interval ms', 0.9]]);

function orchestrator(options: Partial<MappingOrchestratorOptions> = {}): MappingOrchestrator {
  return new MappingOrchestrator({
    catalog,
    transforms,
    similarityProvider: stubProvider([]),
    logger: silentLogger(),
    ...options,
  });
}

async function translate(
  connector: SmConnector,
  options: Partial<MappingOrchestratorOptions> = {}
): Promise<MappingResult> {
  return (await orchestrator(options).translateConnector(connector)).result;
}

const sinkConnector = (config: Record<string, string>): SmConnector => ({
  name: 'orders-sink',
  config: { 'connector.class': EXAMPLE_SINK, topics: 'orders', ...config },
});

const shopSource: SmConnector = {
  name: 'shop',
  config: {
    'connector.class': JDBC_SOURCE,
    'connection.url': 'jdbc:mysql://db:3306/shop',
    'connection.user': 'app',
    'connection.password': 'test-secret',
    mode: 'timestamp',
    'quote.sql.identifiers': 'never',
    'key.converter': 'io.confluent.connect.avro.AvroConverter',
    'value.converter': 'io.confluent.connect.json.JsonSchemaConverter',
    'producer.linger.ms': '50',
    'timezone.region': 'Europe',
    'timezone.city': 'Vienna',
    'kafka.service.account.id': 'sa-123',
    'tasks.max': '2',
    'poll.interval': '5000',
    transforms: 'route,unwrap',
    'transforms.route.type': 'org.apache.kafka.connect.transforms.RegexRouter',
    'transforms.route.regex': '(.*)',
    'transforms.route.replacement': 'shop-$1',
    'transforms.unwrap.type': 'io.debezium.transforms.ExtractNewRecordState',
  },
};

describe('MappingOrchestrator', () => {
  it('copies exact matches of a JDBC source', async () => {
    const result = await translate({
      name: 'mysql-users',
      config: {
        'connector.class': JDBC_SOURCE,
        'connection.url': 'jdbc:mysql://localhost:3306/mydb',
        'table.whitelist': 'users',
      },
    });

    expect(result.config).toEqual({
      'connector.class': 'MySqlSource',
      name: 'mysql-users',
      'tasks.max': '1',
      'connection.url': 'jdbc:mysql://localhost:3306/mydb',
      'table.whitelist': 'users',
      'quote.sql.identifiers': 'ALWAYS',
      'output.key.format': 'STRING',
      'topic.prefix': 'mysql-users-',
    });
    expect(result.mapping_errors).toEqual([]);
    expect(result.mapping_warnings).toEqual([
      "[UnresolvedVariable] Mapping rule for 'db.timezone' was skipped because 'timezone.region', 'timezone.city' are not set.",
      "[DefaultApplied] Required FM property 'topic.prefix' was set to its default value 'mysql-users-'.",
    ]);
    expect(result.unmapped_configs).toEqual([]);
  });

  it('runs every tier in priority order', async () => {
    const translation = await orchestrator({ similarityProvider: pollIntervalProvider }).translateConnector(
      shopSource
    );
    const { result } = translation;

    expect(Object.entries(result.config)).toEqual([
      ['connector.class', 'MySqlSource'],
      ['name', 'shop'],
      ['tasks.max', '2'],
      ['connection.url', 'jdbc:mysql://db:3306/shop'],
      ['connection.user', 'app'],
      ['connection.password', 'test-secret'],
      ['mode', 'timestamp'],
      ['quote.sql.identifiers', 'NEVER'],
      ['output.key.format', 'STRING'],
      ['db.timezone', 'Europe/Vienna'],
      ['output.data.format', 'JSON_SR'],
      ['producer.override.linger.ms', '50'],
      ['poll.interval.ms', '5000'],
      ['transforms', 'route'],
      ['transforms.route.type', 'org.apache.kafka.connect.transforms.RegexRouter'],
      ['transforms.route.regex', '(.*)'],
      ['transforms.route.replacement', 'shop-$1'],
      ['topic.prefix', 'shop-'],
    ]);
    expect(result.mapping_errors).toEqual([
      "[TransformUnsupported] Transform 'unwrap' of type 'io.debezium.transforms.ExtractNewRecordState' is not supported by the fully-managed connector and was removed.",
    ]);
    expect(result.mapping_warnings).toEqual([
      "[InternalValueIgnored] Property 'kafka.service.account.id' is managed by the platform; the SM value was ignored.",
      "[ValueMismatch] Property 'output.key.format' is fixed to 'STRING' by the FM template; the SM value 'io.confluent.connect.avro.AvroConverter' was ignored.",
      "[DefaultApplied] Required FM property 'topic.prefix' was set to its default value 'shop-'.",
    ]);
    expect(result.sm_config).toEqual(shopSource.config);
    expect(translation.templateId).toBe('MySqlSource');
    expect(translation.successful).toBe(false);
  });

  it('removes unsupported transforms together with their predicates', async () => {
    const result = await translate(
      sinkConnector({
        'input.key.format': 'AVRO',
        transforms: 'unwrap',
        'transforms.unwrap.type': 'io.debezium.transforms.ExtractNewRecordState',
        predicates: 'predicate_0',
        'transforms.unwrap.predicate': 'predicate_0',
        'predicates.predicate_0.type': 'org.apache.kafka.connect.transforms.predicates.TopicNameMatches',
      })
    );

    expect(Object.keys(result.config).filter((key) => key.startsWith('transforms') || key.startsWith('predicates'))).toEqual([]);
    expect(result.mapping_errors).toEqual([
      "[TransformUnsupported] Transform 'unwrap' of type 'io.debezium.transforms.ExtractNewRecordState' is not supported by the fully-managed connector and was removed.",
      "[PredicateOrphaned] Predicate 'predicate_0' was removed because its transform 'unwrap' was removed.",
    ]);
  });

  it('maps a property by similarity at or above the threshold', async () => {
    const result = await translate(sinkConnector({ 'input.key.fmt': 'AVRO' }), {
      similarityProvider: stubProvider([['input key fmt', 'input key format', 0.82]]),
    });

    expect(result.config).toEqual({
      'connector.class': 'ExampleSink',
      name: 'orders-sink',
      'tasks.max': '1',
      topics: 'orders',
      'input.key.format': 'AVRO',
    });
    expect(result.mapping_errors).toEqual([]);
    expect(result.mapping_warnings).toEqual([]);
  });

  it('reports a similarity below the threshold as a failed match', async () => {
    const result = await translate(sinkConnector({ 'input.key.fmt': 'AVRO' }), {
      similarityProvider: stubProvider([['input key fmt', 'input key format', 0.55]]),
    });

    expect(result.mapping_errors).toEqual([
      "[SemanticMatchFailure] Property 'input.key.fmt' could not be matched to an FM property: best candidate 'input.key.format' scored 0.55, below the threshold 0.70.",
      "[RequiredPropertyMissing] Required FM property 'input.key.format' could not be derived from the given configs.",
    ]);
    expect(result.mapping_warnings).toEqual([]);
    expect(result.unmapped_configs).toEqual(['input.key.fmt']);
  });

  it('treats a score exactly at the threshold as a match', async () => {
    const provider = stubProvider([['input key fmt', 'input key format', 0.7]]);

    const atDefault = await translate(sinkConnector({ 'input.key.fmt': 'AVRO' }), { similarityProvider: provider });
    expect(atDefault.config['input.key.format']).toBe('AVRO');

    const stricter = await translate(sinkConnector({ 'input.key.fmt': 'AVRO' }), {
      similarityProvider: provider,
      semanticThreshold: 0.71,
    });
    expect(stricter.config['input.key.format']).toBeUndefined();
  });

  it('does not copy a value outside the recommended values', async () => {
    const result = await translate(sinkConnector({ 'input.key.format': 'BYTES' }));

    expect(result.config['input.key.format']).toBeUndefined();
    expect(result.mapping_errors).toEqual([
      "[InvalidValue] Value 'BYTES' of property 'input.key.format' is not one of the allowed values [AVRO, JSON_SR, PROTOBUF, STRING]; the property was not copied.",
      "[RequiredPropertyMissing] Required FM property 'input.key.format' could not be derived from the given configs.",
    ]);
  });

  it('reports a connector without template and continues with the batch', async () => {
    const batch = await orchestrator().translateAll([
      { name: 'unknown', config: { 'connector.class': 'com.example.Missing', topics: 'a' } },
      sinkConnector({ 'input.key.format': 'AVRO' }),
    ]);

    const [missing, ok] = batch.results;
    expect(missing?.result).toEqual({
      name: 'unknown',
      sm_config: { 'connector.class': 'com.example.Missing', topics: 'a' },
      config: {},
      mapping_errors: ["[TemplateNotFound] No FM template found for connector class 'com.example.Missing'."],
      mapping_warnings: [],
      unmapped_configs: [],
    });
    expect(missing?.successful).toBe(false);
    expect(ok?.successful).toBe(true);
    expect(batch.successful).toBe(1);
    expect(batch.failed).toBe(1);
  });

  it('turns a failing tier into a single error for that connector', async () => {
    const result = await translate(sinkConnector({ 'input.key.format': 'AVRO', mystery: 'x' }), {
      similarityProvider: { name: 'broken', score: async () => 2 },
    });

    expect(result.config).toEqual({});
    expect(result.mapping_errors).toEqual([
      "[InternalError] Translation failed: Similarity provider 'broken' returned 2 for 'mystery'",
    ]);
    expect(result.mapping_warnings).toEqual([]);
  });

  it('produces identical output for repeated runs', async () => {
    const engine = orchestrator({ similarityProvider: pollIntervalProvider });

    const first = await engine.translateConnector(shopSource);
    const second = await engine.translateConnector(shopSource);

    expect(JSON.stringify(second.result)).toBe(JSON.stringify(first.result));
  });

  it('follows a configured tier order', async () => {
    const connector: SmConnector = {
      name: 'ordered',
      config: {
        'connector.class': JDBC_SOURCE,
        'connection.url': 'jdbc:mysql://db/shop',
        'key.converter': 'io.confluent.connect.avro.AvroConverter',
      },
    };

    const byDefault = await translate(connector);
    expect(byDefault.config['output.key.format']).toBe('STRING');

    const staticFirst = await translate(connector, { tierOrder: ['direct', 'static', 'template-rule'] });
    expect(staticFirst.config['output.key.format']).toBe('AVRO');
    expect(staticFirst.mapping_warnings).not.toContain(
      "[ValueMismatch] Property 'output.key.format' is fixed to 'STRING' by the FM template; the SM value 'io.confluent.connect.avro.AvroConverter' was ignored."
    );
  });

  it('reports keys as unmapped when the semantic tier is disabled', async () => {
    const result = await translate(sinkConnector({ 'input.key.format': 'AVRO', 'flush.size': '10' }), {
      tierOrder: DEFAULT_TIER_ORDER.filter((tier) => tier !== 'semantic'),
    });

    expect(result.mapping_warnings).toEqual([
      "[UnmappedProperty] Property 'flush.size' has no FM equivalent and was not mapped.",
    ]);
    expect(result.unmapped_configs).toEqual(['flush.size']);
  });

  it('can downgrade failed semantic matches to warnings', async () => {
    const translation = await orchestrator({ semanticFailureSeverity: 'warning' }).translateConnector(
      sinkConnector({ 'input.key.format': 'AVRO', 'flush.size': '10' })
    );

    expect(translation.result.mapping_errors).toEqual([]);
    expect(translation.result.mapping_warnings).toHaveLength(1);
    expect(translation.issues[0]?.code).toBe('SemanticMatchFailure');
    expect(translation.successful).toBe(true);
  });

  it('rejects unknown and repeated tier names', () => {
    expect(() => orchestrator({ tierOrder: ['direct', 'fuzzy'] })).toThrow("Unknown mapping tier 'fuzzy'");
    expect(() => orchestrator({ tierOrder: ['direct', 'direct'] })).toThrow(
      "Mapping tier 'direct' is listed more than once"
    );
  });

  it('translates raw input of any accepted shape in input order', async () => {
    const engine = createMappingOrchestrator(catalog, {
      transforms,
      similarityProvider: stubProvider([]),
      logger: silentLogger(),
      concurrency: 1,
    });

    const batch = await engine.translateInput({
      connectors: {
        'orders-sink': { info: { config: { 'connector.class': EXAMPLE_SINK, topics: 'orders', 'input.key.format': 'AVRO' } } },
        broken: { config: { nested: { a: 1 } } },
        other: { name: 'other', config: { 'connector.class': 'com.example.Missing' } },
      },
    });

    expect(batch.results.map((translation) => translation.result.name)).toEqual(['orders-sink', 'other']);
    expect(batch.inputWarnings).toHaveLength(1);
    expect(batch.runId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('MappingOrchestrator connection settings', () => {
  it('never offers an SM key named like a switch target to the semantic tier', async () => {
    const formats = TemplateCatalog.fromObjects([
      {
        template_id: 'FormatSource',
        'connector.class': 'com.example.FormatSource',
        connector_type: 'SOURCE',
        config_defs: [
          { name: 'output.data.format', recommended_values: ['AVRO', 'JSON_SR'] },
          { name: 'output.key.format', recommended_values: ['AVRO', 'JSON_SR'] },
        ],
        mapping_rules: [
          { type: 'switch', source: 'data.mode', target: 'output.data.format', cases: { avro: 'AVRO' } },
        ],
      },
    ]);

    const result = await translate(
      {
        name: 'formats',
        config: { 'connector.class': 'com.example.FormatSource', 'data.mode': 'avro', 'output.data.format': 'JSON_SR' },
      },
      { catalog: formats, similarityProvider: stubProvider([['output data format', 'output key format', 0.9]]) }
    );

    expect(result.config['output.data.format']).toBe('AVRO');
    expect(result.config['output.key.format']).toBeUndefined();
    expect(result.mapping_errors).toEqual([]);
    expect(result.mapping_warnings).toEqual([
      "[ValueMismatch] Property 'output.data.format' is fixed to 'AVRO' by the FM template; the SM value 'JSON_SR' was ignored.",
    ]);
    expect(result.unmapped_configs).toEqual([]);
  });

  it('keeps a switch target already given as an FM value', async () => {
    const result = await translate({
      name: 'mysql-users',
      config: {
        'connector.class': JDBC_SOURCE,
        'connection.url': 'jdbc:mysql://localhost:3306/mydb',
        'quote.sql.identifiers': 'NEVER',
      },
    });

    expect(result.config['quote.sql.identifiers']).toBe('NEVER');
    expect(result.mapping_errors).toEqual([]);
    expect(result.mapping_warnings).toEqual([
      "[UnresolvedVariable] Mapping rule for 'db.timezone' was skipped because 'timezone.region', 'timezone.city' are not set.",
      "[DefaultApplied] Required FM property 'topic.prefix' was set to its default value 'mysql-users-'.",
    ]);
  });

  it('splits a JDBC URL into the separate connection properties', async () => {
    const translation = await orchestrator().translateConnector({
      name: 'inventory',
      config: {
        'connector.class': JDBC_SOURCE,
        'connection.url': 'jdbc:postgresql://pg.internal:5432/inventory?user=reader&password=test-secret',
        'table.whitelist': 'items',
      },
    });
    const { result } = translation;

    expect(translation.templateId).toBe('PostgresSource');
    expect(result.config).toMatchObject({
      'connection.url': 'jdbc:postgresql://pg.internal:5432/inventory?user=reader&password=test-secret',
      'connection.host': 'pg.internal',
      'connection.port': '5432',
      'connection.user': 'reader',
      'connection.password': 'test-secret',
      'db.name': 'inventory',
      'table.whitelist': 'items',
    });
    expect(result.mapping_errors).toEqual([]);
    expect(result.unmapped_configs).toEqual([]);
  });

  it('moves Debezium v1 properties to their v2 names', async () => {
    const translation = await orchestrator().translateConnector({
      name: 'inventory-cdc',
      config: {
        'connector.class': 'io.debezium.connector.mysql.MySqlConnector',
        'database.hostname': 'mysql.internal',
        'database.user': 'cdc',
        'database.password': 'test-secret',
        'database.server.name': 'inventory',
        'database.history.kafka.topic': 'schema-changes.inventory',
        'database.history.skip.unparseable.ddl': 'true',
      },
    });
    const { result } = translation;

    expect(translation.templateId).toBe('MySqlCdcSourceV2');
    expect(result.config).toMatchObject({
      'database.hostname': 'mysql.internal',
      'topic.prefix': 'inventory',
      'schema.history.internal.kafka.topic': 'schema-changes.inventory',
      'schema.history.internal.skip.unparseable.ddl': 'true',
    });
    expect(result.config['database.server.name']).toBeUndefined();
    expect(result.mapping_errors).toEqual([]);
    expect(result.unmapped_configs).toEqual([]);
    expect(translation.successful).toBe(true);
  });

  it('fails a connector whose rules produce an undeclared property', async () => {
    const loose = TemplateCatalog.fromObjects([
      {
        template_id: 'LooseSink',
        'connector.class': 'com.example.LooseSink',
        connector_type: 'SINK',
        config_defs: [{ name: 'topics' }],
        mapping_rules: [{ type: 'variable', target: 'dlq.topic', value: '${topics}-dlq' }],
      },
    ]);

    const translation = await orchestrator({ catalog: loose }).translateConnector({
      name: 'loose',
      config: { 'connector.class': 'com.example.LooseSink', topics: 'orders' },
    });

    expect(translation.result.config['dlq.topic']).toBeUndefined();
    expect(translation.result.config.topics).toBe('orders');
    expect(translation.result.mapping_errors).toEqual([
      "[ConfigDefFiltered] Property 'dlq.topic' is not declared by template 'LooseSink' and was removed.",
    ]);
    expect(translation.successful).toBe(false);
  });
});

describe('mapping properties', () => {
  it('keeps every surviving predicate referenced and every reference declared', async () => {
    const result = await translate(
      sinkConnector({
        'input.key.format': 'AVRO',
        transforms: 'keep,drop',
        'transforms.keep.type': 'org.apache.kafka.connect.transforms.Filter',
        'transforms.keep.predicate': 'p1',
        'transforms.drop.type': 'com.example.Unsupported',
        'transforms.drop.predicate': 'p0',
        predicates: 'p0,p1',
        'predicates.p0.type': 'org.apache.kafka.connect.transforms.predicates.RecordIsTombstone',
        'predicates.p1.type': 'org.apache.kafka.connect.transforms.predicates.TopicNameMatches',
        'predicates.p1.pattern': 'orders',
      })
    );

    expect(result.config.transforms).toBe('keep');
    expect(result.config.predicates).toBe('p0');
    expect(result.config['transforms.keep.predicate']).toBe('p0');
    expect(result.config['predicates.p0.type']).toBe(
      'org.apache.kafka.connect.transforms.predicates.TopicNameMatches'
    );
    expect(result.config['predicates.p0.pattern']).toBe('orders');
  });

  it('gives every required property of a successful connector a value', async () => {
    const translation = await orchestrator().translateConnector(sinkConnector({ 'input.key.format': 'JSON_SR' }));

    expect(translation.successful).toBe(true);
    const sink = catalog.get('ExampleSink');
    for (const def of sink?.configDefs ?? []) {
      if (def.required) {
        expect(translation.result.config[def.name]).toMatch(/\S/);
      }
    }
  });
});
