import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TranslationError } from '@connect-migrator/core';
import {
  detectDatabaseType,
  TemplateCatalog,
  TransformRegistry,
} from '../src/index.js';
import { JDBC_SOURCE, TEMPLATES_DIR, TRANSFORMS_FALLBACK_FILE } from './helpers.js';

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(TranslationError);
  await expect(promise).rejects.toMatchObject({ code });
}

describe('TemplateCatalog', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it('loads template files in name order', async () => {
    const catalog = await TemplateCatalog.fromDirectory(TEMPLATES_DIR);

    expect(catalog.templateIds()).toEqual([
      'ExampleSink',
      'MySqlCdcSourceV2',
      'MySqlSource',
      'PostgresSource',
    ]);
    expect(catalog.get('MySqlCdcSourceV2')?.configDefs[1]?.defaultValue).toBe('3306');
  });

  it('picks the template of the detected database type', async () => {
    const catalog = await TemplateCatalog.fromDirectory(TEMPLATES_DIR);

    const resolve = (config: Record<string, string>) =>
      catalog.resolve({ 'connector.class': JDBC_SOURCE, ...config }).templateId;

    expect(resolve({ 'connection.url': 'jdbc:mysql://db:3306/shop' })).toBe('MySqlSource');
    expect(resolve({ 'connection.url': 'jdbc:postgresql://db:5432/shop' })).toBe('PostgresSource');
    expect(resolve({ 'database.type': 'Postgres' })).toBe('PostgresSource');
    expect(resolve({ 'connection.url': 'jdbc:oracle:thin:@db:1521/shop' })).toBe('MySqlSource');
  });

  it('resolves Debezium v1 classes to the v2 template by default', async () => {
    const v2 = await TemplateCatalog.fromDirectory(TEMPLATES_DIR);
    expect(
      v2.resolve({ 'connector.class': 'io.debezium.connector.mysql.MySqlConnector' }).templateId
    ).toBe('MySqlCdcSourceV2');

    const v1 = await TemplateCatalog.fromDirectory(TEMPLATES_DIR, { debeziumVersion: 'v1' });
    expect(() => v1.resolve({ 'connector.class': 'io.debezium.connector.mysql.MySqlConnector' })).toThrow(
      "No FM template found for connector class 'io.debezium.connector.mysql.MySqlConnector'"
    );
  });

  it('matches aliases of a template', () => {
    const catalog = TemplateCatalog.fromObjects([
      {
        template_id: 'AliasedSink',
        'connector.class': 'com.example.NewSink',
        aliases: ['com.example.LegacySink'],
        connector_type: 'SINK',
        config_defs: [],
      },
    ]);

    expect(catalog.resolve({ 'connector.class': 'com.example.LegacySink' }).templateId).toBe('AliasedSink');
  });

  it('fails with TEMPLATE_NOT_FOUND for unknown or missing classes', () => {
    const catalog = new TemplateCatalog();

    expect(() => catalog.resolve({})).toThrow("Connector has no 'connector.class' property");

    let caught: unknown;
    try {
      catalog.resolve({ 'connector.class': 'com.example.Missing' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TranslationError);
    expect(caught).toMatchObject({
      code: 'TEMPLATE_NOT_FOUND',
      context: { connectorClass: 'com.example.Missing' },
    });
  });

  it('rejects duplicate template ids', () => {
    const raw = {
      template_id: 'Twice',
      'connector.class': 'com.example.A',
      connector_type: 'SOURCE',
      config_defs: [],
    };
    expect(() => TemplateCatalog.fromObjects([raw, raw])).toThrow('Duplicate template_id: Twice');
  });

  it('reports unreadable directories and malformed files', async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'templates-'));
    writeFileSync(join(tempDir, 'broken.json'), '{ not json');

    await expectCode(TemplateCatalog.fromDirectory(join(tempDir, 'missing')), 'CONFIGURATION_ERROR');
    await expectCode(TemplateCatalog.fromDirectory(tempDir), 'INVALID_TEMPLATE');
  });

  it('accepts a byte order mark and ignores other files', async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'templates-'));
    writeFileSync(
      join(tempDir, 'bom.json'),
      '\uFEFF' +
        JSON.stringify({
          template_id: 'Bom',
          'connector.class': 'com.example.Bom',
          connector_type: 'SINK',
          config_defs: [{ name: 'topics', required: true }],
        })
    );
    writeFileSync(join(tempDir, 'README.md'), '# templates');

    const catalog = await TemplateCatalog.fromDirectory(tempDir);
    expect(catalog.templateIds()).toEqual(['Bom']);
  });
});

describe('detectDatabaseType', () => {
  it('reads the scheme, then known names in the URL, then database.type', () => {
    expect(detectDatabaseType({ 'connection.url': 'jdbc:sqlserver://db:1433' })).toBe('sqlserver');
    expect(detectDatabaseType({ 'connection.url': 'jdbc:jtds:sqlserver://db:1433' })).toBe('sqlserver');
    expect(detectDatabaseType({ 'connection.url': 'jdbc:mariadb://db' })).toBe('mysql');
    expect(detectDatabaseType({ 'database.type': 'MSSQL' })).toBe('sqlserver');
    expect(detectDatabaseType({ 'connection.url': 'jdbc:h2:mem:test' })).toBeUndefined();
  });
});

describe('TransformRegistry', () => {
  it('prefers the template list over the fallback file', async () => {
    const registry = await TransformRegistry.fromFile(TRANSFORMS_FALLBACK_FILE);
    const catalog = await TemplateCatalog.fromDirectory(TEMPLATES_DIR);
    const sink = catalog.get('ExampleSink');
    const mysql = catalog.get('MySqlSource');
    const postgres = catalog.get('PostgresSource');
    if (!sink || !mysql || !postgres) throw new Error('fixture templates missing');

    expect([...registry.supportedFor(sink)]).toEqual([
      'org.apache.kafka.connect.transforms.RegexRouter',
      'org.apache.kafka.connect.transforms.Filter',
    ]);
    expect([...registry.supportedFor(mysql)]).toEqual([
      'org.apache.kafka.connect.transforms.RegexRouter',
      'org.apache.kafka.connect.transforms.InsertField$Value',
    ]);
    expect(registry.supportedFor(postgres).size).toBe(0);
  });

  it('rejects a malformed fallback list', () => {
    expect(() => TransformRegistry.fromObject({ ExampleSink: 'RegexRouter' })).toThrow(
      'Invalid transforms fallback:\n- ExampleSink: Expected array, received string'
    );
  });
});
