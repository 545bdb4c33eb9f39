/**
 * Template Catalog
 *
 * Read-only after loading; shared by every connector of a batch.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CONNECTOR_CLASS_KEY,
  Logger,
  parseTemplate,
  TranslationError,
  type ConnectorConfig,
  type FmTemplate,
} from '@connect-migrator/core';
import { connectorClassCandidates, type DebeziumVersion } from './connector-classes.js';
import { canonicalDatabaseType, detectDatabaseType } from './database-type.js';

export interface TemplateCatalogOptions {
  /** Debezium generation SM classes resolve to (default: v2) */
  debeziumVersion?: DebeziumVersion;
  logger?: Logger;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export class TemplateCatalog {
  private readonly byId = new Map<string, FmTemplate>();
  private readonly byClass = new Map<string, FmTemplate[]>();
  private readonly debeziumVersion: DebeziumVersion;
  private readonly logger: Logger;

  constructor(templates: readonly FmTemplate[] = [], options: TemplateCatalogOptions = {}) {
    this.debeziumVersion = options.debeziumVersion ?? 'v2';
    this.logger = options.logger ?? new Logger({ level: 'warn' });
    for (const template of templates) {
      this.register(template);
    }
  }

  /**
   * Load every *.json file of a directory, in file name order
   *
   * @throws TranslationError CONFIGURATION_ERROR if the directory is unreadable,
   *   INVALID_TEMPLATE for a malformed file
   */
  static async fromDirectory(
    dir: string,
    options: TemplateCatalogOptions = {}
  ): Promise<TemplateCatalog> {
    let files: string[];
    try {
      files = (await readdir(dir)).filter((file) => file.endsWith('.json')).sort();
    } catch (error) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: `Cannot read template directory ${dir}`,
        suggestion: 'Check templatesDir in the configuration.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const catalog = new TemplateCatalog([], options);
    for (const file of files) {
      const text = await readFile(join(dir, file), 'utf-8');
      let raw: unknown;
      try {
        raw = JSON.parse(stripBom(text));
      } catch (error) {
        throw new TranslationError({
          code: 'INVALID_TEMPLATE',
          message: `Template ${file} is not valid JSON`,
          cause: error instanceof Error ? error : undefined,
          context: { file },
        });
      }
      catalog.register(parseTemplate(raw, file));
    }

    catalog.logger.debug('Template catalog loaded', { dir, templates: catalog.size });
    return catalog;
  }

  static fromObjects(raws: readonly unknown[], options: TemplateCatalogOptions = {}): TemplateCatalog {
    return new TemplateCatalog(
      raws.map((raw, index) => parseTemplate(raw, `#${index}`)),
      options
    );
  }

  register(template: FmTemplate): void {
    if (this.byId.has(template.templateId)) {
      throw new TranslationError({
        code: 'INVALID_TEMPLATE',
        message: `Duplicate template_id: ${template.templateId}`,
      });
    }
    this.byId.set(template.templateId, template);

    for (const connectorClass of [template.connectorClass, ...template.aliases]) {
      const existing = this.byClass.get(connectorClass);
      if (existing) {
        existing.push(template);
      } else {
        this.byClass.set(connectorClass, [template]);
      }
    }
  }

  get(templateId: string): FmTemplate | undefined {
    return this.byId.get(templateId);
  }

  templateIds(): string[] {
    return [...this.byId.keys()];
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Template for an SM config, by connector class and, when several
   * templates share the class, by database type.
   *
   * @throws TranslationError with code TEMPLATE_NOT_FOUND
   */
  resolve(config: ConnectorConfig): FmTemplate {
    const connectorClass = config[CONNECTOR_CLASS_KEY]?.trim();
    if (!connectorClass) {
      throw new TranslationError({
        code: 'TEMPLATE_NOT_FOUND',
        message: `Connector has no '${CONNECTOR_CLASS_KEY}' property`,
      });
    }

    let candidates: FmTemplate[] | undefined;
    for (const cls of connectorClassCandidates(connectorClass, this.debeziumVersion)) {
      candidates = this.byClass.get(cls);
      if (candidates) break;
    }

    const [first] = candidates ?? [];
    if (!candidates || !first) {
      throw new TranslationError({
        code: 'TEMPLATE_NOT_FOUND',
        message: `No FM template found for connector class '${connectorClass}'`,
        suggestion: 'Add a template for this connector class to the templates directory.',
        context: { connectorClass },
      });
    }

    if (candidates.length === 1) return first;

    const databaseType = detectDatabaseType(config);
    if (databaseType) {
      const match = candidates.find((template) =>
        template.databaseTypes.some((type) => canonicalDatabaseType(type) === databaseType)
      );
      if (match) return match;
    }

    this.logger.debug('No database-specific template; using first registered', {
      connectorClass,
      databaseType,
      templateId: first.templateId,
    });
    return first;
  }
}
