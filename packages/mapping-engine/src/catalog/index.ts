export { TemplateCatalog } from './template-catalog.js';
export type { TemplateCatalogOptions } from './template-catalog.js';
export { TransformRegistry } from './transform-registry.js';
export { detectDatabaseType, canonicalDatabaseType } from './database-type.js';
export { connectorClassCandidates, DEBEZIUM_V1_CLASSES } from './connector-classes.js';
export type { DebeziumVersion } from './connector-classes.js';
export { parseJdbcUrl } from './jdbc-url.js';
export type { JdbcUrlPart, JdbcUrlParts } from './jdbc-url.js';
