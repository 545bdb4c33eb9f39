import type { ConnectorConfig } from '@connect-migrator/core';

/** Canonical JDBC database types and the spellings that map to them */
const DATABASE_TYPE_ALIASES: ReadonlyArray<readonly [canonical: string, aliases: readonly string[]]> = [
  ['mysql', ['mysql', 'mariadb']],
  ['oracle', ['oracle']],
  ['sqlserver', ['sqlserver', 'mssql']],
  ['postgresql', ['postgresql', 'postgres']],
  ['snowflake', ['snowflake']],
];

export function canonicalDatabaseType(value: string): string | undefined {
  const lower = value.trim().toLowerCase();
  for (const [canonical, aliases] of DATABASE_TYPE_ALIASES) {
    if (aliases.includes(lower)) return canonical;
  }
  return undefined;
}

/**
 * Database type of a JDBC connector: the jdbc:<type>: scheme of
 * connection.url, then any known type named inside the URL, then the
 * database.type property.
 */
export function detectDatabaseType(config: ConnectorConfig): string | undefined {
  const url = config['connection.url']?.trim().toLowerCase() ?? '';

  if (url) {
    const scheme = /^jdbc:([a-z0-9]+):/.exec(url)?.[1];
    const fromScheme = scheme ? canonicalDatabaseType(scheme) : undefined;
    if (fromScheme) return fromScheme;

    for (const [canonical, aliases] of DATABASE_TYPE_ALIASES) {
      if (aliases.some((alias) => url.includes(alias))) return canonical;
    }
  }

  const declared = config['database.type'];
  return declared ? canonicalDatabaseType(declared) : undefined;
}
