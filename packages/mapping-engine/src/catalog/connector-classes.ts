export type DebeziumVersion = 'v1' | 'v2';

/** Self-managed Debezium v1 connector classes */
export const DEBEZIUM_V1_CLASSES = {
  mysql: 'io.debezium.connector.mysql.MySqlConnector',
  postgresql: 'io.debezium.connector.postgresql.PostgresConnector',
  sqlserver: 'io.debezium.connector.sqlserver.SqlServerConnector',
  mariadb: 'io.debezium.connector.mariadb.MariaDbConnector',
} as const;

/** Debezium v1 connector classes and their v2 counterparts */
const DEBEZIUM_V1_TO_V2: ReadonlyMap<string, string> = new Map([
  [DEBEZIUM_V1_CLASSES.mysql, 'io.debezium.connector.v2.mysql.MySqlConnectorV2'],
  [DEBEZIUM_V1_CLASSES.postgresql, 'io.debezium.connector.v2.postgresql.PostgresConnectorV2'],
  [DEBEZIUM_V1_CLASSES.sqlserver, 'io.debezium.connector.v2.sqlserver.SqlServerConnectorV2'],
  [DEBEZIUM_V1_CLASSES.mariadb, 'io.debezium.connector.v2.mariadb.MariaDbConnector'],
]);

const DEBEZIUM_V2_TO_V1: ReadonlyMap<string, string> = new Map(
  [...DEBEZIUM_V1_TO_V2].map(([v1, v2]) => [v2, v1])
);

/**
 * Connector classes to look up for an SM class, preferred first.
 * A Debezium class of the other generation is tried before the class itself.
 */
export function connectorClassCandidates(
  connectorClass: string,
  version: DebeziumVersion
): string[] {
  const counterpart =
    version === 'v2'
      ? DEBEZIUM_V1_TO_V2.get(connectorClass)
      : DEBEZIUM_V2_TO_V1.get(connectorClass);
  return counterpart ? [counterpart, connectorClass] : [connectorClass];
}
