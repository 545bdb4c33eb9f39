/**
 * Connector configuration types
 *
 * Kafka Connect configs are string-valued regardless of the logical type
 * of the property, so every value is carried as text.
 */

/** Ordered property map of a connector */
export type ConnectorConfig = {
  [key: string]: string;
};

/** Direction of a connector, taken from template metadata */
export type ConnectorType = 'SOURCE' | 'SINK';

/** A self-managed connector as read from a worker export */
export interface SmConnector {
  /** Connector name */
  name: string;
  /** Raw SM properties, including connector.class and transform families */
  config: ConnectorConfig;
  /** Plugin descriptions of SM properties, when the export carries them */
  descriptions?: { [key: string]: string };
}
