/**
 * Connection details carried inside a JDBC URL
 *
 * Handles the //host:port/db form with ?a=b or ;a=b parameters, Oracle
 * thin @host:port:SID and @//host:port/service, and the Oracle
 * @(DESCRIPTION=...) descriptor. Values keep their original case.
 */

export interface JdbcUrlParts {
  host?: string;
  port?: string;
  database?: string;
  user?: string;
  password?: string;
  /** Oracle CONNECT_DATA key, e.g. SERVICE_NAME or SID */
  connectionType?: string;
  sslServerCertDn?: string;
}

export type JdbcUrlPart = keyof JdbcUrlParts;

const AUTHORITY = /^jdbc:[a-z0-9]+(?::[a-z0-9]+)*:(?:@\/\/|\/\/|@)([^/;?]+)/i;
const HOST_PORT = /^([^:]+)(?::(\d+))?(?::([^:]+))?$/;

export function parseJdbcUrl(url: string): JdbcUrlParts {
  const trimmed = url.trim();
  return /@\s*\(\s*DESCRIPTION\s*=/i.test(trimmed)
    ? parseOracleDescriptor(trimmed)
    : parseStandardUrl(trimmed);
}

function parseStandardUrl(url: string): JdbcUrlParts {
  const parts: JdbcUrlParts = {};
  const authority = AUTHORITY.exec(url);
  if (!authority) return parts;

  // First host of a failover list
  const firstHost = authority[1]?.split(',')[0]?.trim() ?? '';
  const hostPort = HOST_PORT.exec(firstHost);
  if (hostPort) {
    assign(parts, 'host', hostPort[1]);
    assign(parts, 'port', hostPort[2]);
    assign(parts, 'database', hostPort[3]);
  }

  const rest = url.slice(authority[0].length);
  assign(parts, 'database', /^\/([^/?;]+)/.exec(rest)?.[1]);

  const params = parameters(rest);
  assign(parts, 'database', params.get('databasename') ?? params.get('database'));
  assign(parts, 'user', params.get('user') ?? params.get('username'));
  assign(parts, 'password', params.get('password'));
  return parts;
}

function parseOracleDescriptor(url: string): JdbcUrlParts {
  const parts: JdbcUrlParts = {};
  assign(parts, 'host', /\(\s*HOST\s*=\s*([^)\s]+)\s*\)/i.exec(url)?.[1]);
  assign(parts, 'port', /\(\s*PORT\s*=\s*(\d+)\s*\)/i.exec(url)?.[1]);

  const connectData = /\(\s*CONNECT_DATA\s*=\s*\(\s*([^=)\s]+)\s*=\s*([^)\s]+)\s*\)/i.exec(url);
  assign(parts, 'connectionType', connectData?.[1]);
  assign(parts, 'database', connectData?.[2]);

  assign(parts, 'sslServerCertDn', /SSL_SERVER_CERT_DN\s*=\s*\\?"?([^)"\\]+)\\?"?\s*\)/i.exec(url)?.[1]);
  return parts;
}

/** ?a=b&c=d and ;a=b;c=d parameters, keys lowercased, first occurrence wins */
function parameters(rest: string): Map<string, string> {
  const params = new Map<string, string>();
  for (const pair of rest.split(/[?&;]/)) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    const key = pair.slice(0, separator).trim().toLowerCase();
    if (!params.has(key)) {
      params.set(key, pair.slice(separator + 1).trim());
    }
  }
  return params;
}

/** Keeps the first non-empty value found for a part */
function assign(parts: JdbcUrlParts, part: JdbcUrlPart, value: string | undefined): void {
  if (value && parts[part] === undefined) {
    parts[part] = value;
  }
}
