import { promises as fs } from 'fs';
import { ConfigError } from '../errors/mcpErrors.js';
import type { CredentialSource } from './credentials.js';

export type TransportMode = 'stdio' | 'http' | 'all';

export const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'http', 'all'];

/**
 * Server settings that are not credentials
 */
export interface ServerSettings {
  transport: TransportMode;
  httpHost: string;
  httpPort: number;
  /** Upper bound on one tool's backend work, including the retry after expiry */
  callTimeoutMs: number;
  /** Abort timeout for each HTTP request to the portal */
  requestTimeoutMs: number;
  /** Log in at startup instead of on the first tool call */
  eagerLogin: boolean;
}

/**
 * Structured launch configuration (the file passed with --config)
 */
export interface PortalLaunchConfig {
  portal: CredentialSource;
  server: ServerSettings;
}

export const DEFAULT_SERVER_SETTINGS: ServerSettings = {
  transport: 'stdio',
  httpHost: '127.0.0.1',
  httpPort: 8001,
  callTimeoutMs: 30000,
  requestTimeoutMs: 25000,
  eagerLogin: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalScalar(section: Record<string, unknown>, key: string, where: string): string | number | boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  throw new ConfigError(`Invalid ${where}.${key}: expected a scalar value`, [key]);
}

function optionalString(section: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = optionalScalar(section, key, where);
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new ConfigError(`Invalid ${where}.${key}: expected a string`, [key]);
}

function optionalNumber(section: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = optionalScalar(section, key, where);
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid ${where}.${key}: expected a positive number`, [key]);
  }
  return parsed;
}

/**
 * Parse the portal section. Booleans and ports stay loosely typed here:
 * the credential resolver validates them along with the environment forms.
 */
function parsePortalSection(raw: unknown): CredentialSource {
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid portal section: expected an object', ['portal']);
  }

  const ssl = optionalScalar(raw, 'ssl', 'portal');
  const port = optionalScalar(raw, 'port', 'portal');
  return {
    scope: optionalString(raw, 'scope', 'portal'),
    host: optionalString(raw, 'host', 'portal'),
    user: optionalString(raw, 'user', 'portal'),
    password: optionalString(raw, 'password', 'portal'),
    ssl: typeof ssl === 'number' ? String(ssl) : ssl,
    port: typeof port === 'boolean' ? String(port) : port
  };
}

export function parseTransportMode(value: string): TransportMode {
  const mode = TRANSPORT_MODES.find(candidate => candidate === value);
  if (!mode) {
    throw new ConfigError(`Invalid transport "${value}": expected one of ${TRANSPORT_MODES.join(', ')}`, ['transport']);
  }
  return mode;
}

function parseServerSection(raw: unknown): ServerSettings {
  if (raw === undefined) {
    return { ...DEFAULT_SERVER_SETTINGS };
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid server section: expected an object', ['server']);
  }

  const transport = optionalString(raw, 'transport', 'server');
  const eagerLogin = optionalScalar(raw, 'eagerLogin', 'server');
  if (eagerLogin !== undefined && typeof eagerLogin !== 'boolean') {
    throw new ConfigError('Invalid server.eagerLogin: expected a boolean', ['eagerLogin']);
  }

  return {
    transport: transport ? parseTransportMode(transport) : DEFAULT_SERVER_SETTINGS.transport,
    httpHost: optionalString(raw, 'httpHost', 'server') ?? DEFAULT_SERVER_SETTINGS.httpHost,
    httpPort: optionalNumber(raw, 'httpPort', 'server') ?? DEFAULT_SERVER_SETTINGS.httpPort,
    callTimeoutMs: optionalNumber(raw, 'callTimeoutMs', 'server') ?? DEFAULT_SERVER_SETTINGS.callTimeoutMs,
    requestTimeoutMs: optionalNumber(raw, 'requestTimeoutMs', 'server') ?? DEFAULT_SERVER_SETTINGS.requestTimeoutMs,
    eagerLogin: eagerLogin ?? DEFAULT_SERVER_SETTINGS.eagerLogin
  };
}

/**
 * Validate an already-parsed launch document
 */
export function parseLaunchConfig(document: unknown): PortalLaunchConfig {
  if (!isRecord(document)) {
    throw new ConfigError('Launch configuration must be a JSON object');
  }
  return {
    portal: parsePortalSection(document.portal),
    server: parseServerSection(document.server)
  };
}

export async function loadLaunchConfig(filePath: string): Promise<PortalLaunchConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${reason}`);
  }

  return parseLaunchConfig(document);
}
