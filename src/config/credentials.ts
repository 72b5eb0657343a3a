import { ConfigError } from '../errors/mcpErrors.js';

export type Scope = 'user' | 'admin';

export const SCOPES: readonly Scope[] = ['user', 'admin'];

/**
 * Connection parameters for one portal principal.
 * `secret` stays in memory only; log through describeCredentials().
 */
export interface Credentials {
  host: string;
  port: number;
  user: string;
  secret: string;
  scope: Scope;
  tls: boolean;
}

/**
 * Raw configuration surface, as any source supplies it.
 * Values from the environment are strings; JSON launch files may carry
 * booleans and numbers.
 */
export interface CredentialSource {
  scope?: string;
  host?: string;
  user?: string;
  password?: string;
  ssl?: string | boolean;
  port?: string | number;
}

export const ENV_NAMESPACE = 'portal.mcp.settings';

const FLAT_ENV_KEYS: Record<keyof CredentialSource, string> = {
  host: 'PORTAL_ADDR',
  user: 'PORTAL_USER',
  password: 'PORTAL_PASS',
  scope: 'PORTAL_SCOPE',
  ssl: 'PORTAL_SSL',
  port: 'PORTAL_PORT'
};

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * Read the namespaced form (`portal.mcp.settings.host`, ...).
 * `portal.mcp.settings.connector.ssl` takes precedence over `.ssl`.
 */
export function namespacedEnvSource(env: NodeJS.ProcessEnv): CredentialSource {
  const key = (name: string) => env[`${ENV_NAMESPACE}.${name}`];
  return {
    scope: key('scope'),
    host: key('host'),
    user: key('user'),
    password: key('password'),
    ssl: key('connector.ssl') ?? key('ssl'),
    port: key('port')
  };
}

/**
 * Read the flat form (`PORTAL_ADDR`, `PORTAL_USER`, `PORTAL_PASS`, ...)
 */
export function flatEnvSource(env: NodeJS.ProcessEnv): CredentialSource {
  return {
    scope: env[FLAT_ENV_KEYS.scope],
    host: env[FLAT_ENV_KEYS.host],
    user: env[FLAT_ENV_KEYS.user],
    password: env[FLAT_ENV_KEYS.password],
    ssl: env[FLAT_ENV_KEYS.ssl],
    port: env[FLAT_ENV_KEYS.port]
  };
}

function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined && value !== '';
}

/**
 * Resolves complete Credentials from an ordered list of sources.
 * For each key the first source that supplies a non-empty value wins.
 */
export class CredentialResolver {
  private readonly sources: CredentialSource[];

  constructor(sources: CredentialSource[]) {
    this.sources = sources;
  }

  /**
   * Standard order: launch file section, namespaced env, flat env
   */
  static fromEnvironment(env: NodeJS.ProcessEnv, launch?: CredentialSource): CredentialResolver {
    const sources = [namespacedEnvSource(env), flatEnvSource(env)];
    return new CredentialResolver(launch ? [launch, ...sources] : sources);
  }

  resolve(): Credentials {
    const host = this.pick('host');
    const user = this.pick('user');
    const password = this.pick('password');

    const missing: string[] = [];
    const text = (name: string, value: string | number | boolean | undefined): string => {
      const trimmed = value === undefined ? '' : String(value).trim();
      if (trimmed === '') {
        missing.push(name);
      }
      return trimmed;
    };

    const resolvedHost = text('host', host);
    const resolvedUser = text('user', user);
    // passwords are taken verbatim; only emptiness is checked
    const secret = password === undefined ? '' : String(password);
    if (secret === '') {
      missing.push('password');
    }

    if (missing.length > 0) {
      throw new ConfigError(`Missing portal configuration: ${missing.join(', ')}`, missing);
    }

    const tls = this.parseBoolean('ssl', this.pick('ssl'), true);
    return {
      host: resolvedHost,
      user: resolvedUser,
      secret,
      scope: this.parseScope(this.pick('scope')),
      tls,
      port: this.parsePort(this.pick('port'), tls ? 443 : 80)
    };
  }

  private pick<K extends keyof CredentialSource>(key: K): CredentialSource[K] {
    for (const source of this.sources) {
      const value = source[key];
      if (isPresent(value)) {
        return value;
      }
    }
    return undefined;
  }

  private parseScope(value: string | undefined): Scope {
    if (value === undefined) {
      return 'user';
    }
    const normalized = value.trim().toLowerCase();
    const scope = SCOPES.find(candidate => candidate === normalized);
    if (!scope) {
      throw new ConfigError(`Scope error: value must be "admin" or "user": ${value}`, ['scope']);
    }
    return scope;
  }

  private parseBoolean(key: string, value: string | boolean | undefined, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    throw new ConfigError(`Invalid ${key}: expected true or false, got "${value}"`, [key]);
  }

  private parsePort(value: string | number | undefined, fallback: number): number {
    if (value === undefined) {
      return fallback;
    }
    const port = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`Invalid port: ${value}`, ['port']);
    }
    return port;
  }
}

/**
 * Loggable view of credentials. Never includes the secret.
 */
export function describeCredentials(credentials: Credentials): string {
  const protocol = credentials.tls ? 'https' : 'http';
  return `${credentials.user}@${protocol}://${credentials.host}:${credentials.port} (${credentials.scope} scope)`;
}

/**
 * admin ⊇ user
 */
export function scopeSatisfies(callerScope: Scope, requiredScope: Scope): boolean {
  return SCOPES.indexOf(callerScope) >= SCOPES.indexOf(requiredScope);
}
