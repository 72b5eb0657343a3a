import path from 'path';
import { ConfigError } from '../errors/mcpErrors.js';
import { CredentialResolver, type Credentials } from './credentials.js';
import { DEFAULT_SERVER_SETTINGS, loadLaunchConfig, parseTransportMode, type ServerSettings, type TransportMode } from './portalConfig.js';

export interface CliOptions {
  configPath?: string;
  transport?: TransportMode;
  httpPort?: number;
  httpHost?: string;
}

export interface RuntimeConfig {
  credentials: Credentials;
  settings: ServerSettings;
}

export const USAGE = 'Usage: portal-mcp-server [--config <file>] [--transport stdio|http|all] [--port <port>] [--host <host>]';

/**
 * Parse command line arguments
 *
 * @throws {ConfigError} on an unknown flag or a flag without its value
 */
export function parseArgs(argv: string[]): CliOptions {
  const result: CliOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = (): string => {
      if (i + 1 >= argv.length) {
        throw new ConfigError(`${flag} requires a value`);
      }
      i++; // consumed
      return argv[i];
    };

    switch (flag) {
      case '--config':
      case '-c':
        result.configPath = value();
        break;
      case '--transport':
      case '-t':
        result.transport = parseTransportMode(value());
        break;
      case '--port':
      case '-p': {
        const raw = value();
        const port = Number(raw);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new ConfigError(`Invalid --port: ${raw}`, ['port']);
        }
        result.httpPort = port;
        break;
      }
      case '--host':
        result.httpHost = value();
        break;
      default:
        throw new ConfigError(`Unknown argument: ${flag}\n${USAGE}`);
    }
  }

  return result;
}

/**
 * Combine the launch file, the environment and command line flags.
 * Flags override the file's server section.
 */
export async function resolveRuntimeConfig(options: CliOptions, env: NodeJS.ProcessEnv): Promise<RuntimeConfig> {
  const launch = options.configPath
    ? await loadLaunchConfig(path.resolve(options.configPath))
    : undefined;

  const credentials = CredentialResolver.fromEnvironment(env, launch?.portal).resolve();
  const base = launch?.server ?? DEFAULT_SERVER_SETTINGS;

  return {
    credentials,
    settings: {
      ...base,
      transport: options.transport ?? base.transport,
      httpPort: options.httpPort ?? base.httpPort,
      httpHost: options.httpHost ?? base.httpHost
    }
  };
}
