import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { PortalClient } from '../api/portalClient.js';
import { endpointOf } from '../api/portalHttp.js';
import type { PortalApi, PortalAuthenticator } from '../api/portalTypes.js';
import { SessionManager } from '../auth/sessionManager.js';
import { describeCredentials, type Credentials } from '../config/credentials.js';
import type { ServerSettings } from '../config/portalConfig.js';
import { Dispatcher } from '../core/dispatcher.js';
import { createToolRegistry, type ToolRegistry } from '../tools/registry.js';
import { log } from '../utils/logger.js';
import { createHttpApp, type HttpApp } from './httpApp.js';
import { createProtocolServer } from './mcpServer.js';

export type PortalBackend = PortalApi & PortalAuthenticator;

export interface PortalServerOptions {
  credentials: Credentials;
  settings: ServerSettings;
  /** Portal backend; defaults to the REST client for the credentials' endpoint */
  backend?: PortalBackend;
}

/**
 * Composition root: one registry, one session manager and one dispatcher
 * shared by every configured transport.
 */
export class PortalMcpServer {
  readonly registry: ToolRegistry;
  readonly sessions: SessionManager;
  readonly dispatcher: Dispatcher;

  private readonly credentials: Credentials;
  private readonly settings: ServerSettings;
  private stdioServer: Server | null = null;
  private httpApp: HttpApp | null = null;
  private httpServer: HttpServer | null = null;

  constructor(options: PortalServerOptions) {
    this.credentials = options.credentials;
    this.settings = options.settings;

    const backend = options.backend ?? new PortalClient(endpointOf(options.credentials), {
      requestTimeoutMs: options.settings.requestTimeoutMs
    });

    this.registry = createToolRegistry(backend);
    this.sessions = new SessionManager(backend, options.credentials, {
      callTimeoutMs: options.settings.callTimeoutMs
    });
    this.dispatcher = new Dispatcher(this.registry, this.sessions, {
      secrets: [options.credentials.secret]
    });
  }

  /**
   * Port the HTTP transport is bound to, once listening
   */
  get httpPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  async start(): Promise<void> {
    const { transport } = this.settings;
    log.info(`Starting portal MCP server for ${describeCredentials(this.credentials)} (transport: ${transport})`);
    log.info(`${this.registry.size} tools registered`);

    if (this.settings.eagerLogin) {
      await this.loginAtStartup();
    }

    if (transport === 'http' || transport === 'all') {
      await this.startHttp();
    }
    if (transport === 'stdio' || transport === 'all') {
      await this.startStdio();
    }
  }

  /**
   * Close transports, then log out of the portal
   */
  async stop(): Promise<void> {
    log.info('Stopping portal MCP server...');

    if (this.stdioServer) {
      await this.stdioServer.close();
      this.stdioServer = null;
    }
    if (this.httpApp) {
      await this.httpApp.closeStreams();
      this.httpApp = null;
    }
    if (this.httpServer) {
      await this.closeHttpServer(this.httpServer);
      this.httpServer = null;
    }

    await this.sessions.shutdown();
    log.info('Portal MCP server stopped');
  }

  private async loginAtStartup(): Promise<void> {
    try {
      await this.sessions.ensureSession();
    } catch (error) {
      // the next tool call retries the login and reports the failure as Auth or Backend
      const reason = error instanceof Error ? error.message : String(error);
      log.warn(`Login at startup failed: ${reason}`);
    }
  }

  private async startStdio(): Promise<void> {
    const server = createProtocolServer(this.dispatcher, this.registry, this.credentials.scope);
    await server.connect(new StdioServerTransport());
    this.stdioServer = server;
    log.info('MCP stdio transport connected');
  }

  private async startHttp(): Promise<void> {
    const httpApp = createHttpApp({
      dispatcher: this.dispatcher,
      registry: this.registry,
      sessions: this.sessions,
      callerScope: this.credentials.scope,
      createProtocolServer: () => createProtocolServer(this.dispatcher, this.registry, this.credentials.scope)
    });
    const { httpHost, httpPort } = this.settings;

    this.httpServer = await new Promise<HttpServer>((resolve, reject) => {
      const server = httpApp.app.listen(httpPort, httpHost);
      server.once('listening', () => resolve(server));
      server.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          reject(new Error(`Port ${httpPort} is already in use`));
        } else if (error.code === 'EACCES') {
          reject(new Error(`Permission denied to bind to port ${httpPort}`));
        } else {
          reject(new Error(`Failed to start HTTP server: ${error.message}`));
        }
      });
    });
    this.httpApp = httpApp;

    const address: AddressInfo | string | null = this.httpServer.address();
    const port = address && typeof address === 'object' ? address.port : httpPort;
    log.info(`HTTP transport listening on http://${httpHost}:${port} (SSE at /sse, health at /health)`);
  }

  private closeHttpServer(server: HttpServer): Promise<void> {
    return new Promise(resolve => {
      server.close(error => {
        if (error) {
          log.warn(`Error closing HTTP server: ${error.message}`);
        }
        resolve();
      });
      server.closeAllConnections();
    });
  }
}
