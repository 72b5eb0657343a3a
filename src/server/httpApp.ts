import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { SessionManager } from '../auth/sessionManager.js';
import type { Scope } from '../config/credentials.js';
import type { Dispatcher } from '../core/dispatcher.js';
import { failure, httpStatusOf, toWire, type ResultEnvelope } from '../core/envelope.js';
import type { ToolRegistry } from '../tools/registry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

export interface HttpAppOptions {
  dispatcher: Dispatcher;
  registry: ToolRegistry;
  sessions: SessionManager;
  callerScope: Scope;
  /** Builds the protocol server bound to each SSE stream */
  createProtocolServer: () => Server;
}

export interface HttpApp {
  app: express.Application;
  /** Close every open SSE stream */
  closeStreams(): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Express application serving the HTTP routes and the MCP SSE transport
 */
export function createHttpApp(options: HttpAppOptions): HttpApp {
  const { dispatcher, registry, sessions, callerScope } = options;
  const streams = new Map<string, SSEServerTransport>();
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  const sendEnvelope = (req: Request, res: Response, envelope: ResultEnvelope) => {
    // the client went away mid-call; the result has nowhere to go
    if (res.headersSent || res.writableEnded || res.destroyed || req.socket.destroyed) {
      log.debug(`Discarding result for ${req.method} ${req.originalUrl}: client disconnected`);
      return;
    }
    res.status(httpStatusOf(envelope)).json(toWire(envelope));
  };

  const health = (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  };
  app.get('/health', health);
  app.get('/api/health', health);

  app.get('/api/tools', (_req, res) => {
    res.json({ tools: registry.list() });
  });

  app.get('/api/status', (_req, res) => {
    res.json(sessions.status());
  });

  app.post('/api/tool', async (req, res) => {
    const body: unknown = req.body;
    const toolName = isRecord(body) ? body.tool_name : undefined;
    if (typeof toolName !== 'string' || toolName === '') {
      sendEnvelope(req, res, failure('InvalidArgument', 'Invalid argument "tool_name": is required'));
      return;
    }
    const envelope = await dispatcher.dispatch(toolName, isRecord(body) ? body.arguments : undefined, callerScope);
    sendEnvelope(req, res, envelope);
  });

  app.post('/tools/:name', async (req, res) => {
    const body: unknown = req.body;
    // express.json leaves an empty object when no body was sent
    const envelope = await dispatcher.dispatch(req.params.name, body, callerScope);
    sendEnvelope(req, res, envelope);
  });

  app.get('/sse', async (_req, res) => {
    const transport = new SSEServerTransport('/messages', res);
    streams.set(transport.sessionId, transport);
    log.info(`SSE stream ${transport.sessionId} opened`);

    res.on('close', () => {
      streams.delete(transport.sessionId);
      log.info(`SSE stream ${transport.sessionId} closed`);
    });

    try {
      await options.createProtocolServer().connect(transport);
    } catch (error) {
      streams.delete(transport.sessionId);
      log.error(`SSE stream ${transport.sessionId} failed to start`, error);
    }
  });

  app.post('/messages', async (req, res) => {
    const sessionId = req.query.sessionId;
    const transport = typeof sessionId === 'string' ? streams.get(sessionId) : undefined;
    if (!transport) {
      res.status(404).json(toWire(failure('InvalidArgument', `No SSE stream for session "${String(sessionId)}"`)));
      return;
    }
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      log.error(`SSE message for stream ${transport.sessionId} failed`, error);
    }
  });

  // body-parser failures: malformed JSON and oversized payloads
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = isRecord(error) && typeof error.status === 'number' ? error.status : 500;
    if (status >= 400 && status < 500) {
      const message = error instanceof Error ? error.message : 'Malformed request';
      sendEnvelope(req, res, failure('InvalidArgument', `Invalid request body: ${message}`));
      return;
    }
    log.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);
    sendEnvelope(req, res, failure('Backend', 'Internal server error'));
  });

  return {
    app,
    async closeStreams() {
      const open = Array.from(streams.values());
      streams.clear();
      await Promise.all(open.map(transport => transport.close()));
    }
  };
}
