import type { SessionManager } from '../auth/sessionManager.js';
import { scopeSatisfies, type Scope } from '../config/credentials.js';
import { ForbiddenError, PortalMcpError } from '../errors/mcpErrors.js';
import type { ToolRegistry } from '../tools/registry.js';
import { createLogger } from '../utils/logger.js';
import { MCPValidator } from '../utils/validation.js';
import { toEnvelope, type Outcome, type ResultEnvelope } from './envelope.js';

const log = createLogger('dispatch');

export interface DispatcherOptions {
  /** Values scrubbed from every failure message, e.g. the portal password */
  secrets?: readonly string[];
}

/**
 * Routes one tool invocation through lookup, scope check, argument validation
 * and the session manager, and turns whatever happens into an envelope.
 *
 * `dispatch` never rejects. Failures before the handler runs never touch
 * the portal.
 */
export class Dispatcher {
  private readonly secrets: readonly string[];

  constructor(
    private readonly registry: ToolRegistry,
    private readonly sessions: SessionManager,
    options: DispatcherOptions = {}
  ) {
    this.secrets = options.secrets ?? [];
  }

  async dispatch(toolName: string, rawArgs: unknown, callerScope: Scope): Promise<ResultEnvelope> {
    const started = Date.now();
    const outcome = await this.run(toolName, rawArgs, callerScope);
    const envelope = toEnvelope(outcome, this.secrets);
    const elapsed = Date.now() - started;

    if (envelope.ok) {
      log.info(`${toolName} completed in ${elapsed}ms`);
    } else {
      log.warn(`${toolName} failed in ${elapsed}ms [${envelope.kind}] ${envelope.message}`);
    }
    return envelope;
  }

  private async run(toolName: string, rawArgs: unknown, callerScope: Scope): Promise<Outcome> {
    try {
      const tool = this.registry.lookup(toolName);
      if (!scopeSatisfies(callerScope, tool.requiredScope)) {
        throw new ForbiddenError(tool.name, tool.requiredScope, callerScope);
      }
      const args = MCPValidator.validateArguments(tool.inputSchema, rawArgs);

      log.debug(`Executing tool: ${toolName}`);
      const value = await this.sessions.call(session => tool.execute(args, session));
      return { ok: true, value };
    } catch (error) {
      if (!(error instanceof PortalMcpError)) {
        log.error(`Unexpected failure in ${toolName}`, error);
      }
      return { ok: false, error };
    }
  }
}
