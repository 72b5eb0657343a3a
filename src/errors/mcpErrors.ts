/**
 * Custom error classes for the Portal MCP Server
 * Provides structured error information for envelope mapping
 */

/**
 * Base error class for Portal MCP operations
 */
export class PortalMcpError extends Error {
  constructor(
    message: string,
    public code: number,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Launch configuration is incomplete or malformed. Fails startup.
 */
export class ConfigError extends PortalMcpError {
  constructor(message: string, keys: string[] = []) {
    super(message, -32010, { keys });
  }
}

/**
 * Portal rejected the credentials, or re-authentication after expiry failed
 */
export class AuthenticationError extends PortalMcpError {
  constructor(message: string, reason: 'login_rejected' | 'expired' | 'not_authenticated' = 'login_rejected') {
    super(message, -32000, {
      requiresAuth: true,
      reason
    });
  }
}

/**
 * Portal signalled that the session handle is no longer valid.
 * Consumed by the session manager, which re-authenticates once.
 */
export class SessionExpiredError extends PortalMcpError {
  constructor(message: string = 'Portal session expired') {
    super(message, -32005);
  }
}

/**
 * Input validation error
 */
export class ValidationError extends PortalMcpError {
  constructor(field: string, reason: string, value?: unknown) {
    super(`Invalid argument "${field}": ${reason}`, -32001, {
      field,
      reason,
      value
    });
  }
}

/**
 * Tool name not present in the registry
 */
export class UnknownToolError extends PortalMcpError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, -32601, { toolName });
  }
}

/**
 * Caller scope does not cover the tool's required scope
 */
export class ForbiddenError extends PortalMcpError {
  constructor(toolName: string, requiredScope: string, callerScope: string) {
    super(
      `Tool "${toolName}" requires ${requiredScope} scope; caller has ${callerScope} scope`,
      -32003,
      { toolName, requiredScope, callerScope }
    );
  }
}

/**
 * Portal API error wrapper
 */
export class BackendError extends PortalMcpError {
  constructor(message: string, statusCode?: number, detail?: string) {
    super(message, -32002, {
      statusCode,
      detail
    });
  }
}
