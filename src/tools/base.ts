import type { PortalApi } from '../api/portalTypes.js';
import type { PortalSession } from '../auth/sessionManager.js';
import type { Scope } from '../config/credentials.js';
import { ValidationError } from '../errors/mcpErrors.js';
import type { ArgumentValue, ToolArguments, ToolInputSchema } from '../utils/validation.js';

/**
 * MCP tool annotations (selection hints for clients)
 */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/**
 * Capability-document entry for one tool
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  requiredScope: Scope;
  inputSchema: ToolInputSchema;
  annotations?: ToolAnnotations;
}

/**
 * Base class for all portal tools
 *
 * A tool is a unique name, a declarative input schema, the scope
 * a caller needs, and a handler. Handlers never validate or authenticate on
 * their own; the dispatcher validates arguments against `inputSchema` and the
 * session manager hands `execute` a live session.
 *
 * ```typescript
 * export class MkdirTool extends BaseTool {
 *   public name = 'create_directory';
 *   public description = 'Create a new directory';
 *   public inputSchema: ToolInputSchema = {
 *     type: 'object',
 *     properties: { path: PATH_SCHEMA },
 *     required: ['path'],
 *     additionalProperties: false
 *   };
 *
 *   async execute(args: ToolArguments, session: PortalSession): Promise<string> {
 *     const path = this.read.string(args, 'path');
 *     await this.portal.mkdir(session.handle, path);
 *     return `Created: ${path}`;
 *   }
 * }
 * ```
 */
export abstract class BaseTool {
  /** Tool name as registered (must be unique) */
  public abstract name: string;

  public abstract description: string;

  public abstract inputSchema: ToolInputSchema;

  /** Minimum caller scope; admin covers user */
  public requiredScope: Scope = 'user';

  public annotations?: ToolAnnotations;

  constructor(protected readonly portal: PortalApi) {}

  /**
   * Run the tool on a live session with validated arguments
   */
  abstract execute(args: ToolArguments, session: PortalSession): Promise<unknown>;

  describe(): ToolDescriptor {
    return {
      name: this.name,
      description: this.description,
      requiredScope: this.requiredScope,
      inputSchema: this.inputSchema,
      ...(this.annotations && { annotations: this.annotations })
    };
  }

  /**
   * Typed accessors over validated arguments. A mismatch here means the
   * schema and the handler disagree.
   */
  protected read = {
    string: (args: ToolArguments, field: string): string => {
      const value = this.argument(args, field);
      if (typeof value !== 'string') {
        throw new ValidationError(field, 'expected string');
      }
      return value;
    },

    optionalString: (args: ToolArguments, field: string): string | undefined => {
      return args[field] === undefined ? undefined : this.read.string(args, field);
    },

    number: (args: ToolArguments, field: string): number => {
      const value = this.argument(args, field);
      if (typeof value !== 'number') {
        throw new ValidationError(field, 'expected number');
      }
      return value;
    },

    boolean: (args: ToolArguments, field: string): boolean => {
      const value = this.argument(args, field);
      if (typeof value !== 'boolean') {
        throw new ValidationError(field, 'expected boolean');
      }
      return value;
    },

    stringArray: (args: ToolArguments, field: string): string[] => {
      const value = this.argument(args, field);
      if (!Array.isArray(value)) {
        throw new ValidationError(field, 'expected array');
      }
      return value;
    }
  };

  private argument(args: ToolArguments, field: string): ArgumentValue {
    const value = args[field];
    if (value === undefined) {
      throw new ValidationError(field, 'is required');
    }
    return value;
  }
}
