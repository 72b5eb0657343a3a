import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATH_SCHEMA } from './shared/schemas.js';

/**
 * Create a single directory; the parent must exist
 */
export class MkdirTool extends BaseTool {
  public name = 'create_directory';
  public description = 'Create a new directory in the portal cloud drive. The parent directory must already exist.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Create directory',
    readOnlyHint: false,
    destructiveHint: false
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const path = this.read.string(args, 'path');
    await this.portal.mkdir(session.handle, path);
    return `Created: ${path}`;
  }
}

/**
 * Create a directory along with any missing parents (one request per level)
 */
export class MakedirsTool extends BaseTool {
  public name = 'makedirs';
  public description = 'Create a directory and all necessary parent directories. Directories that already exist are left as they are.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Create directories',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const path = this.read.string(args, 'path');
    await this.portal.makedirs(session.handle, path);
    return `Created: ${path}`;
  }
}
