import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATHS_SCHEMA } from './shared/schemas.js';

/**
 * Delete one or more items. Deleted items stay recoverable through
 * recover_items until the portal purges them.
 */
export class RmTool extends BaseTool {
  public name = 'delete_items';
  public description = 'Delete one or more files or directories from the portal cloud drive.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      paths: { ...PATHS_SCHEMA, description: 'Paths of the files or directories to delete' }
    },
    required: ['paths'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Delete items',
    readOnlyHint: false,
    destructiveHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const paths = this.read.stringArray(args, 'paths');
    await this.portal.delete(session.handle, paths);
    return `Deleted: ${JSON.stringify(paths)}`;
  }
}

export class RecoverTool extends BaseTool {
  public name = 'recover_items';
  public description = 'Recover one or more deleted files or directories.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      paths: { ...PATHS_SCHEMA, description: 'Paths of the deleted files or directories to recover' }
    },
    required: ['paths'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Recover items',
    readOnlyHint: false,
    destructiveHint: false
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const paths = this.read.stringArray(args, 'paths');
    await this.portal.undelete(session.handle, paths);
    return `Recovered: ${JSON.stringify(paths)}`;
  }
}
