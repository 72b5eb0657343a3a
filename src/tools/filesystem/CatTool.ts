import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATH_SCHEMA } from './shared/schemas.js';

/**
 * Read a file's contents as UTF-8 text
 */
export class CatTool extends BaseTool {
  public name = 'read_file';
  public description = 'Read the contents of a text file from the portal cloud drive.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Read file',
    readOnlyHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    return this.portal.readText(session.handle, this.read.string(args, 'path'));
  }
}
