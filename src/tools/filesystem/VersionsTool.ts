import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATH_SCHEMA } from './shared/schemas.js';

export class VersionsTool extends BaseTool {
  public name = 'list_versions';
  public description = 'List the snapshot versions of a file or directory. Returns the start timestamp of each snapshot.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'List versions',
    readOnlyHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string[]> {
    return this.portal.versions(session.handle, this.read.string(args, 'path'));
  }
}
