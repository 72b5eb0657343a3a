import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { DESTINATION_SCHEMA, SOURCE_SCHEMA } from './shared/schemas.js';

export class CpTool extends BaseTool {
  public name = 'copy_item';
  public description = 'Copy a file or directory to a new location in the portal cloud drive.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      source: SOURCE_SCHEMA,
      destination: DESTINATION_SCHEMA
    },
    required: ['source', 'destination'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Copy item',
    readOnlyHint: false,
    destructiveHint: false
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const source = this.read.string(args, 'source');
    const destination = this.read.string(args, 'destination');
    await this.portal.copy(session.handle, source, destination);
    return `Copied: ${source} to: ${destination}`;
  }
}
