import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { DESTINATION_SCHEMA, PATH_SCHEMA, SOURCE_SCHEMA } from './shared/schemas.js';

export class MvTool extends BaseTool {
  public name = 'move_item';
  public description = 'Move a file or directory to a new location in the portal cloud drive.';

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
    title: 'Move item',
    readOnlyHint: false,
    destructiveHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const source = this.read.string(args, 'source');
    const destination = this.read.string(args, 'destination');
    await this.portal.move(session.handle, source, destination);
    return `Moved: ${source} to: ${destination}`;
  }
}

export class RenameTool extends BaseTool {
  public name = 'rename_item';
  public description = 'Rename a file or directory in place.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA,
      new_name: {
        type: 'string',
        description: 'New name (a single path segment, no slashes)',
        minLength: 1,
        pattern: '^[^/\\\\]+$'
      }
    },
    required: ['path', 'new_name'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Rename item',
    readOnlyHint: false,
    destructiveHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const path = this.read.string(args, 'path');
    const newName = this.read.string(args, 'new_name');
    await this.portal.rename(session.handle, path, newName);
    return `Renamed: ${path} to: ${newName}`;
  }
}
