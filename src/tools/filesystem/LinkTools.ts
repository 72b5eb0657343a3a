import type { AccessMode, PublicLink } from '../../api/portalTypes.js';
import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATH_SCHEMA } from './shared/schemas.js';

const ACCESS_MODES: readonly AccessMode[] = ['RO', 'RW'];

/** Ten years */
export const MAX_EXPIRE_IN_DAYS = 3650;

function isAccessMode(value: string): value is AccessMode {
  return value === 'RO' || value === 'RW';
}

export class PublicLinkTool extends BaseTool {
  public name = 'create_public_link';
  public description = 'Create a public link to a file or directory that anyone with the link can open.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA,
      access: {
        type: 'string',
        description: 'Access mode: RO (read only) or RW (read write)',
        enum: ACCESS_MODES,
        default: 'RO'
      },
      expire_in: {
        type: 'integer',
        description: 'Number of days until the link expires',
        default: 30,
        minimum: 1,
        maximum: MAX_EXPIRE_IN_DAYS
      }
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Create public link',
    readOnlyHint: false,
    destructiveHint: false
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<PublicLink> {
    const access = this.read.string(args, 'access');
    return this.portal.publicLink(
      session.handle,
      this.read.string(args, 'path'),
      isAccessMode(access) ? access : 'RO',
      this.read.number(args, 'expire_in')
    );
  }
}

export class PermalinkTool extends BaseTool {
  public name = 'get_permalink';
  public description = 'Get the permanent link of a file or directory. The link only opens for users who already have access.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Get permalink',
    readOnlyHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    return this.portal.permalink(session.handle, this.read.string(args, 'path'));
  }
}
