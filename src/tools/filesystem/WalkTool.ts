import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { INCLUDE_DELETED_SCHEMA, PATH_SCHEMA } from './shared/schemas.js';

export interface WalkedEntry {
  name: string;
  href: string;
  lastmodified: string | null;
  isFolder: boolean;
  isDeleted: boolean;
  fileId: string | null;
}

/**
 * Recursively walk a directory tree. Each directory is a separate portal
 * request, so the result is not a point-in-time snapshot.
 */
export class WalkTool extends BaseTool {
  public name = 'walk_tree';
  public description = 'Recursively walk through a directory tree and list every file and directory beneath it.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA,
      include_deleted: INCLUDE_DELETED_SCHEMA
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Walk directory tree',
    readOnlyHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<WalkedEntry[]> {
    const entries = await this.portal.walk(
      session.handle,
      this.read.string(args, 'path'),
      this.read.boolean(args, 'include_deleted')
    );
    return entries.map(entry => ({
      name: entry.name,
      href: entry.href,
      lastmodified: entry.lastModified,
      isFolder: entry.isFolder,
      isDeleted: entry.isDeleted,
      fileId: entry.fileId
    }));
  }
}
