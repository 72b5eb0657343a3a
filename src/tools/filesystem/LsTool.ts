import type { DirectoryEntry } from '../../api/portalTypes.js';
import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { INCLUDE_DELETED_SCHEMA, PATH_SCHEMA } from './shared/schemas.js';

export interface ListedEntry {
  name: string;
  last_modified: string | null;
  deleted: boolean;
  is_dir: boolean;
  id: string | null;
}

export function toListedEntry(entry: DirectoryEntry): ListedEntry {
  return {
    name: entry.name,
    last_modified: entry.lastModified,
    deleted: entry.isDeleted,
    is_dir: entry.isFolder,
    id: entry.fileId
  };
}

/**
 * List the contents of a directory
 */
export class LsTool extends BaseTool {
  public name = 'list_dir';
  public description = 'List the contents of a directory in the portal cloud drive. Returns name, last modification time, deleted flag, directory flag and file id for each entry.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA,
      include_deleted: INCLUDE_DELETED_SCHEMA,
      search_criteria: {
        type: 'string',
        description: 'Only return entries whose name matches this search text'
      }
    },
    required: ['path'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'List directory',
    readOnlyHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<ListedEntry[]> {
    const entries = await this.portal.listDir(session.handle, this.read.string(args, 'path'), {
      includeDeleted: this.read.boolean(args, 'include_deleted'),
      searchCriteria: this.read.optionalString(args, 'search_criteria')
    });
    return entries.map(toListedEntry);
  }
}
