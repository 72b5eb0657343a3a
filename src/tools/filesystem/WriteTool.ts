import type { PortalSession } from '../../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';

/**
 * Upload text content as a file. An existing file at the same path is
 * replaced by a new version.
 */
export class WriteTool extends BaseTool {
  public name = 'upload_from_content';
  public description = 'Create or replace a file in the portal cloud drive with the given text content.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      filepath: {
        type: 'string',
        description: 'Destination file path, including the file name',
        minLength: 1,
        examples: ['My Files/notes.txt']
      },
      content: {
        type: 'string',
        description: 'Text content of the file (stored as UTF-8)'
      }
    },
    required: ['filepath', 'content'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Upload from content',
    readOnlyHint: false,
    destructiveHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const filepath = this.read.string(args, 'filepath');
    await this.portal.upload(session.handle, filepath, this.read.string(args, 'content'));
    return `Uploaded: ${filepath}`;
  }
}
