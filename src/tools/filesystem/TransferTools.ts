import * as fs from 'fs/promises';
import * as path from 'path';
import { baseName, joinPath } from '../../api/pathParser.js';
import type { PortalSession } from '../../auth/sessionManager.js';
import { ValidationError } from '../../errors/mcpErrors.js';
import type { ToolArguments, ToolInputSchema } from '../../utils/validation.js';
import { BaseTool, type ToolAnnotations } from '../base.js';
import { PATH_SCHEMA } from './shared/schemas.js';

/**
 * Download a portal file onto the disk of the machine running this server
 */
export class DownloadTool extends BaseTool {
  public name = 'download_file';
  public description = 'Download a file from the portal cloud drive into a local directory on the server host.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      path: PATH_SCHEMA,
      destination: {
        type: 'string',
        description: 'Local directory on the server host; created if missing',
        minLength: 1
      }
    },
    required: ['path', 'destination'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Download file',
    readOnlyHint: false,
    destructiveHint: true,
    openWorldHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const source = this.read.string(args, 'path');
    const name = baseName(source);
    if (name === '') {
      throw new ValidationError('path', 'must name a file', source);
    }

    const directory = path.resolve(this.read.string(args, 'destination'));
    const target = path.join(directory, name);
    const content = await this.portal.readBytes(session.handle, source);

    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(target, content);
    return `Downloaded: ${source} to: ${target}`;
  }
}

/**
 * Upload a file from the server host's disk into a portal directory
 */
export class UploadTool extends BaseTool {
  public name = 'upload_file';
  public description = 'Upload a local file from the server host into a directory of the portal cloud drive.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      source: {
        type: 'string',
        description: 'Local file path on the server host',
        minLength: 1
      },
      destination: {
        ...PATH_SCHEMA,
        description: 'Portal directory to upload into'
      }
    },
    required: ['source', 'destination'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Upload file',
    readOnlyHint: false,
    destructiveHint: true,
    openWorldHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const source = path.resolve(this.read.string(args, 'source'));
    const destination = this.read.string(args, 'destination');
    const target = joinPath(destination, path.basename(source));

    const content = await fs.readFile(source);
    await this.portal.upload(session.handle, target, new Uint8Array(content));
    return `Uploaded: ${source} to: ${target}`;
  }
}
