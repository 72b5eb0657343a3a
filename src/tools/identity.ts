import type { PortalSession } from '../auth/sessionManager.js';
import type { ToolArguments, ToolInputSchema } from '../utils/validation.js';
import { BaseTool, type ToolAnnotations } from './base.js';

/**
 * Report the identity behind the current portal session
 */
export class WhoAmITool extends BaseTool {
  public name = 'who_am_i';
  public description = 'Show the user name (and domain, when there is one) of the authenticated portal session.';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {},
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Who am I',
    readOnlyHint: true
  };

  async execute(_args: ToolArguments, session: PortalSession): Promise<string> {
    const identity = await this.portal.currentSession(session.handle);
    const principal = identity.domain ? `${identity.username}@${identity.domain}` : identity.username;
    return `Authenticated as ${principal}`;
  }
}
