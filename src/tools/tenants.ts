import type { PortalSession } from '../auth/sessionManager.js';
import type { Scope } from '../config/credentials.js';
import type { ToolArguments, ToolInputSchema } from '../utils/validation.js';
import { BaseTool, type ToolAnnotations } from './base.js';

/**
 * Tenant context switching for global administrators. The switch applies to
 * the shared session, so every later call runs inside the chosen tenant.
 */
export class BrowseTeamPortalTool extends BaseTool {
  public name = 'browse_team_portal';
  public description = 'Switch the administration session into the context of a team portal (tenant).';
  public requiredScope: Scope = 'admin';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {
      tenant: {
        type: 'string',
        description: 'Name of the team portal to browse',
        minLength: 1
      }
    },
    required: ['tenant'],
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Browse team portal',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true
  };

  async execute(args: ToolArguments, session: PortalSession): Promise<string> {
    const tenant = this.read.string(args, 'tenant');
    const current = await this.portal.currentTenant(session.handle);
    if (current === tenant) {
      return `You are already operating within the scope of the "${tenant}" tenant.`;
    }
    await this.portal.browseTenant(session.handle, tenant);
    return `Changed context to the "${tenant}" tenant.`;
  }
}

export class BrowseGlobalAdminTool extends BaseTool {
  public name = 'browse_global_admin';
  public description = 'Switch the administration session back to the global administration scope.';
  public requiredScope: Scope = 'admin';

  public inputSchema: ToolInputSchema = {
    type: 'object',
    properties: {},
    additionalProperties: false
  };

  public annotations: ToolAnnotations = {
    title: 'Browse global admin',
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true
  };

  async execute(_args: ToolArguments, session: PortalSession): Promise<string> {
    const current = await this.portal.currentTenant(session.handle);
    if (current === null) {
      return 'You are already operating within the global administration scope.';
    }
    await this.portal.browseGlobalAdmin(session.handle);
    return 'Changed context to global administration scope.';
  }
}
