import type { PortalApi } from '../api/portalTypes.js';
import { UnknownToolError } from '../errors/mcpErrors.js';
import type { BaseTool, ToolDescriptor } from './base.js';
import {
  CatTool,
  CpTool,
  DownloadTool,
  LsTool,
  MakedirsTool,
  MkdirTool,
  MvTool,
  PermalinkTool,
  PublicLinkTool,
  RecoverTool,
  RenameTool,
  RmTool,
  UploadTool,
  VersionsTool,
  WalkTool,
  WriteTool
} from './filesystem/index.js';
import { WhoAmITool } from './identity.js';
import { BrowseGlobalAdminTool, BrowseTeamPortalTool } from './tenants.js';

/**
 * Name-keyed tool table. Built once at startup and sealed before the first
 * request; after that it is read-only and safe to share across transports.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, BaseTool>();
  private sealed = false;

  /**
   * @throws {Error} on a duplicate name or after sealing
   */
  register(tool: BaseTool): this {
    if (this.sealed) {
      throw new Error(`Tool registry is sealed; cannot register "${tool.name}"`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * @throws {UnknownToolError} when no tool has this name
   */
  lookup(name: string): BaseTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Capability document, in registration order
   */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), tool => tool.describe());
  }
}

/**
 * Registry holding every portal tool, sealed
 */
export function createToolRegistry(portal: PortalApi): ToolRegistry {
  const toolInstances: BaseTool[] = [
    // Identity
    new WhoAmITool(portal),

    // Cloud drive
    new LsTool(portal),
    new WalkTool(portal),
    new MkdirTool(portal),
    new MakedirsTool(portal),
    new CpTool(portal),
    new MvTool(portal),
    new RenameTool(portal),
    new RmTool(portal),
    new RecoverTool(portal),
    new VersionsTool(portal),
    new PublicLinkTool(portal),
    new PermalinkTool(portal),
    new CatTool(portal),
    new WriteTool(portal),

    // Server host file transfer (admin)
    new DownloadTool(portal),
    new UploadTool(portal),

    // Tenant context (admin)
    new BrowseTeamPortalTool(portal),
    new BrowseGlobalAdminTool(portal)
  ];

  const registry = new ToolRegistry();
  toolInstances.forEach(tool => registry.register(tool));
  return registry.seal();
}
