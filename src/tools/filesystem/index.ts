/**
 * Cloud drive tools
 */

export { LsTool, type ListedEntry } from './LsTool.js';
export { WalkTool, type WalkedEntry } from './WalkTool.js';
export { MkdirTool, MakedirsTool } from './MkdirTool.js';
export { CpTool } from './CpTool.js';
export { MvTool, RenameTool } from './MvTool.js';
export { RmTool, RecoverTool } from './RmTool.js';
export { VersionsTool } from './VersionsTool.js';
export { PublicLinkTool, PermalinkTool } from './LinkTools.js';
export { CatTool } from './CatTool.js';
export { WriteTool } from './WriteTool.js';
export { DownloadTool, UploadTool } from './TransferTools.js';
