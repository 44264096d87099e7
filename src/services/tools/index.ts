// Tool System Initialization
// Registers the workspace tools on startup

import { env } from '../../env.js';
import { getLogger } from '../../logger.js';
import { ToolRegistry, toolRegistry } from './registry.js';
import { fileReadTool } from './file-read-tool.js';
import { fsWriteFileTool } from './fs-write-file-tool.js';
import { fsEditFileTool } from './fs-edit-file-tool.js';
import { fsDeleteFileTool } from './fs-delete-file-tool.js';
import { fsGrepTool } from './fs-grep-tool.js';
import { shellExecTool } from './shell-exec-tool.js';
import { createPlannerTool } from './planner-tool.js';
import { PlanStore } from './plan-store.js';

export { ToolRegistry, toolRegistry, toOpenAIFunction } from './registry.js';
export type { OpenAIFunctionDef } from './registry.js';
export type { ToolDefinition, ToolContext, ToolKind, ToolParameter, ProgressListener } from './types.js';
export { PlanStore } from './plan-store.js';

const log = getLogger('tools');

export interface ToolInitOptions {
  toolsEnabled?: boolean;
  shellExecEnabled?: boolean;
  planStore?: PlanStore;
}

export function initializeTools(registry: ToolRegistry = toolRegistry, options: ToolInitOptions = {}): ToolRegistry {
  const toolsEnabled = options.toolsEnabled ?? env.TOOLS_ENABLED;
  const shellExecEnabled = options.shellExecEnabled ?? env.SHELL_EXEC_ENABLED;

  // The planner is always available; the orchestrator's planning phase needs it.
  registry.register(createPlannerTool(options.planStore ?? new PlanStore()));

  if (toolsEnabled) {
    registry.register(fileReadTool);
    registry.register(fsWriteFileTool);
    registry.register(fsEditFileTool);
    registry.register(fsDeleteFileTool);
    registry.register(fsGrepTool);
  }

  if (toolsEnabled && shellExecEnabled) {
    registry.register(shellExecTool);
    log.warn('Shell execution tool registered (commands run inside the workspace)');
  }

  const names = registry.getAll().map(t => t.name);
  log.info({ tools: names }, `Tool system initialized with ${names.length} tool(s)`);
  return registry;
}
