export { getTools, getToolSpec, getToolSpecs, isToolExposed, TOOL_SPECS } from './registry.js';
export type { ToolExposureMode, ToolExposure, ToolSpec, ToolHandlerContext } from './registry.js';
export { handleToolCall } from './dispatcher.js';
export type { ToolCallContext } from './dispatcher.js';
