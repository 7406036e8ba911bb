export { handleToolCall } from './dispatcher.js';
export type { ToolCallContext, ToolCallResult } from './dispatcher.js';
export { getTools, getToolSpec, getToolSpecs, TOOL_SPECS } from './registry.js';
export type { ToolExposureMode, ToolSpec } from './registry.js';
