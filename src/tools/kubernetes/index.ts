export type { BaseTool, ToolResult } from './BaseTool.js';
export { ArgSchemas, CommonSchemas, parseDuration, parseParams } from './BaseTool.js';
export { GetPodsTool } from './GetPodsTool.js';
export { GetNodesTool } from './GetNodesTool.js';
export { GetNamespacesTool } from './GetNamespacesTool.js';
export { GetServicesTool } from './GetServicesTool.js';
export { GetDeploymentsTool } from './GetDeploymentsTool.js';
export { DescribePodTool } from './DescribePodTool.js';
export { GetContainerLogsTool } from './GetContainerLogsTool.js';
