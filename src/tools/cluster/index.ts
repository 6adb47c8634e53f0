export {
  BaseTool,
  CommonSchemas,
  ToolErrorPayload,
  runClusterTool,
  toolErrorPayload,
} from './BaseTool.js';
export { GetClusterCpuTool } from './GetClusterCpuTool.js';
export { GetClusterMemoryTool } from './GetClusterMemoryTool.js';
export { GetNodeMetricsTool } from './GetNodeMetricsTool.js';
export { GetPodsTool } from './GetPodsTool.js';
export { GetPodMetricsTool } from './GetPodMetricsTool.js';
export { GetClusterInfoTool } from './GetClusterInfoTool.js';
export { GetNamespacesTool } from './GetNamespacesTool.js';
