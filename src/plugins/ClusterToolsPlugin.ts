import type { ClusterService } from '../cluster/ClusterService.js';
import {
  type BaseTool,
  GetClusterCpuTool,
  GetClusterInfoTool,
  GetClusterMemoryTool,
  GetNamespacesTool,
  GetNodeMetricsTool,
  GetPodMetricsTool,
  GetPodsTool,
} from '../tools/cluster/index.js';
import { BaseToolsPlugin, ToolsPluginOptions } from './BaseToolsPlugin.js';

/**
 * Plugin that registers the read-only cluster tools with the MCP server.
 * Registers nothing when the Kubernetes integration is disabled.
 */
export class ClusterToolsPlugin extends BaseToolsPlugin<BaseTool> {
  name = 'cluster-tools';

  constructor(
    private readonly cluster: ClusterService | null,
    options: ToolsPluginOptions = {},
  ) {
    super(options);
  }

  /**
   * Single source of truth for the tools this plugin exposes
   */
  protected createToolInstances(): BaseTool[] {
    return [
      new GetClusterCpuTool(),
      new GetClusterMemoryTool(),
      new GetNodeMetricsTool(),
      new GetPodsTool(),
      new GetPodMetricsTool(),
      new GetClusterInfoTool(),
      new GetNamespacesTool(),
    ];
  }

  protected isDisabled(): boolean {
    return this.cluster === null;
  }

  protected async runTool(command: BaseTool, params: unknown): Promise<unknown> {
    if (!this.cluster) {
      throw new Error('Kubernetes integration is disabled');
    }
    return command.execute(params, this.cluster);
  }
}
