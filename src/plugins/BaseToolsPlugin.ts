import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import type { MCPPlugin, MCPServer, ToolHandler } from '../server/MCPServer.js';
import { withTimeout } from '../utils/Timeout.js';

export interface ToolLike {
  tool: Tool;
}

export interface ToolsPluginOptions {
  /** Upper bound for a single tool call; unset means unbounded */
  timeoutMs?: number;
}

/**
 * Generic base plugin shared by tool plugins.
 * Subclasses create the tool instances and say how one is run.
 */
export abstract class BaseToolsPlugin<TTool extends ToolLike> implements MCPPlugin {
  abstract name: string;

  protected commands: TTool[] = [];
  protected logger?: Logger;
  protected readonly timeoutMs?: number;

  constructor(options: ToolsPluginOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  /** Create tool instances for this plugin */
  protected abstract createToolInstances(): TTool[];

  /** Run one tool with the raw call arguments */
  protected abstract runTool(command: TTool, params: unknown): Promise<unknown>;

  /** Optional: register nothing when the backing integration is off */
  protected isDisabled(): boolean {
    return false;
  }

  protected getHandlerForTool(command: TTool): ToolHandler {
    return (params: unknown) =>
      withTimeout(this.runTool(command, params), this.timeoutMs, command.tool.name);
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();

    try {
      if (this.isDisabled()) {
        this.logger.info(`${this.name} is disabled`);
        this.commands = [];
        return;
      }

      this.commands = this.createToolInstances();

      for (const command of this.commands) {
        server.registerTool(command.tool, this.getHandlerForTool(command));
      }

      this.logger.info(`${this.name} initialized with ${this.commands.length} tools`);
    } catch (error) {
      this.logger.error(`Failed to initialize ${this.name}`, error);
      throw error;
    }
  }

  async shutdown(): Promise<void> {}
}
