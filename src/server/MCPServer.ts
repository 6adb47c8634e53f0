import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import winston from 'winston';
import { toMcpToolResult } from '../utils/McpToolResult.js';

/**
 * Plugin interface for extending MCP server functionality
 */
export interface MCPPlugin {
  name: string;
  initialize(server: MCPServer): Promise<void>;
  shutdown?(): Promise<void>;
}

export type ToolHandler = (params: unknown) => Promise<unknown>;

/**
 * Tool registry entry
 */
interface ToolEntry {
  tool: Tool;
  handler: ToolHandler;
}

export interface MCPServerOptions {
  logger: winston.Logger;
  name?: string;
  version?: string;
  skipTransportErrorHandling?: boolean;
  skipGracefulShutdown?: boolean;
}

type ProcessListener = (...args: unknown[]) => void;

interface TrackedListener {
  target: NodeJS.EventEmitter;
  event: string;
  handler: ProcessListener;
}

/**
 * Model Context Protocol server over stdio exposing the registered tools
 */
export class MCPServer {
  private server: Server;
  private transport: StdioServerTransport;
  private logger: winston.Logger;
  private tools: Map<string, ToolEntry> = new Map();
  private plugins: Map<string, MCPPlugin> = new Map();
  private isShuttingDown = false;
  private eventListeners: TrackedListener[] = [];

  constructor(options: MCPServerOptions) {
    this.logger = options.logger;

    this.server = new Server(
      {
        name: options.name ?? 'cluster-rag-agent',
        version: options.version ?? '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      },
    );

    this.transport = new StdioServerTransport();

    // Skipped in tests to avoid process listeners
    if (!options.skipTransportErrorHandling) {
      this.setupTransportErrorHandling();
    }

    this.setupHandlers();

    if (!options.skipGracefulShutdown) {
      this.setupGracefulShutdown();
    }

    this.logger.info('MCPServer initialized');
  }

  /**
   * Add an event listener and track it for cleanup
   */
  private addTrackedListener(
    target: NodeJS.EventEmitter,
    event: string,
    handler: ProcessListener,
  ): void {
    target.on(event, handler);
    this.eventListeners.push({ target, event, handler });
  }

  private removeAllListeners(): void {
    for (const { target, event, handler } of this.eventListeners) {
      target.removeListener(event, handler);
    }
    this.eventListeners = [];
  }

  private setupTransportErrorHandling(): void {
    // StdioServerTransport uses the process stdin/stdout directly
    this.addTrackedListener(process.stdin, 'error', (error) => {
      this.logger.error('Transport stdin error:', error);
    });

    this.addTrackedListener(process.stdout, 'error', (error) => {
      this.logger.error('Transport stdout error:', error);
    });

    this.addTrackedListener(process.stdin, 'close', () => {
      this.logger.warn('Transport stdin closed, stopping');
      this.stop().catch((error: unknown) => {
        this.logger.error('Failed to stop MCP server', error);
      });
    });
  }

  /**
   * Set up request handlers for MCP protocol
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = Array.from(this.tools.values()).map((entry) => entry.tool);
      this.logger.debug(`Listing ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolEntry = this.tools.get(request.params.name);

      if (!toolEntry) {
        const error = `Tool not found: ${request.params.name}`;
        this.logger.error(error);
        throw new Error(error);
      }

      this.logger.info(`Executing tool: ${request.params.name}`, {
        arguments: request.params.arguments,
      });

      try {
        const result = await toolEntry.handler(request.params.arguments ?? {});
        return toMcpToolResult(result);
      } catch (error) {
        this.logger.error(`Tool execution failed: ${request.params.name}`, error);
        throw error;
      }
    });
  }

  /**
   * Register a tool with the MCP server
   */
  public registerTool(tool: Tool, handler: ToolHandler): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool already registered: ${tool.name}, overwriting`);
    }

    this.tools.set(tool.name, { tool, handler });
    this.logger.info(`Registered tool: ${tool.name}`);
  }

  public getTools(): Tool[] {
    return Array.from(this.tools.values()).map((t) => t.tool);
  }

  /**
   * Execute a tool directly, bypassing the transport
   */
  public async executeTool(toolName: string, params: unknown): Promise<unknown> {
    const toolEntry = this.tools.get(toolName);
    if (!toolEntry) {
      throw new Error(`Tool not found: ${toolName}`);
    }
    return toolEntry.handler(params);
  }

  /**
   * Load and initialize a plugin
   */
  public async loadPlugin(plugin: MCPPlugin): Promise<void> {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin already loaded: ${plugin.name}`);
    }

    this.logger.info(`Loading plugin: ${plugin.name}`);

    try {
      await plugin.initialize(this);
      this.plugins.set(plugin.name, plugin);
      this.logger.info(`Plugin loaded successfully: ${plugin.name}`);
    } catch (error) {
      this.logger.error(`Failed to load plugin: ${plugin.name}`, error);
      throw error;
    }
  }

  public async start(): Promise<void> {
    this.logger.info('Starting MCP server...');

    try {
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Stopping MCP server...');

    this.removeAllListeners();

    for (const [name, plugin] of this.plugins) {
      if (plugin.shutdown) {
        try {
          await plugin.shutdown();
          this.logger.info(`Plugin shutdown complete: ${name}`);
        } catch (error) {
          this.logger.error(`Plugin shutdown failed: ${name}`, error);
        }
      }
    }

    await this.server.close();
    this.logger.info('MCP server stopped');
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      try {
        await this.stop();
      } catch (error) {
        this.logger.error('Shutdown failed', error);
      }
      process.exit(0);
    };

    this.addTrackedListener(process, 'SIGINT', () => void shutdown('SIGINT'));
    this.addTrackedListener(process, 'SIGTERM', () => void shutdown('SIGTERM'));

    this.addTrackedListener(process, 'unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection:', reason);
      void shutdown('unhandledRejection');
    });
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }

  public getServer(): Server {
    return this.server;
  }

  /**
   * Clean up resources and event listeners (useful for tests)
   */
  public cleanup(): void {
    this.removeAllListeners();
  }
}
