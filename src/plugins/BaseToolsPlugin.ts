import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import type { MCPPlugin, MCPServer, ToolHandler } from '../server/MCPServer.js';

export interface ToolLike {
  tool: Tool;
}

/**
 * Generic base plugin to reduce duplication across tool plugins.
 * Subclasses create the tool instances and adapt each one to a handler.
 */
export abstract class BaseToolsPlugin<TTool extends ToolLike> implements MCPPlugin {
  abstract name: string;

  protected commands: TTool[] = [];
  protected logger?: Logger;
  protected commandMap: Map<string, TTool> = new Map();

  /** Create tool instances for this plugin */
  protected abstract createToolInstances(): TTool[];

  /** Adapt one tool to the handler signature the server calls */
  protected abstract getHandlerForTool(tool: TTool): ToolHandler;

  /** Build the internal command map */
  protected buildCommandMap(): void {
    this.commandMap.clear();
    for (const command of this.commands) {
      this.commandMap.set(command.tool.name, command);
    }
  }

  async initialize(server: MCPServer): Promise<void> {
    this.logger = server.getLogger();

    try {
      this.commands = this.createToolInstances();
      this.buildCommandMap();

      for (const command of this.commands) {
        server.registerTool(command.tool, this.getHandlerForTool(command));
      }

      this.logger.info(`${this.constructor.name} initialized with ${this.commands.length} tools.`);
    } catch (error) {
      this.logger.error(`Failed to initialize ${this.constructor.name}`, error);
      throw error;
    }
  }

  /**
   * Get a function that executes a specific tool by name, or undefined if
   * the plugin has no such tool
   */
  getToolFunction(toolName: string): ToolHandler | undefined {
    const command = this.commandMap.get(toolName);
    return command ? this.getHandlerForTool(command) : undefined;
  }

  async shutdown(): Promise<void> {
    this.commandMap.clear();
  }
}
