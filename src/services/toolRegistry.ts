// src/services/toolRegistry.ts
// What: Name → tool directory, plus the per-turn dispatcher that collects citation sources.
// How: The registry only holds tools. Each user turn opens its own ToolTurn, which dispatches calls and remembers the
//      sources of every tool's latest call in that turn. Concurrent turns therefore never share source state.

import { ConfigError } from '../errors.js';
import logger from '../logging.js';
import type { ToolDefinition, ToolResult, ToolSource } from '../models/types.js';
import type { Tool } from './searchTools.js';

/** What the conversation orchestrator needs from a turn. */
export interface ToolDispatcher {
  definitions(): ToolDefinition[];
  dispatch(name: string, args: Record<string, unknown>): Promise<ToolResult>;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): void {
    const name = tool.definition().name;
    if (!name) {
      throw new ConfigError("Tool must have a 'name' in its definition");
    }
    this.tools.set(name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition());
  }

  openTurn(): ToolTurn {
    return new ToolTurn(this);
  }
}

export class ToolTurn implements ToolDispatcher {
  // Insertion order doubles as "order of each tool's latest call"; entries are re-inserted on every call.
  private lastSources = new Map<string, ToolSource[]>();

  constructor(private readonly registry: ToolRegistry) {}

  definitions(): ToolDefinition[] {
    return this.registry.definitions();
  }

  /**
   * Runs a tool by name. An unknown name is reported as result text, not thrown, because it goes back to the model
   * as the tool's output. Exceptions thrown by the tool itself propagate.
   */
  async dispatch(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.registry.get(name);
    if (!tool) {
      logger.warn({ tool: name }, 'Model requested an unknown tool');
      return { content: `Tool '${name}' not found`, sources: [] };
    }
    logger.debug({ tool: name, args }, 'Dispatching tool call');
    const result = await tool.execute(args);
    this.lastSources.delete(name);
    this.lastSources.set(name, result.sources);
    return result;
  }

  collectedSources(): ToolSource[] {
    return [...this.lastSources.values()].flat();
  }

  resetSources(): void {
    this.lastSources = new Map();
  }
}
