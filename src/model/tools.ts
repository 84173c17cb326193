import { DEFAULT_AI_TOOLS, type AiTool } from './types.js';

/**
 * Recognized AI tool identifiers. Names outside the registry normalize to
 * `other`, matching how historical tags were read.
 */
export class ToolRegistry {
  private readonly tools: Set<string>;

  constructor(extraTools: Iterable<string> = []) {
    this.tools = new Set<string>(DEFAULT_AI_TOOLS);
    for (const tool of extraTools) {
      const normalized = tool.trim().toLowerCase();
      if (normalized) this.tools.add(normalized);
    }
  }

  has(tool: string): boolean {
    return this.tools.has(tool.trim().toLowerCase());
  }

  normalize(tool: string): AiTool {
    const normalized = tool.trim().toLowerCase();
    return this.tools.has(normalized) ? normalized : 'other';
  }

  list(): AiTool[] {
    return Array.from(this.tools);
  }
}

export const DEFAULT_TOOL_REGISTRY = new ToolRegistry();
