import type { Logger } from 'pino';
import type { ZodTypeAny } from 'zod';

import { TOOL_REGISTRY, type ToolName } from './tool-registry';
import { MODES, type Mode } from './types';

export type RefusalCode = 'unknown_tool' | 'tool_not_in_mode' | 'invalid_arguments';

export interface ToolRefusal {
  code: RefusalCode;
  message: string;
  tool: string;
  mode: Mode;
  issues?: string[];
}

export type ToolCheckResult =
  | { allowed: true; tool: ToolName; args: Record<string, unknown> }
  | { allowed: false; refusal: ToolRefusal };

export interface ToolSummary {
  name: ToolName;
  description: string;
}

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_REGISTRY, name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Gatekeeper between the model's tool requests and their executors. A request
 * passes only when the tool exists, belongs to the learner's current mode and
 * its arguments satisfy the tool's schema. Refusals are returned, never thrown.
 */
export class ToolDispatchGuard {
  private readonly allowList: ReadonlyMap<Mode, ReadonlySet<ToolName>>;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ module: 'tool-dispatch-guard' });

    const allowList = new Map<Mode, Set<ToolName>>(MODES.map((mode) => [mode, new Set<ToolName>()]));
    for (const [name, definition] of Object.entries(TOOL_REGISTRY)) {
      if (!isToolName(name)) {
        continue;
      }
      for (const mode of MODES) {
        if (definition.modes === 'all' || definition.modes.includes(mode)) {
          allowList.get(mode)?.add(name);
        }
      }
    }
    this.allowList = allowList;
  }

  toolsForMode(mode: Mode): ToolName[] {
    return Array.from(this.allowList.get(mode) ?? []);
  }

  describeToolsForMode(mode: Mode): ToolSummary[] {
    return this.toolsForMode(mode).map((name) => ({ name, description: TOOL_REGISTRY[name].description }));
  }

  isAllowed(mode: Mode, toolName: string): boolean {
    return isToolName(toolName) && (this.allowList.get(mode)?.has(toolName) ?? false);
  }

  check(mode: Mode, toolName: string, args: unknown): ToolCheckResult {
    if (!isToolName(toolName)) {
      return this.refuse({
        code: 'unknown_tool',
        message: `tool ${toolName} does not exist`,
        tool: toolName,
        mode
      });
    }

    if (!this.isAllowed(mode, toolName)) {
      return this.refuse({
        code: 'tool_not_in_mode',
        message: `tool ${toolName} is not available in mode ${mode}`,
        tool: toolName,
        mode
      });
    }

    const schema: ZodTypeAny = TOOL_REGISTRY[toolName].schema;
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
      });
      return this.refuse({
        code: 'invalid_arguments',
        message: `tool ${toolName} received invalid arguments`,
        tool: toolName,
        mode,
        issues
      });
    }

    const validated: unknown = parsed.data;
    if (!isRecord(validated)) {
      return this.refuse({
        code: 'invalid_arguments',
        message: `tool ${toolName} received invalid arguments`,
        tool: toolName,
        mode
      });
    }

    return { allowed: true, tool: toolName, args: validated };
  }

  private refuse(refusal: ToolRefusal): ToolCheckResult {
    this.logger.warn({ tool: refusal.tool, mode: refusal.mode, code: refusal.code }, 'Tool call refused');
    return { allowed: false, refusal };
  }
}
