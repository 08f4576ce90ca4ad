import { AgentError, Failures, describeCause, type ToolFailure } from '../errors.js';
import { Logger } from '../logger.js';
import type { ToolCallRequest, ToolCallResult, ToolSpec, ValidationResult } from '../types.js';
import { toToolSpec, type Tool } from './definition.js';

/**
 * Type-erased view of a registered tool. The closure keeps the tool's own
 * argument type between `parse` and `invoke`.
 */
type RegisteredTool = {
  spec: Pick<Tool, 'name' | 'description' | 'parameters'>;
  dispatch(input: unknown): Promise<ValidationResult<string, ToolFailure>>;
};

const bindTool = <Args>(tool: Tool<Args>): RegisteredTool => ({
  spec: tool,
  dispatch: async (input) => {
    const parsed = tool.parse(input);
    if (!parsed.ok) {
      return { ok: false, error: Failures.invalidArguments(tool.name, parsed.error) };
    }

    try {
      return { ok: true, value: await tool.invoke(parsed.value) };
    } catch (error) {
      return { ok: false, error: Failures.toolExecutionFailed(tool.name, error) };
    }
  },
});

/**
 * Parses the raw JSON text a model sent as tool arguments.
 * An empty payload counts as an empty object.
 */
export const parseToolArguments = (
  name: string,
  raw: string,
): ValidationResult<unknown, ToolFailure> => {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: true, value: {} };
  }

  try {
    return { ok: true, value: JSON.parse(trimmed) };
  } catch (error) {
    return {
      ok: false,
      error: Failures.invalidArguments(name, [`arguments are not valid JSON: ${describeCause(error)}`]),
    };
  }
};

/**
 * Dispatch table of tools keyed by name, in registration order.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /**
   * Adds a tool. Throws `duplicate_name` when the name is taken.
   */
  public register<Args>(tool: Tool<Args>): this {
    if (this.tools.has(tool.name)) {
      throw new AgentError(Failures.duplicateName(tool.name));
    }
    this.tools.set(tool.name, bindTool(tool));
    Logger.debug('registry', `Registered tool ${tool.name}`);
    return this;
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public get(name: string): ToolSpec | undefined {
    const entry = this.tools.get(name);
    return entry ? toToolSpec(entry.spec) : undefined;
  }

  public names(): string[] {
    return [...this.tools.keys()];
  }

  public get size(): number {
    return this.tools.size;
  }

  /**
   * Fresh tool specs on every call.
   */
  public definitions(): ToolSpec[] {
    return [...this.tools.values()].map((entry) => toToolSpec(entry.spec));
  }

  /**
   * Runs one tool against an already-parsed argument value.
   */
  public async dispatch(
    name: string,
    input: unknown,
  ): Promise<ValidationResult<string, ToolFailure>> {
    const entry = this.tools.get(name);
    if (!entry) {
      Logger.warn('registry', `Unknown tool requested: ${name}`);
      return { ok: false, error: Failures.toolNotFound(name) };
    }

    const startedAt = Date.now();
    const result = await entry.dispatch(input);
    if (result.ok) {
      Logger.debug('registry', `Tool ${name} completed`, { durationMs: Date.now() - startedAt });
    } else {
      Logger.warn('registry', result.error.message);
    }
    return result;
  }

  /**
   * Runs one model-issued tool call whose arguments are raw JSON text.
   */
  public async dispatchRequest(
    request: ToolCallRequest,
  ): Promise<ValidationResult<ToolCallResult, ToolFailure>> {
    if (!this.tools.has(request.name)) {
      Logger.warn('registry', `Unknown tool requested: ${request.name}`);
      return { ok: false, error: Failures.toolNotFound(request.name) };
    }

    const parsed = parseToolArguments(request.name, request.arguments);
    if (!parsed.ok) {
      Logger.warn('registry', parsed.error.message);
      return parsed;
    }
    return this.dispatch(request.name, parsed.value).then(toCallResult(request.id));
  }

  /**
   * Runs a batch sequentially, stopping at the first failure.
   */
  public async dispatchAll(
    requests: readonly ToolCallRequest[],
  ): Promise<ValidationResult<ToolCallResult[], ToolFailure>> {
    const results: ToolCallResult[] = [];
    for (const request of requests) {
      const result = await this.dispatchRequest(request);
      if (!result.ok) {
        return result;
      }
      results.push(result.value);
    }
    return { ok: true, value: results };
  }
}

const toCallResult = (toolCallId: string) =>
  (result: ValidationResult<string, ToolFailure>): ValidationResult<ToolCallResult, ToolFailure> =>
    result.ok ? { ok: true, value: { toolCallId, content: result.value } } : result;

/**
 * Builds a registry from a list of tools.
 */
export const createToolRegistry = (...tools: Tool[]): ToolRegistry => {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
};
