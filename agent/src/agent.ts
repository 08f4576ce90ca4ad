import { z } from 'zod';
import { Conversation } from './conversation.js';
import { AgentError, Failures, type AgentFailure, type ToolFailure } from './errors.js';
import { Logger } from './logger.js';
import { formatIssues } from './schema/decoder.js';
import { ToolRegistry } from './tools/registry.js';
import type {
  AgentResult,
  AgentRunMode,
  AgentRunOptions,
  AgentTelemetrySink,
  ChatResponse,
  ChatTransport,
  LoopPhase,
} from './types.js';

export const DEFAULT_MAX_ITERATIONS = 10;

const agentConfigSchema = z.object({
  model: z.string().trim().min(1, 'model is required'),
  systemPrompt: z.string().optional(),
  tools: z.instanceof(ToolRegistry).optional(),
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
});

/**
 * Settings accepted when building an agent.
 */
export type AgentConfig = z.input<typeof agentConfigSchema>;

type ResolvedAgentConfig = z.output<typeof agentConfigSchema>;

/**
 * Helper to measure execution duration in milliseconds.
 */
function measureDurationMs(startMs: number): number {
  return Math.round((Date.now() - startMs) * 100) / 100;
}

const createAbortError = (): Error => {
  const error = new Error('Agent run aborted');
  error.name = 'AbortError';
  return error;
};

const isChatTransport = (value: unknown): value is ChatTransport =>
  typeof value === 'object'
  && value !== null
  && typeof (value as Record<string, unknown>).complete === 'function';

/**
 * Failures that stop a tool batch are reported as `tool_execution_failed`,
 * with lookup and decoding problems kept as the cause.
 */
const asExecutionFailure = (failure: ToolFailure): AgentFailure =>
  failure.code === 'tool_execution_failed'
    ? failure
    : Failures.toolExecutionFailed(failure.name, failure);

/**
 * Drives the model/tool loop for one conversation at a time.
 */
export class Agent {
  private constructor(
    private readonly transport: ChatTransport,
    private readonly config: ResolvedAgentConfig,
    private readonly telemetrySink?: AgentTelemetrySink,
  ) {}

  /**
   * Validates the configuration and builds an agent.
   * Throws `AgentError(invalid_configuration)` on bad input.
   */
  static create(
    transport: ChatTransport,
    config: AgentConfig,
    telemetrySink?: AgentTelemetrySink,
  ): Agent {
    if (!isChatTransport(transport)) {
      throw new AgentError(Failures.invalidConfiguration(['transport: a chat transport is required']));
    }

    const parsed = agentConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new AgentError(Failures.invalidConfiguration(formatIssues(parsed.error.issues)));
    }

    return new Agent(transport, parsed.data, telemetrySink);
  }

  static builder(): AgentBuilder {
    return new AgentBuilder();
  }

  get model(): string {
    return this.config.model;
  }

  get systemPrompt(): string | undefined {
    return this.config.systemPrompt;
  }

  get maxIterations(): number {
    return this.config.maxIterations;
  }

  get tools(): ToolRegistry | undefined {
    return this.config.tools;
  }

  /**
   * New conversation seeded with the system prompt, if one is configured.
   */
  createConversation(): Conversation {
    return this.config.systemPrompt
      ? Conversation.withSystem(this.config.systemPrompt)
      : new Conversation();
  }

  /**
   * Runs a single message in a fresh conversation.
   */
  async run(message: string, options: AgentRunOptions = {}): Promise<AgentResult<string>> {
    const conversation = this.createConversation().addUser(message);
    return this.drive(conversation, 'conversation', options);
  }

  /**
   * Continues a caller-owned conversation. The caller appends the next user
   * message; the loop appends the assistant and tool messages it produces.
   */
  async runConversation(
    conversation: Conversation,
    options: AgentRunOptions = {},
  ): Promise<AgentResult<string>> {
    return this.drive(conversation, 'conversation', options);
  }

  /**
   * Private call used when this agent serves another agent: nothing from the
   * run is visible outside of the returned text.
   */
  async callAsTool(message: string, options: AgentRunOptions = {}): Promise<AgentResult<string>> {
    const conversation = this.createConversation().addUser(message);
    return this.drive(conversation, 'private', options);
  }

  private async drive(
    conversation: Conversation,
    mode: AgentRunMode,
    options: AgentRunOptions,
  ): Promise<AgentResult<string>> {
    const startedAt = Date.now();
    const { model, maxIterations, tools } = this.config;
    let iterations = 0;
    let toolCalls = 0;

    const finish = (result: AgentResult<string>): AgentResult<string> => {
      const durationMs = measureDurationMs(startedAt);
      if (result.ok) {
        Logger.info('agent', `Run finished after ${iterations} iteration(s)`, { mode, durationMs });
      } else {
        Logger.error('agent', result.error.message, { mode, iterations, durationMs });
      }
      this.telemetrySink?.({
        model,
        mode,
        iterations,
        toolCalls,
        durationMs,
        ok: result.ok,
        ...(result.ok ? {} : { failure: result.error.code }),
        timestamp: Date.now(),
      });
      return result;
    };

    const fail = (failure: AgentFailure): AgentResult<string> => finish({ ok: false, error: failure });

    Logger.info('agent', `Starting ${mode} run`, { model, maxIterations });

    for (;;) {
      if (iterations >= maxIterations) {
        return fail(Failures.maxIterationsExceeded(maxIterations));
      }
      iterations += 1;

      this.enter('awaiting_model', iterations);
      if (options.signal?.aborted) {
        return fail(Failures.upstreamError(createAbortError()));
      }

      let response: ChatResponse;
      try {
        response = await this.transport.complete({
          model,
          messages: conversation.messages(),
          ...(tools ? { tools: tools.definitions() } : {}),
          signal: options.signal,
        });
      } catch (error) {
        return fail(Failures.upstreamError(error));
      }

      if (response.toolCalls.length === 0) {
        if (!response.content) {
          return fail(Failures.emptyResponse());
        }
        conversation.addAssistant(response.content);
        return finish({ ok: true, value: response.content });
      }

      conversation.addAssistantWithToolCalls(response.content, response.toolCalls);

      this.enter('handling_tool_calls', iterations);
      if (!tools) {
        return fail(Failures.noToolsConfigured());
      }

      for (const call of response.toolCalls) {
        toolCalls += 1;
        const result = await tools.dispatchRequest(call);
        if (!result.ok) {
          return fail(asExecutionFailure(result.error));
        }
        conversation.addToolResult(result.value.toolCallId, result.value.content);
      }
    }
  }

  private enter(phase: LoopPhase, iteration: number): void {
    Logger.debug('agent', `Iteration ${iteration}: ${phase}`);
  }
}

/**
 * Fluent alternative to `Agent.create`.
 */
export class AgentBuilder {
  private transportValue?: ChatTransport;
  private modelValue?: string;
  private systemPromptValue?: string;
  private toolsValue?: ToolRegistry;
  private maxIterationsValue?: number;
  private telemetrySink?: AgentTelemetrySink;

  transport(transport: ChatTransport): this {
    this.transportValue = transport;
    return this;
  }

  model(model: string): this {
    this.modelValue = model;
    return this;
  }

  systemPrompt(prompt: string): this {
    this.systemPromptValue = prompt;
    return this;
  }

  tools(registry: ToolRegistry): this {
    this.toolsValue = registry;
    return this;
  }

  maxIterations(max: number): this {
    this.maxIterationsValue = max;
    return this;
  }

  telemetry(sink: AgentTelemetrySink): this {
    this.telemetrySink = sink;
    return this;
  }

  build(): Agent {
    if (!this.transportValue) {
      throw new AgentError(Failures.invalidConfiguration(['transport: a chat transport is required']));
    }

    return Agent.create(
      this.transportValue,
      {
        model: this.modelValue ?? '',
        systemPrompt: this.systemPromptValue,
        tools: this.toolsValue,
        maxIterations: this.maxIterationsValue,
      },
      this.telemetrySink,
    );
  }
}
