import type { AgentFailure } from './errors.js';
import type { JsonObject } from './schema/definition.js';

/**
 * Result of an operation that can fail with a typed error.
 */
export type ValidationResult<Value = unknown, ErrorCode = string> =
  | { ok: true; value: Value }
  | { ok: false; error: ErrorCode };

/**
 * Outcome of an agent loop.
 */
export type AgentResult<Value> = ValidationResult<Value, AgentFailure>;

/**
 * A tool invocation requested by the model. `arguments` is the raw JSON text.
 */
export type ToolCallRequest = {
  id: string;
  name: string;
  arguments: string;
};

export type ToolCallResult = {
  toolCallId: string;
  content: string;
};

export type Message =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; content: string };

export type MessageRole = Message['role'];

/**
 * Tool description sent with every chat request.
 */
export type ToolSpec = {
  name: string;
  description: string;
  parameters: JsonObject;
};

export type ChatRequest = {
  model: string;
  messages: readonly Message[];
  tools?: ToolSpec[];
  signal?: AbortSignal;
};

export type ChatResponse = {
  content: string | null;
  toolCalls: ToolCallRequest[];
};

/**
 * Minimal interface a chat-completion backend needs to fulfill.
 * Implementations throw on transport or protocol failures.
 */
export interface ChatTransport {
  complete(request: ChatRequest): Promise<ChatResponse>;
}

export type LoopPhase = 'awaiting_model' | 'handling_tool_calls';

/**
 * `private` marks runs started through `callAsTool`.
 */
export type AgentRunMode = 'conversation' | 'private';

export type AgentRunOptions = {
  signal?: AbortSignal;
};

/**
 * Telemetry emitted after each agent loop completes.
 */
export type AgentRunTelemetry = {
  model: string;
  mode: AgentRunMode;
  iterations: number;
  toolCalls: number;
  durationMs: number;
  ok: boolean;
  failure?: AgentFailure['code'];
  timestamp: number;
};

export type AgentTelemetrySink = (telemetry: AgentRunTelemetry) => void;
