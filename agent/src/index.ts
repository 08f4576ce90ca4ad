export { Agent, AgentBuilder, DEFAULT_MAX_ITERATIONS, type AgentConfig } from './agent.js';
export { loadConfig, DEFAULT_MODEL, type Provider, type ToolwrightConfig } from './config.js';
export { Conversation } from './conversation.js';
export {
  AgentError,
  Failures,
  describeCause,
  isAgentFailure,
  type AgentFailure,
  type FailureCode,
  type ToolFailure,
} from './errors.js';
export { Lease } from './lease.js';
export { Logger, clearLogs, configureLogger, getLogs, type LogEntry, type LogLevel } from './logger.js';
export { OllamaChatTransport } from './models/ollama.js';
export { OpenAIChatTransport } from './models/openai.js';
export { createTransport } from './models/transport.js';
export { record, t, union, variant } from './schema/builders.js';
export { compileDecoder, decodeArguments } from './schema/decoder.js';
export type {
  ArgumentType,
  FieldType,
  InferArgs,
  JsonObject,
  JsonValue,
  RecordType,
  UnionType,
} from './schema/definition.js';
export { generateSchema } from './schema/generator.js';
export { AgentCallArgs, AgentTool } from './tools/agent-tool.js';
export { defineTool, type Tool, type ToolDefinition } from './tools/definition.js';
export { ToolRegistry, createToolRegistry } from './tools/registry.js';
export type * from './types.js';
