/**
 * Failures raised while dispatching a single tool.
 */
export type ToolFailure =
  | { code: 'tool_not_found'; name: string; message: string }
  | { code: 'invalid_arguments'; name: string; issues: string[]; message: string }
  | { code: 'tool_execution_failed'; name: string; cause: unknown; message: string };

/**
 * Every way an agent operation can fail, discriminated on `code`.
 */
export type AgentFailure =
  | ToolFailure
  | { code: 'upstream_error'; cause: unknown; message: string }
  | { code: 'empty_response'; message: string }
  | { code: 'no_tools_configured'; message: string }
  | { code: 'max_iterations_exceeded'; max: number; message: string }
  | { code: 'invalid_configuration'; issues: string[]; message: string }
  | { code: 'duplicate_name'; name: string; message: string };

export type FailureCode = AgentFailure['code'];

const FAILURE_CODES: ReadonlySet<string> = new Set<FailureCode>([
  'tool_not_found',
  'invalid_arguments',
  'tool_execution_failed',
  'upstream_error',
  'empty_response',
  'no_tools_configured',
  'max_iterations_exceeded',
  'invalid_configuration',
  'duplicate_name',
]);

/**
 * Narrow an unknown value into an AgentFailure.
 */
export const isAgentFailure = (value: unknown): value is AgentFailure => {
  if (!value || typeof value !== 'object') {
    return false;
  }

  const record = value as Record<string, unknown>;
  return (
    typeof record.code === 'string'
    && FAILURE_CODES.has(record.code)
    && typeof record.message === 'string'
  );
};

/**
 * Human-readable text for a thrown value or a nested failure.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (isAgentFailure(cause)) {
    return cause.message;
  }
  return String(cause);
};

export const Failures = {
  toolNotFound: (name: string): ToolFailure => ({
    code: 'tool_not_found',
    name,
    message: `Tool not found: ${name}`,
  }),
  invalidArguments: (name: string, issues: string[]): ToolFailure => ({
    code: 'invalid_arguments',
    name,
    issues,
    message: `Invalid arguments for tool '${name}': ${issues.join('; ')}`,
  }),
  toolExecutionFailed: (name: string, cause: unknown): ToolFailure => ({
    code: 'tool_execution_failed',
    name,
    cause,
    message: `Tool '${name}' failed: ${describeCause(cause)}`,
  }),
  upstreamError: (cause: unknown): AgentFailure => ({
    code: 'upstream_error',
    cause,
    message: `Chat request failed: ${describeCause(cause)}`,
  }),
  emptyResponse: (): AgentFailure => ({
    code: 'empty_response',
    message: 'Model returned neither content nor tool calls',
  }),
  noToolsConfigured: (): AgentFailure => ({
    code: 'no_tools_configured',
    message: 'Model requested tool calls but the agent has no tools configured',
  }),
  maxIterationsExceeded: (max: number): AgentFailure => ({
    code: 'max_iterations_exceeded',
    max,
    message: `Agent exceeded maximum iterations: ${max}`,
  }),
  invalidConfiguration: (issues: string[]): AgentFailure => ({
    code: 'invalid_configuration',
    issues,
    message: `Invalid configuration: ${issues.join('; ')}`,
  }),
  duplicateName: (name: string): AgentFailure => ({
    code: 'duplicate_name',
    name,
    message: `Tool "${name}" is already registered`,
  }),
};

/**
 * Thrown for definition-time problems and when a failed agent run has to
 * cross a boundary that only understands exceptions (an agent used as a tool).
 */
export class AgentError extends Error {
  constructor(public readonly failure: AgentFailure) {
    super(failure.message, 'cause' in failure ? { cause: failure.cause } : undefined);
    this.name = 'AgentError';
  }

  get code(): FailureCode {
    return this.failure.code;
  }
}
