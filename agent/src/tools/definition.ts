import { AgentError, Failures } from '../errors.js';
import { decodeArguments } from '../schema/decoder.js';
import type { ArgumentType, InferArgs, JsonObject } from '../schema/definition.js';
import { generateSchema } from '../schema/generator.js';
import type { ToolSpec, ValidationResult } from '../types.js';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * A callable the model may request. `parse` turns untyped JSON into `Args`
 * before `invoke` runs.
 */
export interface Tool<Args = unknown> {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonObject;
  parse(input: unknown): ValidationResult<Args, string[]>;
  invoke(args: Args): Promise<string>;
}

/**
 * Definition for a tool declared from an argument type.
 */
export type ToolDefinition<A extends ArgumentType> = {
  name: string;
  description: string;
  args: A;
  execute(args: InferArgs<A>): Promise<string> | string;
};

/**
 * Throws when a tool name is not accepted by chat-completion APIs.
 */
export const assertToolName = (name: string): void => {
  if (!TOOL_NAME_PATTERN.test(name)) {
    throw new AgentError(
      Failures.invalidConfiguration([`Tool name "${name}" must match ${TOOL_NAME_PATTERN.source}`]),
    );
  }
};

export const toToolSpec = (tool: Pick<Tool, 'name' | 'description' | 'parameters'>): ToolSpec => ({
  name: tool.name,
  description: tool.description,
  parameters: tool.parameters,
});

/**
 * Binds name, description, generated schema and handler into one Tool.
 * The schema is generated once, here.
 */
export const defineTool = <A extends ArgumentType>(
  definition: ToolDefinition<A>,
): Tool<InferArgs<A>> => {
  assertToolName(definition.name);
  const description = definition.description.trim();
  const parameters = generateSchema(definition.args);

  return {
    name: definition.name,
    description,
    parameters,
    parse: (input) => decodeArguments(definition.args, input),
    invoke: async (args) => definition.execute(args),
  };
};
