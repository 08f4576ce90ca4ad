import type { Agent } from '../agent.js';
import { AgentError } from '../errors.js';
import { Lease } from '../lease.js';
import { record, t } from '../schema/builders.js';
import { decodeArguments } from '../schema/decoder.js';
import type { InferArgs, JsonObject } from '../schema/definition.js';
import { generateSchema } from '../schema/generator.js';
import type { ValidationResult } from '../types.js';
import { assertToolName, type Tool } from './definition.js';

export const AgentCallArgs = record(
  'AgentCallArgs',
  { message: t.string('Message to send to the agent') },
  'Arguments for delegating a request to another agent',
);

export type AgentCallArgs = InferArgs<typeof AgentCallArgs>;

/**
 * Exposes an agent as a tool of another agent. Calls run privately through
 * `callAsTool` and are serialized by the lease, which may be shared with
 * other wrappers of the same agent.
 */
export class AgentTool implements Tool<AgentCallArgs> {
  public readonly parameters: JsonObject = generateSchema(AgentCallArgs);

  constructor(
    public readonly name: string,
    public readonly description: string,
    private readonly agent: Agent,
    private readonly lease: Lease = new Lease(),
  ) {
    assertToolName(name);
  }

  parse(input: unknown): ValidationResult<AgentCallArgs, string[]> {
    return decodeArguments(AgentCallArgs, input);
  }

  async invoke(args: AgentCallArgs): Promise<string> {
    const result = await this.lease.run(() => this.agent.callAsTool(args.message));
    if (!result.ok) {
      throw new AgentError(result.error);
    }
    return result.value;
  }
}
