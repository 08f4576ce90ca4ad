import OpenAI from 'openai';
import type {
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { AgentError, Failures } from '../errors.js';
import { Logger } from '../logger.js';
import type { ChatRequest, ChatResponse, ChatTransport, Message, ToolSpec } from '../types.js';

export type OpenAITransportOptions = {
  apiKey: string;
  baseURL?: string;
};

export function toOpenAIMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
      case 'user':
        return { role: message.role, content: message.content };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          };
        }
        return { role: 'assistant', content: message.content ?? '' };
      case 'tool':
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
    }
  });
}

export function toOpenAITool(tool: ToolSpec): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  } satisfies ChatCompletionTool;
}

export function fromOpenAIMessage(message: ChatCompletionMessage | undefined): ChatResponse {
  if (!message) {
    return { content: null, toolCalls: [] };
  }

  const toolCalls = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments,
  }));
  const content = typeof message.content === 'string' ? message.content : null;
  return { content, toolCalls };
}

/**
 * Chat transport for OpenAI-compatible chat-completion endpoints.
 */
export class OpenAIChatTransport implements ChatTransport {
  private readonly client: OpenAI;

  constructor(options: OpenAITransportOptions) {
    if (!options.apiKey) {
      throw new AgentError(
        Failures.invalidConfiguration(['TOOLWRIGHT_API_KEY (or OPENAI_API_KEY) is required for the openai provider']),
      );
    }
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  public async complete(request: ChatRequest): Promise<ChatResponse> {
    const hasTools = !!request.tools && request.tools.length > 0;
    Logger.debug('transport', 'Sending OpenAI chat completion', {
      model: request.model,
      messages: request.messages.length,
      tools: request.tools?.length ?? 0,
    });

    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: toOpenAIMessages(request.messages),
        tools: hasTools ? request.tools?.map(toOpenAITool) : undefined,
        tool_choice: hasTools ? 'auto' : undefined,
      },
      { signal: request.signal },
    );

    return fromOpenAIMessage(completion.choices[0]?.message);
  }
}
