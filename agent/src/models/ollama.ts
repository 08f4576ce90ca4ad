import { z } from 'zod';
import { Logger } from '../logger.js';
import type {
  ChatRequest,
  ChatResponse,
  ChatTransport,
  Message,
  ToolCallRequest,
  ToolSpec,
} from '../types.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://127.0.0.1:11434';

const ollamaToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
  }),
});

const ollamaChatChunkSchema = z.object({
  message: z
    .object({
      role: z.string().optional(),
      content: z.string().nullish(),
      tool_calls: z.array(ollamaToolCallSchema).nullish(),
    })
    .optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

type OllamaChatChunk = z.infer<typeof ollamaChatChunkSchema>;

type OllamaMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string;
      tool_calls?: { function: { name: string; arguments: unknown } }[];
    }
  | { role: 'tool'; content: string; tool_call_id: string };

type OllamaTool = {
  type: 'function';
  function: { name: string; description: string; parameters: ToolSpec['parameters'] };
};

/**
 * Ollama expects tool arguments as objects, while the conversation keeps
 * the raw JSON text the model produced.
 */
const decodeArgumentsText = (raw: string): unknown => {
  if (!raw.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    Logger.warn('transport', 'Sending unparsable tool arguments to Ollama as text', { error });
    return raw;
  }
};

export const toOllamaMessages = (messages: readonly Message[]): OllamaMessage[] =>
  messages.map((message): OllamaMessage => {
    switch (message.role) {
      case 'system':
      case 'user':
        return { role: message.role, content: message.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: message.content ?? '',
          ...(message.toolCalls && message.toolCalls.length > 0
            ? {
                tool_calls: message.toolCalls.map((call) => ({
                  function: { name: call.name, arguments: decodeArgumentsText(call.arguments) },
                })),
              }
            : {}),
        };
      case 'tool':
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
    }
  });

export const toOllamaTool = (tool: ToolSpec): OllamaTool => ({
  type: 'function',
  function: {
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  },
});

/**
 * Chat transport for a local Ollama server.
 */
export class OllamaChatTransport implements ChatTransport {
  private callCounter = 0;

  constructor(private readonly baseUrl = DEFAULT_OLLAMA_BASE_URL) {}

  public async complete(request: ChatRequest): Promise<ChatResponse> {
    if (request.messages.length === 0) {
      throw new Error('OllamaChatTransport requires at least one message');
    }

    const tools = request.tools?.map(toOllamaTool);
    const response = await fetch(`${this.baseUrl.replace(/\/$/, '')}/api/chat`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: request.model,
        messages: toOllamaMessages(request.messages),
        ...(tools && tools.length > 0 ? { tools } : {}),
        stream: false,
      }),
      signal: request.signal,
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(
        `Ollama request failed (${response.status} ${response.statusText}): ${detail}`,
      );
    }

    const payloadText = await response.text();
    return this.extractResponse(payloadText);
  }

  /**
   * Merges content and tool calls across one or more response chunks.
   */
  private extractResponse(payloadText: string): ChatResponse {
    const chunks = this.parseChatResponses(payloadText);
    if (chunks.length === 0) {
      throw new Error('Ollama returned an unreadable response body');
    }

    let content = '';
    const toolCalls: ToolCallRequest[] = [];

    for (const chunk of chunks) {
      if (chunk.error) {
        throw new Error(`Ollama response error: ${chunk.error}`);
      }

      if (chunk.message?.content) {
        content += chunk.message.content;
      }

      for (const call of chunk.message?.tool_calls ?? []) {
        const args = call.function.arguments;
        toolCalls.push({
          id: call.id ?? this.nextCallId(),
          name: call.function.name,
          arguments: typeof args === 'string' ? args : JSON.stringify(args ?? {}),
        });
      }
    }

    Logger.debug('transport', 'Ollama response received', {
      chunks: chunks.length,
      toolCalls: toolCalls.length,
    });
    return { content: content.length > 0 ? content : null, toolCalls };
  }

  private nextCallId(): string {
    this.callCounter += 1;
    return `call_${this.callCounter}`;
  }

  private parseChunk(text: string): OllamaChatChunk | undefined {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return undefined;
    }
    const parsed = ollamaChatChunkSchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }

  /**
   * Parses the response body into one or more chat chunks: a single object,
   * NDJSON lines, or concatenated objects.
   */
  private parseChatResponses(payloadText: string): OllamaChatChunk[] {
    const trimmed = payloadText.trim();
    if (!trimmed) {
      return [];
    }

    const single = this.parseChunk(trimmed);
    if (single) {
      return [single];
    }

    const lineChunks: OllamaChatChunk[] = [];
    for (const line of trimmed.split(/\r?\n/)) {
      const trimmedLine = line.trim();
      if (!trimmedLine) {
        continue;
      }
      const chunk = this.parseChunk(trimmedLine);
      if (!chunk) {
        lineChunks.length = 0;
        break;
      }
      lineChunks.push(chunk);
    }

    if (lineChunks.length > 0) {
      return lineChunks;
    }

    return this.splitConcatenatedJson(trimmed);
  }

  /**
   * Splits concatenated JSON objects by tracking brace depth.
   */
  private splitConcatenatedJson(payloadText: string): OllamaChatChunk[] {
    const chunks: OllamaChatChunk[] = [];
    let depth = 0;
    let startIndex = 0;
    let inString = false;
    let escaped = false;

    for (let index = 0; index < payloadText.length; index += 1) {
      const char = payloadText[index];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (char === '\\') {
          escaped = true;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === '"') {
        inString = true;
        continue;
      }

      if (char === '{') {
        if (depth === 0) {
          startIndex = index;
        }
        depth += 1;
        continue;
      }

      if (char === '}') {
        depth -= 1;
        if (depth === 0) {
          const chunk = this.parseChunk(payloadText.slice(startIndex, index + 1));
          if (!chunk) {
            return [];
          }
          chunks.push(chunk);
        }
      }
    }

    return chunks;
  }
}
