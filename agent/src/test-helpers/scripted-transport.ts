import { vi } from 'vitest';
import type { ChatRequest, ChatResponse, ChatTransport, ToolCallRequest } from '../types.js';

/**
 * One scripted reply: a response to return or an error to throw.
 */
export type ScriptedReply = ChatResponse | Error;

export const textReply = (content: string): ChatResponse => ({ content, toolCalls: [] });

export const toolReply = (...toolCalls: ToolCallRequest[]): ChatResponse => ({
  content: null,
  toolCalls,
});

export const toolCall = (id: string, name: string, args: unknown): ToolCallRequest => ({
  id,
  name,
  arguments: typeof args === 'string' ? args : JSON.stringify(args),
});

/**
 * In-process transport that replays replies in order and records requests.
 * When the script runs out, the last reply repeats.
 */
export const createScriptedTransport = (...replies: ScriptedReply[]) => {
  const requests: ChatRequest[] = [];
  let index = 0;

  const complete = vi.fn(async (request: ChatRequest): Promise<ChatResponse> => {
    requests.push({ ...request, messages: [...request.messages] });
    const reply = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (reply === undefined) {
      throw new Error('Scripted transport has no replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });

  const transport: ChatTransport = { complete };
  return { transport, complete, requests };
};
