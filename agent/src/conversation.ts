import type { Message, ToolCallRequest } from './types.js';

/**
 * Ordered message log for one agent loop. Entries are only ever appended;
 * `clear()` is the single way to drop them.
 */
export class Conversation {
  private readonly entries: Message[] = [];

  static withSystem(prompt: string): Conversation {
    return new Conversation().addSystem(prompt);
  }

  addSystem(content: string): this {
    this.entries.push({ role: 'system', content });
    return this;
  }

  addUser(content: string): this {
    this.entries.push({ role: 'user', content });
    return this;
  }

  addAssistant(content: string): this {
    this.entries.push({ role: 'assistant', content });
    return this;
  }

  addAssistantWithToolCalls(content: string | null, toolCalls: readonly ToolCallRequest[]): this {
    this.entries.push({
      role: 'assistant',
      content,
      toolCalls: toolCalls.map((call) => ({ ...call })),
    });
    return this;
  }

  addToolResult(toolCallId: string, content: string): this {
    this.entries.push({ role: 'tool', toolCallId, content });
    return this;
  }

  /** Snapshot of the log in order. */
  messages(): readonly Message[] {
    return [...this.entries];
  }

  /** Last message, if any. */
  last(): Message | undefined {
    return this.entries[this.entries.length - 1];
  }

  get length(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
