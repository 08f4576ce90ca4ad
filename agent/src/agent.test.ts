import { beforeAll, describe, expect, it, vi } from 'vitest';
import { Agent } from './agent.js';
import { Conversation } from './conversation.js';
import { AgentError } from './errors.js';
import { configureLogger } from './logger.js';
import { record, t } from './schema/builders.js';
import {
  createScriptedTransport,
  textReply,
  toolCall,
  toolReply,
} from './test-helpers/scripted-transport.js';
import { defineTool } from './tools/definition.js';
import { createToolRegistry } from './tools/registry.js';
import type { AgentRunTelemetry } from './types.js';

const addTool = defineTool({
  name: 'add',
  description: 'Adds two integers',
  args: record('AddArgs', { a: t.integer(), b: t.integer() }),
  execute: ({ a, b }) => String(a + b),
});

const captureError = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
};

beforeAll(() => {
  configureLogger({ consoleLevel: 'silent' });
});

describe('Agent', () => {
  it('runs tools until the model answers', async () => {
    const { transport, requests } = createScriptedTransport(
      toolReply(toolCall('call_1', 'add', { a: 2, b: 2 })),
      textReply('The answer is 4'),
    );
    const tools = createToolRegistry(addTool);
    const agent = Agent.create(transport, {
      model: 'test-model',
      systemPrompt: 'You are precise.',
      tools,
    });

    const result = await agent.run('What is 2+2?');

    expect(result).toEqual({ ok: true, value: 'The answer is 4' });
    expect(requests).toHaveLength(2);
    expect(requests[0]?.tools).toEqual(tools.definitions());
    expect(requests[1]?.messages).toEqual([
      { role: 'system', content: 'You are precise.' },
      { role: 'user', content: 'What is 2+2?' },
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ id: 'call_1', name: 'add', arguments: '{"a":2,"b":2}' }],
      },
      { role: 'tool', toolCallId: 'call_1', content: '4' },
    ]);
  });

  it('runs every call of a batch in request order', async () => {
    const { transport, requests } = createScriptedTransport(
      toolReply(toolCall('x', 'add', { a: 1, b: 1 }), toolCall('y', 'add', { a: 5, b: 5 })),
      textReply('done'),
    );
    const agent = Agent.create(transport, { model: 'test-model', tools: createToolRegistry(addTool) });

    await expect(agent.run('go')).resolves.toEqual({ ok: true, value: 'done' });
    expect(requests[1]?.messages.slice(-2)).toEqual([
      { role: 'tool', toolCallId: 'x', content: '2' },
      { role: 'tool', toolCallId: 'y', content: '10' },
    ]);
  });

  it('stops after the iteration cap', async () => {
    const { transport, complete } = createScriptedTransport(
      toolReply(toolCall('call_1', 'add', { a: 1, b: 1 })),
    );
    const agent = Agent.create(transport, {
      model: 'test-model',
      tools: createToolRegistry(addTool),
      maxIterations: 1,
    });

    await expect(agent.run('loop forever')).resolves.toEqual({
      ok: false,
      error: {
        code: 'max_iterations_exceeded',
        max: 1,
        message: 'Agent exceeded maximum iterations: 1',
      },
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('fails on a response with neither content nor tool calls', async () => {
    for (const content of [null, '']) {
      const { transport } = createScriptedTransport({ content, toolCalls: [] });
      const agent = Agent.create(transport, { model: 'test-model' });

      const result = await agent.run('hello');
      expect(result).toMatchObject({ ok: false, error: { code: 'empty_response' } });
    }
  });

  it('fails when tool calls arrive without a registry', async () => {
    const { transport, requests } = createScriptedTransport(
      toolReply(toolCall('call_1', 'add', { a: 1, b: 1 })),
    );
    const agent = Agent.create(transport, { model: 'test-model' });

    const result = await agent.run('hello');

    expect(result).toMatchObject({ ok: false, error: { code: 'no_tools_configured' } });
    expect(requests[0] && 'tools' in requests[0]).toBe(false);
  });

  it('surfaces transport failures without retrying', async () => {
    const { transport, complete } = createScriptedTransport(new Error('network down'));
    const agent = Agent.create(transport, { model: 'test-model' });

    const result = await agent.run('hello');

    expect(result).toMatchObject({
      ok: false,
      error: { code: 'upstream_error', message: 'Chat request failed: network down' },
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('wraps lookup and argument failures as execution failures', async () => {
    const unknown = createScriptedTransport(toolReply(toolCall('call_1', 'missing', {})));
    const unknownAgent = Agent.create(unknown.transport, {
      model: 'test-model',
      tools: createToolRegistry(addTool),
    });

    await expect(unknownAgent.run('hello')).resolves.toMatchObject({
      ok: false,
      error: {
        code: 'tool_execution_failed',
        name: 'missing',
        cause: { code: 'tool_not_found', name: 'missing' },
      },
    });

    const malformed = createScriptedTransport(toolReply(toolCall('call_1', 'add', '{"a":')));
    const malformedAgent = Agent.create(malformed.transport, {
      model: 'test-model',
      tools: createToolRegistry(addTool),
    });

    await expect(malformedAgent.run('hello')).resolves.toMatchObject({
      ok: false,
      error: {
        code: 'tool_execution_failed',
        name: 'add',
        cause: { code: 'invalid_arguments', name: 'add' },
      },
    });
  });

  it('continues a caller-owned conversation', async () => {
    const { transport, requests } = createScriptedTransport(textReply('Hi!'), textReply('Still here.'));
    const agent = Agent.create(transport, { model: 'test-model', systemPrompt: 'Be kind.' });
    const conversation = agent.createConversation();

    conversation.addUser('Hello');
    await expect(agent.runConversation(conversation)).resolves.toEqual({ ok: true, value: 'Hi!' });

    conversation.addUser('Are you there?');
    await expect(agent.runConversation(conversation)).resolves.toEqual({
      ok: true,
      value: 'Still here.',
    });

    expect(conversation.length).toBe(5);
    expect(requests[1]?.messages).toEqual([
      { role: 'system', content: 'Be kind.' },
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi!' },
      { role: 'user', content: 'Are you there?' },
    ]);
  });

  it('keeps private calls out of caller conversations', async () => {
    const { transport, requests } = createScriptedTransport(textReply('private answer'));
    const telemetry = vi.fn<(entry: AgentRunTelemetry) => void>();
    const agent = Agent.create(transport, { model: 'test-model' }, telemetry);
    const conversation = new Conversation().addUser('unrelated');

    await expect(agent.callAsTool('secret question')).resolves.toEqual({
      ok: true,
      value: 'private answer',
    });

    expect(conversation.length).toBe(1);
    expect(requests[0]?.messages).toEqual([{ role: 'user', content: 'secret question' }]);
    expect(telemetry).toHaveBeenCalledWith(expect.objectContaining({ mode: 'private', ok: true }));
  });

  it('reports telemetry for each run', async () => {
    const { transport } = createScriptedTransport(
      toolReply(toolCall('call_1', 'add', { a: 2, b: 3 })),
      textReply('5'),
    );
    const telemetry = vi.fn<(entry: AgentRunTelemetry) => void>();
    const agent = Agent.builder()
      .transport(transport)
      .model('test-model')
      .tools(createToolRegistry(addTool))
      .telemetry(telemetry)
      .build();

    await agent.run('2+3');

    expect(telemetry).toHaveBeenCalledTimes(1);
    expect(telemetry).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'test-model',
        mode: 'conversation',
        iterations: 2,
        toolCalls: 1,
        ok: true,
      }),
    );
  });

  it('does not call the transport once the signal is aborted', async () => {
    const { transport, complete } = createScriptedTransport(textReply('never'));
    const agent = Agent.create(transport, { model: 'test-model' });
    const controller = new AbortController();
    controller.abort();

    const result = await agent.run('hello', { signal: controller.signal });

    expect(result).toMatchObject({
      ok: false,
      error: { code: 'upstream_error', message: 'Chat request failed: Agent run aborted' },
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('forwards the signal to the transport', async () => {
    const { transport, requests } = createScriptedTransport(textReply('ok'));
    const agent = Agent.create(transport, { model: 'test-model' });
    const controller = new AbortController();

    await agent.run('hello', { signal: controller.signal });

    expect(requests[0]?.signal).toBe(controller.signal);
  });
});

describe('Agent configuration', () => {
  const { transport } = createScriptedTransport(textReply('ok'));

  it('applies defaults', () => {
    const agent = Agent.create(transport, { model: 'test-model' });

    expect(agent.maxIterations).toBe(10);
    expect(agent.systemPrompt).toBeUndefined();
    expect(agent.tools).toBeUndefined();
    expect(agent.createConversation().isEmpty).toBe(true);
  });

  it('rejects a blank model', () => {
    const error = captureError(() => Agent.create(transport, { model: '  ' }));

    expect(error).toBeInstanceOf(AgentError);
    if (error instanceof AgentError) {
      expect(error.failure).toEqual({
        code: 'invalid_configuration',
        issues: ['model: model is required'],
        message: 'Invalid configuration: model: model is required',
      });
    }
  });

  it('rejects a non-positive iteration cap', () => {
    expect(() => Agent.create(transport, { model: 'test-model', maxIterations: 0 })).toThrow(
      'maxIterations: Number must be greater than 0',
    );
    expect(() => Agent.create(transport, { model: 'test-model', maxIterations: 1.5 })).toThrow(
      'maxIterations: Expected integer, received float',
    );
  });

  it('requires a transport and a model in the builder', () => {
    expect(() => Agent.builder().model('test-model').build()).toThrow(
      'transport: a chat transport is required',
    );
    expect(() => Agent.builder().transport(transport).build()).toThrow('model: model is required');
  });
});
