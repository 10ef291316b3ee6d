import { describe, expect, it, vi } from 'vitest';
import { ToolCallParseError } from '../../src/errors.js';
import type { ToolDefinition, ToolResult } from '../../src/models/types.js';
import { ConversationOrchestrator, SYSTEM_PROMPT, toOpenAITools } from '../../src/services/conversation.js';
import type { ToolDispatcher } from '../../src/services/toolRegistry.js';
import { createFakeChatClient, textCompletion, toolCall, toolCallCompletion } from '../helpers/fakes.js';

const searchDefinition: ToolDefinition = {
  name: 'search_course_content',
  description: 'Search course materials',
  input_schema: { type: 'object', properties: { query: { type: 'string', description: 'Search query' } }, required: ['query'] },
};

function fakeDispatcher(impl?: (name: string, args: Record<string, unknown>) => Promise<ToolResult>) {
  const dispatch = vi.fn<(name: string, args: Record<string, unknown>) => Promise<ToolResult>>(
    impl ?? (async (name) => ({ content: `${name} result`, sources: [] })),
  );
  const dispatcher: ToolDispatcher = { definitions: () => [searchDefinition], dispatch };
  return { dispatcher, dispatch };
}

describe('ConversationOrchestrator', () => {
  it('returns a direct answer from a single request', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(textCompletion('Widgets are parts.'));
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    const answer = await orchestrator.generateResponse({ query: 'What is a widget?' });

    expect(answer).toBe('Widgets are parts.');
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0][0]).toEqual({
      model: 'test-model',
      temperature: 0,
      max_tokens: 800,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'What is a widget?' },
      ],
    });
  });

  it('appends prior conversation to the system prompt', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(textCompletion('Yes.'));
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model', maxTokens: 200 });

    await orchestrator.generateResponse({ query: 'And then?', history: 'user: hi\nassistant: hello' });

    const body = create.mock.calls[0][0];
    expect(body.max_tokens).toBe(200);
    expect(body.messages[0]).toEqual({
      role: 'system',
      content: `${SYSTEM_PROMPT}\n\nPrevious conversation:\nuser: hi\nassistant: hello`,
    });
  });

  it('offers tools with automatic tool choice', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(textCompletion('Paris.'));
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    await orchestrator.generateResponse({ query: 'Capital of France?', tools: [searchDefinition] });

    const body = create.mock.calls[0][0];
    expect(body.tools).toEqual([
      {
        type: 'function',
        function: {
          name: 'search_course_content',
          description: 'Search course materials',
          parameters: searchDefinition.input_schema,
        },
      },
    ]);
    expect(body.tool_choice).toBe('auto');
    expect(toOpenAITools([searchDefinition])).toEqual(body.tools);
  });

  it('runs one tool round and asks for the final answer without tools', async () => {
    const { client, create } = createFakeChatClient();
    const call = { id: 'call_1', name: 'search_course_content', args: '{"query":"knob"}' };
    create
      .mockResolvedValueOnce(toolCallCompletion([call]))
      .mockResolvedValueOnce(textCompletion('The knob changes state.'));
    const { dispatcher, dispatch } = fakeDispatcher(async () => ({ content: '[Intro] knob text', sources: [] }));
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    const answer = await orchestrator.generateResponse({
      query: 'What does the knob do?',
      tools: [searchDefinition],
      dispatcher,
    });

    expect(answer).toBe('The knob changes state.');
    expect(dispatch).toHaveBeenCalledWith('search_course_content', { query: 'knob' });
    expect(create).toHaveBeenCalledTimes(2);
    const followUp = create.mock.calls[1][0];
    expect('tools' in followUp).toBe(false);
    expect('tool_choice' in followUp).toBe(false);
    expect(followUp.messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'What does the knob do?' },
      { role: 'assistant', content: null, tool_calls: [toolCall(call)] },
      { role: 'tool', tool_call_id: 'call_1', content: '[Intro] knob text' },
    ]);
  });

  it('dispatches every requested call in order', async () => {
    const { client, create } = createFakeChatClient();
    create
      .mockResolvedValueOnce(
        toolCallCompletion([
          { id: 'call_a', name: 'get_course_outline', args: '{"course_name":"Widgets"}' },
          { id: 'call_b', name: 'search_course_content', args: '' },
        ]),
      )
      .mockResolvedValueOnce(textCompletion('Done.'));
    const { dispatcher, dispatch } = fakeDispatcher();
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    await orchestrator.generateResponse({ query: 'q', tools: [searchDefinition], dispatcher });

    expect(dispatch.mock.calls).toEqual([
      ['get_course_outline', { course_name: 'Widgets' }],
      ['search_course_content', {}],
    ]);
    expect(create.mock.calls[1][0].messages.slice(3)).toEqual([
      { role: 'tool', tool_call_id: 'call_a', content: 'get_course_outline result' },
      { role: 'tool', tool_call_id: 'call_b', content: 'search_course_content result' },
    ]);
  });

  it('treats a tool request without a dispatcher as a direct answer', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(
      toolCallCompletion([{ id: 'call_1', name: 'search_course_content', args: '{}' }], 'Let me check.'),
    );
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    expect(await orchestrator.generateResponse({ query: 'q', tools: [searchDefinition] })).toBe('Let me check.');
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('returns an empty answer when the model sends no text', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(textCompletion(null));
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    expect(await orchestrator.generateResponse({ query: 'q' })).toBe('');
  });

  it('fails the turn on malformed tool arguments', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(toolCallCompletion([{ id: 'call_1', name: 'search_course_content', args: '{oops' }]));
    const { dispatcher, dispatch } = fakeDispatcher();
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    const pending = orchestrator.generateResponse({ query: 'q', tools: [searchDefinition], dispatcher });

    await expect(pending).rejects.toBeInstanceOf(ToolCallParseError);
    await expect(pending).rejects.toThrow("Malformed arguments for tool 'search_course_content'");
    expect(dispatch).not.toHaveBeenCalled();
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('fails the turn when tool arguments are not an object', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(toolCallCompletion([{ id: 'call_1', name: 'search_course_content', args: '[1]' }]));
    const { dispatcher } = fakeDispatcher();
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    await expect(orchestrator.generateResponse({ query: 'q', dispatcher })).rejects.toThrow(
      "Arguments for tool 'search_course_content' must be a JSON object",
    );
  });

  it('propagates tool exceptions and transport errors', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce(toolCallCompletion([{ id: 'call_1', name: 'search_course_content', args: '{}' }]));
    const { dispatcher } = fakeDispatcher(async () => {
      throw new Error('tool crashed');
    });
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    await expect(orchestrator.generateResponse({ query: 'q', dispatcher })).rejects.toThrow('tool crashed');

    create.mockRejectedValueOnce(new Error('503 Service Unavailable'));
    await expect(orchestrator.generateResponse({ query: 'q' })).rejects.toThrow('503 Service Unavailable');
  });

  it('rejects a response without choices', async () => {
    const { client, create } = createFakeChatClient();
    create.mockResolvedValueOnce({ ...textCompletion('x'), choices: [] });
    const orchestrator = new ConversationOrchestrator(client, { model: 'test-model' });

    await expect(orchestrator.generateResponse({ query: 'q' })).rejects.toThrow('Chat completion returned no choices');
  });
});
