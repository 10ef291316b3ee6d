// src/services/conversation.ts
// What: Runs one user turn against the chat-completions API with at most one round of tool calls.
// How: Two states. "direct": the first response is final. "tool-augmented": the first response asked for tools;
//      every call is dispatched in order, its output appended as a `tool` message, and exactly one follow-up request
//      is sent without any tool schema, so the model cannot ask for tools again. Transport errors, malformed tool
//      arguments and exceptions thrown by tools all propagate to the caller.

import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { ToolCallParseError } from '../errors.js';
import logger from '../logging.js';
import type { ToolDefinition } from '../models/types.js';
import type { ToolDispatcher } from './toolRegistry.js';

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export const SYSTEM_PROMPT = `You are an AI assistant specialized in course materials and educational content, with tools for looking up course information.

Available Tools:
1. **Content Search Tool**: finds specific course content and detailed educational material
2. **Course Outline Tool**: returns a course's title, link, instructor and the full list of lessons with their numbers and titles

Tool Usage:
- Questions about a course's structure or lesson list: use the course outline tool
- Questions about specific course content: use the content search tool
- **One tool call per query maximum**
- Build accurate, fact-based answers from the tool output
- If a tool returns nothing useful, say so plainly without offering alternatives

Response Protocol:
- General knowledge questions: answer from your own knowledge without tools
- No meta-commentary: give the answer only, without describing your reasoning, the tools, or the type of question

Every answer must be:
1. **Brief, Concise and focused**
2. **Educational**
3. **Clear**
4. **Example-supported** when an example helps understanding
Provide only the direct answer to what was asked.`;

export interface ConversationOptions {
  model: string;
  maxTokens?: number;
}

export interface GenerateRequest {
  query: string;
  history?: string | null;
  tools?: ToolDefinition[];
  dispatcher?: ToolDispatcher;
}

type TurnState =
  | { kind: 'direct'; message: ChatCompletionMessage }
  | {
      kind: 'tool-augmented';
      message: ChatCompletionMessage;
      toolCalls: ChatCompletionMessageToolCall[];
      dispatcher: ToolDispatcher;
    };

export function toOpenAITools(defs: ToolDefinition[]): ChatCompletionTool[] {
  return defs.map((d) => ({
    type: 'function',
    function: { name: d.name, description: d.description, parameters: d.input_schema },
  }));
}

function isJsonObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function parseToolArguments(call: ChatCompletionMessageToolCall): Record<string, unknown> {
  const name = call.function.name;
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.function.arguments.trim() === '' ? '{}' : call.function.arguments);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ToolCallParseError(name, `Malformed arguments for tool '${name}': ${reason}`, { cause: err });
  }
  if (!isJsonObject(parsed)) {
    throw new ToolCallParseError(name, `Arguments for tool '${name}' must be a JSON object`);
  }
  return parsed;
}

function firstChoice(response: ChatCompletion): ChatCompletion.Choice {
  const choice = response.choices[0];
  if (!choice) throw new Error('Chat completion returned no choices');
  return choice;
}

function classify(choice: ChatCompletion.Choice, dispatcher: ToolDispatcher | undefined): TurnState {
  const toolCalls = choice.message.tool_calls ?? [];
  if (choice.finish_reason === 'tool_calls' && dispatcher && toolCalls.length > 0) {
    return { kind: 'tool-augmented', message: choice.message, toolCalls, dispatcher };
  }
  return { kind: 'direct', message: choice.message };
}

export class ConversationOrchestrator {
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(
    private readonly client: ChatCompletionsClient,
    opts: ConversationOptions,
  ) {
    this.model = opts.model;
    this.maxTokens = opts.maxTokens ?? 800;
  }

  baseParams(): Pick<ChatCompletionCreateParamsNonStreaming, 'model' | 'temperature' | 'max_tokens'> {
    return { model: this.model, temperature: 0, max_tokens: this.maxTokens };
  }

  async generateResponse(req: GenerateRequest): Promise<string> {
    const system = req.history ? `${SYSTEM_PROMPT}\n\nPrevious conversation:\n${req.history}` : SYSTEM_PROMPT;
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: system },
      { role: 'user', content: req.query },
    ];

    const params: ChatCompletionCreateParamsNonStreaming = { ...this.baseParams(), messages };
    if (req.tools && req.tools.length > 0) {
      params.tools = toOpenAITools(req.tools);
      params.tool_choice = 'auto';
    }

    const response = await this.client.chat.completions.create(params);
    const state = classify(firstChoice(response), req.dispatcher);

    switch (state.kind) {
      case 'direct':
        return state.message.content ?? '';
      case 'tool-augmented':
        return this.completeWithTools(messages, state);
    }
  }

  private async completeWithTools(
    messages: ChatCompletionMessageParam[],
    state: Extract<TurnState, { kind: 'tool-augmented' }>,
  ): Promise<string> {
    const transcript: ChatCompletionMessageParam[] = [
      ...messages,
      { role: 'assistant', content: state.message.content, tool_calls: state.toolCalls },
    ];

    for (const call of state.toolCalls) {
      const args = parseToolArguments(call);
      const result = await state.dispatcher.dispatch(call.function.name, args);
      transcript.push({ role: 'tool', tool_call_id: call.id, content: result.content });
    }
    logger.debug({ tool_calls: state.toolCalls.length }, 'Tool round complete; requesting final answer');

    // No tools on the follow-up: one round trip at most.
    const followUp = await this.client.chat.completions.create({ ...this.baseParams(), messages: transcript });
    return firstChoice(followUp).message.content ?? '';
  }
}
