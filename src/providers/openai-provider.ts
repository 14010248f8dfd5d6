import OpenAI from 'openai'
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {messageText} from '../chat/message.js'
import type {
  ChatMessage,
  ChatRequest,
  ChatRole,
  MessagePart,
  RawChatResult,
  RawChoice,
  RawToolCallDelta,
  ToolDefinition,
  Usage
} from '../chat/types.js'
import {toTransportError} from '../core/errors.js'
import type {ChatTransport} from './types.js'

type OpenAITransportOptions = {
  apiKey: string
  model: string
  baseUrl?: string
  timeoutMs?: number
  /** Replaces the global fetch; handy for proxies and tests. */
  fetch?: typeof fetch
}

function toContentParts(parts: MessagePart[]): ChatCompletionContentPart[] {
  return parts.map((part): ChatCompletionContentPart => {
    if (part.type === 'text') return {type: 'text', text: part.text}
    return {type: 'image_url', image_url: {url: part.url, ...(part.detail ? {detail: part.detail} : {})}}
  })
}

export function toWireMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return {role: 'system', content: messageText(message)}
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content ?? (message.parts ? messageText(message) : null),
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id ?? call.functionName,
                type: 'function' as const,
                function: {name: call.functionName, arguments: call.arguments}
              }))
            }
          : {})
      }
    case 'tool':
      return {role: 'tool', content: messageText(message), tool_call_id: message.toolCallId}
    case 'user':
    case 'unknown':
      return {
        role: 'user',
        content: message.parts ? toContentParts(message.parts) : (message.content ?? ''),
        ...(message.name ? {name: message.name} : {})
      }
  }
}

function toWireTools(tools: ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {name: tool.name, description: tool.description, parameters: tool.inputSchema}
  }))
}

function toRole(role: string | null | undefined): ChatRole | undefined {
  switch (role) {
    case 'system':
    case 'developer':
      return 'system'
    case 'user':
    case 'assistant':
    case 'tool':
      return role
    case undefined:
    case null:
      return undefined
    default:
      return 'unknown'
  }
}

function toUsage(usage: ChatCompletion['usage'] | null | undefined): Usage | undefined {
  if (!usage) return undefined
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens
  }
}

export function fromChunk(chunk: ChatCompletionChunk): RawChatResult {
  const choices = chunk.choices.map((choice): RawChoice => {
    const toolCalls = choice.delta.tool_calls?.map(
      (call): RawToolCallDelta => ({
        index: call.index,
        id: call.id,
        functionName: call.function?.name,
        arguments: call.function?.arguments
      })
    )
    return {
      index: choice.index,
      delta: {
        role: toRole(choice.delta.role),
        content: choice.delta.content,
        ...(toolCalls ? {toolCalls} : {})
      },
      finishReason: choice.finish_reason
    }
  })

  const usage = toUsage(chunk.usage)
  return {
    id: chunk.id,
    object: chunk.object,
    model: chunk.model,
    choices,
    ...(usage ? {usage} : {})
  }
}

export function fromCompletion(completion: ChatCompletion): RawChatResult {
  const choices = completion.choices.map((choice): RawChoice => {
    const toolCalls: RawToolCallDelta[] = []
    choice.message.tool_calls?.forEach((call, index) => {
      if (call.type !== 'function') return
      toolCalls.push({index, id: call.id, functionName: call.function.name, arguments: call.function.arguments})
    })
    return {
      index: choice.index,
      message: {
        role: toRole(choice.message.role),
        content: choice.message.content,
        ...(toolCalls.length > 0 ? {toolCalls} : {})
      },
      finishReason: choice.finish_reason
    }
  })

  const usage = toUsage(completion.usage)
  return {
    id: completion.id,
    object: completion.object,
    model: completion.model,
    choices,
    ...(usage ? {usage} : {})
  }
}

export class OpenAITransport implements ChatTransport {
  readonly name = 'openai'
  private readonly client: OpenAI
  private readonly model: string

  constructor(options: OpenAITransportOptions) {
    this.model = options.model
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    const baseURL = rawBaseUrl.replace(/\/+$/, '')
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      timeout: options.timeoutMs ?? 45_000,
      // retries are the caller's decision, never the transport's
      maxRetries: 0,
      ...(options.fetch ? {fetch: options.fetch} : {})
    })
  }

  private baseParams(request: ChatRequest) {
    const tools = request.tools ?? []
    return {
      model: request.model ?? this.model,
      messages: request.messages.map(toWireMessage),
      ...(request.temperature !== undefined ? {temperature: request.temperature} : {}),
      ...(request.maxTokens !== undefined ? {max_tokens: request.maxTokens} : {}),
      ...(tools.length > 0 ? {tools: toWireTools(tools), tool_choice: 'auto' as const} : {})
    }
  }

  async complete(request: ChatRequest): Promise<RawChatResult | null> {
    const params: ChatCompletionCreateParamsNonStreaming = this.baseParams(request)
    try {
      const completion = await this.client.chat.completions.create(params, {signal: request.signal})
      return fromCompletion(completion)
    } catch (error) {
      throw toTransportError(error, `${this.name} request failed`)
    }
  }

  async *stream(request: ChatRequest): AsyncGenerator<RawChatResult, void, undefined> {
    const params: ChatCompletionCreateParamsStreaming = {
      ...this.baseParams(request),
      stream: true,
      stream_options: {include_usage: true}
    }

    let chunks: AsyncIterable<ChatCompletionChunk>
    try {
      chunks = await this.client.chat.completions.create(params, {signal: request.signal})
    } catch (error) {
      throw toTransportError(error, `${this.name} request failed`)
    }

    try {
      for await (const chunk of chunks) {
        yield fromChunk(chunk)
      }
    } catch (error) {
      throw toTransportError(error, `${this.name} stream failed`)
    }
  }
}
