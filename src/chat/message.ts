import {randomUUID} from 'node:crypto'
import type {AssistantMessage, ChatMessage, ChatRole, MessagePart, ToolCall, ToolMessage} from './types.js'

export const NO_DATA_SENTINEL = 'no data'

export type MessageBody = string | MessagePart[]

export type RetaggableRole = Exclude<ChatRole, 'tool'>

function bodyFields(body?: MessageBody): {content?: string; parts?: MessagePart[]} {
  if (body === undefined) return {}
  return typeof body === 'string' ? {content: body} : {parts: [...body]}
}

export function newMessageId(): string {
  return randomUUID()
}

export function createMessage(role: RetaggableRole, body?: MessageBody, id = newMessageId()): ChatMessage {
  return {id, role, ...bodyFields(body)}
}

export function createAssistantMessage(options: {
  id?: string
  content?: string
  toolCalls?: ToolCall[]
  tokens?: number
}): AssistantMessage {
  const message: AssistantMessage = {id: options.id ?? newMessageId(), role: 'assistant'}
  if (options.content !== undefined) message.content = options.content
  if (options.toolCalls && options.toolCalls.length > 0) message.toolCalls = options.toolCalls
  if (options.tokens !== undefined) message.tokens = options.tokens
  return message
}

export function createToolMessage(options: {
  id?: string
  toolCallId: string
  content: string | null
  succeeded: boolean
  name?: string
}): ToolMessage {
  const message: ToolMessage = {
    id: options.id ?? newMessageId(),
    role: 'tool',
    content: options.content ?? NO_DATA_SENTINEL,
    toolCallId: options.toolCallId,
    toolInvocationSucceeded: options.succeeded
  }
  if (options.name) message.name = options.name
  return message
}

/** Replaces the body of a message; content and parts are mutually exclusive. */
export function setMessageBody(message: ChatMessage, body: MessageBody): void {
  if (typeof body === 'string') {
    message.content = body
    delete message.parts
    return
  }

  message.parts = [...body]
  delete message.content
}

/**
 * Builds a copy of `message` under a different role. Role-specific fields
 * (tool calls, tool result linkage) do not survive the change.
 */
export function retagMessage(message: ChatMessage, role: RetaggableRole): ChatMessage {
  const next: ChatMessage =
    role === 'assistant' && message.role === 'assistant' && message.toolCalls
      ? {id: message.id, role, toolCalls: message.toolCalls}
      : {id: message.id, role}
  if (message.content !== undefined) next.content = message.content
  if (message.parts !== undefined) next.parts = message.parts
  if (message.tokens !== undefined) next.tokens = message.tokens
  if (message.name !== undefined) next.name = message.name
  return next
}

export function messageText(message: ChatMessage): string {
  if (message.content !== undefined) return message.content
  if (!message.parts) return ''
  return message.parts
    .map((part) => (part.type === 'text' ? part.text : ''))
    .join('')
}
