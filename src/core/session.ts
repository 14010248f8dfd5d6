import {Conversation} from '../chat/conversation.js'
import type {ConversationEvent} from '../chat/events.js'
import type {ChatRichResponse, ChatRichResponseBlock, ChatStreamHooks} from '../chat/types.js'
import {nonEmpty} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import {MockTransport} from '../providers/mock-provider.js'
import {OpenAITransport} from '../providers/openai-provider.js'
import type {ChatTransport} from '../providers/types.js'
import {builtinTools, createToolHandler} from '../tools/registry.js'
import {ConfigError} from './errors.js'
import type {EventBus} from './event-bus.js'

const DEFAULT_MODEL = 'gpt-4o-mini'

const DEFAULT_SYSTEM_PROMPT = [
  'You are a helpful assistant working inside the user workspace.',
  'Use the available tools to inspect files or run commands when the answer depends on them.',
  'Answer concisely.'
].join(' ')

export function resolveModel(config: AppConfig): string {
  return nonEmpty(config.model) ?? DEFAULT_MODEL
}

export function createTransport(config: AppConfig): ChatTransport {
  if (config.provider === 'mock') return new MockTransport()

  const apiKey = nonEmpty(process.env.OPENAI_API_KEY)
  if (!apiKey) {
    throw new ConfigError('OPENAI_API_KEY is missing. Set it in your environment or .env file.')
  }

  return new OpenAITransport({
    apiKey,
    model: resolveModel(config),
    baseUrl: config.baseURL,
    timeoutMs: config.runtime.requestTimeoutMs
  })
}

type SessionOptions = {
  bus?: EventBus<ConversationEvent>
  transport?: ChatTransport
}

/** A conversation wired to the configured backend, built-in tools and system prompt. */
export function createConversation(config: AppConfig, options: SessionOptions = {}): Conversation {
  const conversation = new Conversation({
    transport: options.transport ?? createTransport(config),
    model: resolveModel(config),
    tools: builtinTools,
    knownFunctionNames: config.knownFunctionNames,
    bus: options.bus
  })
  conversation.appendSystemMessage(config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT)
  return conversation
}

export type ToolLoopOptions = {
  hooks?: Omit<ChatStreamHooks, 'onToolCalls'>
  workspace: string
  maxToolRounds: number
  approveShell?: (command: string) => Promise<boolean> | boolean
  onRound?: (round: number, response: ChatRichResponse) => void
}

export type ToolLoopResult = {
  text: string
  rounds: number
  /** True when the loop stopped because the round limit was hit. */
  exhausted: boolean
}

function resolvedTools(blocks: ChatRichResponseBlock[] | null): boolean {
  return (blocks ?? []).some((block) => block.type === 'function' && block.result !== undefined)
}

function replyText(blocks: ChatRichResponseBlock[] | null): string {
  return (blocks ?? []).map((block) => (block.type === 'message' ? block.message : '')).join('')
}

/**
 * Streams turns until the model answers without requesting tools, feeding
 * built-in tool results back in between.
 */
export async function runToolLoop(conversation: Conversation, options: ToolLoopOptions): Promise<ToolLoopResult> {
  const onToolCalls = createToolHandler({workspace: options.workspace, approveShell: options.approveShell})
  let text = ''

  for (let round = 1; round <= options.maxToolRounds; round++) {
    const response = await conversation.streamResponseRich({...options.hooks, onToolCalls})
    options.onRound?.(round, response)
    text = replyText(response.blocks)
    if (!resolvedTools(response.blocks)) return {text, rounds: round, exhausted: false}
  }

  return {text, rounds: options.maxToolRounds, exhausted: true}
}
