import {randomUUID} from 'node:crypto'
import type {EventBus} from '../core/event-bus.js'
import {err, ok, toTransportError, TransportError, TurnInProgressError, type SafeResult} from '../core/errors.js'
import type {ChatTransport} from '../providers/types.js'
import {ConversationStore, type MessageRef} from './conversation-store.js'
import type {ConversationEvent, TurnEndState} from './events.js'
import {
  createMessage,
  createToolMessage,
  type MessageBody,
  type RetaggableRole
} from './message.js'
import {StreamNormalizer, type NormalizedEvent, type RawChunkSource} from './stream-normalizer.js'
import {ToolExecutionCoordinator, type AfterToolsCallHook} from './tool-execution.js'
import {TurnDispatcher} from './turn-dispatcher.js'
import type {
  ChatMessage,
  ChatRequest,
  ChatRichResponse,
  ChatStreamHooks,
  FunctionCallHandler,
  RawChatResult,
  ToolDefinition
} from './types.js'

export type ConversationOptions = {
  transport: ChatTransport
  model?: string
  tools?: ToolDefinition[]
  /** Engine-internal pseudo-tools that are never forwarded to a handler. */
  knownFunctionNames?: Iterable<string>
  requestDefaults?: Pick<ChatRequest, 'temperature' | 'maxTokens'>
  bus?: EventBus<ConversationEvent>
  id?: string
}

type TurnRequest = {
  hooks: ChatStreamHooks
  open: (request: ChatRequest) => RawChunkSource | Promise<RawChunkSource>
}

const EMPTY_RESPONSE: ChatRichResponse = {result: null, blocks: null}

async function* once(result: RawChatResult | null): RawChunkSource {
  yield result
}

/** Re-raises anything thrown while pulling from the transport as a TransportError. */
async function* guardTransport(source: RawChunkSource): RawChunkSource {
  const iterator = source[Symbol.asyncIterator]()
  let finished = false
  try {
    while (true) {
      let next: IteratorResult<RawChatResult | null | undefined>
      try {
        next = await iterator.next()
      } catch (error) {
        finished = true
        throw toTransportError(error)
      }

      if (next.done) {
        finished = true
        return
      }
      yield next.value
    }
  } finally {
    if (!finished) await iterator.return?.()
  }
}

/**
 * A conversation with one backend: history plus the turn engine that streams
 * replies into it and resolves tool calls.
 *
 * One turn at a time. Starting a second turn while one is in flight fails
 * with `TurnInProgressError`.
 */
export class Conversation {
  readonly id: string
  readonly store = new ConversationStore()
  model?: string
  tools: ToolDefinition[]

  /** Called after every resolved tool round, after the call-site hook. */
  onAfterToolsCall?: AfterToolsCallHook

  private recentResult: RawChatResult | null = null
  private turnActive = false
  private readonly transport: ChatTransport
  private readonly coordinator: ToolExecutionCoordinator
  private readonly requestDefaults: Pick<ChatRequest, 'temperature' | 'maxTokens'>
  private readonly bus?: EventBus<ConversationEvent>

  constructor(options: ConversationOptions) {
    this.id = options.id ?? randomUUID()
    this.transport = options.transport
    this.model = options.model
    this.tools = options.tools ?? []
    this.requestDefaults = options.requestDefaults ?? {}
    this.bus = options.bus
    this.coordinator = new ToolExecutionCoordinator(this.store, {knownFunctionNames: options.knownFunctionNames})
  }

  get messages(): readonly ChatMessage[] {
    return this.store.messages
  }

  /** The raw result of the latest request; overwritten by every turn. */
  get mostRecentApiResult(): RawChatResult | null {
    return this.recentResult
  }

  appendMessage(message: ChatMessage, position?: number): this {
    this.store.append(message, position)
    this.publish({type: 'message', conversationId: this.id, message})
    return this
  }

  appendUserInput(body: MessageBody, options: {id?: string; name?: string} = {}): this {
    const message = createMessage('user', body, options.id)
    if (options.name) message.name = options.name
    return this.appendMessage(message)
  }

  appendSystemMessage(body: MessageBody, id?: string): this {
    return this.appendMessage(createMessage('system', body, id))
  }

  prependSystemMessage(body: MessageBody, id?: string): this {
    return this.appendMessage(createMessage('system', body, id), 0)
  }

  appendExampleChatbotOutput(body: MessageBody, id?: string): this {
    return this.appendMessage(createMessage('assistant', body, id))
  }

  appendFunctionMessage(functionName: string, content: string): this {
    return this.appendMessage(
      createToolMessage({toolCallId: functionName, content, succeeded: true, name: functionName})
    )
  }

  removeMessage(ref: MessageRef): boolean {
    return this.store.remove(ref)
  }

  editMessageContent(ref: MessageRef, body: MessageBody): boolean {
    return this.store.editContent(ref, body)
  }

  editMessageRole(ref: MessageRef, role: RetaggableRole): boolean {
    return this.store.editRole(ref, role)
  }

  /**
   * Streams one turn, reporting it through `hooks`. A turn that requests
   * tools ends once they are resolved; call again to continue.
   */
  async streamResponseRich(hooks: ChatStreamHooks = {}): Promise<ChatRichResponse> {
    return this.drain({hooks, open: (request) => this.transport.stream(request)})
  }

  async streamResponseRichSafe(hooks: ChatStreamHooks = {}): Promise<SafeResult<ChatRichResponse>> {
    return this.safely(() => this.streamResponseRich(hooks))
  }

  async getResponseRich(handler?: FunctionCallHandler): Promise<ChatRichResponse> {
    return this.drain({
      hooks: handler ? {onToolCalls: handler} : {},
      open: async (request) => once(await this.transport.complete(request))
    })
  }

  async getResponseRichSafe(handler?: FunctionCallHandler): Promise<SafeResult<ChatRichResponse>> {
    return this.safely(() => this.getResponseRich(handler))
  }

  /** Plain text of the reply, or null when the backend returned nothing usable. */
  async getResponse(): Promise<string | null> {
    const response = await this.getResponseRich()
    const text = (response.blocks ?? [])
      .map((block) => (block.type === 'message' ? block.message : ''))
      .join('')
    return text || null
  }

  /** Yields reply tokens as they arrive; the reply is appended to history when the stream ends. */
  async *streamResponse(messageId?: string): AsyncGenerator<string, ChatRichResponse, undefined> {
    const turn = this.turn({hooks: {messageId}, open: (request) => this.transport.stream(request)})
    let completed = false
    try {
      while (true) {
        const step = await turn.next()
        if (step.done) {
          completed = true
          return step.value
        }
        if (step.value.type === 'token') yield step.value.text
      }
    } finally {
      // consumer stopped early: close the turn so history and the turn lock are released
      if (!completed) await turn.return(EMPTY_RESPONSE)
    }
  }

  private async drain(request: TurnRequest): Promise<ChatRichResponse> {
    const turn = this.turn(request)
    while (true) {
      const step = await turn.next()
      if (step.done) return step.value
    }
  }

  private async *turn({hooks, open}: TurnRequest): AsyncGenerator<NormalizedEvent, ChatRichResponse, undefined> {
    if (this.turnActive) throw new TurnInProgressError()
    this.turnActive = true

    const startSize = this.store.size
    // stays 'cancelled' when the consumer stops pulling before the turn completes
    let state: TurnEndState = 'cancelled'

    try {
      const request = await this.buildRequest(hooks)
      this.publish({
        type: 'turn_start',
        conversationId: this.id,
        provider: this.transport.name,
        model: request.model,
        messageCount: request.messages.length
      })

      let source: RawChunkSource
      try {
        source = await open(request)
      } catch (error) {
        throw toTransportError(error)
      }

      const normalizer = new StreamNormalizer(this.store, {messageId: hooks.messageId})
      const dispatcher = new TurnDispatcher({
        store: this.store,
        coordinator: this.coordinator,
        hooks,
        nextMessageId: () => normalizer.takeMessageId(),
        afterToolsCall: this.onAfterToolsCall
      })

      for await (const event of normalizer.normalize(guardTransport(source))) {
        if (event.type === 'usage') this.publish({type: 'usage', conversationId: this.id, usage: event.usage})
        await dispatcher.dispatch(event)
        yield event
        if (dispatcher.settled) break
      }

      if (normalizer.lastResult) this.recentResult = normalizer.lastResult
      const response = dispatcher.finish(normalizer.lastResult)
      const resolved = dispatcher.resolved
      if (resolved) {
        this.publish({
          type: 'tool_calls',
          conversationId: this.id,
          calls: resolved.toolResults.map((entry) => entry.call)
        })
      }
      state = dispatcher.state
      return response
    } catch (error) {
      state = 'failed'
      throw error
    } finally {
      const appended = this.store.messages.slice(startSize)
      for (const message of appended) {
        this.publish({type: 'message', conversationId: this.id, message})
      }
      this.publish({type: 'turn_end', conversationId: this.id, state, appended: appended.length})
      this.turnActive = false
    }
  }

  private async buildRequest(hooks: ChatStreamHooks): Promise<ChatRequest> {
    const request: ChatRequest = {
      ...this.requestDefaults,
      model: this.model,
      messages: [...this.store.messages],
      ...(this.tools.length > 0 ? {tools: this.tools} : {})
    }
    return hooks.onOutboundRequest ? hooks.onOutboundRequest(request) : request
  }

  private async safely(run: () => Promise<ChatRichResponse>): Promise<SafeResult<ChatRichResponse>> {
    try {
      return ok(await run())
    } catch (error) {
      if (error instanceof TransportError) return err(error)
      throw error
    }
  }

  private publish(event: ConversationEvent): void {
    this.bus?.publish(event)
  }
}
