import type {ConversationStore} from './conversation-store.js'
import {createAssistantMessage, newMessageId} from './message.js'
import {ToolCallAccumulator} from './tool-call-accumulator.js'
import type {
  ChatRole,
  RawChatResult,
  RawChoice,
  RawToolCallDelta,
  ToolCall,
  Usage,
  VendorExtensions
} from './types.js'

export type NormalizedEvent =
  | {type: 'role'; role: ChatRole}
  | {type: 'token'; text: string}
  | {type: 'usage'; usage: Usage}
  | {type: 'vendor-features'; extensions: VendorExtensions}
  | {type: 'tool-calls'; calls: ToolCall[]; content?: string}

export type RawChunkSource = AsyncIterable<RawChatResult | null | undefined>

type StreamNormalizerOptions = {
  /** Id of the first message appended during the turn. */
  messageId?: string
}

/**
 * Turns a provider's raw chunk sequence into canonical turn events.
 *
 * Events come out in chunk arrival order, with one exception: a batch sealed
 * by a finish reason is held until the next chunk, so that a trailing
 * usage-only chunk is reported before the batch. Vendor control chunks
 * (`internalKind`) are applied to the store here and never surface.
 * Reading stops as soon as the consumer stops pulling.
 */
export class StreamNormalizer {
  private readonly accumulator = new ToolCallAccumulator()
  private currentMessageId: string
  private roleSettled = false
  private firstToken = true
  private resolvedRole: ChatRole | undefined
  private result: RawChatResult | null = null

  constructor(
    private readonly store: ConversationStore,
    options: StreamNormalizerOptions = {}
  ) {
    this.currentMessageId = options.messageId ?? newMessageId()
  }

  get lastResult(): RawChatResult | null {
    return this.result
  }

  get role(): ChatRole | undefined {
    return this.resolvedRole
  }

  takeMessageId(): string {
    const id = this.currentMessageId
    this.currentMessageId = newMessageId()
    return id
  }

  async *normalize(source: RawChunkSource): AsyncGenerator<NormalizedEvent, void, undefined> {
    let held: NormalizedEvent | undefined
    for await (const chunk of source) {
      if (!chunk) break

      if (held && !endsStream(chunk)) {
        const batch = held
        held = undefined
        yield batch
      }

      if (chunk.internalKind) {
        this.absorbInternal(chunk)
        continue
      }

      this.result = chunk
      const choices = chunk.choices ?? []
      if (choices.length === 0) {
        if (chunk.vendorExtensions) {
          yield {type: 'vendor-features', extensions: chunk.vendorExtensions}
          continue
        }

        // trailing usage-only chunk, then nothing more to read
        if (chunk.usage) yield {type: 'usage', usage: chunk.usage}
        break
      }

      let seal = false
      let toolContent: string | undefined
      for (const choice of choices) {
        const outcome = yield* this.normalizeChoice(choice)
        if (outcome.seal) seal = true
        if (outcome.toolContent !== undefined) toolContent = outcome.toolContent
      }

      if (chunk.usage) yield {type: 'usage', usage: chunk.usage}

      if (seal && this.accumulator.size > 0) {
        held = toolCallsEvent(this.accumulator.seal(), toolContent)
      }
    }

    if (held) yield held
    if (this.accumulator.size > 0) {
      yield toolCallsEvent(this.accumulator.seal())
    }
  }

  private async *normalizeChoice(
    choice: RawChoice
  ): AsyncGenerator<NormalizedEvent, {seal: boolean; toolContent?: string}, undefined> {
    const delta = choice.delta ?? choice.message
    const finishing = choice.finishReason !== undefined && choice.finishReason !== null
    if (!delta) return {seal: finishing}

    if (!this.roleSettled && delta.role) {
      this.roleSettled = true
      this.resolvedRole = delta.role
      yield {type: 'role', role: delta.role}
    }

    delta.toolCalls?.forEach((fragment, position) => {
      this.accumulator.feed(fragment.index ?? position, fragment)
    })

    const role = delta.role ?? this.resolvedRole
    const text = choice.delta?.content ?? choice.message?.content
    if (role === 'tool') {
      return {seal: true, toolContent: text ?? undefined}
    }

    if (text) {
      const token = this.firstToken ? text.trimStart() : text
      if (token) {
        this.firstToken = false
        // a role arriving after content no longer counts as the turn's role
        this.roleSettled = true
        yield {type: 'token', text: token}
      }
    }

    return {seal: finishing}
  }

  private absorbInternal(chunk: RawChatResult): void {
    if (chunk.internalKind !== 'append-assistant-message') return

    const delta = chunk.choices?.find((choice) => choice.delta)?.delta
    if (!delta) return

    const message = createAssistantMessage({
      id: this.takeMessageId(),
      content: delta.content ?? undefined,
      toolCalls: delta.toolCalls?.map(toToolCall),
      tokens: chunk.usage?.completionTokens
    })
    if (message.content === undefined && delta.parts) message.parts = delta.parts

    const lastUser = this.store.lastOfRole('user')
    if (lastUser && chunk.usage) lastUser.tokens = chunk.usage.promptTokens

    this.store.append(message)
  }
}

/** A choice-less chunk without vendor extensions is the last one read. */
function endsStream(chunk: RawChatResult): boolean {
  return !chunk.internalKind && (chunk.choices ?? []).length === 0 && !chunk.vendorExtensions
}

function toolCallsEvent(calls: ToolCall[], content?: string): NormalizedEvent {
  return content ? {type: 'tool-calls', calls, content} : {type: 'tool-calls', calls}
}

function toToolCall(fragment: RawToolCallDelta): ToolCall {
  const call: ToolCall = {functionName: fragment.functionName ?? '', arguments: fragment.arguments ?? ''}
  if (fragment.id) call.id = fragment.id
  return call
}
