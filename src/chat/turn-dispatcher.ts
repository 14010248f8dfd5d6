import type {ConversationStore} from './conversation-store.js'
import {createAssistantMessage} from './message.js'
import type {NormalizedEvent} from './stream-normalizer.js'
import {
  hasToolHandler,
  toFunctionCall,
  type AfterToolsCallHook,
  type ToolExecutionCoordinator
} from './tool-execution.js'
import type {
  ChatRichResponse,
  ChatRichResponseBlock,
  ChatStreamHooks,
  RawChatResult,
  ResolvedToolsCall,
  Usage
} from './types.js'

export type TurnState = 'awaiting-role' | 'streaming-content' | 'tool-calls-pending' | 'resolved' | 'done'

type TurnDispatcherOptions = {
  store: ConversationStore
  coordinator: ToolExecutionCoordinator
  hooks: ChatStreamHooks
  nextMessageId: () => string
  afterToolsCall?: AfterToolsCallHook
}

/**
 * Per-turn state machine between the normalizer and the caller's hooks.
 * Hooks run one at a time, in event order.
 */
export class TurnDispatcher {
  private current: TurnState = 'awaiting-role'
  private readonly blocks: ChatRichResponseBlock[] = []
  private text = ''
  private usage: Usage | undefined
  private outcome: ResolvedToolsCall | undefined

  constructor(private readonly options: TurnDispatcherOptions) {}

  get state(): TurnState {
    return this.current
  }

  /** Set once a tool round has been committed. */
  get resolved(): ResolvedToolsCall | undefined {
    return this.outcome
  }

  get settled(): boolean {
    return this.current === 'resolved' || this.current === 'done'
  }

  async dispatch(event: NormalizedEvent): Promise<void> {
    if (this.settled) return
    const {hooks} = this.options

    switch (event.type) {
      case 'role':
        this.current = 'streaming-content'
        await hooks.onRoleResolved?.(event.role)
        return

      case 'token':
        this.current = 'streaming-content'
        this.text += event.text
        await hooks.onToken?.(event.text)
        return

      case 'usage': {
        this.usage = event.usage
        const lastUser = this.options.store.lastOfRole('user')
        if (lastUser) lastUser.tokens = event.usage.promptTokens
        await hooks.onUsage?.(event.usage)
        return
      }

      case 'vendor-features':
        await hooks.onVendorFeatures?.(event.extensions)
        return

      case 'tool-calls': {
        const {coordinator} = this.options
        const {forwarded} = coordinator.partition(event.calls)
        if (forwarded.length === 0) return

        if (!hasToolHandler(hooks)) {
          // nothing can answer the calls: report them, leave history alone and keep reading
          for (const call of forwarded) this.blocks.push({type: 'function', call: toFunctionCall(call)})
          return
        }

        this.current = 'tool-calls-pending'
        const content = this.text || event.content
        if (this.text) this.blocks.push({type: 'message', message: this.text})

        const {resolved, blocks} = await coordinator.resolve(
          {calls: event.calls, content, usage: this.usage, nextMessageId: this.options.nextMessageId},
          hooks,
          this.options.afterToolsCall
        )
        this.blocks.push(...blocks)
        this.outcome = resolved
        this.current = 'resolved'
        return
      }
    }
  }

  /**
   * Closes the turn. A turn that ended without tool calls commits its text as
   * one assistant message.
   */
  finish(result: RawChatResult | null): ChatRichResponse {
    if (this.current !== 'resolved') {
      if (this.text) {
        const message = createAssistantMessage({
          id: this.options.nextMessageId(),
          content: this.text,
          tokens: this.usage?.completionTokens
        })
        this.options.store.append(message)
        this.blocks.push({type: 'message', message: this.text})
      }
      this.current = 'done'
    }

    if (result === null && this.blocks.length === 0) return {result: null, blocks: null}
    return {result, blocks: [...this.blocks]}
  }
}
