import type {ConversationStore} from './conversation-store.js'
import {createAssistantMessage, createToolMessage} from './message.js'
import type {
  ChatRichResponseBlock,
  ChatStreamHooks,
  FunctionCall,
  FunctionCallHandler,
  FunctionResult,
  ResolvedToolCall,
  ResolvedToolsCall,
  ToolCall,
  Usage
} from './types.js'

export type AfterToolsCallHook = (resolved: ResolvedToolsCall) => Promise<void> | void

export type ToolTurn = {
  calls: ToolCall[]
  /** Assistant text produced earlier in the same turn. */
  content?: string
  usage?: Usage
  nextMessageId: () => string
}

export type ToolTurnOutcome = {
  resolved: ResolvedToolsCall
  blocks: ChatRichResponseBlock[]
}

/** Hooks with a tool handler registered; only such a turn commits tool rounds. */
export type ToolResolvingHooks = ChatStreamHooks & {onToolCalls: FunctionCallHandler}

export function hasToolHandler(hooks: ChatStreamHooks): hooks is ToolResolvingHooks {
  return hooks.onToolCalls !== undefined
}

function missingResult(): FunctionResult {
  return {content: null, invocationSucceeded: false}
}

export function toFunctionCall(call: ToolCall): FunctionCall {
  return {name: call.functionName, arguments: call.arguments, toolCall: call}
}

export class ToolExecutionCoordinator {
  private readonly knownFunctionNames: ReadonlySet<string>

  constructor(
    private readonly store: ConversationStore,
    options: {knownFunctionNames?: Iterable<string>} = {}
  ) {
    this.knownFunctionNames = new Set(options.knownFunctionNames ?? [])
  }

  /** Splits a sealed batch into calls for the external handler and engine-internal pseudo-tools. */
  partition(calls: ToolCall[]): {forwarded: ToolCall[]; internal: ToolCall[]} {
    const forwarded: ToolCall[] = []
    const internal: ToolCall[] = []
    for (const call of calls) {
      if (this.knownFunctionNames.has(call.functionName)) {
        internal.push(call)
      } else {
        forwarded.push(call)
      }
    }
    return {forwarded, internal}
  }

  /**
   * Commits one tool round to history. The assistant message goes in before
   * the handler runs; tool results only after it succeeds. Handler errors
   * propagate as-is.
   */
  async resolve(turn: ToolTurn, hooks: ToolResolvingHooks, afterToolsCall?: AfterToolsCallHook): Promise<ToolTurnOutcome> {
    const {forwarded} = this.partition(turn.calls)
    const assistantMessage = createAssistantMessage({
      id: turn.nextMessageId(),
      content: turn.content,
      toolCalls: forwarded,
      tokens: turn.usage?.completionTokens
    })

    const lastUser = this.store.lastOfRole('user')
    if (lastUser && turn.usage) lastUser.tokens = turn.usage.promptTokens
    this.store.append(assistantMessage)

    const calls = forwarded.map(toFunctionCall)
    const resolved: ResolvedToolsCall = {assistantMessage, toolResults: []}
    const results = await hooks.onToolCalls(calls)

    const blocks: ChatRichResponseBlock[] = []
    calls.forEach((call, index) => {
      const result = results[index] ?? missingResult()
      const toolMessage = createToolMessage({
        id: turn.nextMessageId(),
        toolCallId: call.toolCall.id ?? call.name,
        content: result.content,
        succeeded: result.invocationSucceeded
      })
      this.store.append(toolMessage)
      const entry: ResolvedToolCall = {call, result, toolMessage}
      resolved.toolResults.push(entry)
      blocks.push({type: 'function', call, result})
    })

    await hooks.onAfterToolsResolved?.(resolved, hooks)
    await afterToolsCall?.(resolved)

    return {resolved, blocks}
  }
}
