import type {TurnState} from './turn-dispatcher.js'
import type {ChatMessage, FunctionCall, Usage} from './types.js'

/** How a turn ended: its final dispatcher state, a thrown error, or the consumer stopping early. */
export type TurnEndState = TurnState | 'failed' | 'cancelled'

export type ConversationEvent =
  | {type: 'turn_start'; conversationId: string; provider: string; model?: string; messageCount: number}
  | {type: 'message'; conversationId: string; message: ChatMessage}
  | {type: 'tool_calls'; conversationId: string; calls: FunctionCall[]}
  | {type: 'usage'; conversationId: string; usage: Usage}
  | {type: 'turn_end'; conversationId: string; state: TurnEndState; appended: number}
