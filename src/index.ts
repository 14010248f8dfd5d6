export {Conversation, type ConversationOptions} from './chat/conversation.js'
export {ConversationStore, type MessageRef} from './chat/conversation-store.js'
export type {ConversationEvent, TurnEndState} from './chat/events.js'
export {FunctionArguments, type ArgumentValue} from './chat/function-arguments.js'
export {
  createAssistantMessage,
  createMessage,
  createToolMessage,
  messageText,
  NO_DATA_SENTINEL,
  type MessageBody,
  type RetaggableRole
} from './chat/message.js'
export {StreamNormalizer, type NormalizedEvent, type RawChunkSource} from './chat/stream-normalizer.js'
export {ToolCallAccumulator} from './chat/tool-call-accumulator.js'
export {ToolExecutionCoordinator, type AfterToolsCallHook} from './chat/tool-execution.js'
export {TurnDispatcher, type TurnState} from './chat/turn-dispatcher.js'
export type * from './chat/types.js'
export {
  ChatweaveError,
  ConfigError,
  err,
  ok,
  TransportError,
  TurnInProgressError,
  type SafeResult
} from './core/errors.js'
export {InMemoryEventBus, type EventBus, type EventHandler} from './core/event-bus.js'
export {MockTransport} from './providers/mock-provider.js'
export {OpenAITransport} from './providers/openai-provider.js'
export type {ChatTransport} from './providers/types.js'
