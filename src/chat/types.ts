export type ChatRole = 'system' | 'user' | 'assistant' | 'tool' | 'unknown'

export type MessagePart =
  | {type: 'text'; text: string}
  | {type: 'image'; url: string; detail?: 'auto' | 'low' | 'high'}

export type ToolCall = {
  /** Provider-assigned call id. Some backends never send one. */
  id?: string
  functionName: string
  arguments: string
}

type MessageBase = {
  id: string
  content?: string
  parts?: MessagePart[]
  /** Token consumption, attached once usage is known. */
  tokens?: number
  name?: string
}

export type SystemMessage = MessageBase & {role: 'system'}
export type UserMessage = MessageBase & {role: 'user'}
export type UnknownMessage = MessageBase & {role: 'unknown'}

export type AssistantMessage = MessageBase & {
  role: 'assistant'
  toolCalls?: ToolCall[]
}

export type ToolMessage = MessageBase & {
  role: 'tool'
  toolCallId: string
  toolInvocationSucceeded: boolean
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage | UnknownMessage

export type ToolDefinition = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

export type FunctionCall = {
  name: string
  arguments: string
  toolCall: ToolCall
}

export type FunctionResult = {
  content: string | null
  invocationSucceeded: boolean
}

export type Usage = {
  promptTokens: number
  completionTokens: number
  totalTokens?: number
}

export type VendorExtensions = Record<string, unknown>

export type StreamInternalKind = 'append-assistant-message'

export type RawToolCallDelta = {
  index?: number
  id?: string
  functionName?: string
  arguments?: string
}

export type RawDelta = {
  role?: ChatRole | null
  content?: string | null
  parts?: MessagePart[]
  toolCalls?: RawToolCallDelta[]
}

export type RawChoice = {
  index?: number
  delta?: RawDelta | null
  /** Complete message, sent by non-streaming endpoints and some "compatible" servers. */
  message?: RawDelta | null
  finishReason?: string | null
}

export type RawChatResult = {
  id?: string
  object?: string
  model?: string
  choices?: RawChoice[] | null
  usage?: Usage
  vendorExtensions?: VendorExtensions
  internalKind?: StreamInternalKind
}

export type ChatRequest = {
  model?: string
  messages: ChatMessage[]
  tools?: ToolDefinition[]
  temperature?: number
  maxTokens?: number
  signal?: AbortSignal
}

export type ChatRichResponseBlock =
  | {type: 'message'; message: string}
  | {type: 'function'; call: FunctionCall; result?: FunctionResult}

export type ChatRichResponse = {
  result: RawChatResult | null
  blocks: ChatRichResponseBlock[] | null
}

export type ResolvedToolCall = {
  call: FunctionCall
  result: FunctionResult
  toolMessage: ToolMessage
}

export type ResolvedToolsCall = {
  assistantMessage: AssistantMessage
  toolResults: ResolvedToolCall[]
}

export type FunctionCallHandler = (calls: FunctionCall[]) => Promise<FunctionResult[]>

export type ChatStreamHooks = {
  /** Id given to the first message this turn appends. */
  messageId?: string
  onOutboundRequest?: (request: ChatRequest) => Promise<ChatRequest> | ChatRequest
  onRoleResolved?: (role: ChatRole) => Promise<void> | void
  onToken?: (text: string) => Promise<void> | void
  onToolCalls?: FunctionCallHandler
  onUsage?: (usage: Usage) => Promise<void> | void
  onVendorFeatures?: (extensions: VendorExtensions) => Promise<void> | void
  onAfterToolsResolved?: (resolved: ResolvedToolsCall, hooks: ChatStreamHooks) => Promise<void> | void
}
