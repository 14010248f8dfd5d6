import type {ChatRequest, RawChatResult} from '../chat/types.js'

/**
 * Vendor boundary. Implementations map their wire format to canonical raw
 * results and raise `TransportError` on connection failures or non-2xx replies.
 */
export interface ChatTransport {
  readonly name: string
  complete(request: ChatRequest): Promise<RawChatResult | null>
  stream(request: ChatRequest): AsyncIterable<RawChatResult>
}
