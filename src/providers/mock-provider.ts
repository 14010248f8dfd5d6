import {messageText} from '../chat/message.js'
import type {ChatRequest, RawChatResult} from '../chat/types.js'
import type {ChatTransport} from './types.js'

function replyFor(request: ChatRequest): string {
  const last = request.messages.at(-1)
  if (!last) return 'No input provided.'
  return `Mock response: ${messageText(last)}`
}

function usageFor(request: ChatRequest, reply: string) {
  const promptTokens = request.messages.reduce((total, message) => total + messageText(message).split(/\s+/).length, 0)
  const completionTokens = reply.split(/\s+/).length
  return {promptTokens, completionTokens, totalTokens: promptTokens + completionTokens}
}

/** Offline backend: echoes the last message back, streamed word by word. */
export class MockTransport implements ChatTransport {
  readonly name = 'mock'

  async complete(request: ChatRequest): Promise<RawChatResult> {
    const reply = replyFor(request)
    return {
      object: 'chat.completion',
      choices: [{index: 0, message: {role: 'assistant', content: reply}, finishReason: 'stop'}],
      usage: usageFor(request, reply)
    }
  }

  async *stream(request: ChatRequest): AsyncGenerator<RawChatResult, void, undefined> {
    const reply = replyFor(request)
    const words = reply.split(' ')
    yield {object: 'chat.completion.chunk', choices: [{index: 0, delta: {role: 'assistant', content: ''}}]}
    for (const [index, word] of words.entries()) {
      const content = index === 0 ? word : ` ${word}`
      yield {object: 'chat.completion.chunk', choices: [{index: 0, delta: {content}}]}
    }
    yield {object: 'chat.completion.chunk', choices: [{index: 0, delta: {}, finishReason: 'stop'}]}
    yield {object: 'chat.completion.chunk', choices: [], usage: usageFor(request, reply)}
  }
}
