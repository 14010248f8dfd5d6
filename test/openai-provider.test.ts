import {describe, expect, it, vi} from 'vitest'
import {Conversation} from '../src/chat/conversation.js'
import {createAssistantMessage, createToolMessage} from '../src/chat/message.js'
import {TransportError} from '../src/core/errors.js'
import {fromCompletion, OpenAITransport, toWireMessage} from '../src/providers/openai-provider.js'

function sse(events: unknown[]): string {
  return [...events.map((event) => `data: ${JSON.stringify(event)}\n\n`), 'data: [DONE]\n\n'].join('')
}

function chunk(delta: Record<string, unknown>, finishReason: string | null = null) {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 1,
    model: 'gpt-test',
    choices: [{index: 0, delta, finish_reason: finishReason}]
  }
}

function requestUrl(input: string | URL | Request): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
}

describe('OpenAITransport', () => {
  it('streams chat completion chunks into the conversation', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(requestUrl(input)).toBe('https://example-llm.com/v1/chat/completions')
      const body: unknown = JSON.parse(String(init?.body))
      expect(body).toMatchObject({
        model: 'gpt-test',
        stream: true,
        stream_options: {include_usage: true},
        messages: [{role: 'user', content: 'hello'}]
      })
      return new Response(
        sse([
          chunk({role: 'assistant', content: ''}),
          chunk({content: 'Hi'}),
          chunk({content: ' there'}),
          chunk({}, 'stop'),
          {
            id: 'chatcmpl-1',
            object: 'chat.completion.chunk',
            created: 1,
            model: 'gpt-test',
            choices: [],
            usage: {prompt_tokens: 3, completion_tokens: 2, total_tokens: 5}
          }
        ]),
        {status: 200, headers: {'Content-Type': 'text/event-stream'}}
      )
    })
    const transport = new OpenAITransport({
      apiKey: 'test-key',
      model: 'gpt-test',
      baseUrl: 'https://example-llm.com/v1/',
      fetch: fetchMock
    })
    const conversation = new Conversation({transport})
    conversation.appendUserInput('hello')

    const response = await conversation.streamResponseRich()

    expect(fetchMock).toHaveBeenCalledOnce()
    expect(response.blocks).toEqual([{type: 'message', message: 'Hi there'}])
    expect(conversation.messages[0]?.tokens).toBe(3)
    expect(conversation.messages[1]).toMatchObject({role: 'assistant', content: 'Hi there', tokens: 2})
  })

  it('reports the trailing usage of a streamed tool-call turn before resolving it', async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(
          sse([
            chunk({
              role: 'assistant',
              content: null,
              tool_calls: [{index: 0, id: 'call_7', type: 'function', function: {name: 'lookup', arguments: ''}}]
            }),
            chunk({tool_calls: [{index: 0, function: {arguments: '{"q":"tea"}'}}]}),
            chunk({}, 'tool_calls'),
            {
              id: 'chatcmpl-1',
              object: 'chat.completion.chunk',
              created: 1,
              model: 'gpt-test',
              choices: [],
              usage: {prompt_tokens: 11, completion_tokens: 7, total_tokens: 18}
            }
          ]),
          {status: 200, headers: {'Content-Type': 'text/event-stream'}}
        )
    )
    const transport = new OpenAITransport({apiKey: 'test-key', model: 'gpt-test', fetch: fetchMock})
    const conversation = new Conversation({transport})
    conversation.appendUserInput('which tea?')
    const onUsage = vi.fn()

    await conversation.streamResponseRich({
      onUsage,
      onToolCalls: async () => [{content: 'green', invocationSucceeded: true}]
    })

    expect(onUsage).toHaveBeenCalledWith({promptTokens: 11, completionTokens: 7, totalTokens: 18})
    expect(conversation.messages.map((message) => message.role)).toEqual(['user', 'assistant', 'tool'])
    expect(conversation.messages[0]?.tokens).toBe(11)
    expect(conversation.messages[1]).toMatchObject({
      role: 'assistant',
      tokens: 7,
      toolCalls: [{id: 'call_7', functionName: 'lookup', arguments: '{"q":"tea"}'}]
    })
    expect(conversation.messages[2]).toMatchObject({role: 'tool', toolCallId: 'call_7', content: 'green'})
  })

  it('sends tools and maps a completion with tool calls', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
      const body: unknown = JSON.parse(String(init?.body))
      expect(body).toMatchObject({
        tools: [
          {
            type: 'function',
            function: {name: 'lookup', description: 'Look something up', parameters: {type: 'object', properties: {}}}
          }
        ],
        tool_choice: 'auto'
      })
      return Response.json({
        id: 'chatcmpl-2',
        object: 'chat.completion',
        created: 1,
        model: 'gpt-test',
        choices: [
          {
            index: 0,
            finish_reason: 'tool_calls',
            message: {
              role: 'assistant',
              content: null,
              tool_calls: [{id: 'call_9', type: 'function', function: {name: 'lookup', arguments: '{"q":"tea"}'}}]
            }
          }
        ]
      })
    })
    const transport = new OpenAITransport({apiKey: 'test-key', model: 'gpt-test', fetch: fetchMock})
    const conversation = new Conversation({
      transport,
      tools: [{name: 'lookup', description: 'Look something up', inputSchema: {type: 'object', properties: {}}}]
    })
    conversation.appendUserInput('tea?')

    const response = await conversation.getResponseRich(async () => [{content: 'green', invocationSucceeded: true}])

    expect(response.blocks).toEqual([
      {
        type: 'function',
        call: {
          name: 'lookup',
          arguments: '{"q":"tea"}',
          toolCall: {id: 'call_9', functionName: 'lookup', arguments: '{"q":"tea"}'}
        },
        result: {content: 'green', invocationSucceeded: true}
      }
    ])
  })

  it('reports non-2xx answers as transport errors with their status', async () => {
    const fetchMock = vi.fn(async () => Response.json({error: {message: 'bad key'}}, {status: 401}))
    const transport = new OpenAITransport({apiKey: 'test-key', model: 'gpt-test', fetch: fetchMock})
    const conversation = new Conversation({transport})
    conversation.appendUserInput('hello')

    const result = await conversation.streamResponseRichSafe()

    expect(fetchMock).toHaveBeenCalledOnce()
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(TransportError)
    expect(result.error.status).toBe(401)
  })
})

describe('wire mapping', () => {
  it('maps assistant tool calls and tool results', () => {
    const assistant = createAssistantMessage({
      id: 'a1',
      toolCalls: [{functionName: 'lookup', arguments: '{}'}]
    })
    const tool = createToolMessage({id: 't1', toolCallId: 'lookup', content: null, succeeded: false})

    expect(toWireMessage(assistant)).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [{id: 'lookup', type: 'function', function: {name: 'lookup', arguments: '{}'}}]
    })
    expect(toWireMessage(tool)).toEqual({role: 'tool', content: 'no data', tool_call_id: 'lookup'})
  })

  it('sends image parts as content parts', () => {
    expect(
      toWireMessage({
        id: 'u1',
        role: 'user',
        parts: [
          {type: 'text', text: 'what is this?'},
          {type: 'image', url: 'https://example.com/cat.png', detail: 'low'}
        ]
      })
    ).toEqual({
      role: 'user',
      content: [
        {type: 'text', text: 'what is this?'},
        {type: 'image_url', image_url: {url: 'https://example.com/cat.png', detail: 'low'}}
      ]
    })
  })

  it('maps a plain completion without usage', () => {
    const result = fromCompletion({
      id: 'c',
      object: 'chat.completion',
      created: 1,
      model: 'gpt-test',
      choices: [
        {
          index: 0,
          finish_reason: 'stop',
          logprobs: null,
          message: {role: 'assistant', content: 'ok', refusal: null}
        }
      ]
    })

    expect(result.choices?.[0]?.message).toEqual({role: 'assistant', content: 'ok'})
    expect(result.usage).toBeUndefined()
  })
})
