import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {ConversationEvent} from '../src/chat/events.js'
import type {RawChatResult} from '../src/chat/types.js'
import {appConfigSchema, type AppConfig} from '../src/config/schema.js'
import {getSessionLogPath} from '../src/config/paths.js'
import {ConfigError} from '../src/core/errors.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import {createConversation, createTransport, runToolLoop} from '../src/core/session.js'
import {SessionLogSubscriber} from '../src/core/subscribers/session-log-subscriber.js'
import {MockTransport} from '../src/providers/mock-provider.js'
import {finishChunk, ScriptedTransport, textChunk} from './support/scripted-transport.js'

function readFileCall(id: string): RawChatResult[] {
  return [
    {
      choices: [
        {
          index: 0,
          delta: {role: 'assistant', toolCalls: [{index: 0, id, functionName: 'read_file', arguments: '{"path":"notes.txt"}'}]},
          finishReason: 'tool_calls'
        }
      ]
    }
  ]
}

describe('session wiring', () => {
  let workspace = ''
  let config: AppConfig

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'chatweave-session-'))
    await writeFile(join(workspace, 'notes.txt'), 'buy oat milk', 'utf8')
    config = appConfigSchema.parse({provider: 'mock', workspace, homeDir: workspace, systemPrompt: 'Be terse.'})
  })

  afterEach(async () => {
    delete process.env.OPENAI_API_KEY
    await rm(workspace, {recursive: true, force: true})
  })

  it('builds the configured transport', () => {
    delete process.env.OPENAI_API_KEY
    expect(createTransport(config)).toBeInstanceOf(MockTransport)
    expect(() => createTransport({...config, provider: 'openai'})).toThrow(ConfigError)

    process.env.OPENAI_API_KEY = 'test-key'
    expect(createTransport({...config, provider: 'openai'}).name).toBe('openai')
  })

  it('starts conversations with the system prompt and built-in tools', () => {
    const conversation = createConversation(config)

    expect(conversation.messages).toEqual([expect.objectContaining({role: 'system', content: 'Be terse.'})])
    expect(conversation.tools.map((tool) => tool.name)).toEqual(['read_file', 'list_files', 'run_shell'])
    expect(conversation.model).toBe('gpt-4o-mini')
  })

  it('loops until the model answers without tools', async () => {
    const transport = new ScriptedTransport([
      readFileCall('call_1'),
      [textChunk('You need oat milk.', 'assistant'), finishChunk()]
    ])
    const conversation = createConversation(config, {transport})
    conversation.appendUserInput('What is on my list?')

    const rounds: number[] = []
    const result = await runToolLoop(conversation, {
      workspace,
      maxToolRounds: 4,
      onRound: (round) => rounds.push(round)
    })

    expect(result).toEqual({text: 'You need oat milk.', rounds: 2, exhausted: false})
    expect(rounds).toEqual([1, 2])
    expect(conversation.messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant'])
    expect(conversation.messages[3]).toMatchObject({toolCallId: 'call_1', content: 'buy oat milk'})
  })

  it('stops at the round limit', async () => {
    const transport = new ScriptedTransport([readFileCall('call_1'), readFileCall('call_2'), readFileCall('call_3')])
    const conversation = createConversation(config, {transport})
    conversation.appendUserInput('again and again')

    const result = await runToolLoop(conversation, {workspace, maxToolRounds: 2})

    expect(result).toEqual({text: '', rounds: 2, exhausted: true})
    expect(transport.requests).toHaveLength(2)
  })

  it('writes conversation events to the session log', async () => {
    const bus = new InMemoryEventBus<ConversationEvent>()
    const sessionLog = new SessionLogSubscriber(workspace)
    bus.subscribe((event) => sessionLog.handle(event))
    const conversation = createConversation(config, {bus, transport: new MockTransport()})
    conversation.appendUserInput('hello')

    await conversation.streamResponseRich()
    await sessionLog.flush()

    const lines = (await readFile(getSessionLogPath(conversation.id, workspace), 'utf8')).trim().split('\n')
    const records: unknown[] = lines.map((line) => JSON.parse(line))
    expect(records.map((record) => (record && typeof record === 'object' && 'type' in record ? record.type : null))).toEqual([
      'message',
      'message',
      'turn_start',
      'usage',
      'message',
      'turn_end'
    ])
    expect(records[4]).toMatchObject({role: 'assistant', content: 'Mock response: hello', tokens: 3})
  })
})
