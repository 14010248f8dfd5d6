import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {ConversationEvent} from '../../chat/events.js'
import {messageText} from '../../chat/message.js'
import {getSessionLogPath} from '../../config/paths.js'
import {errorMessage} from '../errors.js'

type SessionLogRecord = {
  ts: string
  type: string
  [key: string]: unknown
}

function toRecord(event: ConversationEvent, ts: string): SessionLogRecord {
  switch (event.type) {
    case 'turn_start':
      return {ts, type: 'turn_start', provider: event.provider, model: event.model, messageCount: event.messageCount}
    case 'message': {
      const {message} = event
      return {
        ts,
        type: 'message',
        id: message.id,
        role: message.role,
        content: messageText(message),
        tokens: message.tokens,
        ...(message.role === 'assistant' && message.toolCalls ? {toolCalls: message.toolCalls} : {}),
        ...(message.role === 'tool'
          ? {toolCallId: message.toolCallId, succeeded: message.toolInvocationSucceeded}
          : {})
      }
    }
    case 'tool_calls':
      return {ts, type: 'tool_calls', calls: event.calls.map((call) => ({name: call.name, arguments: call.arguments}))}
    case 'usage':
      return {ts, type: 'usage', ...event.usage}
    case 'turn_end':
      return {ts, type: 'turn_end', state: event.state, appended: event.appended}
  }
}

/** Appends conversation events to `<home>/sessions/<conversationId>.jsonl`. */
export class SessionLogSubscriber {
  private readonly pendingBySession = new Map<string, Promise<void>>()

  constructor(private readonly homeDir?: string) {}

  handle(event: ConversationEvent): Promise<void> {
    return this.append(event.conversationId, toRecord(event, new Date().toISOString()))
  }

  private async append(sessionId: string, record: SessionLogRecord): Promise<void> {
    const logPath = getSessionLogPath(sessionId, this.homeDir)
    const previous = this.pendingBySession.get(sessionId) ?? Promise.resolve()
    const next = previous.then(async () => {
      try {
        await mkdir(dirname(logPath), {recursive: true})
        await appendFile(logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        // Best effort: a broken log must not end the conversation.
        process.emitWarning(`session log write failed (${logPath}): ${errorMessage(error)}`)
      }
    })
    this.pendingBySession.set(sessionId, next)
    await next
  }

  async flush(): Promise<void> {
    await Promise.all(this.pendingBySession.values())
  }
}
