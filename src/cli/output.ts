import type {ConversationEvent} from '../chat/events.js'
import {messageText} from '../chat/message.js'

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function redBold(text: string): string {
  return `${ANSI.red}${ANSI.bold}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`
}

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

function now(): string {
  return new Date().toISOString()
}

/** One status line per event; message events are left to the caller. */
export function eventLine(event: ConversationEvent): string | undefined {
  switch (event.type) {
    case 'turn_start':
      return dim(`[${now()}] TURN_START provider=${event.provider} model=${event.model ?? '-'} messages=${event.messageCount}`)
    case 'tool_calls':
      return dim(`[${now()}] TOOL_CALLS ${event.calls.map((call) => `${call.name}(${shorten(call.arguments, 120)})`).join(' ')}`)
    case 'usage':
      return dim(`[${now()}] USAGE prompt=${event.usage.promptTokens} completion=${event.usage.completionTokens}`)
    case 'turn_end':
      return dim(`[${now()}] TURN_END state=${event.state} appended=${event.appended}`)
    case 'message':
      if (event.message.role !== 'tool') return undefined
      return dim(`[${now()}] TOOL_RESULT ok=${event.message.toolInvocationSucceeded}\n${shorten(messageText(event.message), 300)}`)
  }
}
