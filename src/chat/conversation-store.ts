import {retagMessage, setMessageBody, type MessageBody, type RetaggableRole} from './message.js'
import type {ChatMessage, ChatRole} from './types.js'

export type MessageRef = ChatMessage | string

function refId(ref: MessageRef): string {
  return typeof ref === 'string' ? ref : ref.id
}

/**
 * Ordered message history. Insertion order is turn order.
 *
 * Not safe for concurrent turns: callers serialize writes (see `Conversation`).
 */
export class ConversationStore {
  private readonly items: ChatMessage[] = []

  get messages(): readonly ChatMessage[] {
    return [...this.items]
  }

  get size(): number {
    return this.items.length
  }

  append(message: ChatMessage, position?: number): this {
    if (position === undefined) {
      this.items.push(message)
    } else {
      this.items.splice(position, 0, message)
    }
    return this
  }

  find(id: string): ChatMessage | undefined {
    return this.items.find((message) => message.id === id)
  }

  lastOfRole<R extends ChatRole>(role: R): Extract<ChatMessage, {role: R}> | undefined {
    for (let i = this.items.length - 1; i >= 0; i -= 1) {
      const message = this.items[i]
      if (isRole(message, role)) return message
    }
    return undefined
  }

  /** Returns false when nothing matched. */
  remove(ref: MessageRef): boolean {
    const index = this.indexOf(ref)
    if (index < 0) return false
    this.items.splice(index, 1)
    return true
  }

  editContent(ref: MessageRef, body: MessageBody): boolean {
    const index = this.indexOf(ref)
    if (index < 0) return false
    setMessageBody(this.items[index], body)
    return true
  }

  editRole(ref: MessageRef, role: RetaggableRole): boolean {
    const index = this.indexOf(ref)
    if (index < 0) return false
    this.items[index] = retagMessage(this.items[index], role)
    return true
  }

  clear(): void {
    this.items.length = 0
  }

  private indexOf(ref: MessageRef): number {
    const id = refId(ref)
    return this.items.findIndex((message) => message.id === id)
  }
}

function isRole<R extends ChatRole>(message: ChatMessage, role: R): message is Extract<ChatMessage, {role: R}> {
  return message.role === role
}
