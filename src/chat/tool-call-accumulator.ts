import type {ToolCall} from './types.js'

export type ToolCallFragment = {
  id?: string
  functionName?: string
  arguments?: string
}

type PendingCall = {
  id?: string
  functionName: string
  arguments: string
}

/**
 * Reassembles streamed tool-call fragments keyed by their positional index.
 * Turn-scoped: `seal()` hands out the calls and starts over empty.
 */
export class ToolCallAccumulator {
  private readonly pending = new Map<number, PendingCall>()

  get size(): number {
    return this.pending.size
  }

  feed(index: number, fragment: ToolCallFragment): void {
    const existing = this.pending.get(index)
    if (!existing) {
      this.pending.set(index, {
        id: fragment.id,
        functionName: fragment.functionName ?? '',
        arguments: fragment.arguments ?? ''
      })
      return
    }

    if (existing.id === undefined && fragment.id) existing.id = fragment.id
    if (fragment.functionName) existing.functionName += fragment.functionName
    if (fragment.arguments) existing.arguments += fragment.arguments
  }

  seal(): ToolCall[] {
    const calls = [...this.pending.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, call]): ToolCall => {
        const sealed: ToolCall = {functionName: call.functionName, arguments: call.arguments}
        if (call.id) sealed.id = call.id
        return sealed
      })
    this.pending.clear()
    return calls
  }
}
