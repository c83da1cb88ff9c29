import type { AssembledToolCall, Chunk } from '../agents/providers/types.js'

/**
 * Rebuilds tool calls from a chunk sequence. Argument fragments are buffered
 * per call id and joined in arrival order when the call ends.
 */
export class ToolCallAssembler {
  private pending = new Map<string, { name: string; fragments: string[] }>()

  /** Returns the completed call when `c` is its tool_call_end. */
  push(c: Chunk): AssembledToolCall | undefined {
    switch (c.type) {
      case 'tool_call_start':
        this.pending.set(c.callId, { name: c.name, fragments: [] })
        return undefined
      case 'tool_call_argument':
        this.pending.get(c.callId)?.fragments.push(c.fragment)
        return undefined
      case 'tool_call_end': {
        const call = this.pending.get(c.callId)
        if (!call) return undefined
        this.pending.delete(c.callId)
        return { callId: c.callId, name: call.name, arguments: call.fragments.join('') }
      }
      default:
        return undefined
    }
  }

  /** Calls started but not yet ended. */
  get open(): string[] {
    return Array.from(this.pending.keys())
  }
}
