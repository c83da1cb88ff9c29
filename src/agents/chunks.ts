import type { Chunk, ChunkOf, StopReason, Usage } from './providers/types.js'

/**
 * Plain constructors for each chunk variant.
 */
export const chunk = {
  token(text: string): ChunkOf<'token'> {
    return { type: 'token', text }
  },

  thinking(text: string): ChunkOf<'thinking'> {
    return { type: 'thinking', text }
  },

  toolCallStart(callId: string, name: string): ChunkOf<'tool_call_start'> {
    if (!callId) throw new Error('tool_call_start requires a non-empty call id')
    if (!name) throw new Error(`tool_call_start for ${callId} requires a tool name`)
    return { type: 'tool_call_start', callId, name }
  },

  toolCallArgument(callId: string, fragment: string): ChunkOf<'tool_call_argument'> {
    return { type: 'tool_call_argument', callId, fragment }
  },

  toolCallEnd(callId: string): ChunkOf<'tool_call_end'> {
    return { type: 'tool_call_end', callId }
  },

  end(info: { stopReason?: StopReason; usage?: Usage } = {}): ChunkOf<'end'> {
    const end: ChunkOf<'end'> = { type: 'end' }
    if (info.stopReason) end.stopReason = info.stopReason
    if (info.usage) end.usage = info.usage
    return end
  },
}

export function isTerminal(c: Chunk): c is ChunkOf<'end'> {
  return c.type === 'end'
}

/**
 * Collects the chunks one adapter produces. Once `end` has been built, or the
 * emitter has been terminated by an error, any further build is a logic error.
 */
export class ChunkEmitter {
  private queue: Chunk[] = []
  private terminated = false

  get isTerminated(): boolean {
    return this.terminated
  }

  token(text: string): void {
    this.push(chunk.token(text))
  }

  thinking(text: string): void {
    this.push(chunk.thinking(text))
  }

  toolCallStart(callId: string, name: string): void {
    this.push(chunk.toolCallStart(callId, name))
  }

  toolCallArgument(callId: string, fragment: string): void {
    this.push(chunk.toolCallArgument(callId, fragment))
  }

  toolCallEnd(callId: string): void {
    this.push(chunk.toolCallEnd(callId))
  }

  end(info?: { stopReason?: StopReason; usage?: Usage }): void {
    this.push(chunk.end(info))
    this.terminated = true
  }

  /** Mark the stream as failed; no chunk may be built afterwards. */
  terminate(): void {
    this.terminated = true
  }

  /** Hand over everything built since the last drain. */
  drain(): Chunk[] {
    const out = this.queue
    this.queue = []
    return out
  }

  private push(c: Chunk): void {
    if (this.terminated) {
      throw new Error(`Cannot emit ${c.type} chunk after the stream has terminated`)
    }
    this.queue.push(c)
  }
}
