import { createServer } from 'node:http'
import type { StreamError } from '../src/agents/errors.js'
import type { Chunk } from '../src/agents/providers/types.js'
import type { StreamAdapter } from '../src/streaming/adapter.js'
import type { Transport } from '../src/streaming/transport.js'

type Item = { kind: 'frame'; value: unknown } | { kind: 'error'; error: unknown }

/**
 * In-process transport. Frames are queued by the test; next() waits while the
 * queue is empty and the script has not ended.
 */
export class ScriptedTransport implements Transport {
  closeCount = 0
  private items: Item[] = []
  private ended = false
  private wake: (() => void) | null = null

  static of(frames: unknown[]): ScriptedTransport {
    const transport = new ScriptedTransport()
    for (const frame of frames) transport.push(frame)
    transport.end()
    return transport
  }

  get remaining(): number {
    return this.items.length
  }

  push(frame: unknown): void {
    this.items.push({ kind: 'frame', value: frame })
    this.notify()
  }

  fail(error: unknown): void {
    this.items.push({ kind: 'error', error })
    this.notify()
  }

  end(): void {
    this.ended = true
    this.notify()
  }

  async next(): Promise<IteratorResult<unknown>> {
    for (;;) {
      const item = this.items.shift()
      if (item) {
        if (item.kind === 'error') throw item.error
        return { done: false, value: item.value }
      }
      if (this.ended) return { done: true, value: undefined }
      await new Promise<void>((resolve) => {
        this.wake = resolve
      })
    }
  }

  close(): void {
    this.closeCount += 1
  }

  private notify(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }
}

export interface FeedResult {
  chunks: Chunk[]
  error?: StreamError
  /** Frames the adapter accepted before it terminated. */
  consumed: number
}

/**
 * Push frames through an adapter until it terminates. When the frames run
 * out first, the transport is treated as closed.
 */
export function feed(adapter: StreamAdapter, frames: unknown[]): FeedResult {
  const chunks: Chunk[] = []
  let consumed = 0
  for (const frame of frames) {
    const step = adapter.push(frame)
    consumed += 1
    chunks.push(...step.chunks)
    if (step.finished) return { chunks, error: step.error, consumed }
  }
  const step = adapter.finish()
  chunks.push(...step.chunks)
  return { chunks, error: step.error, consumed }
}

/** Chat Completions chunk with a single choice. */
export function chatChunk(delta: Record<string, unknown>, finishReason: string | null = null) {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'test-model',
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  }
}

export function usageChunk(promptTokens: number, completionTokens: number) {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'test-model',
    choices: [],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  }
}

export const claude = {
  messageStart(inputTokens = 12) {
    return {
      type: 'message_start',
      message: { id: 'msg_1', type: 'message', role: 'assistant', usage: { input_tokens: inputTokens, output_tokens: 1 } },
    }
  },
  textStart(index: number) {
    return { type: 'content_block_start', index, content_block: { type: 'text', text: '' } }
  },
  thinkingStart(index: number) {
    return { type: 'content_block_start', index, content_block: { type: 'thinking', thinking: '' } }
  },
  toolStart(index: number, id: string, name: string) {
    return { type: 'content_block_start', index, content_block: { type: 'tool_use', id, name, input: {} } }
  },
  textDelta(index: number, text: string) {
    return { type: 'content_block_delta', index, delta: { type: 'text_delta', text } }
  },
  thinkingDelta(index: number, thinking: string) {
    return { type: 'content_block_delta', index, delta: { type: 'thinking_delta', thinking } }
  },
  jsonDelta(index: number, partialJson: string) {
    return { type: 'content_block_delta', index, delta: { type: 'input_json_delta', partial_json: partialJson } }
  },
  blockStop(index: number) {
    return { type: 'content_block_stop', index }
  },
  messageDelta(stopReason: string, outputTokens: number) {
    return {
      type: 'message_delta',
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage: { output_tokens: outputTokens },
    }
  },
  messageStop() {
    return { type: 'message_stop' }
  },
}

/** Let pending promise callbacks run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/** Wait, collecting garbage between waits, until `done()` holds. */
export async function collectGarbageUntil(done: () => boolean): Promise<void> {
  for (let i = 0; i < 50 && !done(); i++) {
    globalThis.gc?.()
    await new Promise((resolve) => setTimeout(resolve, 10))
  }
}

// ── Server-sent events over loopback ────────────────────────────────────────

export interface SseEvent {
  event?: string
  data: string
}

export function sseBody(events: SseEvent[]): string {
  return events
    .map((e) => `${e.event ? `event: ${e.event}\n` : ''}data: ${e.data}\n\n`)
    .join('')
}

/** Messages API frames, each sent under its own event name. */
export function claudeEvents(...frames: Array<{ type: string }>): SseEvent[] {
  return frames.map((frame) => ({ event: frame.type, data: JSON.stringify(frame) }))
}

/** Chat Completions frames as unnamed events. */
export function chatEvents(...frames: unknown[]): SseEvent[] {
  return frames.map((frame) => ({ data: JSON.stringify(frame) }))
}

export interface SseServer {
  baseUrl: string
  /** `METHOD path` of every request received. */
  requests: string[]
  close(): Promise<void>
}

/**
 * HTTP server on 127.0.0.1 that answers every request with the same
 * text/event-stream body, so the provider SDKs run unmodified.
 */
export async function serveSse(body: string): Promise<SseServer> {
  const requests: string[] = []
  const server = createServer((req, res) => {
    requests.push(`${req.method} ${req.url}`)
    req.resume()
    req.on('end', () => {
      res.writeHead(200, { 'content-type': 'text/event-stream' })
      res.end(body)
    })
  })

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('SSE server is not listening on a TCP port')
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections()
      server.close((err) => (err ? reject(err) : resolve()))
    }),
  }
}
