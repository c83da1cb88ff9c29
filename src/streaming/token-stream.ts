import {
  StreamCancelledError,
  StreamError,
  TransportError,
} from '../agents/errors.js'
import type { Chunk } from '../agents/providers/types.js'
import { createLogger } from '../logger.js'
import type { AdapterStep, StreamAdapter } from './adapter.js'
import { allChunks } from './aggregate.js'
import type { Transport } from './transport.js'

export type StreamStatus = 'open' | 'ended' | 'failed' | 'cancelled'

export interface TokenStreamOptions {
  signal?: AbortSignal
}

type Read =
  | { kind: 'frame'; value: unknown }
  | { kind: 'end' }
  | { kind: 'error'; error: StreamError }

const CANCELLED = Symbol('cancelled')

const log = createLogger('stream')

interface Abandoned {
  transport: Transport
  detachSignal: () => void
}

// A stream dropped while still open releases its connection when collected
const abandoned = new FinalizationRegistry<Abandoned>(({ transport, detachSignal }) => {
  detachSignal()
  transport.close()
})

function done(): IteratorReturnResult<undefined> {
  return { done: true, value: undefined }
}

/**
 * Pull-based stream of chunks over one live transport.
 *
 * Exactly one terminal event is observed per stream: the `end` chunk, one
 * rejected pull carrying a StreamError, or cancellation. After that every
 * pull resolves `done`. The transport is closed exactly once, on whichever
 * exit path comes first.
 */
export class TokenStream implements AsyncIterableIterator<Chunk> {
  private buffer: Chunk[] = []
  private pendingError: StreamError | null = null
  private current: StreamStatus = 'open'
  private released = false
  private pulling = false
  private wakePendingRead: (() => void) | null = null
  private readonly detachSignal: () => void

  constructor(
    private readonly transport: Transport,
    private readonly adapter: StreamAdapter,
    options: TokenStreamOptions = {},
  ) {
    const { signal } = options
    let detachSignal = () => {}
    if (signal) {
      // The signal may outlive the stream; it must not keep the stream reachable
      const stream = new WeakRef(this)
      const onAbort = () => stream.deref()?.cancel()
      signal.addEventListener('abort', onAbort, { once: true })
      detachSignal = () => signal.removeEventListener('abort', onAbort)
    }
    this.detachSignal = detachSignal
    abandoned.register(this, { transport, detachSignal }, this)

    if (signal?.aborted) this.cancel()
  }

  get status(): StreamStatus {
    return this.current
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  async next(): Promise<IteratorResult<Chunk, undefined>> {
    if (this.pulling) {
      throw new Error('TokenStream.next() called while a previous pull is still pending')
    }
    this.pulling = true
    try {
      return await this.pull()
    } finally {
      this.pulling = false
    }
  }

  /** Called by `break` inside `for await`; cancels the stream. */
  async return(): Promise<IteratorResult<Chunk, undefined>> {
    this.cancel()
    return done()
  }

  /**
   * Stop the stream. Buffered chunks are discarded, a pending pull rejects
   * with StreamCancelledError and later pulls resolve `done`. No-op once the
   * terminal event has been delivered.
   */
  cancel(): void {
    if (this.current === 'cancelled') return
    const delivered = this.current !== 'open' && this.buffer.length === 0 && !this.pendingError
    if (delivered) return

    this.current = 'cancelled'
    this.buffer = []
    this.pendingError = null
    this.release()
    this.wakePendingRead?.()
  }

  /** Drain the stream; see allChunks(). */
  allChunks(): Promise<Chunk[]> {
    return allChunks(this)
  }

  private async pull(): Promise<IteratorResult<Chunk, undefined>> {
    for (;;) {
      if (this.current === 'cancelled') return done()

      const queued = this.buffer.shift()
      if (queued) return { done: false, value: queued }

      if (this.pendingError) {
        const error = this.pendingError
        this.pendingError = null
        throw error
      }
      if (this.current !== 'open') return done()

      const read = await this.readUnlessCancelled()
      if (read === CANCELLED || this.status === 'cancelled') {
        throw new StreamCancelledError()
      }
      this.apply(read)
    }
  }

  /** Races one transport read against cancel(); the waiter lives only as long as the read. */
  private async readUnlessCancelled(): Promise<Read | typeof CANCELLED> {
    const cancelled = new Promise<typeof CANCELLED>((resolve) => {
      this.wakePendingRead = () => resolve(CANCELLED)
    })
    try {
      return await Promise.race([this.read(), cancelled])
    } finally {
      this.wakePendingRead = null
    }
  }

  private async read(): Promise<Read> {
    try {
      const result = await this.transport.next()
      return result.done ? { kind: 'end' } : { kind: 'frame', value: result.value }
    } catch (err) {
      const error = err instanceof StreamError
        ? err
        : new TransportError(err instanceof Error ? err.message : 'Transport failed', { cause: err })
      return { kind: 'error', error }
    }
  }

  private apply(read: Read): void {
    let step: AdapterStep
    try {
      if (read.kind === 'frame') step = this.adapter.push(read.value)
      else if (read.kind === 'end') step = this.adapter.finish()
      else step = this.adapter.fail(read.error)
    } catch (err) {
      this.current = 'failed'
      this.release()
      throw err
    }

    this.buffer.push(...step.chunks)
    if (step.error) {
      log.warn(`${this.adapter.provider} stream failed (${step.error.kind}):`, step.error.message)
      this.pendingError = step.error
      this.current = 'failed'
      this.release()
    } else if (step.finished) {
      this.current = 'ended'
      this.release()
    }
  }

  private release(): void {
    if (this.released) return
    this.released = true
    abandoned.unregister(this)
    this.detachSignal()
    this.transport.close()
  }
}
