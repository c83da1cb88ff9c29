import type { StreamError } from '../agents/errors.js'

/**
 * The live connection behind a token stream: an ordered source of raw
 * provider frames plus a way to drop the connection.
 */
export interface Transport {
  next(): Promise<IteratorResult<unknown>>
  /** Close the connection. Safe to call more than once. */
  close(): void
}

/** Starts a streamed request; the signal aborts it. */
export type StreamOpener = (signal: AbortSignal) => Promise<AsyncIterable<unknown>>

/** Maps whatever the SDK threw into the stream error taxonomy. */
export type ErrorClassifier = (err: unknown) => StreamError

type Opened =
  | { ok: true; iterator: AsyncIterator<unknown> }
  | { ok: false; error: unknown }

/**
 * Transport over a provider SDK's streaming response. The request is issued
 * as soon as the transport is constructed.
 */
export class SdkTransport implements Transport {
  private readonly controller = new AbortController()
  private readonly opened: Promise<Opened>
  private closed = false

  constructor(open: StreamOpener, private readonly classify: ErrorClassifier) {
    // Settles either way so an unconsumed failure never becomes an unhandled rejection
    this.opened = open(this.controller.signal).then(
      (iterable): Opened => ({ ok: true, iterator: iterable[Symbol.asyncIterator]() }),
      (error: unknown): Opened => ({ ok: false, error }),
    )
  }

  get isClosed(): boolean {
    return this.closed
  }

  async next(): Promise<IteratorResult<unknown>> {
    const opened = await this.opened
    if (!opened.ok) throw this.classify(opened.error)
    try {
      return await opened.iterator.next()
    } catch (err) {
      throw this.classify(err)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.controller.abort()
  }
}
