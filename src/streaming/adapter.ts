import type { z } from 'zod'
import { ChunkEmitter } from '../agents/chunks.js'
import {
  MalformedPayloadError,
  StreamError,
  TransportError,
  formatZodIssues,
} from '../agents/errors.js'
import type { Chunk, StopReason, Usage } from '../agents/providers/types.js'

export type AdapterState =
  | { kind: 'idle' }
  | { kind: 'in_tool_call'; callIds: string[] }
  | { kind: 'errored'; error: StreamError }
  | { kind: 'done' }

export interface AdapterStep {
  chunks: Chunk[]
  error?: StreamError
  /** True once the adapter is done or errored and will accept no more frames. */
  finished: boolean
}

function describeFrame(frame: unknown): string {
  if (frame === undefined) return ''
  if (typeof frame === 'string') return frame
  try {
    return JSON.stringify(frame)
  } catch {
    return String(frame)
  }
}

/**
 * Turns one provider's raw frames into chunks.
 *
 * Subclasses parse their wire format in `consume()` and drive the shared
 * transitions through the protected helpers. Open tool calls are tracked by
 * call id, so concurrent calls are independent of each other. Any
 * StreamError thrown while consuming a frame moves the adapter to `errored`.
 */
export abstract class StreamAdapter {
  abstract readonly provider: string

  protected readonly emitter = new ChunkEmitter()
  private readonly openCalls = new Set<string>()
  private readonly seenCalls = new Set<string>()
  private failure: StreamError | null = null
  private frame: unknown = undefined

  get state(): AdapterState {
    if (this.failure) return { kind: 'errored', error: this.failure }
    if (this.emitter.isTerminated) return { kind: 'done' }
    if (this.openCalls.size > 0) return { kind: 'in_tool_call', callIds: [...this.openCalls] }
    return { kind: 'idle' }
  }

  /** Consume one frame from the transport. */
  push(frame: unknown): AdapterStep {
    this.assertActive()
    this.frame = frame
    return this.step(() => this.consume(frame))
  }

  /** The transport has no more frames. */
  finish(): AdapterStep {
    this.assertActive()
    this.frame = undefined
    return this.step(() => this.onTransportEnd())
  }

  /** The transport failed; the error becomes the stream's terminal value. */
  fail(error: StreamError): AdapterStep {
    this.assertActive()
    return this.step(() => {
      throw error
    })
  }

  protected abstract consume(frame: unknown): void

  protected onTransportEnd(): void {
    throw new TransportError(`${this.provider} connection closed before the end of the stream`)
  }

  protected text(text: string): void {
    if (text) this.emitter.token(text)
  }

  protected thinking(text: string): void {
    if (text) this.emitter.thinking(text)
  }

  protected beginToolCall(callId: string, name: string): void {
    if (!callId) throw this.malformed('tool call without an id')
    if (!name) throw this.malformed(`tool call ${callId} has no name`)
    if (this.seenCalls.has(callId)) throw this.malformed(`duplicate tool call id ${callId}`)
    this.seenCalls.add(callId)
    this.openCalls.add(callId)
    this.emitter.toolCallStart(callId, name)
  }

  protected toolArgument(callId: string, fragment: string): void {
    if (!this.openCalls.has(callId)) {
      throw this.malformed(`argument fragment for tool call ${callId}, which is not open`)
    }
    if (fragment) this.emitter.toolCallArgument(callId, fragment)
  }

  protected endToolCall(callId: string): void {
    if (!this.openCalls.delete(callId)) {
      throw this.malformed(`end of tool call ${callId}, which is not open`)
    }
    this.emitter.toolCallEnd(callId)
  }

  protected get openToolCalls(): string[] {
    return [...this.openCalls]
  }

  protected endStream(info: { stopReason?: StopReason; usage?: Usage } = {}): void {
    const [open] = this.openCalls
    if (open !== undefined) {
      throw this.malformed(`stream ended while tool call ${open} was still open`)
    }
    this.emitter.end(info)
  }

  protected malformed(reason: string): MalformedPayloadError {
    return new MalformedPayloadError(
      `Malformed ${this.provider} payload: ${reason}`,
      describeFrame(this.frame),
    )
  }

  /** Validate a frame (or part of one) against its wire schema. */
  protected parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const result = schema.safeParse(value)
    if (!result.success) throw this.malformed(formatZodIssues(result.error).join('; '))
    return result.data
  }

  private assertActive(): void {
    if (this.failure || this.emitter.isTerminated) {
      throw new Error(`${this.provider} adapter received input after it terminated`)
    }
  }

  private step(run: () => void): AdapterStep {
    try {
      run()
    } catch (err) {
      if (!(err instanceof StreamError)) throw err
      this.failure = err
      this.openCalls.clear()
      this.emitter.terminate()
      return { chunks: this.emitter.drain(), error: err, finished: true }
    }
    return { chunks: this.emitter.drain(), finished: this.emitter.isTerminated }
  }
}
