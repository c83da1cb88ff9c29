import type { ZodError } from 'zod'

/**
 * Raised synchronously by Backend.prompt() when the request is rejected
 * before any network I/O.
 */
export class RequestError extends Error {
  readonly kind = 'invalid_request' as const

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'RequestError'
  }
}

export type StreamErrorKind = 'transport' | 'malformed_payload' | 'provider' | 'cancelled'

/**
 * Terminal failure of a token stream. Delivered once, as the rejection of the
 * next pull, after which the stream is exhausted.
 */
export abstract class StreamError extends Error {
  abstract readonly kind: StreamErrorKind
}

export class TransportError extends StreamError {
  readonly kind = 'transport' as const

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

export class MalformedPayloadError extends StreamError {
  readonly kind = 'malformed_payload' as const

  constructor(
    message: string,
    /** The offending frame, serialized. */
    public readonly raw: string,
  ) {
    super(message)
    this.name = 'MalformedPayloadError'
  }
}

export class ProviderError extends StreamError {
  readonly kind = 'provider' as const
  readonly code?: string
  readonly status?: number

  constructor(
    message: string,
    meta: { code?: string; status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: meta.cause })
    this.name = 'ProviderError'
    this.code = meta.code
    this.status = meta.status
  }
}

export class StreamCancelledError extends StreamError {
  readonly kind = 'cancelled' as const

  constructor(message = 'Stream cancelled by consumer') {
    super(message)
    this.name = 'StreamCancelledError'
  }
}

export type ToolErrorKind = 'unknown_tool' | 'invalid_arguments' | 'execution_failed'

export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind

  constructor(
    message: string,
    public readonly callId: string,
    public readonly toolName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class UnknownToolError extends ToolError {
  readonly kind = 'unknown_tool' as const

  constructor(callId: string, toolName: string) {
    super(`Unknown tool "${toolName}"`, callId, toolName)
    this.name = 'UnknownToolError'
  }
}

export class InvalidArgumentsError extends ToolError {
  readonly kind = 'invalid_arguments' as const

  constructor(
    callId: string,
    toolName: string,
    /** The argument text exactly as the model produced it. */
    public readonly rawArguments: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid arguments for tool "${toolName}": ${issues.join('; ')}`, callId, toolName)
    this.name = 'InvalidArgumentsError'
  }
}

export class ToolExecutionError extends ToolError {
  readonly kind = 'execution_failed' as const

  constructor(callId: string, toolName: string, cause: unknown) {
    super(`Tool "${toolName}" failed: ${describeCause(cause)}`, callId, toolName, { cause })
    this.name = 'ToolExecutionError'
  }
}

/** Flatten zod issues into `path: message` lines. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
