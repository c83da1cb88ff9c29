import { RequestError, type StreamError } from '../errors.js'
import { createLogger } from '../../logger.js'
import type { StreamAdapter } from '../../streaming/adapter.js'
import { TokenStream } from '../../streaming/token-stream.js'
import { SdkTransport } from '../../streaming/transport.js'
import type {
  Backend,
  Message,
  PromptOptions,
  PromptOptionsInput,
  PromptRequestOptions,
} from './types.js'
import { conversationIssues, normalizeOptions } from './validate.js'

/** Opens the provider stream for a serialized request body. */
export type RequestOpener<Body> = (body: Body, signal: AbortSignal) => Promise<AsyncIterable<unknown>>

const log = createLogger('llm')

/**
 * Shared prompt flow: validate, serialize, open the transport, wrap it in a
 * TokenStream. Subclasses provide the wire format and nothing else.
 */
export abstract class StreamingBackend<Body> implements Backend {
  abstract readonly id: string

  constructor(readonly model: string) {}

  prompt(
    messages: readonly Message[],
    options: PromptOptionsInput = {},
    request: PromptRequestOptions = {},
  ): TokenStream {
    const normalized = normalizeOptions(options)
    const issues = [
      ...conversationIssues(messages),
      ...this.requestIssues(messages, normalized),
    ]
    if (issues.length > 0) {
      throw new RequestError(`Invalid ${this.id} request`, issues)
    }

    const body = this.buildRequest(messages, normalized)
    log.debug(`${this.id} request body:`, JSON.stringify(body))

    const transport = new SdkTransport(
      (signal) => this.openStream(body, signal),
      (err) => this.classifyError(err),
    )
    return new TokenStream(transport, this.createAdapter(), { signal: request.signal })
  }

  /** Serialize a validated conversation into the provider's request body. */
  abstract buildRequest(messages: readonly Message[], options: PromptOptions): Body

  /** Provider-specific constraints beyond the shared conversation checks. */
  protected requestIssues(_messages: readonly Message[], _options: PromptOptions): string[] {
    return []
  }

  protected abstract createAdapter(): StreamAdapter
  protected abstract openStream(body: Body, signal: AbortSignal): Promise<AsyncIterable<unknown>>
  protected abstract classifyError(err: unknown): StreamError
}
