import { z } from 'zod'
import { loadConfig, requireApiKey, type Env } from '../../config/loader.js'
import { ProviderError } from '../errors.js'
import type { RequestOpener } from './base.js'
import {
  OpenAIBackend,
  OpenAIStreamAdapter,
  toChatMessages,
  toChatTools,
  type ChatCompletionsRequest,
  type ChatDelta,
} from './openai.js'
import {
  DEFAULT_TEMPERATURE,
  type BackendDescriptor,
  type Message,
  type PromptOptions,
  type ReasoningEffort,
} from './types.js'
import { systemText } from './validate.js'

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

/** Chat Completions body plus OpenRouter's reasoning extension. */
export type OpenRouterRequest = ChatCompletionsRequest & {
  reasoning?: { effort: ReasoningEffort }
}

// OpenRouter reports upstream failures in-band once the stream has started
const ErrorFrame = z.object({
  error: z.object({
    code: z.union([z.string(), z.number()]).optional(),
    message: z.string(),
  }),
})

const ReasoningDelta = z.object({ reasoning: z.string().nullish() })

export class OpenRouterStreamAdapter extends OpenAIStreamAdapter {
  readonly provider = 'openrouter'

  protected consume(frame: unknown): void {
    const failure = ErrorFrame.safeParse(frame)
    if (failure.success) {
      const { code, message } = failure.data.error
      throw new ProviderError(message, { code: code === undefined ? undefined : String(code) })
    }
    super.consume(frame)
  }

  protected consumeDelta(delta: ChatDelta): void {
    const { reasoning } = this.parse(ReasoningDelta, delta)
    if (reasoning) this.thinking(reasoning)
    super.consumeDelta(delta)
  }
}

export interface OpenRouterBackendOptions extends BackendDescriptor {
  /** Replaces the SDK call that opens the stream. */
  open?: RequestOpener<ChatCompletionsRequest>
}

/**
 * OpenRouter speaks the Chat Completions protocol, so it rides on the OpenAI
 * SDK pointed at OpenRouter's base URL. Model ids look like
 * `anthropic/claude-3.5-sonnet`.
 */
export class OpenRouterBackend extends OpenAIBackend {
  readonly id = 'openrouter'

  constructor(options: OpenRouterBackendOptions) {
    super({ ...options, baseUrl: options.baseUrl ?? OPENROUTER_BASE_URL })
  }

  /** Sugar for the constructor, reading OPENROUTER_API_KEY and OPENROUTER_BASE_URL. */
  static fromEnv(model: string, env?: Env): OpenRouterBackend {
    const config = loadConfig(env)
    return new OpenRouterBackend({
      model,
      apiKey: requireApiKey(config, 'openrouter'),
      baseUrl: config.openrouter.baseUrl,
    })
  }

  buildRequest(messages: readonly Message[], options: PromptOptions): OpenRouterRequest {
    const body: OpenRouterRequest = {
      model: this.model,
      stream: true,
      stream_options: { include_usage: true },
      max_tokens: options.maxTokens,
      messages: toChatMessages(messages, systemText(messages, options), 'system'),
    }

    if (options.temperature !== DEFAULT_TEMPERATURE) body.temperature = options.temperature
    if (options.stopSequences.length > 0) body.stop = [...options.stopSequences]
    if (options.tools.length > 0) body.tools = toChatTools(options.tools)
    if (options.reasoning) body.reasoning = { effort: options.reasoning }

    return body
  }

  protected createAdapter(): OpenRouterStreamAdapter {
    return new OpenRouterStreamAdapter()
  }
}
