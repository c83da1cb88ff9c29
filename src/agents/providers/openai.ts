import OpenAI from 'openai'
import { z } from 'zod'
import { loadConfig, requireApiKey, type Env } from '../../config/loader.js'
import { StreamAdapter } from '../../streaming/adapter.js'
import {
  MalformedPayloadError,
  ProviderError,
  StreamCancelledError,
  StreamError,
  TransportError,
} from '../errors.js'
import { StreamingBackend, type RequestOpener } from './base.js'
import {
  DEFAULT_TEMPERATURE,
  type BackendDescriptor,
  type Message,
  type PromptOptions,
  type StopReason,
  type ToolDefinition,
  type Usage,
} from './types.js'
import { systemText } from './validate.js'

export type GptModel =
  | 'gpt-4o'
  | 'gpt-4o-2024-08-06'
  | 'chatgpt-4o-latest'
  | 'gpt-4o-mini'
  | 'gpt-4o-mini-2024-07-18'
  | 'o1'
  | 'o1-2024-12-17'
  | 'o1-mini'
  | 'o3-mini'
  | 'o3-mini-2025-01-31'
  | (string & {})

export type ChatCompletionsRequest = OpenAI.ChatCompletionCreateParamsStreaming

// ── Wire format ─────────────────────────────────────────────────────────────

const ToolCallDelta = z.object({
  index: z.number().int(),
  id: z.string().nullish(),
  type: z.literal('function').nullish(),
  function: z.object({
    name: z.string().nullish(),
    arguments: z.string().nullish(),
  }).nullish(),
})

export const ChatDeltaSchema = z.object({
  role: z.string().nullish(),
  content: z.string().nullish(),
  tool_calls: z.array(ToolCallDelta).nullish(),
}).passthrough()

export type ChatDelta = z.infer<typeof ChatDeltaSchema>

const ChatCompletionChunk = z.object({
  choices: z.array(z.object({
    index: z.number().int(),
    delta: ChatDeltaSchema,
    finish_reason: z.string().nullish(),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).nullish(),
})

function toStopReason(reason: string): StopReason {
  switch (reason) {
    case 'stop':
      return 'end_turn'
    case 'length':
      return 'max_tokens'
    case 'tool_calls':
    case 'function_call':
      return 'tool_use'
    case 'content_filter':
      return 'content_filter'
    default:
      return 'other'
  }
}

/**
 * Chat Completions chunk stream. Tool calls are keyed by their `index`; the
 * id and name arrive with the first fragment of each call. A call ends when
 * the next index starts or when `finish_reason` arrives. The stream itself
 * ends when the transport closes after `finish_reason` (a trailing usage
 * chunk may come in between).
 */
export class OpenAIStreamAdapter extends StreamAdapter {
  readonly provider: string = 'openai'

  private readonly callsByIndex = new Map<number, string>()
  private openCall: { index: number; callId: string } | null = null
  private finishReason: StopReason | null = null
  private usage: Usage | undefined

  protected consume(frame: unknown): void {
    const chunk = this.parse(ChatCompletionChunk, frame)

    if (chunk.usage) {
      this.usage = {
        inputTokens: chunk.usage.prompt_tokens,
        outputTokens: chunk.usage.completion_tokens,
      }
    }

    const choice = chunk.choices.find((c) => c.index === 0)
    if (!choice) return

    if (this.finishReason !== null && (choice.delta.content || choice.delta.tool_calls?.length)) {
      throw this.malformed('delta received after finish_reason')
    }
    this.consumeDelta(choice.delta)

    if (choice.finish_reason) {
      for (const callId of this.openToolCalls) this.endToolCall(callId)
      this.openCall = null
      this.finishReason = toStopReason(choice.finish_reason)
    }
  }

  protected consumeDelta(delta: ChatDelta): void {
    if (delta.content) this.text(delta.content)
    for (const call of delta.tool_calls ?? []) {
      this.consumeToolCall(call)
    }
  }

  protected onTransportEnd(): void {
    if (this.finishReason === null) {
      throw new TransportError(`${this.provider} stream closed before a finish_reason was received`)
    }
    this.endStream({ stopReason: this.finishReason, usage: this.usage })
  }

  private consumeToolCall(call: z.infer<typeof ToolCallDelta>): void {
    let callId = this.callsByIndex.get(call.index)

    if (callId === undefined) {
      if (!call.id) throw this.malformed(`tool call at index ${call.index} started without an id`)
      if (this.openCall) this.endToolCall(this.openCall.callId)
      this.beginToolCall(call.id, call.function?.name ?? '')
      callId = call.id
      this.callsByIndex.set(call.index, callId)
      this.openCall = { index: call.index, callId }
    } else {
      if (this.openCall?.index !== call.index) {
        throw this.malformed(`fragment for tool call ${callId}, which has already ended`)
      }
      if (call.id && call.id !== callId) {
        throw this.malformed(`tool call at index ${call.index} changed id from ${callId} to ${call.id}`)
      }
    }

    const fragment = call.function?.arguments
    if (fragment) this.toolArgument(callId, fragment)
  }
}

// ── Request serialization ───────────────────────────────────────────────────

export type SystemRole = 'system' | 'developer'

/** o-series reasoning models take instructions under the developer role. */
export function systemRoleFor(model: string): SystemRole {
  return /^o\d/.test(model) ? 'developer' : 'system'
}

/**
 * Convert our Message format to Chat Completions messages. Tool results
 * become separate tool messages.
 */
export function toChatMessages(
  messages: readonly Message[],
  system: string,
  systemRole: SystemRole,
): OpenAI.ChatCompletionMessageParam[] {
  const result: OpenAI.ChatCompletionMessageParam[] = []

  if (system) {
    result.push(systemRole === 'developer'
      ? { role: 'developer', content: system }
      : { role: 'system', content: system })
  }

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        break
      case 'user':
        result.push({ role: 'user', content: msg.content })
        break
      case 'assistant':
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          result.push({
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((call) => ({
              id: call.callId,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments || '{}' },
            })),
          })
        } else {
          result.push({ role: 'assistant', content: msg.content })
        }
        break
      case 'tool_result':
        result.push({ role: 'tool', tool_call_id: msg.callId, content: msg.content })
        break
    }
  }

  return result
}

export function toChatTools(tools: readonly ToolDefinition[]): OpenAI.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }))
}

/** Maps OpenAI SDK failures (also used for OpenRouter) into stream errors. */
export function classifyOpenAIError(err: unknown, provider: string): StreamError {
  if (err instanceof StreamError) return err
  if (err instanceof OpenAI.APIUserAbortError) return new StreamCancelledError(`${provider} request aborted`)
  if (err instanceof SyntaxError) {
    return new MalformedPayloadError(`Malformed ${provider} payload: ${err.message}`, err.message)
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransportError(err.message, { cause: err })
  }
  if (err instanceof OpenAI.APIError) {
    return new ProviderError(err.message, {
      status: err.status,
      // In-band stream errors carry whatever `code` the server sent, often a number
      code: err.code == null ? undefined : String(err.code),
      cause: err,
    })
  }
  const message = err instanceof Error ? err.message : `${provider} stream failed`
  return new TransportError(message, { cause: err })
}

export interface OpenAIBackendOptions extends BackendDescriptor<GptModel> {
  /** Replaces the SDK call that opens the stream. */
  open?: RequestOpener<ChatCompletionsRequest>
}

export class OpenAIBackend extends StreamingBackend<ChatCompletionsRequest> {
  readonly id: string = 'openai'
  private readonly open: RequestOpener<ChatCompletionsRequest>

  constructor(options: OpenAIBackendOptions) {
    super(options.model)
    if (options.open) {
      this.open = options.open
    } else {
      const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 })
      this.open = (body, signal) => client.chat.completions.create(body, { signal })
    }
  }

  /** Sugar for the constructor, reading OPENAI_API_KEY and OPENAI_BASE_URL. */
  static fromEnv(model: GptModel, env?: Env): OpenAIBackend {
    const config = loadConfig(env)
    return new OpenAIBackend({
      model,
      apiKey: requireApiKey(config, 'openai'),
      baseUrl: config.openai.baseUrl,
    })
  }

  buildRequest(messages: readonly Message[], options: PromptOptions): ChatCompletionsRequest {
    const body: ChatCompletionsRequest = {
      model: this.model,
      stream: true,
      stream_options: { include_usage: true },
      max_completion_tokens: options.maxTokens,
      messages: toChatMessages(messages, systemText(messages, options), systemRoleFor(this.model)),
    }

    if (options.temperature !== DEFAULT_TEMPERATURE) body.temperature = options.temperature
    if (options.stopSequences.length > 0) body.stop = [...options.stopSequences]
    if (options.tools.length > 0) body.tools = toChatTools(options.tools)
    if (options.reasoning) body.reasoning_effort = options.reasoning

    return body
  }

  protected createAdapter(): StreamAdapter {
    return new OpenAIStreamAdapter()
  }

  protected openStream(body: ChatCompletionsRequest, signal: AbortSignal): Promise<AsyncIterable<unknown>> {
    return this.open(body, signal)
  }

  protected classifyError(err: unknown): StreamError {
    return classifyOpenAIError(err, this.id)
  }
}
