import Anthropic from '@anthropic-ai/sdk'
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
  type ReasoningEffort,
  type StopReason,
} from './types.js'
import { parseJson, parseToolArguments, systemText } from './validate.js'

export type ClaudeModel =
  | 'claude-3-7-sonnet-latest'
  | 'claude-3-7-sonnet-20250219'
  | 'claude-3-5-sonnet-latest'
  | 'claude-3-5-sonnet-20241022'
  | 'claude-3-5-haiku-latest'
  | 'claude-3-5-haiku-20241022'
  | 'claude-3-opus-latest'
  | 'claude-3-opus-20240229'
  | 'claude-3-haiku-20240307'
  | (string & {})

type ClaudeRequest = Anthropic.MessageCreateParamsStreaming

// ── Wire format ─────────────────────────────────────────────────────────────

const ContentBlockStart = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string() }),
  z.object({ type: z.literal('redacted_thinking') }),
  z.object({ type: z.literal('tool_use'), id: z.string(), name: z.string() }),
])

const ContentBlockDelta = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text_delta'), text: z.string() }),
  z.object({ type: z.literal('thinking_delta'), thinking: z.string() }),
  z.object({ type: z.literal('signature_delta'), signature: z.string() }),
  z.object({ type: z.literal('input_json_delta'), partial_json: z.string() }),
])

const ClaudeEvent = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message_start'),
    message: z.object({
      usage: z.object({ input_tokens: z.number() }).optional(),
    }),
  }),
  z.object({
    type: z.literal('content_block_start'),
    index: z.number().int(),
    content_block: ContentBlockStart,
  }),
  z.object({
    type: z.literal('content_block_delta'),
    index: z.number().int(),
    delta: ContentBlockDelta,
  }),
  z.object({ type: z.literal('content_block_stop'), index: z.number().int() }),
  z.object({
    type: z.literal('message_delta'),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.object({ output_tokens: z.number() }).optional(),
  }),
  z.object({ type: z.literal('message_stop') }),
  z.object({ type: z.literal('ping') }),
  z.object({
    type: z.literal('error'),
    error: z.object({ type: z.string(), message: z.string() }),
  }),
])

// Body of an HTTP error response
const ApiErrorBody = z.object({ error: z.object({ type: z.string() }) })

// An `event: error` frame; the SDK raises it instead of yielding it
const StreamedErrorEvent = z.object({
  error: z.object({ type: z.string(), message: z.string() }),
})

const SSE_ERROR_PREFIX = 'SSE Error: '

type OpenBlock =
  | { index: number; kind: 'text' | 'thinking' }
  | { index: number; kind: 'tool_use'; callId: string }

const DELTA_BLOCK: Record<z.infer<typeof ContentBlockDelta>['type'], OpenBlock['kind']> = {
  text_delta: 'text',
  thinking_delta: 'thinking',
  signature_delta: 'thinking',
  input_json_delta: 'tool_use',
}

function toStopReason(reason: string): StopReason {
  switch (reason) {
    case 'end_turn':
    case 'max_tokens':
    case 'stop_sequence':
    case 'tool_use':
      return reason
    case 'refusal':
      return 'content_filter'
    default:
      return 'other'
  }
}

/**
 * Messages API event stream. Content blocks arrive one at a time, so at most
 * one block (and therefore one tool call) is open at any moment.
 */
export class AnthropicStreamAdapter extends StreamAdapter {
  readonly provider = 'anthropic'

  private block: OpenBlock | null = null
  private inputTokens: number | undefined
  private outputTokens: number | undefined
  private stopReason: StopReason | undefined

  protected consume(frame: unknown): void {
    const event = this.parse(ClaudeEvent, frame)

    switch (event.type) {
      case 'ping':
        break
      case 'message_start':
        this.inputTokens = event.message.usage?.input_tokens
        break
      case 'content_block_start':
        this.startBlock(event.index, event.content_block)
        break
      case 'content_block_delta': {
        const block = this.expectBlock(event.index, event.delta.type)
        this.applyDelta(block, event.delta)
        break
      }
      case 'content_block_stop': {
        const block = this.expectBlock(event.index, 'content_block_stop')
        if (block.kind === 'tool_use') this.endToolCall(block.callId)
        this.block = null
        break
      }
      case 'message_delta':
        if (event.delta.stop_reason) this.stopReason = toStopReason(event.delta.stop_reason)
        if (event.usage) this.outputTokens = event.usage.output_tokens
        break
      case 'message_stop':
        if (this.block) throw this.malformed(`message_stop while block ${this.block.index} is open`)
        this.endStream({ stopReason: this.stopReason, usage: this.usage() })
        break
      case 'error':
        throw new ProviderError(event.error.message, { code: event.error.type })
    }
  }

  private startBlock(index: number, content: z.infer<typeof ContentBlockStart>): void {
    if (this.block) {
      throw this.malformed(`block ${index} started while block ${this.block.index} is open`)
    }
    switch (content.type) {
      case 'text':
        this.block = { index, kind: 'text' }
        this.text(content.text)
        break
      case 'thinking':
        this.block = { index, kind: 'thinking' }
        this.thinking(content.thinking)
        break
      case 'redacted_thinking':
        this.block = { index, kind: 'thinking' }
        break
      case 'tool_use':
        this.beginToolCall(content.id, content.name)
        this.block = { index, kind: 'tool_use', callId: content.id }
        break
    }
  }

  private expectBlock(index: number, event: string): OpenBlock {
    if (!this.block) throw this.malformed(`${event} for block ${index} with no open block`)
    if (this.block.index !== index) {
      throw this.malformed(`${event} for block ${index} while block ${this.block.index} is open`)
    }
    return this.block
  }

  private applyDelta(block: OpenBlock, delta: z.infer<typeof ContentBlockDelta>): void {
    if (DELTA_BLOCK[delta.type] !== block.kind) {
      throw this.malformed(`${delta.type} inside a ${block.kind} block`)
    }
    switch (delta.type) {
      case 'text_delta':
        this.text(delta.text)
        break
      case 'thinking_delta':
        this.thinking(delta.thinking)
        break
      case 'signature_delta':
        break
      case 'input_json_delta':
        if (block.kind === 'tool_use') this.toolArgument(block.callId, delta.partial_json)
        break
    }
  }

  private usage() {
    if (this.inputTokens === undefined && this.outputTokens === undefined) return undefined
    return { inputTokens: this.inputTokens ?? 0, outputTokens: this.outputTokens ?? 0 }
  }
}

/**
 * The SDK reports a mid-stream `event: error` as an APIConnectionError whose
 * message (or cause) holds the event data.
 */
function streamedErrorEvent(err: Error): z.infer<typeof StreamedErrorEvent>['error'] | null {
  const candidates = [err.message, err.cause instanceof Error ? err.cause.message : '']
  for (const text of candidates) {
    const data = text.startsWith(SSE_ERROR_PREFIX) ? text.slice(SSE_ERROR_PREFIX.length) : text
    const event = StreamedErrorEvent.safeParse(parseJson(data))
    if (event.success) return event.data.error
  }
  return null
}

// ── Request serialization ───────────────────────────────────────────────────

const MIN_THINKING_BUDGET = 1024

const THINKING_SHARE: Record<ReasoningEffort, number> = {
  low: 0.25,
  medium: 0.5,
  high: 0.75,
}

/** Thinking budget for an effort level: a share of maxTokens, at least 1024 and below maxTokens. */
export function thinkingBudget(maxTokens: number, effort: ReasoningEffort): number {
  const budget = Math.max(MIN_THINKING_BUDGET, Math.floor(maxTokens * THINKING_SHARE[effort]))
  return Math.min(budget, maxTokens - 1)
}

function toAssistantParam(msg: Extract<Message, { role: 'assistant' }>): Anthropic.MessageParam {
  if (!msg.toolCalls || msg.toolCalls.length === 0) {
    return { role: 'assistant', content: msg.content }
  }
  const blocks: Anthropic.ContentBlockParam[] = []
  if (msg.content) blocks.push({ type: 'text', text: msg.content })
  for (const call of msg.toolCalls) {
    blocks.push({
      type: 'tool_use',
      id: call.callId,
      name: call.name,
      input: parseToolArguments(call.arguments) ?? {},
    })
  }
  return { role: 'assistant', content: blocks }
}

/**
 * Convert our Message format to Anthropic's. Tool results travel as
 * tool_result blocks; consecutive results share one user message.
 */
function toAnthropicMessages(messages: readonly Message[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = []
  let results: Anthropic.ToolResultBlockParam[] | null = null

  for (const msg of messages) {
    if (msg.role === 'system') continue

    if (msg.role === 'tool_result') {
      const block: Anthropic.ToolResultBlockParam = {
        type: 'tool_result',
        tool_use_id: msg.callId,
        content: msg.content,
      }
      if (msg.isError) block.is_error = true
      if (results) {
        results.push(block)
      } else {
        results = [block]
        result.push({ role: 'user', content: results })
      }
      continue
    }

    results = null
    result.push(msg.role === 'user' ? { role: 'user', content: msg.content } : toAssistantParam(msg))
  }

  return result
}

export interface AnthropicBackendOptions extends BackendDescriptor<ClaudeModel> {
  /** Replaces the SDK call that opens the stream. */
  open?: RequestOpener<ClaudeRequest>
}

export class AnthropicBackend extends StreamingBackend<ClaudeRequest> {
  readonly id = 'anthropic'
  private readonly open: RequestOpener<ClaudeRequest>

  constructor(options: AnthropicBackendOptions) {
    super(options.model)
    if (options.open) {
      this.open = options.open
    } else {
      const client = new Anthropic({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 })
      this.open = (body, signal) => client.messages.create(body, { signal })
    }
  }

  /** Sugar for the constructor, reading ANTHROPIC_API_KEY and ANTHROPIC_BASE_URL. */
  static fromEnv(model: ClaudeModel, env?: Env): AnthropicBackend {
    const config = loadConfig(env)
    return new AnthropicBackend({
      model,
      apiKey: requireApiKey(config, 'anthropic'),
      baseUrl: config.anthropic.baseUrl,
    })
  }

  buildRequest(messages: readonly Message[], options: PromptOptions): ClaudeRequest {
    const body: ClaudeRequest = {
      model: this.model,
      max_tokens: options.maxTokens,
      stream: true,
      messages: toAnthropicMessages(messages),
    }

    const system = systemText(messages, options)
    if (system) body.system = system
    if (options.temperature !== DEFAULT_TEMPERATURE) body.temperature = options.temperature
    if (options.stopSequences.length > 0) body.stop_sequences = [...options.stopSequences]
    if (options.tools.length > 0) {
      body.tools = options.tools.map((t) => ({
        name: t.name,
        description: t.description,
        input_schema: t.inputSchema,
      }))
    }
    if (options.reasoning) {
      body.thinking = {
        type: 'enabled',
        budget_tokens: thinkingBudget(options.maxTokens, options.reasoning),
      }
    }

    return body
  }

  protected requestIssues(messages: readonly Message[], options: PromptOptions): string[] {
    const issues: string[] = []
    const first = messages.find((m) => m.role !== 'system')
    if (first && first.role !== 'user') {
      issues.push('the first non-system message must come from the user')
    }
    if (options.temperature > 1) {
      issues.push('temperature must be between 0 and 1')
    }
    if (options.reasoning) {
      if (options.maxTokens <= MIN_THINKING_BUDGET) {
        issues.push(`reasoning needs maxTokens above ${MIN_THINKING_BUDGET}`)
      }
      if (options.temperature !== DEFAULT_TEMPERATURE) {
        issues.push('reasoning requires the default temperature of 1')
      }
    }
    return issues
  }

  protected createAdapter(): AnthropicStreamAdapter {
    return new AnthropicStreamAdapter()
  }

  protected openStream(body: ClaudeRequest, signal: AbortSignal): Promise<AsyncIterable<unknown>> {
    return this.open(body, signal)
  }

  protected classifyError(err: unknown): StreamError {
    if (err instanceof StreamError) return err
    if (err instanceof Anthropic.APIUserAbortError) return new StreamCancelledError('Anthropic request aborted')
    if (err instanceof SyntaxError) {
      return new MalformedPayloadError(`Malformed anthropic payload: ${err.message}`, err.message)
    }
    if (err instanceof Anthropic.APIConnectionError) {
      const event = streamedErrorEvent(err)
      if (event) return new ProviderError(event.message, { code: event.type, cause: err })
      return new TransportError(err.message, { cause: err })
    }
    if (err instanceof Anthropic.APIError) {
      const body = ApiErrorBody.safeParse(err.error)
      return new ProviderError(err.message, {
        status: err.status,
        code: body.success ? body.data.error.type : undefined,
        cause: err,
      })
    }
    const message = err instanceof Error ? err.message : 'Anthropic stream failed'
    return new TransportError(message, { cause: err })
  }
}
