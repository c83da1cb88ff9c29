import { z } from 'zod'
import type { TokenStream } from '../../streaming/token-stream.js'

export const DEFAULT_MAX_TOKENS = 4096
export const DEFAULT_TEMPERATURE = 1.0

export type StopReason =
  | 'end_turn'
  | 'max_tokens'
  | 'stop_sequence'
  | 'tool_use'
  | 'content_filter'
  | 'other'

export interface Usage {
  inputTokens: number
  outputTokens: number
}

/**
 * One unit of a streamed response. Tokens concatenate to the assistant text;
 * argument fragments for a call id concatenate to its argument JSON.
 */
export type Chunk =
  | { type: 'token'; text: string }
  | { type: 'thinking'; text: string }
  | { type: 'tool_call_start'; callId: string; name: string }
  | { type: 'tool_call_argument'; callId: string; fragment: string }
  | { type: 'tool_call_end'; callId: string }
  | { type: 'end'; stopReason?: StopReason; usage?: Usage }

export type ChunkOf<T extends Chunk['type']> = Extract<Chunk, { type: T }>

/** A tool invocation whose arguments have been fully received but not yet parsed. */
export interface AssembledToolCall {
  readonly callId: string
  readonly name: string
  readonly arguments: string
}

export type Message =
  | { readonly role: 'system'; readonly content: string }
  | { readonly role: 'user'; readonly content: string }
  | {
      readonly role: 'assistant'
      readonly content: string
      readonly toolCalls?: readonly AssembledToolCall[]
    }
  | {
      readonly role: 'tool_result'
      readonly callId: string
      readonly content: string
      readonly isError?: boolean
    }

export type MessageRole = Message['role']

/** JSON Schema describing a tool's arguments, as sent to the provider. */
export interface JsonSchemaObject {
  type: 'object'
  properties?: Record<string, unknown>
  required?: string[]
  [key: string]: unknown
}

export interface ToolDefinition {
  name: string
  description: string
  inputSchema: JsonSchemaObject
}

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/

export const ToolDefinitionSchema = z.object({
  name: z.string().regex(TOOL_NAME_PATTERN, 'tool names must match ^[a-zA-Z0-9_-]{1,64}$'),
  description: z.string(),
  inputSchema: z.object({ type: z.literal('object') }).passthrough(),
})

export const ReasoningEffortSchema = z.enum(['low', 'medium', 'high'])
export type ReasoningEffort = z.infer<typeof ReasoningEffortSchema>

export const PromptOptionsSchema = z.object({
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  systemPrompt: z.string().optional(),
  stopSequences: z.array(z.string().min(1)).default([]),
  tools: z.array(ToolDefinitionSchema).default([])
    .refine(
      (tools) => new Set(tools.map((t) => t.name)).size === tools.length,
      'tool names must be unique',
    ),
  reasoning: ReasoningEffortSchema.optional(),
})

/** Options after defaults have been applied. */
export interface PromptOptions {
  readonly maxTokens: number
  readonly temperature: number
  readonly systemPrompt?: string
  readonly stopSequences: readonly string[]
  readonly tools: readonly ToolDefinition[]
  readonly reasoning?: ReasoningEffort
}

/** Options as a caller writes them; every field has a default. */
export interface PromptOptionsInput {
  maxTokens?: number
  temperature?: number
  systemPrompt?: string
  stopSequences?: readonly string[]
  tools?: readonly ToolDefinition[]
  reasoning?: ReasoningEffort
}

export interface PromptRequestOptions {
  /** Aborting the signal cancels the returned stream. */
  signal?: AbortSignal
}

export interface BackendDescriptor<M extends string = string> {
  apiKey: string
  model: M
  baseUrl?: string
}

export interface Backend {
  readonly id: string
  readonly model: string
  /**
   * Validate the conversation, issue the streamed request and return the
   * stream without waiting for the response. Throws RequestError before any
   * I/O when the request is invalid.
   */
  prompt(
    messages: readonly Message[],
    options?: PromptOptionsInput,
    request?: PromptRequestOptions,
  ): TokenStream
}
