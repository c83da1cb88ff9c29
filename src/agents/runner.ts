import { StreamCancelledError, ToolError } from './errors.js'
import type {
  AssembledToolCall,
  Backend,
  Chunk,
  Message,
  PromptOptionsInput,
} from './providers/types.js'
import { toAssistantMessage, toResponse, type AssistantResponse } from '../streaming/aggregate.js'
import type { ToolRegistry } from '../tools/registry.js'

export interface ConversationOptions {
  backend: Backend
  messages: readonly Message[]
  options?: PromptOptionsInput
  /** Tools offered to the model; their definitions are added to the options. */
  registry?: ToolRegistry
  /** Sees every chunk as it arrives. */
  onChunk?: (chunk: Chunk) => void
  signal?: AbortSignal
  maxTurns?: number
}

export interface ConversationResult {
  /** The input conversation followed by every message the loop added. */
  messages: Message[]
  response: AssistantResponse
  turns: number
}

const DEFAULT_MAX_TURNS = 10

/**
 * Run a conversation until the model answers without calling a tool.
 *
 * Each turn:
 * 1. Prompt the backend and stream the chunks to onChunk
 * 2. Append the assistant message, including its tool calls
 * 3. Dispatch every tool call through the registry and append the results
 * 4. Prompt again with the extended conversation
 *
 * A tool error is reported back to the model as an error tool result rather
 * than ending the conversation. Stream errors propagate to the caller.
 */
export async function runConversation(opts: ConversationOptions): Promise<ConversationResult> {
  const { backend, registry, onChunk, signal } = opts
  const maxTurns = opts.maxTurns ?? DEFAULT_MAX_TURNS
  const messages = [...opts.messages] // Don't mutate the original
  const options: PromptOptionsInput = registry
    ? { ...opts.options, tools: [...(opts.options?.tools ?? []), ...registry.definitions()] }
    : { ...opts.options }

  for (let turn = 1; turn <= maxTurns; turn++) {
    const stream = backend.prompt(messages, options, { signal })
    const chunks: Chunk[] = []

    for await (const chunk of stream) {
      onChunk?.(chunk)
      chunks.push(chunk)
    }
    if (stream.status === 'cancelled') throw new StreamCancelledError()

    const response = toResponse(chunks)
    messages.push(toAssistantMessage(response))

    if (response.toolCalls.length === 0) {
      return { messages, response, turns: turn }
    }

    for (const call of response.toolCalls) {
      messages.push(await dispatch(registry, call))
    }
  }

  throw new Error(`Conversation did not finish within ${maxTurns} turns`)
}

async function dispatch(
  registry: ToolRegistry | undefined,
  call: AssembledToolCall,
): Promise<Message> {
  if (!registry) {
    return { role: 'tool_result', callId: call.callId, content: 'No tools are available', isError: true }
  }
  try {
    return await registry.tryDispatch(call)
  } catch (err) {
    if (!(err instanceof ToolError)) throw err
    return { role: 'tool_result', callId: call.callId, content: err.message, isError: true }
  }
}
