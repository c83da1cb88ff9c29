import { StreamCancelledError } from '../agents/errors.js'
import type {
  AssembledToolCall,
  Chunk,
  Message,
  StopReason,
  Usage,
} from '../agents/providers/types.js'
import { ToolCallAssembler } from '../tools/assembler.js'
import type { TokenStream } from './token-stream.js'

/**
 * Drain a stream into the chunks manual pulling would have produced, up to
 * and including `end`.
 *
 * Rejects with the first stream error instead of returning a partial result,
 * and with StreamCancelledError when the stream is cancelled before `end`.
 * Streams are single-pass: a drained or cancelled stream yields nothing more.
 */
export async function allChunks(stream: TokenStream): Promise<Chunk[]> {
  const chunks: Chunk[] = []
  for (;;) {
    const result = await stream.next()
    if (result.done) break
    chunks.push(result.value)
  }

  const last = chunks[chunks.length - 1]
  if (last?.type !== 'end' && stream.status === 'cancelled') {
    throw new StreamCancelledError()
  }
  return chunks
}

export interface AssistantResponse {
  text: string
  thinking: string
  toolCalls: AssembledToolCall[]
  stopReason?: StopReason
  usage?: Usage
}

/**
 * Fold a chunk sequence into the complete response: joined text and
 * reasoning, plus each tool call with its concatenated argument text.
 */
export function toResponse(chunks: readonly Chunk[]): AssistantResponse {
  const response: AssistantResponse = { text: '', thinking: '', toolCalls: [] }
  const assembler = new ToolCallAssembler()

  for (const c of chunks) {
    if (c.type === 'token') response.text += c.text
    else if (c.type === 'thinking') response.thinking += c.text
    else if (c.type === 'end') {
      if (c.stopReason) response.stopReason = c.stopReason
      if (c.usage) response.usage = c.usage
    } else {
      const call = assembler.push(c)
      if (call) response.toolCalls.push(call)
    }
  }

  return response
}

/** The assistant turn to append to the conversation before the next prompt. */
export function toAssistantMessage(response: AssistantResponse): Message {
  if (response.toolCalls.length === 0) {
    return { role: 'assistant', content: response.text }
  }
  return { role: 'assistant', content: response.text, toolCalls: response.toolCalls }
}
