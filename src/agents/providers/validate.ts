import { RequestError, formatZodIssues } from '../errors.js'
import {
  PromptOptionsSchema,
  type Message,
  type PromptOptions,
  type PromptOptionsInput,
} from './types.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse tool-call argument text into a JSON object. Empty text counts as `{}`.
 * Returns null when the text is not a JSON object.
 */
export function parseToolArguments(text: string): Record<string, unknown> | null {
  if (text.trim() === '') return {}
  const value = parseJson(text)
  return isRecord(value) ? value : null
}

/** JSON.parse that yields undefined for text that is not JSON. */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/** Apply defaults and validate; throws RequestError on bad options. */
export function normalizeOptions(input: PromptOptionsInput = {}): PromptOptions {
  const parsed = PromptOptionsSchema.safeParse(input)
  if (!parsed.success) {
    throw new RequestError('Invalid prompt options', formatZodIssues(parsed.error))
  }
  return { ...parsed.data, tools: input.tools ?? [] }
}

/**
 * Structural checks every provider shares:
 * - system messages only lead the conversation
 * - each tool result answers a call from the closest preceding assistant turn, once
 * - every tool call is answered before the conversation moves on
 */
export function conversationIssues(messages: readonly Message[]): string[] {
  if (messages.length === 0) return ['conversation must contain at least one message']

  const issues: string[] = []
  let started = false
  let unanswered = new Set<string>()

  const settle = (at: number) => {
    for (const callId of unanswered) {
      issues.push(`messages[${at}]: tool call ${callId} has no tool result`)
    }
    unanswered = new Set()
  }

  messages.forEach((msg, i) => {
    switch (msg.role) {
      case 'system':
        if (started) issues.push(`messages[${i}]: system messages must precede the conversation`)
        break
      case 'user':
        settle(i)
        started = true
        break
      case 'assistant':
        settle(i)
        started = true
        for (const call of msg.toolCalls ?? []) {
          if (unanswered.has(call.callId)) {
            issues.push(`messages[${i}]: duplicate tool call id ${call.callId}`)
          }
          if (parseToolArguments(call.arguments) === null) {
            issues.push(`messages[${i}]: arguments of tool call ${call.callId} are not a JSON object`)
          }
          unanswered.add(call.callId)
        }
        break
      case 'tool_result':
        started = true
        if (!unanswered.delete(msg.callId)) {
          issues.push(`messages[${i}]: tool result ${msg.callId} does not answer a pending tool call`)
        }
        break
    }
  })

  settle(messages.length)
  if (!started) issues.push('conversation must contain at least one non-system message')
  return issues
}

/** System text from the options followed by any leading system messages. */
export function systemText(messages: readonly Message[], options: PromptOptions): string {
  const parts: string[] = []
  if (options.systemPrompt) parts.push(options.systemPrompt)
  for (const msg of messages) {
    if (msg.role === 'system') parts.push(msg.content)
  }
  return parts.join('\n\n')
}
