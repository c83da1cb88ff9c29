import type { z } from 'zod'
import type { JsonSchemaObject, ToolDefinition } from '../agents/providers/types.js'

/** A tool call whose arguments passed the tool's schema. */
export interface ToolCall<T> {
  callId: string
  name: string
  arguments: T
}

/**
 * Application code behind a tool. A string result is sent back verbatim,
 * anything else as JSON.
 */
export type ToolHandler<T> = (args: T, call: ToolCall<T>) => unknown

export interface ToolDeclaration {
  description?: string
  /** JSON Schema the provider sees; defaults to an unconstrained object. */
  inputSchema?: JsonSchemaObject
}

export type ToolSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export type PreparedCall =
  | { ok: true; run: () => Promise<unknown> }
  | { ok: false; issues: string[] }

/** A registered tool with its argument type erased behind `prepare`. */
export interface RegisteredTool {
  name: string
  definition: ToolDefinition
  prepare(args: unknown, callId: string): PreparedCall
}
