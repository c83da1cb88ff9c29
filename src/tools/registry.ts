import { formatZodIssues, InvalidArgumentsError, ToolExecutionError, UnknownToolError } from '../agents/errors.js'
import type { AssembledToolCall, Message, ToolDefinition } from '../agents/providers/types.js'
import { parseToolArguments } from '../agents/providers/validate.js'
import type { RegisteredTool, ToolDeclaration, ToolHandler, ToolSchema } from './types.js'

function serializeResult(value: unknown): string {
  if (typeof value === 'string') return value
  return JSON.stringify(value) ?? ''
}

/**
 * Validates completed tool calls against each tool's schema before invoking
 * its handler. Unknown tools and invalid arguments never reach a handler.
 */
export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>()

  register<T>(
    name: string,
    schema: ToolSchema<T>,
    handler: ToolHandler<T>,
    declaration: ToolDeclaration = {},
  ): this {
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`)
    }

    this.tools.set(name, {
      name,
      definition: {
        name,
        description: declaration.description ?? '',
        inputSchema: declaration.inputSchema ?? { type: 'object' },
      },
      prepare(args, callId) {
        const parsed = schema.safeParse(args)
        if (!parsed.success) return { ok: false, issues: formatZodIssues(parsed.error) }
        const call = { callId, name, arguments: parsed.data }
        return { ok: true, run: async () => handler(parsed.data, call) }
      },
    })
    return this
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  names(): string[] {
    return Array.from(this.tools.keys())
  }

  /**
   * Tool declarations for PromptOptions.tools.
   */
  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (t) => t.definition)
  }

  /**
   * Parse, validate and run one completed tool call, returning the
   * tool_result message for the next turn. Rejects with UnknownToolError,
   * InvalidArgumentsError or ToolExecutionError.
   */
  async tryDispatch(call: AssembledToolCall): Promise<Message> {
    const tool = this.tools.get(call.name)
    if (!tool) throw new UnknownToolError(call.callId, call.name)

    const args = parseToolArguments(call.arguments)
    if (args === null) {
      throw new InvalidArgumentsError(call.callId, call.name, call.arguments, [
        'arguments are not a JSON object',
      ])
    }

    const prepared = tool.prepare(args, call.callId)
    if (!prepared.ok) {
      throw new InvalidArgumentsError(call.callId, call.name, call.arguments, prepared.issues)
    }

    let output: unknown
    try {
      output = await prepared.run()
    } catch (err) {
      throw new ToolExecutionError(call.callId, call.name, err)
    }
    return { role: 'tool_result', callId: call.callId, content: serializeResult(output) }
  }
}
