export type {
  AssembledToolCall,
  Backend,
  BackendDescriptor,
  Chunk,
  ChunkOf,
  JsonSchemaObject,
  Message,
  MessageRole,
  PromptOptions,
  PromptOptionsInput,
  PromptRequestOptions,
  ReasoningEffort,
  StopReason,
  ToolDefinition,
  Usage,
} from './agents/providers/types.js'
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  PromptOptionsSchema,
} from './agents/providers/types.js'
export { chunk, ChunkEmitter, isTerminal } from './agents/chunks.js'
export {
  InvalidArgumentsError,
  MalformedPayloadError,
  ProviderError,
  RequestError,
  StreamCancelledError,
  StreamError,
  ToolError,
  ToolExecutionError,
  TransportError,
  UnknownToolError,
  type StreamErrorKind,
  type ToolErrorKind,
} from './agents/errors.js'

export { StreamingBackend, type RequestOpener } from './agents/providers/base.js'
export {
  AnthropicBackend,
  AnthropicStreamAdapter,
  type AnthropicBackendOptions,
  type ClaudeModel,
} from './agents/providers/anthropic.js'
export {
  OpenAIBackend,
  OpenAIStreamAdapter,
  type GptModel,
  type OpenAIBackendOptions,
} from './agents/providers/openai.js'
export {
  OpenRouterBackend,
  OpenRouterStreamAdapter,
  type OpenRouterBackendOptions,
} from './agents/providers/openrouter.js'
export { createBackend, parseModelRef, type ModelRef } from './agents/model-ref.js'
export { runConversation, type ConversationOptions, type ConversationResult } from './agents/runner.js'

export { StreamAdapter, type AdapterState, type AdapterStep } from './streaming/adapter.js'
export { SdkTransport, type Transport } from './streaming/transport.js'
export { TokenStream, type StreamStatus } from './streaming/token-stream.js'
export {
  allChunks,
  toAssistantMessage,
  toResponse,
  type AssistantResponse,
} from './streaming/aggregate.js'

export { ToolRegistry } from './tools/registry.js'
export { ToolCallAssembler } from './tools/assembler.js'
export type { ToolCall, ToolDeclaration, ToolHandler } from './tools/types.js'

export { loadConfig, requireApiKey } from './config/loader.js'
export type { Config } from './config/schema.js'
export { createLogger, setDebugLogging } from './logger.js'
