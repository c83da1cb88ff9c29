import type { Config, ProviderName } from '../config/schema.js'
import { requireApiKey } from '../config/loader.js'
import { AnthropicBackend } from './providers/anthropic.js'
import { OpenAIBackend } from './providers/openai.js'
import { OpenRouterBackend } from './providers/openrouter.js'
import type { Backend } from './providers/types.js'

export interface ModelRef {
  provider: ProviderName
  model: string
}

const PROVIDERS: readonly ProviderName[] = ['anthropic', 'openai', 'openrouter']

function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value)
}

/**
 * Parse a model reference string like "anthropic/claude-3-5-haiku-latest"
 * into its provider and model components. Everything after the first slash
 * is the model, so "openrouter/meta-llama/llama-3.3-70b-instruct" works.
 */
export function parseModelRef(ref: string): ModelRef {
  const slashIdx = ref.indexOf('/')
  if (slashIdx === -1) {
    throw new Error(`Invalid model ref "${ref}": expected "provider/model" format`)
  }

  const provider = ref.slice(0, slashIdx)
  const model = ref.slice(slashIdx + 1)

  if (!provider || !model) {
    throw new Error(`Invalid model ref "${ref}": provider and model must be non-empty`)
  }
  if (!isProviderName(provider)) {
    throw new Error(`Invalid model ref "${ref}": unknown provider "${provider}" (expected ${PROVIDERS.join(', ')})`)
  }

  return { provider, model }
}

/** Build the backend a model reference names, with credentials from config. */
export function createBackend(ref: string, config: Config): Backend {
  const { provider, model } = parseModelRef(ref)
  const descriptor = {
    model,
    apiKey: requireApiKey(config, provider),
    baseUrl: config[provider].baseUrl,
  }

  switch (provider) {
    case 'anthropic':
      return new AnthropicBackend(descriptor)
    case 'openai':
      return new OpenAIBackend(descriptor)
    case 'openrouter':
      return new OpenRouterBackend(descriptor)
  }
}
