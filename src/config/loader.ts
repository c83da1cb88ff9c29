import { config as loadDotenv } from 'dotenv'
import { setDebugLogging } from '../logger.js'
import { ConfigSchema, type Config, type ProviderConfig, type ProviderName } from './schema.js'

// Load .env file from project root
loadDotenv()

export type Env = Record<string, string | undefined>

const ENV_PREFIX: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC',
  openai: 'OPENAI',
  openrouter: 'OPENROUTER',
}

function providerFromEnv(env: Env, provider: ProviderName): Record<string, string> {
  const prefix = ENV_PREFIX[provider]
  const section: Record<string, string> = {}
  const apiKey = env[`${prefix}_API_KEY`]
  const baseUrl = env[`${prefix}_BASE_URL`]
  if (apiKey) section.apiKey = apiKey
  if (baseUrl) section.baseUrl = baseUrl
  return section
}

export function loadConfig(env: Env = process.env): Config {
  const config = ConfigSchema.parse({
    anthropic: providerFromEnv(env, 'anthropic'),
    openai: providerFromEnv(env, 'openai'),
    openrouter: providerFromEnv(env, 'openrouter'),
    debug: ['1', 'true'].includes(env['TOKENFLOW_DEBUG'] ?? ''),
  })
  if (config.debug) setDebugLogging(true)
  return config
}

export function requireApiKey(config: Config, provider: ProviderName): string {
  const section: ProviderConfig = config[provider]
  if (!section.apiKey) {
    throw new Error(
      `${ENV_PREFIX[provider]}_API_KEY environment variable is required. ` +
      'Set it in your .env file or shell environment.'
    )
  }
  return section.apiKey
}
