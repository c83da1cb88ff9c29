import { z } from 'zod'

const ProviderConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
}).default({})

export const ConfigSchema = z.object({
  anthropic: ProviderConfigSchema,
  openai: ProviderConfigSchema,
  openrouter: ProviderConfigSchema,
  debug: z.boolean().default(false),
})

export type Config = z.infer<typeof ConfigSchema>
export type ProviderName = 'anthropic' | 'openai' | 'openrouter'
export type ProviderConfig = Config[ProviderName]
