import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors.js'

// Schema

const tokenAverageSchema = (input: number, output: number) =>
  z
    .object({
      input: z.number().nonnegative().default(input),
      output: z.number().nonnegative().default(output)
    })
    .default({})

export const CostConfigSchema = z
  .object({
    // USD per token.
    prices: z
      .object({
        input: z.number().nonnegative().default(0.15 / 1_000_000),
        output: z.number().nonnegative().default(0.6 / 1_000_000)
      })
      .default({}),
    averages: z
      .object({
        classification: tokenAverageSchema(300, 1),
        blog: tokenAverageSchema(350, 700),
        social: tokenAverageSchema(300, 220)
      })
      .default({}),
    assumedSelectedFraction: z.number().min(0).max(1).default(0.4)
  })
  .default({})

export const ConfigSchema = z.object({
  feeds: z
    .array(z.string().trim().url('Every feed must be an absolute URL'))
    .min(1, "Config must have a non-empty array 'feeds'"),
  model: z.string().trim().min(1, "Config must have a non-empty string 'model'").default('gpt-4o-mini'),
  baseURL: z
    .string()
    .trim()
    .url()
    .optional(),
  lookbackDays: z.number().int().positive().default(30),
  language: z.string().trim().min(1).default('Czech'),
  socialVoices: z
    .tuple([z.string().trim().min(1), z.string().trim().min(1), z.string().trim().min(1)])
    .default(['Law firm', 'Managing partner (formal)', 'Managing partner (playful)']),
  siteDir: z.string().trim().min(1).default('site'),
  siteTitle: z.string().trim().min(1).default('Legal news digest'),
  htmlLang: z.string().trim().min(1).default('cs'),
  timeZone: z
    .string()
    .default('Europe/Prague')
    .refine(isValidTimeZone, 'timeZone must be an IANA time zone name'),
  concurrentLimit: z.number().int().min(1).default(4),
  costs: CostConfigSchema
})

// Types

export type Config = z.infer<typeof ConfigSchema>

export type CostConfig = z.infer<typeof CostConfigSchema>

export interface ConfigOverrides {
  model?: string
  lookbackDays?: number
}

// Helpers

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })

    return true
  } catch {
    return false
  }
}

function parseDays(value: string, label: string): number {
  const days = Number(value)

  if (!Number.isInteger(days) || days <= 0) {
    throw new ConfigError(`${label} must be a positive integer, got "${value}"`)
  }

  return days
}

// Flags win over the environment; the environment wins over config.json.
export function resolveOverrides(
  env: NodeJS.ProcessEnv,
  flags: { model?: string; days?: string }
): ConfigOverrides {
  const overrides: ConfigOverrides = {}

  const model = flags.model?.trim() || env.MODEL_NAME?.trim()

  if (model) overrides.model = model

  if (flags.days !== undefined) {
    overrides.lookbackDays = parseDays(flags.days, '--days')
  } else if (env.DAYS_BACK?.trim()) {
    overrides.lookbackDays = parseDays(env.DAYS_BACK.trim(), 'DAYS_BACK')
  }

  return overrides
}

export function parseConfig(data: unknown, overrides: ConfigOverrides = {}): Config {
  const result = ConfigSchema.safeParse(data)

  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''

    throw new ConfigError(`Invalid config: ${path}${issue?.message ?? result.error.message}`)
  }

  return {
    ...result.data,
    ...(overrides.model && { model: overrides.model }),
    ...(overrides.lookbackDays !== undefined && { lookbackDays: overrides.lookbackDays })
  }
}

export function resolveApiKey(env: NodeJS.ProcessEnv): string {
  const key = env.OPENAI_API_KEY?.trim()

  if (!key) throw new ConfigError('OPENAI_API_KEY must be set')

  return key
}

// Main Function

export async function loadConfig(overrides: ConfigOverrides = {}, cwd = process.cwd()): Promise<Config> {
  const path = join(cwd, 'config.json')

  let raw: string

  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)

    throw new ConfigError(`Config file not found or unreadable (${path}): ${message}`)
  }

  let data: unknown

  try {
    data = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${path}`)
  }

  return parseConfig(data, overrides)
}
