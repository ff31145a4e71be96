import process from 'node:process'
import { z } from 'zod'
import type { LogLevel } from './logger'
import { ConfigurationError } from './errors'
import { LOG_LEVELS } from './logger'

export const DEFAULT_MODEL = 'llama-3.1-8b-instant'
export const DEFAULT_BASE_URL = 'https://api.groq.com/openai/v1'

export interface TopicflowConfig {
	apiKey: string
	model: string
	baseURL: string
	temperature?: number
	timeoutMs?: number
	logLevel: LogLevel
}

/** Values that take precedence over the environment, typically CLI flags. */
export type ConfigOverrides = Partial<Pick<TopicflowConfig, 'apiKey' | 'model' | 'baseURL' | 'temperature' | 'logLevel'>>

const blankToUndefined = (value: unknown) =>
	typeof value === 'string' && value.trim() === '' ? undefined : value

const envSchema = z.object({
	TOPICFLOW_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
	GROQ_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
	TOPICFLOW_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL)),
	TOPICFLOW_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
	TOPICFLOW_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).optional()),
	TOPICFLOW_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
	TOPICFLOW_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
})

/**
 * Reads the client configuration from environment variables.
 * `.env` files are not loaded here; the CLI entry point does that.
 * @throws ConfigurationError when a value is malformed or no API key is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): TopicflowConfig {
	const parsed = envSchema.safeParse(env)
	if (!parsed.success) {
		const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
		throw new ConfigurationError(`Invalid configuration: ${details}`, { cause: parsed.error })
	}

	const vars = parsed.data
	const apiKey = overrides.apiKey ?? vars.TOPICFLOW_API_KEY ?? vars.GROQ_API_KEY
	if (!apiKey) {
		throw new ConfigurationError('Missing API key: set GROQ_API_KEY or TOPICFLOW_API_KEY.')
	}

	return {
		apiKey,
		model: overrides.model ?? vars.TOPICFLOW_MODEL,
		baseURL: overrides.baseURL ?? vars.TOPICFLOW_BASE_URL,
		temperature: overrides.temperature ?? vars.TOPICFLOW_TEMPERATURE,
		timeoutMs: vars.TOPICFLOW_TIMEOUT_MS,
		logLevel: overrides.logLevel ?? vars.TOPICFLOW_LOG_LEVEL,
	}
}
