import OpenAI from 'openai'
import type { TopicflowConfig } from './config'
import { UpstreamCallError } from './errors'

/** The capability every node uses to talk to a language model. */
export interface LLMClient {
	generate: (prompt: string) => Promise<string>
}

export interface OpenAIChatClientOptions {
	apiKey: string
	model: string
	/** Any OpenAI-compatible chat completions endpoint. */
	baseURL?: string
	temperature?: number
	/** Request timeout in milliseconds, enforced by the SDK. */
	timeout?: number
	/** Retries performed by the SDK itself. Defaults to 0. */
	maxRetries?: number
}

/**
 * An `LLMClient` backed by the `openai` SDK. Works against OpenAI itself or
 * any compatible provider (Groq, OpenRouter, a local server) via `baseURL`.
 */
export class OpenAIChatClient implements LLMClient {
	private readonly client: OpenAI

	constructor(private readonly options: OpenAIChatClientOptions) {
		this.client = new OpenAI({
			apiKey: options.apiKey,
			baseURL: options.baseURL,
			timeout: options.timeout,
			maxRetries: options.maxRetries ?? 0,
		})
	}

	get model(): string {
		return this.options.model
	}

	async generate(prompt: string): Promise<string> {
		try {
			const response = await this.client.chat.completions.create({
				model: this.options.model,
				messages: [{ role: 'user', content: prompt }],
				temperature: this.options.temperature,
			})
			return response.choices[0]?.message.content ?? ''
		}
		catch (error) {
			const reason = error instanceof Error ? error.message : String(error)
			throw new UpstreamCallError(`LLM call to model '${this.options.model}' failed: ${reason}`, { cause: error })
		}
	}
}

export function createLLMClient(config: TopicflowConfig): LLMClient {
	return new OpenAIChatClient({
		apiKey: config.apiKey,
		model: config.model,
		baseURL: config.baseURL,
		temperature: config.temperature,
		timeout: config.timeoutMs,
	})
}
