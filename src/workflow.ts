import type { Usecase } from './builder'
import type { CompiledGraph } from './compiled'
import type { TopicflowConfig } from './config'
import type { LLMClient } from './llm'
import type { ILogger } from './logger'
import type { BlogState } from './state'
import type { IEventBus } from './types'
import { GraphBuilder } from './builder'
import { loadConfig } from './config'
import { ConfigurationError } from './errors'
import { createLLMClient } from './llm'

export interface BlogWorkflowOptions {
	/** Client configuration. Read from the environment when omitted. */
	config?: TopicflowConfig
	/** A ready-made client. Takes precedence over `config`. */
	llm?: LLMClient
	usecase?: Usecase
	logger?: ILogger
	eventBus?: IEventBus
	strict?: boolean
}

/**
 * Builds the LLM client and the compiled graph for a host entry point.
 * Nothing is constructed until this is called.
 */
export function createBlogWorkflow(options: BlogWorkflowOptions = {}): CompiledGraph<BlogState> {
	const llm = options.llm ?? createLLMClient(options.config ?? loadConfig())
	const builder = new GraphBuilder(llm, {
		logger: options.logger,
		eventBus: options.eventBus,
		strict: options.strict,
	})
	return builder.setup(options.usecase ?? 'topic')
}

/** Runs the topic graph once and returns the final state. */
export async function generateBlog(topic: string, options: BlogWorkflowOptions = {}): Promise<BlogState> {
	return createBlogWorkflow(options).run({ topic })
}

const offlineClient: LLMClient = {
	generate: async () => {
		throw new ConfigurationError('This graph was built for inspection only and cannot call a model.')
	},
}

/**
 * Compiles a topology without credentials, for visualization and
 * introspection tools. Running it fails on the first model call.
 */
export function inspectTopology(usecase = 'topic'): CompiledGraph<BlogState> {
	return new GraphBuilder(offlineClient).setup(usecase)
}
