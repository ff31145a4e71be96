import type { LLMClient } from '../llm'
import type { BlogState } from '../state'
import type { NodeContext, NodeFunction } from '../types'
import { MissingFieldError } from '../errors'
import { contentPrompt, titlePrompt } from './prompts'

export const TITLE_CREATION = 'title_creation'
export const CONTENT_GENERATION = 'content_generation'

export interface BlogNodeOptions {
	/** Raise `MissingFieldError` instead of skipping when `topic` is absent. */
	strict?: boolean
}

/**
 * The two LLM-backed steps of blog generation. Each step makes exactly one
 * call to the client and returns a partial state update.
 */
export class BlogNode {
	constructor(
		private readonly llm: LLMClient,
		private readonly options: BlogNodeOptions = {},
	) {}

	titleCreation: NodeFunction<BlogState> = async (state, context) => {
		const topic = this.topicOf(state, context)
		if (!topic)
			return undefined

		const title = await this.llm.generate(titlePrompt(topic))
		return { blog: { title } }
	}

	contentGeneration: NodeFunction<BlogState> = async (state, context) => {
		const topic = this.topicOf(state, context)
		if (!topic)
			return undefined

		const title = state.blog?.title
		if (title === undefined) {
			throw new MissingFieldError('blog.title', context.nodeId)
		}

		const content = await this.llm.generate(contentPrompt(topic))
		// blog is replaced wholesale on merge, so the title is carried over explicitly
		return { blog: { title, content } }
	}

	private topicOf(state: Readonly<BlogState>, { nodeId, logger }: NodeContext): string | undefined {
		if (state.topic)
			return state.topic

		if (this.options.strict) {
			throw new MissingFieldError('topic', nodeId)
		}
		logger.debug(`Node '${nodeId}' skipped: no topic in state`)
		return undefined
	}
}
