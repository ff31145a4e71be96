import type { CompiledGraph } from './compiled'
import type { LLMClient } from './llm'
import type { BlogNodeOptions } from './nodes/blog'
import type { BlogState } from './state'
import type { CompileOptions } from './types'
import { GraphValidationError } from './errors'
import { GraphDefinition } from './graph'
import { BlogNode, CONTENT_GENERATION, TITLE_CREATION } from './nodes/blog'
import { blogStateChannel } from './state'
import { END, START } from './types'

export const USECASES = ['topic'] as const

/** The closed set of topologies `setup` can build. */
export type Usecase = typeof USECASES[number]

export function isUsecase(value: string): value is Usecase {
	return USECASES.some(usecase => usecase === value)
}

export interface GraphBuilderOptions extends CompileOptions, BlogNodeOptions {}

/**
 * Assembles the blog generation topologies on top of `GraphDefinition`.
 * Each call builds a fresh definition; the builder keeps no graph state.
 */
export class GraphBuilder {
	private readonly topologies: Record<Usecase, () => GraphDefinition<BlogState>>

	constructor(
		private readonly llm: LLMClient,
		private readonly options: GraphBuilderOptions = {},
	) {
		this.topologies = {
			topic: () => this.buildTopicGraph(),
		}
	}

	/** START -> title_creation -> content_generation -> END */
	buildTopicGraph(): GraphDefinition<BlogState> {
		const blogNode = new BlogNode(this.llm, { strict: this.options.strict })

		return new GraphDefinition<BlogState>('blog-from-topic', blogStateChannel)
			.addNode(TITLE_CREATION, blogNode.titleCreation)
			.addNode(CONTENT_GENERATION, blogNode.contentGeneration)
			.addEdge(START, TITLE_CREATION)
			.addEdge(TITLE_CREATION, CONTENT_GENERATION)
			.addEdge(CONTENT_GENERATION, END)
	}

	/**
	 * Builds and compiles the topology registered for `usecase`.
	 * @throws GraphValidationError when the usecase is not one of `USECASES`.
	 */
	setup(usecase: string): CompiledGraph<BlogState> {
		if (!isUsecase(usecase)) {
			const message = `Unknown usecase '${usecase}'. Expected one of: ${USECASES.join(', ')}.`
			throw new GraphValidationError(message, [{ code: 'UNKNOWN_USECASE', message }])
		}

		return this.topologies[usecase]().compile({
			logger: this.options.logger,
			eventBus: this.options.eventBus,
		})
	}
}
