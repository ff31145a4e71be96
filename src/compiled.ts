import type { ILogger } from './logger'
import type { StateChannel } from './state'
import type { GraphBlueprint, GraphTopology, GraphView, IEventBus, NodeFunction, TopicflowEvent } from './types'
import { generateMermaid } from './analysis'
import { NullLogger } from './logger'
import { END, START } from './types'

/** A node paired with its position in the execution order. */
export interface CompiledStep<TState extends object> {
	readonly id: string
	readonly execute: NodeFunction<TState>
}

export interface CompiledGraphInit<TState extends object> {
	id: string
	blueprint: GraphBlueprint
	steps: CompiledStep<TState>[]
	channel: StateChannel<TState>
	logger?: ILogger
	eventBus?: IEventBus
}

function freezeTopology(blueprint: GraphBlueprint): GraphTopology {
	return Object.freeze({
		nodes: Object.freeze(blueprint.nodes.map(node => Object.freeze({ ...node }))),
		edges: Object.freeze(blueprint.edges.map(edge => Object.freeze({ ...edge }))),
	})
}

/**
 * The immutable, validated and executable form of a graph definition.
 * Holds no per-run data: every call to `run` threads its own state.
 */
export class CompiledGraph<TState extends object> {
	public readonly id: string
	/** Node names in the order `run` executes them. */
	public readonly order: readonly string[]
	private readonly topology: GraphTopology
	private readonly steps: readonly CompiledStep<TState>[]
	private readonly channel: StateChannel<TState>
	private readonly logger: ILogger
	private readonly eventBus?: IEventBus

	constructor(init: CompiledGraphInit<TState>) {
		this.id = init.id
		this.topology = freezeTopology(init.blueprint)
		this.steps = Object.freeze(init.steps.map(step => Object.freeze({ ...step })))
		this.order = Object.freeze(this.steps.map(step => step.id))
		this.channel = init.channel
		this.logger = init.logger ?? new NullLogger()
		this.eventBus = init.eventBus
		Object.freeze(this)
	}

	/**
	 * Drives a state through every node in order and returns the final state.
	 * A node error aborts the run and is rethrown unchanged.
	 */
	async run(initialState: TState): Promise<TState> {
		const executionId = globalThis.crypto.randomUUID()
		const graphId = this.id
		let state = this.channel.create(initialState)

		this.logger.debug(`Starting run of graph '${graphId}'`, { executionId, order: [...this.order] })
		await this.emit({ type: 'workflow:start', payload: { graphId, executionId } })

		for (const step of this.steps) {
			const nodeId = step.id
			await this.emit({ type: 'node:start', payload: { graphId, executionId, nodeId } })

			let update: Partial<TState> | undefined
			try {
				update = await step.execute(state, { nodeId, executionId, logger: this.logger })
				if (update !== undefined)
					state = this.channel.apply(state, update)
			}
			catch (error) {
				await this.fail(error, { graphId, executionId, nodeId })
				throw error
			}

			if (update === undefined) {
				this.logger.debug(`Node '${nodeId}' returned no update`, { executionId })
				await this.emit({ type: 'node:skipped', payload: { graphId, executionId, nodeId } })
				continue
			}
			this.logger.debug(`Node '${nodeId}' finished`, { executionId, keys: Object.keys(update) })
			await this.emit({ type: 'node:finish', payload: { graphId, executionId, nodeId, keys: Object.keys(update) } })
		}

		await this.emit({ type: 'workflow:finish', payload: { graphId, executionId } })
		this.logger.debug(`Finished run of graph '${graphId}'`, { executionId })
		return state
	}

	/** Read-only view of the graph for visualization and introspection tools. */
	getGraph(): GraphView {
		return Object.freeze({
			nodes: Object.freeze([START, ...this.order, END]),
			edges: this.topology.edges,
		})
	}

	/** A detached, serializable copy of the compiled blueprint. */
	toBlueprint(): GraphBlueprint {
		return {
			id: this.id,
			nodes: this.topology.nodes.map(node => ({ ...node })),
			edges: this.topology.edges.map(edge => ({ ...edge })),
		}
	}

	toMermaid(): string {
		return generateMermaid(this.topology)
	}

	/** Reports a node failure. A bus that rejects here never masks the node's error. */
	private async fail(error: unknown, ids: { graphId: string, executionId: string, nodeId: string }): Promise<void> {
		const err = error instanceof Error ? error : new Error(String(error))
		this.logger.error(`Node '${ids.nodeId}' failed: ${err.message}`, { executionId: ids.executionId, error: err.name })
		try {
			await this.emit({ type: 'workflow:error', payload: { ...ids, error: err } })
		}
		catch (busError) {
			const reason = busError instanceof Error ? busError.message : String(busError)
			this.logger.warn(`Could not deliver 'workflow:error' for node '${ids.nodeId}': ${reason}`, { executionId: ids.executionId })
		}
	}

	private async emit(event: TopicflowEvent): Promise<void> {
		await this.eventBus?.emit(event)
	}
}
