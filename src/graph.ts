import type { StateChannel } from './state'
import type { CompileOptions, EdgeDefinition, GraphBlueprint, NodeDefinition, NodeFunction, NodeRegistry } from './types'
import { isSentinel, topologicalSort } from './analysis'
import { CompiledGraph } from './compiled'
import { DuplicateNodeError, GraphValidationError, UnknownNodeError } from './errors'
import { lintGraph } from './linter'
import { END, START } from './types'

function resolve<TState extends object>(registry: NodeRegistry<TState>, key: string): NodeFunction<TState> | undefined {
	return registry instanceof Map ? registry.get(key) : registry[key]
}

/**
 * A mutable builder for a graph of named nodes and the directed edges
 * between them. Call `compile` to obtain a runnable graph.
 */
export class GraphDefinition<TState extends object> {
	private declarations: NodeDefinition[] = []
	/** Keyed by node id, so a later `addNode` can never rebind an existing node. */
	private implementations = new Map<string, NodeFunction<TState>>()
	private edges: EdgeDefinition[] = []

	constructor(
		public readonly id: string,
		private readonly channel: StateChannel<TState>,
	) {}

	/**
	 * Builds a definition from a serializable blueprint, resolving each node's
	 * `uses` key in the registry once, here. Invalid or duplicate node ids throw
	 * immediately; unresolved keys and dangling edges are reported by `compile`.
	 */
	static fromBlueprint<TState extends object>(
		blueprint: GraphBlueprint,
		registry: NodeRegistry<TState>,
		channel: StateChannel<TState>,
	): GraphDefinition<TState> {
		const definition = new GraphDefinition(blueprint.id, channel)
		for (const node of blueprint.nodes) {
			definition.declare(node.id, node.uses)
			const implementation = resolve(registry, node.uses)
			if (implementation)
				definition.implementations.set(node.id, implementation)
		}
		definition.edges.push(...blueprint.edges.map(edge => ({ source: edge.source, target: edge.target })))
		return definition
	}

	addNode(name: string, execute: NodeFunction<TState>): this {
		this.declare(name, name)
		this.implementations.set(name, execute)
		return this
	}

	addEdge(source: string, target: string): this {
		if (source !== START && !this.hasNode(source)) {
			throw new UnknownNodeError(source, 'source')
		}
		if (target !== END && !this.hasNode(target)) {
			throw new UnknownNodeError(target, 'target')
		}
		this.edges.push({ source, target })
		return this
	}

	hasNode(name: string): boolean {
		return this.declarations.some(node => node.id === name)
	}

	/**
	 * Validates the definition and freezes it into a `CompiledGraph`.
	 * Compiling the same unmodified definition twice yields the same order.
	 * @throws GraphValidationError listing every structural defect found.
	 */
	compile(options: CompileOptions = {}): CompiledGraph<TState> {
		const blueprint = this.toBlueprint()
		const { isValid, issues } = lintGraph(blueprint, this.implementations, { keyOf: node => node.id })
		if (!isValid) {
			const summary = issues.map(issue => issue.message).join(' ')
			throw new GraphValidationError(`Graph '${this.id}' is invalid: ${summary}`, issues)
		}

		const order = topologicalSort(blueprint)
		if (!order) {
			throw new GraphValidationError(`Graph '${this.id}' has no topological order.`)
		}

		const steps = order.map((nodeId) => {
			const execute = this.implementations.get(nodeId)
			if (!execute) {
				throw new GraphValidationError(`Node '${nodeId}' has no implementation.`)
			}
			return { id: nodeId, execute }
		})

		options.logger?.debug(`Compiled graph '${this.id}'`, { order })
		return new CompiledGraph({
			id: this.id,
			blueprint,
			steps,
			channel: this.channel,
			logger: options.logger,
			eventBus: options.eventBus,
		})
	}

	/** A detached, serializable copy of the current definition. */
	toBlueprint(): GraphBlueprint {
		return {
			id: this.id,
			nodes: this.declarations.map(node => ({ ...node })),
			edges: this.edges.map(edge => ({ ...edge })),
		}
	}

	private declare(name: string, uses: string): void {
		if (name.trim() === '' || isSentinel(name)) {
			throw new GraphValidationError(`'${name}' is not a valid node name.`, [
				{ code: 'INVALID_NODE_NAME', message: `'${name}' is not a valid node name.`, nodeId: name },
			])
		}
		if (this.hasNode(name)) {
			throw new DuplicateNodeError(name)
		}
		this.declarations.push({ id: name, uses })
	}
}
