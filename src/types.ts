import type { ILogger } from './logger'

// =================================================================================
// Sentinels
// =================================================================================

/** The virtual entry point every graph starts from. */
export const START = '__start__'

/** The virtual exit every terminal node must reach. */
export const END = '__end__'

export type Sentinel = typeof START | typeof END

/** Loose shape shared by every workflow state. */
export type StateRecord = Record<string, unknown>

// =================================================================================
// Node Interfaces
// =================================================================================

/** The context object passed to every node alongside the state. */
export interface NodeContext {
	/** The name the node was registered under. */
	nodeId: string
	/** Unique id of the run this invocation belongs to. */
	executionId: string
	logger: ILogger
}

/**
 * A unit of computation. Returns a partial update to merge into the state,
 * or `undefined` to leave the state unchanged.
 */
export type NodeFunction<TState extends object = StateRecord> = (
	state: Readonly<TState>,
	context: NodeContext,
) => Promise<Partial<TState> | undefined>

/** A registry mapping `uses` keys to node implementations. */
export type NodeRegistry<TState extends object = StateRecord> =
	| Map<string, NodeFunction<TState>>
	| Record<string, NodeFunction<TState>>

// =================================================================================
// Blueprint Interfaces (The Declarative Definition)
// =================================================================================

/** Defines the connection between two nodes, or a node and a sentinel. */
export interface EdgeDefinition {
	source: string
	target: string
}

/** Defines a single step in a blueprint. */
export interface NodeDefinition {
	id: string
	/** A key that resolves to an implementation in a registry. */
	uses: string
}

/** The serializable representation of a graph. */
export interface GraphBlueprint {
	id: string
	nodes: NodeDefinition[]
	edges: EdgeDefinition[]
}

/** The nodes and edges of a graph, as read by the analysis functions. */
export interface GraphTopology {
	readonly nodes: readonly Readonly<NodeDefinition>[]
	readonly edges: readonly Readonly<EdgeDefinition>[]
}

/** Read-only view of a compiled graph, sentinels included. */
export interface GraphView {
	readonly nodes: readonly string[]
	readonly edges: readonly Readonly<EdgeDefinition>[]
}

// =================================================================================
// Observability
// =================================================================================

/** Structured event types for execution tracing. */
export type TopicflowEvent =
	| { type: 'workflow:start', payload: { graphId: string, executionId: string } }
	| { type: 'workflow:finish', payload: { graphId: string, executionId: string } }
	| { type: 'workflow:error', payload: { graphId: string, executionId: string, nodeId: string, error: Error } }
	| { type: 'node:start', payload: { graphId: string, executionId: string, nodeId: string } }
	| { type: 'node:finish', payload: { graphId: string, executionId: string, nodeId: string, keys: string[] } }
	| { type: 'node:skipped', payload: { graphId: string, executionId: string, nodeId: string } }

/** Interface for a pluggable event bus. */
export interface IEventBus {
	emit: (event: TopicflowEvent) => void | Promise<void>
}

/** Options accepted by `GraphDefinition.compile`. */
export interface CompileOptions {
	/** A pluggable logger for consistent output. */
	logger?: ILogger
	/** A pluggable event bus for observability. */
	eventBus?: IEventBus
}
