import type { GraphTopology, NodeRegistry } from './types'
import { analyzeGraph } from './analysis'
import { END, START } from './types'

export type LinterIssueCode =
	| 'CYCLE'
	| 'DUPLICATE_EDGE'
	| 'DUPLICATE_NODE'
	| 'EDGE_FROM_END'
	| 'EDGE_INTO_START'
	| 'INVALID_EDGE_SOURCE'
	| 'INVALID_EDGE_TARGET'
	| 'INVALID_NODE_NAME'
	| 'MISSING_ENTRY'
	| 'MISSING_NODE_IMPLEMENTATION'
	| 'ORPHAN_NODE'
	| 'SELF_LOOP'
	| 'UNKNOWN_USECASE'
	| 'UNREACHABLE_END'

export interface LinterIssue {
	code: LinterIssueCode
	message: string
	nodeId?: string
	relatedId?: string
}

export interface LintOptions {
	/** Registry key of a node's implementation. Defaults to its `uses` key. */
	keyOf?: (node: GraphTopology['nodes'][number]) => string
}

export interface LinterResult {
	isValid: boolean
	issues: LinterIssue[]
}

function registryKeys<TState extends object>(registry: NodeRegistry<TState>): Set<string> {
	return registry instanceof Map ? new Set(registry.keys()) : new Set(Object.keys(registry))
}

/**
 * Statically analyzes a graph to find structural errors before
 * it is compiled. When a registry is given, every node's `uses` key is also
 * checked against it.
 */
export function lintGraph<TState extends object>(
	blueprint: GraphTopology,
	registry?: NodeRegistry<TState>,
	options: LintOptions = {},
): LinterResult {
	const issues: LinterIssue[] = []
	const nodeIds = new Set(blueprint.nodes.map(n => n.id))

	// 1. Missing node implementations
	if (registry) {
		const keys = registryKeys(registry)
		const keyOf = options.keyOf ?? ((node: GraphTopology['nodes'][number]) => node.uses)
		for (const node of blueprint.nodes) {
			if (!keys.has(keyOf(node))) {
				issues.push({
					code: 'MISSING_NODE_IMPLEMENTATION',
					message: `Node implementation key '${node.uses}' is not found in the provided registry.`,
					nodeId: node.id,
				})
			}
		}
	}

	// 2. Edge integrity
	const seenEdges = new Set<string>()
	for (const edge of blueprint.edges) {
		if (edge.source === END) {
			issues.push({ code: 'EDGE_FROM_END', message: `END cannot have outgoing edges (to '${edge.target}').`, relatedId: edge.target })
		}
		else if (edge.source !== START && !nodeIds.has(edge.source)) {
			issues.push({
				code: 'INVALID_EDGE_SOURCE',
				message: `Edge source '${edge.source}' does not correspond to a registered node.`,
				nodeId: edge.source,
				relatedId: edge.target,
			})
		}

		if (edge.target === START) {
			issues.push({ code: 'EDGE_INTO_START', message: `START cannot have incoming edges (from '${edge.source}').`, relatedId: edge.source })
		}
		else if (edge.target !== END && !nodeIds.has(edge.target)) {
			issues.push({
				code: 'INVALID_EDGE_TARGET',
				message: `Edge target '${edge.target}' does not correspond to a registered node.`,
				nodeId: edge.target,
				relatedId: edge.source,
			})
		}

		if (edge.source === edge.target) {
			issues.push({ code: 'SELF_LOOP', message: `Node '${edge.source}' has an edge to itself.`, nodeId: edge.source })
		}

		const key = `${edge.source}->${edge.target}`
		if (seenEdges.has(key)) {
			issues.push({
				code: 'DUPLICATE_EDGE',
				message: `Edge '${edge.source}' -> '${edge.target}' is declared more than once.`,
				nodeId: edge.source,
				relatedId: edge.target,
			})
		}
		seenEdges.add(key)
	}

	// 3. Topology
	const analysis = analyzeGraph(blueprint)
	if (!blueprint.edges.some(e => e.source === START)) {
		issues.push({ code: 'MISSING_ENTRY', message: 'Graph has no edge from START.' })
	}

	for (const cycle of analysis.cycles) {
		issues.push({ code: 'CYCLE', message: `Cycle detected: ${cycle.join(' -> ')}.`, nodeId: cycle[0] })
	}

	for (const nodeId of nodeIds) {
		if (!analysis.reachableFromStart.has(nodeId)) {
			issues.push({ code: 'ORPHAN_NODE', message: `Node '${nodeId}' is not reachable from START.`, nodeId })
		}
		else if (!analysis.reachesEnd.has(nodeId)) {
			issues.push({ code: 'UNREACHABLE_END', message: `END is not reachable from node '${nodeId}'.`, nodeId })
		}
	}

	return {
		isValid: issues.length === 0,
		issues,
	}
}
