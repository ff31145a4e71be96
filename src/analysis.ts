import type { EdgeDefinition, GraphTopology } from './types'
import { END, START } from './types'

/**
 * A list of cycles found in the graph. Each cycle is an array of node IDs.
 */
export type Cycles = string[][]

/**
 * Analysis result for a graph
 */
export interface GraphAnalysis {
	/** Cycles found in the graph */
	cycles: Cycles
	/** Node IDs wired directly from START */
	entryNodeIds: string[]
	/** Node IDs wired directly to END */
	exitNodeIds: string[]
	/** Node IDs reachable from START */
	reachableFromStart: Set<string>
	/** Node IDs from which END can be reached */
	reachesEnd: Set<string>
	/** Total number of nodes, sentinels excluded */
	nodeCount: number
	/** Total number of edges, sentinel edges included */
	edgeCount: number
	/** Whether the graph is a valid DAG (no cycles) */
	isDag: boolean
}

export function isSentinel(id: string): boolean {
	return id === START || id === END
}

function adjacency(edges: readonly EdgeDefinition[], reverse = false): Map<string, string[]> {
	const adj = new Map<string, string[]>()
	for (const edge of edges) {
		const from = reverse ? edge.target : edge.source
		const to = reverse ? edge.source : edge.target
		const list = adj.get(from)
		if (list)
			list.push(to)
		else
			adj.set(from, [to])
	}
	return adj
}

function reachable(origin: string, adj: Map<string, string[]>): Set<string> {
	const seen = new Set<string>()
	const toVisit = [...(adj.get(origin) ?? [])]
	let current = toVisit.pop()
	while (current !== undefined) {
		if (!seen.has(current)) {
			seen.add(current)
			toVisit.push(...(adj.get(current) ?? []))
		}
		current = toVisit.pop()
	}
	return seen
}

/**
 * Detects cycles among the graph's nodes. Sentinel edges cannot take part
 * in a cycle and are ignored.
 * @returns An array of cycles found. Each cycle is represented as an array of node IDs.
 */
export function checkForCycles(blueprint: GraphTopology): Cycles {
	const cycles: Cycles = []
	if (blueprint.nodes.length === 0) {
		return cycles
	}

	const adj = adjacency(blueprint.edges.filter(e => !isSentinel(e.source) && !isSentinel(e.target)))
	const visited = new Set<string>()
	const recursionStack = new Set<string>()

	function detectCycleUtil(nodeId: string, path: string[]) {
		visited.add(nodeId)
		recursionStack.add(nodeId)
		path.push(nodeId)

		for (const neighbor of adj.get(nodeId) ?? []) {
			if (recursionStack.has(neighbor)) {
				const cycleStartIndex = path.indexOf(neighbor)
				cycles.push([...path.slice(cycleStartIndex), neighbor])
			}
			else if (!visited.has(neighbor)) {
				detectCycleUtil(neighbor, path)
			}
		}

		recursionStack.delete(nodeId)
		path.pop()
	}

	for (const node of blueprint.nodes) {
		if (!visited.has(node.id)) {
			detectCycleUtil(node.id, [])
		}
	}

	return cycles
}

/**
 * Computes a topological order of the graph's nodes with Kahn's algorithm.
 * Ties are broken by the order in which nodes were declared, so the result is
 * deterministic for a given blueprint.
 * @returns The ordered node IDs, or `null` when the graph contains a cycle.
 */
export function topologicalSort(blueprint: GraphTopology): string[] | null {
	const position = new Map(blueprint.nodes.map((node, index) => [node.id, index]))
	const inDegree = new Map(blueprint.nodes.map(node => [node.id, 0]))
	const internalEdges = blueprint.edges.filter(e => position.has(e.source) && position.has(e.target))
	for (const edge of internalEdges) {
		inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1)
	}
	const adj = adjacency(internalEdges)
	const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0)

	const ready = blueprint.nodes.map(n => n.id).filter(id => inDegree.get(id) === 0)
	const order: string[] = []
	let current = ready.shift()
	while (current !== undefined) {
		order.push(current)
		for (const neighbor of adj.get(current) ?? []) {
			const remaining = (inDegree.get(neighbor) ?? 0) - 1
			inDegree.set(neighbor, remaining)
			if (remaining === 0) {
				ready.push(neighbor)
				ready.sort(byPosition)
			}
		}
		current = ready.shift()
	}

	return order.length === blueprint.nodes.length ? order : null
}

/**
 * Analyzes a graph and returns comprehensive analysis
 * @returns Analysis result with cycles, entry/exit nodes, reachability and other metrics
 */
export function analyzeGraph(blueprint: GraphTopology): GraphAnalysis {
	const cycles = checkForCycles(blueprint)
	const forward = adjacency(blueprint.edges)
	const backward = adjacency(blueprint.edges, true)

	return {
		cycles,
		entryNodeIds: blueprint.edges.filter(e => e.source === START && !isSentinel(e.target)).map(e => e.target),
		exitNodeIds: blueprint.edges.filter(e => e.target === END && !isSentinel(e.source)).map(e => e.source),
		reachableFromStart: reachable(START, forward),
		reachesEnd: reachable(END, backward),
		nodeCount: blueprint.nodes.length,
		edgeCount: blueprint.edges.length,
		isDag: cycles.length === 0,
	}
}

function mermaidId(id: string): string {
	if (id === START)
		return 'start'
	if (id === END)
		return 'end_'
	return id.replace(/\W/g, '_')
}

/**
 * Generates Mermaid diagram syntax from a graph topology
 * @returns Mermaid syntax string for the flowchart
 */
export function generateMermaid(blueprint: GraphTopology): string {
	if (blueprint.nodes.length === 0) {
		return 'flowchart TD\n    empty[Empty Graph]'
	}

	let mermaid = 'flowchart TD\n'
	mermaid += `    ${mermaidId(START)}([START])\n`
	for (const node of blueprint.nodes) {
		mermaid += `    ${mermaidId(node.id)}["${node.id.replace(/"/g, '')}"]\n`
	}
	mermaid += `    ${mermaidId(END)}([END])\n`

	for (const edge of blueprint.edges) {
		mermaid += `    ${mermaidId(edge.source)} --> ${mermaidId(edge.target)}\n`
	}

	return mermaid
}
