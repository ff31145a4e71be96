import type { GraphBlueprint } from '../src/types'
import { describe, expect, it } from 'vitest'
import { analyzeGraph, checkForCycles, generateMermaid, topologicalSort } from '../src/analysis'
import { END, START } from '../src/types'

function linear(...ids: string[]): GraphBlueprint {
	const chain = [START, ...ids, END]
	return {
		id: 'test',
		nodes: ids.map(id => ({ id, uses: id })),
		edges: chain.slice(1).map((target, index) => ({ source: chain[index], target })),
	}
}

describe('Graph Analysis', () => {
	describe('checkForCycles', () => {
		it('should return an empty array for a valid DAG', () => {
			expect(checkForCycles(linear('A', 'B', 'C'))).toEqual([])
		})

		it('should detect a simple two-node cycle', () => {
			const blueprint: GraphBlueprint = {
				id: 'test',
				nodes: [
					{ id: 'A', uses: 'A' },
					{ id: 'B', uses: 'B' },
				],
				edges: [
					{ source: 'A', target: 'B' },
					{ source: 'B', target: 'A' },
				],
			}
			expect(checkForCycles(blueprint)).toEqual([['A', 'B', 'A']])
		})

		it('should ignore sentinel edges', () => {
			expect(checkForCycles(linear('A'))).toEqual([])
		})

		it('should return no cycles for an empty graph', () => {
			expect(checkForCycles({ nodes: [], edges: [] })).toEqual([])
		})
	})

	describe('topologicalSort', () => {
		it('should order a linear chain', () => {
			expect(topologicalSort(linear('A', 'B', 'C'))).toEqual(['A', 'B', 'C'])
		})

		it('should break ties by declaration order', () => {
			const blueprint: GraphBlueprint = {
				id: 'diamond',
				nodes: [
					{ id: 'A', uses: 'A' },
					{ id: 'C', uses: 'C' },
					{ id: 'B', uses: 'B' },
					{ id: 'D', uses: 'D' },
				],
				edges: [
					{ source: START, target: 'A' },
					{ source: 'A', target: 'B' },
					{ source: 'A', target: 'C' },
					{ source: 'B', target: 'D' },
					{ source: 'C', target: 'D' },
					{ source: 'D', target: END },
				],
			}
			expect(topologicalSort(blueprint)).toEqual(['A', 'C', 'B', 'D'])
		})

		it('should return null when the graph has a cycle', () => {
			const blueprint: GraphBlueprint = {
				id: 'cycle',
				nodes: [
					{ id: 'A', uses: 'A' },
					{ id: 'B', uses: 'B' },
				],
				edges: [
					{ source: START, target: 'A' },
					{ source: 'A', target: 'B' },
					{ source: 'B', target: 'A' },
				],
			}
			expect(topologicalSort(blueprint)).toBeNull()
		})
	})

	describe('analyzeGraph', () => {
		it('should identify entry and exit nodes', () => {
			const analysis = analyzeGraph(linear('A', 'B', 'C'))
			expect(analysis.entryNodeIds).toEqual(['A'])
			expect(analysis.exitNodeIds).toEqual(['C'])
			expect(analysis.nodeCount).toBe(3)
			expect(analysis.edgeCount).toBe(4)
			expect(analysis.isDag).toBe(true)
		})

		it('should compute reachability in both directions', () => {
			const blueprint = linear('A', 'B')
			blueprint.nodes.push({ id: 'orphan', uses: 'orphan' })
			const analysis = analyzeGraph(blueprint)
			expect(analysis.reachableFromStart.has('B')).toBe(true)
			expect(analysis.reachableFromStart.has('orphan')).toBe(false)
			expect(analysis.reachesEnd.has('A')).toBe(true)
			expect(analysis.reachesEnd.has('orphan')).toBe(false)
		})
	})

	describe('generateMermaid', () => {
		it('should render sentinels, nodes and edges', () => {
			expect(generateMermaid(linear('A', 'B'))).toBe(
				'flowchart TD\n'
				+ '    start([START])\n'
				+ '    A["A"]\n'
				+ '    B["B"]\n'
				+ '    end_([END])\n'
				+ '    start --> A\n'
				+ '    A --> B\n'
				+ '    B --> end_\n',
			)
		})

		it('should sanitize node ids for mermaid', () => {
			expect(generateMermaid(linear('draft-post'))).toContain('    draft_post["draft-post"]\n')
		})

		it('should render a placeholder for an empty graph', () => {
			expect(generateMermaid({ nodes: [], edges: [] })).toBe('flowchart TD\n    empty[Empty Graph]')
		})
	})
})
