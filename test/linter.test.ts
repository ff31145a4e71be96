import type { EdgeDefinition, GraphBlueprint } from '../src/types'
import { describe, expect, it } from 'vitest'
import { lintGraph } from '../src/linter'
import { END, START } from '../src/types'

function graph(ids: string[], edges: EdgeDefinition[]): GraphBlueprint {
	return { id: 'test', nodes: ids.map(id => ({ id, uses: id })), edges }
}

function codes(blueprint: GraphBlueprint): string[] {
	return lintGraph(blueprint).issues.map(issue => issue.code)
}

describe('Graph Linter', () => {
	it('should return valid for a well-formed linear graph', () => {
		const result = lintGraph(graph(['A', 'B'], [
			{ source: START, target: 'A' },
			{ source: 'A', target: 'B' },
			{ source: 'B', target: END },
		]))
		expect(result.isValid).toBe(true)
		expect(result.issues).toHaveLength(0)
	})

	describe('Edge Integrity Checks', () => {
		it('should detect an edge whose target is not a registered node', () => {
			const result = lintGraph(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: 'ghost' },
			]))
			expect(result.isValid).toBe(false)
			expect(result.issues.map(i => i.code)).toEqual(['INVALID_EDGE_TARGET', 'UNREACHABLE_END'])
			expect(result.issues[0]).toEqual({
				code: 'INVALID_EDGE_TARGET',
				message: `Edge target 'ghost' does not correspond to a registered node.`,
				nodeId: 'ghost',
				relatedId: 'A',
			})
		})

		it('should detect an edge whose source is not a registered node', () => {
			expect(codes(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
				{ source: 'ghost', target: 'A' },
			]))).toEqual(['INVALID_EDGE_SOURCE'])
		})

		it('should detect a self loop, which is also a cycle', () => {
			expect(codes(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: 'A' },
				{ source: 'A', target: END },
			]))).toEqual(['SELF_LOOP', 'CYCLE'])
		})

		it('should detect a duplicate edge', () => {
			expect(codes(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
				{ source: 'A', target: END },
			]))).toEqual(['DUPLICATE_EDGE'])
		})

		it('should detect an edge into START', () => {
			expect(codes(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
				{ source: 'A', target: START },
			]))).toEqual(['EDGE_INTO_START'])
		})

		it('should detect an edge out of END', () => {
			expect(codes(graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
				{ source: END, target: 'A' },
			]))).toEqual(['EDGE_FROM_END'])
		})
	})

	describe('Topology Checks', () => {
		it('should detect a graph without an entry edge', () => {
			expect(codes(graph(['A'], [{ source: 'A', target: END }]))).toEqual(['MISSING_ENTRY', 'ORPHAN_NODE'])
		})

		it('should flag an empty graph as having no entry', () => {
			expect(codes(graph([], []))).toEqual(['MISSING_ENTRY'])
		})

		it('should detect a node not reachable from START', () => {
			const result = lintGraph(graph(['A', 'B'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
				{ source: 'B', target: END },
			]))
			expect(result.issues).toEqual([
				{ code: 'ORPHAN_NODE', message: `Node 'B' is not reachable from START.`, nodeId: 'B' },
			])
		})

		it('should detect a node from which END cannot be reached', () => {
			const result = lintGraph(graph(['A', 'B'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: 'B' },
				{ source: 'A', target: END },
			]))
			expect(result.issues).toEqual([
				{ code: 'UNREACHABLE_END', message: `END is not reachable from node 'B'.`, nodeId: 'B' },
			])
		})

		it('should detect a cycle', () => {
			const result = lintGraph(graph(['A', 'B'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: 'B' },
				{ source: 'B', target: 'A' },
				{ source: 'B', target: END },
			]))
			expect(result.issues).toEqual([
				{ code: 'CYCLE', message: 'Cycle detected: A -> B -> A.', nodeId: 'A' },
			])
		})
	})

	describe('Implementation Checks', () => {
		it('should detect a node whose implementation is missing from the registry', () => {
			const blueprint: GraphBlueprint = {
				id: 'test',
				nodes: [{ id: 'A', uses: 'missing' }],
				edges: [
					{ source: START, target: 'A' },
					{ source: 'A', target: END },
				],
			}
			const result = lintGraph(blueprint, {})
			expect(result.issues.map(i => i.code)).toEqual(['MISSING_NODE_IMPLEMENTATION'])
		})

		it('should accept a Map registry', () => {
			const blueprint = graph(['A'], [
				{ source: START, target: 'A' },
				{ source: 'A', target: END },
			])
			const registry = new Map([['A', async () => undefined]])
			expect(lintGraph(blueprint, registry).isValid).toBe(true)
		})

		it('should look implementations up by a custom key', () => {
			const blueprint: GraphBlueprint = {
				id: 'test',
				nodes: [{ id: 'A', uses: 'shared' }],
				edges: [
					{ source: START, target: 'A' },
					{ source: 'A', target: END },
				],
			}
			const registry = { shared: async () => undefined }
			expect(lintGraph(blueprint, registry).isValid).toBe(true)
			expect(lintGraph(blueprint, registry, { keyOf: node => node.id }).issues[0]).toEqual({
				code: 'MISSING_NODE_IMPLEMENTATION',
				message: `Node implementation key 'shared' is not found in the provided registry.`,
				nodeId: 'A',
			})
		})
	})
})
