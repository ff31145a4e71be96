import type { NodeContext } from '../src/types'
import { vi } from 'vitest'
import { NullLogger } from '../src/logger'

export const TITLE = 'Rust vs Go: A Deep Dive'
export const CONTENT = '## Intro\n...'

/** An in-process LLM that answers title prompts and content prompts differently. */
export function createStubLLM(responses: { title: string, content: string } = { title: TITLE, content: CONTENT }) {
	const generate = vi.fn(async (prompt: string) =>
		prompt.includes('blog title') ? responses.title : responses.content,
	)
	return { generate }
}

export function nodeContext(nodeId: string): NodeContext {
	return { nodeId, executionId: 'test-run', logger: new NullLogger() }
}
