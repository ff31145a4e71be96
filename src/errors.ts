import type { LinterIssue } from './linter'

/** Base class for every error raised by topicflow. */
export class TopicflowError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = 'TopicflowError'
	}
}

/**
 * Thrown when credentials or client settings are missing or invalid.
 * Raised before any graph is built.
 */
export class ConfigurationError extends TopicflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'CONFIGURATION_ERROR', options)
		this.name = 'ConfigurationError'
	}
}

/**
 * Thrown when a graph definition is structurally invalid.
 * Carries every issue found, not only the first one.
 */
export class GraphValidationError extends TopicflowError {
	constructor(
		message: string,
		public readonly issues: LinterIssue[] = [],
	) {
		super(message, 'GRAPH_VALIDATION_ERROR')
		this.name = 'GraphValidationError'
	}
}

/** Thrown by `addNode` when the name is already registered. */
export class DuplicateNodeError extends GraphValidationError {
	constructor(public readonly nodeId: string) {
		super(`Node '${nodeId}' is already registered.`, [
			{ code: 'DUPLICATE_NODE', message: `Node '${nodeId}' is already registered.`, nodeId },
		])
		this.name = 'DuplicateNodeError'
	}
}

/** Thrown by `addEdge` when an endpoint is neither a registered node nor a sentinel. */
export class UnknownNodeError extends GraphValidationError {
	constructor(
		public readonly nodeId: string,
		public readonly role: 'source' | 'target',
	) {
		const code = role === 'source' ? 'INVALID_EDGE_SOURCE' : 'INVALID_EDGE_TARGET'
		super(`Edge ${role} '${nodeId}' is not a registered node.`, [
			{ code, message: `Edge ${role} '${nodeId}' is not a registered node.`, nodeId },
		])
		this.name = 'UnknownNodeError'
	}
}

/** Thrown by a node when a field it needs from upstream is absent. */
export class MissingFieldError extends TopicflowError {
	constructor(
		public readonly field: string,
		public readonly nodeId?: string,
	) {
		super(
			nodeId
				? `Node '${nodeId}' requires '${field}' but it is missing from the state.`
				: `Required field '${field}' is missing from the state.`,
			'MISSING_FIELD',
		)
		this.name = 'MissingFieldError'
	}
}

/** Thrown when a workflow state fails schema validation. */
export class StateValidationError extends TopicflowError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(message, 'STATE_VALIDATION_ERROR')
		this.name = 'StateValidationError'
	}
}

/** Wraps a failure reported by the LLM provider (auth, quota, network, timeout). */
export class UpstreamCallError extends TopicflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, 'UPSTREAM_CALL_ERROR', options)
		this.name = 'UpstreamCallError'
	}
}
