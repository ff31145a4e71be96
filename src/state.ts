import { z } from 'zod'
import { StateValidationError } from './errors'

/**
 * Validates and merges workflow states for one graph. The engine never touches
 * a state except through its channel.
 */
export interface StateChannel<TState extends object> {
	/** Parses the caller's initial state into a fresh object. */
	create: (initial: unknown) => TState
	/** Merges a node's partial update and validates the result. */
	apply: (state: TState, update: Partial<TState>) => TState
}

export interface StateChannelOptions<TState extends object> {
	/**
	 * Checks a merge against the state it replaces. Returns one message per
	 * violated rule; an empty array accepts the transition.
	 */
	transition?: (previous: TState, next: TState) => string[]
}

/**
 * Shallow, key-wise merge. Every key present in `update` replaces the
 * corresponding key of `state`; nested objects are replaced wholesale.
 */
export function mergeState<TState extends object>(state: TState, update: Partial<TState>): TState {
	return { ...state, ...update }
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue =>
		issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
	)
}

export function createStateChannel<TState extends object>(
	schema: z.ZodType<TState, z.ZodTypeDef, unknown>,
	options: StateChannelOptions<TState> = {},
): StateChannel<TState> {
	const parse = (value: unknown, label: string): TState => {
		const result = schema.safeParse(value)
		if (!result.success) {
			const issues = formatIssues(result.error)
			throw new StateValidationError(`${label}: ${issues.join('; ')}`, issues)
		}
		return result.data
	}

	return {
		create: initial => parse(initial ?? {}, 'Invalid initial state'),
		apply: (state, update) => {
			const next = parse(mergeState(state, update), 'Invalid state after merge')
			const violations = options.transition?.(state, next) ?? []
			if (violations.length > 0) {
				throw new StateValidationError(`Invalid state transition: ${violations.join('; ')}`, violations)
			}
			return next
		},
	}
}

// =================================================================================
// Blog state
// =================================================================================

export const blogSchema = z
	.object({
		title: z.string().optional(),
		content: z.string().optional(),
	})
	.strict()

export const blogStateSchema = z
	.object({
		topic: z.string().optional(),
		blog: blogSchema.optional(),
	})
	.strict()
	.superRefine((state, ctx) => {
		if (state.blog?.content !== undefined && state.blog.title === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['blog', 'content'],
				message: 'content cannot be set before a title exists',
			})
		}
	})

export type Blog = z.infer<typeof blogSchema>

/** The state carried through the blog generation graph. */
export type BlogState = z.infer<typeof blogStateSchema>

export const blogStateChannel: StateChannel<BlogState> = createStateChannel(blogStateSchema, {
	transition: (previous, next) =>
		previous.blog?.title !== undefined && next.blog?.title === undefined
			? ['blog.title: cannot be cleared once set']
			: [],
})
