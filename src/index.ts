/* eslint-disable perfectionist/sort-exports */

// Engine
export * from './types'
export * from './errors'
export * from './logger'
export * from './state'
export * from './graph'
export * from './compiled'
export * from './analysis'
export * from './linter'

// Blog generation
export * from './config'
export * from './llm'
export * from './nodes/blog'
export * from './nodes/prompts'
export * from './builder'
export * from './workflow'
