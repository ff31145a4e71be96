import type { CompiledGraph } from '../compiled'
import type { LogOutput } from '../logger'
import type { BlogState } from '../state'
import type { BlogWorkflowOptions } from '../workflow'

/** Everything the commands touch outside their own arguments. */
export interface CliDependencies {
	env: NodeJS.ProcessEnv
	createWorkflow: (options: BlogWorkflowOptions) => CompiledGraph<BlogState>
	inspect: (usecase: string) => CompiledGraph<BlogState>
	stdout: (text: string) => void
	stderr: (text: string) => void
	/** Receives log lines; kept off stdout so `--json` output stays parseable. */
	logOutput: LogOutput
	/** Whether progress spinners may be drawn. */
	interactive: boolean
}
