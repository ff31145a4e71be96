import { Console } from 'node:console'
import process from 'node:process'
import { Command } from 'commander'
import type { CliDependencies } from './types'
import { createBlogWorkflow, inspectTopology } from '../workflow'
import { createGenerateCommand } from './commands/generate'
import { createGraphCommand } from './commands/graph'

export const defaultDependencies: CliDependencies = {
	env: process.env,
	createWorkflow: createBlogWorkflow,
	inspect: inspectTopology,
	stdout: text => process.stdout.write(`${text}\n`),
	stderr: text => process.stderr.write(`${text}\n`),
	logOutput: new Console({ stdout: process.stderr, stderr: process.stderr }),
	interactive: Boolean(process.stderr.isTTY),
}

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
	const program = new Command()

	program.name('topicflow').description('Generate blog posts from a topic with an LLM workflow').version('0.1.0')
	program.addCommand(createGenerateCommand(deps))
	program.addCommand(createGraphCommand(deps))
	return program
}
