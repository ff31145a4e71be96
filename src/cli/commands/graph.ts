import process from 'node:process'
import chalk from 'chalk'
import { Command } from 'commander'
import type { CliDependencies } from '../types'

interface GraphOptions {
	usecase: string
	json?: boolean
}

export function createGraphCommand(deps: CliDependencies): Command {
	return new Command('graph')
		.description('Print the topology of a usecase as a Mermaid flowchart')
		.option('-u, --usecase <name>', 'Usecase to inspect', 'topic')
		.option('--json', 'Print nodes and edges as JSON instead')
		.action((options: GraphOptions) => {
			try {
				const graph = deps.inspect(options.usecase)
				deps.stdout(options.json ? JSON.stringify(graph.getGraph(), null, 2) : graph.toMermaid())
			}
			catch (error) {
				const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
				deps.stderr(chalk.red(message))
				process.exitCode = 1
			}
		})
}
