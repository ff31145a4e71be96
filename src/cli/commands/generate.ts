import process from 'node:process'
import chalk from 'chalk'
import { Command } from 'commander'
import ora from 'ora'
import type { BlogState } from '../../state'
import type { CliDependencies } from '../types'
import { loadConfig } from '../../config'
import { ConsoleLogger } from '../../logger'

interface GenerateOptions {
	model?: string
	baseUrl?: string
	json?: boolean
	verbose?: boolean
	strict?: boolean
}

export function formatBlog(state: BlogState): string {
	const title = state.blog?.title
	const content = state.blog?.content
	if (title === undefined) {
		return 'No blog post was generated.'
	}
	return content === undefined ? `# ${title}` : `# ${title}\n\n${content}`
}

export function createGenerateCommand(deps: CliDependencies): Command {
	return new Command('generate')
		.description('Generate a blog post (title and content) for a topic')
		.argument('<topic>', 'Topic to write about')
		.option('-m, --model <id>', 'Model identifier')
		.option('--base-url <url>', 'OpenAI-compatible API base URL')
		.option('--json', 'Print the final workflow state as JSON')
		.option('-v, --verbose', 'Log every node execution')
		.option('--strict', 'Fail instead of skipping when the topic is empty')
		.action(async (topic: string, options: GenerateOptions) => {
			const spinner = ora({ text: `Writing about "${topic}"...`, isSilent: !deps.interactive || options.json })

			try {
				const config = loadConfig(deps.env, { model: options.model, baseURL: options.baseUrl })
				const logger = new ConsoleLogger({
					level: options.verbose ? 'debug' : config.logLevel,
					output: deps.logOutput,
				})
				const workflow = deps.createWorkflow({ config, logger, strict: options.strict })

				spinner.start()
				const state = await workflow.run({ topic })
				spinner.succeed('Blog post generated')

				deps.stdout(options.json ? JSON.stringify(state, null, 2) : formatBlog(state))
			}
			catch (error) {
				spinner.fail('Generation failed')
				const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
				deps.stderr(chalk.red(message))
				process.exitCode = 1
			}
		})
}
