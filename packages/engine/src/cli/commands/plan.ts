import chalk from 'chalk';
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, createCliService } from '../context';
import { reportError } from '../output';

interface PlanOptions {
	config: string;
	profile?: string;
	json?: boolean;
}

/**
 * Create the plan command.
 */
export function createPlanCommand(): Command {
	return new Command('plan')
		.description('Show the waves a scan would run, without running it')
		.argument('[analyzers...]', 'Analyzer IDs to plan')
		.option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
		.option('-p, --profile <name>', 'Plan a configured profile instead of explicit analyzers')
		.option('--json', 'Output as JSON')
		.action(async (analyzers: string[], options: PlanOptions) => {
			try {
				await runPlan(analyzers, options);
			} catch (error) {
				reportError(error);
			}
		});
}

async function runPlan(analyzers: string[], options: PlanOptions): Promise<void> {
	const service = await createCliService(options.config);
	const request = options.profile ?? analyzers;
	if (typeof request !== 'string' && request.length === 0) {
		throw new Error('Name at least one analyzer or pass --profile');
	}

	const plan = service.plan(request);
	if (options.json) {
		console.log(JSON.stringify({ requested: plan.requested, waves: plan.waves }, null, 2));
		return;
	}

	console.log(chalk.bold(`Plan for ${plan.requested.join(', ')}`));
	plan.waves.forEach((wave, index) => {
		console.log(`  ${chalk.cyan(`wave ${index + 1}`)}  ${wave.join(', ')}`);
	});
}
