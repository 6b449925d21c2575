import { Command } from 'commander';
import { createArtifactsCommand } from './commands/artifacts';
import { createInvalidateCommand } from './commands/invalidate';
import { createPlanCommand } from './commands/plan';
import { createScanCommand } from './commands/scan';

export const VERSION = '0.1.0';

/**
 * Create the CLI program.
 */
export function createCli(): Command {
	const program = new Command().name('scanctl').description('Plan and run repository analyzers with artifact caching').version(VERSION);
	[createPlanCommand, createScanCommand, createArtifactsCommand, createInvalidateCommand].forEach((create) =>
		program.addCommand(create()),
	);
	return program;
}
