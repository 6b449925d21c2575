import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, createCliService } from '../context';
import { reportError } from '../output';

interface InvalidateOptions {
	config: string;
}

/**
 * Create the invalidate command.
 */
export function createInvalidateCommand(): Command {
	return new Command('invalidate')
		.description('Delete stored artifacts so the next scan re-runs the analyzers')
		.argument('<target>', 'Target whose artifacts to delete')
		.argument('[analyzer]', 'Only delete this analyzer\'s artifact')
		.option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
		.action(async (target: string, analyzer: string | undefined, options: InvalidateOptions) => {
			try {
				const service = await createCliService(options.config);
				const removed = await service.invalidate(target, analyzer);
				console.log(`Removed ${removed} artifact${removed === 1 ? '' : 's'} for ${target}`);
			} catch (error) {
				reportError(error);
			}
		});
}
