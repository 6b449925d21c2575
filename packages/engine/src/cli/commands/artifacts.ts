import chalk from 'chalk';
import { Command } from 'commander';
import { describeAge } from '../../core/FreshnessPolicy';
import { DEFAULT_CONFIG_PATH, createCliService } from '../context';
import { formatFreshness, reportError } from '../output';

interface ArtifactsOptions {
	config: string;
	json?: boolean;
}

/**
 * Create the artifacts command.
 */
export function createArtifactsCommand(): Command {
	return new Command('artifacts')
		.description('List stored artifacts of a target with their freshness')
		.argument('<target>', 'Target whose artifacts to list')
		.option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
		.option('--json', 'Output as JSON')
		.action(async (target: string, options: ArtifactsOptions) => {
			try {
				await runArtifacts(target, options);
			} catch (error) {
				reportError(error);
			}
		});
}

async function runArtifacts(target: string, options: ArtifactsOptions): Promise<void> {
	const service = await createCliService(options.config);
	const artifacts = await service.listArtifacts(target);

	if (options.json) {
		const rows = artifacts.map(({ artifact, level }) => ({
			analyzerId: artifact.analyzerId,
			producedAt: new Date(artifact.producedAt).toISOString(),
			status: artifact.status,
			level,
		}));
		console.log(JSON.stringify(rows, null, 2));
		return;
	}

	if (artifacts.length === 0) {
		console.log(chalk.dim(`No artifacts stored for ${target}`));
		return;
	}
	const now = Date.now();
	for (const { artifact, level } of artifacts) {
		console.log(`  ${artifact.analyzerId.padEnd(24)} ${formatFreshness(level)}  ${chalk.dim(describeAge(now - artifact.producedAt))}`);
	}
}
