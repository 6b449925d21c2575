import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { ScanRequest, ScanService } from '../../core/ScanService';
import { JobSnapshot } from '../../types';
import { DEFAULT_CONFIG_PATH, createCliService, parseAnalyzerList } from '../context';
import { formatAnalyzerState, formatJobStatus, reportError } from '../output';

interface ScanCommandOptions {
	config: string;
	profile?: string;
	analyzers?: string[];
	force?: boolean;
	bestEffort?: boolean;
	ttl?: number;
	json?: boolean;
}

function parseDuration(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Expected a positive number of milliseconds.');
	}
	return parsed;
}

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
	return new Command('scan')
		.description('Run analyzers against a target and wait for the result')
		.argument('<target>', 'Target to scan, e.g. owner/repo')
		.option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
		.option('-p, --profile <name>', 'Scan profile to use')
		.option('-a, --analyzers <ids>', 'Comma-separated analyzer IDs', parseAnalyzerList)
		.option('-f, --force', 'Ignore cached artifacts')
		.option('--best-effort', 'Accept stale artifacts instead of re-running')
		.option('--ttl <ms>', 'Judge freshness against this TTL', parseDuration)
		.option('--json', 'Output the final job as JSON')
		.action(async (target: string, options: ScanCommandOptions) => {
			try {
				await runScan(target, options);
			} catch (error) {
				reportError(error);
			}
		});
}

/**
 * Pick what to scan: explicit analyzers, then the named profile, then the configured default profile.
 */
export function resolveScanRequest(service: ScanService, options: Pick<ScanCommandOptions, 'profile' | 'analyzers'>): ScanRequest {
	if (options.analyzers && options.analyzers.length > 0) {
		return options.analyzers;
	}
	const profile = options.profile ?? service.config.defaultProfile;
	if (profile === undefined) {
		throw new Error('Pass --profile or --analyzers, or set defaultProfile in the configuration');
	}
	return profile;
}

async function runScan(target: string, options: ScanCommandOptions): Promise<void> {
	const service = await createCliService(
		options.config,
		options.json
			? undefined
			: (event) => {
					console.log(`  ${chalk.dim(event.analyzerId)} ${formatAnalyzerState(event.state)}`);
				},
	);

	const jobId = service.submitJob(target, resolveScanRequest(service, options), {
		force: options.force,
		bestEffort: options.bestEffort,
		ttlOverrideMs: options.ttl,
	});

	const interrupt = (): void => {
		console.error(chalk.yellow('Cancelling scan...'));
		try {
			service.cancelJob(jobId);
		} catch (error) {
			reportError(error);
		}
	};
	process.once('SIGINT', interrupt);

	let snapshot: JobSnapshot;
	try {
		snapshot = await service.waitForJob(jobId);
	} finally {
		process.removeListener('SIGINT', interrupt);
	}

	if (options.json) {
		console.log(JSON.stringify(snapshot, null, 2));
	} else {
		printSummary(snapshot);
	}
	if (snapshot.status !== 'done') {
		process.exitCode = 1;
	}
}

function printSummary(snapshot: JobSnapshot): void {
	console.log('');
	console.log(`${chalk.bold(snapshot.target)}  ${formatJobStatus(snapshot.status)}`);
	for (const [analyzerId, state] of Object.entries(snapshot.analyzers)) {
		console.log(`  ${analyzerId.padEnd(24)} ${formatAnalyzerState(state)}`);
	}
	if (snapshot.statistics) {
		const { analyzersExecuted, cacheHits, failures, skipped, totalDurationMs } = snapshot.statistics;
		console.log(
			chalk.dim(`  ${analyzersExecuted} run, ${cacheHits} cached, ${failures} failed, ${skipped} skipped in ${totalDurationMs}ms`),
		);
	}
	if (snapshot.error) {
		console.log(chalk.red(`  ${snapshot.error}`));
	}
}
