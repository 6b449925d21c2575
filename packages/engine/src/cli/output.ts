import chalk from 'chalk';
import { AnalyzerState, FreshnessLevel, JobStatus } from '../types';
import { logger } from '../utils/logger';
import { toError } from '../core/OrchestratorError';

/**
 * Log a command failure and mark the process as failed.
 */
export function reportError(error: unknown): void {
	logger.error(toError(error).message);
	process.exitCode = 1;
}

export function formatJobStatus(status: JobStatus): string {
	switch (status) {
		case 'done':
			return chalk.green(status);
		case 'error':
			return chalk.red(status);
		case 'cancelled':
			return chalk.yellow(status);
		default:
			return chalk.cyan(status);
	}
}

export function formatAnalyzerState(state: AnalyzerState): string {
	switch (state.status) {
		case 'done':
			return state.cached ? chalk.green('done (cached)') : chalk.green('done');
		case 'failed':
			return chalk.red(`failed: ${state.error ?? 'unknown error'}`);
		case 'skipped':
			return chalk.yellow(`skipped: ${state.reason ?? 'not executed'}`);
		default:
			return chalk.cyan(state.status);
	}
}

export function formatFreshness(level: FreshnessLevel): string {
	switch (level) {
		case 'fresh':
			return chalk.green(level);
		case 'stale':
			return chalk.yellow(level);
		case 'very-stale':
			return chalk.magenta(level);
		case 'expired':
			return chalk.red(level);
	}
}
