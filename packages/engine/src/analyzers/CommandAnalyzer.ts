import { execFile } from 'child_process';
import { CommandAnalyzerConfig } from '../config';
import { OrchestratorError, toError } from '../core/OrchestratorError';
import { AnalyzerRunContext, ArtifactPayload } from '../types';
import { createContextLogger } from '../utils/logger';
import { artifactPayloadSchema } from '../utils/payload';
import { AbstractAnalyzer } from './AbstractAnalyzer';

const log = createContextLogger('CommandAnalyzer');

const TARGET_PLACEHOLDER = /\{target\}/g;
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const DEFAULT_COMMAND_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Error thrown when an analyzer command exits unsuccessfully or prints something other than JSON.
 */
export class CommandFailedError extends OrchestratorError {
	constructor(
		public readonly analyzerId: string,
		message: string,
		public readonly stderr: string = '',
	) {
		super('COMMAND_FAILED', `Analyzer '${analyzerId}' command failed: ${message}`);
		this.name = 'CommandFailedError';
	}
}

export interface CommandOutput {
	stdout: string;
	stderr: string;
}

export interface CommandRunOptions {
	cwd?: string;
	env?: Readonly<Record<string, string>>;
	signal: AbortSignal;
}

/**
 * Runs a command to completion. Rejects when it cannot start, exits non-zero or is aborted.
 */
export type CommandRunner = (command: string, args: readonly string[], options: CommandRunOptions) => Promise<CommandOutput>;

/**
 * Default runner: execFile without a shell, environment merged over the current one.
 */
export const runCommand: CommandRunner = (command, args, options) =>
	new Promise((resolve, reject) => {
		execFile(
			command,
			[...args],
			{
				cwd: options.cwd,
				env: options.env ? { ...process.env, ...options.env } : process.env,
				signal: options.signal,
				maxBuffer: MAX_OUTPUT_BYTES,
				encoding: 'utf8',
			},
			(error, stdout, stderr) => {
				if (error) {
					reject(Object.assign(error, { stderr }));
					return;
				}
				resolve({ stdout, stderr });
			},
		);
	});

function stderrOf(error: unknown): string {
	if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
		return error.stderr;
	}
	return '';
}

/**
 * Analyzer backed by an external tool. The tool receives the target through
 * `{target}` placeholders in its arguments and must print one JSON document.
 */
export class CommandAnalyzer extends AbstractAnalyzer {
	readonly dependencies: readonly string[];
	readonly defaultTtlMs: number;

	constructor(
		readonly id: string,
		private readonly config: CommandAnalyzerConfig,
		private readonly runner: CommandRunner = runCommand,
	) {
		super({
			timeoutMs: config.timeoutMs,
			description: config.description ?? `${config.command} ${config.args.join(' ')}`.trim(),
		});
		this.dependencies = [...config.dependencies];
		this.defaultTtlMs = config.ttlMs ?? DEFAULT_COMMAND_TTL_MS;
	}

	/**
	 * The arguments passed to the command for a target.
	 */
	argumentsFor(target: string): string[] {
		return this.config.args.map((arg) => arg.replace(TARGET_PLACEHOLDER, target));
	}

	protected async analyze(context: AnalyzerRunContext): Promise<ArtifactPayload> {
		const args = this.argumentsFor(context.target);
		log.debug(`Running ${this.config.command} for ${context.target}`, { analyzerId: this.id, args });

		let output: CommandOutput;
		try {
			output = await this.runner(this.config.command, args, { cwd: this.config.cwd, env: this.config.env, signal: context.signal });
		} catch (error) {
			throw new CommandFailedError(this.id, toError(error).message, stderrOf(error));
		}
		return this.parse(output.stdout, output.stderr);
	}

	private parse(stdout: string, stderr: string): ArtifactPayload {
		let raw: unknown;
		try {
			raw = JSON.parse(stdout);
		} catch {
			throw new CommandFailedError(this.id, 'output is not valid JSON', stderr);
		}

		const result = artifactPayloadSchema.safeParse(raw);
		if (!result.success) {
			throw new CommandFailedError(this.id, 'output is not a JSON document', stderr);
		}
		return result.data;
	}
}

/**
 * Build command analyzers from the `analyzers` section of the configuration.
 */
export function createCommandAnalyzers(
	definitions: Readonly<Record<string, CommandAnalyzerConfig>>,
	runner: CommandRunner = runCommand,
): CommandAnalyzer[] {
	return Object.entries(definitions).map(([id, definition]) => new CommandAnalyzer(id, definition, runner));
}
