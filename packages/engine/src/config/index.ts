import { readFile } from 'fs/promises';
import { z } from 'zod';
import { OrchestratorError, toError } from '../core/OrchestratorError';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Error thrown when configuration input does not match the schema.
 */
export class ConfigurationError extends OrchestratorError {
	constructor(
		message: string,
		public readonly issues: readonly string[] = [],
	) {
		super('CONFIGURATION', message);
		this.name = 'ConfigurationError';
	}
}

const positiveInt = z.number().int().positive();
const durationMs = z.number().int().positive();

/** Thresholds that turn an artifact's age into a freshness level. */
const FreshnessConfigSchema = z
	.object({
		staleMultiplier: z.number().positive().default(7),
		veryStaleMultiplier: z.number().positive().default(30),
	})
	.refine((value) => value.veryStaleMultiplier >= value.staleMultiplier, {
		message: 'veryStaleMultiplier must not be smaller than staleMultiplier',
		path: ['veryStaleMultiplier'],
	});

/** A named analyzer set. */
export const ProfileConfigSchema = z.object({
	description: z.string().optional(),
	analyzers: z.array(z.string().min(1)).min(1),
});

/** An analyzer backed by an external command that prints JSON to stdout. */
export const CommandAnalyzerConfigSchema = z.object({
	command: z.string().min(1),
	/** `{target}` in any argument is replaced with the scan target. */
	args: z.array(z.string()).default([]),
	dependencies: z.array(z.string().min(1)).default([]),
	ttlMs: durationMs.optional(),
	timeoutMs: durationMs.optional(),
	cwd: z.string().optional(),
	env: z.record(z.string()).optional(),
	description: z.string().optional(),
});

export const OrchestratorConfigSchema = z.object({
	/** Jobs running at once. */
	parallelRepos: positiveInt.default(8),
	/** Analyzer runs in flight within one job. */
	parallelScanners: positiveInt.default(4),
	analyzerTimeoutMs: durationMs.default(5 * 60 * 1000),
	analyzerTimeouts: z.record(durationMs).default({}),
	defaultTtlMs: durationMs.default(24 * HOUR_MS),
	ttlOverrides: z.record(durationMs).default({}),
	/** Jobs allowed to wait for a free slot. */
	queueCapacity: z.number().int().nonnegative().default(100),
	retentionMs: durationMs.default(HOUR_MS),
	freshness: FreshnessConfigSchema.default({}),
	bestEffort: z.boolean().default(false),
	storagePath: z.string().min(1).default('.scan-cache'),
	defaultProfile: z.string().min(1).optional(),
	profiles: z.record(ProfileConfigSchema).default({}),
	analyzers: z.record(CommandAnalyzerConfigSchema).default({}),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;
export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;
export type CommandAnalyzerConfig = z.infer<typeof CommandAnalyzerConfigSchema>;

function formatZodError(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${path}: ${issue.message}`;
	});
}

/**
 * Validate raw configuration and fill in defaults.
 * @throws ConfigurationError listing every schema violation
 */
export function loadConfig(input: unknown = {}): OrchestratorConfig {
	const result = OrchestratorConfigSchema.safeParse(input ?? {});
	if (!result.success) {
		const issues = formatZodError(result.error);
		throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
	}

	const config = result.data;
	if (config.defaultProfile !== undefined && !(config.defaultProfile in config.profiles)) {
		throw new ConfigurationError(`Invalid configuration: defaultProfile '${config.defaultProfile}' is not a configured profile`);
	}
	return config;
}

/**
 * Read a JSON configuration file and validate it.
 * @throws ConfigurationError if the file is unreadable or its contents are invalid
 */
export async function loadConfigFile(path: string): Promise<OrchestratorConfig> {
	let raw: string;
	try {
		raw = await readFile(path, 'utf8');
	} catch (error) {
		throw new ConfigurationError(`Cannot read configuration file ${path}: ${toError(error).message}`);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new ConfigurationError(`Configuration file ${path} is not valid JSON: ${toError(error).message}`);
	}
	return loadConfig(parsed);
}
