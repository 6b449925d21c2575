import { v4 as uuidv4 } from 'uuid';
import { CommandRunner, createCommandAnalyzers } from '../analyzers/CommandAnalyzer';
import { loadConfig, OrchestratorConfig } from '../config';
import { ArtifactStore } from '../stores/ArtifactStore';
import { FileArtifactStore } from '../stores/FileArtifactStore';
import { JobSnapshot, ScanOptions } from '../types';
import { createContextLogger } from '../utils/logger';
import { AnalyzerRegistry } from './AnalyzerRegistry';
import { ArtifactCache, ArtifactLookup } from './ArtifactCache';
import { ExecutionEngine, ProgressEvent } from './ExecutionEngine';
import { ExecutionPlan, ExecutionPlanner } from './ExecutionPlanner';
import { Job } from './Job';
import { JobQueue } from './JobQueue';
import { NotFoundError, OrchestratorError } from './OrchestratorError';
import { ProfileResolver, ScanProfile } from './ProfileResolver';

const log = createContextLogger('ScanService');

/**
 * A profile name, or an explicit list of analyzer IDs.
 */
export type ScanRequest = string | readonly string[];

export interface ScanServiceOptions {
	registry: AnalyzerRegistry;

	/**
	 * Validated configuration. Defaults apply when omitted.
	 */
	config?: OrchestratorConfig;

	/**
	 * Profiles in addition to those in `config.profiles`.
	 */
	profiles?: readonly ScanProfile[];

	/**
	 * Artifact persistence. Defaults to in-memory storage.
	 */
	store?: ArtifactStore;

	onProgress?: (event: ProgressEvent) => void;
	now?: () => number;
}

export interface ScanServiceConfigOptions extends Omit<ScanServiceOptions, 'registry' | 'config'> {
	/**
	 * Executes command analyzers. Defaults to spawning the configured command.
	 */
	commandRunner?: CommandRunner;
}

/**
 * Convert the `profiles` section of the configuration into scan profiles.
 */
export function profilesFromConfig(config: OrchestratorConfig): ScanProfile[] {
	return Object.entries(config.profiles).map(([name, profile]) => ({
		name,
		description: profile.description,
		analyzers: [...profile.analyzers],
	}));
}

/**
 * Entry point for callers: submits scans, tracks jobs and serves artifacts.
 */
export class ScanService {
	readonly registry: AnalyzerRegistry;
	readonly config: OrchestratorConfig;

	private readonly resolver: ProfileResolver;
	private readonly planner: ExecutionPlanner;
	private readonly cache: ArtifactCache;
	private readonly engine: ExecutionEngine;
	private readonly queue: JobQueue;
	private readonly now: () => number;

	constructor(options: ScanServiceOptions) {
		this.registry = options.registry;
		this.config = options.config ?? loadConfig({});
		this.now = options.now ?? Date.now;

		const { config, registry } = this;
		this.resolver = new ProfileResolver(registry, [...profilesFromConfig(config), ...(options.profiles ?? [])]);
		this.planner = new ExecutionPlanner(registry);
		this.cache = new ArtifactCache({
			store: options.store,
			ttlFor: (analyzerId) => config.ttlOverrides[analyzerId] ?? registry.get(analyzerId)?.descriptor.defaultTtlMs,
			defaultTtlMs: config.defaultTtlMs,
			thresholds: config.freshness,
			now: this.now,
		});
		this.engine = new ExecutionEngine(registry, this.cache, {
			parallelScanners: config.parallelScanners,
			defaultTimeoutMs: config.analyzerTimeoutMs,
			analyzerTimeouts: config.analyzerTimeouts,
			onProgress: options.onProgress,
			now: this.now,
		});
		this.queue = new JobQueue(this.engine, {
			parallelRepos: config.parallelRepos,
			capacity: config.queueCapacity,
			retentionMs: config.retentionMs,
			now: this.now,
		});
	}

	/**
	 * Build a service from configuration alone: command analyzers from
	 * `config.analyzers` are registered and artifacts persist under `config.storagePath`.
	 */
	static fromConfig(config: OrchestratorConfig, options: ScanServiceConfigOptions = {}): ScanService {
		const { commandRunner, ...rest } = options;
		const registry = new AnalyzerRegistry();
		registry.registerMany(createCommandAnalyzers(config.analyzers, commandRunner).map((analyzer) => analyzer.toRegistration()));
		return new ScanService({
			...rest,
			registry,
			config,
			store: options.store ?? new FileArtifactStore(config.storagePath),
		});
	}

	/**
	 * Plan and enqueue a scan.
	 * @returns The new job's ID
	 * @throws UnknownProfileError, UnknownIdError, UnknownDependencyError or CycleDetectedError when planning fails
	 * @throws QueueFullError or ConflictingRunError when the job cannot be admitted
	 */
	submitJob(target: string, request: ScanRequest, options: ScanOptions = {}): string {
		if (target.trim() === '') {
			throw new OrchestratorError('INVALID_TARGET', 'Scan target must not be empty');
		}

		const plan = this.plan(request);
		const job = new Job({
			id: uuidv4(),
			target,
			plan,
			options: { ...options, bestEffort: options.bestEffort ?? this.config.bestEffort },
			createdAt: this.now(),
		});
		this.queue.enqueue(job);
		log.info(`Submitted job ${job.id} for ${target}`, { analyzers: plan.order });
		return job.id;
	}

	/**
	 * @throws NotFoundError for an unknown or evicted job
	 */
	getJob(jobId: string): JobSnapshot {
		const snapshot = this.queue.get(jobId);
		if (!snapshot) {
			throw new NotFoundError('job', jobId);
		}
		return snapshot;
	}

	/**
	 * @throws NotFoundError for an unknown job
	 * @throws AlreadyTerminalError for a finished job
	 */
	cancelJob(jobId: string): void {
		this.queue.cancel(jobId);
	}

	/**
	 * Resolve with the job's terminal snapshot.
	 */
	waitForJob(jobId: string): Promise<JobSnapshot> {
		return this.queue.waitFor(jobId);
	}

	listActiveJobs(): JobSnapshot[] {
		return this.queue.listActive();
	}

	/**
	 * Jobs finished within `windowMs`, capped at the retention window.
	 */
	listRecentJobs(windowMs: number = this.config.retentionMs): JobSnapshot[] {
		return this.queue.listRecent(windowMs);
	}

	/**
	 * The stored artifact of an analyzer for a target, with its freshness.
	 * @throws NotFoundError if nothing is stored for the pair
	 */
	async getArtifact(target: string, analyzerId: string, ttlOverrideMs?: number): Promise<ArtifactLookup> {
		const found = await this.cache.lookup(target, analyzerId, ttlOverrideMs);
		if (!found) {
			throw new NotFoundError('artifact', `${target}/${analyzerId}`);
		}
		return found;
	}

	listArtifacts(target: string, ttlOverrideMs?: number): Promise<ArtifactLookup[]> {
		return this.cache.list(target, ttlOverrideMs);
	}

	/**
	 * Drop stored artifacts so the next scan re-runs the analyzers.
	 * @returns The number of artifacts removed
	 */
	invalidate(target: string, analyzerId?: string): Promise<number> {
		return this.cache.invalidate(target, analyzerId);
	}

	/**
	 * Plan a request without running it.
	 */
	plan(request: ScanRequest): ExecutionPlan {
		return this.planner.plan(this.resolver.resolve(request));
	}

	listProfiles(): ScanProfile[] {
		return this.resolver.listProfiles();
	}

	/**
	 * Refuse new jobs, cancel active ones and wait for them to unwind.
	 */
	shutdown(): Promise<void> {
		return this.queue.shutdown();
	}
}
