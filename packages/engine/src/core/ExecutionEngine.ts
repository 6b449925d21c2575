import { AnalyzerDescriptor, AnalyzerState, Artifact, JobSnapshot } from '../types';
import { createContextLogger } from '../utils/logger';
import { AnalyzerRegistry } from './AnalyzerRegistry';
import { ArtifactCache, RunLease } from './ArtifactCache';
import { ArtifactSetImpl } from './ArtifactSetImpl';
import { AnalyzerCancelledError, runWithDeadline } from './cancellation';
import { AlreadyTerminalError, Job } from './Job';
import { JobStatisticsCollector } from './JobStatisticsCollector';
import { toError } from './OrchestratorError';
import { Semaphore } from './Semaphore';

const log = createContextLogger('ExecutionEngine');

export const DEFAULT_PARALLEL_SCANNERS = 4;
export const DEFAULT_ANALYZER_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * A per-analyzer transition inside a job.
 */
export interface ProgressEvent {
	readonly jobId: string;
	readonly target: string;
	readonly analyzerId: string;
	readonly state: AnalyzerState;
}

export interface ExecutionEngineOptions {
	/**
	 * Maximum analyzer runs in flight within one job.
	 */
	parallelScanners?: number;

	/**
	 * Timeout for analyzers that set none of their own.
	 */
	defaultTimeoutMs?: number;

	/**
	 * Per-analyzer timeouts that take precedence over descriptor values.
	 */
	analyzerTimeouts?: Readonly<Record<string, number>>;

	onProgress?: (event: ProgressEvent) => void;
	now?: () => number;
}

/**
 * Runs a job's plan wave by wave.
 *
 * Within a wave, analyzers with a failed or skipped dependency are skipped, usable
 * cache hits complete without running, and the rest are dispatched through a
 * semaphore of `parallelScanners` permits. A wave settles completely before the
 * next one starts.
 */
export class ExecutionEngine {
	private readonly parallelScanners: number;
	private readonly defaultTimeoutMs: number;
	private readonly analyzerTimeouts: Readonly<Record<string, number>>;
	private readonly onProgress?: (event: ProgressEvent) => void;
	private readonly now: () => number;

	constructor(
		private readonly registry: AnalyzerRegistry,
		private readonly cache: ArtifactCache,
		options: ExecutionEngineOptions = {},
	) {
		this.parallelScanners = options.parallelScanners ?? DEFAULT_PARALLEL_SCANNERS;
		this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_ANALYZER_TIMEOUT_MS;
		this.analyzerTimeouts = options.analyzerTimeouts ?? {};
		this.onProgress = options.onProgress;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Execute the job's plan, mutating the job as it goes, and finish the job.
	 * Analyzer failures never reject; only a job that is already terminal does.
	 * @returns The terminal snapshot
	 */
	async execute(job: Job): Promise<JobSnapshot> {
		if (job.isTerminal()) {
			throw new AlreadyTerminalError(job.id, job.getStatus());
		}

		const statistics = new JobStatisticsCollector(this.now);
		const semaphore = new Semaphore(this.parallelScanners);
		const produced = new ArtifactSetImpl();

		if (job.getStatus() === 'queued') {
			job.markRunning(this.now());
		}
		statistics.startExecution();
		log.info(`Starting job ${job.id} for ${job.target}`, { waves: job.plan.waves.length, analyzers: job.plan.order.length });

		let failure: Error | undefined;
		try {
			for (const wave of job.plan.waves) {
				if (job.isCancellationRequested()) {
					break;
				}
				statistics.recordWave();
				await this.executeWave(job, wave, produced, semaphore, statistics);
			}
		} catch (error) {
			failure = toError(error);
			log.error(`Job ${job.id} aborted unexpectedly: ${failure.message}`, { stack: failure.stack });
		}

		const cancelled = job.isCancellationRequested();
		for (const analyzerId of job.plan.order) {
			if (job.getAnalyzerState(analyzerId)?.status === 'pending') {
				statistics.recordSkipped();
				this.transition(job, analyzerId, { status: 'skipped', reason: cancelled ? 'cancelled' : 'not executed' });
			}
		}

		job.setStatistics(statistics.stopExecution());
		const failedRequested = job.requestedAnalyzers.filter((id) => job.getAnalyzerState(id)?.status === 'failed');

		if (cancelled) {
			job.finish('cancelled', this.now());
		} else if (failure) {
			job.finish('error', this.now(), failure.message);
		} else if (failedRequested.length > 0) {
			job.finish('error', this.now(), `Requested analyzers failed: ${failedRequested.join(', ')}`);
		} else {
			job.finish('done', this.now());
		}

		const snapshot = job.snapshot();
		log.info(`Job ${job.id} finished with status ${snapshot.status}`, { durationMs: snapshot.statistics?.totalDurationMs });
		return snapshot;
	}

	/**
	 * Timeout that applies to an analyzer: configured override, then descriptor, then the default.
	 */
	timeoutFor(descriptor: AnalyzerDescriptor): number {
		return this.analyzerTimeouts[descriptor.id] ?? descriptor.timeoutMs ?? this.defaultTimeoutMs;
	}

	private async executeWave(
		job: Job,
		wave: readonly string[],
		produced: ArtifactSetImpl,
		semaphore: Semaphore,
		statistics: JobStatisticsCollector,
	): Promise<void> {
		const toRun: AnalyzerDescriptor[] = [];

		for (const analyzerId of wave) {
			const { descriptor } = this.registry.getRequired(analyzerId);

			const blocker = descriptor.dependencies.find((dependencyId) => {
				const status = job.getAnalyzerState(dependencyId)?.status;
				return status === 'failed' || status === 'skipped';
			});
			if (blocker !== undefined) {
				statistics.recordSkipped();
				this.transition(job, analyzerId, { status: 'skipped', reason: `dependency failed: ${blocker}` });
				continue;
			}

			const cached = await this.findUsableArtifact(job, analyzerId);
			if (cached) {
				produced.add(cached);
				statistics.recordCacheHit();
				this.transition(job, analyzerId, { status: 'done', cached: true });
				continue;
			}

			toRun.push(descriptor);
		}

		await Promise.all(toRun.map((descriptor) => this.dispatch(job, descriptor, produced, semaphore, statistics)));
	}

	private async findUsableArtifact(job: Job, analyzerId: string): Promise<Artifact | undefined> {
		try {
			const check = await this.cache.check(job.target, analyzerId, job.options);
			return check.usable;
		} catch (error) {
			log.warn(`Cache lookup failed for ${analyzerId} on ${job.target}, running analyzer`, { error: toError(error).message });
			return undefined;
		}
	}

	private async dispatch(
		job: Job,
		descriptor: AnalyzerDescriptor,
		produced: ArtifactSetImpl,
		semaphore: Semaphore,
		statistics: JobStatisticsCollector,
	): Promise<void> {
		const release = await semaphore.acquire();
		let settled: Promise<void> = Promise.resolve();
		try {
			if (job.isCancellationRequested()) {
				statistics.recordSkipped();
				this.transition(job, descriptor.id, { status: 'skipped', reason: 'cancelled' });
				return;
			}
			({ settled } = await this.runAnalyzer(job, descriptor, produced, statistics));
		} finally {
			// A timed-out run keeps its permit until its run function has actually returned.
			void settled.then(() => release());
		}
	}

	/**
	 * Run one analyzer and record its outcome.
	 * `settled` never rejects and resolves once the run function itself has returned,
	 * which after a timeout can be later than the recorded failure.
	 */
	private async runAnalyzer(
		job: Job,
		descriptor: AnalyzerDescriptor,
		produced: ArtifactSetImpl,
		statistics: JobStatisticsCollector,
	): Promise<{ settled: Promise<void> }> {
		const analyzerId = descriptor.id;
		let lease: RunLease;
		try {
			lease = this.cache.acquire(job.target, analyzerId);
		} catch (error) {
			statistics.recordFailure();
			this.transition(job, analyzerId, { status: 'failed', error: toError(error).message });
			return { settled: Promise.resolve() };
		}

		const { runnable } = this.registry.getRequired(analyzerId);
		const dependencies = new ArtifactSetImpl();
		for (const dependencyId of descriptor.dependencies) {
			const artifact = produced.accessor(dependencyId);
			if (artifact) {
				dependencies.add(artifact);
			}
		}

		this.transition(job, analyzerId, { status: 'running' });
		statistics.recordRunStarted();
		const startedAt = this.now();

		let settled: Promise<void> = Promise.resolve();
		try {
			const payload = await runWithDeadline(job.signal, analyzerId, this.timeoutFor(descriptor), (signal) => {
				const run = runnable.run({ target: job.target, signal, dependencies });
				settled = run.then(
					() => undefined,
					() => undefined,
				);
				return run;
			});
			const artifact = await this.cache.store(job.target, analyzerId, payload);
			produced.add(artifact);

			const durationMs = this.now() - startedAt;
			statistics.recordRunFinished(analyzerId, durationMs, 'succeeded');
			this.transition(job, analyzerId, { status: 'done', durationMs });
		} catch (error) {
			const cause = toError(error);
			const durationMs = this.now() - startedAt;
			if (cause instanceof AnalyzerCancelledError) {
				statistics.recordRunFinished(analyzerId, durationMs, 'cancelled');
				this.transition(job, analyzerId, { status: 'skipped', reason: 'cancelled', durationMs });
			} else {
				statistics.recordRunFinished(analyzerId, durationMs, 'failed');
				log.warn(`Analyzer ${analyzerId} failed for ${job.target}: ${cause.message}`, { jobId: job.id });
				this.transition(job, analyzerId, { status: 'failed', error: cause.message, durationMs });
			}
		} finally {
			void settled.then(() => lease.release());
		}
		return { settled };
	}

	private transition(job: Job, analyzerId: string, state: AnalyzerState): void {
		job.setAnalyzerState(analyzerId, state);
		if (!this.onProgress) {
			return;
		}
		try {
			this.onProgress({ jobId: job.id, target: job.target, analyzerId, state: { ...state } });
		} catch (error) {
			log.warn(`Progress listener threw for job ${job.id}`, { error: toError(error).message });
		}
	}
}
