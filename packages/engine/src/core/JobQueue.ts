import { JobSnapshot } from '../types';
import { createContextLogger } from '../utils/logger';
import { ConflictingRunError } from './ArtifactCache';
import { ExecutionEngine } from './ExecutionEngine';
import { AlreadyTerminalError, Job } from './Job';
import { NotFoundError, OrchestratorError, toError } from './OrchestratorError';

const log = createContextLogger('JobQueue');

export const DEFAULT_PARALLEL_REPOS = 8;
export const DEFAULT_QUEUE_CAPACITY = 100;
export const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

/**
 * Error thrown when a job cannot be admitted because the wait queue is full.
 * Transient: the caller should retry later.
 */
export class QueueFullError extends OrchestratorError {
	constructor(public readonly capacity: number) {
		super('QUEUE_FULL', `Job queue is full (${capacity} jobs waiting)`);
		this.name = 'QueueFullError';
	}
}

export interface JobQueueOptions {
	/**
	 * Maximum number of jobs running at once.
	 */
	parallelRepos?: number;

	/**
	 * Maximum number of jobs waiting for a slot.
	 */
	capacity?: number;

	/**
	 * How long finished jobs stay visible after they finish.
	 */
	retentionMs?: number;

	now?: () => number;
}

/**
 * Admits jobs, runs at most `parallelRepos` of them at once in FIFO order, and
 * keeps finished jobs around for `retentionMs`.
 */
export class JobQueue {
	private readonly parallelRepos: number;
	private readonly capacity: number;
	private readonly retentionMs: number;
	private readonly now: () => number;

	private readonly jobs: Map<string, Job> = new Map();
	private readonly pending: Job[] = [];
	private readonly running: Map<string, Promise<void>> = new Map();
	private closed = false;

	constructor(
		private readonly engine: ExecutionEngine,
		options: JobQueueOptions = {},
	) {
		this.parallelRepos = options.parallelRepos ?? DEFAULT_PARALLEL_REPOS;
		this.capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
		this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
		this.now = options.now ?? Date.now;
		if (!Number.isInteger(this.parallelRepos) || this.parallelRepos < 1) {
			throw new RangeError(`parallelRepos must be a positive integer, got ${this.parallelRepos}`);
		}
	}

	/**
	 * Admit a job. It starts right away if a slot is free, otherwise it waits its turn.
	 * @throws ConflictingRunError if an active job for the same target shares analyzers with it
	 * @throws QueueFullError if the job would have to wait and the wait queue is at capacity
	 */
	enqueue(job: Job): void {
		if (this.closed) {
			throw new OrchestratorError('QUEUE_CLOSED', 'Job queue has been shut down');
		}
		if (this.jobs.has(job.id)) {
			throw new OrchestratorError('DUPLICATE_JOB', `Job '${job.id}' was already submitted`);
		}
		if (job.getStatus() !== 'queued') {
			throw new AlreadyTerminalError(job.id, job.getStatus());
		}
		this.evictExpired();

		const overlap = this.findOverlap(job);
		if (overlap.length > 0) {
			throw new ConflictingRunError(job.target, overlap);
		}

		if (this.running.size >= this.parallelRepos && this.pending.length >= this.capacity) {
			throw new QueueFullError(this.capacity);
		}

		this.jobs.set(job.id, job);
		this.pending.push(job);
		log.debug(`Queued job ${job.id} for ${job.target}`, { waiting: this.pending.length });
		this.pump();
	}

	/**
	 * Snapshot of a job, or undefined if it is unknown or already evicted.
	 */
	get(jobId: string): JobSnapshot | undefined {
		this.evictExpired();
		return this.jobs.get(jobId)?.snapshot();
	}

	/**
	 * Cancel a job. A waiting job is cancelled immediately; a running job is
	 * signalled and becomes 'cancelled' once its in-flight work has unwound.
	 * @throws NotFoundError for an unknown job
	 * @throws AlreadyTerminalError for a job that already finished
	 */
	cancel(jobId: string): void {
		this.evictExpired();
		const job = this.jobs.get(jobId);
		if (!job) {
			throw new NotFoundError('job', jobId);
		}
		if (job.isTerminal()) {
			throw new AlreadyTerminalError(job.id, job.getStatus());
		}

		job.requestCancel();
		const index = this.pending.indexOf(job);
		if (index >= 0) {
			this.pending.splice(index, 1);
			for (const analyzerId of job.plan.order) {
				job.setAnalyzerState(analyzerId, { status: 'skipped', reason: 'cancelled' });
			}
			job.finish('cancelled', this.now());
		}
		log.info(`Cancellation requested for job ${job.id}`);
	}

	/**
	 * Jobs that are queued or running, oldest first.
	 */
	listActive(): JobSnapshot[] {
		return this.collect((job) => !job.isTerminal()).sort((a, b) => a.createdAt - b.createdAt);
	}

	/**
	 * Jobs that finished within the last `windowMs`, most recent first.
	 * Never reaches past the retention window.
	 */
	listRecent(windowMs: number): JobSnapshot[] {
		this.evictExpired();
		const since = this.now() - windowMs;
		return this.collect((job) => job.isTerminal())
			.filter((snapshot) => (snapshot.finishedAt ?? 0) >= since)
			.sort((a, b) => (b.finishedAt ?? 0) - (a.finishedAt ?? 0));
	}

	/**
	 * Resolve with the job's terminal snapshot.
	 * @throws NotFoundError for an unknown job
	 */
	waitFor(jobId: string): Promise<JobSnapshot> {
		const job = this.jobs.get(jobId);
		if (!job) {
			return Promise.reject(new NotFoundError('job', jobId));
		}
		return job.whenFinished();
	}

	/**
	 * Wait until no job is queued or running.
	 */
	async drain(): Promise<void> {
		while (this.running.size > 0) {
			await Promise.all(this.running.values());
		}
	}

	/**
	 * Refuse new jobs, cancel everything active, and wait for running jobs to unwind.
	 */
	async shutdown(): Promise<void> {
		this.closed = true;
		for (const snapshot of this.listActive()) {
			this.cancel(snapshot.id);
		}
		await this.drain();
	}

	getStats(): { queued: number; running: number; retained: number } {
		return {
			queued: this.pending.length,
			running: this.running.size,
			retained: this.jobs.size - this.pending.length - this.running.size,
		};
	}

	private pump(): void {
		while (this.running.size < this.parallelRepos && this.pending.length > 0) {
			const job = this.pending.shift();
			if (job) {
				this.start(job);
			}
		}
	}

	private start(job: Job): void {
		const execution = this.engine
			.execute(job)
			.then(
				() => undefined,
				(error: unknown) => {
					const cause = toError(error);
					log.error(`Job ${job.id} failed outside the engine: ${cause.message}`, { stack: cause.stack });
					if (!job.isTerminal()) {
						job.finish('error', this.now(), cause.message);
					}
				},
			)
			.finally(() => {
				this.running.delete(job.id);
				this.pump();
			});
		this.running.set(job.id, execution);
	}

	private findOverlap(candidate: Job): string[] {
		const wanted = new Set(candidate.plan.order);
		const overlap = new Set<string>();
		for (const job of this.jobs.values()) {
			if (job.isTerminal() || job.target !== candidate.target) {
				continue;
			}
			for (const analyzerId of job.plan.order) {
				if (wanted.has(analyzerId)) {
					overlap.add(analyzerId);
				}
			}
		}
		return candidate.plan.order.filter((analyzerId) => overlap.has(analyzerId));
	}

	private collect(predicate: (job: Job) => boolean): JobSnapshot[] {
		return Array.from(this.jobs.values())
			.filter(predicate)
			.map((job) => job.snapshot());
	}

	private evictExpired(): void {
		const cutoff = this.now() - this.retentionMs;
		for (const [id, job] of this.jobs) {
			const finishedAt = job.getFinishedAt();
			if (finishedAt !== undefined && finishedAt < cutoff) {
				this.jobs.delete(id);
			}
		}
	}
}
